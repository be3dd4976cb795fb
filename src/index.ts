/**
 * pacer - micro-benchmark runner with CSV output
 *
 * Usage:
 *   import { Benchmark, BenchmarkRegistry, runMain } from 'pacer';
 *
 *   const registry = new BenchmarkRegistry().add(
 *     Benchmark.withName('gen_bench')
 *       .withRange(1 << 10, 1 << 20, 4)
 *       .withGenerator(n => Array.from({ length: n }, (_, i) => i))
 *       .withBench('pop', state => {
 *         const list = state.getInput();
 *         while (list.length > 0) doNotOptimize(list.pop());
 *       })
 *   );
 *   process.exitCode = runMain(registry);
 */

export * from './benchmarks/framework/index.js';
export * from './transpose/transpose.js';
export { runMain, type RunMainOptions } from './cli/index.js';
export {
  loadConfig,
  parseArgs,
  validateRunConfig,
  DEFAULT_RUN_CONFIG,
  RunConfigSchema,
  type RunConfig,
} from './utils/config.js';
export * from './utils/errors.js';
export { logger, Logger, type LogLevel } from './utils/logger.js';
