/**
 * Benchmark program entry point
 *
 * A benchmark program registers its entries and hands them to runMain:
 *
 * ```ts
 * const registry = new BenchmarkRegistry().add(
 *   Benchmark.withName('range_bench').withRange(1 << 10, 1 << 20, 4).withBench('pop', popAll)
 * );
 * process.exitCode = runMain(registry);
 * ```
 *
 * Results go to stdout as CSV; logs and errors go to stderr.
 */

import type { BenchmarkRegistry } from '../benchmarks/framework/BenchmarkRegistry.js';
import { BenchmarkRunner } from '../benchmarks/framework/BenchmarkRunner.js';
import { CsvReporter, type ReportOutput } from '../benchmarks/framework/CsvReporter.js';
import type { Clock } from '../benchmarks/framework/Timer.js';
import type { BenchmarkEntry } from '../benchmarks/framework/types.js';
import { USAGE, loadConfig, parseArgs } from '../utils/config.js';
import { PacerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RunMainOptions {
  /** Program arguments, without node and script path */
  argv?: readonly string[];
  env?: NodeJS.ProcessEnv;
  /** Where the CSV report goes */
  output?: ReportOutput;
  clock?: Clock;
}

const log = logger.child('main');

/**
 * Parse arguments, run every benchmark and stream the report.
 * Returns the process exit code.
 */
export function runMain(
  benchmarks: BenchmarkRegistry | ReadonlyArray<BenchmarkEntry<unknown>>,
  options: RunMainOptions = {}
): number {
  const output = options.output ?? process.stdout;

  try {
    const { overrides, help } = parseArgs(options.argv ?? process.argv.slice(2));
    if (help) {
      output.write(`${USAGE}\n`);
      return 0;
    }

    const config = loadConfig(overrides, options.env ?? process.env);
    if (config.filter !== undefined) {
      log.info(`Filtering benchmarks by '${config.filter}'`);
    }

    const runner = new BenchmarkRunner({ ...config, clock: options.clock });
    const reporter = new CsvReporter(output);
    runner.run(benchmarks, reporter);
    reporter.finish();
    return 0;
  } catch (error) {
    if (error instanceof PacerError) {
      log.error(error.message);
    } else {
      log.error('Benchmark run failed:', error);
    }
    return 1;
  }
}
