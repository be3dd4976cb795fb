/**
 * Benchmark Framework
 *
 * Timer, input ranges, builder, runner and CSV reporting.
 */

export * from './types.js';
export * from './Timer.js';
export * from './InputSequence.js';
export * from './BenchmarkState.js';
export * from './Benchmark.js';
export * from './BenchmarkRegistry.js';
export * from './filter.js';
export * from './BenchmarkRunner.js';
export * from './CsvReporter.js';
