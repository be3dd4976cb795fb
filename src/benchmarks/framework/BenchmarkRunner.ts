/**
 * BenchmarkRunner - Orchestrates benchmark execution
 *
 * Runs entries in registration order, bodies in declaration order and
 * sizes ascending, one run at a time. Each (entry, body, size) triple
 * repeats until both the minimum run count and the minimum active time
 * are reached, then its floor mean is reported.
 */

import { validateRunConfig, type RunConfig } from '../../utils/config.js';
import { BodyFailureError, InputFailureError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { BenchmarkRegistry } from './BenchmarkRegistry.js';
import { BenchmarkState } from './BenchmarkState.js';
import { matchesFilter, qualifiedName } from './filter.js';
import { Timer, monotonicClock, type Clock } from './Timer.js';
import type {
  BenchmarkBody,
  BenchmarkEntry,
  ProgressCallback,
  ResultSink,
  RunResult,
} from './types.js';

/**
 * Configuration for the benchmark runner
 */
export interface BenchmarkRunnerConfig extends RunConfig {
  /** Time source, monotonic nanoseconds */
  clock?: Clock;
  /** Called after each result is reported */
  onProgress?: ProgressCallback;
}

interface PlannedEntry {
  entry: BenchmarkEntry<unknown>;
  sizes: number[];
}

export class BenchmarkRunner {
  private readonly config: RunConfig;
  private readonly clock: Clock;
  private readonly onProgress?: ProgressCallback;
  private log = logger.child('benchmark-runner');

  constructor(config: BenchmarkRunnerConfig) {
    const { clock, onProgress, ...runConfig } = config;
    this.config = validateRunConfig(runConfig);
    this.clock = clock ?? monotonicClock;
    this.onProgress = onProgress;
  }

  /**
   * Run every entry, streaming each result to `sink` as it completes.
   *
   * All ranges are expanded first, so a bad range fails the invocation
   * before any body executes. A body failure aborts the invocation;
   * results already sent to the sink stay reported.
   */
  run(
    benchmarks: BenchmarkRegistry | ReadonlyArray<BenchmarkEntry<unknown>>,
    sink?: ResultSink
  ): RunResult[] {
    const entries = benchmarks instanceof BenchmarkRegistry ? benchmarks.entries() : benchmarks;
    const plan: PlannedEntry[] = entries.map(entry => ({
      entry,
      sizes: entry.inputs.toArray(),
    }));

    const results: RunResult[] = [];
    for (const { entry, sizes } of plan) {
      this.runPlanned(entry, sizes, result => {
        results.push(result);
        sink?.report(result);
        this.onProgress?.(result, results.length);
      });
    }

    this.log.info(`Completed ${results.length} benchmark(s)`);
    return results;
  }

  /**
   * Run a single entry
   */
  runEntry<T>(entry: BenchmarkEntry<T>, sink?: ResultSink): RunResult[] {
    return this.run([entry], sink);
  }

  private runPlanned<T>(
    entry: BenchmarkEntry<T>,
    sizes: number[],
    emit: (result: RunResult) => void
  ): void {
    if (sizes.length === 0) {
      this.log.warn(`Benchmark '${entry.name}' has an empty input range, nothing to run`);
      return;
    }

    this.log.info(
      `Running ${entry.name}: ${entry.bodies.length} bench(es) x ${sizes.length} size(s)`
    );

    // Generated once per size, on first use, and shared by all bodies
    const templates = new Map<number, { input: T }>();
    const templateFor = (size: number, name: string): T => {
      let cached = templates.get(size);
      if (!cached) {
        try {
          cached = { input: entry.inputs.materialize(size) };
        } catch (error) {
          throw new InputFailureError(name, 'generate', error);
        }
        templates.set(size, cached);
      }
      return cached.input;
    };

    for (const body of entry.bodies) {
      for (const size of sizes) {
        const name = qualifiedName(entry.name, body.name, size);
        if (!matchesFilter(name, this.config.filter)) {
          this.log.debug(`Skipping ${name}`);
          continue;
        }
        emit(this.measure(entry, body, size, templateFor(size, name)));
      }
    }
  }

  /**
   * Repeat one body at one size until the stopping criterion holds
   */
  measure<T>(entry: BenchmarkEntry<T>, body: BenchmarkBody<T>, size: number, template: T): RunResult {
    const name = qualifiedName(entry.name, body.name, size);
    const { minRuns, minDurationNs } = this.config;

    let runs = 0;
    let totalNs = 0n;
    while (runs < minRuns || totalNs < minDurationNs) {
      let input: T;
      try {
        input = entry.clone(template);
      } catch (error) {
        throw new InputFailureError(name, 'clone', error);
      }
      const timer = new Timer(this.clock);
      const state = new BenchmarkState(input, timer);

      timer.start();
      try {
        body.run(state);
      } catch (error) {
        throw new BodyFailureError(name, runs, error);
      }
      totalNs += timer.elapsed();
      runs++;
    }

    const meanNs = totalNs / BigInt(runs);
    this.log.debug(`${name}: ${meanNs}ns mean over ${runs} run(s)`);

    return {
      qualifiedName: name,
      entryName: entry.name,
      bodyName: body.name,
      size,
      meanNs,
      totalNs,
      runs,
    };
  }
}
