/**
 * Benchmark Framework Types
 */

import type { BenchmarkState } from './BenchmarkState.js';
import type { InputSequence } from './InputSequence.js';

/**
 * Geometric range of input sizes
 */
export interface InputRange {
  /** First size, always included when <= upperBound */
  lowerBound: number;
  /** Largest size allowed */
  upperBound: number;
  /** Factor between consecutive sizes (> 1) */
  multiplier: number;
}

/**
 * A single function under measurement
 */
export interface BenchmarkBody<T> {
  readonly name: string;
  run(state: BenchmarkState<T>): void;
}

/**
 * A named group of bodies sharing one input sequence.
 * Immutable once built.
 */
export interface BenchmarkEntry<T> {
  readonly name: string;
  readonly inputs: InputSequence<T>;
  readonly bodies: ReadonlyArray<BenchmarkBody<T>>;
  /**
   * Independent copy of a generated input, safe to mutate in one run
   * without affecting the next
   */
  clone(input: T): T;
}

/**
 * Mean time for one (entry, body, size) triple
 */
export interface RunResult {
  /** `entry/body/size` */
  qualifiedName: string;
  entryName: string;
  bodyName: string;
  size: number;
  /** Floor of totalNs / runs */
  meanNs: bigint;
  /** Active time summed over all runs */
  totalNs: bigint;
  runs: number;
}

/**
 * Receives results as soon as each triple completes
 */
export interface ResultSink {
  report(result: RunResult): void;
}

/**
 * Progress callback for benchmark execution
 */
export type ProgressCallback = (result: RunResult, completed: number) => void;
