import { Timer } from './Timer.js';

/**
 * Handle given to a benchmark body for one run: the input for this run
 * and the timer measuring it.
 *
 * @example
 * ```ts
 * function popAll(state: BenchmarkState<number>) {
 *   const n = state.getInput();
 *   state.pause();
 *   const list = Array.from({ length: n }, (_, i) => i);
 *   state.resume();
 *   while (list.length > 0) doNotOptimize(list.pop());
 * }
 * ```
 */
export class BenchmarkState<T> {
  constructor(
    private readonly value: T,
    readonly timer: Timer
  ) {}

  /**
   * The input for this run. Either the raw size, or a fresh copy of the
   * generated input that the body may mutate freely.
   */
  getInput(): T {
    return this.value;
  }

  get input(): T {
    return this.value;
  }

  /**
   * Stop the clock, e.g. around setup work that should not be measured
   */
  pause(): void {
    this.timer.pause();
  }

  resume(): void {
    this.timer.resume();
  }
}

let sink: unknown;

/**
 * Keep a value observable so the work producing it cannot be skipped
 */
export function doNotOptimize<T>(value: T): T {
  sink = value;
  return value;
}
