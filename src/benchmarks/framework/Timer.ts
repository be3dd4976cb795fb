/**
 * Timer - pausable stopwatch measuring active time in nanoseconds
 */

/**
 * Monotonic time source in nanoseconds
 */
export type Clock = () => bigint;

export const monotonicClock: Clock = () => process.hrtime.bigint();

export class Timer {
  private accumulated = 0n;
  private lastResume = 0n;
  private running = false;

  constructor(private readonly clock: Clock = monotonicClock) {}

  /**
   * Reset the accumulator and start measuring
   */
  start(): void {
    this.accumulated = 0n;
    this.running = true;
    this.lastResume = this.clock();
  }

  /**
   * Stop measuring, keeping what has accumulated so far. No-op when paused.
   */
  pause(): void {
    const now = this.clock();
    if (!this.running) {
      return;
    }
    this.accumulated += now - this.lastResume;
    this.running = false;
  }

  /**
   * Start measuring again after a pause. No-op when running.
   */
  resume(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.lastResume = this.clock();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Active time so far, including the open interval when running
   */
  elapsed(): bigint {
    if (!this.running) {
      return this.accumulated;
    }
    return this.accumulated + (this.clock() - this.lastResume);
  }
}
