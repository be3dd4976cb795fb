/**
 * InputSequence - geometric range of input sizes plus the input state for each
 *
 * Sizes run `lower, lower*m, lower*m^2, ...` for every value <= upper.
 * Without a generator the input is the size itself.
 */

import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors.js';
import type { InputRange } from './types.js';

const boundSchema = z
  .number()
  .int('must be an integer')
  .nonnegative('must not be negative')
  .max(Number.MAX_SAFE_INTEGER, 'overflows the safe integer range');

export const InputRangeSchema = z.object({
  lowerBound: boundSchema.min(1, 'must be at least 1'),
  upperBound: boundSchema,
  multiplier: boundSchema.min(2, 'must be greater than 1'),
});

export const DEFAULT_RANGE: Readonly<InputRange> = Object.freeze({
  lowerBound: 1,
  upperBound: 1 << 20,
  multiplier: 2,
});

/**
 * Throw a ConfigurationError naming the entry when a range is unusable
 */
export function validateRange(range: InputRange, entryName?: string): void {
  const parsed = InputRangeSchema.safeParse(range);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid input range (${issues})`, entryName, { range });
  }
}

/**
 * One step of the range, or null once the next value passes the upper bound.
 * Bounds are validated as safe integers, so a step that stays <= upper
 * cannot leave the domain.
 */
function nextSize(current: number, range: InputRange): number | null {
  const next = current * range.multiplier;
  return next > range.upperBound ? null : next;
}

export interface SizedInput<T> {
  size: number;
  input: T;
}

export class InputSequence<T> {
  private readonly range: InputRange;

  constructor(
    range: InputRange,
    private readonly generator: (size: number) => T,
    private readonly entryName?: string
  ) {
    validateRange(range, entryName);
    this.range = { ...range };
  }

  /**
   * Sequence over the raw sizes themselves
   */
  static ofSizes(range: InputRange, entryName?: string): InputSequence<number> {
    return new InputSequence(range, size => size, entryName);
  }

  get bounds(): Readonly<InputRange> {
    return this.range;
  }

  /**
   * Lazy, restartable iteration over the sizes in ascending order
   */
  *sizes(): Generator<number, void, undefined> {
    if (this.range.lowerBound > this.range.upperBound) {
      return;
    }
    let size: number | null = this.range.lowerBound;
    while (size !== null) {
      yield size;
      size = nextSize(size, this.range);
    }
  }

  /**
   * Every size, eagerly
   */
  toArray(): number[] {
    return Array.from(this.sizes());
  }

  /**
   * Input state for one size
   */
  materialize(size: number): T {
    return this.generator(size);
  }

  /**
   * Lazy, restartable `(size, input)` pairs; the generator runs once per size
   */
  *expand(): Generator<SizedInput<T>, void, undefined> {
    for (const size of this.sizes()) {
      yield { size, input: this.materialize(size) };
    }
  }

  /**
   * Feed this sequence's inputs through another generator
   */
  map<U>(generator: (input: T) => U): InputSequence<U> {
    const inner = this.generator;
    return new InputSequence<U>(this.range, size => generator(inner(size)), this.entryName);
  }

  [Symbol.iterator](): Iterator<SizedInput<T>> {
    return this.expand();
  }
}
