/**
 * Benchmark - builder for a benchmark entry
 *
 * @example
 * ```ts
 * const entry = Benchmark.withName('gen_bench')
 *   .withRange(1 << 10, 1 << 20, 4)
 *   .withGenerator(n => Array.from({ length: n }, (_, i) => i))
 *   .withBench('pop', state => {
 *     const list = state.getInput();
 *     while (list.length > 0) doNotOptimize(list.pop());
 *   })
 *   .build();
 * ```
 */

import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { BenchmarkState } from './BenchmarkState.js';
import { DEFAULT_RANGE, InputSequence } from './InputSequence.js';
import type { BenchmarkBody, BenchmarkEntry, InputRange } from './types.js';

export type BenchFunction<T> = (state: BenchmarkState<T>) => void;

export type CloneFunction<T> = (input: T) => T;

const FORBIDDEN_NAME_CHARS = /[,\r\n]/;

const log = logger.child('benchmark');

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function checkName(name: string, what: string, entryName?: string): void {
  if (name.length === 0) {
    throw new ConfigurationError(`${what} must not be empty`, entryName);
  }
  if (FORBIDDEN_NAME_CHARS.test(name)) {
    throw new ConfigurationError(
      `${what} '${name}' must not contain commas or line breaks`,
      entryName
    );
  }
}

export class Benchmark<T> {
  private constructor(
    private readonly name: string,
    private readonly range: InputRange,
    private readonly generator: (size: number) => T,
    private readonly cloneInput: CloneFunction<T>,
    private readonly benches: ReadonlyArray<{ name: string; fn: BenchFunction<T> }>
  ) {}

  /**
   * Start a benchmark whose input is the raw size.
   * Range defaults to 1..2^20 doubling.
   */
  static withName(name: string): Benchmark<number> {
    return new Benchmark<number>(name, { ...DEFAULT_RANGE }, size => size, size => size, []);
  }

  withLowerBound(lowerBound: number): Benchmark<T> {
    return this.copy({ range: { ...this.range, lowerBound } });
  }

  withUpperBound(upperBound: number): Benchmark<T> {
    return this.copy({ range: { ...this.range, upperBound } });
  }

  withMultiplier(multiplier: number): Benchmark<T> {
    return this.copy({ range: { ...this.range, multiplier } });
  }

  withRange(lowerBound: number, upperBound: number, multiplier: number): Benchmark<T> {
    return this.copy({ range: { lowerBound, upperBound, multiplier } });
  }

  /**
   * Transform each input through `generator`. Composes with any earlier
   * generator. Must come before any withBench call, since it changes the
   * input type.
   *
   * The generator runs once per size; each run gets `clone` of its output
   * (structuredClone unless given).
   *
   * structuredClone copies plain data only: class instances come back as
   * plain objects without their methods, and functions cannot be copied.
   * Pass a `clone` for such inputs, e.g. `map => new Map(map)`.
   */
  withGenerator<U>(
    generator: (input: T) => U,
    clone: CloneFunction<U> = value => structuredClone(value)
  ): Benchmark<U> {
    if (this.benches.length > 0) {
      throw new ConfigurationError(
        'withGenerator must be called before withBench, the input type changes',
        this.name
      );
    }
    const previous = this.generator;
    return new Benchmark<U>(
      this.name,
      this.range,
      size => generator(previous(size)),
      clone,
      []
    );
  }

  withBench(name: string, fn: BenchFunction<T>): Benchmark<T> {
    return this.copy({ benches: [...this.benches, { name, fn }] });
  }

  /**
   * Validate and freeze into an entry the runner can execute
   */
  build(): BenchmarkEntry<T> {
    checkName(this.name, 'Benchmark name');
    if (this.benches.length === 0) {
      throw new ConfigurationError('at least one bench is required', this.name);
    }

    const seen = new Set<string>();
    for (const bench of this.benches) {
      checkName(bench.name, 'Bench name', this.name);
      if (seen.has(bench.name)) {
        throw new ConfigurationError(`duplicate bench name '${bench.name}'`, this.name);
      }
      seen.add(bench.name);
    }

    const inputs = new InputSequence<T>(this.range, this.generator, this.name);
    const bodies: ReadonlyArray<BenchmarkBody<T>> = Object.freeze(
      this.benches.map(({ name, fn }) => toBody(name, fn))
    );
    const cloneInput = this.cloneInput;

    return Object.freeze({
      name: this.name,
      inputs,
      bodies,
      clone(input: T): T {
        return cloneInput(input);
      },
    });
  }

  private copy(
    changes: Partial<{
      range: InputRange;
      benches: ReadonlyArray<{ name: string; fn: BenchFunction<T> }>;
    }>
  ): Benchmark<T> {
    return new Benchmark<T>(
      this.name,
      changes.range ?? this.range,
      this.generator,
      this.cloneInput,
      changes.benches ?? this.benches
    );
  }
}

function toBody<T>(name: string, fn: BenchFunction<T>): BenchmarkBody<T> {
  return {
    name,
    run(state: BenchmarkState<T>): void {
      const returned: unknown = fn(state);
      if (isPromiseLike(returned)) {
        void Promise.resolve(returned).catch((error: unknown) => {
          log.error(`Bench '${name}' rejected after returning: ${String(error)}`);
        });
        throw new TypeError(`Bench '${name}' returned a promise; bench functions must be synchronous`);
      }
    },
  };
}
