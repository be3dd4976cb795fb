/**
 * Tests for BenchmarkRunner
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BenchmarkRunner } from './BenchmarkRunner.js';
import { Benchmark } from './Benchmark.js';
import { BenchmarkRegistry } from './BenchmarkRegistry.js';
import { InputSequence } from './InputSequence.js';
import type { BenchmarkEntry, ResultSink, RunResult } from './types.js';
import { BodyFailureError, ConfigurationError, InputFailureError } from '../../utils/errors.js';

/**
 * Clock that only moves when a test body says so
 */
class ManualClock {
  now = 0n;
  readonly read = (): bigint => this.now;

  advance(ns: number): void {
    this.now += BigInt(ns);
  }
}

class CollectingSink implements ResultSink {
  readonly results: RunResult[] = [];

  report(result: RunResult): void {
    this.results.push(result);
  }
}

describe('BenchmarkRunner', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  const runner = (minRuns: number, minDurationNs: bigint, filter?: string) =>
    new BenchmarkRunner({ minRuns, minDurationNs, filter, clock: clock.read });

  describe('stopping criterion', () => {
    it('should floor the mean of all runs', () => {
      const costs = [100, 100, 101];
      let call = 0;
      const entry = Benchmark.withName('mean')
        .withRange(1, 1, 2)
        .withBench('f', () => clock.advance(costs[call++]))
        .build();

      const [result] = runner(3, 0n).runEntry(entry);

      expect(result.runs).toBe(3);
      expect(result.totalNs).toBe(301n);
      expect(result.meanNs).toBe(100n);
    });

    it('should keep running a fast body until the minimum run count', () => {
      const body = vi.fn(() => clock.advance(1));
      const entry = Benchmark.withName('fast').withRange(1, 1, 2).withBench('f', body).build();

      const [result] = runner(8, 0n).runEntry(entry);

      expect(body).toHaveBeenCalledTimes(8);
      expect(result.runs).toBe(8);
      expect(result.totalNs).toBe(8n);
      expect(result.meanNs).toBe(1n);
    });

    it('should keep running a slow body until the minimum duration', () => {
      const entry = Benchmark.withName('slow')
        .withRange(1, 1, 2)
        .withBench('f', () => clock.advance(300))
        .build();

      const [result] = runner(1, 1000n).runEntry(entry);

      expect(result.runs).toBe(4);
      expect(result.totalNs).toBe(1200n);
      expect(result.meanNs).toBe(300n);
    });

    it('should satisfy both thresholds at termination', () => {
      const settings: Array<[number, bigint, number]> = [
        [1, 0n, 5],
        [8, 10n, 5],
        [2, 999n, 100],
        [5, 1000n, 7],
        [3, 50n, 0],
      ];

      for (const [minRuns, minDurationNs, cost] of settings) {
        const entry = Benchmark.withName('both')
          .withRange(1, 1, 2)
          .withBench('f', () => clock.advance(cost))
          .build();
        const [result] = runner(minRuns, cost === 0 ? 0n : minDurationNs).runEntry(entry);

        expect(result.runs).toBeGreaterThanOrEqual(minRuns);
        expect(result.totalNs).toBeGreaterThanOrEqual(cost === 0 ? 0n : minDurationNs);
        expect(result.meanNs).toBe(result.totalNs / BigInt(result.runs));
      }
    });
  });

  describe('measurement', () => {
    it('should exclude paused time', () => {
      const entry = Benchmark.withName('paused')
        .withRange(1, 1, 2)
        .withBench('f', state => {
          clock.advance(50);
          state.pause();
          clock.advance(1000);
          state.resume();
          clock.advance(25);
        })
        .build();

      const [result] = runner(2, 0n).runEntry(entry);

      expect(result.meanNs).toBe(75n);
    });

    it('should exclude time spent cloning the input', () => {
      const entry = Benchmark.withName('cloned')
        .withRange(4, 4, 2)
        .withGenerator(
          n => new Array<number>(n).fill(0),
          list => {
            clock.advance(500);
            return [...list];
          }
        )
        .withBench('f', () => clock.advance(40))
        .build();

      const [result] = runner(3, 0n).runEntry(entry);

      expect(result.totalNs).toBe(120n);
      expect(result.meanNs).toBe(40n);
    });

    it('should hand every run its own copy of the input', () => {
      const lengths: number[] = [];
      const entry = Benchmark.withName('isolated')
        .withRange(3, 3, 2)
        .withGenerator(n => Array.from({ length: n }, (_, i) => i))
        .withBench('push', state => {
          const list = state.getInput();
          list.push(99);
          lengths.push(list.length);
        })
        .build();

      runner(4, 0n).runEntry(entry);

      expect(lengths).toEqual([4, 4, 4, 4]);
    });

    it('should generate input once per size and clone it once per run', () => {
      const generator = vi.fn((n: number) => [n]);
      const clone = vi.fn((list: number[]) => [...list]);
      const entry = Benchmark.withName('gen')
        .withRange(1, 2, 2)
        .withGenerator(generator, clone)
        .withBench('a', () => clock.advance(1))
        .withBench('b', () => clock.advance(1))
        .build();

      runner(3, 0n).runEntry(entry);

      expect(generator.mock.calls.map(call => call[0])).toEqual([1, 2]);
      expect(clone).toHaveBeenCalledTimes(12);
    });
  });

  describe('ordering', () => {
    it('should run entries, then bodies, then ascending sizes', () => {
      const registry = new BenchmarkRegistry()
        .add(
          Benchmark.withName('first')
            .withRange(1, 4, 2)
            .withBench('x', () => clock.advance(1))
            .withBench('y', () => clock.advance(2))
        )
        .add(Benchmark.withName('second').withRange(10, 10, 2).withBench('z', () => clock.advance(3)));
      const sink = new CollectingSink();

      const results = runner(1, 0n).run(registry, sink);

      const expected = [
        'first/x/1',
        'first/x/2',
        'first/x/4',
        'first/y/1',
        'first/y/2',
        'first/y/4',
        'second/z/10',
      ];
      expect(results.map(r => r.qualifiedName)).toEqual(expected);
      expect(sink.results.map(r => r.qualifiedName)).toEqual(expected);
      expect(results[6]).toEqual({
        qualifiedName: 'second/z/10',
        entryName: 'second',
        bodyName: 'z',
        size: 10,
        meanNs: 3n,
        totalNs: 3n,
        runs: 1,
      });
    });

    it('should report progress after each result', () => {
      const onProgress = vi.fn();
      const entry = Benchmark.withName('progress').withRange(1, 2, 2).withBench('f', () => {}).build();
      const progressRunner = new BenchmarkRunner({
        minRuns: 1,
        minDurationNs: 0n,
        clock: clock.read,
        onProgress,
      });

      progressRunner.runEntry(entry);

      expect(onProgress).toHaveBeenCalledTimes(2);
      expect(onProgress.mock.calls.map(call => call[1])).toEqual([1, 2]);
    });

    it('should skip entries with an empty range', () => {
      const body = vi.fn();
      const entry = Benchmark.withName('empty').withRange(8, 4, 2).withBench('f', body).build();

      expect(runner(1, 0n).runEntry(entry)).toEqual([]);
      expect(body).not.toHaveBeenCalled();
    });
  });

  describe('filter', () => {
    it('should only run and report matching triples', () => {
      const gen = vi.fn(() => clock.advance(1));
      const range = vi.fn(() => clock.advance(1));
      const entry = Benchmark.withName('a')
        .withRange(1, 1, 2)
        .withBench('gen', gen)
        .withBench('range', range)
        .build();
      const sink = new CollectingSink();

      const results = runner(2, 0n, 'gen').run([entry], sink);

      expect(results.map(r => r.qualifiedName)).toEqual(['a/gen/1']);
      expect(sink.results).toHaveLength(1);
      expect(gen).toHaveBeenCalledTimes(2);
      expect(range).not.toHaveBeenCalled();
    });

    it('should not generate input for sizes where every body is filtered out', () => {
      const generator = vi.fn((n: number) => [n]);
      const clone = vi.fn((list: number[]) => [...list]);
      const entry = Benchmark.withName('lazy')
        .withRange(1, 2, 2)
        .withGenerator(generator, clone)
        .withBench('f', () => {})
        .build();

      const results = runner(1, 0n, 'lazy/f/2').runEntry(entry);

      expect(results.map(r => r.qualifiedName)).toEqual(['lazy/f/2']);
      expect(generator.mock.calls.map(call => call[0])).toEqual([2]);
      expect(clone).toHaveBeenCalledTimes(1);
    });

    it('should be case-sensitive', () => {
      const entry = Benchmark.withName('Case').withRange(1, 1, 2).withBench('f', () => {}).build();

      expect(runner(1, 0n, 'case').runEntry(entry)).toEqual([]);
    });
  });

  describe('errors', () => {
    it('should wrap a failing body and stop the invocation', () => {
      let runs = 0;
      const later = vi.fn();
      const registry = new BenchmarkRegistry()
        .add(Benchmark.withName('ok').withRange(1, 1, 2).withBench('f', () => clock.advance(5)))
        .add(
          Benchmark.withName('boom')
            .withRange(1, 1, 2)
            .withBench('f', () => {
              clock.advance(5);
              if (++runs === 3) throw new Error('exploded');
            })
        )
        .add(Benchmark.withName('never').withRange(1, 1, 2).withBench('f', later));
      const sink = new CollectingSink();

      let caught: unknown;
      try {
        runner(4, 0n).run(registry, sink);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(BodyFailureError);
      expect(caught).toMatchObject({
        message: 'Benchmark boom/f/1 failed on run 3: exploded',
        qualifiedName: 'boom/f/1',
        runIndex: 2,
        cause: new Error('exploded'),
      });
      expect(sink.results.map(r => r.qualifiedName)).toEqual(['ok/f/1']);
      expect(later).not.toHaveBeenCalled();
    });

    it('should name the benchmark when its generator throws', () => {
      const body = vi.fn();
      const entry = Benchmark.withName('gen')
        .withRange(1, 2, 2)
        .withGenerator(n => {
          if (n === 2) throw new Error('gen boom');
          return [n];
        })
        .withBench('f', body)
        .build();
      const sink = new CollectingSink();

      expect(() => runner(1, 0n).run([entry], sink)).toThrow(
        'Benchmark gen/f/2 could not generate its input: gen boom'
      );
      expect(sink.results.map(r => r.qualifiedName)).toEqual(['gen/f/1']);
      expect(body).toHaveBeenCalledTimes(1);
    });

    it('should name the benchmark when its clone function throws', () => {
      const body = vi.fn();
      const entry = Benchmark.withName('copy')
        .withRange(4, 4, 2)
        .withGenerator(
          n => [n],
          () => {
            throw new Error('clone boom');
          }
        )
        .withBench('f', body)
        .build();

      let caught: unknown;
      try {
        runner(1, 0n).runEntry(entry);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InputFailureError);
      expect(caught).toMatchObject({
        message: 'Benchmark copy/f/4 could not copy its input: clone boom',
        qualifiedName: 'copy/f/4',
        stage: 'clone',
        code: 'INPUT_FAILURE',
      });
      expect(body).not.toHaveBeenCalled();
    });

    it('should fail on a bad range before any body executes', () => {
      class BrokenSequence extends InputSequence<number> {
        override toArray(): number[] {
          throw new ConfigurationError('range exploded', 'broken');
        }
      }
      const body = vi.fn();
      const good = Benchmark.withName('good').withRange(1, 1, 2).withBench('f', body).build();
      const broken: BenchmarkEntry<number> = {
        name: 'broken',
        inputs: new BrokenSequence({ lowerBound: 1, upperBound: 1, multiplier: 2 }, n => n),
        bodies: [{ name: 'f', run: () => {} }],
        clone(input: number): number {
          return input;
        },
      };

      expect(() => runner(1, 0n).run([good, broken])).toThrow("Benchmark 'broken': range exploded");
      expect(body).not.toHaveBeenCalled();
    });

    it('should reject settings that could never stop or report', () => {
      expect(() => new BenchmarkRunner({ minRuns: 0, minDurationNs: 0n })).toThrow(ConfigurationError);
      expect(() => new BenchmarkRunner({ minRuns: 1, minDurationNs: -1n })).toThrow(
        /Invalid run configuration/
      );
    });
  });

  it('should measure real bodies with the monotonic clock', () => {
    const entry = Benchmark.withName('real')
      .withRange(16, 16, 2)
      .withBench('sum', state => {
        let total = 0;
        for (let i = 0; i < state.getInput(); i++) total += i;
        if (total < 0) throw new Error('unreachable');
      })
      .build();

    const [result] = new BenchmarkRunner({ minRuns: 2, minDurationNs: 0n }).runEntry(entry);

    expect(result.runs).toBeGreaterThanOrEqual(2);
    expect(result.meanNs).toBeGreaterThanOrEqual(0n);
  });
});
