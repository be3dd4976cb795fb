/**
 * Array benchmarks
 *
 * Compares popping every element of an array built inside the run (with
 * the build excluded through pause/resume) against one built by a
 * generator and copied for each run.
 *
 * Usage:
 *   npm run bench -- --min-duration 0.5 | npm run transpose
 */

import { Benchmark, BenchmarkRegistry, doNotOptimize, runMain, type BenchmarkState } from '../src/index.js';

function makeArray(n: number): number[] {
  const list: number[] = [];
  for (let i = 0; i < n; i++) {
    list.push(i);
  }
  return list;
}

function makeRandomArray(n: number): number[] {
  const list: number[] = [];
  for (let i = 0; i < n; i++) {
    list.push(Math.floor(Math.random() * Number.MAX_SAFE_INTEGER));
  }
  return list;
}

function popRange(state: BenchmarkState<number>): void {
  const n = state.getInput();
  state.pause();
  const list = makeArray(n);
  state.resume();
  for (let i = 0; i < n; i++) {
    doNotOptimize(list.pop());
  }
}

function popGenerated(state: BenchmarkState<number[]>): void {
  const list = state.getInput();
  const n = list.length;
  for (let i = 0; i < n; i++) {
    doNotOptimize(list.pop());
  }
}

function iterateGenerated(state: BenchmarkState<number[]>): void {
  const list = state.getInput();
  for (let i = 0; i < list.length; i++) {
    doNotOptimize(list[i]);
  }
}

const registry = new BenchmarkRegistry()
  .add(Benchmark.withName('range_bench').withRange(1 << 10, 1 << 20, 4).withBench('pop', popRange))
  .add(
    Benchmark.withName('gen_bench')
      .withRange(1 << 10, 1 << 20, 4)
      .withGenerator(makeArray, list => list.slice())
      .withBench('pop', popGenerated)
  )
  .add(
    Benchmark.withName('random')
      .withRange(1 << 10, 1 << 20, 4)
      .withGenerator(makeRandomArray, list => list.slice())
      .withBench('iterate', iterateGenerated)
      .withBench('pop', popGenerated)
  );

process.exitCode = runMain(registry);
