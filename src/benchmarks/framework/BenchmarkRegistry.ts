import { ConfigurationError } from '../../utils/errors.js';
import type { Benchmark } from './Benchmark.js';
import type { BenchmarkEntry } from './types.js';

/**
 * Ordered collection of benchmark entries. Registration order is the
 * order the runner executes and reports them in.
 */
export class BenchmarkRegistry {
  private readonly registered: BenchmarkEntry<unknown>[] = [];

  /**
   * Register a built entry, or a builder which is built here
   */
  add<T>(benchmark: BenchmarkEntry<T> | Benchmark<T>): this {
    const entry = 'build' in benchmark ? benchmark.build() : benchmark;
    if (this.registered.some(existing => existing.name === entry.name)) {
      throw new ConfigurationError('an entry with this name is already registered', entry.name);
    }
    this.registered.push(entry);
    return this;
  }

  entries(): ReadonlyArray<BenchmarkEntry<unknown>> {
    return [...this.registered];
  }

  get size(): number {
    return this.registered.length;
  }

  static of(...entries: Array<BenchmarkEntry<unknown>>): BenchmarkRegistry {
    const registry = new BenchmarkRegistry();
    for (const entry of entries) {
      registry.add(entry);
    }
    return registry;
  }
}
