import pLimit, { type LimitFunction } from 'p-limit';

/**
 * Keyed mutual exclusion. Each key gets its own single-slot limiter, created
 * on first use and kept for the life of the registry. The key space is the
 * set of routes, so entries are never removed.
 */
export class KeyedLocks {
  private readonly limiters = new Map<string, LimitFunction>();

  get(key: string): LimitFunction {
    let limit = this.limiters.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.limiters.set(key, limit);
    }
    return limit;
  }

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.get(key)(fn);
  }

  get size(): number {
    return this.limiters.size;
  }
}
