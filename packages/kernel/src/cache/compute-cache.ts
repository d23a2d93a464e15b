/**
 * Keel Kernel — Compute Cache
 *
 * Key-addressed, single-flight memoization of fallible async computations.
 *
 * Cache invariants:
 * - For a given key, compute runs at most once for the cache's lifetime
 * - The key is claimed synchronously, before the first await, so concurrent
 *   callers in the same tick share one in-flight computation
 * - Every caller for a key observes the identical Result, success or failure
 * - Failures are sticky: a failed computation is replayed, never retried
 * - A computation that throws or rejects is converted to a
 *   CacheComputationError diagnostic; get() itself never rejects
 * - No eviction and no TTL
 */

import type { Result } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';

export interface ComputeCacheStats {
  /** Calls answered by an existing entry, in flight or settled. */
  readonly hits: number;
  /** Calls that started a computation. */
  readonly misses: number;
  readonly size: number;
}

export class ComputeCache<K, V> {
  private readonly entries = new Map<K, Promise<Result<V>>>();
  private hits = 0;
  private misses = 0;

  /**
   * Return the outcome cached for `key`, computing it on first request.
   *
   * @param key - Cache key (compared with SameValueZero, as Map keys)
   * @param compute - Producer run only if `key` has no entry yet
   */
  get(key: K, compute: () => Promise<Result<V>>): Promise<Result<V>> {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      this.hits += 1;
      return existing;
    }
    this.misses += 1;
    const pending = settle(key, compute);
    this.entries.set(key, pending);
    return pending;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  stats(): ComputeCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}

async function settle<K, V>(key: K, compute: () => Promise<Result<V>>): Promise<Result<V>> {
  try {
    return await compute();
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return failure(DiagnosticKind.CacheComputationError, `Computation for ${String(key)} failed: ${reason}`);
  }
}
