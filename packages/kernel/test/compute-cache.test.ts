/**
 * Keel Kernel — Compute Cache Tests
 *
 *   CACHE-U1: N concurrent gets run the computation exactly once
 *   CACHE-U2: failures are shared and sticky
 *   CACHE-U3: a throwing computation becomes CacheComputationError
 *   CACHE-U4: distinct keys compute independently; stats count hits and misses
 */

import { describe, it, expect } from 'vitest';
import type { Result } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';
import { ComputeCache } from '../src/cache/compute-cache.js';

/** Resolves on a later macrotask so that all callers queue up first. */
function later<T>(value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), 5));
}

describe('CACHE-U1: single flight', () => {
  it('N concurrent callers cause one computation and see one outcome', async () => {
    const cache = new ComputeCache<string, number>();
    let counter = 0;
    const compute = async (): Promise<Result<number>> => {
      counter += 1;
      return later({ ok: true, value: counter });
    };

    const results = await Promise.all(Array.from({ length: 25 }, () => cache.get('/site.pp', compute)));

    expect(counter).toBe(1);
    expect(new Set(results).size).toBe(1);
    expect(results[0]).toEqual({ ok: true, value: 1 });
  });

  it('returns the identical promise while in flight', () => {
    const cache = new ComputeCache<string, number>();
    const compute = (): Promise<Result<number>> => later({ ok: true, value: 1 });
    expect(cache.get('k', compute)).toBe(cache.get('k', compute));
  });
});

describe('CACHE-U2: sticky failures', () => {
  it('replays a failure without recomputing', async () => {
    const cache = new ComputeCache<string, number>();
    let counter = 0;
    const compute = async (): Promise<Result<number>> => {
      counter += 1;
      return failure(DiagnosticKind.ParseError, 'bad syntax');
    };

    const concurrent = await Promise.all([cache.get('k', compute), cache.get('k', compute)]);
    const afterwards = await cache.get('k', compute);

    expect(counter).toBe(1);
    expect(concurrent[0]).toBe(concurrent[1]);
    expect(afterwards).toBe(concurrent[0]);
    expect(afterwards).toEqual({ ok: false, error: { kind: DiagnosticKind.ParseError, message: 'bad syntax' } });
  });
});

describe('CACHE-U3: thrown computations', () => {
  it('converts a rejection into a diagnostic shared by all callers', async () => {
    const cache = new ComputeCache<string, number>();
    let counter = 0;
    const compute = async (): Promise<Result<number>> => {
      counter += 1;
      await later(undefined);
      throw new Error('disk on fire');
    };

    const results = await Promise.all([cache.get('/a.pp', compute), cache.get('/a.pp', compute)]);

    expect(counter).toBe(1);
    expect(results[0]).toBe(results[1]);
    expect(results[0]).toEqual({
      ok: false,
      error: {
        kind: DiagnosticKind.CacheComputationError,
        message: 'Computation for /a.pp failed: disk on fire',
      },
    });
  });

  it('converts a synchronous throw as well', async () => {
    const cache = new ComputeCache<string, number>();
    const result = await cache.get('k', () => {
      throw new Error('boom');
    });
    expect(result.ok ? 'ok' : result.error.kind).toBe(DiagnosticKind.CacheComputationError);
  });
});

describe('CACHE-U4: keys and stats', () => {
  it('computes each key once and counts hits and misses', async () => {
    const cache = new ComputeCache<string, string>();
    const calls: string[] = [];
    const computeFor = (key: string) => async (): Promise<Result<string>> => {
      calls.push(key);
      return { ok: true, value: key.toUpperCase() };
    };

    await cache.get('a', computeFor('a'));
    await cache.get('b', computeFor('b'));
    const again = await cache.get('a', computeFor('a'));

    expect(calls).toEqual(['a', 'b']);
    expect(again).toEqual({ ok: true, value: 'A' });
    expect(cache.has('a')).toBe(true);
    expect(cache.has('c')).toBe(false);
    expect(cache.stats()).toEqual({ hits: 1, misses: 2, size: 2 });
  });
});
