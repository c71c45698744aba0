/**
 * Cache adapter for CACHE_BACKEND=disabled: every read misses, writes are dropped.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheStats } from '../ports.js';

export const createNoopCache = <T>(): CachePort<T> => {
  let misses = 0;

  return {
    get(_key: string) {
      misses++;
      return Promise.resolve(ok(undefined));
    },

    set(_key: string, _value: T) {
      return Promise.resolve(ok(undefined));
    },

    delete(_key: string) {
      return Promise.resolve(ok(false));
    },

    clearByPrefix(_prefix: string) {
      return Promise.resolve(ok(0));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits: 0, misses, evictions: 0, size: 0 });
    },
  };
};
