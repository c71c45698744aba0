/**
 * In-memory LRU cache with TTL expiration.
 *
 * Values are stored by reference; callers hand in immutable row sets.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface CacheEntry<T> {
  value: T;
  /** ms since epoch */
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Default: 1000 */
  maxEntries?: number;
  /** Default: 3600000 (1 hour) */
  defaultTtlMs?: number;
  /** Time source, in ms since epoch. Default: Date.now */
  now?: () => number;
}

export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = options.maxEntries ?? 1000;
  const defaultTtlMs = options.defaultTtlMs ?? 3600000;
  const now = options.now ?? Date.now;

  // Map iteration follows insertion order, so the first key is the least recently used
  const store = new Map<string, CacheEntry<T>>();

  let hits = 0;
  let misses = 0;
  let evictions = 0;

  const readLive = (key: string): CacheEntry<T> | undefined => {
    const entry = store.get(key);
    if (entry === undefined) return undefined;

    if (now() >= entry.expiresAt) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
      evictions++;
    }
  };

  return {
    get(key: string) {
      const entry = readLive(key);
      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      store.delete(key);
      store.set(key, entry);
      hits++;
      return Promise.resolve(ok(entry.value));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      store.set(key, { value, expiresAt: now() + ttlMs });
      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      return Promise.resolve(ok(store.delete(key)));
    },

    clearByPrefix(prefix: string) {
      let count = 0;
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          count++;
        }
      }
      return Promise.resolve(ok(count));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, evictions, size: store.size });
    },
  };
};
