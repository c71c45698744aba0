/**
 * Wraps a cache adapter so that failures are logged and read as misses.
 */

import type { CachePort, CacheSetOptions, CacheStats, SilentCachePort } from '../ports.js';
import type { Logger } from 'pino';

export interface SilentCacheOptions {
  /** Parent logger; cache warnings go to a `cache` child */
  logger: Logger;
}

/**
 * Create a silent cache wrapper.
 * Get failures read as misses, failed writes are only logged.
 */
export const createSilentCache = <T>(
  cache: CachePort<T>,
  options: SilentCacheOptions
): SilentCachePort<T> => {
  const log = options.logger.child({ component: 'cache' });

  return {
    async get(key: string): Promise<T | undefined> {
      const result = await cache.get(key);
      if (result.isErr()) {
        log.warn({ err: result.error, key }, `[Cache] Get failed: ${result.error.message}`);
        return undefined;
      }
      return result.value;
    },

    async set(key: string, value: T, setOptions?: CacheSetOptions): Promise<void> {
      const result = await cache.set(key, value, setOptions);
      if (result.isErr()) {
        log.warn({ err: result.error, key }, `[Cache] Set failed: ${result.error.message}`);
      }
    },

    async delete(key: string): Promise<boolean> {
      const result = await cache.delete(key);
      if (result.isErr()) {
        log.warn({ err: result.error, key }, `[Cache] Delete failed: ${result.error.message}`);
        return false;
      }
      return result.value;
    },

    async clearByPrefix(prefix: string): Promise<number> {
      const result = await cache.clearByPrefix(prefix);
      if (result.isErr()) {
        log.warn(
          { err: result.error, prefix },
          `[Cache] ClearByPrefix failed: ${result.error.message}`
        );
        return 0;
      }
      log.debug({ prefix, removed: result.value }, '[Cache] Namespace cleared');
      return result.value;
    },

    async stats(): Promise<CacheStats> {
      return cache.stats();
    },
  };
};
