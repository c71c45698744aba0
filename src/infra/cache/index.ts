/**
 * Query-result cache.
 *
 * @example
 * ```typescript
 * const { cache, keyBuilder } = initCache({ config: createCacheConfig(config), logger });
 * const key = keyBuilder.fromFilter(CacheNamespace.FINANCE_QUERIES, { query: 'summary' });
 * ```
 */

export type { CachePort, SilentCachePort, CacheSetOptions, CacheStats } from './ports.js';
export { CacheError } from './ports.js';

export {
  CacheNamespace,
  createKeyBuilder,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

export { createNoopCache, createMemoryCache, type MemoryCacheOptions } from './adapters/index.js';

export { createSilentCache, type SilentCacheOptions } from './wrappers/index.js';

export {
  initCache,
  createCacheConfig,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type InitCacheOptions,
} from './client.js';
