/**
 * Cache client factory.
 */

import { createMemoryCache, createNoopCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createSilentCache } from './wrappers/index.js';

import type { CachePort, SilentCachePort } from './ports.js';
import type { AppConfig } from '../config/env.js';
import type { Logger } from 'pino';

export type CacheBackend = 'disabled' | 'memory';

export interface CacheConfig {
  backend: CacheBackend;
  defaultTtlMs: number;
  memoryMaxEntries: number;
  keyPrefix: string;
}

export interface CacheClient<T = unknown> {
  /** Application-facing port; never fails */
  cache: SilentCachePort<T>;
  keyBuilder: KeyBuilder;
  /** Adapter underneath `cache`, for health checks and tests */
  rawCache: CachePort<T>;
}

export const createCacheConfig = (config: AppConfig): CacheConfig => ({
  backend: config.cache.backend,
  defaultTtlMs: config.cache.defaultTtlMs,
  memoryMaxEntries: config.cache.memoryMaxEntries,
  keyPrefix: config.cache.keyPrefix,
});

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
}

export const initCache = <T = unknown>(options: InitCacheOptions): CacheClient<T> => {
  const { config, logger } = options;

  let rawCache: CachePort<T>;
  if (config.backend === 'disabled') {
    logger.info('[Cache] Query cache disabled');
    rawCache = createNoopCache<T>();
  } else {
    logger.info(
      { maxEntries: config.memoryMaxEntries, defaultTtlMs: config.defaultTtlMs },
      '[Cache] Using in-memory LRU cache'
    );
    rawCache = createMemoryCache<T>({
      maxEntries: config.memoryMaxEntries,
      defaultTtlMs: config.defaultTtlMs,
    });
  }

  return {
    cache: createSilentCache<T>(rawCache, { logger }),
    keyBuilder: createKeyBuilder({ globalPrefix: config.keyPrefix }),
    rawCache,
  };
};
