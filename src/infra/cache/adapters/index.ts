export { createNoopCache } from './noop-cache.js';
export { createMemoryCache, type MemoryCacheOptions } from './memory-cache.js';
