export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export { makeCacheHealthChecker, type CacheHealthCheckerOptions } from './cache-checker.js';
