import { describe, it, expect } from 'vitest';

import { CacheError, createMemoryCache } from '@/infra/cache/index.js';
import { makeCacheHealthChecker, makeDbHealthChecker } from '@/modules/health/index.js';

import { makeFakeCachePort, makeRecordingDb } from '../../fixtures/fakes.js';

describe('makeDbHealthChecker', () => {
  it('runs SELECT 1 and reports healthy', async () => {
    const { db, queries } = makeRecordingDb<object>();

    const result = await makeDbHealthChecker(db, { name: 'database' })();

    expect(queries.map((q) => q.sql)).toEqual(['SELECT 1']);
    expect(result).toMatchObject({ name: 'database', status: 'healthy', critical: true });
  });

  it('reports the driver error as unhealthy', async () => {
    const { db } = makeRecordingDb<object>({ failWithError: new Error('connection refused') });

    const result = await makeDbHealthChecker(db, { name: 'database' })();

    expect(result).toMatchObject({
      name: 'database',
      status: 'unhealthy',
      message: 'connection refused',
      critical: true,
    });
  });

  it('times out slow databases', async () => {
    const { db } = makeRecordingDb<object>({ delayMs: 200 });

    const result = await makeDbHealthChecker(db, { name: 'database', timeoutMs: 10 })();

    expect(result.status).toBe('unhealthy');
    expect(result.message).toBe('Database health check timed out after 10ms');
  });
});

describe('makeCacheHealthChecker', () => {
  it('reports a working cache as healthy and non-critical', async () => {
    const result = await makeCacheHealthChecker(createMemoryCache())();

    expect(result).toMatchObject({ name: 'cache', status: 'healthy', critical: false });
  });

  it('reports adapter errors as unhealthy', async () => {
    const cache = makeFakeCachePort({ failWithError: CacheError.unavailable('cache offline') });

    const result = await makeCacheHealthChecker(cache, { name: 'query-cache' })();

    expect(result).toMatchObject({
      name: 'query-cache',
      status: 'unhealthy',
      message: 'cache offline',
      critical: false,
    });
  });

  it('times out a hanging cache', async () => {
    const cache = makeFakeCachePort({ delayMs: 200 });

    const result = await makeCacheHealthChecker(cache, { timeoutMs: 10 })();

    expect(result.message).toBe('Cache health check timed out after 10ms');
  });
});
