import { describe, it, expect } from 'vitest';

import { CacheError, createSilentCache } from '@/infra/cache/index.js';

import { makeTestLogger } from '../../../fixtures/builders.js';
import { makeFakeCachePort } from '../../../fixtures/fakes.js';

describe('createSilentCache', () => {
  it('passes values through from a working adapter', async () => {
    const cache = createSilentCache(makeFakeCachePort<string>(), { logger: makeTestLogger() });

    await cache.set('k', 'v');

    expect(await cache.get('k')).toBe('v');
    expect(await cache.delete('k')).toBe(true);
  });

  it('turns adapter failures into misses', async () => {
    const failing = makeFakeCachePort<string>({
      failWithError: CacheError.unavailable('backend down'),
    });
    const cache = createSilentCache(failing, { logger: makeTestLogger() });

    await expect(cache.set('k', 'v')).resolves.toBeUndefined();
    expect(await cache.get('k')).toBeUndefined();
    expect(await cache.delete('k')).toBe(false);
    expect(await cache.clearByPrefix('test:')).toBe(0);
  });

  it('reports the number of cleared keys', async () => {
    const cache = createSilentCache(makeFakeCachePort<number>(), { logger: makeTestLogger() });
    await cache.set('test:a', 1);
    await cache.set('test:b', 2);
    await cache.set('other:c', 3);

    expect(await cache.clearByPrefix('test:')).toBe(2);
  });
});
