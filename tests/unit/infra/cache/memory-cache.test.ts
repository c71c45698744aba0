import { describe, it, expect } from 'vitest';

import { createMemoryCache } from '@/infra/cache/index.js';

const makeClock = (start = 1_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

describe('createMemoryCache', () => {
  it('returns what was stored', async () => {
    const cache = createMemoryCache<string>();

    await cache.set('a', 'one');
    const result = await cache.get('a');

    expect(result.isOk() && result.value).toBe('one');
  });

  it('reports a miss as Ok(undefined)', async () => {
    const cache = createMemoryCache<string>();

    const result = await cache.get('missing');

    expect(result.isOk()).toBe(true);
    expect(result.isOk() && result.value).toBeUndefined();
  });

  it('expires entries once their TTL has elapsed', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 100, now: clock.now });

    await cache.set('a', 'one');
    clock.advance(99);
    const beforeExpiry = await cache.get('a');
    clock.advance(1);
    const atExpiry = await cache.get('a');

    expect(beforeExpiry.isOk() && beforeExpiry.value).toBe('one');
    expect(atExpiry.isOk() && atExpiry.value).toBeUndefined();
    expect((await cache.stats()).size).toBe(0);
  });

  it('honours a per-entry TTL', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 100, now: clock.now });

    await cache.set('a', 'one', { ttlMs: 1_000 });
    clock.advance(500);
    const result = await cache.get('a');

    expect(result.isOk() && result.value).toBe('one');
  });

  it('evicts the least recently used entry when full', async () => {
    const cache = createMemoryCache<number>({ maxEntries: 2 });

    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.get('a');
    await cache.set('c', 3);

    const b = await cache.get('b');
    const a = await cache.get('a');
    expect(b.isOk() && b.value).toBeUndefined();
    expect(a.isOk() && a.value).toBe(1);
    expect((await cache.stats()).evictions).toBe(1);
  });

  it('does not evict when overwriting an existing key', async () => {
    const cache = createMemoryCache<number>({ maxEntries: 2 });

    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.set('a', 10);

    expect(await cache.stats()).toEqual({ hits: 0, misses: 0, evictions: 0, size: 2 });
  });

  it('clears keys by prefix and counts them', async () => {
    const cache = createMemoryCache<number>();
    await cache.set('p:finance:1', 1);
    await cache.set('p:finance:2', 2);
    await cache.set('p:other:1', 3);

    const result = await cache.clearByPrefix('p:finance:');

    expect(result.isOk() && result.value).toBe(2);
    expect((await cache.stats()).size).toBe(1);
  });

  it('counts hits and misses', async () => {
    const cache = createMemoryCache<number>();
    await cache.set('a', 1);

    await cache.get('a');
    await cache.get('a');
    await cache.get('b');

    const stats = await cache.stats();
    expect(stats.hits).toBe(2);
    expect(stats.misses).toBe(1);
  });

  it('deletes single keys', async () => {
    const cache = createMemoryCache<number>();
    await cache.set('a', 1);

    const first = await cache.delete('a');
    const second = await cache.delete('a');

    expect(first.isOk() && first.value).toBe(true);
    expect(second.isOk() && second.value).toBe(false);
  });
});
