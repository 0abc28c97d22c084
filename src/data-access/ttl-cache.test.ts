import { describe, it, expect } from 'vitest';
import { TtlCache } from './ttl-cache';

describe('TtlCache', () => {
  function cacheAt(start: number, maxEntries = 10) {
    const clock = { now: start };
    const cache = new TtlCache<string>(maxEntries, () => clock.now);
    return { cache, clock };
  }

  it('serves fresh entries and counts hits and misses', () => {
    const { cache } = cacheAt(1000);
    cache.set('current:loc-a:latest', 'loc-a', 'reading', 500);

    expect(cache.get('current:loc-a:latest')?.value).toBe('reading');
    expect(cache.get('current:loc-b:latest')).toBeUndefined();
    expect(cache.getStats()).toEqual({ size: 1, hits: 1, misses: 1, evictions: 0, invalidations: 0 });
  });

  it('stops serving an entry once its TTL has elapsed but keeps it for peek', () => {
    const { cache, clock } = cacheAt(1000);
    cache.set('k', 'loc-a', 'v', 500);

    clock.now = 1499;
    expect(cache.get('k')?.value).toBe('v');

    clock.now = 1500;
    expect(cache.get('k')).toBeUndefined();
    expect(cache.peek('k')).toEqual({ entry: { value: 'v', storedAt: 1000, expiresAt: 1500 }, fresh: false });
  });

  it('invalidates only the entries of one location', () => {
    const { cache } = cacheAt(0);
    cache.set('current:loc-a:latest', 'loc-a', 'a1', 100);
    cache.set('history:loc-a:w', 'loc-a', 'a2', 100);
    cache.set('current:loc-b:latest', 'loc-b', 'b1', 100);

    expect(cache.invalidateLocation('loc-a')).toBe(2);
    expect(cache.peek('current:loc-a:latest')).toBeUndefined();
    expect(cache.peek('history:loc-a:w')).toBeUndefined();
    expect(cache.peek('current:loc-b:latest')?.entry.value).toBe('b1');
    expect(cache.invalidateLocation('loc-a')).toBe(0);
    expect(cache.getStats().invalidations).toBe(2);
  });

  it('evicts the least recently used entry past capacity', () => {
    const { cache } = cacheAt(0, 2);
    cache.set('a', 'loc-a', 'A', 100);
    cache.set('b', 'loc-b', 'B', 100);
    cache.get('a');
    cache.set('c', 'loc-c', 'C', 100);

    expect(cache.peek('a')?.entry.value).toBe('A');
    expect(cache.peek('b')).toBeUndefined();
    expect(cache.peek('c')?.entry.value).toBe('C');
    expect(cache.getStats().evictions).toBe(1);
    // The evicted key no longer belongs to its location
    expect(cache.invalidateLocation('loc-b')).toBe(0);
  });

  it('replaces an entry in place when set again', () => {
    const { cache, clock } = cacheAt(0);
    cache.set('k', 'loc-a', 'old', 100);
    clock.now = 50;
    cache.set('k', 'loc-a', 'new', 100);

    expect(cache.peek('k')).toEqual({ entry: { value: 'new', storedAt: 50, expiresAt: 150 }, fresh: true });
    expect(cache.getStats().size).toBe(1);
  });
});
