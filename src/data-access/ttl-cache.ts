/**
 * TTL cache with per-location invalidation and least-recently-used eviction.
 * Expired entries are kept until evicted or invalidated so that degraded-availability
 * mode can still serve them.
 */

export interface CacheEntry<V> {
  value: V;
  storedAt: number;
  expiresAt: number;
}

export interface CacheLookup<V> {
  entry: CacheEntry<V>;
  fresh: boolean;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  invalidations: number;
}

export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private keysByLocation = new Map<string, Set<string>>();
  private locationByKey = new Map<string, string>();
  private stats = { hits: 0, misses: 0, evictions: 0, invalidations: 0 };

  constructor(
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Fresh entries only; counts a hit or a miss
   */
  get(key: string): CacheEntry<V> | undefined {
    const lookup = this.peek(key);
    if (lookup?.fresh) {
      this.stats.hits++;
      this.touch(key, lookup.entry);
      return lookup.entry;
    }
    this.stats.misses++;
    return undefined;
  }

  /**
   * Any entry, fresh or expired, without touching statistics
   */
  peek(key: string): CacheLookup<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    return { entry, fresh: entry.expiresAt > this.now() };
  }

  set(key: string, locationId: string, value: V, ttlMs: number): void {
    const storedAt = this.now();
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt, expiresAt: storedAt + ttlMs });
    this.index(key, locationId);
    this.evictOverflow();
  }

  /**
   * Drop every entry belonging to a location; returns how many were removed
   */
  invalidateLocation(locationId: string): number {
    const keys = this.keysByLocation.get(locationId);
    if (!keys) return 0;
    for (const key of keys) {
      this.entries.delete(key);
      this.locationByKey.delete(key);
    }
    this.keysByLocation.delete(locationId);
    this.stats.invalidations += keys.size;
    return keys.size;
  }

  delete(key: string): void {
    this.entries.delete(key);
    this.unindex(key);
  }

  clear(): void {
    this.entries.clear();
    this.keysByLocation.clear();
    this.locationByKey.clear();
  }

  getStats(): CacheStats {
    return { size: this.entries.size, ...this.stats };
  }

  private touch(key: string, entry: CacheEntry<V>): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private index(key: string, locationId: string): void {
    const previous = this.locationByKey.get(key);
    if (previous !== undefined && previous !== locationId) {
      this.unindex(key);
    }
    this.locationByKey.set(key, locationId);
    const keys = this.keysByLocation.get(locationId) ?? new Set<string>();
    keys.add(key);
    this.keysByLocation.set(locationId, keys);
  }

  private unindex(key: string): void {
    const locationId = this.locationByKey.get(key);
    if (locationId === undefined) return;
    this.locationByKey.delete(key);
    const keys = this.keysByLocation.get(locationId);
    keys?.delete(key);
    if (keys && keys.size === 0) {
      this.keysByLocation.delete(locationId);
    }
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
      this.unindex(oldest.value);
      this.stats.evictions++;
    }
  }
}
