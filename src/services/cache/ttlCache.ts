interface CacheEntry<T> {
  value: T;
  createdAt: number;
}

/**
 * In-memory keyed store with time-based expiry.
 *
 * `get` treats an entry older than the TTL as absent, but only `set` sweeps
 * expired entries out of the map. Until that sweep, `getStale` can still
 * hand back the expired value for fallback use.
 */
export class TtlCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();

  constructor(private readonly ttlMs: number) {
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new RangeError(`TTL must be a non-negative number of milliseconds, got ${ttlMs}`);
    }
  }

  get ttl(): number {
    return this.ttlMs;
  }

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry, Date.now())) return null;
    return entry.value;
  }

  getStale(key: string): T | null {
    return this.entries.get(key)?.value ?? null;
  }

  set(key: string, value: T): void {
    const now = Date.now();
    this.entries.set(key, { value, createdAt: now });
    this.evictExpired(now);
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Raw entry count, including expired entries not yet swept. */
  size(): number {
    return this.entries.size;
  }

  ageMs(key: string): number | null {
    const entry = this.entries.get(key);
    return entry ? Date.now() - entry.createdAt : null;
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.createdAt > this.ttlMs;
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
      }
    }
  }
}
