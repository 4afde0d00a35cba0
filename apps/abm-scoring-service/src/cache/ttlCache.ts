/** Milliseconds since epoch; injectable so tests control expiry */
export type Clock = () => number;

export interface CacheEntry<V> {
  key: string;
  value: V;
  insertedAt: number;
  /** Seconds */
  ttl: number;
}

export interface TtlCacheOptions {
  maxSize: number;
  ttlSeconds: number;
  clock?: Clock;
}

/**
 * Bounded in-memory cache with per-entry expiry and LRU eviction.
 * Map insertion order doubles as recency order: the first key is the least recently used.
 */
export class TtlCache<V> {
  readonly maxSize: number;
  readonly ttlSeconds: number;
  private readonly clock: Clock;
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(options: TtlCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
    }
    if (!(options.ttlSeconds > 0)) {
      throw new RangeError(`ttlSeconds must be positive, got ${options.ttlSeconds}`);
    }
    this.maxSize = options.maxSize;
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    // Touch: move to the most-recently-used end
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, {
      key,
      value,
      insertedAt: this.clock(),
      ttl: this.ttlSeconds,
    });

    if (this.entries.size > this.maxSize) {
      this.purgeExpired();
    }
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Number of live (unexpired) entries */
  get size(): number {
    this.purgeExpired();
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.clock() - entry.insertedAt > entry.ttl * 1000;
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
      }
    }
  }
}
