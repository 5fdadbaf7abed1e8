/**
 * TTL Cache - in-memory cache with per-entry expiry
 *
 * Map-backed, size-bounded with slack: once the size passes
 * maxSize × 1.1 a cleanup drops expired entries, then the least recently
 * accessed ones until the size is back at maxSize.
 * An entry whose age has reached its TTL is never returned.
 */

export interface CacheEntry<V> {
  data: V;
  /** Insertion time (ms) */
  timestamp: number;
  lastAccessed: number;
  ttlSeconds: number;
}

export interface TtlCacheOptions {
  /** Entries kept after a cleanup (default: 1000) */
  maxSize?: number;

  /** TTL for entries set without one (default: 300) */
  defaultTtlSeconds?: number;

  /** Called after a cleanup removed entries */
  onCleanup?: (stats: { expired: number; evicted: number; size: number }) => void;
}

export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private maxSize: number;
  private defaultTtlSeconds: number;
  private onCleanup?: TtlCacheOptions['onCleanup'];

  constructor(options: TtlCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 300;
    this.onCleanup = options.onCleanup;
  }

  /**
   * Get a live entry's data and mark it accessed
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    const now = Date.now();
    if (isExpired(entry, now)) {
      this.entries.delete(key);
      return undefined;
    }

    entry.lastAccessed = now;
    return entry.data;
  }

  /**
   * Insert or replace an entry
   */
  set(key: string, data: V, ttlSeconds?: number): void {
    const now = Date.now();
    this.entries.set(key, {
      data,
      timestamp: now,
      lastAccessed: now,
      ttlSeconds: ttlSeconds ?? this.defaultTtlSeconds,
    });

    if (this.entries.size > this.maxSize * 1.1) {
      this.cleanup();
    }
  }

  /**
   * Live entries, oldest insertion first. Does not count as access.
   */
  *values(): IterableIterator<V> {
    const now = Date.now();
    for (const entry of this.entries.values()) {
      if (!isExpired(entry, now)) {
        yield entry.data;
      }
    }
  }

  /**
   * Drop expired entries, then least recently accessed ones down to maxSize
   */
  cleanup(): void {
    const now = Date.now();
    let expired = 0;

    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) {
        this.entries.delete(key);
        expired++;
      }
    }

    let evicted = 0;
    const excess = this.entries.size - this.maxSize;
    if (excess > 0) {
      // Stable sort: equal access times evict in insertion order
      const byAccess = [...this.entries].sort((a, b) => a[1].lastAccessed - b[1].lastAccessed);
      for (const [key] of byAccess.slice(0, excess)) {
        this.entries.delete(key);
        evicted++;
      }
    }

    if (expired > 0 || evicted > 0) {
      this.onCleanup?.({ expired, evicted, size: this.entries.size });
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

function isExpired(entry: CacheEntry<unknown>, now: number): boolean {
  return now - entry.timestamp >= entry.ttlSeconds * 1000;
}
