export interface CacheStore<T> {
  get(key: string): T | undefined;
  set(key: string, value: T, ttlSeconds?: number): void;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface TtlCacheOptions {
  /** Default time-to-live in seconds; zero or less disables caching */
  ttlSeconds: number;
  maxEntries: number;
}

const EVICTION_RATIO = 0.1;

/**
 * In-memory key/value store with per-entry expiry and a size bound.
 *
 * Expired entries are dropped lazily on read. When a new key arrives at capacity,
 * expired entries are swept first, then the oldest-inserted tenth of the store
 * (at least one entry) is evicted. There is no LRU bookkeeping: an overwrite moves
 * a key to the newest position, a read does not.
 */
export class TtlCache<T> implements CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlSeconds: number;
  private readonly maxEntries: number;

  constructor(options: TtlCacheOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttlSeconds: number = this.ttlSeconds): void {
    if (ttlSeconds <= 0) {
      return;
    }

    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      this.evict();
    }

    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private evict(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }

    if (this.entries.size < this.maxEntries) {
      return;
    }

    let remaining = Math.max(1, Math.floor(this.maxEntries * EVICTION_RATIO));
    for (const key of this.entries.keys()) {
      if (remaining-- <= 0) {
        break;
      }
      this.entries.delete(key);
    }
  }
}
