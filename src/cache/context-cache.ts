/**
 * Per-term context cache: capacity-bounded LRU with lazy TTL expiry.
 *
 * Every method is synchronous, so each read or write runs to completion
 * before another task on the event loop can touch the store. Callers do their
 * network and scoring work between `get` and `put`, never inside them.
 */

import { LruMap } from "./lru.js";

export interface ContextEntry {
  value: string;
  insertedAt: number;
  expiresAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

export interface ContextCacheOptions {
  /** Max entries (default 1000). */
  capacity?: number;
  /** Entry lifetime in seconds (default 3600). */
  ttlSeconds?: number;
  /** Millisecond clock; injectable for tests. */
  clock?: () => number;
}

export class ContextCache {
  readonly ttlMs: number;
  private readonly store: LruMap<string, ContextEntry>;
  private readonly clock: () => number;
  private readonly counters: CacheStats = { hits: 0, misses: 0, evictions: 0, expirations: 0 };

  constructor(options: ContextCacheOptions = {}) {
    const ttlSeconds = options.ttlSeconds ?? 3600;
    if (!(ttlSeconds > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${ttlSeconds}`);
    }
    this.ttlMs = ttlSeconds * 1000;
    this.clock = options.clock ?? Date.now;
    this.store = new LruMap(options.capacity ?? 1000, () => {
      this.counters.evictions++;
    });
  }

  get capacity(): number {
    return this.store.capacity;
  }

  /** Physically stored entries, expired ones included. */
  get size(): number {
    return this.store.size;
  }

  /** Cached value for `key`, or undefined when absent or expired. */
  get(key: string): string | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      this.counters.misses++;
      return undefined;
    }
    if (this.clock() >= entry.expiresAt) {
      this.store.delete(key);
      this.counters.expirations++;
      this.counters.misses++;
      return undefined;
    }
    this.counters.hits++;
    return entry.value;
  }

  /**
   * Insert or replace; the entry's lifetime restarts now. A new key on a full
   * store first purges expired entries, then evicts the least recently used.
   */
  put(key: string, value: string): void {
    const now = this.clock();
    if (!this.store.has(key) && this.store.size >= this.store.capacity) {
      this.purgeExpired(now);
    }
    this.store.set(key, { value, insertedAt: now, expiresAt: now + this.ttlMs });
  }

  /** Copy of the entry, without affecting recency or counters. */
  inspect(key: string): ContextEntry | undefined {
    const entry = this.store.peek(key);
    return entry ? { ...entry } : undefined;
  }

  clear(): void {
    this.store.clear();
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  private purgeExpired(now: number): void {
    for (const key of this.store.keys()) {
      const entry = this.store.peek(key);
      if (entry && now >= entry.expiresAt) {
        this.store.delete(key);
        this.counters.expirations++;
      }
    }
  }
}
