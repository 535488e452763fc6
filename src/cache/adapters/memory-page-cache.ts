import type { CacheEntry, CacheStats, Duration, PageCacheStore } from '../cache-interfaces.js';
import type { FetchQuery, Page } from '../../page/page-types.js';
import { parseDuration } from '../duration-utils.js';

export interface MemoryPageCacheOptions {
  /** Upper bound on stored pages; the least recently used page is evicted past it */
  maxEntries?: number;
  /** TTL applied when `put` is called without one */
  defaultTtl?: Duration;
}

const DEFAULT_MAX_ENTRIES = 100;

/**
 * Bounded in-memory page store with optional TTL.
 * Ignores the query argument.
 */
export class MemoryPageCache<T, K> implements PageCacheStore<T, K> {
  readonly name = 'memory';
  private readonly storage = new Map<string, CacheEntry<T, K>>();
  private readonly maxEntries: number;
  private readonly defaultTtlMs?: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: MemoryPageCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`maxEntries must be a positive integer, received ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    this.defaultTtlMs = options.defaultTtl === undefined ? undefined : parseDuration(options.defaultTtl);
  }

  async get(key: string, _query?: FetchQuery<K>): Promise<Page<T, K> | undefined> {
    const entry = this.readEntry(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    // re-insert so iteration order tracks recency
    this.storage.delete(key);
    this.storage.set(key, entry);
    this.hits++;
    return entry.page;
  }

  async put(key: string, _query: FetchQuery<K>, page: Page<T, K>, ttl?: Duration): Promise<void> {
    const ttlMs = ttl === undefined ? this.defaultTtlMs : parseDuration(ttl);

    this.storage.delete(key);
    this.storage.set(key, {
      page,
      expiresAt: ttlMs === undefined ? undefined : Date.now() + ttlMs,
    });

    while (this.storage.size > this.maxEntries) {
      const oldest = this.storage.keys().next();
      if (oldest.done) break;
      this.storage.delete(oldest.value);
      this.evictions++;
    }
  }

  async remove(key: string): Promise<void> {
    this.storage.delete(key);
  }

  async clear(): Promise<void> {
    this.storage.clear();
  }

  async has(key: string): Promise<boolean> {
    return this.readEntry(key) !== undefined;
  }

  /**
   * Number of stored entries, expired ones included until they are read.
   */
  get size(): number {
    return this.storage.size;
  }

  getStats(): CacheStats {
    return {
      size: this.storage.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private readEntry(key: string): CacheEntry<T, K> | undefined {
    const entry = this.storage.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt !== undefined && Date.now() >= entry.expiresAt) {
      this.storage.delete(key);
      return undefined;
    }

    return entry;
  }
}
