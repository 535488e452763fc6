import type { FetchQuery, Page } from '../page/page-types.js';

/**
 * Human-readable TTL: '1d', '2h', '30m', '15s', '1w'
 * or a number of milliseconds
 */
export type Duration = number | `${number}${'s' | 'm' | 'h' | 'd' | 'w'}`;

/**
 * Page stored together with its expiry (epoch milliseconds).
 * No expiry means the entry never expires.
 */
export interface CacheEntry<T, K> {
  page: Page<T, K>;
  expiresAt?: number;
}

/**
 * Query-aware page store.
 *
 * Keys are always derived by the paginator; stores never build them.
 * The query is passed along for stores that need backend context
 * (for instance one that revalidates against a remote cache); simple
 * stores ignore it.
 */
export interface PageCacheStore<T, K> {
  /** Store identifier, for diagnostics */
  readonly name: string;
  /** Returns undefined both for keys never stored and for expired ones */
  get(key: string, query: FetchQuery<K>): Promise<Page<T, K> | undefined>;
  put(key: string, query: FetchQuery<K>, page: Page<T, K>, ttl?: Duration): Promise<void>;
  remove(key: string): Promise<void>;
  clear(): Promise<void>;
  /** True when the key is present and not expired */
  has(key: string): Promise<boolean>;
}

/**
 * Counters exposed by stores that keep them
 */
export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}
