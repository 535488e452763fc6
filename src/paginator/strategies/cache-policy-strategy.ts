import type { FetchQuery, Page } from '../../page/page-types.js';

/**
 * Relationship between cache lookup and live fetch for a load.
 */
export type CachePolicy = 'cacheFirst' | 'networkFirst' | 'cacheOnly' | 'networkOnly';

export const CACHE_POLICIES: readonly CachePolicy[] = ['cacheFirst', 'networkFirst', 'cacheOnly', 'networkOnly'];

/**
 * What a strategy may do during one load. Provided by the paginator; every
 * publish is ignored once the load has been superseded.
 */
export interface LoadContext<T, K> {
  readonly query: FetchQuery<K>;
  readonly cacheKey: string;
  /** Whether a cache store is configured */
  readonly hasCache: boolean;

  /** Fetches the page through the retry policy */
  fetch(): Promise<Page<T, K>>;
  /** Cached page for this load, if any; undefined without a store */
  readCache(): Promise<Page<T, K> | undefined>;
  /** Stores the page; store failures are logged, not thrown */
  writeCache(page: Page<T, K>): Promise<void>;

  publishPage(page: Page<T, K>, source: { isFromCache: boolean }): void;
  publishRefreshing(isRefreshing: boolean): void;
  publishError(error: unknown): void;
  /** Reports a background refresh failure without touching state */
  reportBackgroundFailure(error: unknown): void;
}

/**
 * Executes one load under a cache policy.
 */
export interface CachePolicyStrategy {
  readonly policy: CachePolicy;
  load<T, K>(context: LoadContext<T, K>): Promise<void>;
}

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Resolves to the outcome of a promise instead of rejecting.
 */
export const settle = async <R>(promise: Promise<R>): Promise<Settled<R>> => {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, error };
  }
};
