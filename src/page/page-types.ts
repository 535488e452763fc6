import type { FilterSpec } from '../filter/filter-spec.js';

/**
 * Parameters for fetching one page.
 * @template K - Page key type (offset, cursor token, document handle, ...)
 */
export interface FetchQuery<K> {
  /** Number of items requested */
  readonly pageSize: number;
  /** Key of the page to fetch; absent for the first page */
  readonly pageKey?: K;
  /** Filters and sort order for the backend to apply */
  readonly filter?: FilterSpec;
}

/**
 * One page of results.
 * @template T - Item type
 * @template K - Page key type
 */
export interface Page<T, K> {
  readonly items: readonly T[];
  /** Key of the following page; absent on the last page */
  readonly nextKey?: K;
  readonly isLast: boolean;
  /** Total number of items across all pages, when the backend knows it */
  readonly totalCount?: number;
}

/**
 * Backend integration contract. Implementations must reject on any transport
 * or backend failure instead of handling it, since retry and cache fallback
 * depend on seeing the error.
 *
 * @example
 * ```ts
 * const source: PageSource<Product, number> = {
 *   async fetch(query) {
 *     const offset = query.pageKey ?? 0;
 *     const res = await api.products({ offset, limit: query.pageSize });
 *     return {
 *       items: res.items,
 *       nextKey: res.hasMore ? offset + query.pageSize : undefined,
 *       isLast: !res.hasMore,
 *       totalCount: res.total,
 *     };
 *   },
 * };
 * ```
 */
export interface PageSource<T, K> {
  fetch(query: FetchQuery<K>): Promise<Page<T, K>>;
}

/**
 * Creates a frozen query.
 */
export const createFetchQuery = <K>(
  pageSize: number,
  pageKey?: K,
  filter?: FilterSpec
): FetchQuery<K> => Object.freeze({ pageSize, pageKey, filter });
