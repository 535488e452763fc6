/**
 * Pagination lifecycle status.
 *
 * - `idle`: before the first load, and right after a reset (`loadInitial`,
 *   `refresh`, `updateFilter`) while the first page is being fetched
 * - `loading`: a following page is being fetched; current items stay visible
 * - `ready`: the last load succeeded
 * - `error`: the last load failed; current items stay visible
 */
export type PageStatus = 'idle' | 'loading' | 'ready' | 'error';

/**
 * Immutable snapshot of a paginator.
 */
export interface PageState<T> {
  readonly items: readonly T[];
  readonly status: PageStatus;
  readonly error?: Error;
  /** Whether another page can be requested */
  readonly hasMore: boolean;
  /** True when the latest page came from the cache store */
  readonly isFromCache: boolean;
  /** True while cached data is shown and fresh data is being fetched */
  readonly isRefreshing: boolean;
  /** Number of the retry in progress, if any */
  readonly retryAttempt?: number;
}

const freezeState = <T>(state: PageState<T>): PageState<T> => {
  Object.freeze(state.items);
  return Object.freeze(state);
};

export const initialPageState = <T>(): PageState<T> =>
  freezeState<T>({
    items: [],
    status: 'idle',
    hasMore: true,
    isFromCache: false,
    isRefreshing: false,
  });

/**
 * Returns a new frozen snapshot with the given fields replaced.
 * Fields set to undefined in the patch are cleared.
 */
export const patchPageState = <T>(state: PageState<T>, patch: Partial<PageState<T>>): PageState<T> =>
  freezeState<T>({
    ...state,
    ...patch,
    items: patch.items ? [...patch.items] : state.items,
  });
