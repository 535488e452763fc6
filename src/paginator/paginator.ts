import type { FilterSpec } from '../filter/filter-spec.js';
import { createFetchQuery, type FetchQuery, type Page, type PageSource } from '../page/page-types.js';
import type { Duration, PageCacheStore } from '../cache/cache-interfaces.js';
import { deriveCacheKey } from '../cache/cache-key.js';
import { isValidDuration } from '../cache/duration-utils.js';
import { exponentialRetryPolicy, type RetryPolicy } from '../retry/retry-policy.js';
import { fetchWithRetry, type WaitFn } from '../retry/fetch-with-retry.js';
import { initialPageState, patchPageState, type PageState } from './page-state.js';
import { StateEmitter, type StateListener } from './state-emitter.js';
import type { PaginatorLogEntry, PaginatorLogger } from './paginator-logger.js';
import { PaginatorConfigurationError, toError } from './paginator-errors.js';
import {
  CACHE_POLICIES,
  createCachePolicyStrategy,
  type CachePolicy,
  type CachePolicyStrategy,
  type LoadContext,
} from './strategies/index.js';

/**
 * Paginator configuration.
 * @template T - Item type
 * @template K - Page key type
 */
export interface PaginatorOptions<T, K> {
  /** Backend the pages are fetched from */
  source: PageSource<T, K>;
  /** Optional page store; required by the cache-only policy */
  cache?: PageCacheStore<T, K>;
  /** Items per page (default 20) */
  pageSize?: number;
  /** Default 'cacheFirst' */
  cachePolicy?: CachePolicy;
  /** Retry configuration; defaults of {@link exponentialRetryPolicy} fill the gaps. No retries when absent */
  retryPolicy?: Partial<RetryPolicy>;
  /** Filter used until {@link Paginator.updateFilter} replaces it */
  initialFilter?: FilterSpec;
  /** TTL passed to the cache store for every page written */
  cacheTtl?: Duration;
  logger?: PaginatorLogger;
  /** Backoff wait, mostly for tests */
  wait?: WaitFn;
}

export const DEFAULT_PAGE_SIZE = 20;

interface LoadMode {
  isInitial: boolean;
}

/**
 * Pagination engine: accumulates pages from a source, applies a cache policy
 * and retry policy to every load, and publishes an immutable
 * {@link PageState} on every transition.
 *
 * One load runs at a time. `refresh` and `updateFilter` pre-empt a running
 * load; the superseded load is not cancelled but its results are ignored.
 *
 * @example
 * ```ts
 * const paginator = new Paginator<Product, number>({
 *   source: productSource,
 *   cache: new MemoryPageCache(),
 *   pageSize: 20,
 *   cachePolicy: 'cacheFirst',
 * });
 *
 * paginator.subscribe(state => render(state));
 * await paginator.loadInitial();
 * await paginator.loadNext();
 * await paginator.refresh();
 * ```
 */
export class Paginator<T, K> {
  readonly pageSize: number;
  readonly cachePolicy: CachePolicy;

  private readonly source: PageSource<T, K>;
  private readonly cache?: PageCacheStore<T, K>;
  private readonly retryPolicy?: RetryPolicy;
  private readonly cacheTtl?: Duration;
  private readonly logger?: PaginatorLogger;
  private readonly wait?: WaitFn;
  private readonly strategy: CachePolicyStrategy;
  private readonly emitter = new StateEmitter<PageState<T>>();

  private currentState: PageState<T> = initialPageState<T>();
  private currentFilter?: FilterSpec;
  private nextPageKey?: K;
  /** In-flight guard; cleared by refresh and updateFilter to pre-empt a load */
  private isLoading = false;
  /** Identifies the load whose results may still be published */
  private activeLoad = 0;
  private disposed = false;

  constructor(options: PaginatorOptions<T, K>) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new PaginatorConfigurationError(`pageSize must be a positive integer, received ${pageSize}`);
    }

    const cachePolicy = options.cachePolicy ?? 'cacheFirst';
    if (!CACHE_POLICIES.includes(cachePolicy)) {
      throw new PaginatorConfigurationError(`Unknown cache policy: ${String(cachePolicy)}`);
    }

    if (options.cacheTtl !== undefined && !isValidDuration(options.cacheTtl)) {
      throw new PaginatorConfigurationError(`Invalid cacheTtl: ${String(options.cacheTtl)}`);
    }

    if (options.retryPolicy) {
      try {
        this.retryPolicy = exponentialRetryPolicy(options.retryPolicy);
      } catch (error) {
        throw new PaginatorConfigurationError(toError(error).message, { cause: error });
      }
    }

    this.source = options.source;
    this.cache = options.cache;
    this.pageSize = pageSize;
    this.cachePolicy = cachePolicy;
    this.cacheTtl = options.cacheTtl;
    this.logger = options.logger;
    this.wait = options.wait;
    this.currentFilter = options.initialFilter;
    this.strategy = createCachePolicyStrategy(cachePolicy);
  }

  /**
   * Current snapshot.
   */
  get state(): PageState<T> {
    return this.currentState;
  }

  /**
   * Filter applied to loads.
   */
  get filter(): FilterSpec | undefined {
    return this.currentFilter;
  }

  /**
   * Registers a listener called synchronously with every new snapshot.
   * @returns Function removing the listener
   */
  subscribe(listener: StateListener<PageState<T>>): () => void {
    return this.emitter.subscribe(listener);
  }

  /**
   * Clears items and cursor, then loads the first page.
   * Does nothing while another load is in flight.
   */
  async loadInitial(): Promise<void> {
    if (this.isLoading || this.disposed) {
      return;
    }

    const load = this.beginLoad();
    this.nextPageKey = undefined;

    await this.runLoad(load, { isInitial: true }, initialPageState<T>());
  }

  /**
   * Loads the page after the last one and appends its items.
   * Does nothing while a load is in flight, when no page is left,
   * or when the status is already `loading`.
   */
  async loadNext(): Promise<void> {
    if (
      this.isLoading ||
      this.disposed ||
      !this.currentState.hasMore ||
      this.currentState.status === 'loading'
    ) {
      return;
    }

    const load = this.beginLoad();

    await this.runLoad(load, { isInitial: false }, patchPageState(this.currentState, { status: 'loading' }));
  }

  /**
   * Reloads from the first page, even while a load is in flight.
   * @param options.clearCache - Empty the cache store first (default true)
   */
  async refresh(options: { clearCache?: boolean } = {}): Promise<void> {
    if (this.disposed) {
      return;
    }

    if ((options.clearCache ?? true) && this.cache) {
      await this.cache.clear();
    }

    this.isLoading = false;
    await this.loadInitial();
  }

  /**
   * Replaces the filter and reloads from the first page, even while a load
   * is in flight.
   */
  async updateFilter(filter: FilterSpec | undefined): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.currentFilter = filter;
    this.isLoading = false;
    await this.loadInitial();
  }

  /**
   * Replaces every item matching the predicate. Publishes even when nothing matches.
   */
  updateItem(item: T, predicate: (current: T) => boolean): void {
    this.setItems(this.currentState.items.map(current => (predicate(current) ? item : current)));
  }

  /**
   * Removes every item matching the predicate.
   */
  removeItem(predicate: (current: T) => boolean): void {
    this.setItems(this.currentState.items.filter(current => !predicate(current)));
  }

  /**
   * Inserts an item; the position is clamped to the list bounds (default 0).
   */
  insertItem(item: T, position = 0): void {
    const items = this.currentState.items;
    const index = clampPosition(position, items.length);
    this.setItems([...items.slice(0, index), item, ...items.slice(index)]);
  }

  /**
   * Drops all listeners and ignores the outcome of any running load.
   */
  dispose(): void {
    this.disposed = true;
    this.activeLoad++;
    this.isLoading = false;
    this.emitter.clear();
  }

  private beginLoad(): number {
    this.isLoading = true;
    this.activeLoad++;
    return this.activeLoad;
  }

  private isCurrent(load: number): boolean {
    return load === this.activeLoad && !this.disposed;
  }

  /**
   * Publishes the opening snapshot and runs the strategy. The in-flight guard
   * is released even when a listener throws on the opening snapshot.
   */
  private async runLoad(load: number, mode: LoadMode, opening: PageState<T>): Promise<void> {
    try {
      this.announce(opening);

      const query = createFetchQuery<K>(
        this.pageSize,
        mode.isInitial ? undefined : this.nextPageKey,
        this.currentFilter
      );
      const context = this.createLoadContext(load, query, mode);

      try {
        await this.strategy.load(context);
      } catch (error) {
        context.publishError(error);
      }
    } finally {
      if (load === this.activeLoad) {
        this.isLoading = false;
      }
    }
  }

  private announce(opening: PageState<T>): void {
    try {
      this.setState(opening);
    } catch (error) {
      // a listener failed on the opening snapshot; leave a state the next load can start from
      this.setState(patchPageState(this.currentState, { status: 'error', error: toError(error) }));
      throw error;
    }
  }

  private createLoadContext(load: number, query: FetchQuery<K>, mode: LoadMode): LoadContext<T, K> {
    const cacheKey = deriveCacheKey(query);
    const cache = this.cache;
    // items of a cached page shown ahead of fresh data; the fresh page takes their place
    let provisionalItems: ReadonlySet<T> | undefined;

    const isStale = (): boolean => {
      if (this.isCurrent(load)) {
        return false;
      }
      this.log({ event: 'stale-result', cacheKey });
      return true;
    };

    return {
      query,
      cacheKey,
      hasCache: cache !== undefined,

      fetch: (): Promise<Page<T, K>> => {
        this.log({ event: 'fetch', cacheKey });
        return fetchWithRetry(() => this.source.fetch(query), this.retryPolicy, {
          wait: this.wait,
          onRetry: attempt => {
            if (!this.isCurrent(load)) return;
            this.log({ event: 'retry', cacheKey, attempt });
            this.setState(patchPageState(this.currentState, { retryAttempt: attempt }));
          },
        });
      },

      readCache: async () => {
        if (!cache) {
          return undefined;
        }
        const page = await cache.get(cacheKey, query);
        this.log({ event: page ? 'cache-hit' : 'cache-miss', cacheKey });
        return page;
      },

      writeCache: async page => {
        if (!cache) {
          return;
        }
        try {
          await cache.put(cacheKey, query, page, this.cacheTtl);
          this.log({ event: 'cache-write', cacheKey });
        } catch (error) {
          this.log({ event: 'cache-write-failed', cacheKey, error: toError(error) });
        }
      },

      publishPage: (page, { isFromCache }) => {
        if (isStale()) return;

        const shown = provisionalItems;
        const current = this.currentState.items;
        const base = mode.isInitial
          ? []
          : shown
            ? current.filter(entry => !shown.has(entry))
            : current;
        provisionalItems = isFromCache ? new Set(page.items) : undefined;

        this.nextPageKey = page.nextKey;
        this.setState(patchPageState(this.currentState, {
          items: [...base, ...page.items],
          status: 'ready',
          error: undefined,
          hasMore: !page.isLast,
          isFromCache,
          isRefreshing: false,
          retryAttempt: undefined,
        }));
      },

      publishRefreshing: isRefreshing => {
        if (isStale()) return;
        this.setState(patchPageState(this.currentState, { isRefreshing }));
      },

      publishError: error => {
        if (isStale()) return;

        const normalized = toError(error);
        this.log({ event: 'load-error', cacheKey, error: normalized });
        this.setState(patchPageState(this.currentState, {
          status: 'error',
          error: normalized,
          isRefreshing: false,
          retryAttempt: undefined,
        }));
      },

      reportBackgroundFailure: error => {
        this.log({ event: 'background-refresh-failed', cacheKey, error: toError(error) });
      },
    };
  }

  private setItems(items: readonly T[]): void {
    this.setState(patchPageState(this.currentState, { items }));
  }

  private setState(state: PageState<T>): void {
    this.currentState = state;
    this.emitter.emit(state);
  }

  private log(entry: PaginatorLogEntry): void {
    this.logger?.(entry);
  }
}

const clampPosition = (position: number, length: number): number => {
  if (Number.isNaN(position)) return 0;
  return Math.min(Math.max(Math.trunc(position), 0), length);
};
