import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Paginator } from '../../src/paginator/paginator.js';
import { CacheMissError, PaginatorConfigurationError } from '../../src/paginator/paginator-errors.js';
import { deriveCacheKey } from '../../src/cache/cache-key.js';
import { MemoryPageCache } from '../../src/cache/adapters/memory-page-cache.js';
import type { CachePolicy } from '../../src/paginator/strategies/index.js';
import type { Page } from '../../src/page/page-types.js';
import {
  FakePageSource,
  RecordingCacheStore,
  deferred,
  ids,
  item,
  offsetPage,
  offsetSource,
  recordStates,
  type TestItem,
} from './test-helpers.js';

const firstPageKey = deriveCacheKey<number>({ pageSize: 2 });
const secondPageKey = deriveCacheKey<number>({ pageSize: 2, pageKey: 2 });

const cachedFirstPage: Page<TestItem, number> = {
  items: [item(0, 'Cached 0'), item(1, 'Cached 1')],
  nextKey: 2,
  isLast: false,
};

const failingSource = (message = 'network down') =>
  new FakePageSource<TestItem, number>(() => Promise.reject(new Error(message)));

describe('Cache policies', () => {
  let cache: RecordingCacheStore<TestItem, number>;

  const create = (
    cachePolicy: CachePolicy,
    source: FakePageSource<TestItem, number>,
    extra: { logger?: (entry: unknown) => void; cacheTtl?: '5m' } = {}
  ) => new Paginator<TestItem, number>({ source, cache, pageSize: 2, cachePolicy, ...extra });

  beforeEach(() => {
    cache = new RecordingCacheStore<TestItem, number>();
  });

  describe('cacheFirst', () => {
    it('should publish cached data, then refresh it from the source', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const source = offsetSource();
      const paginator = create('cacheFirst', source);
      const states = recordStates(paginator);

      await paginator.loadInitial();

      expect(states.map(s => [s.status, s.isFromCache, s.isRefreshing])).toEqual([
        ['idle', false, false],
        ['ready', true, false],
        ['ready', true, true],
        ['ready', false, false],
      ]);
      expect(states[1].items.map(i => i.name)).toEqual(['Cached 0', 'Cached 1']);
      expect(paginator.state.items.map(i => i.name)).toEqual(['Item 0', 'Item 1']);
      expect(source.calls).toBe(1);
      expect(cache.puts).toHaveLength(1);
      expect(cache.puts[0].key).toBe(firstPageKey);
      expect(ids(cache.puts[0].page.items)).toEqual([0, 1]);
    });

    it('should keep cached data when the background refresh fails', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const logger = vi.fn();
      const paginator = create('cacheFirst', failingSource(), { logger });
      const states = recordStates(paginator);

      await paginator.loadInitial();

      expect(states).toHaveLength(4);
      expect(paginator.state.status).toBe('ready');
      expect(paginator.state.error).toBeUndefined();
      expect(paginator.state.isFromCache).toBe(true);
      expect(paginator.state.isRefreshing).toBe(false);
      expect(paginator.state.items.map(i => i.name)).toEqual(['Cached 0', 'Cached 1']);
      expect(cache.puts).toHaveLength(0);
      expect(logger).toHaveBeenCalledWith({
        event: 'background-refresh-failed',
        cacheKey: firstPageKey,
        error: new Error('network down'),
      });
    });

    it('should fetch and store on a cache miss', async () => {
      const logger = vi.fn();
      const paginator = create('cacheFirst', offsetSource(), { logger, cacheTtl: '5m' });

      await paginator.loadInitial();

      expect(paginator.state.isFromCache).toBe(false);
      expect(ids(paginator.state.items)).toEqual([0, 1]);
      expect(cache.puts).toHaveLength(1);
      expect(cache.puts[0].ttl).toBe('5m');
      expect(logger.mock.calls.map(([entry]) => entry.event)).toEqual(['cache-miss', 'fetch', 'cache-write']);
    });

    it('should publish an error when a cache miss cannot be fetched', async () => {
      const paginator = create('cacheFirst', failingSource());

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('error');
      expect(paginator.state.error?.message).toBe('network down');
    });

    it('should replace, not repeat, a cached next page once fresh data arrives', async () => {
      cache.entries.set(secondPageKey, {
        items: [item(2, 'Cached 2'), item(3, 'Cached 3')],
        nextKey: 4,
        isLast: false,
      });
      const paginator = create('cacheFirst', offsetSource());
      await paginator.loadInitial();
      const states = recordStates(paginator);

      await paginator.loadNext();

      expect(states[1].items.map(i => i.name)).toEqual(['Item 0', 'Item 1', 'Cached 2', 'Cached 3']);
      expect(paginator.state.items.map(i => i.name)).toEqual(['Item 0', 'Item 1', 'Item 2', 'Item 3']);
    });

    it('should keep mutations made while a cached next page is being refreshed', async () => {
      cache.entries.set(secondPageKey, {
        items: [item(2, 'Cached 2'), item(3, 'Cached 3')],
        nextKey: 4,
        isLast: false,
      });
      const refreshStarted = deferred<void>();
      const freshSecondPage = deferred<Page<TestItem, number>>();
      const source = new FakePageSource<TestItem, number>((query, call) => {
        if (call === 1) return Promise.resolve(offsetPage(query));
        refreshStarted.resolve();
        return freshSecondPage.promise;
      });
      const paginator = create('cacheFirst', source);
      await paginator.loadInitial();

      const next = paginator.loadNext();
      await refreshStarted.promise;
      expect(ids(paginator.state.items)).toEqual([0, 1, 2, 3]);

      paginator.removeItem(current => current.id === 0);
      freshSecondPage.resolve(offsetPage({ pageSize: 2, pageKey: 2 }));
      await next;

      expect(ids(paginator.state.items)).toEqual([1, 2, 3]);
      expect(paginator.state.items.map(i => i.name)).toEqual(['Item 1', 'Item 2', 'Item 3']);
      expect(paginator.state.isFromCache).toBe(false);
    });

    it('should ignore loadNext while the background refresh runs', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const source = offsetSource();
      const paginator = create('cacheFirst', source);
      let loadNext: Promise<void> | undefined;
      paginator.subscribe(state => {
        if (state.isRefreshing && !loadNext) {
          loadNext = paginator.loadNext();
        }
      });

      await paginator.loadInitial();
      await loadNext;

      expect(source.calls).toBe(1);
      expect(ids(paginator.state.items)).toEqual([0, 1]);
    });
  });

  describe('networkFirst', () => {
    it('should fetch and store fresh data', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const paginator = create('networkFirst', offsetSource());

      await paginator.loadInitial();

      expect(paginator.state.isFromCache).toBe(false);
      expect(paginator.state.items.map(i => i.name)).toEqual(['Item 0', 'Item 1']);
      expect(cache.puts).toHaveLength(1);
    });

    it('should fall back to the cache when the fetch fails', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const paginator = create('networkFirst', failingSource());

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('ready');
      expect(paginator.state.isFromCache).toBe(true);
      expect(paginator.state.error).toBeUndefined();
      expect(paginator.state.items.map(i => i.name)).toEqual(['Cached 0', 'Cached 1']);
    });

    it('should publish the network error when nothing is cached', async () => {
      const paginator = create('networkFirst', failingSource('timeout'));

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('error');
      expect(paginator.state.error?.message).toBe('timeout');
    });
  });

  describe('cacheOnly', () => {
    it('should fail with a configuration error without a store', async () => {
      const source = offsetSource();
      const paginator = new Paginator<TestItem, number>({ source, cachePolicy: 'cacheOnly' });

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('error');
      expect(paginator.state.error).toBeInstanceOf(PaginatorConfigurationError);
      expect(paginator.state.error?.message).toBe('Cache-only policy requires a cache store to be configured');
      expect(source.calls).toBe(0);
    });

    it('should fail with a cache miss on an empty store', async () => {
      const source = offsetSource();
      const paginator = create('cacheOnly', source);

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('error');
      expect(paginator.state.items).toEqual([]);
      const error = paginator.state.error;
      expect(error).toBeInstanceOf(CacheMissError);
      expect(error instanceof CacheMissError && error.cacheKey).toBe(firstPageKey);
      expect(source.calls).toBe(0);
    });

    it('should serve cached pages', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const source = offsetSource();
      const paginator = create('cacheOnly', source);

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('ready');
      expect(paginator.state.isFromCache).toBe(true);
      expect(paginator.state.hasMore).toBe(true);
      expect(source.calls).toBe(0);
    });
  });

  describe('networkOnly', () => {
    it('should never touch the store', async () => {
      cache.entries.set(firstPageKey, cachedFirstPage);
      const paginator = create('networkOnly', offsetSource());

      await paginator.loadInitial();
      await paginator.loadNext();

      expect(cache.gets).toBe(0);
      expect(cache.puts).toHaveLength(0);
      expect(ids(paginator.state.items)).toEqual([0, 1, 2, 3]);
    });

    it('should publish fetch failures', async () => {
      const paginator = create('networkOnly', failingSource());

      await paginator.loadInitial();

      expect(paginator.state.status).toBe('error');
    });
  });

  describe('with the memory store', () => {
    it('should serve a second paginator from pages cached by the first', async () => {
      const store = new MemoryPageCache<TestItem, number>();
      const source = new FakePageSource<TestItem, number>(async query => offsetPage(query));
      const first = new Paginator<TestItem, number>({ source, cache: store, pageSize: 2, cachePolicy: 'networkFirst' });
      await first.loadInitial();

      const offline = new Paginator<TestItem, number>({ source, cache: store, pageSize: 2, cachePolicy: 'cacheOnly' });
      await offline.loadInitial();

      expect(source.calls).toBe(1);
      expect(ids(offline.state.items)).toEqual([0, 1]);
      expect(offline.state.isFromCache).toBe(true);
    });
  });
});
