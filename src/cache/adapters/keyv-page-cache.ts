import type Keyv from 'keyv';
import type { Duration, PageCacheStore } from '../cache-interfaces.js';
import type { FetchQuery, Page } from '../../page/page-types.js';
import { parseDuration } from '../duration-utils.js';

/**
 * Page store backed by Keyv, so any Keyv storage adapter can hold pages.
 * Expiry is delegated to Keyv; `clear` only clears the instance's namespace.
 *
 * @example
 * ```ts
 * const store = new KeyvPageCache<Product, number>(new Keyv({ namespace: 'products' }));
 * ```
 */
export class KeyvPageCache<T, K> implements PageCacheStore<T, K> {
  readonly name = 'keyv';

  constructor(private readonly keyv: Keyv<Page<T, K>>) {}

  async get(key: string, _query?: FetchQuery<K>): Promise<Page<T, K> | undefined> {
    return this.keyv.get(key);
  }

  async put(key: string, _query: FetchQuery<K>, page: Page<T, K>, ttl?: Duration): Promise<void> {
    await this.keyv.set(key, page, ttl === undefined ? undefined : parseDuration(ttl));
  }

  async remove(key: string): Promise<void> {
    await this.keyv.delete(key);
  }

  async clear(): Promise<void> {
    await this.keyv.clear();
  }

  async has(key: string): Promise<boolean> {
    return this.keyv.has(key);
  }

  async dispose(): Promise<void> {
    await this.keyv.disconnect();
  }
}
