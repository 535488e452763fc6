import { Buffer } from 'node:buffer';
import type { FetchQuery } from '../page/page-types.js';
import { filterSpecToRecord } from '../filter/filter-spec.js';
import { canonicalize } from '../utils/canonical-value.js';

/**
 * Derives the cache key of a query from its page key and filter.
 *
 * The pair is serialized canonically (sorted object keys, tagged special
 * values) and base64-encoded. An absent page key and an absent filter are both
 * `null`; a present page key is wrapped in an object, and a present filter is
 * always an object, so "first page", "no filter" and "empty filter" stay
 * distinct. The page size is not part of the key.
 *
 * @example
 * ```ts
 * deriveCacheKey({ pageSize: 20 });
 * // → 'eyJmaWx0ZXIiOm51bGwsInBhZ2VLZXkiOm51bGx9'
 * ```
 */
export function deriveCacheKey<K>(query: FetchQuery<K>): string {
  const parts = {
    filter: query.filter ? filterSpecToRecord(query.filter) : null,
    pageKey: query.pageKey === undefined || query.pageKey === null
      ? null
      : { value: canonicalize(query.pageKey) },
  };
  return Buffer.from(JSON.stringify(canonicalize(parts)), 'utf8').toString('base64');
}

/**
 * Decodes a key produced by {@link deriveCacheKey} back to its JSON payload.
 * Useful when inspecting a store.
 */
export function describeCacheKey(key: string): string {
  return Buffer.from(key, 'base64').toString('utf8');
}
