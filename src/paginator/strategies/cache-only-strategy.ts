import type { CachePolicyStrategy, LoadContext } from './cache-policy-strategy.js';
import { CacheMissError, PaginatorConfigurationError } from '../paginator-errors.js';

/**
 * Serves pages from the cache store only (offline mode). Never fetches.
 */
export class CacheOnlyStrategy implements CachePolicyStrategy {
  readonly policy = 'cacheOnly';

  async load<T, K>(context: LoadContext<T, K>): Promise<void> {
    if (!context.hasCache) {
      context.publishError(
        new PaginatorConfigurationError('Cache-only policy requires a cache store to be configured')
      );
      return;
    }

    const cached = await context.readCache();
    if (!cached) {
      context.publishError(new CacheMissError(context.cacheKey));
      return;
    }

    context.publishPage(cached, { isFromCache: true });
  }
}
