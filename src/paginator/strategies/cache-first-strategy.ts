import { settle, type CachePolicyStrategy, type LoadContext } from './cache-policy-strategy.js';

/**
 * Shows cached data immediately, then refreshes it from the source.
 * A failed refresh keeps the cached data and is not surfaced as an error.
 */
export class CacheFirstStrategy implements CachePolicyStrategy {
  readonly policy = 'cacheFirst';

  async load<T, K>(context: LoadContext<T, K>): Promise<void> {
    const cached = await context.readCache();

    if (!cached) {
      const result = await settle(context.fetch());
      if (!result.ok) {
        context.publishError(result.error);
        return;
      }
      await context.writeCache(result.value);
      context.publishPage(result.value, { isFromCache: false });
      return;
    }

    context.publishPage(cached, { isFromCache: true });
    context.publishRefreshing(true);

    const fresh = await settle(context.fetch());
    if (!fresh.ok) {
      context.reportBackgroundFailure(fresh.error);
      context.publishRefreshing(false);
      return;
    }

    await context.writeCache(fresh.value);
    context.publishPage(fresh.value, { isFromCache: false });
  }
}
