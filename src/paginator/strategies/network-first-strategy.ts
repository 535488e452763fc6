import { settle, type CachePolicyStrategy, type LoadContext } from './cache-policy-strategy.js';

/**
 * Fetches from the source and falls back to the cache when the fetch fails.
 */
export class NetworkFirstStrategy implements CachePolicyStrategy {
  readonly policy = 'networkFirst';

  async load<T, K>(context: LoadContext<T, K>): Promise<void> {
    const result = await settle(context.fetch());

    if (result.ok) {
      await context.writeCache(result.value);
      context.publishPage(result.value, { isFromCache: false });
      return;
    }

    const cached = await context.readCache();
    if (cached) {
      context.publishPage(cached, { isFromCache: true });
      return;
    }

    context.publishError(result.error);
  }
}
