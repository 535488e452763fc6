import { settle, type CachePolicyStrategy, type LoadContext } from './cache-policy-strategy.js';

/**
 * Always fetches; never reads or writes the cache store.
 */
export class NetworkOnlyStrategy implements CachePolicyStrategy {
  readonly policy = 'networkOnly';

  async load<T, K>(context: LoadContext<T, K>): Promise<void> {
    const result = await settle(context.fetch());
    if (!result.ok) {
      context.publishError(result.error);
      return;
    }
    context.publishPage(result.value, { isFromCache: false });
  }
}
