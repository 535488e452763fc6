import type { CachePolicy, CachePolicyStrategy } from './cache-policy-strategy.js';
import { CacheFirstStrategy } from './cache-first-strategy.js';
import { NetworkFirstStrategy } from './network-first-strategy.js';
import { CacheOnlyStrategy } from './cache-only-strategy.js';
import { NetworkOnlyStrategy } from './network-only-strategy.js';

export {
  CACHE_POLICIES,
  settle,
  type CachePolicy,
  type CachePolicyStrategy,
  type LoadContext,
  type Settled,
} from './cache-policy-strategy.js';
export { CacheFirstStrategy, NetworkFirstStrategy, CacheOnlyStrategy, NetworkOnlyStrategy };

/**
 * Returns the strategy implementing a cache policy.
 */
export function createCachePolicyStrategy(policy: CachePolicy): CachePolicyStrategy {
  switch (policy) {
    case 'cacheFirst':
      return new CacheFirstStrategy();
    case 'networkFirst':
      return new NetworkFirstStrategy();
    case 'cacheOnly':
      return new CacheOnlyStrategy();
    case 'networkOnly':
      return new NetworkOnlyStrategy();
    default: {
      const unknownPolicy: never = policy;
      throw new Error(`Unknown cache policy: ${String(unknownPolicy)}`);
    }
  }
}
