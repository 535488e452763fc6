// Interfaces
export type {
  Duration,
  CacheEntry,
  CacheStats,
  PageCacheStore,
} from './cache-interfaces.js';

// Utils
export { parseDuration, isValidDuration } from './duration-utils.js';
export { deriveCacheKey, describeCacheKey } from './cache-key.js';

// Adapters
export { MemoryPageCache, type MemoryPageCacheOptions } from './adapters/memory-page-cache.js';
export { KeyvPageCache } from './adapters/keyv-page-cache.js';
