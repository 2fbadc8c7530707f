export { createMemoryCache } from './memory-cache.js';
export type { Cache, CacheEntry } from './types.js';
