import type { Clock } from '../types.js';
import type { Cache, CacheEntry } from './types.js';

/** Default TTL: 5 minutes */
const DEFAULT_TTL_MS = 5 * 60 * 1000;

/**
 * Creates an in-memory cache with TTL support.
 *
 * @param defaultTtlMs - Default TTL in milliseconds (default: 5 minutes)
 * @param clock - Time source (default: Date.now)
 *
 * @example
 * ```typescript
 * const cache = createMemoryCache<OAuthServerMetadata>(60 * 60 * 1000);
 * cache.set(metadataUrl, metadata);
 * cache.get(metadataUrl);
 * ```
 */
export const createMemoryCache = <T>(
  defaultTtlMs: number = DEFAULT_TTL_MS,
  clock: Clock = Date.now
): Cache<T> => {
  const store = new Map<string, CacheEntry<T>>();

  const get = (key: string): T | undefined => {
    const entry = store.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (clock() >= entry.expiresAt) {
      store.delete(key);
      return undefined;
    }

    return entry.value;
  };

  const set = (key: string, value: T, ttlMs?: number): void => {
    const now = clock();

    // Drop expired entries so the map does not grow without bound
    for (const [k, entry] of store.entries()) {
      if (now >= entry.expiresAt) {
        store.delete(k);
      }
    }

    store.set(key, { value, expiresAt: now + (ttlMs ?? defaultTtlMs) });
  };

  return {
    get,
    set,
    delete: (key: string): boolean => store.delete(key),
    clear: (): void => {
      store.clear();
    },
  };
};
