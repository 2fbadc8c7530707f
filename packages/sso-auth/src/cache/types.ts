/**
 * Key-value cache with per-entry expiry.
 * Holds discovered provider metadata; never tokens.
 */
export interface Cache<T> {
  /**
   * Gets a value from the cache.
   * @returns The cached value, or undefined if missing or expired
   */
  readonly get: (key: string) => T | undefined;

  /**
   * Sets a value in the cache.
   * @param ttlMs - Optional TTL in milliseconds (overrides the default)
   */
  readonly set: (key: string, value: T, ttlMs?: number) => void;

  /**
   * Deletes a value from the cache.
   * @returns true if the key existed
   */
  readonly delete: (key: string) => boolean;

  readonly clear: () => void;
}

/**
 * Internal cache entry with expiration timestamp (epoch ms).
 */
export interface CacheEntry<T> {
  readonly value: T;
  readonly expiresAt: number;
}
