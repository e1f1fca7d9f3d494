/**
 * In-process key-value cache with LRU eviction and per-entry TTL.
 *
 * Every operation is synchronous, so each call observes and leaves the cache
 * in a consistent state even when many asynchronous callers share it.
 */
export interface LruCache<T> {
  /**
   * Gets a live value and marks the key as most recently used.
   * An expired entry is removed and counted as a miss and an expiration.
   * @param key - The cache key
   * @returns The cached value or undefined if not found/expired
   * @throws InvalidArgumentError if key is empty
   */
  readonly get: (key: string) => T | undefined;

  /**
   * Stores a value as the most recently used entry.
   * Inserting a new key at capacity evicts the least recently used entry;
   * updating an existing key never evicts.
   * @param key - The cache key
   * @param value - The value to cache
   * @param ttlMs - Optional TTL in milliseconds; without one the entry never expires
   * @throws InvalidArgumentError if key is empty or ttlMs is negative
   */
  readonly set: (key: string, value: T, ttlMs?: number) => void;

  /**
   * Removes a key.
   * @param key - The cache key
   * @returns The removed value, or undefined if the key was absent or already expired
   * @throws InvalidArgumentError if key is empty
   */
  readonly delete: (key: string) => T | undefined;

  /**
   * Checks that a key is present and live without changing recency or hit/miss counts.
   * Expired entries are removed. An empty key returns false.
   */
  readonly exists: (key: string) => boolean;

  /**
   * Checks raw presence in the store. Does not look at expiry and has no side effects,
   * so an expired entry that has not been swept yet is still contained.
   */
  readonly contains: (key: string) => boolean;

  /**
   * Number of stored entries, including expired ones not yet swept.
   */
  readonly size: () => number;

  /**
   * Removes all entries. Statistics are kept.
   */
  readonly clear: () => void;

  /**
   * Snapshot of stored keys from least to most recently used.
   */
  readonly keys: () => readonly string[];

  /**
   * Snapshot of the cache's counters.
   */
  readonly stats: () => CacheStats;
}

/**
 * Cache performance counters.
 */
export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly expirations: number;
  /** Hit percentage with two decimals, e.g. "66.67%" */
  readonly hitRate: string;
  readonly size: number;
  readonly maxSize: number;
}

/**
 * Internal cache entry with optional expiration timestamp.
 */
export interface CacheEntry<T> {
  readonly value: T;
  /** Epoch milliseconds after which the entry is expired; undefined never expires */
  readonly expiresAt?: number | undefined;
}
