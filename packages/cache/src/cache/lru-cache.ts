import { createEmptyKeyError, createInvalidTtlError } from '../errors/errors.js';
import { parseLruCacheOptions, type LruCacheOptions } from '../validation/options.js';
import { createCounters, toCacheStats } from './stats.js';
import type { CacheEntry, CacheStats, LruCache } from './types.js';

const isValidKey = (key: string): boolean => typeof key === 'string' && key.length > 0;

const isExpired = <T>(entry: CacheEntry<T>, now: number): boolean =>
  entry.expiresAt !== undefined && now > entry.expiresAt;

/**
 * Creates an in-memory cache with LRU eviction and optional per-entry TTL.
 *
 * The store is a `Map` whose insertion order doubles as the recency order:
 * the first key is the least recently used, the last the most recently used.
 * Expiration is lazy; expired entries keep their slot until they are touched
 * or evicted.
 *
 * @param options - Capacity (default: 1000) and clock (default: Date.now)
 * @returns An LruCache instance
 * @throws InvalidArgumentError if maxSize is not a positive integer
 *
 * @example
 * ```typescript
 * const cache = createLruCache<number>({ maxSize: 1000 });
 * cache.set('EUR-USD', 1.0842, 5000); // 5 second TTL
 * cache.get('EUR-USD'); // 1.0842
 * cache.stats().hitRate; // "100.00%"
 * ```
 */
export const createLruCache = <T>(options: LruCacheOptions = {}): LruCache<T> => {
  const parsed = parseLruCacheOptions(options);
  if (parsed.isErr()) {
    throw parsed.error;
  }

  const { maxSize, now } = parsed.value;
  const store = new Map<string, CacheEntry<T>>();
  const counters = createCounters();

  // Re-inserting moves the key to the most recently used end
  const touch = (key: string, entry: CacheEntry<T>): void => {
    store.delete(key);
    store.set(key, entry);
  };

  // Expired victims still count as evictions, not expirations
  const evictLeastRecentlyUsed = (): void => {
    const oldest = store.keys().next();
    if (!oldest.done) {
      store.delete(oldest.value);
      counters.evictions += 1;
    }
  };

  const get = (key: string): T | undefined => {
    if (!isValidKey(key)) {
      throw createEmptyKeyError();
    }

    const entry = store.get(key);
    if (entry === undefined) {
      counters.misses += 1;
      return undefined;
    }

    if (isExpired(entry, now())) {
      store.delete(key);
      counters.misses += 1;
      counters.expirations += 1;
      return undefined;
    }

    touch(key, entry);
    counters.hits += 1;
    return entry.value;
  };

  const set = (key: string, value: T, ttlMs?: number): void => {
    if (!isValidKey(key)) {
      throw createEmptyKeyError();
    }

    if (ttlMs !== undefined && (Number.isNaN(ttlMs) || ttlMs < 0)) {
      throw createInvalidTtlError(ttlMs);
    }

    const entry: CacheEntry<T> = {
      value,
      expiresAt: ttlMs === undefined ? undefined : now() + ttlMs,
    };

    if (store.has(key)) {
      store.delete(key);
    } else if (store.size >= maxSize) {
      evictLeastRecentlyUsed();
    }

    store.set(key, entry);
  };

  const deleteKey = (key: string): T | undefined => {
    if (!isValidKey(key)) {
      throw createEmptyKeyError();
    }

    const entry = store.get(key);
    if (entry === undefined) {
      return undefined;
    }

    store.delete(key);

    if (isExpired(entry, now())) {
      counters.expirations += 1;
      return undefined;
    }

    return entry.value;
  };

  const exists = (key: string): boolean => {
    if (!isValidKey(key)) {
      return false;
    }

    const entry = store.get(key);
    if (entry === undefined) {
      return false;
    }

    if (isExpired(entry, now())) {
      store.delete(key);
      counters.expirations += 1;
      return false;
    }

    return true;
  };

  const contains = (key: string): boolean => store.has(key);

  const size = (): number => store.size;

  const clear = (): void => {
    store.clear();
  };

  const keys = (): readonly string[] => [...store.keys()];

  const stats = (): CacheStats => toCacheStats(counters, store.size, maxSize);

  return {
    get,
    set,
    delete: deleteKey,
    exists,
    contains,
    size,
    clear,
    keys,
    stats,
  };
};
