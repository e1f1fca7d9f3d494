import type { CacheStats } from './types.js';

/**
 * Mutable counters owned by a single cache instance.
 */
export interface CacheCounters {
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

/**
 * Creates a zeroed set of counters.
 */
export const createCounters = (): CacheCounters => ({
  hits: 0,
  misses: 0,
  evictions: 0,
  expirations: 0,
});

/**
 * Formats the hit rate as a percentage with two decimals.
 *
 * A rate that lies exactly halfway between two hundredths rounds to the even one.
 *
 * @example
 * ```typescript
 * formatHitRate(2, 1); // "66.67%"
 * formatHitRate(1, 31); // "3.12%"
 * formatHitRate(0, 0); // "0.00%"
 * ```
 */
export const formatHitRate = (hits: number, misses: number): string => {
  const total = hits + misses;
  const rate = total > 0 ? (hits / total) * 100 : 0;
  const scaled = rate * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    const even = floor % 2 === 0 ? floor : floor + 1;
    return `${(even / 100).toFixed(2)}%`;
  }
  return `${rate.toFixed(2)}%`;
};

/**
 * Builds a stats snapshot from the live counters.
 */
export const toCacheStats = (
  counters: Readonly<CacheCounters>,
  size: number,
  maxSize: number
): CacheStats => ({
  hits: counters.hits,
  misses: counters.misses,
  evictions: counters.evictions,
  expirations: counters.expirations,
  hitRate: formatHitRate(counters.hits, counters.misses),
  size,
  maxSize,
});
