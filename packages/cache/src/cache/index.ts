/**
 * LRU + TTL cache engine.
 *
 * @packageDocumentation
 */

export { createLruCache } from './lru-cache.js';
export { formatHitRate } from './stats.js';
export type { LruCache, CacheStats, CacheEntry } from './types.js';
