/**
 * Larder - in-process LRU cache with per-entry TTL
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Cache Engine
// ============================================================================

export { createLruCache, formatHitRate } from './cache/index.js';
export type { LruCache, CacheStats, CacheEntry } from './cache/index.js';

// ============================================================================
// CORE: Errors
// ============================================================================

export {
  InvalidArgumentError,
  isInvalidArgumentError,
  createEmptyKeyError,
  createInvalidTtlError,
  createInvalidMaxSizeError,
} from './errors/index.js';
export type { InvalidArgumentCode } from './errors/index.js';

// ============================================================================
// ADVANCED: Option Validation
// ============================================================================

export { parseLruCacheOptions, lruCacheOptionsSchema, DEFAULT_MAX_SIZE } from './validation/index.js';
export type { Clock, LruCacheOptions, ResolvedLruCacheOptions } from './validation/index.js';
