/**
 * Cache option validation.
 *
 * @packageDocumentation
 */

export { parseLruCacheOptions, lruCacheOptionsSchema, DEFAULT_MAX_SIZE } from './options.js';
export type { Clock, LruCacheOptions, ResolvedLruCacheOptions } from './options.js';
