/**
 * Construction options for the LRU cache.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import {
  InvalidArgumentError,
  createInvalidMaxSizeError,
} from '../errors/errors.js';

/** Default capacity when none is given */
export const DEFAULT_MAX_SIZE = 1000;

/**
 * Clock returning the current time in epoch milliseconds.
 */
export type Clock = () => number;

/**
 * Schema for the options accepted by `createLruCache`.
 */
export const lruCacheOptionsSchema = z.object({
  maxSize: z
    .number({ invalid_type_error: 'maxSize must be a number' })
    .int({ message: 'maxSize must be an integer' })
    .positive({ message: 'maxSize must be positive' })
    .default(DEFAULT_MAX_SIZE),
  now: z
    .custom<Clock>((value) => typeof value === 'function', { message: 'now must be a function' })
    .optional(),
});

/**
 * Options accepted by `createLruCache`.
 */
export type LruCacheOptions = z.input<typeof lruCacheOptionsSchema>;

/**
 * Options after validation and defaulting.
 */
export interface ResolvedLruCacheOptions {
  readonly maxSize: number;
  readonly now: Clock;
}

/**
 * Validates cache options and fills in defaults.
 *
 * @param input - Raw options, usually the argument given to `createLruCache`
 * @returns The resolved options, or the InvalidArgumentError describing the first problem
 *
 * @example
 * ```typescript
 * const result = parseLruCacheOptions({ maxSize: 0 });
 * if (result.isErr()) {
 *   result.error.code; // 'INVALID_MAX_SIZE'
 * }
 * ```
 */
export const parseLruCacheOptions = (
  input: unknown
): Result<ResolvedLruCacheOptions, InvalidArgumentError> => {
  const parsed = lruCacheOptionsSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0];

    if (field === 'maxSize') {
      return err(createInvalidMaxSizeError(issue?.message));
    }

    return err(
      new InvalidArgumentError(
        'INVALID_OPTIONS',
        typeof field === 'string' ? field : 'options',
        issue?.message
      )
    );
  }

  return ok({
    maxSize: parsed.data.maxSize,
    now: parsed.data.now ?? ((): number => Date.now()),
  });
};
