/**
 * Error types raised by the cache's public API.
 *
 * @packageDocumentation
 */

/**
 * Error codes for rejected arguments.
 */
export type InvalidArgumentCode = 'EMPTY_KEY' | 'INVALID_TTL' | 'INVALID_MAX_SIZE' | 'INVALID_OPTIONS';

/**
 * Default error messages for each error code.
 */
const defaultMessages: Record<InvalidArgumentCode, string> = {
  EMPTY_KEY: 'Key cannot be empty',
  INVALID_TTL: 'TTL must be non-negative',
  INVALID_MAX_SIZE: 'maxSize must be a positive integer',
  INVALID_OPTIONS: 'Cache options are invalid',
};

/**
 * Error thrown when a cache operation receives an argument it cannot accept.
 *
 * This is the only error the cache raises. Missing keys, expired keys and
 * inserts at capacity are normal outcomes reported through return values
 * and counters. The cache is left untouched when this error is thrown.
 *
 * @example
 * ```typescript
 * try {
 *   cache.set('', 'value');
 * } catch (error) {
 *   if (error instanceof InvalidArgumentError) {
 *     console.error(`${error.argument}: ${error.message}`); // "key: Key cannot be empty"
 *   }
 * }
 * ```
 */
export class InvalidArgumentError extends Error {
  /**
   * Error code describing which rule the argument broke.
   */
  readonly code: InvalidArgumentCode;

  /**
   * Name of the offending parameter (`key`, `ttlMs`, `maxSize`, ...).
   */
  readonly argument: string;

  constructor(code: InvalidArgumentCode, argument: string, message?: string) {
    super(message ?? defaultMessages[code]);
    this.name = 'InvalidArgumentError';
    this.code = code;
    this.argument = argument;
  }
}

/**
 * Type guard for InvalidArgumentError.
 */
export const isInvalidArgumentError = (value: unknown): value is InvalidArgumentError =>
  value instanceof InvalidArgumentError;

/**
 * Creates the error raised for an empty key.
 */
export const createEmptyKeyError = (): InvalidArgumentError =>
  new InvalidArgumentError('EMPTY_KEY', 'key');

/**
 * Creates the error raised for a negative or non-numeric TTL.
 *
 * @param ttlMs - The rejected TTL
 */
export const createInvalidTtlError = (ttlMs: number): InvalidArgumentError =>
  new InvalidArgumentError(
    'INVALID_TTL',
    'ttlMs',
    `TTL must be non-negative, got ${String(ttlMs)}`
  );

/**
 * Creates the error raised for a capacity that is not a positive integer.
 *
 * @param message - Detail from the options validator
 */
export const createInvalidMaxSizeError = (message?: string): InvalidArgumentError =>
  new InvalidArgumentError('INVALID_MAX_SIZE', 'maxSize', message);
