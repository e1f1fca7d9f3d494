/**
 * Shared test fixtures and constants.
 */

// ============================================================================
// Time Constants
// ============================================================================

/** One second in milliseconds */
export const ONE_SECOND_MS = 1000;

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * 60 * 1000;

/** Short TTL for testing expiration */
export const SHORT_TTL_MS = 100;

/** Fixed start time for fake timers (2024-01-01T00:00:00.000Z) */
export const FIXED_START_MS = Date.UTC(2024, 0, 1);

// ============================================================================
// Keys and Values
// ============================================================================

export const KEY_A = 'a';
export const KEY_B = 'b';
export const KEY_C = 'c';
export const KEY_D = 'd';

/**
 * Builds a key unique to a worker and iteration.
 */
export const workerKey = (workerId: number, index: number): string =>
  `key_${String(workerId)}_${String(index)}`;

/**
 * Builds the value stored under `workerKey(workerId, index)`.
 */
export const workerValue = (workerId: number, index: number): string =>
  `value_${String(workerId)}_${String(index)}`;
