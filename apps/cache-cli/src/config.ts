/**
 * Cache CLI Configuration Module
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/** Default capacity of the demo cache */
const DEFAULT_DEMO_MAX_SIZE = 5;

/** Default capacity of the benchmark caches */
const DEFAULT_BENCH_CACHE_SIZE = 10000;

/** Default number of operations per benchmark */
const DEFAULT_BENCH_OPERATIONS = 50000;

/** Default throughput a benchmark must reach to pass */
const DEFAULT_BENCH_TARGET_OPS = 30000;

/**
 * Benchmark sizing.
 */
export interface BenchmarkConfig {
  /** Capacity of the cache under test */
  readonly cacheSize: number;
  /** Operations timed per benchmark */
  readonly operations: number;
  /** Ops/sec at or above which a benchmark passes */
  readonly targetOpsPerSecond: number;
}

/**
 * Cache CLI configuration.
 */
export interface CliConfig {
  /** Capacity of the cache used by the demo */
  readonly demoMaxSize: number;
  readonly benchmark: BenchmarkConfig;
}

/**
 * Error returned when an environment variable holds an unusable value.
 */
export interface ConfigError {
  readonly code: 'INVALID_CONFIG';
  /** Environment variable that failed validation */
  readonly variable: string;
  readonly message: string;
}

const positiveInteger = (variable: string, fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : Number(value)),
    z
      .number({ invalid_type_error: `${variable} must be a number` })
      .int({ message: `${variable} must be an integer` })
      .positive({ message: `${variable} must be positive` })
      .default(fallback)
  );

const envSchema = z.object({
  LARDER_DEMO_MAX_SIZE: positiveInteger('LARDER_DEMO_MAX_SIZE', DEFAULT_DEMO_MAX_SIZE),
  LARDER_BENCH_CACHE_SIZE: positiveInteger('LARDER_BENCH_CACHE_SIZE', DEFAULT_BENCH_CACHE_SIZE),
  LARDER_BENCH_OPERATIONS: positiveInteger('LARDER_BENCH_OPERATIONS', DEFAULT_BENCH_OPERATIONS),
  LARDER_BENCH_TARGET_OPS: positiveInteger('LARDER_BENCH_TARGET_OPS', DEFAULT_BENCH_TARGET_OPS),
});

/**
 * Creates the CLI configuration from environment variables.
 *
 * Optional env vars (all positive integers):
 * - LARDER_DEMO_MAX_SIZE: demo cache capacity (default: 5)
 * - LARDER_BENCH_CACHE_SIZE: benchmark cache capacity (default: 10000)
 * - LARDER_BENCH_OPERATIONS: operations per benchmark (default: 50000)
 * - LARDER_BENCH_TARGET_OPS: ops/sec needed to pass (default: 30000)
 *
 * @param env - Environment to read (default: process.env)
 * @returns The configuration, or the first invalid variable
 */
export function loadCliConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): Result<CliConfig, ConfigError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path[0];
    return err({
      code: 'INVALID_CONFIG',
      variable: typeof variable === 'string' ? variable : 'environment',
      message: issue?.message ?? 'Invalid configuration',
    });
  }

  return ok({
    demoMaxSize: parsed.data.LARDER_DEMO_MAX_SIZE,
    benchmark: {
      cacheSize: parsed.data.LARDER_BENCH_CACHE_SIZE,
      operations: parsed.data.LARDER_BENCH_OPERATIONS,
      targetOpsPerSecond: parsed.data.LARDER_BENCH_TARGET_OPS,
    },
  });
}
