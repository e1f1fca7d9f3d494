/**
 * Throughput benchmarks for the cache.
 *
 * Each benchmark times a bulk sequence of `set`/`get` calls against a fresh
 * cache and reports operations per second.
 *
 * @packageDocumentation
 */

import { createLruCache, type CacheStats, type Clock, type LruCache } from '@larder/cache';
import type { BenchmarkConfig } from './config.js';
import type { Logger } from './logger.js';

/**
 * Monotonic clock in milliseconds.
 */
export type Timer = () => number;

/** TTL applied by the set benchmark */
const SET_TTL_MS = 1000;

/** TTL applied when pre-filling caches */
const FILL_TTL_MS = 10000;

/** TTL short enough that entries expire during the ttl benchmark */
const EXPIRING_TTL_MS = 1;

/** One in every SET_EVERY mixed operations is a set */
const SET_EVERY = 5;

/**
 * Names of the benchmarks, in the order they run.
 */
export type BenchmarkName = 'set' | 'get' | 'mixed' | 'ttl';

/**
 * Outcome of a single benchmark.
 */
export interface BenchmarkResult {
  readonly name: BenchmarkName;
  readonly operations: number;
  readonly durationMs: number;
  readonly opsPerSecond: number;
}

/**
 * Outcome of a full benchmark run.
 */
export interface BenchmarkSummary {
  readonly results: readonly BenchmarkResult[];
  readonly averageOpsPerSecond: number;
  /** Whether the average reached the configured target */
  readonly passed: boolean;
  /** Cache statistics after the ttl benchmark */
  readonly ttlStats: CacheStats;
}

const defaultTimer: Timer = () => performance.now();

const keyFor = (index: number): string => `key_${String(index)}`;

const valueFor = (index: number): string => `value_${String(index)}`;

const measure = (
  name: BenchmarkName,
  operations: number,
  timer: Timer,
  body: () => void
): BenchmarkResult => {
  const start = timer();
  body();
  const durationMs = timer() - start;
  const opsPerSecond =
    durationMs > 0 ? (operations / durationMs) * 1000 : Number.POSITIVE_INFINITY;
  return { name, operations, durationMs, opsPerSecond };
};

/**
 * Times `operations` sets with a TTL.
 */
export const benchmarkSet = (config: BenchmarkConfig, timer: Timer = defaultTimer): BenchmarkResult => {
  const cache = createLruCache<string>({ maxSize: config.cacheSize });

  return measure('set', config.operations, timer, () => {
    for (let i = 0; i < config.operations; i++) {
      cache.set(keyFor(i), valueFor(i), SET_TTL_MS);
    }
  });
};

const createFilledCache = (cacheSize: number): LruCache<string> => {
  const cache = createLruCache<string>({ maxSize: cacheSize });
  for (let i = 0; i < cacheSize; i++) {
    cache.set(keyFor(i), valueFor(i), FILL_TTL_MS);
  }
  return cache;
};

/**
 * Times `operations` gets cycling over a full cache.
 */
export const benchmarkGet = (config: BenchmarkConfig, timer: Timer = defaultTimer): BenchmarkResult => {
  const cache = createFilledCache(config.cacheSize);

  return measure('get', config.operations, timer, () => {
    for (let i = 0; i < config.operations; i++) {
      cache.get(keyFor(i % config.cacheSize));
    }
  });
};

/**
 * Times a mix of 20% sets and 80% gets over a full cache.
 */
export const benchmarkMixed = (
  config: BenchmarkConfig,
  timer: Timer = defaultTimer
): BenchmarkResult => {
  const cache = createFilledCache(config.cacheSize);

  return measure('mixed', config.operations, timer, () => {
    for (let i = 0; i < config.operations; i++) {
      const key = keyFor(i % config.cacheSize);
      if (i % SET_EVERY === 0) {
        cache.set(key, valueFor(i), FILL_TTL_MS);
      } else {
        cache.get(key);
      }
    }
  });
};

/**
 * Times set-then-get pairs with a 1ms TTL on a cache a tenth of the configured size.
 *
 * @param now - Clock the cache reads expiry times from (default: Date.now)
 * @returns The timing and the cache statistics afterwards
 */
export const benchmarkTtlExpiration = (
  config: BenchmarkConfig,
  timer: Timer = defaultTimer,
  now?: Clock
): { readonly result: BenchmarkResult; readonly stats: CacheStats } => {
  const cacheSize = Math.max(1, Math.floor(config.cacheSize / 10));
  const operations = Math.max(1, Math.floor(config.operations / 5));
  const cache = createLruCache<string>({ maxSize: cacheSize, now });

  const result = measure('ttl', operations, timer, () => {
    for (let i = 0; i < operations; i++) {
      const key = keyFor(i % cacheSize);
      cache.set(key, valueFor(i), EXPIRING_TTL_MS);
      cache.get(key);
    }
  });

  return { result, stats: cache.stats() };
};

const formatOps = (opsPerSecond: number): string =>
  Number.isFinite(opsPerSecond)
    ? Math.round(opsPerSecond).toLocaleString('en-US')
    : 'unmeasurable';

const status = (opsPerSecond: number, target: number): string =>
  opsPerSecond >= target ? 'PASS' : 'FAIL';

/**
 * Formats one summary line, e.g. `SET       :   45,000 ops/sec PASS`.
 */
export const formatSummaryLine = (label: string, opsPerSecond: number, target: number): string =>
  `${label.toUpperCase().padEnd(10)}: ${formatOps(opsPerSecond).padStart(10)} ops/sec ${status(opsPerSecond, target)}`;

/**
 * Runs every benchmark and logs the results and a PASS/FAIL summary.
 *
 * @param config - Benchmark sizing
 * @param logger - Destination for progress and summary lines
 * @param timer - Clock used for timing (default: performance.now)
 */
export function runBenchmarks(
  config: BenchmarkConfig,
  logger: Logger,
  timer: Timer = defaultTimer
): BenchmarkSummary {
  logger.info(
    `Running ${String(config.operations)} operations per benchmark (cache size ${String(config.cacheSize)})`
  );

  const results: BenchmarkResult[] = [];
  const report = (result: BenchmarkResult): void => {
    results.push(result);
    logger.info(
      `${result.name.toUpperCase()} operations: ${formatOps(result.opsPerSecond)} ops/sec (${result.durationMs.toFixed(3)}ms)`
    );
  };

  report(benchmarkSet(config, timer));
  report(benchmarkGet(config, timer));
  report(benchmarkMixed(config, timer));
  const ttl = benchmarkTtlExpiration(config, timer);
  report(ttl.result);
  logger.info(`TTL stats: ${JSON.stringify(ttl.stats)}`);

  const averageOpsPerSecond =
    results.reduce((sum, result) => sum + result.opsPerSecond, 0) / results.length;

  logger.info('SUMMARY');
  for (const result of results) {
    logger.info(formatSummaryLine(result.name, result.opsPerSecond, config.targetOpsPerSecond));
  }
  logger.info(formatSummaryLine('overall', averageOpsPerSecond, config.targetOpsPerSecond));

  return {
    results,
    averageOpsPerSecond,
    passed: averageOpsPerSecond >= config.targetOpsPerSecond,
    ttlStats: ttl.stats,
  };
}
