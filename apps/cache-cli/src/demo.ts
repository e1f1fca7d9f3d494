/**
 * Walkthrough of the cache API: set with TTLs, read back, print stats,
 * then wait for the shortest TTL to lapse.
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'node:timers/promises';
import { createLruCache, type CacheStats } from '@larder/cache';
import type { Logger } from './logger.js';

/**
 * Waits for the given number of milliseconds.
 */
export type Sleep = (ms: number) => Promise<void>;

/** Quotes stored by the demo, with their TTLs */
const DEMO_QUOTES = [
  { symbol: 'GOLD-USD', price: 2034.55, ttlMs: 5000 },
  { symbol: 'SILVER-USD', price: 23.18, ttlMs: 10000 },
  { symbol: 'COPPER-USD', price: 3.87, ttlMs: 3000 },
] as const;

/** Long enough for COPPER-USD to expire and short enough for the others to survive */
const EXPIRY_WAIT_MS = 4000;

/**
 * What the demo observed.
 */
export interface DemoResult {
  /** Value of the shortest-lived quote after the wait (expected: undefined) */
  readonly expiredValue: number | undefined;
  readonly stats: CacheStats;
}

const formatPrice = (price: number | undefined): string =>
  price === undefined ? 'undefined' : `$${String(price)}`;

/**
 * Runs the demo.
 *
 * @param maxSize - Capacity of the demo cache
 * @param logger - Destination for the demo's output
 * @param sleep - Wait used for the expiry step (default: timers/promises)
 */
export async function runDemo(
  maxSize: number,
  logger: Logger,
  sleep: Sleep = async (ms) => {
    await delay(ms);
  }
): Promise<DemoResult> {
  logger.info('Cache demo');

  const cache = createLruCache<number>({ maxSize });

  logger.info('Setting values...');
  for (const quote of DEMO_QUOTES) {
    cache.set(quote.symbol, quote.price, quote.ttlMs);
  }

  logger.info('Getting values...');
  for (const quote of DEMO_QUOTES) {
    logger.info(`${quote.symbol}: ${formatPrice(cache.get(quote.symbol))}`);
  }

  logger.info('Cache stats:');
  for (const [name, value] of Object.entries(cache.stats())) {
    logger.info(`  ${name}: ${String(value)}`);
  }

  logger.info('Testing expiration...');
  await sleep(EXPIRY_WAIT_MS);
  const expiredValue = cache.get('COPPER-USD');
  logger.info(`COPPER-USD after ${String(EXPIRY_WAIT_MS / 1000)}s: ${formatPrice(expiredValue)}`);

  logger.info('Demo complete!');

  return { expiredValue, stats: cache.stats() };
}
