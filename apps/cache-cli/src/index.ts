#!/usr/bin/env node

/**
 * Cache CLI
 *
 * Demonstrates the cache API and measures its throughput:
 * - `npm run cli -- demo` walks through set/get/stats and TTL expiry
 * - `npm run cli -- benchmark` times bulk set/get sequences
 * - `npm run cli -- all` runs both
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { reportFatal, runCli } from './cli.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    reportFatal(error);
    process.exit(1);
  });
