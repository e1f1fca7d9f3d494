/**
 * Command dispatch for the cache CLI.
 *
 * @packageDocumentation
 */

import { runBenchmarks, type Timer } from './benchmark.js';
import { loadCliConfig } from './config.js';
import { runDemo, type Sleep } from './demo.js';
import { createLogger, type LogSink } from './logger.js';

/**
 * Commands understood by the CLI.
 */
export type Command = 'demo' | 'benchmark' | 'all';

const COMMANDS: readonly Command[] = ['demo', 'benchmark', 'all'];

const USAGE_LINES = [
  'Usage: npm run cli -- <command>',
  '  demo      - Run cache demo',
  '  benchmark - Run performance benchmarks',
  '  all       - Run demo and benchmarks',
] as const;

/**
 * Overrides for the CLI's side effects.
 */
export interface CliOptions {
  /** Environment to read configuration from (default: process.env) */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Console replacement for output */
  readonly sink?: LogSink;
  /** Wait used by the demo */
  readonly sleep?: Sleep;
  /** Clock used by the benchmarks */
  readonly timer?: Timer;
}

const isCommand = (value: string): value is Command =>
  COMMANDS.some((command) => command === value);

/**
 * Runs the CLI with the given arguments.
 *
 * @param args - Arguments after the program name
 * @param options - Overrides for environment, output and timing
 * @returns The process exit code
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(process.argv.slice(2));
 * ```
 */
export async function runCli(args: readonly string[], options: CliOptions = {}): Promise<number> {
  const logger = createLogger('cli', options.sink);
  const input = args[0];

  if (input === undefined) {
    for (const line of USAGE_LINES) {
      logger.info(line);
    }
    return 0;
  }

  const command = input.toLowerCase();
  if (!isCommand(command)) {
    logger.error(`Unknown command: ${command}`);
    for (const line of USAGE_LINES) {
      logger.info(line);
    }
    return 1;
  }

  const configResult = loadCliConfig(options.env ?? process.env);
  if (configResult.isErr()) {
    logger.error(`Invalid configuration: ${configResult.error.message}`);
    return 1;
  }
  const config = configResult.value;

  if (command === 'demo' || command === 'all') {
    await runDemo(config.demoMaxSize, createLogger('demo', options.sink), options.sleep);
  }

  if (command === 'benchmark' || command === 'all') {
    runBenchmarks(config.benchmark, createLogger('benchmark', options.sink), options.timer);
  }

  return 0;
}

/**
 * Logs an error that escaped {@link runCli}.
 *
 * @param error - The rejection reason
 * @param sink - Console replacement for output (default: console)
 */
export const reportFatal = (error: unknown, sink?: LogSink): void => {
  createLogger('cli', sink).error('Fatal error:', error);
};
