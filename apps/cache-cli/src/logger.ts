/**
 * Tagged console logging for the CLI.
 *
 * @packageDocumentation
 */

/**
 * The subset of `console` the logger writes to.
 */
export interface LogSink {
  readonly log: (message: string) => void;
  readonly error: (message: string, ...details: unknown[]) => void;
}

/**
 * Logger that prefixes every line with its component tag.
 */
export interface Logger {
  /** Writes a progress or result line to stdout */
  readonly info: (message: string) => void;
  /** Writes a failure to stderr */
  readonly error: (message: string, cause?: unknown) => void;
}

/**
 * Creates a logger whose lines read `[larder:<tag>] message`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('demo');
 * logger.info('Setting values...'); // [larder:demo] Setting values...
 * ```
 */
export const createLogger = (tag: string, sink: LogSink = console): Logger => {
  const prefix = `[larder:${tag}]`;

  return {
    info: (message) => {
      sink.log(`${prefix} ${message}`);
    },
    error: (message, cause) => {
      if (cause === undefined) {
        sink.error(`${prefix} ${message}`);
      } else {
        sink.error(`${prefix} ${message}`, cause);
      }
    },
  };
};
