/**
 * Minimal debug logging used by the parser pipeline.
 *
 * @module core/logger
 */

/** Receiver of debug messages. */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
}

/** Logger that discards everything. Used when no logger is configured. */
export const silentLogger: Logger = {
  debug: () => undefined,
};

/**
 * Create a logger that writes through `console.debug` with a `[tag]` prefix.
 *
 * @example
 * ```ts
 * const doc = parseDocument(source, { logger: createConsoleLogger() });
 * // [metamark] metadata resolved as yaml { keys: 2 }
 * ```
 */
export function createConsoleLogger(tag = 'metamark'): Logger {
  return {
    debug(message: string, ...details: unknown[]): void {
      console.debug(`[${tag}]`, message, ...details);
    },
  };
}
