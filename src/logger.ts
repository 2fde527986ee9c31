/**
 * Logging
 *
 * The core only logs when asked to (tracing, depth-limit warnings). The
 * default logger writes to the console.
 */

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  debug: message => console.debug(message),
  warn: message => console.warn(message),
};

/**
 * A logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
