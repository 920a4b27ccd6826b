/**
 * Console logger used at the render boundary
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  // Print debug lines (default: false)
  debug?: boolean;
  // Prefix for every line (default: "[proto3-builder]")
  prefix?: string;
}

export const DEFAULT_LOG_PREFIX = "[proto3-builder]";

/**
 * Create a logger writing through console
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { debug = false, prefix = DEFAULT_LOG_PREFIX } = options;

  return {
    debug: (...args) => {
      if (debug) console.log(prefix, ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}
