/**
 * Logging for the GDO client.
 *
 * Everything goes to stderr so stdout stays clean for JSON output.
 * Accepts console-like objects so tests can capture notices.
 */

export interface GdoLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const noop = (): void => {};

export function createConsoleLogger(verbose = false): GdoLogger {
  return {
    debug: verbose ? (message, ...args) => console.error("[gdo]", message, ...args) : noop,
    info: verbose ? (message, ...args) => console.error("[gdo]", message, ...args) : noop,
    warn: (message, ...args) => console.warn("[gdo]", message, ...args),
    error: (message, ...args) => console.error("[gdo]", message, ...args),
  };
}

export const defaultLogger: GdoLogger = createConsoleLogger();
