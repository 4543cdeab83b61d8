/**
 * Logger interface for layer and scheduler diagnostics.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages. Used whenever no `logger`
 * option is given.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
