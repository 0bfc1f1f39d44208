/**
 * Minimal console-shaped logger the client reports to. Pass `console` to see
 * every request, or any object with these methods to route it elsewhere.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/** Logger that drops everything; the default. */
export const noopLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
