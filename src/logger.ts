/**
 * @module logger
 *
 * Logging seam. The library is silent unless a logger is supplied;
 * `console` satisfies the interface.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
