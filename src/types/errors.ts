/**
 * Global error types for the light monitor
 * Fatal startup errors and per-read transport errors
 */

/**
 * Base validation error for configuration problems
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the site (latitude, longitude, timezone) cannot be used
 * to compute sunrise and sunset
 */
export class SiteConfigError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'SiteConfigError';
  }
}

/**
 * Error raised when an open serial device stops delivering (closed or failed)
 */
export class TransportClosedError extends Error {
  readonly path: string;

  constructor(path: string) {
    super('Serial device ' + path + ' is no longer connected');
    this.name = 'TransportClosedError';
    this.path = path;
  }
}

/**
 * Error thrown when no candidate serial device could be opened
 */
export class TransportUnavailableError extends Error {
  readonly triedPaths: string[];

  constructor(triedPaths: string[]) {
    super('No valid serial port could be found! Tried the following - ' + triedPaths.join(', '));
    this.name = 'TransportUnavailableError';
    this.triedPaths = triedPaths;
  }
}

/**
 * Error thrown when a single line read does not complete in time
 */
export class ReadTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('No line received within ' + timeoutMs + 'ms');
    this.name = 'ReadTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Render an unknown thrown value as a log-friendly message
 * @param err - Caught value
 * @returns Error message or string form of the value
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
