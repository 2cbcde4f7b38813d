/**
 * Custom error classes for better error handling
 */

/**
 * Base error class for application-specific errors
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors (env vars, CLI options, watch list file)
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
  }
}

export type FetchErrorKind = 'network' | 'http' | 'rate-limit' | 'api' | 'malformed' | 'unknown';

/**
 * The explorer could not tell us the latest transfer for one address.
 * Recovered per address: the cycle skips it and moves on.
 */
export class FetchError extends AppError {
  constructor(
    public readonly address: string,
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly status?: number,
    public readonly cause?: Error
  ) {
    super(`Fetch error (${kind}) for ${address}: ${message}`);
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A notification sink rejected a change event
 */
export class NotifyError extends AppError {
  constructor(
    public readonly address: string,
    message: string,
    public readonly cause?: Error
  ) {
    super(`Notify error for ${address}: ${message}`);
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * The persisted ledger exists but cannot be read as address -> hash.
 * Not recovered silently: the run stops before any address is fetched.
 */
export class CorruptStateError extends AppError {
  constructor(
    public readonly path: string,
    message: string,
    public readonly cause?: Error
  ) {
    super(`Corrupt state in ${path}: ${message}`);
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * The ledger file exists but the process cannot read it (permissions, a directory, I/O).
 * Fatal like CorruptStateError; the file contents are not at fault.
 */
export class StateReadError extends AppError {
  constructor(
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(`Cannot read state from ${path}${cause ? `: ${cause.message}` : ''}`);
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * The ledger could not be written back
 */
export class PersistError extends AppError {
  constructor(
    public readonly path: string,
    message: string,
    public readonly cause?: Error
  ) {
    super(`Persist error for ${path}: ${message}`);
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * True for a filesystem "no such file or directory" error
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
