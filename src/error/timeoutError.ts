import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  #timeoutMs: number | null;

  /** Creates a new instance of a TimeoutError, optionally with the elapsed timeout */
  constructor(message: string, timeoutMs: number | null = null, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeoutMs = timeoutMs;
  }

  /** Timeout that elapsed, in milliseconds, `null` when unknown */
  get timeoutMs(): number | null {
    return this.#timeoutMs;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
