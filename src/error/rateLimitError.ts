import { HTTPError, type HTTPErrorOptions } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options for {@link RateLimitError}. */
export interface RateLimitErrorOptions extends HTTPErrorOptions {
  /** Seconds the API asked us to wait, from `Retry-After`. */
  retryAfter?: number | null;
}

/**
 * Error representing a `429 Too Many Requests` response.
 */
export class RateLimitError extends HTTPError {
  /** RateLimitError error-name */
  static name = 'RateLimitError';
  /** Seconds to wait before the next request, if the API said so */
  #retryAfter: number | null;

  /** Creates a new instance of a RateLimitError */
  constructor(response: Response, message = 'error rate limit exceeded', opts?: RateLimitErrorOptions) {
    const { retryAfter = null, ...httpOpts } = { ...opts };
    super(response, message, httpOpts);
    this.#retryAfter = retryAfter;
  }

  /** Seconds to wait before the next request, or `null` when unknown */
  get retryAfter(): number | null {
    return this.#retryAfter;
  }
}

/**
 * Parses a `Retry-After` header value (delta-seconds or HTTP-date) into seconds from `now`.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }

  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Type guard for {@link RateLimitError}.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return isErrorType(RateLimitError, error);
}

/**
 * Extract a {@link RateLimitError} from an unknown error value, following nested causes.
 */
export function getRateLimitError(error: unknown): null | RateLimitError {
  return unwrapErrorType(RateLimitError, error);
}
