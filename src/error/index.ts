/**
 * Error entrypoint: exports typed errors and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted via AbortController or `dispose()`. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a failure constructing a URL. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, type HTTPErrorOptions, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error representing a `429 Too Many Requests` response. */
export {
  getRateLimitError,
  isRateLimitError,
  parseRetryAfter,
  RateLimitError,
  type RateLimitErrorOptions,
} from './rateLimitError.js';
/** Error representing a successful response whose body is not the expected JSON. */
export { getResponseFormatError, isResponseFormatError, ResponseFormatError } from './responseFormatError.js';
/** Error representing a retry attempts exhausted. */
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
/** Error representing a retry attempt suppressed and exited from retrying further. */
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { formatIssues, getValidationError, isValidationError, ValidationError } from './validationError.js';
