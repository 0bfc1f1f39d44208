import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a successful response body is not the JSON we expected.
 */
export class ResponseFormatError extends Error {
  /** ResponseFormatError error-name */
  static name = 'ResponseFormatError';
  /** Content-Type the server answered with */
  #contentType: string | null;

  /** Creates a new instance of a ResponseFormatError with the received content type */
  constructor(message: string, contentType: string | null, opts?: ErrorOptions) {
    super(message, opts);
    this.#contentType = contentType;
  }

  /** Content-Type the server answered with, `null` when missing */
  get contentType(): string | null {
    return this.#contentType;
  }
}

/**
 * Type guard for {@link ResponseFormatError}.
 */
export function isResponseFormatError(error: unknown): error is ResponseFormatError {
  return isErrorType(ResponseFormatError, error);
}

/**
 * Extract a {@link ResponseFormatError} from an unknown error value, following nested causes.
 */
export function getResponseFormatError(error: unknown): null | ResponseFormatError {
  return unwrapErrorType(ResponseFormatError, error);
}
