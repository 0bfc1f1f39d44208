import { safeWrap } from '../utils/wrap.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Extra details attached to an {@link HTTPError}. */
export interface HTTPErrorOptions extends ErrorOptions {
  /** Message taken from the API's `{ code, message }` error body, if any. */
  apiMessage?: string | null;
}

/**
 * Error representing an HTTP response with a non-2xx status code.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;
  /** Message reported by the API itself */
  #apiMessage: string | null;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message: string = `HTTP Error: ${response.status}`, opts?: HTTPErrorOptions) {
    const { apiMessage = null, ...errorOpts } = { ...opts };
    super(message, errorOpts);
    this.#response = response;
    this.#apiMessage = apiMessage;
  }

  /**
   * Response causing the HTTPError. Returns a clone while the body is still unread.
   */
  get response(): Response {
    const [err, clone] = safeWrap(() => this.#response.clone());
    if (err) {
      return this.#response;
    }

    return clone;
  }

  /** HTTP status code of the failed response */
  get status(): number {
    return this.#response.status;
  }

  /** Error message reported by the API, e.g. `row 99999 not found` */
  get apiMessage(): string | null {
    return this.#apiMessage;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
