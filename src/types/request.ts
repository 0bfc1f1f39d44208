import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; a `null` value removes the header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/** HTTP status codes the retry options can name. */
export type StatusCode =
  | 400
  | 401
  | 403
  | 404
  | 405
  | 406
  | 408
  | 409
  | 410
  | 413
  | 414
  | 415
  | 422
  | 425
  | 429
  | 500
  | 501
  | 502
  | 503
  | 504
  | 505;

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers' | 'signal'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options for retry logic and standard */
export type RetryOptions = {
  /**
   * The number of times to retry failed requests.
   * @default 0
   */
  limit?: number;
  /**
   * Time to wait before retrying, in milliseconds.
   * @default 1000
   */
  timeout?: number;
} & (
  | {
      /**
       * The HTTP status codes allowed to retry.
       * @default: [408, 429, 500, 501, 502, 503, 504]
       */
      statusCodes?: StatusCode[];
      ignoreStatusCodes?: never;
    }
  | {
      /**
       * The HTTP status codes skipping retries.
       */
      ignoreStatusCodes?: StatusCode[];
      statusCodes?: never;
    }
);

/** Request-level options that sit above the raw fetch options. */
export interface RequestOptions {
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Retry behavior (object for fine-grained control or number for attempt count). */
  retry?: RetryOptions | number;
}

/** Per-call options accepted by every client method. */
export type Options = Pick<FetchOptions, 'headers' | 'signal'> & RequestOptions;

/** Contract for HTTP client implementations used by the API client. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
