import { createHttpError } from '../error/createHttpError.js';
import type { FetchOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export type FetchClientOptions = Pick<FetchOptions, 'headers'>;

/**
 * Thin wrapper around the global `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * Network failures resolve to an `Error` wrapping the cause, non-2xx
   * responses to an `HTTPError` (`RateLimitError` for 429).
   *
   * @param endpoint - Relative endpoint path (e.g. `sheet/Item`).
   * @param opts - Request options merged with the client's defaults.
   */
  public async get(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    const [errHeaders, headers] = safeWrap(() => new Headers(mergeHeaderOptions(this.#opts.headers, opts.headers)));
    if (errHeaders) {
      return [new Error('error building headers in fetchClient', { cause: errHeaders }), null];
    }

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(endpoint), {
        method: 'GET',
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error('error wrapping GET request in fetchClient', { cause: err }), null];
    }

    if (!res.ok) {
      return [await createHttpError(res, 'error in GET request in fetchClient'), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint into a single URL string, without a doubled `/`.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
