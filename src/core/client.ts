import type { StandardSchemaV1 } from '@standard-schema/spec';
import { AbortError, isAbortError } from '../error/abortError.js';
import { createHttpError } from '../error/createHttpError.js';
import { HTTPError } from '../error/httpError.js';
import { getRateLimitError } from '../error/rateLimitError.js';
import { isResponseFormatError } from '../error/responseFormatError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import {
  assetSearchSchema,
  cursorSearchSchema,
  rowSearchSchema,
  rowsSearchSchema,
  searchResponseSchema,
  searchSearchSchema,
  sheetRowResponseSchema,
  sheetRowsResponseSchema,
  sheetsResponseSchema,
  versionOnlySearchSchema,
  versionsResponseSchema,
} from '../models/schemas.js';
import type { SearchResults } from '../models/searchResults.js';
import type { AssetFormat, RowId, SheetRowResult, SheetRows } from '../models/types.js';
import type { QueryBuilder } from '../query/queryBuilder.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  Options,
  RequestOptions,
  StatusCode,
} from '../types/request.js';
import { constructUrl, type UrlParams } from '../utils/constructUrl.js';
import type { SearchParams } from '../utils/encodeSearchParams.js';
import { getJsonData } from '../utils/getJsonData.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type {
  AssetOptions,
  Config,
  MapOptions,
  RequestDefaults,
  RowOptions,
  RowsOptions,
  SearchNextOptions,
} from './types.js';

/** Public xivapi v2 endpoint. */
export const DEFAULT_BASE_URL = 'https://v2.xivapi.com/api';

/** Mime types asked for per asset format. */
const ASSET_MIME_TYPES: Record<AssetFormat, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  webp: 'image/webp',
};

/** Configuration for constructing a {@link XivApiClient}, extends {@link Config}. */
export interface XivApiClientProps extends Config {
  /**
   * Base URL every endpoint path is resolved against.
   * @default 'https://v2.xivapi.com/api'
   */
  baseUrl?: string;
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

/**
 * Client for the xivapi v2 game-data API:
 * - builds endpoint URLs and validates their query parameters,
 * - performs requests via a pluggable provider with timeout and optional retries,
 * - validates every JSON response and maps it to typed results.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}; none of them throw.
 *
 * @example
 * const client = new XivApiClient({ defaults: { language: 'en' } });
 * const [err, row] = await client.getSheetRow('Item', 12056, { fields: ['Name'] });
 */
export class XivApiClient {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Default request-level options (timeout, retry). */
  #requestOpts: RequestOptions;
  /** Default HTTP status codes to retry on when unspecified. */
  #defaultRetryCodes: StatusCode[] = [408, 429, 500, 501, 502, 503, 504];
  /** Default request timeout in milliseconds. */
  #defaultTimeout = 60_000;
  /** Base URL prefix applied to all endpoints. */
  #baseUrl: string;
  /** Default headers applied to every request (merged with per-call headers). */
  #defaultHeaders: Record<string, string>;
  /** Language/version/schema applied to data requests. */
  #defaults: RequestDefaults;
  /** Sink for request logs. */
  #logger: Logger;
  /** Aborted by `dispose()`; merged into every request */
  #disposeController = new AbortController();

  /**
   * Creates a client that wires together the fetch provider, defaults and logger.
   */
  constructor({
    baseUrl = DEFAULT_BASE_URL,
    fetchProvider = FetchClient,
    fetchOpts,
    defaults,
    logger = noopLogger,
  }: XivApiClientProps = {}) {
    const { timeout, retry, headers } = { ...fetchOpts };

    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
    this.#requestOpts = { timeout, retry };
    this.#defaults = { ...defaults };
    this.#logger = logger;
    this.#defaultHeaders = mergeHeaderOptions({ Accept: 'application/json' }, headers);
    this.#fetchClient = new fetchProvider(this.#baseUrl, { headers: this.#defaultHeaders });
  }

  /**
   * Updates request options, defaults and logger at runtime and propagates headers to the provider.
   */
  config(opts: Config) {
    const { fetchOpts, defaults, logger } = opts;

    if (defaults) {
      this.#defaults = { ...this.#defaults, ...defaults };
    }

    if (logger) {
      this.#logger = logger;
    }

    if (!fetchOpts) {
      return;
    }

    const { timeout, retry, headers } = fetchOpts;
    if (timeout !== undefined) {
      this.#requestOpts.timeout = timeout;
    }

    if (retry !== undefined) {
      this.#requestOpts.retry = retry;
    }

    if (headers) {
      this.#defaultHeaders = mergeHeaderOptions(this.#defaultHeaders, headers);
      this.#fetchClient.config({ headers: this.#defaultHeaders });
    }
  }

  /**
   * Aborts in-flight requests, cuts pending retry waits short and releases the provider.
   * Requests started afterwards fail with an {@link AbortError}.
   */
  dispose() {
    this.#disposeController.abort(new AbortError('client was disposed'));
    this.#fetchClient.dispose?.();
  }

  /**
   * Lists the names of every sheet the API can read.
   */
  getSheets(opts: Options = {}): SafeWrapAsync<Error, string[]> {
    return this.#fetchJson('getSheets', '/sheet', null, undefined, sheetsResponseSchema, opts);
  }

  /**
   * Reads a single row of a sheet.
   *
   * @param sheet - Sheet name, e.g. `Item`.
   * @param row - Row id, or `row:subrow` on subrow sheets.
   */
  getSheetRow(sheet: string, row: RowId, opts: RowOptions = {}): SafeWrapAsync<Error, SheetRowResult> {
    const { fields, transients, language, version, schema, ...options } = opts;
    return this.#fetchJson(
      'getSheetRow',
      '/sheet/{sheet}/{row}',
      {
        $path: { sheet, row },
        $search: {
          fields,
          transient: transients,
          ...this.#withDefaults({ language, version, schema }),
        },
      },
      rowSearchSchema,
      sheetRowResponseSchema,
      options,
    );
  }

  /**
   * Reads several rows of a sheet: the listed `rows`, or a page of rows starting `after` a row id.
   */
  getSheetRows(sheet: string, opts: RowsOptions = {}): SafeWrapAsync<Error, SheetRows> {
    const { rows, after, limit, fields, transients, language, version, schema, ...options } = opts;
    return this.#fetchJson(
      'getSheetRows',
      '/sheet/{sheet}',
      {
        $path: { sheet },
        $search: {
          rows,
          after,
          limit,
          fields,
          transient: transients,
          ...this.#withDefaults({ language, version, schema }),
        },
      },
      rowsSearchSchema,
      sheetRowsResponseSchema,
      options,
    );
  }

  /**
   * Searches one or more sheets. Unset language/version/schema fall back to the client defaults.
   * Use {@link XivApiClient.searchNext} with `results.next` for the following page.
   */
  search(query: QueryBuilder, opts: Options = {}): SafeWrapAsync<Error, SearchResults> {
    const params = query.toParams();
    return this.#fetchJson(
      'search',
      '/search',
      {
        $search: {
          ...this.#withDefaults({ language: params.language, version: params.version, schema: params.schema }),
          ...params,
        },
      },
      searchSearchSchema,
      searchResponseSchema,
      opts,
    );
  }

  /**
   * Fetches the page of a previous search that `cursor` points at.
   */
  searchNext(cursor: string, opts: SearchNextOptions = {}): SafeWrapAsync<Error, SearchResults> {
    const { limit, ...options } = opts;
    return this.#fetchJson(
      'searchNext',
      '/search',
      { $search: { cursor, limit } },
      cursorSearchSchema,
      searchResponseSchema,
      options,
    );
  }

  /**
   * Lists the game versions the API has data for; each entry holds every name of one version.
   */
  getVersions(opts: Options = {}): SafeWrapAsync<Error, string[][]> {
    return this.#fetchJson('getVersions', '/version', null, undefined, versionsResponseSchema, opts);
  }

  /**
   * Downloads a game texture converted to an image.
   *
   * @param path - Game path of the texture, e.g. `ui/icon/051000/051474_hr1.tex`.
   */
  getAsset(path: string, opts: AssetOptions = {}): SafeWrapAsync<Error, Blob> {
    const { format = 'png', version = this.#defaults.version, ...options } = opts;
    return this.#download(
      'getAsset',
      '/asset',
      { $search: { path, format, version } },
      assetSearchSchema,
      ASSET_MIME_TYPES[format],
      options,
    );
  }

  /**
   * Returns the absolute URL of a converted texture without requesting it,
   * e.g. for an `<img src>`.
   */
  async assetUrl(path: string, opts: Pick<AssetOptions, 'format' | 'version'> = {}): SafeWrapAsync<Error, string> {
    const { format = 'png', version = this.#defaults.version } = opts;
    const [errUrl, url] = await constructUrl('/asset', { $search: { path, format, version } }, assetSearchSchema);
    if (errUrl) {
      return [new Error('error constructing URL in assetUrl', { cause: errUrl }), null];
    }

    return [null, `${this.#baseUrl}/${url}`];
  }

  /**
   * Downloads the composed image of a map.
   *
   * @param territory - Territory id, e.g. `s1d1`.
   * @param index - Map index within the territory, e.g. `00`.
   */
  getMap(territory: string, index: string, opts: MapOptions = {}): SafeWrapAsync<Error, Blob> {
    const { version = this.#defaults.version, ...options } = opts;
    return this.#download(
      'getMap',
      '/asset/map/{territory}/{index}',
      { $path: { territory, index }, $search: { version } },
      versionOnlySearchSchema,
      'image/jpeg',
      options,
    );
  }

  /**
   * Fills unset language/version/schema from the client defaults.
   */
  #withDefaults({ language, version, schema }: RequestDefaults): RequestDefaults {
    return {
      language: language ?? this.#defaults.language,
      version: version ?? this.#defaults.version,
      schema: schema ?? this.#defaults.schema,
    };
  }

  /**
   * Requests a JSON endpoint and validates the body with `responseSchema`.
   *
   * @param operation - Public method name, used in error messages.
   * @param path - Path template relative to the base URL.
   * @param params - Path/query params for the endpoint.
   * @param searchSchema - Schema the query params must satisfy.
   * @param responseSchema - Schema validating and mapping the response body.
   */
  async #fetchJson<ResponseSchema extends StandardSchemaV1>(
    operation: string,
    path: string,
    params: UrlParams | null,
    searchSchema: StandardSchemaV1<unknown, SearchParams> | undefined,
    responseSchema: ResponseSchema,
    opts: Options,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<ResponseSchema>> {
    const [errReq, data] = await this.#execute(operation, path, params, searchSchema, opts, getJsonData);
    if (errReq) {
      return [errReq, null];
    }

    const [errParse, parsed] = await validator(data, responseSchema);
    if (errParse) {
      return [new Error(`error parsing response in ${operation}`, { cause: errParse }), null];
    }

    return [null, parsed];
  }

  /**
   * Requests a binary endpoint and returns its body as a `Blob`.
   *
   * @param accept - Mime type sent as `Accept`; per-call headers still win.
   */
  #download(
    operation: string,
    path: string,
    params: UrlParams,
    searchSchema: StandardSchemaV1<unknown, SearchParams>,
    accept: string,
    opts: Options,
  ): SafeWrapAsync<Error, Blob> {
    return this.#execute(
      operation,
      path,
      params,
      searchSchema,
      opts,
      (response) => safeWrapAsync(() => response.blob()),
      accept,
    );
  }

  /**
   * Builds the URL and the request headers, then hands both to {@link XivApiClient.#request}.
   *
   * @param parser - Function converting the `Response` into data.
   * @param accept - Overrides the default `Accept` header.
   * @returns A tuple `[error, result]`.
   */
  async #execute<ResponseType>(
    operation: string,
    path: string,
    params: UrlParams | null,
    searchSchema: StandardSchemaV1<unknown, SearchParams> | undefined,
    opts: Options,
    parser: (response: Response) => SafeWrapAsync<Error, ResponseType>,
    accept?: string,
  ): SafeWrapAsync<Error, ResponseType> {
    const [errUrl, url] = await constructUrl(path, params, searchSchema);
    if (errUrl) {
      return [new Error(`error constructing URL in ${operation}`, { cause: errUrl }), null];
    }

    const acceptHeader = accept ? { Accept: accept } : undefined;
    const [errHeaders, headers] = safeWrap(
      () => new Headers(mergeHeaderOptions(this.#defaultHeaders, acceptHeader, opts.headers)),
    );
    if (errHeaders) {
      return [new Error(`error building headers in ${operation}`, { cause: errHeaders }), null];
    }

    const [errReq, result] = await this.#request<ResponseType>(url, headers, opts, parser);
    if (errReq) {
      return [new Error(`error doing request in ${operation}`, { cause: errReq }), null];
    }

    return [null, result];
  }

  /**
   * Internal request executor that applies retry/timeout handling and response parsing.
   *
   * - Normalizes retry/timeout options and merges abort signals.
   * - Calls the underlying HTTP provider and wraps thrown errors.
   * - Validates HTTP status and parses the response via the provided parser.
   * - Waits between attempts for the retry timeout, or longer when a 429 says `Retry-After`.
   *
   * @param url - Fully constructed request URL, relative to the base URL.
   * @param headers - Headers sent with every attempt.
   * @param opts - Per-call options (signal, retry, timeout).
   * @param parser - Function that turns a `Response` into data.
   * @returns A tuple of `[error, result]`.
   */
  async #request<ResponseType>(
    url: string,
    headers: Headers,
    opts: Options,
    parser: (response: Response) => SafeWrapAsync<Error, ResponseType>,
  ): SafeWrapAsync<Error, ResponseType> {
    const { retry: retryOpt, timeout: timeoutOpt, signal: callerSignal } = opts;
    const retryOptions = retryOpt ?? this.#requestOpts.retry ?? 0;
    const timeout = timeoutOpt ?? this.#requestOpts.timeout ?? this.#defaultTimeout;

    let retryAttempts = 0;
    let retryTimeout = 1000;
    let retryIgnoreStatusCodes: StatusCode[] = [];
    let retryStatusCodes: StatusCode[] = this.#defaultRetryCodes;

    if (typeof retryOptions === 'number') {
      retryAttempts = retryOptions;
    } else {
      if (retryOptions.timeout !== undefined) {
        retryTimeout = retryOptions.timeout;
      }

      if (typeof retryOptions.limit === 'number') {
        retryAttempts = retryOptions.limit;
      }

      if (retryOptions.ignoreStatusCodes) {
        retryIgnoreStatusCodes = retryOptions.ignoreStatusCodes;
      }

      if (retryOptions.statusCodes) {
        retryStatusCodes = retryOptions.statusCodes;
      }
    }

    const requestSignal = mergeSignals([callerSignal, this.#disposeController.signal]);
    const result = await retry<ResponseType>({
      attempts: retryAttempts,
      timeout: retryTimeout,
      signal: requestSignal?.signal,
      errFn: (err) => {
        if (unwrapErrorType(TimeoutError, err)) {
          return false;
        }

        if (isAbortError(err) || isResponseFormatError(err)) {
          return true;
        }

        if (unwrapErrorType(TypeError, err)) {
          return false;
        }

        const httpError = unwrapErrorType(HTTPError, err);
        if (!httpError) {
          return false;
        }

        const { status } = httpError;
        if (retryIgnoreStatusCodes.some((code) => code === status)) {
          return true;
        }

        return !retryStatusCodes.some((code) => code === status);
      },
      delayFn: (err) => {
        const retryAfter = getRateLimitError(err)?.retryAfter;
        return typeof retryAfter === 'number' ? retryAfter * 1000 : null;
      },
      onRetry: (err, attempt) => {
        this.#logger.warn(`retrying GET ${url} after failed attempt ${attempt}`, err);
      },
      fn: () => this.#attempt(url, headers, parser, requestSignal?.signal, timeout),
    });
    requestSignal?.clear();

    return result;
  }

  /**
   * Single attempt of a request under its own timeout. Detaches from the
   * request signal once done.
   */
  async #attempt<ResponseType>(
    url: string,
    headers: Headers,
    parser: (response: Response) => SafeWrapAsync<Error, ResponseType>,
    requestSignal: AbortSignal | undefined,
    timeout: number | false,
  ): SafeWrapAsync<Error, ResponseType> {
    const timeoutSignal = createTimeoutSignal(timeout);
    const signal = mergeSignals([requestSignal, timeoutSignal?.signal]);
    const result = await this.#send(url, headers, parser, signal?.signal ?? null);
    signal?.clear();
    timeoutSignal?.clear();

    return result;
  }

  /**
   * Sends the request, checks the status and parses the body.
   */
  async #send<ResponseType>(
    url: string,
    headers: Headers,
    parser: (response: Response) => SafeWrapAsync<Error, ResponseType>,
    signal: AbortSignal | null,
  ): SafeWrapAsync<Error, ResponseType> {
    if (signal?.aborted) {
      return [new AbortError('error request aborted before it was sent', { cause: signal.reason }), null];
    }

    this.#logger.debug(`requesting GET ${url}`);
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      this.#fetchClient.get(url, { headers, ...(signal && { signal }) }),
    );
    if (errWrapped) {
      return [new Error('error calling request GET in request', { cause: errWrapped }), null];
    }

    const [err, response] = wrapped;
    if (err) {
      return [new Error('error request GET in request', { cause: err }), null];
    }

    if (!response.ok) {
      return [await createHttpError(response, 'error in GET request'), null];
    }

    const [errResponse, result] = await parser(response);
    if (errResponse) {
      return [new Error('error getting response in GET', { cause: errResponse }), null];
    }

    return [null, result];
  }
}
