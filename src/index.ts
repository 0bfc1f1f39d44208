/**
 * Root entrypoint: re-exports the client, the query builder, result models and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/** Client for the xivapi v2 API, its options and defaults. */
export {
  type AssetOptions,
  type Config,
  DEFAULT_BASE_URL,
  type MapOptions,
  type RequestDefaults,
  type RowOptions,
  type RowsOptions,
  type SearchNextOptions,
  XivApiClient,
  type XivApiClientProps,
} from './core/index.js';

/** Default fetch provider. */
export { FetchClient, type FetchClientOptions } from './fetch/index.js';

/** Search query builder. */
export {
  Filter,
  FilterGroup,
  type FilterOptions,
  type FilterValue,
  type Operator,
  QueryBuilder,
  type SearchQueryParams,
} from './query/index.js';

/** Results returned by the client. */
export { SearchResults } from './models/searchResults.js';
export {
  ASSET_FORMATS,
  type AssetFormat,
  type Language,
  LANGUAGES,
  type RowFields,
  type RowId,
  type SearchResult,
  type SheetRow,
  type SheetRowResult,
  type SheetRows,
} from './models/types.js';

/** Request option and provider contracts. */
export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  Options,
  RequestOptions,
  RetryOptions,
  StatusCode,
} from './types/request.js';

/** Logger contract. */
export { type Logger, noopLogger } from './utils/logger.js';

/** Tuple results every client method resolves to. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/** Errors and helpers for telling them apart. */
export * from './error/index.js';
