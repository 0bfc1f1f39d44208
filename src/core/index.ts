/**
 * Core entrypoint: exports the API client and its option types.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/**
 * Client for the xivapi v2 API.
 */
export { DEFAULT_BASE_URL, XivApiClient, type XivApiClientProps } from './client.js';

export type {
  AssetOptions,
  Config,
  MapOptions,
  RequestDefaults,
  RowOptions,
  RowsOptions,
  SearchNextOptions,
} from './types.js';
