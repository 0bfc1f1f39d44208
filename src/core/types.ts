import type { AssetFormat, Language, RowId } from '../models/types.js';
import type { Options } from '../types/request.js';
import type { Logger } from '../utils/logger.js';

/** Data options applied to every request unless a call overrides them. */
export interface RequestDefaults {
  /** Language of localized fields. */
  language?: Language;
  /** Game version to read, e.g. `7.2` or `latest`. */
  version?: string | number;
  /** Schema to read sheets with. */
  schema?: string;
}

/**
 * Runtime configuration payload accepted by the constructor and `XivApiClient.config`.
 * - `fetchOpts`: default headers, timeout and retry behaviour.
 * - `defaults`: language/version/schema for data requests.
 * - `logger`: where request logs go.
 */
export interface Config {
  fetchOpts?: Omit<Options, 'signal'>;
  defaults?: RequestDefaults;
  logger?: Logger;
}

/** Options of a single-row read. */
export interface RowOptions extends Options, RequestDefaults {
  /** Fields to return; all fields when omitted. */
  fields?: string[];
  /** Transient fields to return. */
  transients?: string[];
}

/** Options of a multi-row read. */
export interface RowsOptions extends RowOptions {
  /** Specific rows to read, in this order. */
  rows?: RowId[];
  /** Read rows after this one, for paging through a sheet. */
  after?: RowId;
  /** Maximum number of rows to return. */
  limit?: number;
}

/** Options when continuing a search from its cursor. */
export interface SearchNextOptions extends Options {
  /** Maximum number of hits on the next page. */
  limit?: number;
}

/** Options of an asset download. */
export interface AssetOptions extends Options {
  /**
   * Image format to convert the texture to.
   * @default 'png'
   */
  format?: AssetFormat;
  /** Game version to read the texture from. */
  version?: string | number;
}

/** Options of a map download. */
export interface MapOptions extends Options {
  /** Game version to read the map from. */
  version?: string | number;
}
