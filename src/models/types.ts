/** Languages the API can return localized fields in. */
export const LANGUAGES = ['ja', 'en', 'de', 'fr', 'chs', 'cht', 'kr'] as const;

/** Language code accepted by the `language` parameter. */
export type Language = (typeof LANGUAGES)[number];

/** Image formats the asset endpoint converts textures to. */
export const ASSET_FORMATS = ['png', 'jpg', 'webp'] as const;

/** Output format of `getAsset`. */
export type AssetFormat = (typeof ASSET_FORMATS)[number];

/** Row identifier: a row id, or `row:subrow` for sheets with subrows. */
export type RowId = number | `${number}:${number}`;

/** Field values of a row, keyed by field name. */
export type RowFields = Record<string, unknown>;

/** A single row of a sheet. */
export interface SheetRow {
  /** Row id within the sheet. */
  rowId: number;
  /** Subrow id, present on subrow sheets only. */
  subrowId?: number;
  /** Requested fields of the row. */
  fields: RowFields;
  /** Requested transient fields, when any were asked for. */
  transient?: RowFields;
}

/** Response of a single-row read. */
export interface SheetRowResult extends SheetRow {
  /** Schema the row was read with, e.g. `exdschema@2:rev:...`. */
  schema: string;
}

/** Response of a multi-row read. */
export interface SheetRows {
  /** Schema the rows were read with. */
  schema: string;
  /** Rows in the order the API returned them. */
  rows: SheetRow[];
}

/** A single search hit. */
export interface SearchResult extends SheetRow {
  /** Relevance of the hit; higher is better. */
  score: number;
  /** Sheet the row belongs to. */
  sheet: string;
}
