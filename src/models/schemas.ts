import { z } from 'zod';
import { SearchResults } from './searchResults.js';
import { ASSET_FORMATS, LANGUAGES, type SheetRow } from './types.js';

/*
 * Outgoing query parameters. Key order of each shape is the order the
 * parameters appear on the wire.
 */

const listSchema = z.array(z.string().min(1));
const rowIdSchema = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+(:\d+)?$/)]);
const limitSchema = z.number().int().positive();
const versionSchema = z.union([z.string().min(1), z.number().nonnegative()]);

/** Query parameters of a single-row read. */
export const rowSearchSchema = z.object({
  fields: listSchema.optional(),
  transient: listSchema.optional(),
  language: z.enum(LANGUAGES).optional(),
  schema: z.string().min(1).optional(),
  version: versionSchema.optional(),
});

/** Query parameters of a multi-row read. */
export const rowsSearchSchema = z.object({
  rows: z.array(rowIdSchema).optional(),
  after: rowIdSchema.optional(),
  limit: limitSchema.optional(),
  ...rowSearchSchema.shape,
});

/** Query parameters of a search. */
export const searchSearchSchema = z.object({
  sheets: listSchema.min(1),
  fields: listSchema.optional(),
  transient: listSchema.optional(),
  query: z.string().min(1).optional(),
  limit: limitSchema.optional(),
  version: versionSchema.optional(),
  language: z.enum(LANGUAGES).optional(),
  schema: z.string().min(1).optional(),
});

/** Query parameters continuing a search from its cursor. */
export const cursorSearchSchema = z.object({
  cursor: z.string().min(1),
  limit: limitSchema.optional(),
});

/** Query parameters of an asset conversion. */
export const assetSearchSchema = z.object({
  path: z.string().min(1),
  format: z.enum(ASSET_FORMATS),
  version: versionSchema.optional(),
});

/** Query parameters of a map composition. */
export const versionOnlySearchSchema = z.object({
  version: versionSchema.optional(),
});

/* Response bodies */

const fieldsSchema = z.record(z.string(), z.unknown());

const rowSchema = z.object({
  row_id: z.number().int(),
  subrow_id: z.number().int().optional(),
  fields: fieldsSchema,
  transient: fieldsSchema.optional(),
});

function toSheetRow(row: z.infer<typeof rowSchema>): SheetRow {
  return {
    rowId: row.row_id,
    ...(row.subrow_id !== undefined && { subrowId: row.subrow_id }),
    fields: row.fields,
    ...(row.transient !== undefined && { transient: row.transient }),
  };
}

/** `{ code, message }` body the API answers failed requests with. */
export const apiErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
});

/** `GET /sheet`, reduced to the sheet names. */
export const sheetsResponseSchema = z
  .object({
    sheets: z.array(z.object({ name: z.string() })),
  })
  .transform(({ sheets }) => sheets.map(({ name }) => name));

/** `GET /sheet/{sheet}/{row}` */
export const sheetRowResponseSchema = rowSchema
  .extend({ schema: z.string() })
  .transform((row) => ({ schema: row.schema, ...toSheetRow(row) }));

/** `GET /sheet/{sheet}` */
export const sheetRowsResponseSchema = z
  .object({
    schema: z.string(),
    rows: z.array(rowSchema),
  })
  .transform(({ schema, rows }) => ({ schema, rows: rows.map(toSheetRow) }));

/** `GET /search` */
export const searchResponseSchema = z
  .object({
    schema: z.string(),
    next: z.string().optional(),
    results: z.array(
      rowSchema.extend({
        score: z.number(),
        sheet: z.string(),
      }),
    ),
  })
  .transform(
    ({ schema, next, results }) =>
      new SearchResults(
        schema,
        results.map(({ score, sheet, ...row }) => ({ score, sheet, ...toSheetRow(row) })),
        next ?? null,
      ),
  );

/** `GET /version`, reduced to the names of each version. */
export const versionsResponseSchema = z
  .object({
    versions: z.array(z.object({ names: z.array(z.string()) })),
  })
  .transform(({ versions }) => versions.map(({ names }) => names));
