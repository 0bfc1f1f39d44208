import { describe, expect, it } from 'vitest';
import {
  apiErrorSchema,
  assetSearchSchema,
  cursorSearchSchema,
  rowsSearchSchema,
  searchResponseSchema,
  searchSearchSchema,
  sheetRowResponseSchema,
  sheetRowsResponseSchema,
  sheetsResponseSchema,
  versionsResponseSchema,
} from './schemas.js';
import { SearchResults } from './searchResults.js';

describe('request schemas', () => {
  it('accepts row ids and subrow ids', () => {
    expect(rowsSearchSchema.safeParse({ rows: [1, '2', '3:1'], after: '10:2' }).success).toBe(true);
  });

  it('rejects malformed row ids', () => {
    expect(rowsSearchSchema.safeParse({ rows: [-1] }).success).toBe(false);
    expect(rowsSearchSchema.safeParse({ after: '1:' }).success).toBe(false);
    expect(rowsSearchSchema.safeParse({ after: 1.5 }).success).toBe(false);
  });

  it('requires a positive integer limit', () => {
    expect(rowsSearchSchema.safeParse({ limit: 0 }).success).toBe(false);
    expect(cursorSearchSchema.safeParse({ cursor: 'abc', limit: 2.5 }).success).toBe(false);
    expect(cursorSearchSchema.safeParse({ cursor: 'abc', limit: 20 }).success).toBe(true);
  });

  it('rejects unknown languages', () => {
    expect(rowsSearchSchema.safeParse({ language: 'es' }).success).toBe(false);
    expect(rowsSearchSchema.safeParse({ language: 'chs' }).success).toBe(true);
  });

  it('requires at least one sheet to search', () => {
    expect(searchSearchSchema.safeParse({ sheets: [] }).success).toBe(false);
    expect(searchSearchSchema.safeParse({ sheets: ['Item'], query: '+Name~"a"' }).success).toBe(true);
  });

  it('restricts asset formats', () => {
    expect(assetSearchSchema.safeParse({ path: 'ui/icon/000000/000001.tex', format: 'webp' }).success).toBe(true);
    expect(assetSearchSchema.safeParse({ path: 'ui/icon/000000/000001.tex', format: 'gif' }).success).toBe(false);
  });
});

describe('response schemas', () => {
  it('parses API error bodies', () => {
    expect(apiErrorSchema.parse({ code: 404, message: 'not found' })).toEqual({ code: 404, message: 'not found' });
  });

  it('reduces the sheet list to names', () => {
    expect(sheetsResponseSchema.parse({ sheets: [{ name: 'Action' }, { name: 'Item' }] })).toEqual(['Action', 'Item']);
  });

  it('maps a single row', () => {
    const row = sheetRowResponseSchema.parse({
      schema: 'exdschema@2',
      row_id: 4,
      fields: { Name: 'Fire Shard' },
      transient: { Description: 'A shard.' },
    });

    expect(row).toEqual({
      schema: 'exdschema@2',
      rowId: 4,
      fields: { Name: 'Fire Shard' },
      transient: { Description: 'A shard.' },
    });
  });

  it('keeps subrow ids and leaves missing optionals out', () => {
    const row = sheetRowResponseSchema.parse({ schema: 's', row_id: 1, subrow_id: 2, fields: {} });

    expect(Object.keys(row)).toEqual(['schema', 'rowId', 'subrowId', 'fields']);
    expect(row.subrowId).toBe(2);
  });

  it('maps multiple rows', () => {
    const rows = sheetRowsResponseSchema.parse({
      schema: 's',
      rows: [
        { row_id: 1, fields: { Name: 'a' } },
        { row_id: 2, fields: { Name: 'b' } },
      ],
    });

    expect(rows).toEqual({
      schema: 's',
      rows: [
        { rowId: 1, fields: { Name: 'a' } },
        { rowId: 2, fields: { Name: 'b' } },
      ],
    });
  });

  it('rejects rows without fields', () => {
    expect(sheetRowsResponseSchema.safeParse({ schema: 's', rows: [{ row_id: 1 }] }).success).toBe(false);
  });

  it('wraps search hits in SearchResults', () => {
    const results = searchResponseSchema.parse({
      schema: 's',
      next: 'cursor-1',
      results: [{ score: 1.5, sheet: 'Item', row_id: 7, fields: { Name: 'Steak' } }],
    });

    expect(results).toBeInstanceOf(SearchResults);
    expect(results.next).toBe('cursor-1');
    expect(results.results).toEqual([{ score: 1.5, sheet: 'Item', rowId: 7, fields: { Name: 'Steak' } }]);
  });

  it('sets next to null on the last page', () => {
    expect(searchResponseSchema.parse({ schema: 's', results: [] }).next).toBeNull();
  });

  it('reduces versions to their names', () => {
    const versions = versionsResponseSchema.parse({ versions: [{ names: ['7.0'] }, { names: ['7.2', 'latest'] }] });

    expect(versions).toEqual([['7.0'], ['7.2', 'latest']]);
  });
});
