/** Single value accepted as a query parameter. */
export type SearchParamValue = string | number | boolean | readonly (string | number)[];

/** Query parameters keyed by name; `undefined` and `null` entries are skipped. */
export type SearchParams = Record<string, SearchParamValue | null | undefined>;

/**
 * Percent-encodes following RFC 3986: everything but unreserved characters,
 * so spaces become `%20` and `!'()*` are escaped as well.
 */
export function encodeRfc3986(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Serializes query parameters in insertion order.
 *
 * - `undefined`/`null` values and empty lists are dropped.
 * - Lists are joined with `,` before encoding.
 * - Booleans and numbers use their string form.
 *
 * @example
 * encodeSearchParams({ sheets: ['Item', 'Action'], limit: 10 }); // 'sheets=Item%2CAction&limit=10'
 */
export function encodeSearchParams(params: SearchParams): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }

    let serialized: string;
    if (Array.isArray(value)) {
      if (value.length === 0) {
        continue;
      }

      serialized = value.join(',');
    } else {
      serialized = String(value);
    }

    pairs.push(`${encodeRfc3986(key)}=${encodeRfc3986(serialized)}`);
  }

  return pairs.join('&');
}
