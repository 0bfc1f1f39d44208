import type { HeaderOptions } from '../types/request.js';

/** Header value as any of the accepted containers can hold it; `null` removes. */
type HeaderValue = string | readonly string[] | null | undefined;

function entriesOf(headers: HeaderOptions): Array<[string, HeaderValue]> {
  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (Array.isArray(headers)) {
    return headers.map(([key = '', ...values]): [string, HeaderValue] => [key, values]);
  }

  return Object.keys(headers).map((key): [string, HeaderValue] => [key, headers[key]]);
}

/**
 * Merges header sources left to right into a plain record keyed by
 * lower-cased header name.
 *
 * Later sources win per name. A `null` or `undefined` value removes the
 * header an earlier source set; list values are joined with `, `.
 * Values are not checked here: `new Headers(merged)` rejects what HTTP cannot carry.
 *
 * @example
 * mergeHeaderOptions({ Accept: 'application/json' }, { accept: 'image/png', 'X-Trace': null });
 * // { accept: 'image/png' }
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Record<string, string> {
  const merged = new Map<string, string>();

  for (const source of sources) {
    if (!source) {
      continue;
    }

    for (const [key, value] of entriesOf(source)) {
      const name = key.toLowerCase();
      if (value === null || value === undefined) {
        merged.delete(name);
        continue;
      }

      merged.set(name, typeof value === 'string' ? value : value.join(', '));
    }
  }

  return Object.fromEntries(merged);
}
