import { ResponseFormatError } from '../error/responseFormatError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Safely extracts and parses a JSON response body into a tuple-style result.
 *
 * - `204`/`205` carry no body and resolve to `[null, null]`.
 * - The body is read once as text; an unreadable body is an `Error`.
 * - An empty body, a `Content-Type` that is not JSON, or text that fails to
 *   parse all resolve to a {@link ResponseFormatError}.
 */
export async function getJsonData(response: Response): SafeWrapAsync<Error, unknown> {
  // 204 and 205 carry no body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const contentType = response.headers.get('Content-Type');
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getJsonData', { cause: errText }), null];
  }

  if (!text) {
    return [new ResponseFormatError('error empty response body in getJsonData', contentType), null];
  }

  const normalized = contentType?.toLowerCase();
  if (!normalized?.includes('application/json') && !normalized?.includes('+json')) {
    return [new ResponseFormatError(`error unexpected content-type ${contentType} in getJsonData`, contentType), null];
  }

  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(text));
  if (errJson) {
    return [
      new ResponseFormatError('error parsing json response body in getJsonData', contentType, { cause: errJson }),
      null,
    ];
  }

  return [null, json];
}
