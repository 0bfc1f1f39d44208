import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ConstructURLError } from '../error/constructUrlError.js';
import { encodeSearchParams, type SearchParams } from './encodeSearchParams.js';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/** Values substituted into `{name}` segments of a path template. */
export type PathParams = Record<string, string | number>;

/** Path and query parameters for a single request. */
export interface UrlParams {
  /** Values for the `{name}` segments of the path template. */
  $path?: PathParams;
  /** Query parameters, validated against the endpoint's search schema when given. */
  $search?: SearchParams;
}

/**
 * Constructs a relative URL by replacing path parameters and appending query parameters.
 * Query parameters are validated against `searchSchema` first when one is given.
 */
export async function constructUrl(
  path: string,
  params: UrlParams | null,
  searchSchema?: StandardSchemaV1<unknown, SearchParams>,
): SafeWrapAsync<Error, string> {
  let result = path;

  // 1. Handle Query Params ($search)
  let query = '';
  if (params?.$search) {
    let data: SearchParams = params.$search;
    if (searchSchema) {
      const [errParse, parsed] = await validator(params.$search, searchSchema);
      if (errParse) {
        return [new ConstructURLError('error extracting search params', result, { cause: errParse }), null];
      }

      data = parsed;
    }

    query = encodeSearchParams(data);
  }

  // 2. Handle $path params, replacing {param} in URL
  for (const [key, value] of Object.entries(params?.$path ?? {})) {
    const segment = String(value);
    if (!segment) {
      return [new ConstructURLError(`error constructing URL, empty path param ${key}`, result), null];
    }

    result = result.replaceAll(`{${key}}`, encodeURIComponent(segment));
  }

  // Check for remaining unreplaced braces
  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing URL, path contains {} ${result}`, result), null];
  }

  if (query) {
    result += `?${query}`;
  }

  // Strip leading slash for clean concatenation with baseUrl
  if (result.startsWith('/')) {
    return [null, result.substring(1)];
  }

  return [null, result];
}
