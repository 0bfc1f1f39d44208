import { apiErrorSchema } from '../models/schemas.js';
import { safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { HTTPError } from './httpError.js';
import { parseRetryAfter, RateLimitError } from './rateLimitError.js';

/**
 * Reads the API's `{ code, message }` error body from a copy of the response.
 * Resolves to `null` when the body is missing, unreadable or of another shape.
 */
export async function readApiMessage(response: Response): Promise<string | null> {
  const [errClone, clone] = safeWrap(() => response.clone());
  if (errClone) {
    return null;
  }

  const [errText, text] = await safeWrapAsync(() => clone.text());
  if (errText || !text) {
    return null;
  }

  const [errJson, body] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return null;
  }

  const parsed = apiErrorSchema.safeParse(body);
  if (!parsed.success) {
    return null;
  }

  return parsed.data.message;
}

/**
 * Turns a non-2xx response into an {@link HTTPError}, or a {@link RateLimitError} for `429`.
 * The status and the API's own message are appended to `message`.
 */
export async function createHttpError(response: Response, message: string): Promise<HTTPError> {
  const apiMessage = await readApiMessage(response);
  const detailed = `${message} (status ${response.status}${apiMessage ? `: ${apiMessage}` : ''})`;

  if (response.status === 429) {
    return new RateLimitError(response, detailed, {
      apiMessage,
      retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
    });
  }

  return new HTTPError(response, detailed, { apiMessage });
}
