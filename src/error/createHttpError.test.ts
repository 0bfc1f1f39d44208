import { describe, expect, it } from 'vitest';
import { createHttpError, readApiMessage } from './createHttpError.js';
import { HTTPError } from './httpError.js';
import { RateLimitError } from './rateLimitError.js';

function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('readApiMessage', () => {
  it('reads the message of an API error body', async () => {
    const res = jsonResponse({ code: 404, message: 'sheet Itemz not found' }, 404);

    expect(await readApiMessage(res)).toBe('sheet Itemz not found');
  });

  it('leaves the response body unread', async () => {
    const res = jsonResponse({ code: 400, message: 'bad query' }, 400);
    await readApiMessage(res);

    expect(res.bodyUsed).toBe(false);
    expect(await res.json()).toEqual({ code: 400, message: 'bad query' });
  });

  it('returns null for bodies of another shape', async () => {
    expect(await readApiMessage(jsonResponse({ error: 'nope' }, 500))).toBeNull();
    expect(await readApiMessage(new Response('<html>Bad Gateway</html>', { status: 502 }))).toBeNull();
    expect(await readApiMessage(new Response(null, { status: 503 }))).toBeNull();
  });
});

describe('createHttpError', () => {
  it('creates an HTTPError with status and API message', async () => {
    const res = jsonResponse({ code: 404, message: 'row not found' }, 404);
    const err = await createHttpError(res, 'error in GET request');

    expect(err).toBeInstanceOf(HTTPError);
    expect(err).not.toBeInstanceOf(RateLimitError);
    expect(err.message).toBe('error in GET request (status 404: row not found)');
    expect(err.status).toBe(404);
    expect(err.apiMessage).toBe('row not found');
  });

  it('omits the API message when the body has none', async () => {
    const err = await createHttpError(new Response('oops', { status: 500 }), 'error in GET request');

    expect(err.message).toBe('error in GET request (status 500)');
    expect(err.apiMessage).toBeNull();
  });

  it('creates a RateLimitError for 429 responses', async () => {
    const res = new Response(null, { status: 429, headers: { 'Retry-After': '12' } });
    const err = await createHttpError(res, 'error in GET request');

    expect(err).toBeInstanceOf(RateLimitError);
    expect(err.message).toBe('error in GET request (status 429)');
    expect(err instanceof RateLimitError && err.retryAfter).toBe(12);
  });

  it('leaves retryAfter null without the header', async () => {
    const err = await createHttpError(new Response(null, { status: 429 }), 'error in GET request');

    expect(err instanceof RateLimitError && err.retryAfter).toBe(null);
  });
});
