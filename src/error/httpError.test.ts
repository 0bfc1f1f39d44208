import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('defaults the message to the status', () => {
    const err = new HTTPError(new Response(null, { status: 400 }));

    expect(err.message).toBe('HTTP Error: 400');
    expect(err.status).toBe(400);
    expect(err.apiMessage).toBeNull();
    expect(isHttpError(err)).toBe(true);
  });

  it('keeps the API message and cause', () => {
    const cause = new Error('inner');
    const err = new HTTPError(new Response(null, { status: 404 }), 'not found', { apiMessage: 'no such sheet', cause });

    expect(err.apiMessage).toBe('no such sheet');
    expect(err.cause).toBe(cause);
  });

  it('returns a readable clone of the response on every access', async () => {
    const err = new HTTPError(new Response('{"code":500,"message":"boom"}', { status: 500 }));

    expect(await err.response.text()).toBe('{"code":500,"message":"boom"}');
    expect(await err.response.text()).toBe('{"code":500,"message":"boom"}');
  });

  it('returns the original response once its body was consumed', async () => {
    const response = new Response('gone', { status: 502 });
    await response.text();
    const err = new HTTPError(response);

    expect(err.response).toBe(response);
  });

  it('is found through the cause chain', () => {
    const err = new HTTPError(new Response(null, { status: 401 }));
    const wrapped = new Error('error doing request in getVersions', { cause: err });

    expect(getHttpError(wrapped)?.status).toBe(401);
    expect(getHttpError(new Error('boom'))).toBeNull();
  });
});
