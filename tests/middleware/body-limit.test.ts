import { describe, it, expect } from 'vitest';
import { bodyLimit } from '../../src/middleware/body-limit.js';
import type { Handler } from '../../src/middleware/pipeline.js';

describe('bodyLimit', () => {
  const okHandler: Handler = async () => new Response('ok', { status: 200 });

  function makeReq(body: string): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Length': String(body.length) },
      body,
    });
  }

  it('should let bodies within the limit through', async () => {
    const res = await bodyLimit(16)(okHandler)(makeReq('{"ok":true}'), { userId: null });

    expect(res.status).toBe(200);
  });

  it('should answer 413 when the declared length is over the limit', async () => {
    const res = await bodyLimit(4)(okHandler)(makeReq('{"ok":true}'), { userId: null });

    expect(res.status).toBe(413);
    expect(res.headers.get('Content-Type')).toBe('application/json');
    expect(await res.json()).toEqual({
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body exceeds 4 bytes',
        details: { maxBytes: 4 },
      },
    });
  });

  it('should let requests without a body through', async () => {
    const res = await bodyLimit(4)(okHandler)(new Request('http://test'), { userId: null });

    expect(res.status).toBe(200);
  });
});
