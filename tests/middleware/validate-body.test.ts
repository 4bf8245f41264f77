import { describe, it, expect } from 'vitest';
import { validateBody } from '../../src/middleware/validate-body.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';

describe('validateBody', () => {
  const ctx: HandlerContext = { userId: null };

  const echoHandler: Handler = async (req) => {
    const body = await req.json();
    return new Response(JSON.stringify(body), { status: 200 });
  };

  function makeReq(body: unknown): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  const schema: BodySchema = {
    partnerId: { type: 'string', required: true, maxLength: 50 },
    rating: { type: 'number', required: false, min: 1, max: 5, integer: true },
    wantsToContinue: { type: 'boolean', required: false },
    answers: { type: 'array', required: false, maxLength: 3 },
    value: { type: 'object', required: false },
  };

  it('should pass valid body through to handler', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(
      makeReq({ partnerId: 'user-2', rating: 4, wantsToContinue: true, answers: ['a'] }),
      ctx
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      partnerId: 'user-2',
      rating: 4,
      wantsToContinue: true,
      answers: ['a'],
    });
  });

  it('should pass with only required fields', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 'user-2' }), ctx);

    expect(res.status).toBe(200);
  });

  it('should treat null optional fields as absent', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 'user-2', rating: null }), ctx);

    expect(res.status).toBe(200);
  });

  it('should reject missing required field', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ rating: 3 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'partnerId is required',
        details: { fields: ['partnerId is required'] },
      },
    });
  });

  it('should reject wrong type', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 123 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: 'INVALID_REQUEST', message: 'partnerId must be a string' },
    });
  });

  it('should report every failing field', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ wantsToContinue: 'yes', value: [] }), ctx);

    expect(await res.json()).toMatchObject({
      error: {
        details: {
          fields: [
            'partnerId is required',
            'wantsToContinue must be a boolean',
            'value must be an object',
          ],
        },
      },
    });
  });

  it('should reject string exceeding maxLength', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 'a'.repeat(51) }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { message: 'partnerId must be 50 characters or less' },
    });
  });

  it('should reject number below min', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 'user-2', rating: 0 }), ctx);

    expect(await res.json()).toMatchObject({
      error: { message: 'rating must be at least 1' },
    });
  });

  it('should reject number above max', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 'user-2', rating: 6 }), ctx);

    expect(await res.json()).toMatchObject({
      error: { message: 'rating must be at most 5' },
    });
  });

  it('should reject a fractional value for an integer field', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ partnerId: 'user-2', rating: 3.5 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { message: 'rating must be an integer' },
    });
  });

  it('should reject arrays longer than maxLength', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(
      makeReq({ partnerId: 'user-2', answers: [1, 2, 3, 4] }),
      ctx
    );

    expect(await res.json()).toMatchObject({
      error: { message: 'answers must have at most 3 items' },
    });
  });

  it('should reject non-JSON body', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const req = new Request('http://test', {
      method: 'POST',
      body: 'not json',
    });
    const res = await wrapped(req, ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be valid JSON' },
    });
  });

  it('should reject a JSON body that is not an object', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq(['partnerId']), ctx);

    expect(await res.json()).toMatchObject({
      error: { message: 'Request body must be a JSON object' },
    });
  });

  it('should validate enum values', async () => {
    const enumSchema: BodySchema = {
      decision: { type: 'string', required: true, enum: ['accept', 'decline'] },
    };

    const wrapped = validateBody(enumSchema)(echoHandler);

    const good = await wrapped(makeReq({ decision: 'accept' }), ctx);
    expect(good.status).toBe(200);

    const bad = await wrapped(makeReq({ decision: 'maybe' }), ctx);
    expect(bad.status).toBe(400);
    expect(await bad.json()).toMatchObject({
      error: { message: 'decision must be one of: accept, decline' },
    });
  });
});
