import { describe, it, expect, beforeEach } from 'vitest';
import { createAuthMiddleware } from '../../src/middleware/authenticate.js';
import type { Handler, Middleware } from '../../src/middleware/pipeline.js';
import { MockIdentityProvider } from '../mocks/MockIdentityProvider.js';

describe('authenticate middleware', () => {
  let identityProvider: MockIdentityProvider;
  let authenticate: Middleware;

  beforeEach(() => {
    identityProvider = new MockIdentityProvider();
    identityProvider.grant('test-token', 'user-1');
    authenticate = createAuthMiddleware(identityProvider);
  });

  const echoHandler: Handler = async (_req, ctx) => {
    return new Response(JSON.stringify({ userId: ctx.userId }), { status: 200 });
  };

  function makeReq(authorization?: string): Request {
    const headers: Record<string, string> = {};
    if (authorization !== undefined) {
      headers['Authorization'] = authorization;
    }
    return new Request('http://test', { headers });
  }

  it('should set the user on the context for a valid Bearer token', async () => {
    const res = await authenticate(echoHandler)(makeReq('Bearer test-token'), { userId: null });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ userId: 'user-1' });
  });

  it('should return 401 when there is no Authorization header', async () => {
    const res = await authenticate(echoHandler)(makeReq(), { userId: null });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: {
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid Authorization header. Use: Bearer <token>',
      },
    });
  });

  it('should return 401 for a non-Bearer scheme', async () => {
    const res = await authenticate(echoHandler)(makeReq('Basic test-token'), { userId: null });

    expect(res.status).toBe(401);
  });

  it('should return 401 for an unknown token', async () => {
    const res = await authenticate(echoHandler)(makeReq('Bearer not-a-token'), { userId: null });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Invalid or expired token' } });
  });

  it('should return 401 for an empty Bearer token', async () => {
    const res = await authenticate(echoHandler)(makeReq('Bearer    '), { userId: null });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Token is empty' } });
  });
});
