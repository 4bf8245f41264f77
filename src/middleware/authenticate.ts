/**
 * Authentication middleware.
 * Extracts the Bearer token from the Authorization header, resolves it to a
 * user id through the identity provider, and attaches it to the context.
 */

import type { IIdentityProvider } from '../providers/IIdentityProvider.js';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createAuthMiddleware(identityProvider: IIdentityProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <token>');
      }

      const token = authHeader.slice(7).trim();
      if (!token) {
        return unauthorized('Token is empty');
      }

      const userId = await identityProvider.verifyToken(token);
      if (!userId) {
        return unauthorized('Invalid or expired token');
      }

      ctx.userId = userId;
      return next(req, ctx);
    };
  };
}

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({ error: { code: 'UNAUTHORIZED', message } }),
    { status: 401, headers: JSON_HEADERS }
  );
}
