/**
 * Request body size guard.
 * Rejects on the declared Content-Length before the body is read. Runs
 * outside the error handler, so it answers with its own 413.
 */

import { PayloadTooLargeError } from '../errors.js';
import type { ApiErrorResponse } from '../types/api.js';
import type { Handler, Middleware } from './pipeline.js';

export function bodyLimit(maxBytes: number): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const declared = Number(req.headers.get('Content-Length') ?? '0');
      if (Number.isFinite(declared) && declared > maxBytes) {
        const err = new PayloadTooLargeError(maxBytes);
        const body: ApiErrorResponse = {
          error: { code: err.code, message: err.message, details: err.details },
        };
        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers: { 'Content-Type': 'application/json' },
        });
      }
      return next(req, ctx);
    };
  };
}
