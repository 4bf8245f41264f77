/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500.
 */

import { AppError, RateLimitError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Error handler; unexpected errors are reported to the log when one is given. */
export function createErrorHandler(logProvider?: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details ? { details: err.details } : {}),
          },
        };

        const headers: Record<string, string> = { ...JSON_HEADERS };

        if (err instanceof RateLimitError && err.details?.retryAfter !== undefined) {
          headers['Retry-After'] = String(err.details.retryAfter);
        }

        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers,
        });
      }

      // Unknown error — log it, don't leak internals
      logProvider?.error(`Unhandled error on ${req.method} ${new URL(req.url).pathname}`, {
        error: err instanceof Error ? err.message : String(err),
        ...(err instanceof Error && err.stack ? { stack: err.stack } : {}),
      });

      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };

      return new Response(JSON.stringify(body), {
        status: 500,
        headers: JSON_HEADERS,
      });
    }
  };
}
