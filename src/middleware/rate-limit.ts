/**
 * Rate limiting middleware.
 * Composable with the pipeline — each endpoint can have its own config.
 * Uses an IRateLimitStore for persistence (in-memory for dev, Supabase for prod).
 */

import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import type { HandlerContext, Middleware, Handler } from './pipeline.js';
import { requireUser } from './pipeline.js';
import { RateLimitError } from '../errors.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: Request, ctx: HandlerContext) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        const now = Math.floor(Date.now() / 1000);
        const retryAfter = Math.max(1, resetAt - now);
        throw new RateLimitError(retryAfter);
      }

      const response = await next(req, ctx);

      // Attach rate limit headers to successful responses
      const headers = new Headers(response.headers);
      headers.set('X-RateLimit-Limit', String(config.limit));
      headers.set('X-RateLimit-Remaining', String(Math.max(0, config.limit - count)));
      headers.set('X-RateLimit-Reset', String(resetAt));

      return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
      });
    };
  };
}

// ── Key extraction helpers ──

/** Per-user key: must run after the auth middleware. */
export function userKey(action: string) {
  return (_req: Request, ctx: HandlerContext): string => {
    return `user:${requireUser(ctx)}:${action}`;
  };
}

// ── Pre-built rate limit configs ──

const ONE_HOUR = 3600;

export const RATE_LIMITS = {
  /** POST /journeys — proposal spam */
  createJourney: { key: userKey('create-journey'), limit: 20, windowSeconds: ONE_HOUR },
  /** respond / end / meeting answers */
  journeyAction: { key: userKey('journey-action'), limit: 120, windowSeconds: ONE_HOUR },
  /** POST /journeys/:id/meetings */
  proposeMeeting: { key: userKey('propose-meeting'), limit: 10, windowSeconds: ONE_HOUR },
  /** PUT /questionnaire/responses */
  writeAnswers: { key: userKey('write-answers'), limit: 60, windowSeconds: ONE_HOUR },
  /** POST /journeys/:id/meetings/:mid/feedback */
  feedback: { key: userKey('feedback'), limit: 20, windowSeconds: ONE_HOUR },
  /** GET /candidates — ranking reads the whole pool */
  rank: { key: userKey('rank'), limit: 60, windowSeconds: ONE_HOUR },
} as const satisfies Record<string, RateLimitConfig>;
