/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

import { UnauthorizedError } from '../errors.js';

export interface HandlerContext {
  /** Set by the auth middleware. */
  userId: string | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(auth, rateLimit)(handler)
 *   → auth wraps (rateLimit wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}

/** The authenticated user id. Throws when the auth middleware did not run or failed. */
export function requireUser(ctx: HandlerContext): string {
  if (!ctx.userId) {
    throw new UnauthorizedError();
  }
  return ctx.userId;
}
