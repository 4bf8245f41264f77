export { pipeline, requireUser } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler } from './error-handler.js';
export { createAuthMiddleware } from './authenticate.js';
export { bodyLimit } from './body-limit.js';
export { validateBody } from './validate-body.js';
export { createRateLimitMiddleware, RATE_LIMITS, userKey } from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createLoggingMiddleware } from './logging.js';
