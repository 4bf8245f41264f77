/**
 * Fixed-window counter storage for the rate-limit middleware.
 */

export interface RateLimitResult {
  /** Requests counted in the current window, this one included. */
  count: number;
  /** Unix seconds at which the window resets. */
  resetAt: number;
}

export interface IRateLimitStore {
  increment(key: string, windowSeconds: number): Promise<RateLimitResult>;
}
