/**
 * Process-local rate-limit store. Used in tests and when no database is configured.
 */

import type { IRateLimitStore, RateLimitResult } from './IRateLimitStore.js';

interface Window {
  start: number;
  count: number;
}

export class InMemoryRateLimitStore implements IRateLimitStore {
  private readonly windows = new Map<string, Window>();

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const start = now - (now % windowSeconds);

    const current = this.windows.get(key);
    const window =
      current && current.start === start ? current : { start, count: 0 };
    window.count += 1;
    this.windows.set(key, window);

    return { count: window.count, resetAt: start + windowSeconds };
  }

  clear(): void {
    this.windows.clear();
  }
}
