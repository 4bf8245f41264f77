/**
 * Supabase rate-limit store. The `increment_rate_limit` function upserts the
 * (key, window_start) row and returns the new count in one statement.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IRateLimitStore, RateLimitResult } from './IRateLimitStore.js';

export class SupabaseRateLimitStore implements IRateLimitStore {
  constructor(private readonly db: SupabaseClient) {}

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const windowStart = now - (now % windowSeconds);

    const { data, error } = await this.db.rpc('increment_rate_limit', {
      p_key: key,
      p_window_start: windowStart,
    });

    if (error) throw new Error(`Failed to increment rate limit: ${error.message}`);
    if (typeof data !== 'number') {
      throw new Error('increment_rate_limit returned a non-numeric count');
    }

    return { count: data, resetAt: windowStart + windowSeconds };
  }
}
