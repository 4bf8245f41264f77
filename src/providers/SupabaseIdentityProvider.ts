/**
 * Supabase Auth implementation of IIdentityProvider.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IIdentityProvider } from './IIdentityProvider.js';

export class SupabaseIdentityProvider implements IIdentityProvider {
  constructor(private readonly db: SupabaseClient) {}

  async verifyToken(token: string): Promise<string | null> {
    const { data, error } = await this.db.auth.getUser(token);
    if (error || !data.user) return null;
    return data.user.id;
  }
}
