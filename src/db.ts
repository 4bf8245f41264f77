/**
 * Supabase client factory.
 * One service-role client per process; sessions are never persisted server-side.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(config: AppConfig): SupabaseClient {
  if (client) return client;

  if (!config.supabase) {
    throw new Error('Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY');
  }

  client = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
