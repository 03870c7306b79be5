/**
 * Supabase client factory.
 * Uses the service role key: row-level security is not relied on, the
 * services enforce ownership.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function createSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
