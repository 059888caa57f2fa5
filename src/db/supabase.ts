import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseCredentials {
  url: string;
  serviceRoleKey: string;
}

/**
 * Service-role client for server-side access. Row ownership is enforced by
 * the repositories filtering on user_id, not by RLS.
 */
export function createSupabaseClient(credentials: SupabaseCredentials): SupabaseClient {
  return createClient(credentials.url, credentials.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
