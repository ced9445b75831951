import { createClient, type SupabaseClient } from "@supabase/supabase-js";

/**
 * Service-role Supabase client backing the persistent cache tier and the
 * passage store.
 */
export function createSupabaseAdminClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
