import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError } from "./errors.js";

let cached: SupabaseClient | null = null;

/**
 * Service-role client used for storage uploads. Created on first use so
 * runs that never upload to Supabase need no credentials.
 */
export function getSupabaseClient(env: Record<string, string | undefined>): SupabaseClient {
  if (cached) return cached;

  const supabaseUrl = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY ?? env.SUPABASE_KEY;
  if (!supabaseUrl || !key) {
    throw new ConfigError("Missing Supabase env vars (SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY)");
  }

  cached = createClient(supabaseUrl, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return cached;
}
