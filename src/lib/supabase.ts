import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "./config";

/**
 * Server-side client: no session persistence or token refresh. `fetchImpl`
 * replaces the transport, e.g. with an in-process stand-in.
 */
export function createSupabaseClient(
  config: Pick<AppConfig, "supabaseUrl" | "supabaseAnonKey">,
  fetchImpl?: typeof fetch,
): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseAnonKey, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: fetchImpl ? { fetch: fetchImpl } : {},
  });
}
