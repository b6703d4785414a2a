import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { TutorConfig } from "./config";

/**
 * Service-role client used by repositories and background jobs. Jobs never
 * borrow a request's client: they outlive the request that started them.
 */
export function createServiceClient(config: TutorConfig["supabase"]): SupabaseClient {
  if (!config.url || !config.serviceRoleKey) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be configured");
  }
  return createClient(config.url, config.serviceRoleKey, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
}
