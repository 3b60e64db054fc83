// src/lib/db.ts
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export function createSupabaseService(
  url: string,
  serviceRole: string // server-only key
): SupabaseClient {
  return createClient(url, serviceRole, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
