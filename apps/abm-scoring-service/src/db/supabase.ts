import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { config } from "../config";

let supabaseInstance: SupabaseClient | null = null;

export function isSupabaseConfigured(): boolean {
  return Boolean(config.supabaseUrl && config.supabaseServiceKey);
}

/**
 * Shared Supabase client for the document store.
 * Returns null when credentials are not configured.
 */
export function getSupabase(): SupabaseClient | null {
  if (!isSupabaseConfigured()) {
    return null;
  }

  if (!supabaseInstance) {
    supabaseInstance = createClient(config.supabaseUrl, config.supabaseServiceKey, {
      auth: { persistSession: false },
    });
    console.log(`[db] Supabase client created for ${config.supabaseUrl}`);
  }

  return supabaseInstance;
}
