import { createClient } from "@supabase/supabase-js"
import type { AppConfig } from "@/lib/config"

export function createAdminClient(config: AppConfig) {
  if (!config.supabase) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set for admin operations.")
  }

  return createClient(config.supabase.url, config.supabase.serviceKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  })
}
