import type { SupabaseClient } from "@supabase/supabase-js"

/** Resolves the acting user for one request; `null` means unauthenticated. */
export type AuthenticatedUserId = () => Promise<string | null>

export function supabaseUserResolver(supabase: SupabaseClient, accessToken: string | null): AuthenticatedUserId {
  return async () => {
    if (!accessToken) return null

    const {
      data: { user },
      error,
    } = await supabase.auth.getUser(accessToken)
    if (error) {
      console.warn("[auth] Rejected access token:", error.message)
      return null
    }
    return user?.id ?? null
  }
}

export function staticUserResolver(userId: string | null): AuthenticatedUserId {
  return async () => userId
}
