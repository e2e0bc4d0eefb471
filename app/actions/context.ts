import type { ActionError } from "@/lib/errors"
import type { Services } from "@/lib/services"
import type { AuthenticatedUserId } from "@/lib/supabase/server"

export interface ActionContext {
  getUserId: AuthenticatedUserId
  services: Services
}

export type ActionResult<T> = ({ success: true } & T) | ActionError

export const UNAUTHORIZED: ActionError = { error: "Unauthorized", code: "unauthorized" }
