import type { ActionContext, ActionResult } from "@/app/actions/context"
import { UNAUTHORIZED } from "@/app/actions/context"
import type { ApiKeySaveRequest, ApiKeyUpdateRequest } from "@/lib/credentials/api-keys"
import { toActionError } from "@/lib/errors"
import type { ApiKeySummary } from "@/lib/graph/types"

export async function saveApiKey(
  ctx: ActionContext,
  request: ApiKeySaveRequest,
): Promise<ActionResult<{ apiKey: ApiKeySummary }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const apiKey = await ctx.services.apiKeys.saveApiKey(userId, request)
    return { success: true, apiKey }
  } catch (error) {
    console.error("[api-keys] Error in saveApiKey:", error)
    return toActionError(error, "Failed to create API key")
  }
}

export async function getApiKeys(ctx: ActionContext): Promise<ActionResult<{ apiKeys: ApiKeySummary[] }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const apiKeys = await ctx.services.apiKeys.listApiKeys(userId)
    return { success: true, apiKeys }
  } catch (error) {
    console.error("[api-keys] Error in getApiKeys:", error)
    return toActionError(error, "Failed to get API keys")
  }
}

export async function getApiKey(ctx: ActionContext, id: string): Promise<ActionResult<{ apiKey: ApiKeySummary }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const apiKey = await ctx.services.apiKeys.getApiKey(userId, id)
    return { success: true, apiKey }
  } catch (error) {
    console.error("[api-keys] Error in getApiKey:", error)
    return toActionError(error, "Failed to get API key")
  }
}

/** `apiKey` is null when the user has no key for the service. */
export async function getApiKeyByService(
  ctx: ActionContext,
  service: string,
): Promise<ActionResult<{ apiKey: ApiKeySummary | null }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const apiKey = await ctx.services.apiKeys.getApiKeyByService(userId, service)
    return { success: true, apiKey }
  } catch (error) {
    console.error("[api-keys] Error in getApiKeyByService:", error)
    return toActionError(error, "Failed to get API key")
  }
}

export async function updateApiKey(
  ctx: ActionContext,
  id: string,
  request: ApiKeyUpdateRequest,
): Promise<ActionResult<{ apiKey: ApiKeySummary }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const apiKey = await ctx.services.apiKeys.updateApiKey(userId, id, request)
    return { success: true, apiKey }
  } catch (error) {
    console.error("[api-keys] Error in updateApiKey:", error)
    return toActionError(error, "Failed to update API key")
  }
}

export async function deleteApiKey(ctx: ActionContext, id: string): Promise<ActionResult<object>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    await ctx.services.apiKeys.deleteApiKey(userId, id)
    return { success: true }
  } catch (error) {
    console.error("[api-keys] Error in deleteApiKey:", error)
    return toActionError(error, "Failed to delete API key")
  }
}
