import type { ActionContext, ActionResult } from "@/app/actions/context"
import { UNAUTHORIZED } from "@/app/actions/context"
import { toActionError } from "@/lib/errors"
import type { MindMap, MindMapCreateRequest, MindMapUpdateRequest, MindMapWithDetails } from "@/lib/graph/types"

export async function createMindMap(
  ctx: ActionContext,
  request: MindMapCreateRequest,
): Promise<ActionResult<{ mindMap: MindMap }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const mindMap = await ctx.services.graph.createMindMap(userId, request)
    return { success: true, mindMap }
  } catch (error) {
    console.error("[graph] Error in createMindMap:", error)
    return toActionError(error, "Failed to create mind map")
  }
}

export async function getMindMaps(ctx: ActionContext): Promise<ActionResult<{ mindMaps: MindMap[] }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const mindMaps = await ctx.services.graph.listMindMaps(userId)
    return { success: true, mindMaps }
  } catch (error) {
    console.error("[graph] Error in getMindMaps:", error)
    return toActionError(error, "Failed to get mind maps")
  }
}

export async function getMindMap(
  ctx: ActionContext,
  mindMapId: string,
): Promise<ActionResult<{ mindMap: MindMap }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const mindMap = await ctx.services.graph.getMindMap(userId, mindMapId)
    return { success: true, mindMap }
  } catch (error) {
    console.error("[graph] Error in getMindMap:", error)
    return toActionError(error, "Failed to get mind map")
  }
}

export async function getMindMapDetails(
  ctx: ActionContext,
  mindMapId: string,
): Promise<ActionResult<{ mindMap: MindMapWithDetails }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const mindMap = await ctx.services.graph.getMindMapWithDetails(userId, mindMapId)
    return { success: true, mindMap }
  } catch (error) {
    console.error("[graph] Error in getMindMapDetails:", error)
    return toActionError(error, "Failed to get mind map")
  }
}

export async function updateMindMap(
  ctx: ActionContext,
  mindMapId: string,
  request: MindMapUpdateRequest,
): Promise<ActionResult<{ mindMap: MindMap }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const mindMap = await ctx.services.graph.updateMindMap(userId, mindMapId, request)
    return { success: true, mindMap }
  } catch (error) {
    console.error("[graph] Error in updateMindMap:", error)
    return toActionError(error, "Failed to update mind map")
  }
}

export async function deleteMindMap(ctx: ActionContext, mindMapId: string): Promise<ActionResult<object>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    await ctx.services.graph.deleteMindMap(userId, mindMapId)
    return { success: true }
  } catch (error) {
    console.error("[graph] Error in deleteMindMap:", error)
    return toActionError(error, "Failed to delete mind map")
  }
}
