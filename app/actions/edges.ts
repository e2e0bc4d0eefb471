import type { ActionContext, ActionResult } from "@/app/actions/context"
import { UNAUTHORIZED } from "@/app/actions/context"
import { toActionError } from "@/lib/errors"
import type { EdgeCreateRequest, MindMapEdge } from "@/lib/graph/types"

export async function createEdge(
  ctx: ActionContext,
  request: EdgeCreateRequest,
): Promise<ActionResult<{ edge: MindMapEdge }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const edge = await ctx.services.graph.createEdge(userId, request)
    return { success: true, edge }
  } catch (error) {
    console.error("[graph] Error in createEdge:", error)
    return toActionError(error, "Failed to create edge")
  }
}

export async function getEdgesByMindMap(
  ctx: ActionContext,
  mindMapId: string,
): Promise<ActionResult<{ edges: MindMapEdge[] }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const edges = await ctx.services.graph.listEdges(userId, mindMapId)
    return { success: true, edges }
  } catch (error) {
    console.error("[graph] Error in getEdgesByMindMap:", error)
    return toActionError(error, "Failed to get edges")
  }
}

export async function getEdge(ctx: ActionContext, edgeId: string): Promise<ActionResult<{ edge: MindMapEdge }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const edge = await ctx.services.graph.getEdge(userId, edgeId)
    return { success: true, edge }
  } catch (error) {
    console.error("[graph] Error in getEdge:", error)
    return toActionError(error, "Failed to get edge")
  }
}

export async function deleteEdge(ctx: ActionContext, edgeId: string): Promise<ActionResult<object>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    await ctx.services.graph.deleteEdge(userId, edgeId)
    return { success: true }
  } catch (error) {
    console.error("[graph] Error in deleteEdge:", error)
    return toActionError(error, "Failed to delete edge")
  }
}

export async function deleteEdgeByNodes(
  ctx: ActionContext,
  mindMapId: string,
  sourceId: string,
  targetId: string,
): Promise<ActionResult<object>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    await ctx.services.graph.deleteEdgeBetween(userId, mindMapId, sourceId, targetId)
    return { success: true }
  } catch (error) {
    console.error("[graph] Error in deleteEdgeByNodes:", error)
    return toActionError(error, "Failed to delete edge")
  }
}
