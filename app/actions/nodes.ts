import type { ActionContext, ActionResult } from "@/app/actions/context"
import { UNAUTHORIZED } from "@/app/actions/context"
import { toActionError } from "@/lib/errors"
import type { MindMapNode, NodeCreateRequest, NodePositionUpdate, NodeUpdateRequest } from "@/lib/graph/types"

export async function createNode(
  ctx: ActionContext,
  request: NodeCreateRequest,
): Promise<ActionResult<{ node: MindMapNode }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const node = await ctx.services.graph.createNode(userId, request)
    return { success: true, node }
  } catch (error) {
    console.error("[graph] Error in createNode:", error)
    return toActionError(error, "Failed to create node")
  }
}

export async function getNodesByMindMap(
  ctx: ActionContext,
  mindMapId: string,
): Promise<ActionResult<{ nodes: MindMapNode[] }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const nodes = await ctx.services.graph.listNodes(userId, mindMapId)
    return { success: true, nodes }
  } catch (error) {
    console.error("[graph] Error in getNodesByMindMap:", error)
    return toActionError(error, "Failed to get nodes")
  }
}

export async function getNode(ctx: ActionContext, nodeId: string): Promise<ActionResult<{ node: MindMapNode }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const node = await ctx.services.graph.getNode(userId, nodeId)
    return { success: true, node }
  } catch (error) {
    console.error("[graph] Error in getNode:", error)
    return toActionError(error, "Failed to get node")
  }
}

export async function updateNode(
  ctx: ActionContext,
  nodeId: string,
  request: NodeUpdateRequest,
): Promise<ActionResult<{ node: MindMapNode }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const node = await ctx.services.graph.updateNode(userId, nodeId, request)
    return { success: true, node }
  } catch (error) {
    console.error("[graph] Error in updateNode:", error)
    return toActionError(error, "Failed to update node")
  }
}

export async function deleteNode(ctx: ActionContext, nodeId: string): Promise<ActionResult<object>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    await ctx.services.graph.deleteNode(userId, nodeId)
    return { success: true }
  } catch (error) {
    console.error("[graph] Error in deleteNode:", error)
    return toActionError(error, "Failed to delete node")
  }
}

export async function batchUpdateNodePositions(
  ctx: ActionContext,
  positions: NodePositionUpdate[],
): Promise<ActionResult<{ updated: number }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    await ctx.services.graph.batchUpdatePositions(userId, positions)
    return { success: true, updated: positions.length }
  } catch (error) {
    console.error("[graph] Error in batchUpdateNodePositions:", error)
    return toActionError(error, "Failed to update node positions")
  }
}
