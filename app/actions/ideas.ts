import type { ActionContext, ActionResult } from "@/app/actions/context"
import { UNAUTHORIZED } from "@/app/actions/context"
import { PartialMaterializationError, toActionError, type ActionError } from "@/lib/errors"
import type { MindMapEdge, MindMapNode } from "@/lib/graph/types"
import type { Idea } from "@/lib/ideas/normalizer"

export interface GenerateIdeasRequest {
  mind_map_id: string
  topic: string
  context?: string
  type?: string
  count?: number
  api_key?: string
}

export interface CreateNodesFromIdeasRequest {
  mind_map_id: string
  parent_id?: string
  ideas: Idea[]
  start_x?: number
  start_y?: number
  layout?: string
}

export async function generateIdeas(
  ctx: ActionContext,
  request: GenerateIdeasRequest,
): Promise<ActionResult<{ ideas: Idea[] }>> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const ideas = await ctx.services.ideas.generate({
      mindMapId: request.mind_map_id,
      userId,
      topic: request.topic,
      context: request.context,
      generationType: request.type,
      count: request.count,
      apiKey: request.api_key,
    })
    return { success: true, ideas }
  } catch (error) {
    console.error("[ideas] Error in generateIdeas:", error)
    return toActionError(error, "Failed to generate ideas")
  }
}

type PartialNodesError = ActionError & { created: { nodes: number; edges: number } }

export async function createNodesFromIdeas(
  ctx: ActionContext,
  request: CreateNodesFromIdeasRequest,
): Promise<ActionResult<{ nodes: MindMapNode[]; edges: MindMapEdge[] }> | PartialNodesError> {
  const userId = await ctx.getUserId()
  if (!userId) {
    return UNAUTHORIZED
  }

  try {
    const { nodes, edges } = await ctx.services.ideas.materialize({
      mindMapId: request.mind_map_id,
      userId,
      parentId: request.parent_id,
      ideas: request.ideas,
      anchor: { x: request.start_x ?? 0, y: request.start_y ?? 0 },
      layout: request.layout,
    })
    return { success: true, nodes, edges }
  } catch (error) {
    console.error("[ideas] Error in createNodesFromIdeas:", error)
    if (error instanceof PartialMaterializationError) {
      return {
        ...toActionError(error, "Failed to create nodes"),
        created: { nodes: error.createdNodes, edges: error.createdEdges },
      }
    }
    return toActionError(error, "Failed to create nodes")
  }
}
