import type { ApiKeyService } from "@/lib/credentials/api-keys"
import {
  DecryptionError,
  NoCredentialError,
  NotFoundError,
  PartialMaterializationError,
  ValidationError,
} from "@/lib/errors"
import type { GraphStore } from "@/lib/graph/store"
import type { MindMapEdge, MindMapNode, Position } from "@/lib/graph/types"
import { computePositions, parseLayoutStrategy } from "@/lib/ideas/layout"
import { normalizeIdeas, type Idea } from "@/lib/ideas/normalizer"
import { buildIdeaPrompt } from "@/lib/ideas/prompt"
import type { CompletionClient } from "@/lib/openai"

export const IDEA_SERVICE = "openai"
export const DEFAULT_IDEA_COUNT = 5
export const MAX_IDEA_COUNT = 10
export const IDEA_NODE_TYPE = "idea"
export const IDEA_EDGE_TYPE = "idea"

export interface GenerateIdeasInput {
  mindMapId: string
  userId: string
  topic: string
  context?: string
  generationType?: string
  count?: number
  apiKey?: string
}

export interface MaterializeInput {
  mindMapId: string
  userId: string
  parentId?: string | null
  ideas: Idea[]
  anchor: Position
  layout?: string
}

export interface MaterializedIdeas {
  nodes: MindMapNode[]
  edges: MindMapEdge[]
}

export interface IdeaPipelineDeps {
  store: GraphStore
  apiKeys: ApiKeyService
  completions: CompletionClient
  /** Service-wide fallback key, fixed at startup. */
  defaultApiKey: string | null
}

export function clampIdeaCount(count: number | undefined): number {
  if (count === undefined) return DEFAULT_IDEA_COUNT
  const whole = Math.floor(count)
  if (!(whole > 0)) return DEFAULT_IDEA_COUNT
  return Math.min(whole, MAX_IDEA_COUNT)
}

export class IdeaPipeline {
  constructor(private readonly deps: IdeaPipelineDeps) {}

  /** Explicit key, then the user's stored active key, then the service default. */
  async resolveApiKey(userId: string, explicitKey?: string): Promise<string> {
    if (explicitKey && explicitKey.trim().length > 0) {
      return explicitKey.trim()
    }

    try {
      const stored = await this.deps.apiKeys.getDecryptedApiKey(userId, IDEA_SERVICE)
      if (stored) return stored
    } catch (error) {
      if (!(error instanceof NotFoundError || error instanceof NoCredentialError || error instanceof DecryptionError)) {
        throw error
      }
      if (!(error instanceof NotFoundError)) {
        console.warn(`[ideas] Stored ${IDEA_SERVICE} key unusable for user ${userId}: ${error.message}`)
      }
    }

    if (this.deps.defaultApiKey) {
      return this.deps.defaultApiKey
    }
    throw new NoCredentialError()
  }

  async generate(input: GenerateIdeasInput): Promise<Idea[]> {
    if (!input.mindMapId?.trim()) {
      throw new ValidationError("Mind map ID is required")
    }
    if (!input.topic?.trim()) {
      throw new ValidationError("Topic is required")
    }

    await this.deps.store.requireOwnedMindMap(input.userId, input.mindMapId)

    const count = clampIdeaCount(input.count)
    const apiKey = await this.resolveApiKey(input.userId, input.apiKey)
    const { generationType, systemPrompt, userPrompt } = buildIdeaPrompt(input.generationType, {
      topic: input.topic.trim(),
      context: input.context?.trim() ?? "",
      count,
    })

    console.log(`[ideas] Generating ${count} "${generationType}" ideas for mind map ${input.mindMapId}`)
    const reply = await this.deps.completions.complete({ apiKey, systemPrompt, userPrompt })
    return normalizeIdeas(reply, count)
  }

  /**
   * Creates one node per idea and, under a parent, one parent→node edge each.
   * Not transactional: a failure stops the loop and reports what was already created.
   */
  async materialize(input: MaterializeInput): Promise<MaterializedIdeas> {
    if (!input.mindMapId?.trim()) {
      throw new ValidationError("Mind map ID is required")
    }
    const blank = input.ideas.findIndex((idea) => !idea.content?.trim())
    if (blank >= 0) {
      throw new ValidationError(`Idea ${blank + 1} has no content`)
    }
    await this.deps.store.requireOwnedMindMap(input.userId, input.mindMapId)

    const parentId = input.parentId?.trim() ? input.parentId.trim() : null
    if (parentId) {
      const parent = await this.deps.store.getNode(input.userId, parentId)
      if (parent.mind_map_id !== input.mindMapId) {
        throw new NotFoundError("parent node not found in this mind map")
      }
    }

    const positions = computePositions(input.anchor, input.ideas.length, parseLayoutStrategy(input.layout))
    const created: MaterializedIdeas = { nodes: [], edges: [] }

    for (const [index, idea] of input.ideas.entries()) {
      try {
        const node = await this.deps.store.createNode(input.userId, {
          mind_map_id: input.mindMapId,
          parent_id: parentId,
          content: idea.content,
          position_x: positions[index].x,
          position_y: positions[index].y,
          node_type: IDEA_NODE_TYPE,
          metadata: { confidence: idea.confidence },
        })
        created.nodes.push(node)

        if (parentId) {
          const edge = await this.deps.store.createEdge(input.userId, {
            mind_map_id: input.mindMapId,
            source_id: parentId,
            target_id: node.id,
            edge_type: IDEA_EDGE_TYPE,
          })
          created.edges.push(edge)
        }
      } catch (error) {
        console.error(
          `[ideas] Materialize stopped at idea ${index + 1}/${input.ideas.length} ` +
            `(${created.nodes.length} nodes, ${created.edges.length} edges kept):`,
          error,
        )
        throw new PartialMaterializationError(
          `Failed to create nodes from ideas after ${created.nodes.length} nodes and ${created.edges.length} edges`,
          created,
          error,
        )
      }
    }

    return created
  }

  async generateAndMaterialize(
    input: GenerateIdeasInput & Omit<MaterializeInput, "ideas">,
  ): Promise<MaterializedIdeas & { ideas: Idea[] }> {
    const ideas = await this.generate(input)
    const created = await this.materialize({ ...input, ideas })
    return { ideas, ...created }
  }
}
