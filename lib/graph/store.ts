import { NotFoundError, UnauthorizedError, ValidationError } from "@/lib/errors"
import type { GraphRepository, MindMapPatch, NodePatch } from "@/lib/graph/repository"
import type {
  EdgeCreateRequest,
  MindMap,
  MindMapCreateRequest,
  MindMapEdge,
  MindMapNode,
  MindMapUpdateRequest,
  MindMapWithDetails,
  NodeCreateRequest,
  NodePositionUpdate,
  NodeUpdateRequest,
} from "@/lib/graph/types"

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0
}

function requireField(value: string | null | undefined, label: string) {
  if (isBlank(value)) {
    throw new ValidationError(`${label} is required`)
  }
}

/**
 * Ownership-checked access to mind maps, nodes and edges.
 *
 * Writes need the caller to own the mind map; reads also pass for public maps.
 * Partial updates treat empty strings and zero coordinates as "leave unchanged".
 */
export class GraphStore {
  constructor(private readonly repository: GraphRepository) {}

  // --- Access checks ---

  private async loadMindMap(mindMapId: string): Promise<MindMap> {
    const mindMap = await this.repository.findMindMap(mindMapId)
    if (!mindMap) {
      throw new NotFoundError("mind map not found")
    }
    return mindMap
  }

  async requireOwnedMindMap(userId: string, mindMapId: string): Promise<MindMap> {
    const mindMap = await this.loadMindMap(mindMapId)
    if (mindMap.user_id !== userId) {
      throw new UnauthorizedError()
    }
    return mindMap
  }

  private async requireReadableMindMap(userId: string, mindMapId: string): Promise<MindMap> {
    const mindMap = await this.loadMindMap(mindMapId)
    if (mindMap.user_id !== userId && !mindMap.is_public) {
      throw new UnauthorizedError()
    }
    return mindMap
  }

  private async loadNode(nodeId: string): Promise<MindMapNode> {
    const node = await this.repository.findNode(nodeId)
    if (!node) {
      throw new NotFoundError("node not found")
    }
    return node
  }

  private async loadEdge(edgeId: string): Promise<MindMapEdge> {
    const edge = await this.repository.findEdge(edgeId)
    if (!edge) {
      throw new NotFoundError("edge not found")
    }
    return edge
  }

  // --- Mind maps ---

  async createMindMap(userId: string, request: MindMapCreateRequest): Promise<MindMap> {
    requireField(request.title, "Title")
    return this.repository.insertMindMap({
      user_id: userId,
      title: request.title.trim(),
      description: request.description ?? "",
      is_public: request.is_public ?? false,
    })
  }

  async listMindMaps(userId: string): Promise<MindMap[]> {
    return this.repository.listMindMapsByUser(userId)
  }

  async getMindMap(userId: string, mindMapId: string): Promise<MindMap> {
    return this.requireReadableMindMap(userId, mindMapId)
  }

  async getMindMapWithDetails(userId: string, mindMapId: string): Promise<MindMapWithDetails> {
    const mindMap = await this.requireReadableMindMap(userId, mindMapId)
    const [nodes, edges] = await Promise.all([
      this.repository.listNodes(mindMapId),
      this.repository.listEdges(mindMapId),
    ])
    return { ...mindMap, nodes, edges }
  }

  async updateMindMap(userId: string, mindMapId: string, request: MindMapUpdateRequest): Promise<MindMap> {
    await this.requireOwnedMindMap(userId, mindMapId)

    const patch: MindMapPatch = {}
    if (request.title && !isBlank(request.title)) patch.title = request.title.trim()
    if (request.description) patch.description = request.description
    if (request.is_public !== undefined) patch.is_public = request.is_public
    if (request.status) {
      if (request.status !== "active" && request.status !== "deleted") {
        throw new ValidationError(`Unknown mind map status "${String(request.status)}"`)
      }
      patch.status = request.status
    }

    return this.repository.updateMindMap(mindMapId, patch)
  }

  async deleteMindMap(userId: string, mindMapId: string): Promise<void> {
    await this.requireOwnedMindMap(userId, mindMapId)
    await this.repository.softDeleteMindMap(mindMapId)
  }

  // --- Nodes ---

  async createNode(userId: string, request: NodeCreateRequest): Promise<MindMapNode> {
    requireField(request.mind_map_id, "Mind map ID")
    requireField(request.content, "Content")
    if (!Number.isFinite(request.position_x) || !Number.isFinite(request.position_y)) {
      throw new ValidationError("Position must be a finite number")
    }
    await this.requireOwnedMindMap(userId, request.mind_map_id)

    const parentId = isBlank(request.parent_id) ? null : (request.parent_id ?? null)
    if (parentId) {
      const parent = await this.loadNode(parentId)
      if (parent.mind_map_id !== request.mind_map_id) {
        throw new ValidationError("Parent node belongs to a different mind map")
      }
    }

    return this.repository.insertNode({
      mind_map_id: request.mind_map_id,
      parent_id: parentId,
      content: request.content,
      position_x: request.position_x,
      position_y: request.position_y,
      node_type: isBlank(request.node_type) ? "default" : (request.node_type ?? "default"),
      style_data: request.style_data ?? {},
      metadata: request.metadata ?? {},
    })
  }

  async listNodes(userId: string, mindMapId: string): Promise<MindMapNode[]> {
    await this.requireReadableMindMap(userId, mindMapId)
    return this.repository.listNodes(mindMapId)
  }

  async getNode(userId: string, nodeId: string): Promise<MindMapNode> {
    const node = await this.loadNode(nodeId)
    await this.requireReadableMindMap(userId, node.mind_map_id)
    return node
  }

  async updateNode(userId: string, nodeId: string, request: NodeUpdateRequest): Promise<MindMapNode> {
    for (const value of [request.position_x, request.position_y]) {
      if (value !== undefined && !Number.isFinite(value)) {
        throw new ValidationError("Position must be a finite number")
      }
    }
    const node = await this.loadNode(nodeId)
    await this.requireOwnedMindMap(userId, node.mind_map_id)

    const patch: NodePatch = {}
    if (request.content) patch.content = request.content
    if (request.position_x) patch.position_x = request.position_x
    if (request.position_y) patch.position_y = request.position_y
    if (request.node_type) patch.node_type = request.node_type
    if (request.style_data) patch.style_data = request.style_data
    if (request.metadata) patch.metadata = request.metadata

    return this.repository.updateNode(nodeId, patch)
  }

  async deleteNode(userId: string, nodeId: string): Promise<void> {
    const node = await this.loadNode(nodeId)
    await this.requireOwnedMindMap(userId, node.mind_map_id)
    await this.repository.deleteNode(nodeId)
  }

  /**
   * Moves several nodes in one transaction. Every mind map touched must be owned by
   * the caller; an id that matches no node aborts the whole batch with NotFoundError.
   */
  async batchUpdatePositions(userId: string, updates: NodePositionUpdate[]): Promise<void> {
    if (updates.length === 0) {
      throw new ValidationError("No positions provided")
    }
    for (const update of updates) {
      requireField(update.id, "Node ID")
      if (!Number.isFinite(update.position_x) || !Number.isFinite(update.position_y)) {
        throw new ValidationError(`Position for node ${update.id} must be a finite number`)
      }
    }

    const nodes = await this.repository.findNodes(updates.map((update) => update.id))
    const mindMapIds = new Set(nodes.map((node) => node.mind_map_id))
    for (const mindMapId of mindMapIds) {
      await this.requireOwnedMindMap(userId, mindMapId)
    }

    await this.repository.batchUpdatePositions(updates)
  }

  // --- Edges ---

  async createEdge(userId: string, request: EdgeCreateRequest): Promise<MindMapEdge> {
    requireField(request.mind_map_id, "Mind map ID")
    requireField(request.source_id, "Source ID")
    requireField(request.target_id, "Target ID")
    if (request.source_id === request.target_id) {
      throw new ValidationError("An edge cannot connect a node to itself")
    }
    await this.requireOwnedMindMap(userId, request.mind_map_id)

    const [source, target] = await Promise.all([this.loadNode(request.source_id), this.loadNode(request.target_id)])
    if (source.mind_map_id !== request.mind_map_id || target.mind_map_id !== request.mind_map_id) {
      throw new ValidationError("Edge endpoints must belong to the edge's mind map")
    }

    const edges = await this.repository.listEdges(request.mind_map_id)
    if (reaches(edges, request.target_id, request.source_id)) {
      throw new ValidationError("Edge would create a cycle")
    }

    return this.repository.insertEdge({
      mind_map_id: request.mind_map_id,
      source_id: request.source_id,
      target_id: request.target_id,
      edge_type: isBlank(request.edge_type) ? "default" : (request.edge_type ?? "default"),
      style_data: request.style_data ?? {},
    })
  }

  async listEdges(userId: string, mindMapId: string): Promise<MindMapEdge[]> {
    await this.requireReadableMindMap(userId, mindMapId)
    return this.repository.listEdges(mindMapId)
  }

  async getEdge(userId: string, edgeId: string): Promise<MindMapEdge> {
    const edge = await this.loadEdge(edgeId)
    await this.requireReadableMindMap(userId, edge.mind_map_id)
    return edge
  }

  async deleteEdge(userId: string, edgeId: string): Promise<void> {
    const edge = await this.loadEdge(edgeId)
    await this.requireOwnedMindMap(userId, edge.mind_map_id)
    await this.repository.deleteEdge(edgeId)
  }

  async deleteEdgeBetween(userId: string, mindMapId: string, sourceId: string, targetId: string): Promise<void> {
    requireField(sourceId, "Source ID")
    requireField(targetId, "Target ID")
    await this.requireOwnedMindMap(userId, mindMapId)
    await this.repository.deleteEdgeBetween(mindMapId, sourceId, targetId)
  }
}

/** True when `to` is reachable from `from` along existing edges. */
function reaches(edges: MindMapEdge[], from: string, to: string): boolean {
  const outgoing = new Map<string, string[]>()
  for (const edge of edges) {
    const targets = outgoing.get(edge.source_id) ?? []
    targets.push(edge.target_id)
    outgoing.set(edge.source_id, targets)
  }

  const visited = new Set<string>()
  const queue = [from]
  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    if (current === to) return true
    if (visited.has(current)) continue
    visited.add(current)
    queue.push(...(outgoing.get(current) ?? []))
  }
  return false
}
