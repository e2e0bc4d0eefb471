/**
 * In-process graph store.
 *
 * Backs local development (GRAPH_STORE=memory) and the test suite. It mirrors the
 * constraints the Postgres schema declares in supabase/migrations so both stores
 * behave the same behind the repository interfaces.
 */
import { createStore } from "zustand/vanilla"
import { nanoid } from "nanoid"
import { NotFoundError, UniqueViolationError } from "@/lib/errors"
import type {
  ApiKeyPatch,
  ApiKeyRepository,
  GraphRepository,
  MindMapPatch,
  NewEdge,
  NewMindMap,
  NewNode,
  NodePatch,
} from "@/lib/graph/repository"
import type { ApiKeyRecord, MindMap, MindMapEdge, MindMapNode, NodePositionUpdate } from "@/lib/graph/types"

interface GraphState {
  mindMaps: Record<string, MindMap>
  nodes: Record<string, MindMapNode>
  edges: Record<string, MindMapEdge>
  apiKeys: Record<string, ApiKeyRecord>
}

export interface MemoryRepositoryOptions {
  now?: () => Date
  generateId?: () => string
}

/** Collect a node and every parent-link descendant. */
function collectSubtree(nodeId: string, nodes: Record<string, MindMapNode>): Set<string> {
  const childrenIndex = new Map<string, string[]>()
  for (const node of Object.values(nodes)) {
    if (!node.parent_id) continue
    const siblings = childrenIndex.get(node.parent_id) ?? []
    siblings.push(node.id)
    childrenIndex.set(node.parent_id, siblings)
  }

  const result = new Set<string>()
  const stack = [nodeId]
  let currentId = stack.pop()
  while (currentId !== undefined) {
    if (!result.has(currentId) && nodes[currentId]) {
      result.add(currentId)
      stack.push(...(childrenIndex.get(currentId) ?? []))
    }
    currentId = stack.pop()
  }
  return result
}

export class MemoryGraphRepository implements GraphRepository, ApiKeyRepository {
  private readonly store = createStore<GraphState>()(() => ({
    mindMaps: {},
    nodes: {},
    edges: {},
    apiKeys: {},
  }))

  private readonly now: () => Date
  private readonly generateId: () => string

  constructor(options: MemoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? (() => nanoid())
  }

  private timestamp() {
    return this.now().toISOString()
  }

  // --- Mind maps ---

  async insertMindMap(input: NewMindMap): Promise<MindMap> {
    const now = this.timestamp()
    const mindMap: MindMap = {
      id: this.generateId(),
      ...input,
      status: "active",
      created_at: now,
      updated_at: now,
    }
    this.store.setState((state) => ({ mindMaps: { ...state.mindMaps, [mindMap.id]: mindMap } }))
    return structuredClone(mindMap)
  }

  async findMindMap(id: string): Promise<MindMap | null> {
    const mindMap = this.store.getState().mindMaps[id]
    if (!mindMap || mindMap.status === "deleted") return null
    return structuredClone(mindMap)
  }

  async listMindMapsByUser(userId: string): Promise<MindMap[]> {
    return Object.values(this.store.getState().mindMaps)
      .filter((mindMap) => mindMap.user_id === userId && mindMap.status !== "deleted")
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .map((mindMap) => structuredClone(mindMap))
  }

  async updateMindMap(id: string, patch: MindMapPatch): Promise<MindMap> {
    const existing = await this.findMindMap(id)
    if (!existing) {
      throw new NotFoundError("mind map not found or already deleted")
    }
    const updated: MindMap = { ...existing, ...patch, updated_at: this.timestamp() }
    this.store.setState((state) => ({ mindMaps: { ...state.mindMaps, [id]: updated } }))
    return structuredClone(updated)
  }

  async softDeleteMindMap(id: string): Promise<void> {
    await this.updateMindMap(id, { status: "deleted" })
  }

  // --- Nodes ---

  async insertNode(input: NewNode): Promise<MindMapNode> {
    const state = this.store.getState()
    if (!state.mindMaps[input.mind_map_id]) {
      throw new NotFoundError("mind map not found")
    }
    if (input.parent_id && !state.nodes[input.parent_id]) {
      throw new NotFoundError("parent node not found")
    }

    const now = this.timestamp()
    const node: MindMapNode = {
      id: this.generateId(),
      ...structuredClone(input),
      created_at: now,
      updated_at: now,
    }
    this.store.setState((current) => ({ nodes: { ...current.nodes, [node.id]: node } }))
    return structuredClone(node)
  }

  async findNode(id: string): Promise<MindMapNode | null> {
    const node = this.store.getState().nodes[id]
    return node ? structuredClone(node) : null
  }

  async findNodes(ids: string[]): Promise<MindMapNode[]> {
    const { nodes } = this.store.getState()
    return [...new Set(ids)].flatMap((id) => (nodes[id] ? [structuredClone(nodes[id])] : []))
  }

  async listNodes(mindMapId: string): Promise<MindMapNode[]> {
    return Object.values(this.store.getState().nodes)
      .filter((node) => node.mind_map_id === mindMapId)
      .map((node) => structuredClone(node))
  }

  async updateNode(id: string, patch: NodePatch): Promise<MindMapNode> {
    const existing = this.store.getState().nodes[id]
    if (!existing) {
      throw new NotFoundError("node not found")
    }
    const updated: MindMapNode = { ...existing, ...structuredClone(patch), updated_at: this.timestamp() }
    this.store.setState((state) => ({ nodes: { ...state.nodes, [id]: updated } }))
    return structuredClone(updated)
  }

  async deleteNode(id: string): Promise<void> {
    const { nodes, edges } = this.store.getState()
    if (!nodes[id]) {
      throw new NotFoundError("node not found")
    }

    const removed = collectSubtree(id, nodes)
    const remainingNodes = Object.fromEntries(Object.entries(nodes).filter(([nodeId]) => !removed.has(nodeId)))
    const remainingEdges = Object.fromEntries(
      Object.entries(edges).filter(([, edge]) => !removed.has(edge.source_id) && !removed.has(edge.target_id)),
    )
    this.store.setState({ nodes: remainingNodes, edges: remainingEdges })
  }

  async batchUpdatePositions(updates: NodePositionUpdate[]): Promise<void> {
    const { nodes } = this.store.getState()
    const now = this.timestamp()
    const next = { ...nodes }

    for (const update of updates) {
      const node = next[update.id]
      if (!node) {
        // Nothing has been written yet; `next` is discarded.
        throw new NotFoundError(`node ${update.id} not found`)
      }
      next[update.id] = { ...node, position_x: update.position_x, position_y: update.position_y, updated_at: now }
    }

    this.store.setState({ nodes: next })
  }

  // --- Edges ---

  async insertEdge(input: NewEdge): Promise<MindMapEdge> {
    const { mindMaps, nodes, edges } = this.store.getState()
    if (!mindMaps[input.mind_map_id]) {
      throw new NotFoundError("mind map not found")
    }
    if (!nodes[input.source_id] || !nodes[input.target_id]) {
      throw new NotFoundError("edge endpoint not found")
    }
    const duplicate = Object.values(edges).some(
      (edge) =>
        edge.mind_map_id === input.mind_map_id &&
        edge.source_id === input.source_id &&
        edge.target_id === input.target_id,
    )
    if (duplicate) {
      throw new UniqueViolationError("an edge between these nodes already exists")
    }

    const edge: MindMapEdge = {
      id: this.generateId(),
      ...structuredClone(input),
      created_at: this.timestamp(),
    }
    this.store.setState((state) => ({ edges: { ...state.edges, [edge.id]: edge } }))
    return structuredClone(edge)
  }

  async findEdge(id: string): Promise<MindMapEdge | null> {
    const edge = this.store.getState().edges[id]
    return edge ? structuredClone(edge) : null
  }

  async listEdges(mindMapId: string): Promise<MindMapEdge[]> {
    return Object.values(this.store.getState().edges)
      .filter((edge) => edge.mind_map_id === mindMapId)
      .map((edge) => structuredClone(edge))
  }

  async deleteEdge(id: string): Promise<void> {
    const { edges } = this.store.getState()
    if (!edges[id]) {
      throw new NotFoundError("edge not found")
    }
    const { [id]: _removed, ...rest } = edges
    this.store.setState({ edges: rest })
  }

  async deleteEdgeBetween(mindMapId: string, sourceId: string, targetId: string): Promise<void> {
    const match = Object.values(this.store.getState().edges).find(
      (edge) => edge.mind_map_id === mindMapId && edge.source_id === sourceId && edge.target_id === targetId,
    )
    if (!match) {
      throw new NotFoundError("edge not found between the specified nodes")
    }
    await this.deleteEdge(match.id)
  }

  // --- API keys ---

  async upsertApiKey(userId: string, service: string, encryptedKey: string): Promise<ApiKeyRecord> {
    const existing = await this.findApiKeyByService(userId, service)
    if (existing) {
      return this.updateApiKey(existing.id, { encrypted_key: encryptedKey, is_active: true })
    }

    const now = this.timestamp()
    const record: ApiKeyRecord = {
      id: this.generateId(),
      user_id: userId,
      service,
      encrypted_key: encryptedKey,
      is_active: true,
      created_at: now,
      updated_at: now,
    }
    this.store.setState((state) => ({ apiKeys: { ...state.apiKeys, [record.id]: record } }))
    return { ...record }
  }

  async findApiKey(id: string): Promise<ApiKeyRecord | null> {
    const record = this.store.getState().apiKeys[id]
    return record ? { ...record } : null
  }

  async findApiKeyByService(userId: string, service: string): Promise<ApiKeyRecord | null> {
    const record = Object.values(this.store.getState().apiKeys).find(
      (candidate) => candidate.user_id === userId && candidate.service === service,
    )
    return record ? { ...record } : null
  }

  async listApiKeys(userId: string): Promise<ApiKeyRecord[]> {
    return Object.values(this.store.getState().apiKeys)
      .filter((record) => record.user_id === userId)
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .map((record) => ({ ...record }))
  }

  async updateApiKey(id: string, patch: ApiKeyPatch): Promise<ApiKeyRecord> {
    const existing = this.store.getState().apiKeys[id]
    if (!existing) {
      throw new NotFoundError("API key not found")
    }
    const updated: ApiKeyRecord = { ...existing, ...patch, updated_at: this.timestamp() }
    this.store.setState((state) => ({ apiKeys: { ...state.apiKeys, [id]: updated } }))
    return { ...updated }
  }

  async deleteApiKey(id: string): Promise<void> {
    const { apiKeys } = this.store.getState()
    if (!apiKeys[id]) {
      throw new NotFoundError("API key not found")
    }
    const { [id]: _removed, ...rest } = apiKeys
    this.store.setState({ apiKeys: rest })
  }
}
