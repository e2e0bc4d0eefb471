import type {
  ApiKeyRecord,
  JsonObject,
  MindMap,
  MindMapEdge,
  MindMapNode,
  MindMapStatus,
  NodePositionUpdate,
} from "@/lib/graph/types"

export interface NewMindMap {
  user_id: string
  title: string
  description: string
  is_public: boolean
}

export type MindMapPatch = Partial<{
  title: string
  description: string
  is_public: boolean
  status: MindMapStatus
}>

export interface NewNode {
  mind_map_id: string
  parent_id: string | null
  content: string
  position_x: number
  position_y: number
  node_type: string
  style_data: JsonObject
  metadata: JsonObject
}

export type NodePatch = Partial<{
  content: string
  position_x: number
  position_y: number
  node_type: string
  style_data: JsonObject
  metadata: JsonObject
}>

export interface NewEdge {
  mind_map_id: string
  source_id: string
  target_id: string
  edge_type: string
  style_data: JsonObject
}

/**
 * Persistence contract for mind maps, nodes and edges.
 *
 * Implementations own the referential rules the database enforces: deleting a node
 * removes its parent-link descendants and every edge touching them, `(source, target)`
 * is unique per mind map, and `batchUpdatePositions` is all-or-nothing. Lookups of
 * soft-deleted mind maps return `null`. Zero-row updates and deletes throw
 * `NotFoundError`; everything else surfaces as `StoreError`.
 */
export interface GraphRepository {
  insertMindMap(input: NewMindMap): Promise<MindMap>
  findMindMap(id: string): Promise<MindMap | null>
  listMindMapsByUser(userId: string): Promise<MindMap[]>
  updateMindMap(id: string, patch: MindMapPatch): Promise<MindMap>
  softDeleteMindMap(id: string): Promise<void>

  insertNode(input: NewNode): Promise<MindMapNode>
  findNode(id: string): Promise<MindMapNode | null>
  findNodes(ids: string[]): Promise<MindMapNode[]>
  listNodes(mindMapId: string): Promise<MindMapNode[]>
  updateNode(id: string, patch: NodePatch): Promise<MindMapNode>
  deleteNode(id: string): Promise<void>
  batchUpdatePositions(updates: NodePositionUpdate[]): Promise<void>

  insertEdge(input: NewEdge): Promise<MindMapEdge>
  findEdge(id: string): Promise<MindMapEdge | null>
  listEdges(mindMapId: string): Promise<MindMapEdge[]>
  deleteEdge(id: string): Promise<void>
  deleteEdgeBetween(mindMapId: string, sourceId: string, targetId: string): Promise<void>
}

export type ApiKeyPatch = Partial<{
  encrypted_key: string
  is_active: boolean
}>

export interface ApiKeyRepository {
  /** Inserts, or overwrites and re-activates the existing `(user, service)` record. */
  upsertApiKey(userId: string, service: string, encryptedKey: string): Promise<ApiKeyRecord>
  findApiKey(id: string): Promise<ApiKeyRecord | null>
  findApiKeyByService(userId: string, service: string): Promise<ApiKeyRecord | null>
  listApiKeys(userId: string): Promise<ApiKeyRecord[]>
  updateApiKey(id: string, patch: ApiKeyPatch): Promise<ApiKeyRecord>
  deleteApiKey(id: string): Promise<void>
}
