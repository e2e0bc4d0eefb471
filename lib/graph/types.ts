export type JsonObject = { [key: string]: JsonValue }
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject

export type MindMapStatus = "active" | "deleted"

export interface MindMap {
  id: string
  user_id: string
  title: string
  description: string
  is_public: boolean
  status: MindMapStatus
  created_at: string
  updated_at: string
}

export interface MindMapNode {
  id: string
  mind_map_id: string
  parent_id: string | null
  content: string
  position_x: number
  position_y: number
  node_type: string
  style_data: JsonObject
  metadata: JsonObject
  created_at: string
  updated_at: string
}

export interface MindMapEdge {
  id: string
  mind_map_id: string
  source_id: string
  target_id: string
  edge_type: string
  style_data: JsonObject
  created_at: string
}

export interface MindMapWithDetails extends MindMap {
  nodes: MindMapNode[]
  edges: MindMapEdge[]
}

export interface ApiKeyRecord {
  id: string
  user_id: string
  service: string
  encrypted_key: string
  is_active: boolean
  created_at: string
  updated_at: string
}

export type ApiKeySummary = Omit<ApiKeyRecord, "encrypted_key">

export interface Position {
  x: number
  y: number
}

export interface NodePositionUpdate {
  id: string
  position_x: number
  position_y: number
}

// Request shapes

export interface MindMapCreateRequest {
  title: string
  description?: string
  is_public?: boolean
}

export interface MindMapUpdateRequest {
  title?: string
  description?: string
  is_public?: boolean
  status?: MindMapStatus
}

export interface NodeCreateRequest {
  mind_map_id: string
  parent_id?: string | null
  content: string
  position_x: number
  position_y: number
  node_type?: string
  style_data?: JsonObject
  metadata?: JsonObject
}

export interface NodeUpdateRequest {
  content?: string
  position_x?: number
  position_y?: number
  node_type?: string
  style_data?: JsonObject
  metadata?: JsonObject
}

export interface EdgeCreateRequest {
  mind_map_id: string
  source_id: string
  target_id: string
  edge_type?: string
  style_data?: JsonObject
}
