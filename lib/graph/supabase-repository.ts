import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js"
import { NotFoundError, StoreError, UniqueViolationError } from "@/lib/errors"
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
import type {
  ApiKeyRecord,
  JsonObject,
  MindMap,
  MindMapEdge,
  MindMapNode,
  NodePositionUpdate,
} from "@/lib/graph/types"

const MIND_MAP_COLUMNS = "id, user_id, title, description, is_public, status, created_at, updated_at"
const NODE_COLUMNS =
  "id, mind_map_id, parent_id, content, position_x, position_y, node_type, style_data, metadata, created_at, updated_at"
const EDGE_COLUMNS = "id, mind_map_id, source_id, target_id, edge_type, style_data, created_at"
const API_KEY_COLUMNS = "id, user_id, service, encrypted_key, is_active, created_at, updated_at"

// Postgres error codes surfaced by PostgREST
const UNIQUE_VIOLATION = "23505"
const FOREIGN_KEY_VIOLATION = "23503"
const NO_DATA_FOUND = "P0002"
// A malformed uuid can't match any row.
const INVALID_TEXT_REPRESENTATION = "22P02"

export function toStoreError(error: Pick<PostgrestError, "code" | "message">, action: string): Error {
  console.error(`[graph] Error ${action}:`, error)
  switch (error.code) {
    case UNIQUE_VIOLATION:
      return new UniqueViolationError(error.message, { cause: error })
    case FOREIGN_KEY_VIOLATION:
    case NO_DATA_FOUND:
    case INVALID_TEXT_REPRESENTATION:
      return new NotFoundError(error.message)
    default:
      return new StoreError(`Failed ${action}: ${error.message}`, { cause: error })
  }
}

function toJsonObject(value: unknown): JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value) ? (value as JsonObject) : {}
}

function toMindMap(row: MindMap): MindMap {
  return { ...row, description: row.description ?? "" }
}

function toNode(row: MindMapNode): MindMapNode {
  return { ...row, style_data: toJsonObject(row.style_data), metadata: toJsonObject(row.metadata) }
}

function toEdge(row: MindMapEdge): MindMapEdge {
  return { ...row, style_data: toJsonObject(row.style_data) }
}

export class SupabaseGraphRepository implements GraphRepository, ApiKeyRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  // --- Mind maps ---

  async insertMindMap(input: NewMindMap): Promise<MindMap> {
    const { data, error } = await this.supabase
      .from("mind_maps")
      .insert({ ...input, status: "active" })
      .select(MIND_MAP_COLUMNS)
      .single()

    if (error) throw toStoreError(error, "creating mind map")
    return toMindMap(data as MindMap)
  }

  async findMindMap(id: string): Promise<MindMap | null> {
    const { data, error } = await this.supabase
      .from("mind_maps")
      .select(MIND_MAP_COLUMNS)
      .eq("id", id)
      .neq("status", "deleted")
      .maybeSingle()

    if (error) throw toStoreError(error, "fetching mind map")
    return data ? toMindMap(data as MindMap) : null
  }

  async listMindMapsByUser(userId: string): Promise<MindMap[]> {
    const { data, error } = await this.supabase
      .from("mind_maps")
      .select(MIND_MAP_COLUMNS)
      .eq("user_id", userId)
      .neq("status", "deleted")
      .order("updated_at", { ascending: false })

    if (error) throw toStoreError(error, "listing mind maps")
    return (data as MindMap[]).map(toMindMap)
  }

  async updateMindMap(id: string, patch: MindMapPatch): Promise<MindMap> {
    const { data, error } = await this.supabase
      .from("mind_maps")
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq("id", id)
      .neq("status", "deleted")
      .select(MIND_MAP_COLUMNS)
      .maybeSingle()

    if (error) throw toStoreError(error, "updating mind map")
    if (!data) throw new NotFoundError("mind map not found or already deleted")
    return toMindMap(data as MindMap)
  }

  async softDeleteMindMap(id: string): Promise<void> {
    await this.updateMindMap(id, { status: "deleted" })
  }

  // --- Nodes ---

  async insertNode(input: NewNode): Promise<MindMapNode> {
    const { data, error } = await this.supabase.from("nodes").insert(input).select(NODE_COLUMNS).single()

    if (error) throw toStoreError(error, "creating node")
    return toNode(data as MindMapNode)
  }

  async findNode(id: string): Promise<MindMapNode | null> {
    const { data, error } = await this.supabase.from("nodes").select(NODE_COLUMNS).eq("id", id).maybeSingle()

    if (error) throw toStoreError(error, "fetching node")
    return data ? toNode(data as MindMapNode) : null
  }

  async findNodes(ids: string[]): Promise<MindMapNode[]> {
    if (ids.length === 0) return []
    const { data, error } = await this.supabase.from("nodes").select(NODE_COLUMNS).in("id", [...new Set(ids)])

    if (error) throw toStoreError(error, "fetching nodes")
    return (data as MindMapNode[]).map(toNode)
  }

  async listNodes(mindMapId: string): Promise<MindMapNode[]> {
    const { data, error } = await this.supabase
      .from("nodes")
      .select(NODE_COLUMNS)
      .eq("mind_map_id", mindMapId)
      .order("created_at", { ascending: true })

    if (error) throw toStoreError(error, "listing nodes")
    return (data as MindMapNode[]).map(toNode)
  }

  async updateNode(id: string, patch: NodePatch): Promise<MindMapNode> {
    const { data, error } = await this.supabase
      .from("nodes")
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq("id", id)
      .select(NODE_COLUMNS)
      .maybeSingle()

    if (error) throw toStoreError(error, "updating node")
    if (!data) throw new NotFoundError("node not found")
    return toNode(data as MindMapNode)
  }

  async deleteNode(id: string): Promise<void> {
    // Children and touching edges go with it through ON DELETE CASCADE.
    const { data, error } = await this.supabase.from("nodes").delete().eq("id", id).select("id")

    if (error) throw toStoreError(error, "deleting node")
    if (!data || data.length === 0) throw new NotFoundError("node not found")
  }

  async batchUpdatePositions(updates: NodePositionUpdate[]): Promise<void> {
    // The function body runs in one transaction and raises P0002 on a missing node.
    const { error } = await this.supabase.rpc("batch_update_node_positions", { p_positions: updates })

    if (error) throw toStoreError(error, "updating node positions")
  }

  // --- Edges ---

  async insertEdge(input: NewEdge): Promise<MindMapEdge> {
    const { data, error } = await this.supabase.from("edges").insert(input).select(EDGE_COLUMNS).single()

    if (error) throw toStoreError(error, "creating edge")
    return toEdge(data as MindMapEdge)
  }

  async findEdge(id: string): Promise<MindMapEdge | null> {
    const { data, error } = await this.supabase.from("edges").select(EDGE_COLUMNS).eq("id", id).maybeSingle()

    if (error) throw toStoreError(error, "fetching edge")
    return data ? toEdge(data as MindMapEdge) : null
  }

  async listEdges(mindMapId: string): Promise<MindMapEdge[]> {
    const { data, error } = await this.supabase
      .from("edges")
      .select(EDGE_COLUMNS)
      .eq("mind_map_id", mindMapId)
      .order("created_at", { ascending: true })

    if (error) throw toStoreError(error, "listing edges")
    return (data as MindMapEdge[]).map(toEdge)
  }

  async deleteEdge(id: string): Promise<void> {
    const { data, error } = await this.supabase.from("edges").delete().eq("id", id).select("id")

    if (error) throw toStoreError(error, "deleting edge")
    if (!data || data.length === 0) throw new NotFoundError("edge not found")
  }

  async deleteEdgeBetween(mindMapId: string, sourceId: string, targetId: string): Promise<void> {
    const { data, error } = await this.supabase
      .from("edges")
      .delete()
      .eq("mind_map_id", mindMapId)
      .eq("source_id", sourceId)
      .eq("target_id", targetId)
      .select("id")

    if (error) throw toStoreError(error, "deleting edge")
    if (!data || data.length === 0) throw new NotFoundError("edge not found between the specified nodes")
  }

  // --- API keys ---

  async upsertApiKey(userId: string, service: string, encryptedKey: string): Promise<ApiKeyRecord> {
    const { data, error } = await this.supabase
      .from("api_keys")
      .upsert(
        {
          user_id: userId,
          service,
          encrypted_key: encryptedKey,
          is_active: true,
          updated_at: new Date().toISOString(),
        },
        {
          onConflict: "user_id,service",
          ignoreDuplicates: false,
        },
      )
      .select(API_KEY_COLUMNS)
      .single()

    if (error) throw toStoreError(error, "saving API key")
    return data as ApiKeyRecord
  }

  async findApiKey(id: string): Promise<ApiKeyRecord | null> {
    const { data, error } = await this.supabase.from("api_keys").select(API_KEY_COLUMNS).eq("id", id).maybeSingle()

    if (error) throw toStoreError(error, "fetching API key")
    return data as ApiKeyRecord | null
  }

  async findApiKeyByService(userId: string, service: string): Promise<ApiKeyRecord | null> {
    const { data, error } = await this.supabase
      .from("api_keys")
      .select(API_KEY_COLUMNS)
      .eq("user_id", userId)
      .eq("service", service)
      .maybeSingle()

    if (error) throw toStoreError(error, "fetching API key")
    return data as ApiKeyRecord | null
  }

  async listApiKeys(userId: string): Promise<ApiKeyRecord[]> {
    const { data, error } = await this.supabase
      .from("api_keys")
      .select(API_KEY_COLUMNS)
      .eq("user_id", userId)
      .order("created_at", { ascending: false })

    if (error) throw toStoreError(error, "listing API keys")
    return data as ApiKeyRecord[]
  }

  async updateApiKey(id: string, patch: ApiKeyPatch): Promise<ApiKeyRecord> {
    const { data, error } = await this.supabase
      .from("api_keys")
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq("id", id)
      .select(API_KEY_COLUMNS)
      .maybeSingle()

    if (error) throw toStoreError(error, "updating API key")
    if (!data) throw new NotFoundError("API key not found")
    return data as ApiKeyRecord
  }

  async deleteApiKey(id: string): Promise<void> {
    const { data, error } = await this.supabase.from("api_keys").delete().eq("id", id).select("id")

    if (error) throw toStoreError(error, "deleting API key")
    if (!data || data.length === 0) throw new NotFoundError("API key not found")
  }
}
