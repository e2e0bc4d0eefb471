import assert from "node:assert/strict"
import test from "node:test"
import { MemoryGraphRepository } from "@/lib/graph/memory-repository"
import type { NewNode } from "@/lib/graph/repository"

function createRepository() {
  let nextId = 0
  let tick = 0
  return new MemoryGraphRepository({
    generateId: () => `id-${++nextId}`,
    now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)),
  })
}

function newNode(mindMapId: string, content: string, parentId: string | null = null): NewNode {
  return {
    mind_map_id: mindMapId,
    parent_id: parentId,
    content,
    position_x: 0,
    position_y: 0,
    node_type: "default",
    style_data: {},
    metadata: {},
  }
}

test("deleting a node removes its descendants and their edges", async () => {
  const repository = createRepository()
  const mindMap = await repository.insertMindMap({ user_id: "user-1", title: "Map", description: "", is_public: false })
  const root = await repository.insertNode(newNode(mindMap.id, "root"))
  const child = await repository.insertNode(newNode(mindMap.id, "child", root.id))
  const grandchild = await repository.insertNode(newNode(mindMap.id, "grandchild", child.id))
  const other = await repository.insertNode(newNode(mindMap.id, "other"))
  const kept = await repository.insertEdge({
    mind_map_id: mindMap.id,
    source_id: root.id,
    target_id: other.id,
    edge_type: "default",
    style_data: {},
  })
  await repository.insertEdge({
    mind_map_id: mindMap.id,
    source_id: other.id,
    target_id: grandchild.id,
    edge_type: "default",
    style_data: {},
  })

  await repository.deleteNode(child.id)

  const nodes = await repository.listNodes(mindMap.id)
  assert.deepEqual(
    nodes.map((node) => node.content),
    ["root", "other"],
  )
  const edges = await repository.listEdges(mindMap.id)
  assert.deepEqual(
    edges.map((edge) => edge.id),
    [kept.id],
  )
})

test("duplicate edges are a conflict", async () => {
  const repository = createRepository()
  const mindMap = await repository.insertMindMap({ user_id: "user-1", title: "Map", description: "", is_public: false })
  const a = await repository.insertNode(newNode(mindMap.id, "a"))
  const b = await repository.insertNode(newNode(mindMap.id, "b"))
  const edge = { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id, edge_type: "default", style_data: {} }
  await repository.insertEdge(edge)

  await assert.rejects(repository.insertEdge(edge), { name: "UniqueViolationError", code: "conflict" })
})

test("batch position updates are all or nothing", async () => {
  const repository = createRepository()
  const mindMap = await repository.insertMindMap({ user_id: "user-1", title: "Map", description: "", is_public: false })
  const node = await repository.insertNode(newNode(mindMap.id, "a"))

  await assert.rejects(
    repository.batchUpdatePositions([
      { id: node.id, position_x: 40, position_y: 60 },
      { id: "missing", position_x: 1, position_y: 1 },
    ]),
    { name: "NotFoundError", message: "node missing not found" },
  )

  const unchanged = await repository.findNode(node.id)
  assert.equal(unchanged?.position_x, 0)
  assert.equal(unchanged?.position_y, 0)
})

test("returned records are copies", async () => {
  const repository = createRepository()
  const mindMap = await repository.insertMindMap({ user_id: "user-1", title: "Map", description: "", is_public: false })
  const node = await repository.insertNode(newNode(mindMap.id, "a"))

  node.metadata.tampered = true

  const stored = await repository.findNode(node.id)
  assert.deepEqual(stored?.metadata, {})
})

test("soft-deleted mind maps are hidden", async () => {
  const repository = createRepository()
  const mindMap = await repository.insertMindMap({ user_id: "user-1", title: "Map", description: "", is_public: false })

  await repository.softDeleteMindMap(mindMap.id)

  assert.equal(await repository.findMindMap(mindMap.id), null)
  assert.deepEqual(await repository.listMindMapsByUser("user-1"), [])
  await assert.rejects(repository.softDeleteMindMap(mindMap.id), {
    name: "NotFoundError",
    message: "mind map not found or already deleted",
  })
})

test("mind maps list most recently updated first", async () => {
  const repository = createRepository()
  const first = await repository.insertMindMap({ user_id: "user-1", title: "First", description: "", is_public: false })
  await repository.insertMindMap({ user_id: "user-1", title: "Second", description: "", is_public: false })
  await repository.insertMindMap({ user_id: "user-2", title: "Elsewhere", description: "", is_public: false })
  await repository.updateMindMap(first.id, { description: "touched" })

  const titles = (await repository.listMindMapsByUser("user-1")).map((mindMap) => mindMap.title)
  assert.deepEqual(titles, ["First", "Second"])
})

test("upserting an API key reactivates the existing record", async () => {
  const repository = createRepository()
  const original = await repository.upsertApiKey("user-1", "openai", "cipher-1")
  await repository.updateApiKey(original.id, { is_active: false })

  const replaced = await repository.upsertApiKey("user-1", "openai", "cipher-2")

  assert.equal(replaced.id, original.id)
  assert.equal(replaced.is_active, true)
  assert.equal(replaced.encrypted_key, "cipher-2")
  assert.equal((await repository.listApiKeys("user-1")).length, 1)
})
