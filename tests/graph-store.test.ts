import assert from "node:assert/strict"
import { beforeEach, describe, it } from "node:test"
import { MemoryGraphRepository } from "@/lib/graph/memory-repository"
import { GraphStore } from "@/lib/graph/store"
import type { MindMap, MindMapNode } from "@/lib/graph/types"

const OWNER = "user-1"
const STRANGER = "user-2"

let store: GraphStore
let mindMap: MindMap

async function addNode(content: string, extra: Partial<{ parent_id: string; position_x: number }> = {}) {
  return store.createNode(OWNER, {
    mind_map_id: mindMap.id,
    content,
    position_x: extra.position_x ?? 0,
    position_y: 0,
    parent_id: extra.parent_id,
  })
}

beforeEach(async () => {
  store = new GraphStore(new MemoryGraphRepository())
  mindMap = await store.createMindMap(OWNER, { title: "Energy" })
})

describe("mind maps", () => {
  it("applies defaults on create", () => {
    assert.equal(mindMap.user_id, OWNER)
    assert.equal(mindMap.description, "")
    assert.equal(mindMap.is_public, false)
    assert.equal(mindMap.status, "active")
  })

  it("requires a title", async () => {
    await assert.rejects(store.createMindMap(OWNER, { title: "   " }), {
      name: "ValidationError",
      message: "Title is required",
    })
  })

  it("hides private maps from other users", async () => {
    await assert.rejects(store.getMindMap(STRANGER, mindMap.id), { name: "UnauthorizedError" })
  })

  it("lets anyone read a public map but only the owner change it", async () => {
    await store.updateMindMap(OWNER, mindMap.id, { is_public: true })

    const read = await store.getMindMap(STRANGER, mindMap.id)
    assert.equal(read.id, mindMap.id)
    await assert.rejects(store.updateMindMap(STRANGER, mindMap.id, { title: "Hijacked" }), {
      name: "UnauthorizedError",
    })
  })

  it("leaves empty update fields unchanged", async () => {
    await store.updateMindMap(OWNER, mindMap.id, { description: "Grid scale" })

    const updated = await store.updateMindMap(OWNER, mindMap.id, { title: "", description: "" })

    assert.equal(updated.title, "Energy")
    assert.equal(updated.description, "Grid scale")
  })

  it("trims a new title", async () => {
    const updated = await store.updateMindMap(OWNER, mindMap.id, { title: "  Renewables  " })

    assert.equal(updated.title, "Renewables")
  })

  it("treats deleted maps as missing", async () => {
    await store.deleteMindMap(OWNER, mindMap.id)

    await assert.rejects(store.getMindMap(OWNER, mindMap.id), {
      name: "NotFoundError",
      message: "mind map not found",
    })
    assert.deepEqual(await store.listMindMaps(OWNER), [])
  })

  it("returns nodes and edges with the map", async () => {
    const a = await addNode("a")
    const b = await addNode("b")
    await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id })

    const details = await store.getMindMapWithDetails(OWNER, mindMap.id)

    assert.equal(details.title, "Energy")
    assert.deepEqual(
      details.nodes.map((node) => node.content),
      ["a", "b"],
    )
    assert.equal(details.edges.length, 1)
  })
})

describe("nodes", () => {
  it("fills node defaults", async () => {
    const node = await addNode("Solar")

    assert.equal(node.parent_id, null)
    assert.equal(node.node_type, "default")
    assert.deepEqual(node.style_data, {})
    assert.deepEqual(node.metadata, {})
  })

  it("requires content", async () => {
    await assert.rejects(addNode(""), { name: "ValidationError", message: "Content is required" })
  })

  it("only the owner can add nodes", async () => {
    await assert.rejects(
      store.createNode(STRANGER, { mind_map_id: mindMap.id, content: "x", position_x: 0, position_y: 0 }),
      { name: "UnauthorizedError" },
    )
  })

  it("rejects a parent from another map", async () => {
    const otherMap = await store.createMindMap(OWNER, { title: "Other" })
    const foreign = await store.createNode(OWNER, {
      mind_map_id: otherMap.id,
      content: "foreign",
      position_x: 0,
      position_y: 0,
    })

    await assert.rejects(addNode("child", { parent_id: foreign.id }), {
      name: "ValidationError",
      message: "Parent node belongs to a different mind map",
    })
  })

  it("ignores zero coordinates and empty content on update", async () => {
    const node = await addNode("Solar", { position_x: 10 })

    const updated = await store.updateNode(OWNER, node.id, { content: "", position_x: 0, position_y: 25 })

    assert.equal(updated.content, "Solar")
    assert.equal(updated.position_x, 10)
    assert.equal(updated.position_y, 25)
  })

  it("rejects non-finite positions on update", async () => {
    const node = await addNode("Solar", { position_x: 10 })

    await assert.rejects(store.updateNode(OWNER, node.id, { position_x: Number.POSITIVE_INFINITY }), {
      name: "ValidationError",
      message: "Position must be a finite number",
    })
    await assert.rejects(store.updateNode(OWNER, node.id, { position_y: Number.NaN }), {
      name: "ValidationError",
    })
    assert.equal((await store.getNode(OWNER, node.id)).position_x, 10)
  })

  it("deletes a node with its subtree", async () => {
    const parent = await addNode("parent")
    await addNode("child", { parent_id: parent.id })

    await store.deleteNode(OWNER, parent.id)

    assert.deepEqual(await store.listNodes(OWNER, mindMap.id), [])
  })

  it("reports missing nodes", async () => {
    await assert.rejects(store.getNode(OWNER, "missing"), { name: "NotFoundError", message: "node not found" })
  })
})

describe("batch position updates", () => {
  let a: MindMapNode
  let b: MindMapNode

  beforeEach(async () => {
    a = await addNode("a")
    b = await addNode("b")
  })

  it("moves every listed node", async () => {
    await store.batchUpdatePositions(OWNER, [
      { id: a.id, position_x: 100, position_y: 200 },
      { id: b.id, position_x: -50, position_y: 0 },
    ])

    const nodes = await store.listNodes(OWNER, mindMap.id)
    assert.deepEqual(
      nodes.map((node) => [node.position_x, node.position_y]),
      [
        [100, 200],
        [-50, 0],
      ],
    )
  })

  it("rejects an empty batch", async () => {
    await assert.rejects(store.batchUpdatePositions(OWNER, []), {
      name: "ValidationError",
      message: "No positions provided",
    })
  })

  it("applies nothing when one node is missing", async () => {
    await assert.rejects(
      store.batchUpdatePositions(OWNER, [
        { id: a.id, position_x: 100, position_y: 200 },
        { id: "missing", position_x: 1, position_y: 1 },
      ]),
      { name: "NotFoundError" },
    )

    const unchanged = await store.getNode(OWNER, a.id)
    assert.equal(unchanged.position_x, 0)
    assert.equal(unchanged.position_y, 0)
  })

  it("refuses nodes in maps the caller does not own", async () => {
    await assert.rejects(store.batchUpdatePositions(STRANGER, [{ id: a.id, position_x: 1, position_y: 1 }]), {
      name: "UnauthorizedError",
    })
  })
})

describe("edges", () => {
  it("defaults the edge type", async () => {
    const a = await addNode("a")
    const b = await addNode("b")

    const edge = await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id })

    assert.equal(edge.edge_type, "default")
    assert.deepEqual(edge.style_data, {})
  })

  it("rejects self loops", async () => {
    const a = await addNode("a")

    await assert.rejects(store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: a.id }), {
      name: "ValidationError",
      message: "An edge cannot connect a node to itself",
    })
  })

  it("rejects edges that close a cycle", async () => {
    const a = await addNode("a")
    const b = await addNode("b")
    const c = await addNode("c")
    await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id })
    await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: b.id, target_id: c.id })

    await assert.rejects(store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: c.id, target_id: a.id }), {
      name: "ValidationError",
      message: "Edge would create a cycle",
    })
  })

  it("rejects duplicate edges", async () => {
    const a = await addNode("a")
    const b = await addNode("b")
    await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id })

    await assert.rejects(store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id }), {
      code: "conflict",
    })
  })

  it("rejects endpoints from another map", async () => {
    const otherMap = await store.createMindMap(OWNER, { title: "Other" })
    const a = await addNode("a")
    const foreign = await store.createNode(OWNER, {
      mind_map_id: otherMap.id,
      content: "foreign",
      position_x: 0,
      position_y: 0,
    })

    await assert.rejects(
      store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: foreign.id }),
      { name: "ValidationError", message: "Edge endpoints must belong to the edge's mind map" },
    )
  })

  it("deletes an edge by its endpoints", async () => {
    const a = await addNode("a")
    const b = await addNode("b")
    await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id })

    await store.deleteEdgeBetween(OWNER, mindMap.id, a.id, b.id)

    assert.deepEqual(await store.listEdges(OWNER, mindMap.id), [])
    await assert.rejects(store.deleteEdgeBetween(OWNER, mindMap.id, a.id, b.id), {
      name: "NotFoundError",
      message: "edge not found between the specified nodes",
    })
  })
})

describe("ownership", () => {
  let a: MindMapNode
  let b: MindMapNode
  let edgeId: string

  beforeEach(async () => {
    a = await addNode("a")
    b = await addNode("b")
    edgeId = (await store.createEdge(OWNER, { mind_map_id: mindMap.id, source_id: a.id, target_id: b.id })).id
  })

  it("keeps non-owners from changing nodes and edges", async () => {
    const unauthorized = { name: "UnauthorizedError" }

    await assert.rejects(store.updateNode(STRANGER, a.id, { content: "changed" }), unauthorized)
    await assert.rejects(store.deleteNode(STRANGER, a.id), unauthorized)
    await assert.rejects(store.deleteEdge(STRANGER, edgeId), unauthorized)
    await assert.rejects(store.deleteEdgeBetween(STRANGER, mindMap.id, a.id, b.id), unauthorized)
    await assert.rejects(
      store.createEdge(STRANGER, { mind_map_id: mindMap.id, source_id: b.id, target_id: a.id }),
      unauthorized,
    )

    assert.equal((await store.getNode(OWNER, a.id)).content, "a")
    assert.equal((await store.listEdges(OWNER, mindMap.id)).length, 1)
  })

  it("keeps non-owners from reading a private map's nodes and edges", async () => {
    const unauthorized = { name: "UnauthorizedError" }

    await assert.rejects(store.listNodes(STRANGER, mindMap.id), unauthorized)
    await assert.rejects(store.getNode(STRANGER, a.id), unauthorized)
    await assert.rejects(store.listEdges(STRANGER, mindMap.id), unauthorized)
    await assert.rejects(store.getEdge(STRANGER, edgeId), unauthorized)
  })

  it("lets anyone read nodes and edges of a public map", async () => {
    await store.updateMindMap(OWNER, mindMap.id, { is_public: true })

    assert.deepEqual(
      (await store.listNodes(STRANGER, mindMap.id)).map((node) => node.id),
      [a.id, b.id],
    )
    assert.equal((await store.getNode(STRANGER, b.id)).content, "b")
    assert.equal((await store.listEdges(STRANGER, mindMap.id)).length, 1)
    assert.equal((await store.getEdge(STRANGER, edgeId)).source_id, a.id)
  })

  it("keeps public maps read-only for non-owners", async () => {
    await store.updateMindMap(OWNER, mindMap.id, { is_public: true })

    await assert.rejects(store.updateNode(STRANGER, a.id, { content: "changed" }), { name: "UnauthorizedError" })
    await assert.rejects(store.deleteEdge(STRANGER, edgeId), { name: "UnauthorizedError" })
  })
})
