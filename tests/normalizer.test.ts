import assert from "node:assert/strict"
import test from "node:test"
import { DEFAULT_CONFIDENCE, normalizeIdeas, normalizeIdeasWithStrategy } from "@/lib/ideas/normalizer"

test("parses a JSON array of idea objects", () => {
  const result = normalizeIdeasWithStrategy('[{"idea": "Solar rooftops"}, {"idea": "Offshore wind"}]')

  assert.equal(result.strategy, "json")
  assert.deepEqual(result.ideas, [
    { content: "Solar rooftops", confidence: DEFAULT_CONFIDENCE },
    { content: "Offshore wind", confidence: DEFAULT_CONFIDENCE },
  ])
})

test("parses a JSON array of plain strings", () => {
  const ideas = normalizeIdeas('["Solar rooftops", "  Offshore wind ", "Community batteries"]', 3)

  assert.deepEqual(
    ideas.map((idea) => idea.content),
    ["Solar rooftops", "Offshore wind", "Community batteries"],
  )
})

test("reads content fields in priority order", () => {
  const { ideas } = normalizeIdeasWithStrategy(
    JSON.stringify([
      { content: "from content", idea: "from idea" },
      { description: "from description", text: "from text" },
      { description: "only description" },
      { idea: 42 },
      { idea: "   ", content: "blank idea falls through" },
    ]),
  )

  assert.deepEqual(
    ideas.map((idea) => idea.content),
    ["from idea", "from text", "only description", "42", "blank idea falls through"],
  )
})

test("skips objects without usable content", () => {
  const { ideas } = normalizeIdeasWithStrategy('[{"title": "ignored"}, {"idea": "Kept"}, ""]')

  assert.deepEqual(ideas, [{ content: "Kept", confidence: 0.7 }])
})

test("extracts a JSON array embedded in prose", () => {
  const result = normalizeIdeasWithStrategy('Here are some ideas:\n[{"idea": "Heat pumps"}]\nHope this helps!')

  assert.equal(result.strategy, "embedded-json")
  assert.deepEqual(result.ideas, [{ content: "Heat pumps", confidence: 0.7 }])
})

test("falls back to one idea per non-blank line", () => {
  const result = normalizeIdeasWithStrategy("First idea\n\n   Second idea  \n")

  assert.equal(result.strategy, "lines")
  assert.deepEqual(
    result.ideas.map((idea) => idea.content),
    ["First idea", "Second idea"],
  )
})

test("arrays of other values are treated as text", () => {
  const result = normalizeIdeasWithStrategy("[1, 2, 3]")

  assert.equal(result.strategy, "lines")
  assert.deepEqual(result.ideas, [{ content: "[1, 2, 3]", confidence: 0.7 }])
})

test("empty reply yields no ideas", () => {
  assert.deepEqual(normalizeIdeas("", 5), [])
})

test("does not truncate to the requested count", () => {
  const ideas = normalizeIdeas('["a", "b", "c"]', 2)

  assert.equal(ideas.length, 3)
})
