export interface Idea {
  content: string
  confidence: number
}

export type NormalizeStrategy = "json" | "embedded-json" | "lines"

export interface NormalizedIdeas {
  ideas: Idea[]
  strategy: NormalizeStrategy
}

// Models don't report confidence; every idea gets the same score.
export const DEFAULT_CONFIDENCE = 0.7

type IdeaRecord = Record<string, unknown>

interface ContentExtractor {
  field: string
  read: (value: unknown) => string | undefined
}

const readText = (value: unknown) => (typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined)

const readScalar = (value: unknown) =>
  typeof value === "number" || typeof value === "boolean" ? String(value) : readText(value)

/** Tried in order against each object the model returns; first hit wins. */
export const CONTENT_EXTRACTORS: readonly ContentExtractor[] = [
  { field: "idea", read: readScalar },
  { field: "content", read: readText },
  { field: "text", read: readText },
  { field: "description", read: readText },
]

function isRecord(value: unknown): value is IdeaRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value)
}

function extractContent(record: IdeaRecord): string | undefined {
  for (const extractor of CONTENT_EXTRACTORS) {
    const content = extractor.read(record[extractor.field])
    if (content !== undefined) return content
  }
  return undefined
}

/** Parses `text` as a JSON array of objects or strings; `null` when it isn't one. */
function parseIdeaArray(text: string): Idea[] | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return null
  }
  if (!Array.isArray(parsed)) return null
  if (!parsed.every((entry) => typeof entry === "string" || isRecord(entry))) return null

  const ideas: Idea[] = []
  for (const entry of parsed) {
    const content = isRecord(entry) ? extractContent(entry) : readText(entry)
    if (content !== undefined) {
      ideas.push({ content, confidence: DEFAULT_CONFIDENCE })
    }
  }
  return ideas
}

function splitLines(text: string): Idea[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((content) => ({ content, confidence: DEFAULT_CONFIDENCE }))
}

export function normalizeIdeasWithStrategy(rawText: string): NormalizedIdeas {
  const direct = parseIdeaArray(rawText)
  if (direct) return { ideas: direct, strategy: "json" }

  const start = rawText.indexOf("[")
  const end = rawText.lastIndexOf("]")
  if (start >= 0 && end > start) {
    const embedded = parseIdeaArray(rawText.slice(start, end + 1))
    if (embedded) return { ideas: embedded, strategy: "embedded-json" }
  }

  return { ideas: splitLines(rawText), strategy: "lines" }
}

/**
 * Turns a model reply into ideas: a JSON array, else the outermost bracketed JSON
 * array inside prose, else one idea per non-blank line. Never throws.
 * `requestedCount` is informational; the reply is not truncated or padded.
 */
export function normalizeIdeas(rawText: string, requestedCount: number): Idea[] {
  const { ideas, strategy } = normalizeIdeasWithStrategy(rawText)
  if (ideas.length !== requestedCount) {
    console.log(`[ideas] Parsed ${ideas.length} ideas via ${strategy} (requested ${requestedCount})`)
  }
  return ideas
}
