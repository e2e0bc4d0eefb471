export type GenerationType = "new" | "expand" | "improve" | "branch"

export const SYSTEM_PROMPT =
  "You are a creative brainstorming assistant. Generate concise, innovative ideas for the given topic. " +
  "Each idea should be clear, actionable, and directly relevant to the topic. " +
  "Format your response as a JSON array of ideas."

interface PromptInput {
  topic: string
  context: string
  count: number
}

const TEMPLATES = {
  new: ({ topic, context, count }) => `Generate ${count} creative ideas about: ${topic}. Context: ${context}`,
  expand: ({ topic, context, count }) =>
    `Generate ${count} detailed sub-ideas that expand on this concept: ${topic}. Context: ${context}`,
  improve: ({ topic, context, count }) =>
    `Improve and refine this idea in ${count} different ways: ${topic}. Context: ${context}`,
  branch: ({ topic, context, count }) =>
    `Generate ${count} alternative approaches or directions for this concept: ${topic}. Context: ${context}`,
} satisfies Record<GenerationType, (input: PromptInput) => string>

export function parseGenerationType(value: string | null | undefined): GenerationType {
  return value === "expand" || value === "improve" || value === "branch" ? value : "new"
}

export function buildIdeaPrompt(type: string | null | undefined, input: PromptInput) {
  const generationType = parseGenerationType(type)
  return {
    generationType,
    systemPrompt: SYSTEM_PROMPT,
    userPrompt: TEMPLATES[generationType](input),
  }
}
