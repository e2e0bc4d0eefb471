import OpenAI, { type ClientOptions } from "openai"
import { UpstreamError } from "@/lib/errors"

export interface CompletionRequest {
  apiKey: string
  systemPrompt: string
  userPrompt: string
}

/** One chat completion per call; resolves with the text of the first choice. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>
}

export interface OpenAICompletionOptions {
  model: string
  timeoutMs: number
  baseURL?: string | null
  fetch?: ClientOptions["fetch"]
}

export const IDEA_TEMPERATURE = 0.7
export const IDEA_MAX_TOKENS = 500

/**
 * Each request may carry a different user key, so a client is built per call rather
 * than shared. Retries are off: a failed call surfaces straight away.
 */
export function createOpenAICompletionClient(options: OpenAICompletionOptions): CompletionClient {
  return {
    async complete({ apiKey, systemPrompt, userPrompt }) {
      const openai = new OpenAI({
        apiKey,
        baseURL: options.baseURL ?? undefined,
        timeout: options.timeoutMs,
        maxRetries: 0,
        fetch: options.fetch,
      })

      let response: OpenAI.Chat.Completions.ChatCompletion
      try {
        response = await openai.chat.completions.create({
          model: options.model,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
          temperature: IDEA_TEMPERATURE,
          max_tokens: IDEA_MAX_TOKENS,
        })
      } catch (error) {
        // Timeouts and transport failures are APIError subclasses without a status.
        if (error instanceof OpenAI.APIConnectionError) {
          console.error("[ideas] Could not reach OpenAI:", error.message)
          throw new UpstreamError(`Could not reach OpenAI: ${error.message}`, { cause: error })
        }
        if (error instanceof OpenAI.APIError) {
          console.error("[ideas] OpenAI API error:", error.status, error.message)
          throw new UpstreamError(`OpenAI API error: ${error.message}`, {
            status: error.status,
            cause: error,
          })
        }
        throw new UpstreamError("Unexpected error while contacting OpenAI", { cause: error })
      }

      const content = response.choices[0]?.message?.content
      if (typeof content !== "string") {
        throw new UpstreamError("no ideas generated")
      }
      return content
    },
  }
}
