import type { AppConfig } from "@/lib/config"
import { ApiKeyService } from "@/lib/credentials/api-keys"
import { CredentialVault } from "@/lib/crypto/credential-vault"
import { MemoryGraphRepository } from "@/lib/graph/memory-repository"
import type { ApiKeyRepository, GraphRepository } from "@/lib/graph/repository"
import { GraphStore } from "@/lib/graph/store"
import { SupabaseGraphRepository } from "@/lib/graph/supabase-repository"
import { IdeaPipeline } from "@/lib/ideas/pipeline"
import { createOpenAICompletionClient, type CompletionClient } from "@/lib/openai"
import { createAdminClient } from "@/lib/supabase/admin"

export interface Services {
  graph: GraphStore
  apiKeys: ApiKeyService
  ideas: IdeaPipeline
}

export interface ServiceOverrides {
  repository?: GraphRepository & ApiKeyRepository
  completions?: CompletionClient
}

function createRepository(config: AppConfig): GraphRepository & ApiKeyRepository {
  if (config.store === "supabase") {
    return new SupabaseGraphRepository(createAdminClient(config))
  }
  console.warn("[graph] Using the in-process store; data is lost when the process exits")
  return new MemoryGraphRepository()
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const repository = overrides.repository ?? createRepository(config)
  const vault = new CredentialVault(config.encryption.secret, {
    derivation: config.encryption.derivation,
    salt: config.encryption.salt,
  })

  const graph = new GraphStore(repository)
  const apiKeys = new ApiKeyService(repository, vault)
  const ideas = new IdeaPipeline({
    store: graph,
    apiKeys,
    completions:
      overrides.completions ??
      createOpenAICompletionClient({
        model: config.openai.model,
        timeoutMs: config.openai.timeoutMs,
        baseURL: config.openai.baseURL,
      }),
    defaultApiKey: config.openai.defaultApiKey,
  })

  return { graph, apiKeys, ideas }
}
