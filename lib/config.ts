import type { KeyDerivation } from "@/lib/crypto/credential-vault"

export type StoreDriver = "supabase" | "memory"

export interface AppConfig {
  store: StoreDriver
  supabase: {
    url: string
    serviceKey: string
  } | null
  encryption: {
    secret: string
    derivation: KeyDerivation
    salt: string | null
  }
  openai: {
    defaultApiKey: string | null
    model: string
    baseURL: string | null
    timeoutMs: number
  }
}

const DEFAULT_MODEL = "gpt-3.5-turbo"
const DEFAULT_TIMEOUT_MS = 30_000

function readString(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim()
  return value ? value : null
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readString(env, name)
  if (raw === null) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const supabaseUrl = readString(env, "SUPABASE_URL")
  const serviceKey = readString(env, "SUPABASE_SERVICE_ROLE_KEY") ?? readString(env, "SUPABASE_SERVICE_KEY")

  const storeSetting = readString(env, "GRAPH_STORE")
  if (storeSetting !== null && storeSetting !== "supabase" && storeSetting !== "memory") {
    throw new Error(`GRAPH_STORE must be "supabase" or "memory", got "${storeSetting}"`)
  }
  const store: StoreDriver = storeSetting ?? (supabaseUrl ? "supabase" : "memory")

  if (store === "supabase" && (!supabaseUrl || !serviceKey)) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set when GRAPH_STORE is supabase.")
  }

  const derivationSetting = readString(env, "API_KEY_KDF") ?? "padded"
  if (derivationSetting !== "padded" && derivationSetting !== "scrypt") {
    throw new Error(`API_KEY_KDF must be "padded" or "scrypt", got "${derivationSetting}"`)
  }
  const salt = readString(env, "API_KEY_KDF_SALT")
  if (derivationSetting === "scrypt" && !salt) {
    throw new Error("API_KEY_KDF_SALT must be set when API_KEY_KDF is scrypt.")
  }

  const secret = env.API_KEY_ENCRYPTION_KEY ?? ""
  if (secret.length === 0) {
    console.warn("[config] API_KEY_ENCRYPTION_KEY is empty; stored API keys are encrypted with an all-zero key")
  }

  return {
    store,
    supabase: supabaseUrl && serviceKey ? { url: supabaseUrl, serviceKey } : null,
    encryption: {
      secret,
      derivation: derivationSetting,
      salt,
    },
    openai: {
      defaultApiKey: readString(env, "OPENAI_API_KEY"),
      model: readString(env, "OPENAI_MODEL") ?? DEFAULT_MODEL,
      baseURL: readString(env, "OPENAI_BASE_URL"),
      timeoutMs: readPositiveInt(env, "OPENAI_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    },
  }
}
