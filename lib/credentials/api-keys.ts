import type { CredentialVault } from "@/lib/crypto/credential-vault"
import { NoCredentialError, NotFoundError, UnauthorizedError, ValidationError } from "@/lib/errors"
import type { ApiKeyPatch, ApiKeyRepository } from "@/lib/graph/repository"
import type { ApiKeyRecord, ApiKeySummary } from "@/lib/graph/types"

export interface ApiKeySaveRequest {
  service: string
  key: string
}

export interface ApiKeyUpdateRequest {
  key?: string
  is_active?: boolean
}

function toSummary({ encrypted_key: _encrypted, ...summary }: ApiKeyRecord): ApiKeySummary {
  return summary
}

export class ApiKeyService {
  constructor(
    private readonly repository: ApiKeyRepository,
    private readonly vault: CredentialVault,
  ) {}

  private async loadOwned(userId: string, id: string): Promise<ApiKeyRecord> {
    const record = await this.repository.findApiKey(id)
    if (!record) {
      throw new NotFoundError("API key not found")
    }
    if (record.user_id !== userId) {
      throw new UnauthorizedError()
    }
    return record
  }

  /** One key per service: saving again replaces the stored key and re-activates it. */
  async saveApiKey(userId: string, request: ApiKeySaveRequest): Promise<ApiKeySummary> {
    const service = request.service?.trim()
    if (!service) {
      throw new ValidationError("Service is required")
    }
    if (!request.key) {
      throw new ValidationError("Key is required")
    }

    const record = await this.repository.upsertApiKey(userId, service, this.vault.encrypt(request.key))
    console.log(`[api-keys] Saved ${service} key for user ${userId}`)
    return toSummary(record)
  }

  async listApiKeys(userId: string): Promise<ApiKeySummary[]> {
    const records = await this.repository.listApiKeys(userId)
    return records.map(toSummary)
  }

  async getApiKey(userId: string, id: string): Promise<ApiKeySummary> {
    return toSummary(await this.loadOwned(userId, id))
  }

  async getApiKeyByService(userId: string, service: string): Promise<ApiKeySummary | null> {
    const record = await this.repository.findApiKeyByService(userId, service)
    return record ? toSummary(record) : null
  }

  async updateApiKey(userId: string, id: string, request: ApiKeyUpdateRequest): Promise<ApiKeySummary> {
    await this.loadOwned(userId, id)

    const patch: ApiKeyPatch = {}
    if (request.key) patch.encrypted_key = this.vault.encrypt(request.key)
    if (request.is_active !== undefined) patch.is_active = request.is_active

    return toSummary(await this.repository.updateApiKey(id, patch))
  }

  async deleteApiKey(userId: string, id: string): Promise<void> {
    await this.loadOwned(userId, id)
    await this.repository.deleteApiKey(id)
  }

  async getDecryptedApiKey(userId: string, service: string): Promise<string> {
    const record = await this.repository.findApiKeyByService(userId, service)
    if (!record) {
      throw new NotFoundError("API key not found")
    }
    if (!record.is_active) {
      throw new NoCredentialError("API key is not active")
    }
    return this.vault.decrypt(record.encrypted_key)
  }
}
