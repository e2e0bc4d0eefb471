import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto"
import { Buffer } from "node:buffer"
import { DecryptionError } from "@/lib/errors"

const ALGORITHM = "aes-256-gcm"
const KEY_LENGTH = 32
const NONCE_LENGTH = 12
const TAG_LENGTH = 16
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

/**
 * `padded` zero-pads or truncates the UTF-8 secret to 32 bytes. It is not a real KDF,
 * but every key stored before `scrypt` existed was written with it.
 */
export type KeyDerivation = "padded" | "scrypt"

export interface VaultOptions {
  derivation?: KeyDerivation
  salt?: string | null
}

export function deriveKey(secret: string, options: VaultOptions = {}): Buffer {
  const derivation = options.derivation ?? "padded"
  if (derivation === "scrypt") {
    if (!options.salt) {
      throw new Error("scrypt key derivation requires a salt")
    }
    return scryptSync(secret, options.salt, KEY_LENGTH)
  }

  const key = Buffer.alloc(KEY_LENGTH)
  Buffer.from(secret, "utf8").copy(key, 0, 0, KEY_LENGTH)
  return key
}

export class CredentialVault {
  private readonly key: Buffer

  constructor(secret: string, options: VaultOptions = {}) {
    this.key = deriveKey(secret, options)
  }

  /** Returns base64(nonce ‖ ciphertext ‖ tag). */
  encrypt(plaintext: string): string {
    const nonce = randomBytes(NONCE_LENGTH)
    const cipher = createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: TAG_LENGTH })
    const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()])
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]).toString("base64")
  }

  decrypt(stored: string): string {
    if (!BASE64_PATTERN.test(stored)) {
      throw new DecryptionError("stored key is not valid base64")
    }

    const data = Buffer.from(stored, "base64")
    if (data.length < NONCE_LENGTH + TAG_LENGTH) {
      throw new DecryptionError("ciphertext too short")
    }

    const nonce = data.subarray(0, NONCE_LENGTH)
    const tag = data.subarray(data.length - TAG_LENGTH)
    const ciphertext = data.subarray(NONCE_LENGTH, data.length - TAG_LENGTH)

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce, { authTagLength: TAG_LENGTH })
      decipher.setAuthTag(tag)
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8")
    } catch (error) {
      throw new DecryptionError("message authentication failed", { cause: error })
    }
  }
}
