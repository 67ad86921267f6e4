import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto'
import * as settingsRepo from '../database/repositories/settings.repo'

export type CredentialKey = 'claudeApiKey' | 'googleServiceAccount'

const CREDENTIAL_ENV_VARS: Record<CredentialKey, string> = {
  claudeApiKey: 'ANTHROPIC_API_KEY',
  googleServiceAccount: 'MINUTES_DESK_GOOGLE_SERVICE_ACCOUNT'
}

const ENCRYPTED_PREFIX = 'enc:v1:'

function getEncryptionKey(): Buffer | null {
  const secret = process.env['MINUTES_DESK_SECRET']
  if (!secret) return null
  return createHash('sha256').update(secret).digest()
}

function encryptString(value: string, key: Buffer): string {
  const iv = randomBytes(12)
  const cipher = createCipheriv('aes-256-gcm', key, iv)
  const encrypted = Buffer.concat([cipher.update(value, 'utf8'), cipher.final()])
  const tag = cipher.getAuthTag()
  return ENCRYPTED_PREFIX + Buffer.concat([iv, tag, encrypted]).toString('base64')
}

function decryptString(value: string, key: Buffer): string {
  const raw = Buffer.from(value.slice(ENCRYPTED_PREFIX.length), 'base64')
  const iv = raw.subarray(0, 12)
  const tag = raw.subarray(12, 28)
  const decipher = createDecipheriv('aes-256-gcm', key, iv)
  decipher.setAuthTag(tag)
  return Buffer.concat([decipher.update(raw.subarray(28)), decipher.final()]).toString('utf8')
}

export function storeCredential(key: CredentialKey, value: string): void {
  const encryptionKey = getEncryptionKey()
  if (encryptionKey) {
    settingsRepo.setSetting(key, encryptString(value, encryptionKey))
  } else {
    settingsRepo.setSetting(key, value)
  }
}

export function getCredential(key: CredentialKey): string | null {
  const fromEnv = process.env[CREDENTIAL_ENV_VARS[key]]
  if (fromEnv) return fromEnv

  const value = settingsRepo.getSetting(key)
  if (!value) return null
  if (!value.startsWith(ENCRYPTED_PREFIX)) return value

  const encryptionKey = getEncryptionKey()
  if (!encryptionKey) {
    console.warn(`[Credentials] ${key} is encrypted but MINUTES_DESK_SECRET is not set`)
    return null
  }
  try {
    return decryptString(value, encryptionKey)
  } catch (err) {
    console.warn(`[Credentials] Could not decrypt ${key}:`, err)
    return null
  }
}

export function isCredentialKey(key: string): key is CredentialKey {
  return Object.prototype.hasOwnProperty.call(CREDENTIAL_ENV_VARS, key)
}
