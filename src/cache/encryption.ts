/**
 * At-rest encryption of the cache file (AES-256-GCM, scrypt-derived key)
 *
 * Envelope layout:
 * `IPLC` | version (1 byte) | salt (16) | iv (12) | auth tag (16) | ciphertext
 *
 * @module cache/encryption
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto'
import { hostname, userInfo } from 'node:os'
import { CacheEncryptionError } from './cache-error.js'

const ALGORITHM = 'aes-256-gcm'
const MAGIC = Buffer.from('IPLC', 'ascii')
const VERSION = 1
const SALT_LENGTH = 16
const IV_LENGTH = 12
const AUTH_TAG_LENGTH = 16
const KEY_LENGTH = 32
const HEADER_LENGTH = MAGIC.length + 1 + SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH

/**
 * Application id mixed into the default passphrase
 */
export const ENCRYPTION_APP_ID = 'public-ip-lookup'

/**
 * Passphrase bound to this application, host and user
 */
export function defaultPassphrase(): string {
  return `${ENCRYPTION_APP_ID}:${hostname()}:${currentUserName()}`
}

function currentUserName(): string {
  try {
    return userInfo().username
  } catch {
    // userInfo throws when the uid has no passwd entry
    return process.env.USER ?? process.env.USERNAME ?? 'unknown'
  }
}

function deriveKey(passphrase: string, salt: Buffer): Buffer {
  return scryptSync(passphrase, salt, KEY_LENGTH)
}

/**
 * Encrypts a payload into a self-describing envelope
 */
export function encryptPayload(plaintext: Buffer, passphrase: string): Buffer {
  const salt = randomBytes(SALT_LENGTH)
  const iv = randomBytes(IV_LENGTH)
  const cipher = createCipheriv(ALGORITHM, deriveKey(passphrase, salt), iv)
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()])

  return Buffer.concat([MAGIC, Buffer.from([VERSION]), salt, iv, cipher.getAuthTag(), ciphertext])
}

/**
 * Reverses {@link encryptPayload}
 * @throws CacheEncryptionError for a foreign envelope, a wrong passphrase or tampered bytes
 */
export function decryptPayload(envelope: Buffer, passphrase: string): Buffer {
  if (envelope.length < HEADER_LENGTH || !envelope.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new CacheEncryptionError('not an encrypted cache envelope')
  }
  const version = envelope[MAGIC.length]
  if (version !== VERSION) {
    throw new CacheEncryptionError(`unsupported envelope version ${version}`)
  }

  const saltStart = MAGIC.length + 1
  const ivStart = saltStart + SALT_LENGTH
  const tagStart = ivStart + IV_LENGTH
  const salt = envelope.subarray(saltStart, ivStart)
  const iv = envelope.subarray(ivStart, tagStart)
  const authTag = envelope.subarray(tagStart, HEADER_LENGTH)
  const ciphertext = envelope.subarray(HEADER_LENGTH)

  try {
    const decipher = createDecipheriv(ALGORITHM, deriveKey(passphrase, salt), iv)
    decipher.setAuthTag(authTag)
    return Buffer.concat([decipher.update(ciphertext), decipher.final()])
  } catch (error) {
    throw new CacheEncryptionError('authentication failed', error)
  }
}
