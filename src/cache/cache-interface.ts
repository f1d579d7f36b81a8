/**
 * Cache types and configuration
 * @module cache/cache-interface
 */

import type { LookupResponse } from '../types/response.js'

/**
 * At-rest encryption settings
 */
export interface CacheEncryptionConfig {
  /** Encrypt the cache file */
  enabled: boolean

  /** Passphrase the key is derived from (defaults to one bound to this host and user) */
  passphrase?: string
}

/**
 * Where and how the cache file is stored
 */
export interface CacheConfig {
  /** Directory holding the cache file; resolved from the platform when unset */
  directory?: string

  /** Cache file name */
  fileName: string

  encryption: CacheEncryptionConfig
}

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  fileName: 'lookup.cache',
  encryption: { enabled: false },
}

/**
 * One cached response with its timestamp and lifetime
 */
export interface ResponseRecord {
  response: LookupResponse

  /** When the response was stored */
  responseTime: Date

  /** Lifetime in seconds; `null` never expires */
  ttl: number | null
}

/**
 * In-memory shape of the persisted cache
 */
export interface ResponseCacheData {
  /** Record for the caller's own address */
  currentAddress: ResponseRecord | null

  /** Records for target addresses, in insertion order */
  lookupAddress: Map<string, ResponseRecord>
}
