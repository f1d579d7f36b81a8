/**
 * Response cache exports
 * @module cache
 */

export type {
  CacheConfig,
  CacheEncryptionConfig,
  ResponseRecord,
  ResponseCacheData,
} from './cache-interface.js'
export { DEFAULT_CACHE_CONFIG } from './cache-interface.js'
export type { CacheErrorKind } from './cache-error.js'
export {
  CacheError,
  CacheIoError,
  CacheSerdeError,
  CacheEncryptionError,
  CacheUtf8Error,
  isCacheError,
} from './cache-error.js'
export { createResponseRecord, isRecordExpired } from './response-record.js'
export type { CacheFileJson, ResponseRecordJson, LookupResponseJson } from './cache-codec.js'
export { cacheFileSchema, encodeCache, decodeCache, encodeRecord, encodeResponse } from './cache-codec.js'
export type { PlatformDirectories, CachePathDeps } from './cache-path.js'
export { platformDirectories, resolveCacheDirectory, CACHE_APP_DIRECTORY } from './cache-path.js'
export { encryptPayload, decryptPayload, defaultPassphrase, ENCRYPTION_APP_ID } from './encryption.js'
export type { ResponseCacheOptions } from './response-cache.js'
export { ResponseCache } from './response-cache.js'
