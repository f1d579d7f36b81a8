/**
 * Cache-specific error classes
 * @module cache/cache-error
 */

import { IpLookupError } from '../utils/errors.js'

/**
 * Distinct failure kinds, so callers can tell "no cache yet" from "cache corrupted"
 */
export type CacheErrorKind = 'io' | 'serde' | 'encryption' | 'utf8'

/**
 * Base error class for cache failures
 */
export class CacheError extends IpLookupError {
  public readonly kind: CacheErrorKind

  constructor(
    message: string,
    code: string,
    kind: CacheErrorKind,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, code, context, cause)
    this.name = 'CacheError'
    this.kind = kind
  }
}

/**
 * Reading, writing or removing the cache file failed
 */
export class CacheIoError extends CacheError {
  public readonly path: string
  public readonly operation: 'read' | 'write' | 'delete' | 'mkdir'

  constructor(
    path: string,
    operation: 'read' | 'write' | 'delete' | 'mkdir',
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(
      `Cache ${operation} failed for '${path}': ${detail}`,
      'CACHE_IO_ERROR',
      'io',
      { path, operation },
      cause
    )
    this.name = 'CacheIoError'
    this.path = path
    this.operation = operation
  }

  /**
   * Whether the file simply does not exist yet
   */
  get isNotFound(): boolean {
    const cause = this.cause
    return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT'
  }
}

/**
 * Cache content is not valid JSON or does not have the cache shape
 */
export class CacheSerdeError extends CacheError {
  constructor(reason: string, path?: string, cause?: unknown) {
    super(`Cache content is invalid: ${reason}`, 'CACHE_SERDE_ERROR', 'serde', { reason, path }, cause)
    this.name = 'CacheSerdeError'
  }
}

/**
 * Encrypting or decrypting the cache failed
 */
export class CacheEncryptionError extends CacheError {
  constructor(reason: string, cause?: unknown) {
    super(`Cache encryption error: ${reason}`, 'CACHE_ENCRYPTION_ERROR', 'encryption', { reason }, cause)
    this.name = 'CacheEncryptionError'
  }
}

/**
 * Decrypted or stored bytes are not valid UTF-8
 */
export class CacheUtf8Error extends CacheError {
  constructor(path?: string, cause?: unknown) {
    super('Cache content is not valid UTF-8', 'CACHE_UTF8_ERROR', 'utf8', { path }, cause)
    this.name = 'CacheUtf8Error'
  }
}

/**
 * Checks if an error is a CacheError
 */
export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError
}
