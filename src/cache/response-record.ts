/**
 * Cached record construction and expiry
 * @module cache/response-record
 */

import type { ResponseRecord } from './cache-interface.js'
import type { LookupResponse } from '../types/response.js'
import { cloneLookupResponse } from '../types/response.js'
import { requireNonNegativeInteger } from '../utils/errors.js'

/**
 * Creates a record stamped with the current time
 */
export function createResponseRecord(
  response: LookupResponse,
  ttl: number | null,
  now: Date = new Date()
): ResponseRecord {
  if (ttl !== null) {
    requireNonNegativeInteger(ttl, 'ttl')
  }
  return {
    response: cloneLookupResponse(response),
    responseTime: new Date(now.getTime()),
    ttl,
  }
}

/**
 * A record with a TTL is expired once `ttl` seconds have passed.
 * A clock that went backwards counts as no time elapsed.
 */
export function isRecordExpired(record: ResponseRecord, now: number = Date.now()): boolean {
  if (record.ttl === null) {
    return false
  }
  const elapsedMs = Math.max(0, now - record.responseTime.getTime())
  return elapsedMs >= record.ttl * 1000
}
