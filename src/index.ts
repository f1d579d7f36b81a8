/**
 * Public IP and geolocation lookups across many providers, with
 * sequential fallback and a TTL disk cache.
 *
 * @example
 * ```typescript
 * import { performLookup, formatLookupResponse } from 'public-ip-lookup'
 *
 * const response = await performLookup()
 * console.log(formatLookupResponse(response))
 * ```
 *
 * @module public-ip-lookup
 */

// Orchestration
export type { CachedLookupOptions } from './cached-lookup.js'
export {
  performCachedLookup,
  performLookup,
  performLookupWith,
  DEFAULT_PROVIDERS,
  DEFAULT_CACHE_TTL_SECONDS,
} from './cached-lookup.js'

// Types - providers and responses
export * from './types/index.js'

// Lookups
export * from './lookup/index.js'

// Cache
export * from './cache/index.js'

// Errors
export {
  IpLookupError,
  InvalidParameterError,
  isIpLookupError,
  requireNonNegative,
  requireNonNegativeInteger,
  requirePositive,
  requireNonEmptyString,
} from './utils/errors.js'

// Utilities
export { canonicalizeIpAddress, isValidIpAddress, requireIpAddress } from './utils/address.js'
export { defaultLogger, createSilentLogger, createPrefixedLogger } from './utils/logger.js'
