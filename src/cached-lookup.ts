/**
 * Cached lookup orchestration: cache first, fallback on miss, persist on success
 * @module cached-lookup
 */

import type { LookupOptions, ProviderEntry } from './lookup/types.js'
import type { LookupResponse } from './types/response.js'
import { standardProvider } from './types/provider.js'
import type { CacheConfig } from './cache/cache-interface.js'
import type { CachePathDeps } from './cache/cache-path.js'
import { ResponseCache } from './cache/response-cache.js'
import { isCacheError } from './cache/cache-error.js'
import { lookupWithFallback } from './lookup/fallback.js'
import { requireIpAddress } from './utils/address.js'
import { createSilentLogger } from './utils/logger.js'
import { requireNonNegativeInteger } from './utils/errors.js'

/**
 * Seconds a response stays fresh when the caller gives no TTL
 */
export const DEFAULT_CACHE_TTL_SECONDS = 2

/**
 * Providers tried by {@link performLookup}, in order
 */
export const DEFAULT_PROVIDERS: readonly ProviderEntry[] = [
  [standardProvider('ifconfig')],
  [standardProvider('ipwhois')],
  [standardProvider('ipapico')],
  [standardProvider('ipinfo')],
  [standardProvider('freeipapi')],
]

/**
 * Options for a cached lookup
 */
export interface CachedLookupOptions extends LookupOptions {
  /** Address to resolve instead of the caller's own */
  target?: string

  /** Lifetime of the stored response in seconds; `null` never expires */
  ttl?: number | null

  /** Ignore a fresh cached value and look up again */
  flush?: boolean

  /** Cache location and encryption */
  cache?: Partial<CacheConfig>

  /** Cache file name for this call only */
  fileName?: string

  /** Overrides for cache directory resolution */
  pathDeps?: Partial<CachePathDeps>
}

/**
 * Returns the cached response for the current address (or `target`)
 * while it is fresh, otherwise runs the fallback and stores the result.
 *
 * A missing or corrupt cache file counts as an empty cache. A failed
 * save is reported even though the lookup itself succeeded.
 *
 * @example
 * ```typescript
 * const response = await performCachedLookup(
 *   [[standardProvider('ipinfo'), createParameters('test-token')], [standardProvider('ifconfig')]],
 *   { ttl: 60 }
 * )
 * ```
 *
 * @throws NoProvidersError or AllProvidersFailedError from the fallback
 * @throws InvalidParameterError when `ttl` is not a whole number of seconds
 * @throws CacheError when the updated cache cannot be written
 */
export async function performCachedLookup(
  providers: readonly ProviderEntry[],
  options: CachedLookupOptions = {}
): Promise<LookupResponse> {
  const logger = options.logger ?? createSilentLogger()
  const ttl = options.ttl === undefined ? DEFAULT_CACHE_TTL_SECONDS : options.ttl
  if (ttl !== null) {
    requireNonNegativeInteger(ttl, 'ttl')
  }
  const target = options.target === undefined ? undefined : requireIpAddress(options.target)

  const cache = await loadOrEmpty(options)

  const expired = target === undefined ? cache.currentIsExpired() : cache.targetIsExpired(target)
  if (!expired && !options.flush) {
    const cached = target === undefined ? cache.getCurrent() : cache.getTarget(target)
    if (cached) {
      logger.debug('Cache hit', { target })
      return cached
    }
  }
  logger.debug(options.flush ? 'Cache flush requested' : 'Cache miss', { target })

  const response = await lookupWithFallback(providers, target, {
    transport: options.transport,
    logger,
  })

  if (target === undefined) {
    cache.updateCurrent(response, ttl)
  } else {
    cache.updateTarget(target, response, ttl)
  }
  await cache.save(options.fileName)

  return response
}

async function loadOrEmpty(options: CachedLookupOptions): Promise<ResponseCache> {
  const logger = options.logger ?? createSilentLogger()
  const cacheOptions = { logger, pathDeps: options.pathDeps }
  try {
    return await ResponseCache.load(options.cache, options.fileName, cacheOptions)
  } catch (error) {
    if (!isCacheError(error)) {
      throw error
    }
    if (error.kind === 'io') {
      logger.debug('No usable cache file, starting empty', { code: error.code })
    } else {
      logger.warn('Cache file is corrupt, starting empty', { code: error.code })
    }
    return ResponseCache.open(options.cache, cacheOptions)
  }
}

/**
 * Fallback lookup without the cache
 */
export async function performLookupWith(
  providers: readonly ProviderEntry[],
  target?: string,
  options: LookupOptions = {}
): Promise<LookupResponse> {
  return lookupWithFallback(providers, target, options)
}

/**
 * Cached lookup of the caller's address (or `target`) with the default
 * providers and TTL
 */
export async function performLookup(
  target?: string,
  options: Omit<CachedLookupOptions, 'target'> = {}
): Promise<LookupResponse> {
  return performCachedLookup(DEFAULT_PROVIDERS, { ttl: DEFAULT_CACHE_TTL_SECONDS, ...options, target })
}
