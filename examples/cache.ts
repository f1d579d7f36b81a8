/**
 * Cache Example
 *
 * Caches a target lookup in an encrypted file for a minute, then shows
 * what the cache holds and where it lives.
 */

import {
  ResponseCache,
  performCachedLookup,
  standardProvider,
  type CacheConfig,
} from '../src/index.js'

const cacheConfig: Partial<CacheConfig> = {
  fileName: 'example.cache',
  encryption: { enabled: true },
}

async function main(): Promise<void> {
  const response = await performCachedLookup([[standardProvider('ipwhois')], [standardProvider('ifconfig')]], {
    target: '1.1.1.1',
    ttl: 60,
    cache: cacheConfig,
  })
  console.log(`1.1.1.1 is in ${response.country ?? 'an unknown country'}`)

  const cache = await ResponseCache.load(cacheConfig)
  console.log(`cache file: ${cache.getPath()}`)
  for (const target of cache.targets()) {
    console.log(`${target} expired: ${cache.targetIsExpired(target)}`)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
