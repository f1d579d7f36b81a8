/**
 * Fallback Example
 *
 * Providers are given in the compact "<name> [<key>]" form and tried in
 * order until one answers. When all fail, every failure is listed.
 *
 *   npx tsx examples/fallback.ts "ipinfo" "ipwhois" "ifconfig"
 */

import {
  AllProvidersFailedError,
  FetchTransport,
  createPrefixedLogger,
  defaultLogger,
  formatLookupResponse,
  lookupWithFallback,
  parseProviderWithParams,
  providerToString,
  type ProviderEntry,
} from '../src/index.js'

async function main(): Promise<void> {
  const specs = process.argv.length > 2 ? process.argv.slice(2) : ['ipapico', 'ipwhois', 'ifconfig']
  const providers = specs.map((spec): ProviderEntry => {
    const { provider, parameters } = parseProviderWithParams(spec)
    return [provider, parameters]
  })

  try {
    const response = await lookupWithFallback(providers, undefined, {
      transport: new FetchTransport({ timeoutMs: 5000 }),
      logger: createPrefixedLogger('fallback', defaultLogger),
    })
    console.log(formatLookupResponse(response))
  } catch (error) {
    if (error instanceof AllProvidersFailedError) {
      for (const failure of error.failures) {
        console.error(`${providerToString(failure.provider)}: ${failure.error.message}`)
      }
      process.exitCode = 1
      return
    }
    throw error
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
