/**
 * Basic Example
 *
 * Looks up this machine's public address with the default providers.
 * A repeated run within two seconds is answered from the cache file.
 */

import { defaultLogger, formatLookupResponse, performLookup } from '../src/index.js'

async function main(): Promise<void> {
  const response = await performLookup(undefined, { logger: defaultLogger })
  console.log(formatLookupResponse(response))
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
