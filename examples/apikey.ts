/**
 * API Key Example
 *
 * Reads a provider token from the environment and resolves a target address.
 *
 *   IPINFO_TOKEN=... npx tsx examples/apikey.ts 8.8.8.8
 */

import {
  LookupService,
  createParameters,
  formatLookupResponse,
  standardProvider,
} from '../src/index.js'

async function main(): Promise<void> {
  const token = process.env.IPINFO_TOKEN
  if (!token) {
    throw new Error('Set IPINFO_TOKEN to an ipinfo.io access token')
  }

  const service = new LookupService(standardProvider('ipinfo'), createParameters(token))
  const response = await service.lookup(process.argv[2])
  console.log(formatLookupResponse(response))
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
