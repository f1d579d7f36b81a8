/**
 * Bulk Lookup Example
 *
 * Resolves several target addresses with one provider, one request each.
 * Failures are reported per target and do not stop the run.
 */

import { LookupService, formatLookupResponse, standardProvider } from '../src/index.js'

async function main(): Promise<void> {
  const service = new LookupService(standardProvider('ipquery'))
  const entries = await service.lookupBulk(['1.1.1.1', '8.8.8.8'])

  for (const entry of entries) {
    console.log(`--- ${entry.target}`)
    if ('response' in entry) {
      console.log(formatLookupResponse(entry.response))
    } else {
      console.log(`failed: ${entry.error.message}`)
    }
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
