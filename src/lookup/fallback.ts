/**
 * Sequential fallback across an ordered provider list
 * @module lookup/fallback
 */

import type { LookupOptions, ProviderEntry } from './types.js'
import type { LookupResponse } from '../types/response.js'
import { providerToString } from '../types/provider.js'
import type { ProviderFailure } from './lookup-error.js'
import { AllProvidersFailedError, NoProvidersError, toLookupError } from './lookup-error.js'
import { LookupService } from './lookup-service.js'
import { createDefaultTransport } from './transport.js'
import { createSilentLogger } from '../utils/logger.js'

/**
 * Tries each provider in list order and returns the first success.
 * Later providers are never contacted once one succeeds.
 *
 * @example
 * ```typescript
 * const response = await lookupWithFallback([
 *   [standardProvider('ipinfo'), createParameters('test-token')],
 *   [standardProvider('ifconfig')],
 * ])
 * ```
 *
 * @throws NoProvidersError for an empty list, before any request
 * @throws AllProvidersFailedError with every failure, in order, when none succeeds
 */
export async function lookupWithFallback(
  providers: readonly ProviderEntry[],
  target?: string,
  options: LookupOptions = {}
): Promise<LookupResponse> {
  if (providers.length === 0) {
    throw new NoProvidersError()
  }

  const logger = options.logger ?? createSilentLogger()
  const transport = options.transport ?? createDefaultTransport()
  const failures: ProviderFailure[] = []

  for (const [provider, parameters] of providers) {
    const name = providerToString(provider)
    logger.debug('Trying provider', { provider: name, target })

    try {
      const service = new LookupService(provider, parameters, { transport, logger })
      return await service.lookup(target)
    } catch (error) {
      const lookupError = toLookupError(error, provider)
      logger.warn('Provider failed', { provider: name, code: lookupError.code })
      failures.push({ provider, error: lookupError })
    }
  }

  logger.error('All providers failed', { count: failures.length })
  throw new AllProvidersFailedError(failures)
}
