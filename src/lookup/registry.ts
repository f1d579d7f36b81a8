/**
 * Provider registry: identifier to constructed adapter
 * @module lookup/registry
 */

import type { Provider } from './types.js'
import type { LookupProvider, Parameters } from '../types/provider.js'
import {
  PROVIDER_NAMES,
  createParameters,
  isProviderName,
  standardProvider,
} from '../types/provider.js'
import { ProviderNotFoundError } from './lookup-error.js'
import {
  createFreeIpApiProvider,
  createIfConfigProvider,
  createIpApiCoProvider,
  createIpApiComProvider,
  createIpBaseProvider,
  createIpInfoProvider,
  createIpQueryProvider,
  createIpWhoIsProvider,
  createIpifyProvider,
  createMockProvider,
  createMyIpComProvider,
} from './providers/index.js'

/**
 * Identifier plus the credentials parsed alongside it
 */
export interface ParsedProvider {
  provider: LookupProvider
  parameters?: Parameters
}

/**
 * Builds the adapter for an identifier
 */
export function buildProvider(provider: LookupProvider): Provider {
  switch (provider.type) {
    case 'freeipapi':
      return createFreeIpApiProvider()
    case 'ifconfig':
      return createIfConfigProvider()
    case 'ipinfo':
      return createIpInfoProvider()
    case 'myipcom':
      return createMyIpComProvider()
    case 'ipapicom':
      return createIpApiComProvider()
    case 'ipwhois':
      return createIpWhoIsProvider()
    case 'ipapico':
      return createIpApiCoProvider()
    case 'ipbase':
      return createIpBaseProvider()
    case 'ipquery':
      return createIpQueryProvider()
    case 'ipify':
      return createIpifyProvider()
    case 'mock':
      return createMockProvider({ ip: provider.ip, endpoint: provider.endpoint })
    default: {
      const unreachable: never = provider
      throw new ProviderNotFoundError(JSON.stringify(unreachable), PROVIDER_NAMES)
    }
  }
}

/**
 * Parses the compact `"<provider> [<key>]"` syntax.
 * Names are matched case-insensitively; the key keeps its original case.
 *
 * @example
 * ```typescript
 * parseProviderWithParams('IpInfo test-token')
 * // { provider: { type: 'ipinfo' }, parameters: { apiKey: 'test-token' } }
 * ```
 *
 * @throws ProviderNotFoundError when the first token is not a known provider
 */
export function parseProviderWithParams(value: string): ParsedProvider {
  const [name = '', key] = value.trim().split(/\s+/)
  const normalized = name.toLowerCase()

  if (!isProviderName(normalized)) {
    throw new ProviderNotFoundError(name, PROVIDER_NAMES)
  }

  const provider = standardProvider(normalized)
  return key ? { provider, parameters: createParameters(key) } : { provider }
}

/**
 * Parses a provider name, ignoring any trailing key
 */
export function parseProvider(value: string): LookupProvider {
  return parseProviderWithParams(value).provider
}
