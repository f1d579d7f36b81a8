/**
 * Provider identifiers and credential bundles
 * @module types/provider
 */

import { requireNonEmptyString } from '../utils/errors.js'

/**
 * Identifiers of every real backend the registry can build
 */
export const PROVIDER_NAMES = [
  'freeipapi',
  'ifconfig',
  'ipinfo',
  'myipcom',
  'ipapicom',
  'ipwhois',
  'ipapico',
  'ipbase',
  'ipquery',
  'ipify',
] as const

/**
 * Name of a real backend
 */
export type ProviderName = (typeof PROVIDER_NAMES)[number]

/**
 * Identifier of a real backend, which carries no configuration
 */
export interface StandardLookupProvider {
  type: ProviderName
}

/**
 * Synthetic backend for tests: answers every request with a fixed address
 */
export interface MockLookupProvider {
  type: 'mock'

  /** Address every lookup resolves to */
  ip: string

  /** Endpoint the request is sent to */
  endpoint?: string
}

/**
 * Tagged identifier of a lookup backend.
 * Persisted inside cached records, so its JSON shape must stay stable.
 */
export type LookupProvider = StandardLookupProvider | MockLookupProvider

/**
 * Credentials attached to a provider at lookup time
 */
export interface Parameters {
  /** API key or token understood by the provider */
  apiKey: string
}

/**
 * Check whether a string names a real backend
 */
export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value)
}

/**
 * Build the identifier of a real backend
 */
export function standardProvider(type: ProviderName): StandardLookupProvider {
  return { type }
}

/**
 * Build a mock identifier with a stable key order
 */
export function mockProvider(ip: string, endpoint?: string): MockLookupProvider {
  return endpoint === undefined ? { type: 'mock', ip } : { type: 'mock', ip, endpoint }
}

/**
 * Build a credential bundle
 * @throws InvalidParameterError for an empty key
 */
export function createParameters(apiKey: string): Parameters {
  return { apiKey: requireNonEmptyString(apiKey, 'apiKey') }
}

/**
 * Display name of a provider identifier, e.g. `ipinfo` or `mock(1.1.1.1)`
 */
export function providerToString(provider: LookupProvider): string {
  if (provider.type === 'mock') {
    return `mock(${provider.ip})`
  }
  return provider.type
}

/**
 * Structural equality of two identifiers
 */
export function isSameProvider(a: LookupProvider, b: LookupProvider): boolean {
  if (a.type === 'mock' || b.type === 'mock') {
    return (
      a.type === 'mock' &&
      b.type === 'mock' &&
      a.ip === b.ip &&
      a.endpoint === b.endpoint
    )
  }
  return a.type === b.type
}
