/**
 * Normalized lookup result every provider converges to
 * @module types/response
 */

import type { LookupProvider } from './provider.js'
import { providerToString } from './provider.js'
import { requireIpAddress } from '../utils/address.js'

/**
 * Lookup result for one address.
 * Only `ip` and `provider` are guaranteed; every other field is best-effort.
 */
export interface LookupResponse {
  /** Resolved public (or target) IP address */
  ip: string

  continent?: string
  country?: string

  /** ISO 3166-1 alpha-2 country code */
  countryCode?: string

  region?: string
  regionCode?: string
  postalCode?: string
  city?: string
  latitude?: number
  longitude?: number

  /** IANA time zone name */
  timeZone?: string

  /** Autonomous system number */
  asn?: string

  /** Autonomous system organization */
  asnOrg?: string

  /** Reverse DNS name of the address */
  hostname?: string

  /** Whether the provider flags the address as a proxy, VPN or Tor exit */
  isProxy?: boolean

  /** Backend that produced this response */
  provider: LookupProvider
}

/**
 * Optional fields of a response
 */
export type LookupResponseFields = Omit<LookupResponse, 'ip' | 'provider'>

/**
 * Builds a response, rejecting an `ip` that is not a literal address
 */
export function createLookupResponse(
  ip: string,
  provider: LookupProvider,
  fields: LookupResponseFields = {}
): LookupResponse {
  return {
    ...fields,
    ip: requireIpAddress(ip, provider),
    provider,
  }
}

/**
 * Deep copy, so callers never share a record owned by a cache
 */
export function cloneLookupResponse(response: LookupResponse): LookupResponse {
  return structuredClone(response)
}

/**
 * Renders a response as a multi-line human-readable summary
 */
export function formatLookupResponse(response: LookupResponse): string {
  const lines = [`IP: ${response.ip}`]

  if (response.continent) {
    lines.push(`Continent: ${response.continent}`)
  }
  const country = withCode(response.country, response.countryCode)
  if (country) {
    lines.push(`Country: ${country}`)
  }
  const region = withCode(response.region, response.regionCode)
  if (region) {
    lines.push(`Region: ${region}`)
  }
  if (response.postalCode) {
    lines.push(`Postal code: ${response.postalCode}`)
  }
  if (response.city) {
    lines.push(`City: ${response.city}`)
  }
  if (response.latitude !== undefined && response.longitude !== undefined) {
    lines.push(`Coordinates: ${response.latitude}, ${response.longitude}`)
  }
  if (response.timeZone) {
    lines.push(`Time zone: ${response.timeZone}`)
  }
  const organization = withCode(response.asnOrg, response.asn)
  if (organization) {
    lines.push(`Organization: ${organization}`)
  }
  if (response.hostname) {
    lines.push(`Hostname: ${response.hostname}`)
  }
  if (response.isProxy !== undefined) {
    lines.push(`Proxy: ${response.isProxy}`)
  }
  lines.push(`Provider: ${providerToString(response.provider)}`)

  return lines.join('\n')
}

function withCode(name?: string, code?: string): string | undefined {
  if (name && code) {
    return `${name} (${code})`
  }
  return name || code || undefined
}
