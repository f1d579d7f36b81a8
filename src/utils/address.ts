/**
 * IP address helpers
 * @module utils/address
 */

import { isIP } from 'node:net'
import type { LookupProvider } from '../types/provider.js'
import { InvalidAddressError } from '../lookup/lookup-error.js'

/**
 * Whether a string is a literal IPv4 or IPv6 address
 */
export function isValidIpAddress(value: string): boolean {
  return isIP(value) !== 0
}

/**
 * Canonical spelling of an address: IPv6 lower-cased with the longest
 * zero run compressed, so equal addresses compare equal as strings.
 * Values that are not addresses come back trimmed only.
 */
export function canonicalizeIpAddress(value: string): string {
  const trimmed = value.trim()
  if (isIP(trimmed) !== 6) {
    return trimmed
  }
  const zoneStart = trimmed.indexOf('%')
  const address = zoneStart === -1 ? trimmed : trimmed.slice(0, zoneStart)
  const zone = zoneStart === -1 ? '' : trimmed.slice(zoneStart)
  const hostname = new URL(`http://[${address}]/`).hostname
  return `${hostname.slice(1, -1)}${zone}`
}

/**
 * Returns the canonical address or throws InvalidAddressError
 */
export function requireIpAddress(value: string, provider?: LookupProvider): string {
  const trimmed = value.trim()
  if (!isValidIpAddress(trimmed)) {
    throw new InvalidAddressError(value, provider)
  }
  return canonicalizeIpAddress(trimmed)
}
