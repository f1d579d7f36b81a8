/**
 * Shared building blocks for provider adapters
 * @module lookup/providers/define-provider
 */

import type { z } from 'zod'
import type { HttpRequest, Provider, ProviderDefinition } from '../types.js'
import type { LookupProvider } from '../../types/provider.js'
import { ProviderParseError } from '../lookup-error.js'
import { isValidIpAddress } from '../../utils/address.js'

/**
 * Completes a provider definition with the default capabilities:
 * no header authentication and no target lookups.
 */
export function defineProvider(definition: ProviderDefinition): Provider {
  return {
    authenticate: (request: HttpRequest) => request,
    supportsTargetLookup: () => false,
    ...definition,
  }
}

/**
 * Decodes a JSON body and validates it against the provider's reply schema
 * @throws ProviderParseError on malformed JSON or a schema mismatch
 */
export function parseReply<S extends z.ZodTypeAny>(
  body: string,
  schema: S,
  provider: LookupProvider
): z.output<S> {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (error) {
    throw new ProviderParseError(
      provider,
      error instanceof Error ? error.message : String(error)
    )
  }

  const result = schema.safeParse(json)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.')
    throw new ProviderParseError(
      provider,
      issue?.message ?? 'reply does not match schema',
      field || undefined
    )
  }
  return result.data
}

/**
 * Validates the address a provider reported.
 * An unparseable address fails the parse instead of being replaced by a placeholder.
 */
export function parseAddress(value: string, provider: LookupProvider): string {
  const trimmed = value.trim()
  if (!isValidIpAddress(trimmed)) {
    throw new ProviderParseError(provider, `'${value}' is not an IP address`, 'ip')
  }
  return trimmed
}

/**
 * Maps JSON null onto an absent field
 */
export function present<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined
}

/**
 * Splits an organization string such as `AS13335 Cloudflare, Inc.`
 */
export function splitAsn(value: string | null | undefined): { asn?: string; org?: string } {
  if (!value) {
    return {}
  }
  const match = /^(AS\d+)\s*(.*)$/i.exec(value.trim())
  if (!match) {
    return { org: value.trim() }
  }
  return { asn: match[1].toUpperCase(), org: match[2] || undefined }
}

/**
 * Whether any of the provider's risk flags is set
 */
export function anyFlag(...flags: Array<boolean | null | undefined>): boolean | undefined {
  if (flags.every((flag) => flag === null || flag === undefined)) {
    return undefined
  }
  return flags.some((flag) => flag === true)
}
