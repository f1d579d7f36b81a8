/**
 * Lookup type definitions: provider contract, transport seam, logger
 * @module lookup/types
 */

import type { LookupProvider, Parameters } from '../types/provider.js'
import type { LookupResponse } from '../types/response.js'
import type { LookupError } from './lookup-error.js'

/**
 * Logger interface for lookup and cache logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Outgoing request, before and after provider authentication
 */
export interface HttpRequest {
  method: 'GET'
  url: string
  headers: Record<string, string>
}

/**
 * Raw reply as seen by the lookup layer
 */
export interface HttpResponse {
  status: number
  body: string
}

/**
 * The single I/O primitive. Implementations throw on transport failure
 * and resolve with whatever status the server answered.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>
}

/**
 * Capability contract every backend satisfies
 */
export interface Provider {
  /** Builds the request URL from an optional API key and target address */
  endpoint(apiKey: string | undefined, target: string | undefined): string

  /** Attaches header-based credentials; the default returns the request unchanged */
  authenticate(request: HttpRequest, apiKey: string | undefined): HttpRequest

  /**
   * Maps the provider-specific JSON body onto the normalized model
   * @throws ProviderParseError when the body does not match the provider's schema
   */
  parse(body: string): LookupResponse

  /** Identifier used for cache bookkeeping and the response's `provider` */
  identity(): LookupProvider

  /** Whether `endpoint` can resolve an address other than the caller's */
  supportsTargetLookup(): boolean
}

/**
 * Provider definition with the defaultable capabilities left optional
 */
export type ProviderDefinition = Pick<Provider, 'endpoint' | 'parse' | 'identity'> &
  Partial<Pick<Provider, 'authenticate' | 'supportsTargetLookup'>>

/**
 * One entry of a fallback list
 */
export type ProviderEntry = readonly [provider: LookupProvider, parameters?: Parameters]

/**
 * Options shared by every operation that issues requests
 */
export interface LookupOptions {
  /** Transport used to issue requests (defaults to a new FetchTransport) */
  transport?: HttpTransport

  /** Logger for request and fallback events (defaults to silent) */
  logger?: Logger
}

/**
 * Outcome of one target inside a bulk lookup
 */
export type BulkLookupEntry =
  | { target: string; response: LookupResponse }
  | { target: string; error: LookupError }
