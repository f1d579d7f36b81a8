/**
 * Lookup-specific error classes
 * @module lookup/lookup-error
 */

import { IpLookupError } from '../utils/errors.js'
import type { LookupProvider } from '../types/provider.js'
import { providerToString } from '../types/provider.js'

/**
 * Error categories raised while resolving an address.
 * `configuration` errors are raised before any request is issued.
 */
export type LookupErrorType =
  | 'transport'
  | 'rate_limit'
  | 'status'
  | 'parse'
  | 'configuration'
  | 'exhausted'
  | 'unknown'

/**
 * Base error class for lookup failures
 */
export class LookupError extends IpLookupError {
  /** Error type for categorization */
  public readonly type: LookupErrorType

  /** Provider the failure is attributed to, if any */
  public readonly provider?: LookupProvider

  constructor(
    message: string,
    code: string,
    type: LookupErrorType,
    provider?: LookupProvider,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(
      message,
      code,
      {
        ...(provider ? { provider: providerToString(provider) } : {}),
        ...context,
      },
      cause
    )
    this.name = 'LookupError'
    this.type = type
    this.provider = provider
  }
}

/**
 * Connection, DNS, TLS or timeout failure below the HTTP layer
 */
export class TransportError extends LookupError {
  constructor(
    provider: LookupProvider,
    message: string,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(
      `Transport error from '${providerToString(provider)}': ${message}`,
      'TRANSPORT_ERROR',
      'transport',
      provider,
      { originalMessage: message, ...context },
      cause
    )
    this.name = 'TransportError'
  }
}

/**
 * Provider answered HTTP 429
 */
export class TooManyRequestsError extends LookupError {
  public readonly statusCode = 429

  constructor(provider: LookupProvider, context?: Record<string, unknown>) {
    super(
      `Too many requests to '${providerToString(provider)}' (HTTP 429)`,
      'TOO_MANY_REQUESTS',
      'rate_limit',
      provider,
      { statusCode: 429, ...context }
    )
    this.name = 'TooManyRequestsError'
  }
}

/**
 * Provider answered with a status other than 200 or 429
 */
export class RequestStatusError extends LookupError {
  public readonly statusCode: number

  constructor(
    provider: LookupProvider,
    statusCode: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Unexpected status from '${providerToString(provider)}' (HTTP ${statusCode})`,
      'REQUEST_STATUS',
      'status',
      provider,
      { statusCode, ...context }
    )
    this.name = 'RequestStatusError'
    this.statusCode = statusCode
  }
}

/**
 * Provider reply was not valid JSON or did not match its schema
 */
export class ProviderParseError extends LookupError {
  /** Field that failed to parse, when known */
  public readonly field?: string

  /** Reason for the parse failure */
  public readonly reason: string

  constructor(
    provider: LookupProvider,
    reason: string,
    field?: string,
    context?: Record<string, unknown>
  ) {
    const fieldInfo = field ? ` (field '${field}')` : ''
    super(
      `Could not parse reply from '${providerToString(provider)}'${fieldInfo}: ${reason}`,
      'PROVIDER_PARSE_ERROR',
      'parse',
      provider,
      { field, reason, ...context }
    )
    this.name = 'ProviderParseError'
    this.field = field
    this.reason = reason
  }
}

/**
 * A target address was given to a provider that only resolves the caller
 */
export class TargetNotSupportedError extends LookupError {
  public readonly target: string

  constructor(provider: LookupProvider, target: string) {
    super(
      `Provider '${providerToString(provider)}' does not support target lookups (target ${target})`,
      'TARGET_NOT_SUPPORTED',
      'configuration',
      provider,
      { target }
    )
    this.name = 'TargetNotSupportedError'
    this.target = target
  }
}

/**
 * Identifier string does not name a known provider
 */
export class ProviderNotFoundError extends LookupError {
  public readonly identifier: string

  constructor(identifier: string, availableProviders: readonly string[]) {
    super(
      `Provider not found: '${identifier}'. Available providers: ${availableProviders.join(', ')}`,
      'PROVIDER_NOT_FOUND',
      'configuration',
      undefined,
      { identifier, availableProviders }
    )
    this.name = 'ProviderNotFoundError'
    this.identifier = identifier
  }
}

/**
 * Fallback was asked to run over an empty provider list
 */
export class NoProvidersError extends LookupError {
  constructor() {
    super(
      'No providers given',
      'NO_PROVIDERS',
      'configuration'
    )
    this.name = 'NoProvidersError'
  }
}

/**
 * A string that should hold an IP address does not
 */
export class InvalidAddressError extends LookupError {
  public readonly value: string

  constructor(value: string, provider?: LookupProvider) {
    super(
      `Invalid IP address: '${value}'`,
      'INVALID_ADDRESS',
      'configuration',
      provider,
      { value }
    )
    this.name = 'InvalidAddressError'
    this.value = value
  }
}

/**
 * One provider's failure inside a fallback run
 */
export interface ProviderFailure {
  provider: LookupProvider
  error: LookupError
}

/**
 * Every provider in a fallback list failed
 */
export class AllProvidersFailedError extends LookupError {
  /** Per-provider failures in the order the providers were tried */
  public readonly failures: ProviderFailure[]

  constructor(failures: ProviderFailure[]) {
    const summary = failures
      .map(({ provider, error }) => `${providerToString(provider)}: ${error.code}`)
      .join(', ')
    super(
      `All ${failures.length} providers failed (${summary})`,
      'ALL_PROVIDERS_FAILED',
      'exhausted',
      undefined,
      { failureCount: failures.length }
    )
    this.name = 'AllProvidersFailedError'
    this.failures = failures
  }
}

/**
 * Checks if an error is a LookupError
 */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError
}

/**
 * Checks if an error was raised before any request was issued
 */
export function isConfigurationError(error: unknown): boolean {
  return error instanceof LookupError && error.type === 'configuration'
}

/**
 * Creates a LookupError from an unknown throwable
 */
export function toLookupError(
  error: unknown,
  provider: LookupProvider
): LookupError {
  if (error instanceof LookupError) {
    return error
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase()

    if (
      error.name === 'AbortError' ||
      error.name === 'TimeoutError' ||
      message.includes('fetch failed') ||
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound')
    ) {
      return new TransportError(provider, error.message, error)
    }

    return new LookupError(
      `Lookup with '${providerToString(provider)}' failed: ${error.message}`,
      'LOOKUP_ERROR',
      'unknown',
      provider,
      { originalError: error.message }
    )
  }

  return new LookupError(
    `Lookup with '${providerToString(provider)}' failed: ${String(error)}`,
    'LOOKUP_ERROR',
    'unknown',
    provider,
    { originalError: String(error) }
  )
}
