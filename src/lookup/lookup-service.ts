/**
 * Lookup service: one provider, one request/parse cycle per lookup
 * @module lookup/lookup-service
 */

import type {
  BulkLookupEntry,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  Logger,
  LookupOptions,
  Provider,
} from './types.js'
import type { LookupProvider, Parameters } from '../types/provider.js'
import { providerToString } from '../types/provider.js'
import type { LookupResponse } from '../types/response.js'
import {
  TargetNotSupportedError,
  TransportError,
  isLookupError,
  toLookupError,
} from './lookup-error.js'
import { buildProvider } from './registry.js'
import { createDefaultTransport, handleResponse } from './transport.js'
import { requireIpAddress } from '../utils/address.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'

/**
 * Wraps one built provider plus optional credentials
 *
 * @example
 * ```typescript
 * const service = new LookupService(standardProvider('ipinfo'), createParameters('test-token'))
 * const response = await service.lookup('8.8.8.8')
 * console.log(formatLookupResponse(response))
 * ```
 */
export class LookupService {
  private provider: Provider
  private parameters?: Parameters
  private readonly transport: HttpTransport
  private readonly baseLogger: Logger
  private logger: Logger

  constructor(
    provider: LookupProvider,
    parameters?: Parameters,
    options: LookupOptions = {}
  ) {
    this.provider = buildProvider(provider)
    this.parameters = parameters
    this.transport = options.transport ?? createDefaultTransport()
    this.baseLogger = options.logger ?? createSilentLogger()
    this.logger = createPrefixedLogger(providerToString(provider), this.baseLogger)
  }

  /**
   * Identifier of the current provider
   */
  getProviderType(): LookupProvider {
    return this.provider.identity()
  }

  /**
   * Swaps the provider and its credentials
   */
  setProvider(provider: LookupProvider, parameters?: Parameters): this {
    this.provider = buildProvider(provider)
    this.parameters = parameters
    this.logger = createPrefixedLogger(providerToString(provider), this.baseLogger)
    return this
  }

  /**
   * Resolves the caller's address, or `target` when given.
   * Issues exactly one request; nothing is retried.
   *
   * @throws TargetNotSupportedError before any request when the provider
   * cannot resolve other addresses
   * @throws TooManyRequestsError, RequestStatusError, TransportError or
   * ProviderParseError for the request itself
   */
  async lookup(target?: string): Promise<LookupResponse> {
    const identity = this.provider.identity()
    const address = this.checkTarget(target)

    const apiKey = this.parameters?.apiKey
    const request = this.provider.authenticate(
      {
        method: 'GET',
        url: this.provider.endpoint(apiKey, address),
        headers: {},
      },
      apiKey
    )

    this.logger.debug('Sending lookup request', { url: request.url, target: address })
    const body = handleResponse(await this.send(request, identity), identity)
    const response = this.provider.parse(body)
    this.logger.debug('Lookup succeeded', { ip: response.ip })
    return response
  }

  /**
   * Resolves each target in turn, reporting every outcome separately
   *
   * @throws TargetNotSupportedError when the provider cannot resolve targets
   */
  async lookupBulk(targets: readonly string[]): Promise<BulkLookupEntry[]> {
    const identity = this.provider.identity()
    if (targets.length > 0 && !this.provider.supportsTargetLookup()) {
      throw new TargetNotSupportedError(identity, targets[0])
    }

    const entries: BulkLookupEntry[] = []
    for (const target of targets) {
      try {
        entries.push({ target, response: await this.lookup(target) })
      } catch (error) {
        const lookupError = toLookupError(error, identity)
        this.logger.warn('Bulk lookup entry failed', { target, code: lookupError.code })
        entries.push({ target, error: lookupError })
      }
    }
    return entries
  }

  private checkTarget(target: string | undefined): string | undefined {
    if (target === undefined) {
      return undefined
    }
    const identity = this.provider.identity()
    if (!this.provider.supportsTargetLookup()) {
      throw new TargetNotSupportedError(identity, target)
    }
    return requireIpAddress(target, identity)
  }

  /**
   * Anything the transport throws is a failure below the HTTP layer
   */
  private async send(request: HttpRequest, identity: LookupProvider): Promise<HttpResponse> {
    try {
      return await this.transport.send(request)
    } catch (error) {
      if (isLookupError(error)) {
        throw error
      }
      if (error instanceof Error) {
        throw new TransportError(identity, error.message, error)
      }
      throw new TransportError(identity, String(error))
    }
  }
}
