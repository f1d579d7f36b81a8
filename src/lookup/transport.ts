/**
 * HTTP transport: the one place requests leave the process
 * @module lookup/transport
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js'
import type { LookupProvider } from '../types/provider.js'
import { RequestStatusError, TooManyRequestsError } from './lookup-error.js'
import { requirePositive } from '../utils/errors.js'

/**
 * Configuration for the fetch-based transport
 */
export interface TransportConfig {
  /** Per-request timeout in milliseconds; unset means no client-side deadline */
  timeoutMs?: number

  /** User-Agent sent unless a provider overrides it */
  userAgent: string

  /** Fetch implementation (defaults to the global one) */
  fetch?: typeof fetch
}

/**
 * Default transport configuration
 */
export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
  userAgent: 'public-ip-lookup',
}

/**
 * Transport backed by the WHATWG fetch API
 *
 * @example
 * ```typescript
 * const transport = new FetchTransport({ timeoutMs: 5000 })
 * const service = new LookupService(standardProvider('ipinfo'), undefined, { transport })
 * ```
 */
export class FetchTransport implements HttpTransport {
  private readonly config: TransportConfig

  constructor(config: Partial<TransportConfig> = {}) {
    this.config = { ...DEFAULT_TRANSPORT_CONFIG, ...config }
    if (this.config.timeoutMs !== undefined) {
      requirePositive(this.config.timeoutMs, 'timeoutMs')
    }
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const fetchFn = this.config.fetch ?? globalThis.fetch

    const headers = new Headers()
    headers.set('accept', 'application/json')
    headers.set('user-agent', this.config.userAgent)
    for (const [name, value] of Object.entries(request.headers)) {
      headers.set(name, value)
    }

    const response = await fetchFn(request.url, {
      method: request.method,
      headers,
      signal:
        this.config.timeoutMs !== undefined
          ? AbortSignal.timeout(this.config.timeoutMs)
          : undefined,
    })

    return {
      status: response.status,
      body: await response.text(),
    }
  }
}

/**
 * Transport used when callers do not pass one
 */
export function createDefaultTransport(): HttpTransport {
  return new FetchTransport()
}

/**
 * Maps a reply onto its payload: 200 yields the body, 429 and every
 * other status become typed errors attributed to the provider.
 */
export function handleResponse(
  response: HttpResponse,
  provider: LookupProvider
): string {
  if (response.status === 200) {
    return response.body
  }
  if (response.status === 429) {
    throw new TooManyRequestsError(provider)
  }
  throw new RequestStatusError(provider, response.status)
}
