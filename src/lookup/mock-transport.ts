/**
 * Mock Transport
 * Configurable in-process transport for testing and development
 * @module lookup/mock-transport
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js'

/**
 * Canned reply: either a response or a transport-level failure
 */
export type MockReply = HttpResponse | { error: Error }

/**
 * Configuration for the mock transport
 */
export interface MockTransportConfig {
  /** Status of the default reply */
  status?: number

  /** Body of the default reply */
  body?: string

  /** Canned replies keyed by exact request URL */
  responses?: Map<string, MockReply>

  /** Reply function for dynamic replies */
  responseFn?: (request: HttpRequest) => MockReply | Promise<MockReply>

  /** Error thrown for every request, simulating an outage */
  failure?: Error

  /** Simulated latency in milliseconds */
  latencyMs?: number

  /** Whether to track call history */
  trackCalls?: boolean
}

/**
 * Call history entry
 */
export interface MockTransportCall {
  /** Request as it reached the transport, headers included */
  request: HttpRequest

  /** Timestamp of the call */
  timestamp: Date

  /** Reply returned (if the call did not throw) */
  response?: HttpResponse

  /** Error message (if the call threw) */
  error?: string
}

/**
 * Default mock configuration
 */
export const DEFAULT_MOCK_TRANSPORT_CONFIG: MockTransportConfig = {
  status: 200,
  body: '{}',
  latencyMs: 0,
  trackCalls: true,
}

/**
 * Mock transport with call tracking
 *
 * @example
 * ```typescript
 * const transport = createMockTransport()
 * transport.addResponse('https://ipinfo.io/json', { status: 429, body: '' })
 *
 * await expect(new LookupService(standardProvider('ipinfo'), undefined, { transport }).lookup())
 *   .rejects.toBeInstanceOf(TooManyRequestsError)
 * expect(transport.getCallCount()).toBe(1)
 * ```
 */
export interface MockTransport extends HttpTransport {
  /** Get call history */
  getCallHistory(): MockTransportCall[]

  /** Get requested URLs in call order */
  getRequestedUrls(): string[]

  /** Clear call history */
  clearCallHistory(): void

  /** Get number of calls */
  getCallCount(): number

  /** Get last call entry */
  getLastCall(): MockTransportCall | undefined

  /** Add a canned reply for a URL */
  addResponse(url: string, reply: MockReply): void

  /** Remove a canned reply */
  removeResponse(url: string): boolean

  /** Set or clear the outage error */
  setFailure(error: Error | undefined): void

  /** Reset history, canned replies and failure */
  reset(): void
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function isFailureReply(reply: MockReply): reply is { error: Error } {
  return 'error' in reply
}

/**
 * Create a mock transport
 */
export function createMockTransport(config: MockTransportConfig = {}): MockTransport {
  const mergedConfig = { ...DEFAULT_MOCK_TRANSPORT_CONFIG, ...config }
  const responses = new Map(config.responses ?? [])
  let failure = config.failure
  const callHistory: MockTransportCall[] = []

  const findReply = async (request: HttpRequest): Promise<MockReply> => {
    if (failure) {
      return { error: failure }
    }
    const canned = responses.get(request.url)
    if (canned) {
      return canned
    }
    if (mergedConfig.responseFn) {
      return mergedConfig.responseFn(request)
    }
    return {
      status: mergedConfig.status ?? 200,
      body: mergedConfig.body ?? '{}',
    }
  }

  const record = (entry: MockTransportCall): void => {
    if (mergedConfig.trackCalls) {
      callHistory.push(entry)
    }
  }

  return {
    async send(request: HttpRequest): Promise<HttpResponse> {
      const timestamp = new Date()
      const snapshot: HttpRequest = { ...request, headers: { ...request.headers } }

      if (mergedConfig.latencyMs && mergedConfig.latencyMs > 0) {
        await sleep(mergedConfig.latencyMs)
      }

      const reply = await findReply(request)
      if (isFailureReply(reply)) {
        record({ request: snapshot, timestamp, error: reply.error.message })
        throw reply.error
      }

      const response = { status: reply.status, body: reply.body }
      record({ request: snapshot, timestamp, response })
      return response
    },

    getCallHistory: () => [...callHistory],

    getRequestedUrls: () => callHistory.map((call) => call.request.url),

    clearCallHistory: () => {
      callHistory.length = 0
    },

    getCallCount: () => callHistory.length,

    getLastCall: () => callHistory[callHistory.length - 1],

    addResponse: (url: string, reply: MockReply) => {
      responses.set(url, reply)
    },

    removeResponse: (url: string) => responses.delete(url),

    setFailure: (error: Error | undefined) => {
      failure = error
    },

    reset: () => {
      callHistory.length = 0
      responses.clear()
      failure = undefined
    },
  }
}

/**
 * Transport that answers every request with the given status and body
 */
export function createStatusTransport(status: number, body = ''): MockTransport {
  return createMockTransport({ status, body })
}

/**
 * Transport that fails every request below the HTTP layer
 */
export function createFailingTransport(
  error: Error = new Error('connect ECONNREFUSED 127.0.0.1:80')
): MockTransport {
  return createMockTransport({ failure: error })
}
