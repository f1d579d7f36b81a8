import { describe, it, expect, vi } from 'vitest'
import { FetchTransport, handleResponse } from './transport.js'
import { RequestStatusError, TooManyRequestsError } from './lookup-error.js'
import { InvalidParameterError } from '../utils/errors.js'
import { standardProvider } from '../types/provider.js'

function createFetchStub(status: number, body: string) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }))
}

describe('FetchTransport', () => {
  it('returns status and body', async () => {
    const fetchStub = createFetchStub(200, '{"ip":"1.1.1.1"}')
    const transport = new FetchTransport({ fetch: fetchStub })

    const response = await transport.send({ method: 'GET', url: 'https://ifconfig.co/json', headers: {} })

    expect(response).toEqual({ status: 200, body: '{"ip":"1.1.1.1"}' })
    expect(fetchStub).toHaveBeenCalledTimes(1)
    expect(fetchStub.mock.calls[0][0]).toBe('https://ifconfig.co/json')
  })

  it('sends default headers that request headers override', async () => {
    const fetchStub = createFetchStub(200, '{}')
    const transport = new FetchTransport({ fetch: fetchStub, userAgent: 'lookup-test' })

    await transport.send({
      method: 'GET',
      url: 'https://ipapi.co/json',
      headers: { 'User-Agent': 'nil', apikey: 'test-secret' },
    })

    const init = fetchStub.mock.calls[0][1]
    const headers = new Headers(init?.headers)
    expect(init?.method).toBe('GET')
    expect(headers.get('accept')).toBe('application/json')
    expect(headers.get('user-agent')).toBe('nil')
    expect(headers.get('apikey')).toBe('test-secret')
  })

  it('passes an abort signal only when a timeout is configured', async () => {
    const withoutTimeout = createFetchStub(200, '{}')
    await new FetchTransport({ fetch: withoutTimeout }).send({ method: 'GET', url: 'http://a.invalid/', headers: {} })
    expect(withoutTimeout.mock.calls[0][1]?.signal).toBeUndefined()

    const withTimeout = createFetchStub(200, '{}')
    await new FetchTransport({ fetch: withTimeout, timeoutMs: 1000 }).send({
      method: 'GET',
      url: 'http://a.invalid/',
      headers: {},
    })
    expect(withTimeout.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal)
  })

  it('rejects a non-positive timeout', () => {
    expect(() => new FetchTransport({ timeoutMs: 0 })).toThrow(InvalidParameterError)
  })

  it('propagates fetch failures', async () => {
    const failing = vi.fn(async () => {
      throw new TypeError('fetch failed')
    })
    const transport = new FetchTransport({ fetch: failing })

    await expect(
      transport.send({ method: 'GET', url: 'http://a.invalid/', headers: {} })
    ).rejects.toThrow('fetch failed')
  })
})

describe('handleResponse', () => {
  const provider = standardProvider('ipwhois')

  it('returns the body of a 200', () => {
    expect(handleResponse({ status: 200, body: 'payload' }, provider)).toBe('payload')
  })

  it('maps 429 to TooManyRequestsError', () => {
    expect(() => handleResponse({ status: 429, body: '' }, provider)).toThrow(TooManyRequestsError)
  })

  it('maps every other status to RequestStatusError', () => {
    for (const status of [201, 301, 404, 500]) {
      try {
        handleResponse({ status, body: '' }, provider)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(RequestStatusError)
        if (error instanceof RequestStatusError) {
          expect(error.statusCode).toBe(status)
        }
      }
    }
  })
})
