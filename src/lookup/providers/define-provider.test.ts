import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { anyFlag, defineProvider, parseAddress, parseReply, present, splitAsn } from './define-provider.js'
import { ProviderParseError } from '../lookup-error.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'

const provider = standardProvider('ipify')

describe('defineProvider', () => {
  it('fills in the default capabilities', () => {
    const built = defineProvider({
      endpoint: () => 'https://example.invalid/',
      parse: () => createLookupResponse('192.0.2.1', provider),
      identity: () => provider,
    })
    const request = { method: 'GET' as const, url: 'https://example.invalid/', headers: {} }

    expect(built.supportsTargetLookup()).toBe(false)
    expect(built.authenticate(request, 'test-secret')).toBe(request)
  })
})

describe('parseReply', () => {
  const schema = z.object({ ip: z.string(), nested: z.object({ asn: z.number() }).optional() })

  it('returns the validated reply', () => {
    expect(parseReply('{"ip":"192.0.2.1"}', schema, provider)).toEqual({ ip: '192.0.2.1' })
  })

  it('rejects malformed JSON', () => {
    expect(() => parseReply('<html>', schema, provider)).toThrow(ProviderParseError)
  })

  it('reports the path of the first schema issue', () => {
    try {
      parseReply('{"ip":"192.0.2.1","nested":{"asn":"x"}}', schema, provider)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ProviderParseError)
      if (error instanceof ProviderParseError) {
        expect(error.field).toBe('nested.asn')
      }
    }
  })
})

describe('parseAddress', () => {
  it('trims a valid address', () => {
    expect(parseAddress(' 2001:db8::5 ', provider)).toBe('2001:db8::5')
  })

  it('fails the parse instead of inventing an address', () => {
    try {
      parseAddress('unknown', provider)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ProviderParseError)
      if (error instanceof ProviderParseError) {
        expect(error.field).toBe('ip')
        expect(error.reason).toBe("'unknown' is not an IP address")
      }
    }
  })
})

describe('field helpers', () => {
  it('present maps null to undefined', () => {
    expect(present(null)).toBeUndefined()
    expect(present(0)).toBe(0)
  })

  it('splitAsn separates the number from the organization', () => {
    expect(splitAsn('AS64500 Example Networks, Inc.')).toEqual({
      asn: 'AS64500',
      org: 'Example Networks, Inc.',
    })
    expect(splitAsn('as64501')).toEqual({ asn: 'AS64501', org: undefined })
    expect(splitAsn('Example Networks')).toEqual({ org: 'Example Networks' })
    expect(splitAsn(null)).toEqual({})
  })

  it('anyFlag is undefined only when no flag is known', () => {
    expect(anyFlag(null, undefined)).toBeUndefined()
    expect(anyFlag(false, null)).toBe(false)
    expect(anyFlag(false, true, null)).toBe(true)
  })
})
