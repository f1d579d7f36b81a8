import { describe, it, expect } from 'vitest'
import { canonicalizeIpAddress, isValidIpAddress, requireIpAddress } from './address.js'
import { InvalidAddressError } from '../lookup/lookup-error.js'
import { standardProvider } from '../types/provider.js'

describe('address helpers', () => {
  it('accepts IPv4 and IPv6 literals', () => {
    expect(isValidIpAddress('1.1.1.1')).toBe(true)
    expect(isValidIpAddress('2001:db8::1')).toBe(true)
    expect(isValidIpAddress('example.com')).toBe(false)
    expect(isValidIpAddress('256.1.1.1')).toBe(false)
  })

  it('requireIpAddress trims the value', () => {
    expect(requireIpAddress(' 8.8.8.8\n')).toBe('8.8.8.8')
  })

  it('spells equal IPv6 addresses the same way', () => {
    expect(requireIpAddress('2001:DB8::1')).toBe('2001:db8::1')
    expect(requireIpAddress('2001:db8:0:0:0:0:0:1')).toBe('2001:db8::1')
    expect(canonicalizeIpAddress(' 2001:0DB8:0000:0000:0000:0000:0000:0001 ')).toBe('2001:db8::1')
    expect(canonicalizeIpAddress('8.8.8.8')).toBe('8.8.8.8')
    expect(canonicalizeIpAddress('Example.com')).toBe('Example.com')
  })

  it('requireIpAddress attributes the failure to a provider', () => {
    try {
      requireIpAddress('not-an-ip', standardProvider('ipinfo'))
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidAddressError)
      if (error instanceof InvalidAddressError) {
        expect(error.value).toBe('not-an-ip')
        expect(error.provider).toEqual({ type: 'ipinfo' })
        expect(error.type).toBe('configuration')
        expect(error.message).toBe("Invalid IP address: 'not-an-ip'")
      }
    }
  })
})
