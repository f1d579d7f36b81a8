/**
 * Endpoint, authentication and reply mapping of every adapter
 */

import { describe, it, expect } from 'vitest'
import type { HttpRequest } from '../types.js'
import { ProviderParseError } from '../lookup-error.js'
import { createFreeIpApiProvider } from './freeipapi.js'
import { createIfConfigProvider } from './ifconfig.js'
import { createIpApiCoProvider } from './ipapico.js'
import { createIpApiComProvider } from './ipapicom.js'
import { createIpBaseProvider } from './ipbase.js'
import { createIpifyProvider } from './ipify.js'
import { createIpInfoProvider, parseCoordinates } from './ipinfo.js'
import { createIpQueryProvider } from './ipquery.js'
import { createIpWhoIsProvider } from './ipwhois.js'
import { createMockProvider, DEFAULT_MOCK_ENDPOINT } from './mock.js'
import { createMyIpComProvider } from './myipcom.js'

const emptyRequest: HttpRequest = { method: 'GET', url: 'https://example.invalid/', headers: {} }

describe('ifconfig', () => {
  const provider = createIfConfigProvider()

  it('builds the endpoint', () => {
    expect(provider.endpoint(undefined, undefined)).toBe('https://ifconfig.co/json')
    expect(provider.endpoint(undefined, '198.51.100.7')).toBe('https://ifconfig.co/json?ip=198.51.100.7')
    expect(provider.supportsTargetLookup()).toBe(true)
  })

  it('maps the reply', () => {
    const response = provider.parse(
      JSON.stringify({
        ip: '203.0.113.10',
        country: 'Germany',
        country_iso: 'DE',
        country_eu: true,
        region_name: 'Berlin',
        region_code: 'BE',
        zip_code: '10115',
        city: 'Berlin',
        latitude: 52.5,
        longitude: 13.4,
        time_zone: 'Europe/Berlin',
        asn: 'AS64500',
        asn_org: 'Example Networks',
        hostname: 'host.example.net',
      })
    )

    expect(response).toMatchObject({
      ip: '203.0.113.10',
      continent: 'Europe',
      country: 'Germany',
      countryCode: 'DE',
      region: 'Berlin',
      regionCode: 'BE',
      postalCode: '10115',
      city: 'Berlin',
      latitude: 52.5,
      longitude: 13.4,
      timeZone: 'Europe/Berlin',
      asn: 'AS64500',
      asnOrg: 'Example Networks',
      hostname: 'host.example.net',
      provider: { type: 'ifconfig' },
    })
  })

  it('leaves continent unset outside the EU', () => {
    const response = provider.parse('{"ip":"203.0.113.10","country_eu":false}')
    expect(response.continent).toBeUndefined()
  })

  it('fails on an unparseable address', () => {
    expect(() => provider.parse('{"ip":"not-an-ip"}')).toThrow(ProviderParseError)
  })
})

describe('ipinfo', () => {
  const provider = createIpInfoProvider()

  it('puts target and token into the URL', () => {
    expect(provider.endpoint(undefined, undefined)).toBe('https://ipinfo.io/json')
    expect(provider.endpoint('test-token', '198.51.100.7')).toBe(
      'https://ipinfo.io/198.51.100.7/json?token=test-token'
    )
    expect(provider.endpoint('a b', undefined)).toBe('https://ipinfo.io/json?token=a%20b')
  })

  it('maps the reply', () => {
    const response = provider.parse(
      JSON.stringify({
        ip: '203.0.113.20',
        hostname: 'edge.example.net',
        city: 'Oslo',
        region: 'Oslo',
        country: 'NO',
        loc: '59.9127,10.7461',
        org: 'AS64501 Example Fiber AS',
        postal: '0150',
        timezone: 'Europe/Oslo',
      })
    )

    expect(response).toMatchObject({
      ip: '203.0.113.20',
      countryCode: 'NO',
      region: 'Oslo',
      postalCode: '0150',
      city: 'Oslo',
      latitude: 59.9127,
      longitude: 10.7461,
      timeZone: 'Europe/Oslo',
      asn: 'AS64501',
      asnOrg: 'Example Fiber AS',
      hostname: 'edge.example.net',
    })
    expect(response.country).toBeUndefined()
  })

  it('parseCoordinates ignores malformed locations', () => {
    expect(parseCoordinates('1.5,-2.25')).toEqual({ latitude: 1.5, longitude: -2.25 })
    expect(parseCoordinates('1.5')).toEqual({})
    expect(parseCoordinates('a,b')).toEqual({})
    expect(parseCoordinates(undefined)).toEqual({})
  })
})

describe('ipapicom', () => {
  const provider = createIpApiComProvider()

  it('builds the endpoint with the field mask', () => {
    expect(provider.endpoint(undefined, undefined)).toBe('http://ip-api.com/json/?fields=66846719')
    expect(provider.endpoint(undefined, '198.51.100.7')).toBe(
      'http://ip-api.com/json/198.51.100.7?fields=66846719'
    )
  })

  it('maps the reply', () => {
    const response = provider.parse(
      JSON.stringify({
        query: '203.0.113.30',
        status: 'success',
        continent: 'North America',
        country: 'Canada',
        countryCode: 'CA',
        region: 'QC',
        regionName: 'Quebec',
        city: 'Montreal',
        zip: '',
        lat: 45.5,
        lon: -73.6,
        timezone: 'America/Toronto',
        org: '',
        as: 'AS64502 Example Telecom',
        asname: 'EXAMPLE-TEL',
        reverse: '',
        proxy: false,
      })
    )

    expect(response).toMatchObject({
      ip: '203.0.113.30',
      continent: 'North America',
      region: 'Quebec',
      regionCode: 'QC',
      asn: 'AS64502',
      asnOrg: 'EXAMPLE-TEL',
      isProxy: false,
    })
    expect(response.postalCode).toBeUndefined()
    expect(response.hostname).toBeUndefined()
  })

  it('turns a failed status into a parse error', () => {
    try {
      provider.parse('{"query":"10.0.0.1","status":"fail","message":"private range"}')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ProviderParseError)
      if (error instanceof ProviderParseError) {
        expect(error.field).toBe('status')
        expect(error.reason).toBe('private range')
      }
    }
  })
})

describe('ipapico', () => {
  const provider = createIpApiCoProvider()

  it('builds the endpoint and overrides the user agent', () => {
    expect(provider.endpoint(undefined, '198.51.100.7')).toBe('https://ipapi.co/198.51.100.7/json')
    expect(provider.authenticate(emptyRequest, undefined).headers).toEqual({ 'User-Agent': 'nil' })
  })

  it('maps the reply', () => {
    const response = provider.parse(
      JSON.stringify({
        ip: '203.0.113.40',
        city: 'Lyon',
        region: 'Auvergne-Rhone-Alpes',
        region_code: 'ARA',
        country_name: 'France',
        country_code: 'FR',
        postal: '69001',
        latitude: 45.76,
        longitude: 4.83,
        timezone: 'Europe/Paris',
        asn: 'AS64503',
        org: 'Example Hosting',
      })
    )

    expect(response).toMatchObject({
      country: 'France',
      countryCode: 'FR',
      region: 'Auvergne-Rhone-Alpes',
      regionCode: 'ARA',
      asn: 'AS64503',
      asnOrg: 'Example Hosting',
    })
  })

  it('turns an error reply into a parse error', () => {
    expect(() => provider.parse('{"ip":"198.51.100.7","error":true,"reason":"RateLimited"}')).toThrow(
      "Could not parse reply from 'ipapico' (field 'error'): RateLimited"
    )
  })
})

describe('ipwhois', () => {
  const provider = createIpWhoIsProvider()

  it('builds the endpoint', () => {
    expect(provider.endpoint(undefined, undefined)).toBe('https://ipwho.is/')
    expect(provider.endpoint(undefined, '198.51.100.7')).toBe('https://ipwho.is/198.51.100.7')
  })

  it('maps nested connection and time zone', () => {
    const response = provider.parse(
      JSON.stringify({
        ip: '203.0.113.50',
        success: true,
        continent: 'Europe',
        country: 'Spain',
        country_code: 'ES',
        connection: { asn: 64504, org: 'Example Cable' },
        timezone: { id: 'Europe/Madrid' },
      })
    )

    expect(response).toMatchObject({
      continent: 'Europe',
      asn: 'AS64504',
      asnOrg: 'Example Cable',
      timeZone: 'Europe/Madrid',
    })
  })

  it('turns success=false into a parse error', () => {
    expect(() => provider.parse('{"ip":"198.51.100.7","success":false,"message":"Reserved range"}')).toThrow(
      ProviderParseError
    )
  })
})

describe('ipbase', () => {
  const provider = createIpBaseProvider()

  it('sends the key as a header', () => {
    expect(provider.endpoint('test-secret', '198.51.100.7')).toBe(
      'https://api.ipbase.com/v2/info?ip=198.51.100.7'
    )
    expect(provider.authenticate(emptyRequest, 'test-secret').headers).toEqual({ apikey: 'test-secret' })
    expect(provider.authenticate(emptyRequest, undefined)).toBe(emptyRequest)
  })

  it('maps the nested data document', () => {
    const response = provider.parse(
      JSON.stringify({
        data: {
          ip: '203.0.113.60',
          hostname: null,
          connection: { asn: 64505, organization: 'Example Transit' },
          location: {
            latitude: 35.68,
            longitude: 139.69,
            zip: '100-0001',
            continent: { name: 'Asia' },
            country: { alpha2: 'JP', name: 'Japan' },
            city: { name: 'Tokyo' },
            region: { alpha2: 'JP-13', name: 'Tokyo' },
          },
          timezone: { id: 'Asia/Tokyo' },
          security: { is_proxy: false, is_vpn: true, is_tor: false },
        },
      })
    )

    expect(response).toMatchObject({
      ip: '203.0.113.60',
      continent: 'Asia',
      country: 'Japan',
      countryCode: 'JP',
      region: 'Tokyo',
      regionCode: 'JP-13',
      postalCode: '100-0001',
      city: 'Tokyo',
      timeZone: 'Asia/Tokyo',
      asn: 'AS64505',
      asnOrg: 'Example Transit',
      isProxy: true,
    })
    expect(response.hostname).toBeUndefined()
  })
})

describe('ipquery', () => {
  const provider = createIpQueryProvider()

  it('builds the endpoint', () => {
    expect(provider.endpoint(undefined, undefined)).toBe('https://api.ipquery.io/?format=json')
    expect(provider.endpoint(undefined, '198.51.100.7')).toBe('https://api.ipquery.io/198.51.100.7?format=json')
  })

  it('maps the reply', () => {
    const response = provider.parse(
      JSON.stringify({
        ip: '203.0.113.70',
        isp: { asn: 'AS64506', org: 'Example Mobile' },
        location: { country: 'Italy', country_code: 'IT', state: 'Lazio', city: 'Rome', timezone: 'Europe/Rome' },
        risk: { is_proxy: false, is_vpn: false, is_tor: false },
      })
    )

    expect(response).toMatchObject({
      country: 'Italy',
      countryCode: 'IT',
      region: 'Lazio',
      city: 'Rome',
      asn: 'AS64506',
      asnOrg: 'Example Mobile',
      isProxy: false,
    })
  })
})

describe('address-only providers', () => {
  it('freeipapi maps its camelCase reply', () => {
    const provider = createFreeIpApiProvider()
    const response = provider.parse(
      JSON.stringify({
        ipAddress: '203.0.113.80',
        countryName: 'Brazil',
        countryCode: 'BR',
        cityName: 'Recife',
        regionName: 'Pernambuco',
        zipCode: '50000-000',
        timeZone: '-03:00',
        continent: 'Americas',
        isProxy: false,
      })
    )

    expect(provider.endpoint(undefined, undefined)).toBe('https://freeipapi.com/api/json')
    expect(provider.supportsTargetLookup()).toBe(false)
    expect(response).toMatchObject({
      ip: '203.0.113.80',
      country: 'Brazil',
      city: 'Recife',
      region: 'Pernambuco',
      postalCode: '50000-000',
      continent: 'Americas',
      isProxy: false,
    })
  })

  it('ipify returns only the address', () => {
    const provider = createIpifyProvider()
    expect(provider.endpoint(undefined, undefined)).toBe('https://api64.ipify.org/?format=json')
    expect(provider.parse('{"ip":"2001:db8::80"}')).toEqual({
      ip: '2001:db8::80',
      provider: { type: 'ipify' },
    })
  })

  it('myipcom maps country and code', () => {
    const provider = createMyIpComProvider()
    expect(provider.endpoint(undefined, undefined)).toBe('https://api.myip.com')
    expect(provider.parse('{"ip":"203.0.113.90","country":"Chile","cc":"CL"}')).toEqual({
      ip: '203.0.113.90',
      country: 'Chile',
      countryCode: 'CL',
      provider: { type: 'myipcom' },
    })
  })
})

describe('mock', () => {
  it('answers with its own address whatever the body', () => {
    const provider = createMockProvider({ ip: '192.0.2.99' })

    expect(provider.endpoint(undefined, '198.51.100.7')).toBe(DEFAULT_MOCK_ENDPOINT)
    expect(provider.supportsTargetLookup()).toBe(true)
    expect(provider.parse('not json at all')).toEqual({
      ip: '192.0.2.99',
      provider: { type: 'mock', ip: '192.0.2.99' },
    })
  })

  it('uses a configured endpoint', () => {
    const provider = createMockProvider({ ip: '192.0.2.99', endpoint: 'http://mock-b.invalid/' })
    expect(provider.endpoint(undefined, undefined)).toBe('http://mock-b.invalid/')
    expect(provider.identity()).toEqual({ type: 'mock', ip: '192.0.2.99', endpoint: 'http://mock-b.invalid/' })
  })
})
