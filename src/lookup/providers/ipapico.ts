/**
 * ipapi.co lookup provider
 * @module lookup/providers/ipapico
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { ProviderParseError } from '../lookup-error.js'
import { defineProvider, parseAddress, parseReply, present } from './define-provider.js'

/**
 * Reply of https://ipapi.co/json
 */
export const ipApiCoReplySchema = z.object({
  ip: z.string(),
  error: z.boolean().nullish(),
  reason: z.string().nullish(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  region_code: z.string().nullish(),
  country_name: z.string().nullish(),
  country_code: z.string().nullish(),
  continent_code: z.string().nullish(),
  postal: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  timezone: z.string().nullish(),
  asn: z.string().nullish(),
  org: z.string().nullish(),
  hostname: z.string().nullish(),
})

export type IpApiCoReply = z.infer<typeof ipApiCoReplySchema>

export function createIpApiCoProvider(): Provider {
  const identity = standardProvider('ipapico')

  return defineProvider({
    endpoint: (_apiKey, target) =>
      target ? `https://ipapi.co/${target}/json` : 'https://ipapi.co/json',

    // ipapi.co rejects requests carrying a library user agent
    authenticate: (request) => ({
      ...request,
      headers: { ...request.headers, 'User-Agent': 'nil' },
    }),

    parse: (body) => {
      const reply = parseReply(body, ipApiCoReplySchema, identity)
      if (reply.error) {
        throw new ProviderParseError(identity, reply.reason ?? 'lookup failed', 'error')
      }
      return createLookupResponse(parseAddress(reply.ip, identity), identity, {
        country: present(reply.country_name),
        countryCode: present(reply.country_code),
        region: present(reply.region),
        regionCode: present(reply.region_code),
        postalCode: present(reply.postal),
        city: present(reply.city),
        latitude: present(reply.latitude),
        longitude: present(reply.longitude),
        timeZone: present(reply.timezone),
        asn: present(reply.asn),
        asnOrg: present(reply.org),
        hostname: present(reply.hostname),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
