/**
 * ipwho.is lookup provider
 * @module lookup/providers/ipwhois
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { ProviderParseError } from '../lookup-error.js'
import { defineProvider, parseAddress, parseReply, present } from './define-provider.js'

/**
 * Reply of https://ipwho.is/
 */
export const ipWhoIsReplySchema = z.object({
  ip: z.string(),
  success: z.boolean().nullish(),
  message: z.string().nullish(),
  continent: z.string().nullish(),
  region: z.string().nullish(),
  region_code: z.string().nullish(),
  country: z.string().nullish(),
  country_code: z.string().nullish(),
  city: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  postal: z.string().nullish(),
  connection: z
    .object({
      asn: z.number().nullish(),
      org: z.string().nullish(),
      isp: z.string().nullish(),
      domain: z.string().nullish(),
    })
    .nullish(),
  timezone: z.object({ id: z.string().nullish() }).nullish(),
})

export type IpWhoIsReply = z.infer<typeof ipWhoIsReplySchema>

export function createIpWhoIsProvider(): Provider {
  const identity = standardProvider('ipwhois')

  return defineProvider({
    endpoint: (_apiKey, target) => `https://ipwho.is/${target ?? ''}`,

    parse: (body) => {
      const reply = parseReply(body, ipWhoIsReplySchema, identity)
      if (reply.success === false) {
        throw new ProviderParseError(identity, reply.message ?? 'lookup failed', 'success')
      }
      const asn = reply.connection?.asn
      return createLookupResponse(parseAddress(reply.ip, identity), identity, {
        continent: present(reply.continent),
        country: present(reply.country),
        countryCode: present(reply.country_code),
        region: present(reply.region),
        regionCode: present(reply.region_code),
        postalCode: present(reply.postal),
        city: present(reply.city),
        latitude: present(reply.latitude),
        longitude: present(reply.longitude),
        timeZone: present(reply.timezone?.id),
        asn: asn === null || asn === undefined ? undefined : `AS${asn}`,
        asnOrg: present(reply.connection?.org),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
