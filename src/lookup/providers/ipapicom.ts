/**
 * ip-api.com lookup provider
 * @module lookup/providers/ipapicom
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { ProviderParseError } from '../lookup-error.js'
import {
  defineProvider,
  parseAddress,
  parseReply,
  present,
  splitAsn,
} from './define-provider.js'

/** Bit mask selecting every field the reply schema reads */
const FIELDS = 66846719

/**
 * Reply of http://ip-api.com/json
 */
export const ipApiComReplySchema = z.object({
  query: z.string(),
  status: z.string().nullish(),
  message: z.string().nullish(),
  continent: z.string().nullish(),
  country: z.string().nullish(),
  countryCode: z.string().nullish(),
  region: z.string().nullish(),
  regionName: z.string().nullish(),
  city: z.string().nullish(),
  zip: z.string().nullish(),
  lat: z.number().nullish(),
  lon: z.number().nullish(),
  timezone: z.string().nullish(),
  org: z.string().nullish(),
  as: z.string().nullish(),
  asname: z.string().nullish(),
  reverse: z.string().nullish(),
  proxy: z.boolean().nullish(),
})

export type IpApiComReply = z.infer<typeof ipApiComReplySchema>

export function createIpApiComProvider(): Provider {
  const identity = standardProvider('ipapicom')

  return defineProvider({
    // The free tier is plain HTTP only
    endpoint: (_apiKey, target) => `http://ip-api.com/json/${target ?? ''}?fields=${FIELDS}`,

    parse: (body) => {
      const reply = parseReply(body, ipApiComReplySchema, identity)
      if (reply.status === 'fail') {
        throw new ProviderParseError(identity, reply.message ?? 'lookup failed', 'status')
      }
      const as = splitAsn(reply.as)
      return createLookupResponse(parseAddress(reply.query, identity), identity, {
        continent: present(reply.continent),
        country: present(reply.country),
        countryCode: present(reply.countryCode),
        region: present(reply.regionName),
        regionCode: present(reply.region),
        postalCode: present(reply.zip) || undefined,
        city: present(reply.city),
        latitude: present(reply.lat),
        longitude: present(reply.lon),
        timeZone: present(reply.timezone),
        asn: as.asn,
        asnOrg: present(reply.org) || present(reply.asname) || as.org,
        hostname: present(reply.reverse) || undefined,
        isProxy: present(reply.proxy),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
