/**
 * ifconfig.co lookup provider
 * @module lookup/providers/ifconfig
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { defineProvider, parseAddress, parseReply, present } from './define-provider.js'

/**
 * Reply of https://ifconfig.co/json
 */
export const ifConfigReplySchema = z.object({
  ip: z.string(),
  country: z.string().nullish(),
  country_iso: z.string().nullish(),
  country_eu: z.boolean().nullish(),
  region_name: z.string().nullish(),
  region_code: z.string().nullish(),
  zip_code: z.string().nullish(),
  city: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  time_zone: z.string().nullish(),
  asn: z.string().nullish(),
  asn_org: z.string().nullish(),
  hostname: z.string().nullish(),
})

export type IfConfigReply = z.infer<typeof ifConfigReplySchema>

export function createIfConfigProvider(): Provider {
  const identity = standardProvider('ifconfig')

  return defineProvider({
    endpoint: (_apiKey, target) =>
      target ? `https://ifconfig.co/json?ip=${target}` : 'https://ifconfig.co/json',

    parse: (body) => {
      const reply = parseReply(body, ifConfigReplySchema, identity)
      return createLookupResponse(parseAddress(reply.ip, identity), identity, {
        continent: reply.country_eu ? 'Europe' : undefined,
        country: present(reply.country),
        countryCode: present(reply.country_iso),
        region: present(reply.region_name),
        regionCode: present(reply.region_code),
        postalCode: present(reply.zip_code),
        city: present(reply.city),
        latitude: present(reply.latitude),
        longitude: present(reply.longitude),
        timeZone: present(reply.time_zone),
        asn: present(reply.asn),
        asnOrg: present(reply.asn_org),
        hostname: present(reply.hostname),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
