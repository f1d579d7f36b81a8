/**
 * ipquery.io lookup provider
 * @module lookup/providers/ipquery
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { anyFlag, defineProvider, parseAddress, parseReply, present } from './define-provider.js'

/**
 * Reply of https://api.ipquery.io/?format=json
 */
export const ipQueryReplySchema = z.object({
  ip: z.string(),
  isp: z
    .object({
      asn: z.string().nullish(),
      org: z.string().nullish(),
      isp: z.string().nullish(),
    })
    .nullish(),
  location: z
    .object({
      country: z.string().nullish(),
      country_code: z.string().nullish(),
      city: z.string().nullish(),
      state: z.string().nullish(),
      zipcode: z.string().nullish(),
      latitude: z.number().nullish(),
      longitude: z.number().nullish(),
      timezone: z.string().nullish(),
    })
    .nullish(),
  risk: z
    .object({
      is_mobile: z.boolean().nullish(),
      is_vpn: z.boolean().nullish(),
      is_tor: z.boolean().nullish(),
      is_proxy: z.boolean().nullish(),
      is_datacenter: z.boolean().nullish(),
    })
    .nullish(),
})

export type IpQueryReply = z.infer<typeof ipQueryReplySchema>

export function createIpQueryProvider(): Provider {
  const identity = standardProvider('ipquery')

  return defineProvider({
    endpoint: (_apiKey, target) => `https://api.ipquery.io/${target ?? ''}?format=json`,

    parse: (body) => {
      const reply = parseReply(body, ipQueryReplySchema, identity)
      const location = reply.location
      return createLookupResponse(parseAddress(reply.ip, identity), identity, {
        country: present(location?.country),
        countryCode: present(location?.country_code),
        region: present(location?.state),
        postalCode: present(location?.zipcode),
        city: present(location?.city),
        latitude: present(location?.latitude),
        longitude: present(location?.longitude),
        timeZone: present(location?.timezone),
        asn: present(reply.isp?.asn),
        asnOrg: present(reply.isp?.org),
        isProxy: anyFlag(reply.risk?.is_proxy, reply.risk?.is_vpn, reply.risk?.is_tor),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
