/**
 * ipbase.com lookup provider
 * @module lookup/providers/ipbase
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { anyFlag, defineProvider, parseAddress, parseReply, present } from './define-provider.js'

const namedCode = z.object({ alpha2: z.string().nullish(), name: z.string().nullish() }).nullish()

/**
 * Reply of https://api.ipbase.com/v2/info
 */
export const ipBaseReplySchema = z.object({
  data: z.object({
    ip: z.string(),
    hostname: z.string().nullish(),
    connection: z
      .object({
        asn: z.number().nullish(),
        organization: z.string().nullish(),
        isp: z.string().nullish(),
      })
      .nullish(),
    location: z
      .object({
        latitude: z.number().nullish(),
        longitude: z.number().nullish(),
        zip: z.string().nullish(),
        continent: z.object({ name: z.string().nullish() }).nullish(),
        country: namedCode,
        city: z.object({ name: z.string().nullish() }).nullish(),
        region: namedCode,
      })
      .nullish(),
    timezone: z.object({ id: z.string().nullish() }).nullish(),
    security: z
      .object({
        is_proxy: z.boolean().nullish(),
        is_vpn: z.boolean().nullish(),
        is_tor: z.boolean().nullish(),
      })
      .nullish(),
  }),
})

export type IpBaseReply = z.infer<typeof ipBaseReplySchema>

export function createIpBaseProvider(): Provider {
  const identity = standardProvider('ipbase')

  return defineProvider({
    endpoint: (_apiKey, target) =>
      target
        ? `https://api.ipbase.com/v2/info?ip=${target}`
        : 'https://api.ipbase.com/v2/info',

    authenticate: (request, apiKey) =>
      apiKey ? { ...request, headers: { ...request.headers, apikey: apiKey } } : request,

    parse: (body) => {
      const { data } = parseReply(body, ipBaseReplySchema, identity)
      const location = data.location
      const asn = data.connection?.asn
      return createLookupResponse(parseAddress(data.ip, identity), identity, {
        continent: present(location?.continent?.name),
        country: present(location?.country?.name),
        countryCode: present(location?.country?.alpha2),
        region: present(location?.region?.name),
        regionCode: present(location?.region?.alpha2),
        postalCode: present(location?.zip),
        city: present(location?.city?.name),
        latitude: present(location?.latitude),
        longitude: present(location?.longitude),
        timeZone: present(data.timezone?.id),
        asn: asn === null || asn === undefined ? undefined : `AS${asn}`,
        asnOrg: present(data.connection?.organization),
        hostname: present(data.hostname),
        isProxy: anyFlag(data.security?.is_proxy, data.security?.is_vpn, data.security?.is_tor),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
