/**
 * ipinfo.io lookup provider
 * @module lookup/providers/ipinfo
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import {
  defineProvider,
  parseAddress,
  parseReply,
  present,
  splitAsn,
} from './define-provider.js'

/**
 * Reply of https://ipinfo.io/json
 */
export const ipInfoReplySchema = z.object({
  ip: z.string(),
  hostname: z.string().nullish(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  country: z.string().nullish(),
  loc: z.string().nullish(),
  org: z.string().nullish(),
  postal: z.string().nullish(),
  timezone: z.string().nullish(),
})

export type IpInfoReply = z.infer<typeof ipInfoReplySchema>

/**
 * Parses the `"lat,lon"` location string
 */
export function parseCoordinates(
  loc: string | null | undefined
): { latitude?: number; longitude?: number } {
  const parts = loc?.split(',') ?? []
  if (parts.length !== 2) {
    return {}
  }
  const latitude = Number.parseFloat(parts[0])
  const longitude = Number.parseFloat(parts[1])
  if (Number.isNaN(latitude) || Number.isNaN(longitude)) {
    return {}
  }
  return { latitude, longitude }
}

export function createIpInfoProvider(): Provider {
  const identity = standardProvider('ipinfo')

  return defineProvider({
    endpoint: (apiKey, target) => {
      const path = target ? `${target}/json` : 'json'
      const query = apiKey ? `?token=${encodeURIComponent(apiKey)}` : ''
      return `https://ipinfo.io/${path}${query}`
    },

    parse: (body) => {
      const reply = parseReply(body, ipInfoReplySchema, identity)
      const { asn, org } = splitAsn(reply.org)
      return createLookupResponse(parseAddress(reply.ip, identity), identity, {
        countryCode: present(reply.country),
        region: present(reply.region),
        postalCode: present(reply.postal),
        city: present(reply.city),
        ...parseCoordinates(reply.loc),
        timeZone: present(reply.timezone),
        asn,
        asnOrg: org,
        hostname: present(reply.hostname),
      })
    },

    identity: () => identity,

    supportsTargetLookup: () => true,
  })
}
