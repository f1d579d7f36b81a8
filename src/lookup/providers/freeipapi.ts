/**
 * freeipapi.com lookup provider
 * @module lookup/providers/freeipapi
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { defineProvider, parseAddress, parseReply, present } from './define-provider.js'

/**
 * Reply of https://freeipapi.com/api/json
 */
export const freeIpApiReplySchema = z.object({
  ipAddress: z.string(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  countryName: z.string().nullish(),
  countryCode: z.string().nullish(),
  timeZone: z.string().nullish(),
  zipCode: z.string().nullish(),
  cityName: z.string().nullish(),
  regionName: z.string().nullish(),
  continent: z.string().nullish(),
  isProxy: z.boolean().nullish(),
})

export type FreeIpApiReply = z.infer<typeof freeIpApiReplySchema>

export function createFreeIpApiProvider(): Provider {
  const identity = standardProvider('freeipapi')

  return defineProvider({
    endpoint: () => 'https://freeipapi.com/api/json',

    parse: (body) => {
      const reply = parseReply(body, freeIpApiReplySchema, identity)
      return createLookupResponse(parseAddress(reply.ipAddress, identity), identity, {
        continent: present(reply.continent),
        country: present(reply.countryName),
        countryCode: present(reply.countryCode),
        region: present(reply.regionName),
        postalCode: present(reply.zipCode),
        city: present(reply.cityName),
        latitude: present(reply.latitude),
        longitude: present(reply.longitude),
        timeZone: present(reply.timeZone),
        isProxy: present(reply.isProxy),
      })
    },

    identity: () => identity,
  })
}
