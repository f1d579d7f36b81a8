/**
 * myip.com lookup provider
 * @module lookup/providers/myipcom
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { defineProvider, parseAddress, parseReply, present } from './define-provider.js'

export const myIpComReplySchema = z.object({
  ip: z.string(),
  country: z.string().nullish(),
  cc: z.string().nullish(),
})

export function createMyIpComProvider(): Provider {
  const identity = standardProvider('myipcom')

  return defineProvider({
    endpoint: () => 'https://api.myip.com',
    parse: (body) => {
      const reply = parseReply(body, myIpComReplySchema, identity)
      return createLookupResponse(parseAddress(reply.ip, identity), identity, {
        country: present(reply.country),
        countryCode: present(reply.cc),
      })
    },
    identity: () => identity,
  })
}
