/**
 * ipify.org lookup provider (address only)
 * @module lookup/providers/ipify
 */

import { z } from 'zod'
import type { Provider } from '../types.js'
import { standardProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { defineProvider, parseAddress, parseReply } from './define-provider.js'

export const ipifyReplySchema = z.object({ ip: z.string() })

export function createIpifyProvider(): Provider {
  const identity = standardProvider('ipify')

  return defineProvider({
    endpoint: () => 'https://api64.ipify.org/?format=json',
    parse: (body) => {
      const reply = parseReply(body, ipifyReplySchema, identity)
      return createLookupResponse(parseAddress(reply.ip, identity), identity)
    },
    identity: () => identity,
  })
}
