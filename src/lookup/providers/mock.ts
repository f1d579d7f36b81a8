/**
 * Mock lookup provider for tests
 * @module lookup/providers/mock
 */

import type { Provider } from '../types.js'
import type { MockLookupProvider } from '../../types/provider.js'
import { mockProvider } from '../../types/provider.js'
import { createLookupResponse } from '../../types/response.js'
import { defineProvider } from './define-provider.js'

/**
 * Endpoint used when the identifier names none; only a test transport answers it
 */
export const DEFAULT_MOCK_ENDPOINT = 'http://mock.invalid/'

/**
 * Provider that goes through the full request path but ignores the body,
 * answering with the address carried by its identifier.
 */
export function createMockProvider(config: Omit<MockLookupProvider, 'type'>): Provider {
  const identity = mockProvider(config.ip, config.endpoint)

  return defineProvider({
    endpoint: () => identity.endpoint ?? DEFAULT_MOCK_ENDPOINT,
    parse: () => createLookupResponse(identity.ip, identity),
    identity: () => identity,
    supportsTargetLookup: () => true,
  })
}
