export type {
  ProviderName,
  StandardLookupProvider,
  MockLookupProvider,
  LookupProvider,
  Parameters,
} from './provider.js'

export {
  PROVIDER_NAMES,
  isProviderName,
  standardProvider,
  mockProvider,
  createParameters,
  providerToString,
  isSameProvider,
} from './provider.js'

export type { LookupResponse, LookupResponseFields } from './response.js'

export {
  createLookupResponse,
  cloneLookupResponse,
  formatLookupResponse,
} from './response.js'
