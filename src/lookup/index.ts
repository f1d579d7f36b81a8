/**
 * Provider lookups: contract, transport, registry, service and fallback
 * @module lookup
 */

export type {
  Logger,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  Provider,
  ProviderDefinition,
  ProviderEntry,
  LookupOptions,
  BulkLookupEntry,
} from './types.js'

export type { LookupErrorType, ProviderFailure } from './lookup-error.js'
export {
  LookupError,
  TransportError,
  TooManyRequestsError,
  RequestStatusError,
  ProviderParseError,
  TargetNotSupportedError,
  ProviderNotFoundError,
  NoProvidersError,
  InvalidAddressError,
  AllProvidersFailedError,
  isLookupError,
  isConfigurationError,
  toLookupError,
} from './lookup-error.js'

export type { TransportConfig } from './transport.js'
export {
  FetchTransport,
  DEFAULT_TRANSPORT_CONFIG,
  createDefaultTransport,
  handleResponse,
} from './transport.js'

export type {
  MockReply,
  MockTransport,
  MockTransportCall,
  MockTransportConfig,
} from './mock-transport.js'
export {
  DEFAULT_MOCK_TRANSPORT_CONFIG,
  createMockTransport,
  createStatusTransport,
  createFailingTransport,
} from './mock-transport.js'

export type { ParsedProvider } from './registry.js'
export { buildProvider, parseProvider, parseProviderWithParams } from './registry.js'
export { LookupService } from './lookup-service.js'
export { lookupWithFallback } from './fallback.js'
export * from './providers/index.js'
