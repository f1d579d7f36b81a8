/**
 * Concrete provider adapters
 * @module lookup/providers
 */

export { defineProvider, parseReply, parseAddress, present, splitAsn, anyFlag } from './define-provider.js'
export { createFreeIpApiProvider } from './freeipapi.js'
export { createIfConfigProvider } from './ifconfig.js'
export { createIpInfoProvider, parseCoordinates } from './ipinfo.js'
export { createMyIpComProvider } from './myipcom.js'
export { createIpApiComProvider } from './ipapicom.js'
export { createIpWhoIsProvider } from './ipwhois.js'
export { createIpApiCoProvider } from './ipapico.js'
export { createIpBaseProvider } from './ipbase.js'
export { createIpQueryProvider } from './ipquery.js'
export { createIpifyProvider } from './ipify.js'
export { createMockProvider, DEFAULT_MOCK_ENDPOINT } from './mock.js'
