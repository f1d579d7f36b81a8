/**
 * Cache file JSON codec
 * @module cache/cache-codec
 */

import { z } from 'zod'
import type { ResponseCacheData, ResponseRecord } from './cache-interface.js'
import type { LookupProvider } from '../types/provider.js'
import { PROVIDER_NAMES, mockProvider, standardProvider } from '../types/provider.js'
import type { LookupResponse } from '../types/response.js'
import { CacheSerdeError } from './cache-error.js'
import { canonicalizeIpAddress, isValidIpAddress } from '../utils/address.js'

const optionalString = z.string().nullish().transform((value) => value ?? undefined)
const optionalNumber = z.number().nullish().transform((value) => value ?? undefined)
const optionalBoolean = z.boolean().nullish().transform((value) => value ?? undefined)

const providerSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.enum(PROVIDER_NAMES) }),
    z.object({ type: z.literal('mock'), ip: z.string(), endpoint: z.string().optional() }),
  ])
  .transform((provider): LookupProvider =>
    provider.type === 'mock'
      ? mockProvider(provider.ip, provider.endpoint)
      : standardProvider(provider.type)
  )

const responseSchema = z
  .object({
    ip: z.string().refine(isValidIpAddress, { message: 'not an IP address' }),
    continent: optionalString,
    country: optionalString,
    country_code: optionalString,
    region: optionalString,
    region_code: optionalString,
    postal_code: optionalString,
    city: optionalString,
    latitude: optionalNumber,
    longitude: optionalNumber,
    time_zone: optionalString,
    asn: optionalString,
    asn_org: optionalString,
    hostname: optionalString,
    is_proxy: optionalBoolean,
    provider: providerSchema,
  })
  .transform(
    (json): LookupResponse => ({
      ip: json.ip,
      continent: json.continent,
      country: json.country,
      countryCode: json.country_code,
      region: json.region,
      regionCode: json.region_code,
      postalCode: json.postal_code,
      city: json.city,
      latitude: json.latitude,
      longitude: json.longitude,
      timeZone: json.time_zone,
      asn: json.asn,
      asnOrg: json.asn_org,
      hostname: json.hostname,
      isProxy: json.is_proxy,
      provider: json.provider,
    })
  )

const recordSchema = z
  .object({
    response: responseSchema,
    response_time: z.string().datetime({ offset: true }),
    ttl: z.number().int().nonnegative().nullable(),
  })
  .transform(
    (json): ResponseRecord => ({
      response: json.response,
      responseTime: new Date(json.response_time),
      ttl: json.ttl,
    })
  )

/**
 * Schema of the persisted cache document
 */
export const cacheFileSchema = z
  .object({
    current_address: recordSchema.nullish(),
    lookup_address: z.record(z.string(), recordSchema).default({}),
  })
  .transform(
    (json): ResponseCacheData => ({
      currentAddress: json.current_address ?? null,
      lookupAddress: new Map(
        Object.entries(json.lookup_address).map(
          ([ip, record]): [string, ResponseRecord] => [canonicalizeIpAddress(ip), record]
        )
      ),
    })
  )

/**
 * Persisted form of a response: snake_case keys, absent fields as null
 */
export interface LookupResponseJson {
  ip: string
  continent: string | null
  country: string | null
  country_code: string | null
  region: string | null
  region_code: string | null
  postal_code: string | null
  city: string | null
  latitude: number | null
  longitude: number | null
  time_zone: string | null
  asn: string | null
  asn_org: string | null
  hostname: string | null
  is_proxy: boolean | null
  provider: LookupProvider
}

export interface ResponseRecordJson {
  response: LookupResponseJson
  response_time: string
  ttl: number | null
}

export interface CacheFileJson {
  current_address: ResponseRecordJson | null
  lookup_address: Record<string, ResponseRecordJson>
}

export function encodeResponse(response: LookupResponse): LookupResponseJson {
  return {
    ip: response.ip,
    continent: response.continent ?? null,
    country: response.country ?? null,
    country_code: response.countryCode ?? null,
    region: response.region ?? null,
    region_code: response.regionCode ?? null,
    postal_code: response.postalCode ?? null,
    city: response.city ?? null,
    latitude: response.latitude ?? null,
    longitude: response.longitude ?? null,
    time_zone: response.timeZone ?? null,
    asn: response.asn ?? null,
    asn_org: response.asnOrg ?? null,
    hostname: response.hostname ?? null,
    is_proxy: response.isProxy ?? null,
    provider: response.provider,
  }
}

export function encodeRecord(record: ResponseRecord): ResponseRecordJson {
  return {
    response: encodeResponse(record.response),
    response_time: record.responseTime.toISOString(),
    ttl: record.ttl,
  }
}

/**
 * Converts the in-memory cache to its persisted document
 */
export function encodeCache(data: ResponseCacheData): CacheFileJson {
  const lookupAddress: Record<string, ResponseRecordJson> = {}
  for (const [ip, record] of data.lookupAddress) {
    lookupAddress[ip] = encodeRecord(record)
  }
  return {
    current_address: data.currentAddress ? encodeRecord(data.currentAddress) : null,
    lookup_address: lookupAddress,
  }
}

/**
 * Validates a parsed document and converts it to the in-memory cache
 * @throws CacheSerdeError when the document does not have the cache shape
 */
export function decodeCache(json: unknown, path?: string): ResponseCacheData {
  const result = cacheFileSchema.safeParse(json)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : ''
    throw new CacheSerdeError(`${issue?.message ?? 'unexpected shape'}${where}`, path, result.error)
  }
  return result.data
}
