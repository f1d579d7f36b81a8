/**
 * Response Cache
 * TTL disk cache holding the caller's own address and any number of target addresses
 * @module cache/response-cache
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { CacheConfig, ResponseRecord } from './cache-interface.js'
import { DEFAULT_CACHE_CONFIG } from './cache-interface.js'
import type { CachePathDeps } from './cache-path.js'
import { resolveCacheDirectory } from './cache-path.js'
import type { CacheFileJson } from './cache-codec.js'
import { decodeCache, encodeCache } from './cache-codec.js'
import { CacheIoError, CacheSerdeError, CacheUtf8Error } from './cache-error.js'
import { createResponseRecord, isRecordExpired } from './response-record.js'
import { decryptPayload, defaultPassphrase, encryptPayload } from './encryption.js'
import type { Logger } from '../lookup/types.js'
import type { LookupResponse } from '../types/response.js'
import { cloneLookupResponse } from '../types/response.js'
import { canonicalizeIpAddress, requireIpAddress } from '../utils/address.js'
import { createSilentLogger } from '../utils/logger.js'

/**
 * Options for opening or loading a cache
 */
export interface ResponseCacheOptions {
  logger?: Logger

  /** Overrides for the directory resolution, used when `directory` is unset */
  pathDeps?: Partial<CachePathDeps>
}

/**
 * Cache of lookup responses with an independent TTL per address.
 *
 * All mutations are in memory; `save` persists them. Readers always
 * receive copies, never the records the cache owns.
 *
 * @example
 * ```typescript
 * const cache = await ResponseCache.load({ directory: '/tmp/lookups' })
 * if (cache.currentIsExpired()) {
 *   cache.updateCurrent(await lookupWithFallback(providers), 60)
 *   await cache.save()
 * }
 * console.log(cache.currentIp())
 * ```
 */
export class ResponseCache {
  readonly directory: string
  private readonly config: CacheConfig
  private readonly logger: Logger
  private currentAddress: ResponseRecord | null = null
  private readonly lookupAddress = new Map<string, ResponseRecord>()

  constructor(directory: string, config: Partial<CacheConfig> = {}, logger?: Logger) {
    this.directory = directory
    this.config = {
      ...DEFAULT_CACHE_CONFIG,
      ...config,
      encryption: { ...DEFAULT_CACHE_CONFIG.encryption, ...config.encryption },
    }
    this.logger = logger ?? createSilentLogger()
  }

  /**
   * Creates an empty cache bound to the configured (or resolved) directory
   */
  static async open(
    config: Partial<CacheConfig> = {},
    options: ResponseCacheOptions = {}
  ): Promise<ResponseCache> {
    const directory =
      config.directory ??
      (await resolveCacheDirectory({ logger: options.logger, ...options.pathDeps }))
    return new ResponseCache(directory, config, options.logger)
  }

  /**
   * Opens the cache and reads its file
   * @throws CacheError when the file cannot be read, decrypted or decoded
   */
  static async load(
    config: Partial<CacheConfig> = {},
    fileName?: string,
    options: ResponseCacheOptions = {}
  ): Promise<ResponseCache> {
    const cache = await ResponseCache.open(config, options)
    await cache.reload(fileName)
    return cache
  }

  /**
   * Full path of the cache file
   */
  getPath(fileName?: string): string {
    return join(this.directory, fileName ?? this.config.fileName)
  }

  /**
   * Replaces the in-memory content with the file's
   */
  async reload(fileName?: string): Promise<void> {
    const path = this.getPath(fileName)

    let bytes: Buffer
    try {
      bytes = await readFile(path)
    } catch (error) {
      throw new CacheIoError(path, 'read', error)
    }

    if (this.config.encryption.enabled) {
      bytes = decryptPayload(bytes, this.passphrase())
    }

    let text: string
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes)
    } catch (error) {
      throw new CacheUtf8Error(path, error)
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      throw new CacheSerdeError(error instanceof Error ? error.message : String(error), path, error)
    }

    const data = decodeCache(json, path)
    this.currentAddress = data.currentAddress
    this.lookupAddress.clear()
    for (const [ip, record] of data.lookupAddress) {
      this.lookupAddress.set(ip, record)
    }
    this.logger.debug('Cache loaded', { path, targets: this.lookupAddress.size })
  }

  /**
   * Writes the cache file, creating its directory when missing.
   * A plain create+write: concurrent writers are not coordinated.
   */
  async save(fileName?: string): Promise<void> {
    const path = this.getPath(fileName)

    try {
      await mkdir(this.directory, { recursive: true })
    } catch (error) {
      throw new CacheIoError(this.directory, 'mkdir', error)
    }

    let bytes: Buffer = Buffer.from(JSON.stringify(this.toJSON()), 'utf8')
    if (this.config.encryption.enabled) {
      bytes = encryptPayload(bytes, this.passphrase())
    }

    try {
      await writeFile(path, bytes)
    } catch (error) {
      throw new CacheIoError(path, 'write', error)
    }
    this.logger.debug('Cache saved', { path, encrypted: this.config.encryption.enabled })
  }

  /**
   * Removes the cache file and empties the in-memory cache
   */
  async delete(fileName?: string): Promise<void> {
    const path = this.getPath(fileName)
    try {
      await rm(path)
    } catch (error) {
      throw new CacheIoError(path, 'delete', error)
    }
    this.clear()
  }

  updateCurrent(response: LookupResponse, ttl: number | null): void {
    this.currentAddress = createResponseRecord(response, ttl)
  }

  updateTarget(ip: string, response: LookupResponse, ttl: number | null): void {
    this.lookupAddress.set(requireIpAddress(ip), createResponseRecord(response, ttl))
  }

  /**
   * True when there is no current record or its TTL has elapsed
   */
  currentIsExpired(): boolean {
    return this.currentAddress === null || isRecordExpired(this.currentAddress)
  }

  /**
   * True when there is no record for `ip` or its TTL has elapsed
   */
  targetIsExpired(ip: string): boolean {
    const record = this.lookupAddress.get(canonicalizeIpAddress(ip))
    return record === undefined || isRecordExpired(record)
  }

  getCurrent(): LookupResponse | undefined {
    return this.currentAddress ? cloneLookupResponse(this.currentAddress.response) : undefined
  }

  getTarget(ip: string): LookupResponse | undefined {
    const record = this.lookupAddress.get(canonicalizeIpAddress(ip))
    return record ? cloneLookupResponse(record.response) : undefined
  }

  currentIp(): string | undefined {
    return this.currentAddress?.response.ip
  }

  targetIp(ip: string): string | undefined {
    return this.lookupAddress.get(canonicalizeIpAddress(ip))?.response.ip
  }

  /**
   * Cached target addresses in insertion order
   */
  targets(): string[] {
    return [...this.lookupAddress.keys()]
  }

  /**
   * Drops every record, in memory only
   */
  clear(): void {
    this.currentAddress = null
    this.lookupAddress.clear()
  }

  clearCurrent(): void {
    this.currentAddress = null
  }

  clearTarget(ip: string): boolean {
    return this.lookupAddress.delete(canonicalizeIpAddress(ip))
  }

  /**
   * Persisted form of the cache
   */
  toJSON(): CacheFileJson {
    return encodeCache({
      currentAddress: this.currentAddress,
      lookupAddress: this.lookupAddress,
    })
  }

  private passphrase(): string {
    return this.config.encryption.passphrase ?? defaultPassphrase()
  }
}
