import { describe, it, expect } from 'vitest'
import { createResponseRecord, isRecordExpired } from './response-record.js'
import { createLookupResponse } from '../types/response.js'
import { mockProvider } from '../types/provider.js'
import { InvalidParameterError } from '../utils/errors.js'

const response = createLookupResponse('1.1.1.1', mockProvider('1.1.1.1'))
const storedAt = new Date('2024-05-01T12:00:00.000Z')

describe('createResponseRecord', () => {
  it('stamps the record and copies the response', () => {
    const record = createResponseRecord(response, 30, storedAt)

    expect(record.responseTime.toISOString()).toBe('2024-05-01T12:00:00.000Z')
    expect(record.ttl).toBe(30)
    expect(record.response).toEqual(response)
    expect(record.response).not.toBe(response)
  })

  it('rejects a negative ttl', () => {
    expect(() => createResponseRecord(response, -1)).toThrow(InvalidParameterError)
  })
})

describe('isRecordExpired', () => {
  it('never expires without a ttl', () => {
    const record = createResponseRecord(response, null, storedAt)
    expect(isRecordExpired(record, storedAt.getTime() + 10 * 365 * 24 * 3600 * 1000)).toBe(false)
  })

  it('expires once ttl seconds have elapsed', () => {
    const record = createResponseRecord(response, 2, storedAt)
    expect(isRecordExpired(record, storedAt.getTime() + 1999)).toBe(false)
    expect(isRecordExpired(record, storedAt.getTime() + 2000)).toBe(true)
  })

  it('treats ttl 0 as expired immediately', () => {
    const record = createResponseRecord(response, 0, storedAt)
    expect(isRecordExpired(record, storedAt.getTime())).toBe(true)
  })

  it('counts a clock that went backwards as no time elapsed', () => {
    const record = createResponseRecord(response, 5, storedAt)
    expect(isRecordExpired(record, storedAt.getTime() - 60_000)).toBe(false)
  })
})
