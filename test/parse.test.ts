import { describe, expect, it } from 'vitest'
import { InvalidCallError } from '../src/errors'
import { PENDING_HEIGHT, heightToWire, parseHeight } from '../src/query/height'
import {
  formatTokenAmount,
  parseBroadcastMode,
  parseCount,
  parseMetadata,
  parseMetadataUpdate,
  parseTokenAmount,
  parseUint
} from '../src/utils/parse'

describe('token amounts', () => {
  it('parses whole-token decimals into atto units', () => {
    expect(parseTokenAmount('1.5')).toBe(1_500_000_000_000_000_000n)
    expect(parseTokenAmount('0.000000000000000001')).toBe(1n)
    expect(parseTokenAmount('2')).toBe(2_000_000_000_000_000_000n)
    expect(parseTokenAmount('.5')).toBe(500_000_000_000_000_000n)
    expect(parseTokenAmount(' 3. ')).toBe(3_000_000_000_000_000_000n)
  })

  it('rejects signs, junk and more than 18 decimals', () => {
    expect(() => parseTokenAmount('-1')).toThrow(InvalidCallError)
    expect(() => parseTokenAmount('1e18')).toThrow(InvalidCallError)
    expect(() => parseTokenAmount('.')).toThrow(InvalidCallError)
    expect(() => parseTokenAmount('0.0000000000000000001')).toThrow(/more than 18/)
  })

  it('formats atto units without trailing zeros', () => {
    expect(formatTokenAmount(1_500_000_000_000_000_000n)).toBe('1.5')
    expect(formatTokenAmount(0n)).toBe('0')
    expect(formatTokenAmount(1n)).toBe('0.000000000000000001')
    expect(formatTokenAmount(-2_000_000_000_000_000_000n)).toBe('-2')
  })
})

describe('flags', () => {
  it('parses broadcast modes case-insensitively', () => {
    expect(parseBroadcastMode('SYNC')).toBe('sync')
    expect(() => parseBroadcastMode('fast')).toThrow(/expected async, sync, commit/)
  })

  it('parses metadata pairs, keeping later = signs in the value', () => {
    expect(parseMetadata(['a=b=c', 'content-type=text/plain'])).toEqual({ a: 'b=c', 'content-type': 'text/plain' })
    expect(() => parseMetadata(['=x'])).toThrow(InvalidCallError)
    expect(() => parseMetadata(['novalue'])).toThrow(InvalidCallError)
  })

  it('treats bare keys and empty values as removals in updates', () => {
    expect(parseMetadataUpdate(['a=1', 'b', 'c='])).toEqual({ a: '1', b: null, c: null })
  })

  it('parses non-negative integers', () => {
    expect(parseUint(' 12 ', 'ttl')).toBe(12n)
    expect(() => parseUint('-1', 'ttl')).toThrow(/invalid ttl/)
    expect(parseCount('25', 'limit')).toBe(25)
    expect(() => parseCount('9007199254740992', 'limit')).toThrow(/too large/)
  })
})

describe('heights', () => {
  it('parses selectors and block numbers', () => {
    expect(parseHeight('pending')).toBe('pending')
    expect(parseHeight('Committed')).toBe('committed')
    expect(parseHeight('42')).toBe(42n)
    expect(() => parseHeight('latest')).toThrow(InvalidCallError)
  })

  it('maps selectors to wire values', () => {
    expect(heightToWire('committed')).toBe(0n)
    expect(heightToWire('pending')).toBe(PENDING_HEIGHT)
    expect(PENDING_HEIGHT).toBe(9_223_372_036_854_775_807n)
    expect(heightToWire(7n)).toBe(7n)
  })
})
