import { describe, expect, it } from 'vitest'
import { InvalidCallError, RangeNotSatisfiableError } from '../src/errors'
import { formatRangeSpec, parseRange, parseRangeSpec, rangeHeader, rangeLength } from '../src/query/range'
import { bytesToUtf8, utf8ToBytes } from '../src/utils/bytes'

const content = utf8ToBytes('0123456789hello')

function read(range: string): string {
  const r = parseRange(range, content.length)
  return bytesToUtf8(content.subarray(r.start, r.end + 1))
}

describe('byte ranges', () => {
  it('reads inclusive bounds', () => {
    expect(read('10-14')).toBe('hello')
    expect(read('bytes=0-0')).toBe('0')
  })

  it('reads open-ended and suffix ranges', () => {
    expect(read('10-')).toBe('hello')
    expect(read('-5')).toBe('hello')
    expect(read('-100')).toBe('0123456789hello')
  })

  it('clamps an end past the object', () => {
    expect(parseRange('10-100', content.length)).toEqual({ start: 10, end: 14 })
  })

  it('refuses ranges the object cannot satisfy', () => {
    expect(() => parseRange('15-', content.length)).toThrow(RangeNotSatisfiableError)
    expect(() => parseRange('5-3', content.length)).toThrow(RangeNotSatisfiableError)
    expect(() => parseRange('-0', content.length)).toThrow(RangeNotSatisfiableError)
    expect(() => parseRange('0-0', 0)).toThrow(RangeNotSatisfiableError)
  })

  it('rejects malformed syntax before looking at the object', () => {
    expect(() => parseRangeSpec('abc')).toThrow(InvalidCallError)
    expect(() => parseRangeSpec('-')).toThrow(InvalidCallError)
    expect(() => parseRangeSpec('1-2-3')).toThrow(InvalidCallError)
  })

  it('formats specs and headers', () => {
    expect(formatRangeSpec(parseRangeSpec('bytes=3-'))).toBe('3-')
    expect(rangeHeader({ start: 10, end: 14 })).toBe('bytes=10-14')
    expect(rangeLength({ start: 10, end: 14 })).toBe(5)
  })
})
