import { describe, expect, it } from 'vitest'
import { InvalidCallError } from '../src/errors'
import { MAX_LIST_LIMIT, listKeys, normalizeListQuery } from '../src/query/listing'

const entries = (keys: string[]) => keys.map((key, i) => ({ key, value: i }))
const keysOf = (l: { objects: Array<{ key: string }> }) => l.objects.map((o) => o.key)

describe('listKeys', () => {
  const bucket = entries(['my/object', 'my/data', 'my/object/key', 'top'])

  it('groups keys under the first delimiter after the prefix', () => {
    const root = listKeys(bucket, { prefix: '', delimiter: '/' })
    expect(keysOf(root)).toEqual(['top'])
    expect(root.commonPrefixes).toEqual(['my/'])

    const my = listKeys(bucket, { prefix: 'my/', delimiter: '/' })
    expect(keysOf(my)).toEqual(['my/data', 'my/object'])
    expect(my.commonPrefixes).toEqual(['my/object/'])
  })

  it('lists every key under the prefix without a delimiter', () => {
    const all = listKeys(bucket, { prefix: 'my/', delimiter: '' })
    expect(keysOf(all)).toEqual(['my/data', 'my/object', 'my/object/key'])
    expect(all.commonPrefixes).toEqual([])
  })

  it('orders keys by their UTF-8 bytes', () => {
    expect(keysOf(listKeys(entries(['b', 'é', 'a', 'B'])))).toEqual(['B', 'a', 'b', 'é'])
  })

  it('keeps the value attached to each key', () => {
    const listed = listKeys(bucket, { prefix: 'my/data' })
    expect(listed.objects).toEqual([{ key: 'my/data', value: 1 }])
  })

  it('slices listed objects by offset and limit', () => {
    const abcd = entries(['d', 'c', 'b', 'a'])
    expect(keysOf(listKeys(abcd, { offset: 1, limit: 2 }))).toEqual(['b', 'c'])
    expect(keysOf(listKeys(abcd, { offset: 3 }))).toEqual(['d'])
    expect(keysOf(listKeys(abcd, { offset: 9 }))).toEqual([])
  })

  it('supports multi-character delimiters', () => {
    const listed = listKeys(entries(['a::b', 'a::c', 'a']), { delimiter: '::' })
    expect(keysOf(listed)).toEqual(['a'])
    expect(listed.commonPrefixes).toEqual(['a::'])
  })
})

describe('normalizeListQuery', () => {
  it('applies defaults and caps the limit', () => {
    expect(normalizeListQuery()).toEqual({ prefix: '', delimiter: '/', offset: 0, limit: MAX_LIST_LIMIT })
    expect(normalizeListQuery({ limit: 5000 }).limit).toBe(MAX_LIST_LIMIT)
  })

  it('rejects negative or fractional bounds', () => {
    expect(() => normalizeListQuery({ offset: -1 })).toThrow(InvalidCallError)
    expect(() => normalizeListQuery({ limit: 1.5 })).toThrow(InvalidCallError)
  })
})
