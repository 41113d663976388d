import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  DecodeError,
  InvalidCallError,
  InvalidKeyError,
  NetworkError,
  NotFoundError,
  RangeNotSatisfiableError,
  TransactionRejectedError
} from '../src/errors'
import type { Bucket } from '../src/machine'
import { MAX_LIST_LIMIT } from '../src/query/listing'
import { bytesToHex, bytesToUtf8, utf8ToBytes } from '../src/utils/bytes'
import { blake3 } from '../src/utils/hash'
import { DEFAULT_TTL } from './helpers/fakeNode'
import { startHarness, type Harness } from './helpers/harness'
import { metadataHashOf } from './helpers/objectServer'

const CONTENT = utf8ToBytes('0123456789hello')

describe('Bucket', () => {
  let h: Harness
  let bucket: Bucket

  beforeEach(async () => {
    h = await startHarness()
    bucket = (await h.client.createBucket(h.alice)).bucket
  })
  afterEach(async () => {
    await h.close()
  })

  it('stages content and records it on chain', async () => {
    const { receipt, hash, size } = await bucket.add('docs/greeting.txt', CONTENT, { metadata: { lang: 'en' } })
    expect(hash).toEqual(blake3(CONTENT))
    expect(size).toBe(15n)
    expect(receipt.data).toEqual({
      hash,
      recoveryHash: metadataHashOf(hash),
      size: 15n,
      expiry: receipt.height === null ? null : receipt.height + DEFAULT_TTL,
      metadata: { 'content-type': 'application/octet-stream', lang: 'en' }
    })
    expect(await bucket.head('docs/greeting.txt')).toEqual(receipt.data)
  })

  it('honors a ttl', async () => {
    const { receipt } = await bucket.add('short-lived', CONTENT, { ttl: 10n })
    expect(receipt.data?.expiry).toBe(receipt.height === null ? null : receipt.height + 10n)
  })

  it('reads content whole and by range', async () => {
    await bucket.add('docs/greeting.txt', CONTENT)
    expect(bytesToUtf8(await bucket.get('docs/greeting.txt'))).toBe('0123456789hello')
    expect(bytesToUtf8(await bucket.get('docs/greeting.txt', { range: '10-14' }))).toBe('hello')
    expect(bytesToUtf8(await bucket.get('docs/greeting.txt', { range: '10-99' }))).toBe('hello')
    expect(bytesToUtf8(await bucket.get('docs/greeting.txt', { range: '-5' }))).toBe('hello')
    expect(bytesToUtf8(await bucket.get('docs/greeting.txt', { range: '12-' }))).toBe('llo')
    expect(h.objects.requests.filter((r) => r.startsWith('GET ') && r.endsWith(' bytes=10-14'))).toHaveLength(3)
  })

  it('slices locally when the server ignores ranges', async () => {
    await bucket.add('docs/greeting.txt', CONTENT)
    h.objects.ignoreRanges = true
    expect(bytesToUtf8(await bucket.get('docs/greeting.txt', { range: '0-3' }))).toBe('0123')
  })

  it('rejects ranges outside the object', async () => {
    await bucket.add('docs/greeting.txt', CONTENT)
    await expect(bucket.get('docs/greeting.txt', { range: '15-20' })).rejects.toThrow(RangeNotSatisfiableError)
    await expect(bucket.get('docs/greeting.txt', { range: 'bytes' })).rejects.toThrow(InvalidCallError)
  })

  it('verifies content against the stored hash', async () => {
    await bucket.add('docs/greeting.txt', CONTENT)
    expect(await bucket.get('docs/greeting.txt', { verify: true })).toEqual(CONTENT)

    const stored = h.objects.blobs.get(bytesToHex(blake3(CONTENT), false))
    stored?.set([0x21], 0)
    await expect(bucket.get('docs/greeting.txt', { verify: true })).rejects.toThrow(DecodeError)
  })

  it('reports missing keys as not found', async () => {
    await expect(bucket.get('nope')).rejects.toThrow(NotFoundError)
    await expect(bucket.get('nope', { range: '0-1' })).rejects.toThrow(NotFoundError)
    await expect(bucket.head('nope')).rejects.toThrow(NotFoundError)
  })

  it('lists keys by prefix and delimiter', async () => {
    for (const key of ['docs/b.txt', 'docs/a.txt', 'docs/img/cat.png', 'docs/img/dog.png', 'top.txt']) {
      await bucket.add(key, utf8ToBytes(key))
    }
    const root = await bucket.query()
    expect(root.objects.map((o) => o.key)).toEqual(['top.txt'])
    expect(root.commonPrefixes).toEqual(['docs/'])

    const docs = await bucket.query({ prefix: 'docs/' })
    expect(docs.objects.map((o) => o.key)).toEqual(['docs/a.txt', 'docs/b.txt'])
    expect(docs.objects[0].object.size).toBe(10n)
    expect(docs.commonPrefixes).toEqual(['docs/img/'])

    const flat = await bucket.query({ prefix: 'docs/', delimiter: '', offset: 1, limit: 2 })
    expect(flat.objects.map((o) => o.key)).toEqual(['docs/b.txt', 'docs/img/cat.png'])
    expect(flat.commonPrefixes).toEqual([])
  })

  it('hands prefix, delimiter and page size to the bucket actor', async () => {
    for (const key of ['a/1', 'a/2', 'b', 'c', 'd', 'e']) await bucket.add(key, utf8ToBytes(key))

    const page = await bucket.query({ delimiter: '', offset: 1, limit: 2 })
    expect(page.objects.map((o) => o.key)).toEqual(['a/2', 'b'])
    expect(h.node.listRequests).toEqual([{ prefix: '', delimiter: '', limit: 3 }])

    h.node.listRequests.length = 0
    const grouped = await bucket.query({ limit: 2 })
    expect(grouped.objects.map((o) => o.key)).toEqual(['b', 'c'])
    expect(grouped.commonPrefixes).toEqual(['a/'])
    expect(h.node.listRequests).toEqual([{ prefix: '', delimiter: '/', limit: MAX_LIST_LIMIT }])
  })

  it('refuses to replace a key unless asked', async () => {
    await bucket.add('k', CONTENT)
    await expect(bucket.add('k', utf8ToBytes('other'))).rejects.toThrow(TransactionRejectedError)
    await bucket.add('k', utf8ToBytes('other'), { overwrite: true })
    expect(bytesToUtf8(await bucket.get('k'))).toBe('other')
  })

  it('deletes objects', async () => {
    await bucket.add('k', CONTENT)
    await bucket.delete('k')
    await expect(bucket.head('k')).rejects.toThrow(NotFoundError)
    await expect(bucket.delete('k')).rejects.toThrow(TransactionRejectedError)
  })

  it('reads objects at an earlier height', async () => {
    const { receipt } = await bucket.add('k', CONTENT)
    await bucket.delete('k')
    const height = receipt.height ?? 0n
    expect((await bucket.head('k', height)).size).toBe(15n)
    expect(await bucket.get('k', { height })).toEqual(CONTENT)
  })

  it('sets and removes metadata entries', async () => {
    await bucket.add('k', CONTENT, { metadata: { color: 'red' } })
    await bucket.updateMetadata('k', { color: 'blue', 'content-type': null })
    expect((await bucket.head('k')).metadata).toEqual({ color: 'blue' })
  })

  it('needs a secret key to write', async () => {
    const readOnly = h.client.bucket(bucket.address)
    await expect(readOnly.add('k', CONTENT)).rejects.toThrow(InvalidKeyError)
    await expect(readOnly.delete('k')).rejects.toThrow(InvalidKeyError)
    expect(h.objects.requests).toEqual([])
  })

  it('is written only by its owner', async () => {
    const intruder = h.client.bucket(bucket.address, h.bob)
    const error = await intruder.add('k', CONTENT).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(TransactionRejectedError)
    expect(error instanceof TransactionRejectedError && error.code).toBe(18)
  })

  it('validates keys and metadata before uploading', async () => {
    await expect(bucket.add('', CONTENT)).rejects.toThrow(InvalidCallError)
    await expect(bucket.add('k', CONTENT, { metadata: { '': 'x' } })).rejects.toThrow(InvalidCallError)
    expect(h.objects.requests).toEqual([])
  })

  it('surfaces upload failures as network errors', async () => {
    h.objects.failUploads = 503
    await expect(bucket.add('k', CONTENT)).rejects.toThrow(NetworkError)
    expect(h.node.broadcasts.filter((b) => b.message.to.equals(bucket.address))).toEqual([])
  })
})
