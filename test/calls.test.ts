import { describe, expect, it } from 'vitest'
import { Address } from '../src/address'
import { InvalidCallError, PayloadTooLargeError } from '../src/errors'
import { MAX_PUSH_SIZE, decodeCallReturn, resolveCall, validateCall, validateMetadata } from '../src/tx/calls'
import { BLOBS_ACTOR, MACHINE_MANAGER_ACTOR, METHOD_SEND, Method } from '../src/tx/methods'
import { utf8ToBytes } from '../src/utils/bytes'
import { decodeCbor, encodeCbor } from '../src/utils/cbor'

const sender = Address.fromEthAddress('0x7e5f4552091a69125d5dfcb7b8c2659029395bdf')
const gateway = Address.fromId(64)
const bucket = Address.fromId(1000)
const ctx = { sender, gateway }
const hash = new Uint8Array(32).fill(1)

describe('validateCall', () => {
  it('requires positive amounts', () => {
    expect(() => validateCall({ kind: 'transfer', amount: 0n, to: bucket })).toThrow(InvalidCallError)
    expect(() => validateCall({ kind: 'deposit', amount: -1n })).toThrow(/amount must be positive/)
    expect(() => validateCall({ kind: 'withdraw', amount: 1n })).not.toThrow()
  })

  it('only allows public write access on timehubs', () => {
    expect(() => validateCall({ kind: 'createMachine', machine: 'Bucket', writeAccess: 'Public' })).toThrow(
      /only available for timehubs/
    )
    expect(() => validateCall({ kind: 'createMachine', machine: 'Timehub', writeAccess: 'Public' })).not.toThrow()
  })

  it('caps timehub entries at 500 KiB', () => {
    const call = { kind: 'pushEntry' as const, timehub: bucket, value: new Uint8Array(MAX_PUSH_SIZE + 1) }
    expect(() => validateCall(call)).toThrow(PayloadTooLargeError)
    expect(() => validateCall({ ...call, value: new Uint8Array(MAX_PUSH_SIZE) })).not.toThrow()
  })

  it('checks object keys and hashes', () => {
    const add = {
      kind: 'addObject' as const,
      bucket,
      key: 'a',
      source: hash,
      hash,
      recoveryHash: hash,
      size: 5n
    }
    expect(() => validateCall(add)).not.toThrow()
    expect(() => validateCall({ ...add, key: '' })).toThrow(/key must not be empty/)
    expect(() => validateCall({ ...add, hash: new Uint8Array(31) })).toThrow(/hash must be 32 bytes/)
    expect(() => validateCall({ ...add, ttl: 0n })).toThrow(/ttl must be positive/)
    expect(() => validateCall({ kind: 'deleteObject', bucket, key: '' })).toThrow(InvalidCallError)
  })
})

describe('validateMetadata', () => {
  it('limits entry count and sizes', () => {
    const many = Object.fromEntries(Array.from({ length: 21 }, (_, i) => [`k${i}`, 'v']))
    expect(() => validateMetadata(many)).toThrow(/at most 20/)
    expect(() => validateMetadata({ ['k'.repeat(33)]: 'v' })).toThrow(/1 to 32 bytes/)
    expect(() => validateMetadata({ k: 'v'.repeat(129) })).toThrow(/1 to 128 bytes/)
    expect(() => validateMetadata({ k: '' })).toThrow(InvalidCallError)
    expect(() => validateMetadata({ ['k'.repeat(32)]: 'v'.repeat(128) })).not.toThrow()
  })

  it('accepts null values only for updates', () => {
    expect(() => validateMetadata({ k: null })).toThrow(/missing/)
    expect(() => validateMetadata({ k: null }, true)).not.toThrow()
  })
})

describe('resolveCall', () => {
  it('routes deposits and withdrawals to the gateway with the recipient', () => {
    const deposit = resolveCall({ kind: 'deposit', amount: 10n }, ctx)
    expect(deposit.to.equals(gateway)).toBe(true)
    expect(deposit.method).toBe(Method.Fund)
    expect(deposit.value).toBe(10n)
    expect(decodeCbor(deposit.params)).toEqual([sender.bytes])

    const withdraw = resolveCall({ kind: 'withdraw', amount: 3n, to: bucket }, ctx)
    expect(withdraw.method).toBe(Method.Release)
    expect(decodeCbor(withdraw.params)).toEqual([bucket.bytes])
  })

  it('sends transfers as plain value with no params', () => {
    const r = resolveCall({ kind: 'transfer', amount: 4n, to: bucket }, ctx)
    expect(r.method).toBe(METHOD_SEND)
    expect(r.params.length).toBe(0)
  })

  it('creates machines through the address manager, owned by the sender by default', () => {
    const r = resolveCall({ kind: 'createMachine', machine: 'Bucket', metadata: { alias: 'photos' } }, ctx)
    expect(r.to.equals(MACHINE_MANAGER_ACTOR)).toBe(true)
    expect(r.method).toBe(Method.CreateExternal)
    expect(decodeCbor(r.params)).toEqual([sender.bytes, 'Bucket', 'OnlyOwner', { alias: 'photos' }])
  })

  it('encodes object keys as bytes', () => {
    const del = resolveCall({ kind: 'deleteObject', bucket, key: 'docs/a.txt' }, ctx)
    expect(decodeCbor(del.params)).toEqual(utf8ToBytes('docs/a.txt'))
    const update = resolveCall({ kind: 'updateObjectMetadata', bucket, key: 'a', metadata: { x: null, y: '1' } }, ctx)
    expect(decodeCbor(update.params)).toEqual([utf8ToBytes('a'), { x: null, y: '1' }])
  })
})

describe('credit calls', () => {
  it('pays for credit with the call value', () => {
    const r = resolveCall({ kind: 'buyCredit', amount: 7n }, ctx)
    expect(r.to.equals(BLOBS_ACTOR)).toBe(true)
    expect(r.method).toBe(Method.BuyCredit)
    expect(r.value).toBe(7n)
    expect(decodeCbor(r.params)).toEqual([sender.bytes])
  })

  it('grants and revokes from the sender', () => {
    const approve = resolveCall({ kind: 'approveCredit', receiver: bucket, limit: 9n }, ctx)
    expect(approve.method).toBe(Method.ApproveCredit)
    expect(approve.value).toBe(0n)
    expect(decodeCbor(approve.params)).toEqual([sender.bytes, bucket.bytes, null, 9, null])

    const revoke = resolveCall({ kind: 'revokeCredit', receiver: bucket, caller: gateway }, ctx)
    expect(revoke.method).toBe(Method.RevokeCredit)
    expect(decodeCbor(revoke.params)).toEqual([sender.bytes, bucket.bytes, gateway.bytes])
  })

  it('reads a zero debit epoch as never debited', () => {
    expect(decodeCallReturn('buyCredit', encodeCbor([10, 0, 0]))).toEqual({
      creditFree: 10n,
      creditCommitted: 0n,
      lastDebitEpoch: null
    })
    expect(decodeCallReturn('buyCredit', encodeCbor([10, 4, 12])).lastDebitEpoch).toBe(12n)
  })
})

describe('decodeCallReturn', () => {
  it('reads the created machine id and robust address', () => {
    const created = decodeCallReturn('createMachine', encodeCbor([1001, null]))
    expect(created.address.toString()).toBe('t01001')
    expect(created.actorId).toBe(1001n)
    expect(created.robustAddress).toBeNull()
  })

  it('ignores the payload of calls without a result', () => {
    expect(decodeCallReturn('transfer', new Uint8Array())).toBeNull()
  })
})
