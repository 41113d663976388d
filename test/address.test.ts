import { describe, expect, it } from 'vitest'
import { Address, Protocol, shortAddress, toAddress } from '../src/address'
import { InvalidCallError } from '../src/errors'

const ETH = '0xd388ab098ed3e84c0d808776440b48f685198498'
const DELEGATED = 't410f2oekwcmo2pueydmaq53eic2i62crtbeyuzx2gmy'

describe('Address', () => {
  it('maps an Ethereum-style address to its delegated account address and back', () => {
    const a = Address.fromEthAddress(ETH)
    expect(a.protocol).toBe(Protocol.DELEGATED)
    expect(a.toString()).toBe(DELEGATED)
    expect(a.toString('mainnet')).toBe(`f${DELEGATED.slice(1)}`)
    expect(a.toEthAddress()).toBe(ETH)
    expect(Address.parse(DELEGATED).equals(a)).toBe(true)
    expect(Address.parse(ETH).equals(a)).toBe(true)
  })

  it('encodes ID addresses as a uvarint payload', () => {
    const a = Address.fromId(1024)
    expect(Array.from(a.bytes)).toEqual([0, 0x80, 0x08])
    expect(a.id).toBe(1024n)
    expect(a.toString()).toBe('t01024')
    expect(Address.parse('f01024').equals(a)).toBe(true)
    expect(Address.fromBytes(a.bytes).equals(a)).toBe(true)
  })

  it('exposes ID addresses through the masked Ethereum form', () => {
    const a = Address.fromId(1024)
    expect(a.toEthAddress()).toBe('0xff00000000000000000000000000000000000400')
    expect(Address.fromEthAddress('0xff00000000000000000000000000000000000400').equals(a)).toBe(true)
  })

  it('rejects a corrupted checksum', () => {
    const corrupted = `${DELEGATED.slice(0, 8)}a${DELEGATED.slice(9)}`
    expect(() => Address.parse(corrupted)).toThrow(InvalidCallError)
  })

  it('rejects unknown prefixes and protocols', () => {
    expect(() => Address.parse('x01024')).toThrow(/unknown network prefix/)
    expect(() => Address.parse('t91024')).toThrow(/unknown protocol/)
    expect(() => Address.parse('t0abc')).toThrow(/ID must be decimal/)
    expect(() => Address.parse('0x1234')).toThrow(InvalidCallError)
  })

  it('checks payload lengths in binary form', () => {
    expect(() => Address.fromBytes(new Uint8Array([1, 1, 2, 3]))).toThrow(/payload must be 20 bytes/)
  })

  it('shortens long addresses for display', () => {
    expect(shortAddress(DELEGATED)).toBe('t410f2oe…2gmy')
    expect(shortAddress('t01024')).toBe('t01024')
  })

  it('passes Address values through toAddress', () => {
    const a = Address.fromId(7)
    expect(toAddress(a)).toBe(a)
    expect(toAddress('t07').equals(a)).toBe(true)
  })
})
