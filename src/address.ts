/**
 * Chain addresses.
 *
 * Binary form:  protocol (1 byte) || payload
 * Text form:    network prefix ('f' mainnet, 't' testnets) || protocol digit || body
 *
 *   ID          f0<decimal actor id>                     payload = uvarint(id)
 *   secp256k1   f1<base32(payload || checksum)>         payload = blake2b-160(uncompressed pubkey)
 *   actor       f2<base32(payload || checksum)>         payload = 20 bytes
 *   BLS         f3<base32(payload || checksum)>         payload = 48-byte public key
 *   delegated   f4<namespace>f<base32(sub || checksum)> payload = uvarint(namespace) || sub
 *
 * checksum = blake2b-32(protocol || payload). base32 is RFC 4648 lowercase, unpadded.
 *
 * Accounts are delegated addresses in the Ethereum address manager namespace (10)
 * whose 20-byte sub-address is the account's Ethereum-style hex address, so the
 * `f410f…`/`t410f…` text and the `0x…` hex forms name the same account.
 */

import { base32 } from 'multiformats/bases/base32'
import { InvalidCallError } from './errors'
import { blake2b32, blake2b160 } from './utils/hash'
import {
  bytesToHex,
  concatBytes,
  decodeUvarint,
  encodeUvarint,
  equalBytes,
  hexToBytes,
  isHexString,
  strip0x
} from './utils/bytes'

export const Protocol = {
  ID: 0,
  SECP256K1: 1,
  ACTOR: 2,
  BLS: 3,
  DELEGATED: 4
} as const
export type ProtocolId = (typeof Protocol)[keyof typeof Protocol]

export type Network = 'mainnet' | 'testnet'

/** Namespace of the Ethereum address manager actor. */
export const EAM_NAMESPACE = 10n

const PREFIX: Record<Network, string> = { mainnet: 'f', testnet: 't' }
const PAYLOAD_LENGTH: Partial<Record<ProtocolId, number>> = {
  [Protocol.SECP256K1]: 20,
  [Protocol.ACTOR]: 20,
  [Protocol.BLS]: 48
}
const MAX_SUBADDRESS_LENGTH = 54
const ETH_ADDRESS_LENGTH = 20

function isProtocolId(n: number): n is ProtocolId {
  return n >= 0 && n <= 4 && Number.isInteger(n)
}

function invalid(input: string, reason: string): InvalidCallError {
  return new InvalidCallError(`invalid address "${input}": ${reason}`, { field: 'address' })
}

export class Address {
  readonly protocol: ProtocolId
  readonly payload: Uint8Array

  private constructor(protocol: ProtocolId, payload: Uint8Array) {
    this.protocol = protocol
    this.payload = payload
  }

  /** ID address for an actor id. */
  static fromId(id: bigint | number): Address {
    const v = BigInt(id)
    if (v < 0n || v > 0xffff_ffff_ffff_ffffn) throw new InvalidCallError(`actor id out of range: ${v}`)
    return new Address(Protocol.ID, encodeUvarint(v))
  }

  /** secp256k1 address from a 65-byte uncompressed public key. */
  static fromSecp256k1PublicKey(publicKey: Uint8Array): Address {
    if (publicKey.length !== 65) throw new InvalidCallError('secp256k1 public key must be 65 bytes uncompressed')
    return new Address(Protocol.SECP256K1, blake2b160(publicKey))
  }

  /** Delegated address under a namespace. */
  static fromDelegated(namespace: bigint, subaddress: Uint8Array): Address {
    if (subaddress.length > MAX_SUBADDRESS_LENGTH) {
      throw new InvalidCallError(`delegated sub-address exceeds ${MAX_SUBADDRESS_LENGTH} bytes`)
    }
    return new Address(Protocol.DELEGATED, concatBytes([encodeUvarint(namespace), subaddress]))
  }

  /** Delegated account address for a 20-byte Ethereum-style address (0x hex or bytes). */
  static fromEthAddress(eth: string | Uint8Array): Address {
    const bytes = typeof eth === 'string' ? parseEthHex(eth) : eth
    if (bytes.length !== ETH_ADDRESS_LENGTH) throw invalid(bytesToHex(bytes), 'expected a 20-byte address')
    // 0xff0000…<id> is the Ethereum view of an ID address.
    if (bytes[0] === 0xff && bytes.subarray(1, 12).every((b) => b === 0)) {
      const id = BigInt(bytesToHex(bytes.subarray(12)))
      return Address.fromId(id)
    }
    return Address.fromDelegated(EAM_NAMESPACE, bytes)
  }

  /** Decode binary form (protocol byte + payload). */
  static fromBytes(bytes: Uint8Array): Address {
    if (bytes.length < 2) throw invalid(bytesToHex(bytes), 'too short')
    const protocol = bytes[0]
    if (!isProtocolId(protocol)) throw invalid(bytesToHex(bytes), `unknown protocol ${protocol}`)
    const payload = bytes.slice(1)
    const expected = PAYLOAD_LENGTH[protocol]
    if (expected !== undefined && payload.length !== expected) {
      throw invalid(bytesToHex(bytes), `payload must be ${expected} bytes`)
    }
    if (protocol === Protocol.ID || protocol === Protocol.DELEGATED) {
      const { length } = decodeUvarint(payload)
      if (protocol === Protocol.ID && length !== payload.length) throw invalid(bytesToHex(bytes), 'trailing bytes')
    }
    return new Address(protocol, payload)
  }

  /**
   * Parse text form. Accepts either network prefix, and 0x-prefixed 20-byte
   * hex (mapped to the delegated account address).
   */
  static parse(input: string): Address {
    const s = input.trim()
    if (/^0x/i.test(s)) return Address.fromEthAddress(s)
    if (s.length < 3) throw invalid(input, 'too short')

    const prefix = s[0]
    if (prefix !== 'f' && prefix !== 't') throw invalid(input, 'unknown network prefix')
    const protocol = Number(s[1])
    if (!isProtocolId(protocol)) throw invalid(input, `unknown protocol ${s[1]}`)
    const body = s.slice(2)

    if (protocol === Protocol.ID) {
      if (!/^\d{1,20}$/.test(body)) throw invalid(input, 'ID must be decimal')
      return Address.fromId(BigInt(body))
    }

    let namespace: bigint | undefined
    let encoded = body
    if (protocol === Protocol.DELEGATED) {
      const sep = body.indexOf('f')
      if (sep <= 0 || !/^\d+$/.test(body.slice(0, sep))) throw invalid(input, 'missing namespace')
      namespace = BigInt(body.slice(0, sep))
      encoded = body.slice(sep + 1)
    }

    let raw: Uint8Array
    try {
      raw = base32.baseDecode(encoded)
    } catch (e) {
      throw new InvalidCallError(`invalid address "${input}": bad base32`, { field: 'address', cause: e })
    }
    if (raw.length < 4) throw invalid(input, 'too short')
    const data = raw.subarray(0, raw.length - 4)
    const checksum = raw.subarray(raw.length - 4)

    const addr =
      namespace === undefined
        ? Address.fromBytes(concatBytes([new Uint8Array([protocol]), data]))
        : Address.fromDelegated(namespace, data)
    if (!equalBytes(blake2b32(addr.bytes), checksum)) throw invalid(input, 'checksum mismatch')
    return addr
  }

  /** Binary form (protocol byte + payload). */
  get bytes(): Uint8Array {
    return concatBytes([new Uint8Array([this.protocol]), this.payload])
  }

  /** Actor id of an ID address. */
  get id(): bigint | undefined {
    return this.protocol === Protocol.ID ? decodeUvarint(this.payload).value : undefined
  }

  /** Namespace and sub-address of a delegated address. */
  get delegated(): { namespace: bigint; subaddress: Uint8Array } | undefined {
    if (this.protocol !== Protocol.DELEGATED) return undefined
    const { value, length } = decodeUvarint(this.payload)
    return { namespace: value, subaddress: this.payload.subarray(length) }
  }

  /**
   * Ethereum-style 0x address, when one exists: the sub-address of an account
   * delegated address, or the masked form of an ID address.
   */
  toEthAddress(): string | undefined {
    const id = this.id
    if (id !== undefined) {
      const out = new Uint8Array(ETH_ADDRESS_LENGTH)
      out[0] = 0xff
      new DataView(out.buffer).setBigUint64(12, id, false)
      return bytesToHex(out)
    }
    const d = this.delegated
    if (d && d.namespace === EAM_NAMESPACE && d.subaddress.length === ETH_ADDRESS_LENGTH) {
      return bytesToHex(d.subaddress)
    }
    return undefined
  }

  toString(network: Network = 'testnet'): string {
    const head = `${PREFIX[network]}${this.protocol}`
    const id = this.id
    if (id !== undefined) return `${head}${id}`
    const checksum = blake2b32(this.bytes)
    const d = this.delegated
    if (d) return `${head}${d.namespace}f${base32.baseEncode(concatBytes([d.subaddress, checksum]))}`
    return `${head}${base32.baseEncode(concatBytes([this.payload, checksum]))}`
  }

  toJSON(): string {
    return this.toString()
  }

  equals(other: Address): boolean {
    return this.protocol === other.protocol && equalBytes(this.payload, other.payload)
  }

  /** Network-independent key for maps and locks. */
  key(): string {
    return bytesToHex(this.bytes, false)
  }
}

function parseEthHex(s: string): Uint8Array {
  if (!isHexString(s) || strip0x(s).length !== ETH_ADDRESS_LENGTH * 2) {
    throw invalid(s, 'expected 0x followed by 40 hex characters')
  }
  return hexToBytes(s)
}

/** Shorten an address for display: t410fabc…wxyz */
export function shortAddress(addr: Address | string, left = 8, right = 4): string {
  const s = typeof addr === 'string' ? addr : addr.toString()
  return s.length <= left + right + 1 ? s : `${s.slice(0, left)}…${s.slice(-right)}`
}

/** Parse or pass through. */
export function toAddress(addr: Address | string): Address {
  return typeof addr === 'string' ? Address.parse(addr) : addr
}

export default Address
