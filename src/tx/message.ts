/**
 * Chain messages: the unsigned transaction body, its canonical encoding,
 * content identifier, signable bytes and gas parameters.
 *
 * Wire form is a CBOR tuple:
 *   [version, to, from, sequence, value, gas_limit, gas_fee_cap, gas_premium, method, params]
 * with addresses in binary form and token amounts as sign-prefixed big-endian bytes.
 */

import { CID } from 'multiformats/cid'
import { create as createDigest } from 'multiformats/hashes/digest'
import { Address } from '../address'
import { DecodeError, InvalidCallError } from '../errors'
import { bigintToBytes, bytesToBigInt, concatBytes, u64ToBytes, utf8ToBytes } from '../utils/bytes'
import { decodeCbor, encodeCbor, readArray, readBigInt, readBytes, readNumber } from '../utils/cbor'
import { blake2b256, blake2b512 } from '../utils/hash'

export interface Message {
  version: number
  to: Address
  from: Address
  sequence: bigint
  value: bigint
  gasLimit: bigint
  gasFeeCap: bigint
  gasPremium: bigint
  method: bigint
  params: Uint8Array
}

export interface GasParams {
  gasLimit: bigint
  gasFeeCap: bigint
  gasPremium: bigint
}

/** Minimum fee cap accepted by the chain (atto). */
export const MIN_GAS_FEE_CAP = 100n
/** Minimum premium accepted by the chain (atto). */
export const MIN_GAS_PREMIUM = 100_000n
/** Block gas limit; a message may not ask for more. */
export const BLOCK_GAS_LIMIT = 10_000_000_000n

/** The system actor; read-only calls are sent from it. */
export const SYSTEM_ACTOR = Address.fromId(0)

const DAG_CBOR = 0x71
const BLAKE2B_256 = 0xb220

// ──────────────────────────────────────────────────────────────────────────────
// Token amounts
// ──────────────────────────────────────────────────────────────────────────────

/** Sign-prefixed big-endian bytes; zero is the empty string. */
export function encodeTokenAmount(amount: bigint): Uint8Array {
  if (amount === 0n) return new Uint8Array()
  const negative = amount < 0n
  return concatBytes([new Uint8Array([negative ? 1 : 0]), bigintToBytes(negative ? -amount : amount)])
}

export function decodeTokenAmount(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n
  const magnitude = bytesToBigInt(bytes.subarray(1))
  if (bytes[0] === 0) return magnitude
  if (bytes[0] === 1) return -magnitude
  throw new DecodeError(`invalid token amount sign byte ${bytes[0]}`)
}

// ──────────────────────────────────────────────────────────────────────────────
// Method numbers
// ──────────────────────────────────────────────────────────────────────────────

const FIRST_METHOD_NUMBER = 1 << 24

/**
 * Exported method number for a method name: the first 4-byte big-endian
 * chunk of blake2b-512("1|" + name) that is at least 2^24.
 */
export function methodNumber(name: string): bigint {
  if (!/^[A-Z][A-Za-z0-9_]*$/.test(name)) throw new InvalidCallError(`invalid method name "${name}"`)
  const digest = blake2b512(utf8ToBytes(`1|${name}`))
  const view = new DataView(digest.buffer, digest.byteOffset, digest.byteLength)
  for (let i = 0; i + 4 <= digest.length; i += 4) {
    const n = view.getUint32(i, false)
    if (n >= FIRST_METHOD_NUMBER) return BigInt(n)
  }
  throw new InvalidCallError(`no method number found for "${name}"`)
}

// ──────────────────────────────────────────────────────────────────────────────
// Gas
// ──────────────────────────────────────────────────────────────────────────────

/** Apply chain limits: a zero or oversized limit becomes the block limit; fees are raised to their minimums. */
export function clampGasParams(gas: GasParams): GasParams {
  return {
    gasLimit: gas.gasLimit <= 0n || gas.gasLimit > BLOCK_GAS_LIMIT ? BLOCK_GAS_LIMIT : gas.gasLimit,
    gasFeeCap: gas.gasFeeCap < MIN_GAS_FEE_CAP ? MIN_GAS_FEE_CAP : gas.gasFeeCap,
    gasPremium: gas.gasPremium < MIN_GAS_PREMIUM ? MIN_GAS_PREMIUM : gas.gasPremium
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Construction
// ──────────────────────────────────────────────────────────────────────────────

/** Read-only call message evaluated by a query; never signed. */
export function localMessage(to: Address, method: bigint, params: Uint8Array = new Uint8Array()): Message {
  return {
    version: 0,
    to,
    from: SYSTEM_ACTOR,
    sequence: 0n,
    value: 0n,
    gasLimit: BLOCK_GAS_LIMIT,
    gasFeeCap: 0n,
    gasPremium: 0n,
    method,
    params
  }
}

/** Message signed to authorize an object upload; it is never broadcast. */
export function objectUploadMessage(from: Address, to: Address, method: bigint, params: Uint8Array): Message {
  return {
    version: 0,
    to,
    from,
    sequence: 0n,
    value: 0n,
    gasLimit: 0n,
    gasFeeCap: 0n,
    gasPremium: 0n,
    method,
    params
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Encoding
// ──────────────────────────────────────────────────────────────────────────────

/** CBOR-ready tuple form. */
export function messageToTuple(m: Message): unknown[] {
  return [
    m.version,
    m.to.bytes,
    m.from.bytes,
    m.sequence,
    encodeTokenAmount(m.value),
    m.gasLimit,
    encodeTokenAmount(m.gasFeeCap),
    encodeTokenAmount(m.gasPremium),
    m.method,
    m.params
  ]
}

export function messageFromTuple(v: unknown): Message {
  const t = readArray(v, 'message', 10)
  return {
    version: readNumber(t[0], 'message.version'),
    to: Address.fromBytes(readBytes(t[1], 'message.to')),
    from: Address.fromBytes(readBytes(t[2], 'message.from')),
    sequence: readBigInt(t[3], 'message.sequence'),
    value: decodeTokenAmount(readBytes(t[4], 'message.value')),
    gasLimit: readBigInt(t[5], 'message.gas_limit'),
    gasFeeCap: decodeTokenAmount(readBytes(t[6], 'message.gas_fee_cap')),
    gasPremium: decodeTokenAmount(readBytes(t[7], 'message.gas_premium')),
    method: readBigInt(t[8], 'message.method'),
    params: readBytes(t[9], 'message.params')
  }
}

export function encodeMessage(m: Message): Uint8Array {
  return encodeCbor(messageToTuple(m))
}

export function decodeMessage(bytes: Uint8Array): Message {
  return messageFromTuple(decodeCbor(bytes))
}

/** Content identifier of the encoded message (dag-cbor, blake2b-256). */
export function messageCid(m: Message): CID {
  return CID.createV1(DAG_CBOR, createDigest(BLAKE2B_256, blake2b256(encodeMessage(m))))
}

/** Bytes covered by the signature: CID bytes followed by the chain id (u64 big-endian). */
export function signableBytes(m: Message, chainId: bigint): Uint8Array {
  return concatBytes([messageCid(m).bytes, u64ToBytes(chainId)])
}

/** Upper bound on the fee the sender may be charged. */
export function maxFee(m: Pick<Message, 'gasLimit' | 'gasFeeCap'>): bigint {
  return m.gasLimit * m.gasFeeCap
}

export default {
  encodeTokenAmount,
  decodeTokenAmount,
  methodNumber,
  clampGasParams,
  localMessage,
  objectUploadMessage,
  messageToTuple,
  messageFromTuple,
  encodeMessage,
  decodeMessage,
  messageCid,
  signableBytes,
  maxFee
}
