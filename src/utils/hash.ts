/**
 * Hash utilities built on @noble/hashes.
 *
 * Exposes:
 *  - blake2b at the widths the chain uses (4-byte checksums, 20-byte address
 *    payloads, 32-byte message digests, 64-byte method-number seeds)
 *  - blake3 (object content hashes)
 *  - sha256 (consensus transaction hashes)
 *  - keccak256 (Ethereum-style account derivation)
 */

import { blake2b } from '@noble/hashes/blake2b'
import { blake3 as _blake3 } from '@noble/hashes/blake3'
import { sha256 as _sha256 } from '@noble/hashes/sha256'
import { keccak_256 } from '@noble/hashes/sha3'
import { bytesToHex, concatBytes } from './bytes'

export type HashFn = (input: Uint8Array) => Uint8Array

/** blake2b with a caller-selected digest length (1..64 bytes). */
export function blake2bN(data: Uint8Array, length: number): Uint8Array {
  return blake2b(data, { dkLen: length })
}

export const blake2b32: HashFn = (data) => blake2bN(data, 4)
export const blake2b160: HashFn = (data) => blake2bN(data, 20)
export const blake2b256: HashFn = (data) => blake2bN(data, 32)
export const blake2b512: HashFn = (data) => blake2bN(data, 64)

/** BLAKE3-256, used for object content identifiers. */
export const blake3: HashFn = (data) => _blake3(data)

/** SHA-256. */
export const sha256: HashFn = (data) => _sha256(data)

/** Keccak-256 (Ethereum-style Keccak). */
export const keccak256: HashFn = (data) => keccak_256(data)

/** Digest and return lowercase hex (0x-prefixed by default). */
export function digestHex(fn: HashFn, data: Uint8Array, with0x = true): string {
  return bytesToHex(fn(data), with0x)
}

/** Hash the concatenation of multiple chunks. */
export function hashConcat(fn: HashFn, parts: ReadonlyArray<Uint8Array>): Uint8Array {
  return fn(concatBytes(parts))
}

export default {
  blake2bN,
  blake2b32,
  blake2b160,
  blake2b256,
  blake2b512,
  blake3,
  sha256,
  keccak256,
  digestHex,
  hashConcat
}
