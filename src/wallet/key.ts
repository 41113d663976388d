/**
 * secp256k1 key material: parsing, generation and address derivation.
 *
 * Accounts are identified by the delegated address in the Ethereum address
 * manager namespace; its sub-address is keccak256(uncompressed pubkey[1:])[12:].
 */

import { secp256k1 } from '@noble/curves/secp256k1'
import { Address } from '../address'
import { InvalidKeyError } from '../errors'
import { bytesToHex, hexToBytes, strip0x } from '../utils/bytes'
import { keccak256 } from '../utils/hash'

export const SECRET_KEY_LENGTH = 32

/** Parse a hex secret key (optional 0x prefix, surrounding whitespace ignored). */
export function parseSecretKey(input: string): Uint8Array {
  const hex = strip0x(input.trim())
  if (!/^[0-9a-fA-F]*$/.test(hex) || hex.length !== SECRET_KEY_LENGTH * 2) {
    throw new InvalidKeyError(`secret key must be ${SECRET_KEY_LENGTH} bytes of hex`)
  }
  const bytes = hexToBytes(hex)
  if (!secp256k1.utils.isValidPrivateKey(bytes)) {
    throw new InvalidKeyError('secret key is outside the secp256k1 scalar range')
  }
  return bytes
}

/** Accept raw bytes or hex. */
export function toSecretKey(key: Uint8Array | string): Uint8Array {
  if (typeof key === 'string') return parseSecretKey(key)
  if (key.length !== SECRET_KEY_LENGTH || !secp256k1.utils.isValidPrivateKey(key)) {
    throw new InvalidKeyError(`secret key must be ${SECRET_KEY_LENGTH} bytes within the secp256k1 scalar range`)
  }
  return key.slice()
}

export function randomSecretKey(): Uint8Array {
  return secp256k1.utils.randomPrivateKey()
}

/** 65-byte uncompressed public key. */
export function publicKeyOf(secretKey: Uint8Array): Uint8Array {
  return secp256k1.getPublicKey(secretKey, false)
}

/** 20-byte Ethereum-style address of an uncompressed public key. */
export function ethAddressOf(publicKey: Uint8Array): Uint8Array {
  if (publicKey.length !== 65) throw new InvalidKeyError('public key must be 65 bytes uncompressed')
  return keccak256(publicKey.subarray(1)).subarray(12)
}

/** Delegated account address of an uncompressed public key. */
export function accountAddressOf(publicKey: Uint8Array): Address {
  return Address.fromEthAddress(ethAddressOf(publicKey))
}

export function secretKeyToHex(secretKey: Uint8Array): string {
  return bytesToHex(secretKey, false)
}

export default {
  parseSecretKey,
  toSecretKey,
  randomSecretKey,
  publicKeyOf,
  ethAddressOf,
  accountAddressOf,
  secretKeyToHex
}
