/**
 * Message signers.
 *
 *  - Wallet: holds a secp256k1 secret key in memory and signs chain messages.
 *  - VoidSigner: bound to an address only; refuses to sign. Used by read paths
 *    that need an account but never a signature.
 *
 * Signature wire form: type byte (1 = secp256k1) || r (32) || s (32) || recovery id (1).
 * The signed digest is blake2b-256 over the message's signable bytes
 * (message CID bytes || chain id as u64 big-endian). Signatures are
 * deterministic (RFC 6979) and low-S normalized.
 *
 * Security notes:
 *  - The secret key lives in a private field and is never logged or serialized.
 *    `destroy()` wipes it; the signer is unusable afterwards.
 */

import { secp256k1 } from '@noble/curves/secp256k1'
import type { Address } from '../address'
import { InvalidKeyError } from '../errors'
import { bytesToHex, concatBytes, equalBytes } from '../utils/bytes'
import { blake2b256 } from '../utils/hash'
import { signableBytes, type Message } from '../tx/message'
import { accountAddressOf, ethAddressOf, publicKeyOf, randomSecretKey, secretKeyToHex, toSecretKey } from './key'

// ──────────────────────────────────────────────────────────────────────────────
// Types & public API
// ──────────────────────────────────────────────────────────────────────────────

export const SIG_TYPE_SECP256K1 = 1
export const SIGNATURE_LENGTH = 66

export interface Signer {
  /** Delegated account address. */
  readonly address: Address
  /** True when sign() may be called. */
  readonly canSign: boolean
  /** Sign a message for a chain; returns the signature wire bytes. */
  signMessage(message: Message, chainId: bigint): Promise<Uint8Array>
}

/** Digest covered by a message signature. */
export function messageDigest(message: Message, chainId: bigint): Uint8Array {
  return blake2b256(signableBytes(message, chainId))
}

// ──────────────────────────────────────────────────────────────────────────────
// Wallet
// ──────────────────────────────────────────────────────────────────────────────

export class Wallet implements Signer {
  readonly address: Address
  readonly publicKey: Uint8Array
  readonly canSign = true
  private secretKey: Uint8Array | null

  constructor(secretKey: Uint8Array | string) {
    const sk = toSecretKey(secretKey)
    this.secretKey = sk
    this.publicKey = publicKeyOf(sk)
    this.address = accountAddressOf(this.publicKey)
  }

  static random(): Wallet {
    return new Wallet(randomSecretKey())
  }

  /** 0x-prefixed lower-case hex address. */
  get ethAddress(): string {
    return bytesToHex(ethAddressOf(this.publicKey))
  }

  /** Sign a 32-byte digest; returns r || s || recovery (65 bytes). */
  signDigest(digest: Uint8Array): Uint8Array {
    const sk = this.requireKey()
    const sig = secp256k1.sign(digest, sk)
    return concatBytes([sig.toCompactRawBytes(), new Uint8Array([sig.recovery])])
  }

  async signMessage(message: Message, chainId: bigint): Promise<Uint8Array> {
    if (!message.from.equals(this.address)) {
      throw new InvalidKeyError(`message sender ${message.from.toString()} does not match signer ${this.address.toString()}`)
    }
    const raw = this.signDigest(messageDigest(message, chainId))
    return concatBytes([new Uint8Array([SIG_TYPE_SECP256K1]), raw])
  }

  /** Hex export for `account create`; callers own its handling. */
  exportSecretKey(): string {
    return secretKeyToHex(this.requireKey())
  }

  destroy(): void {
    this.secretKey?.fill(0)
    this.secretKey = null
  }

  private requireKey(): Uint8Array {
    if (!this.secretKey) throw new InvalidKeyError('signer has been destroyed')
    return this.secretKey
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// VoidSigner
// ──────────────────────────────────────────────────────────────────────────────

export class VoidSigner implements Signer {
  readonly address: Address
  readonly canSign = false

  constructor(address: Address) {
    this.address = address
  }

  async signMessage(): Promise<Uint8Array> {
    throw new InvalidKeyError(`no secret key available for ${this.address.toString()}; read-only signer cannot sign`)
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Verification
// ──────────────────────────────────────────────────────────────────────────────

/** Recover the uncompressed public key from signature wire bytes. */
export function recoverPublicKey(signature: Uint8Array, digest: Uint8Array): Uint8Array {
  if (signature.length !== SIGNATURE_LENGTH || signature[0] !== SIG_TYPE_SECP256K1) {
    throw new InvalidKeyError('expected a 66-byte secp256k1 signature')
  }
  const recovery = signature[65]
  const sig = secp256k1.Signature.fromCompact(signature.subarray(1, 65)).addRecoveryBit(recovery)
  return sig.recoverPublicKey(digest).toRawBytes(false)
}

/** True when the signature over the message was made by the sender's key. */
export function verifyMessageSignature(message: Message, chainId: bigint, signature: Uint8Array): boolean {
  try {
    const pub = recoverPublicKey(signature, messageDigest(message, chainId))
    return equalBytes(accountAddressOf(pub).bytes, message.from.bytes)
  } catch (e) {
    // Malformed points and recovery ids surface as plain Errors from the curve library.
    if (e instanceof Error) return false
    throw e
  }
}

export default { Wallet, VoidSigner, messageDigest, recoverPublicKey, verifyMessageSignature }
