/**
 * Signed transaction envelope and hash.
 *
 * Envelope (CBOR, externally tagged):
 *   { "Signed": [ <message tuple>, <signature bytes> ] }
 *
 * The transaction hash is SHA-256 over the envelope bytes, rendered as
 * upper-case hex without prefix. It is computed locally so a caller holds it
 * even when a broadcast never returns.
 */

import { DecodeError } from '../errors'
import { bytesToHex } from '../utils/bytes'
import { decodeCbor, encodeCbor, readArray, readBytes } from '../utils/cbor'
import { sha256 } from '../utils/hash'
import type { Signer } from '../wallet/signer'
import { messageFromTuple, messageToTuple, type Message } from './message'

const SIGNED_TAG = 'Signed'

export interface SignedTx {
  message: Message
  signature: Uint8Array
  /** Envelope bytes sent to the node. */
  bytes: Uint8Array
  /** Upper-case hex SHA-256 of the envelope. */
  hash: string
}

export function encodeEnvelope(message: Message, signature: Uint8Array): Uint8Array {
  return encodeCbor({ [SIGNED_TAG]: [messageToTuple(message), signature] })
}

export function decodeEnvelope(bytes: Uint8Array): { message: Message; signature: Uint8Array } {
  const v = decodeCbor(bytes)
  if (typeof v !== 'object' || v === null || !('Signed' in v)) {
    throw new DecodeError('envelope: expected a Signed variant')
  }
  const body = readArray(v.Signed, 'envelope.Signed', 2)
  return { message: messageFromTuple(body[0]), signature: readBytes(body[1], 'envelope.signature') }
}

export function txHash(envelope: Uint8Array): string {
  return bytesToHex(sha256(envelope), false).toUpperCase()
}

/** Sign a message and wrap it for broadcast. */
export async function signTx(signer: Signer, message: Message, chainId: bigint): Promise<SignedTx> {
  const signature = await signer.signMessage(message, chainId)
  const bytes = encodeEnvelope(message, signature)
  return { message, signature, bytes, hash: txHash(bytes) }
}

export default { encodeEnvelope, decodeEnvelope, txHash, signTx }
