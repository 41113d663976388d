/**
 * @file cbor.ts
 * Deterministic CBOR helpers for chain payloads.
 *
 * - Uses the `cborg` encoder/decoder (canonical map key ordering, fixed-length items).
 * - CIDs travel as tag 42 over a 0x00-prefixed byte string, as IPLD dag-cbor does.
 * - Integers beyond the safe range decode to `bigint`; readers below normalize them.
 * - Readers (`readArray`, `readBigInt`, ...) narrow decoded `unknown` values and
 *   raise DecodeError with the path that failed.
 */

import { encode, decode, Token, Type } from 'cborg'
import { CID } from 'multiformats/cid'
import { DecodeError } from '../errors'
import { bytesToHex, concatBytes } from './bytes'

const CID_TAG = 42

function cidEncoder(obj: unknown): Token[] | null {
  const cid = CID.asCID(obj)
  if (!cid) return null
  return [new Token(Type.tag, CID_TAG), new Token(Type.bytes, concatBytes([new Uint8Array([0]), cid.bytes]))]
}

function cidDecoder(inner: unknown): CID {
  if (!(inner instanceof Uint8Array) || inner[0] !== 0) {
    throw new DecodeError('invalid CID encoding: expected 0x00-prefixed bytes under tag 42')
  }
  return CID.decode(inner.subarray(1))
}

const TAGS: Array<(inner: unknown) => unknown> = []
TAGS[CID_TAG] = cidDecoder

/** Encode value to canonical CBOR. `undefined` is not allowed; use null. */
export function encodeCbor(value: unknown): Uint8Array {
  return encode(value, { typeEncoders: { Object: cidEncoder } })
}

/** Strictly decode CBOR bytes (rejects indefinite forms and undefined). */
export function decodeCbor(data: Uint8Array): unknown {
  try {
    return decode(data, {
      tags: TAGS,
      allowIndefinite: false,
      allowUndefined: false,
      allowBigInt: true,
      useMaps: false,
      strict: true
    })
  } catch (e) {
    if (e instanceof DecodeError) throw e
    throw new DecodeError(`invalid CBOR: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Readers
// ──────────────────────────────────────────────────────────────────────────────

function fail(path: string, expected: string, got: unknown): never {
  const shape = got === null ? 'null' : Array.isArray(got) ? 'array' : got instanceof Uint8Array ? 'bytes' : typeof got
  throw new DecodeError(`${path}: expected ${expected}, got ${shape}`)
}

export function readArray(v: unknown, path: string, length?: number): unknown[] {
  if (!Array.isArray(v)) return fail(path, 'array', v)
  if (length !== undefined && v.length !== length) {
    throw new DecodeError(`${path}: expected tuple of ${length}, got ${v.length} items`)
  }
  return v
}

export function readBytes(v: unknown, path: string): Uint8Array {
  if (!(v instanceof Uint8Array)) return fail(path, 'bytes', v)
  return v
}

export function readString(v: unknown, path: string): string {
  if (typeof v !== 'string') return fail(path, 'string', v)
  return v
}

export function readBool(v: unknown, path: string): boolean {
  if (typeof v !== 'boolean') return fail(path, 'boolean', v)
  return v
}

/** Unsigned or signed integer as bigint. */
export function readBigInt(v: unknown, path: string): bigint {
  if (typeof v === 'bigint') return v
  if (typeof v === 'number' && Number.isInteger(v)) return BigInt(v)
  return fail(path, 'integer', v)
}

export function readNumber(v: unknown, path: string): number {
  if (typeof v === 'number' && Number.isInteger(v)) return v
  if (typeof v === 'bigint' && v <= BigInt(Number.MAX_SAFE_INTEGER) && v >= BigInt(Number.MIN_SAFE_INTEGER)) {
    return Number(v)
  }
  return fail(path, 'safe integer', v)
}

export function readCid(v: unknown, path: string): CID {
  const cid = CID.asCID(v)
  if (!cid) return fail(path, 'CID', v)
  return cid
}

export function readOptional<T>(v: unknown, read: (v: unknown) => T): T | null {
  return v === null ? null : read(v)
}

/** String-keyed map of strings (metadata). */
export function readStringMap(v: unknown, path: string): Record<string, string> {
  if (typeof v !== 'object' || v === null || Array.isArray(v) || v instanceof Uint8Array) {
    return fail(path, 'map', v)
  }
  const out: Record<string, string> = {}
  for (const [k, val] of Object.entries(v)) out[k] = readString(val, `${path}.${k}`)
  return out
}

/** Debug rendering for decoded values (bytes as hex, CIDs as strings). */
export function describeCbor(v: unknown): string {
  return JSON.stringify(v, (_k, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Uint8Array) return bytesToHex(val)
    const cid = CID.asCID(val)
    return cid ? cid.toString() : val
  })
}

export default {
  encodeCbor,
  decodeCbor,
  readArray,
  readBytes,
  readString,
  readBool,
  readBigInt,
  readNumber,
  readCid,
  readOptional,
  readStringMap,
  describeCbor
}
