/**
 * Byte helpers shared by the codec, signing and transport layers.
 * - Hex/UTF-8/Base64 conversions
 * - Concat/compare
 * - Unsigned LEB128 varints (address payloads)
 * - BigInt ↔ big-endian bytes (token amounts, chain ids)
 * - Random bytes via WebCrypto
 */

export type BytesLike = Uint8Array | ArrayBuffer | number[] | string

/** Quick type check */
export function isUint8Array(v: unknown): v is Uint8Array {
  return v instanceof Uint8Array
}

/** Return true if string looks like hex (0x.. or naked) and has even length (after 0x strip). */
export function isHexString(s: unknown): s is string {
  if (typeof s !== 'string') return false
  const t = strip0x(s)
  return t.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(t)
}

/** Strip 0x/0X prefix if present. */
export function strip0x(s: string): string {
  return s.startsWith('0x') || s.startsWith('0X') ? s.slice(2) : s
}

/** Add 0x prefix if absent. */
export function add0x(s: string): string {
  return s.startsWith('0x') || s.startsWith('0X') ? s : `0x${s}`
}

/** Convert hex string (with or without 0x) to Uint8Array. Empty string → empty bytes. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = strip0x(hex)
  if (clean.length === 0) return new Uint8Array()
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(clean)) {
    throw new Error('hexToBytes: invalid hex string length/characters')
  }
  const out = new Uint8Array(clean.length / 2)
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(2 * i, 2 * i + 2), 16)
  }
  return out
}

/** Convert bytes to lowercase hex string with 0x prefix by default. */
export function bytesToHex(bytes: Uint8Array, with0x = true): string {
  let hex = ''
  for (const b of bytes) hex += b.toString(16).padStart(2, '0')
  return with0x ? `0x${hex}` : hex
}

/** Convert UTF-8 string to bytes. */
export function utf8ToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s)
}

/** Convert bytes to UTF-8 string. */
export function bytesToUtf8(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes)
}

/** Base64 encode (URL-safe optional, unpadded when URL-safe). */
export function bytesToBase64(bytes: Uint8Array, urlSafe = false): string {
  let b64 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64')
  if (urlSafe) b64 = b64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/g, '')
  return b64
}

/** Base64 decode (URL-safe allowed). */
export function base64ToBytes(b64: string): Uint8Array {
  const norm = b64.replace(/-/g, '+').replace(/_/g, '/')
  const pad = norm.length % 4 === 0 ? '' : '='.repeat(4 - (norm.length % 4))
  return new Uint8Array(Buffer.from(norm + pad, 'base64'))
}

/** Normalize BytesLike into a new Uint8Array (copy). Strings are read as hex. */
export function toBytes(v: BytesLike): Uint8Array {
  if (isUint8Array(v)) return new Uint8Array(v)
  if (v instanceof ArrayBuffer) return new Uint8Array(v.slice(0))
  if (Array.isArray(v)) return new Uint8Array(v)
  if (!isHexString(v)) throw new Error('toBytes: only hex strings are supported')
  return hexToBytes(v)
}

/** Concatenate byte arrays. */
export function concatBytes(parts: ReadonlyArray<Uint8Array>): Uint8Array {
  let len = 0
  for (const p of parts) len += p.length
  const out = new Uint8Array(len)
  let off = 0
  for (const p of parts) {
    out.set(p, off)
    off += p.length
  }
  return out
}

/** Constant-length equality. */
export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  let diff = 0
  for (let i = 0; i < a.length; i++) diff |= a[i] ^ b[i]
  return diff === 0
}

/** Lexicographic comparison (-1, 0, 1). */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length)
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1
}

// ──────────────────────────────────────────────────────────────────────────────
// Varints
// ──────────────────────────────────────────────────────────────────────────────

/** Unsigned LEB128 encode. */
export function encodeUvarint(value: bigint | number): Uint8Array {
  let v = BigInt(value)
  if (v < 0n) throw new RangeError('encodeUvarint: negative value')
  const out: number[] = []
  do {
    let byte = Number(v & 0x7fn)
    v >>= 7n
    if (v !== 0n) byte |= 0x80
    out.push(byte)
  } while (v !== 0n)
  return new Uint8Array(out)
}

/** Unsigned LEB128 decode. Returns the value and the number of bytes consumed. */
export function decodeUvarint(bytes: Uint8Array, offset = 0): { value: bigint; length: number } {
  let result = 0n
  let shift = 0n
  for (let i = offset; i < bytes.length; i++) {
    const b = bytes[i]
    result |= BigInt(b & 0x7f) << shift
    if ((b & 0x80) === 0) return { value: result, length: i - offset + 1 }
    shift += 7n
    if (shift > 63n) break
  }
  throw new RangeError('decodeUvarint: truncated or overlong varint')
}

// ──────────────────────────────────────────────────────────────────────────────
// BigInt ↔ bytes
// ──────────────────────────────────────────────────────────────────────────────

/** Minimal big-endian magnitude bytes (0 → empty). */
export function bigintToBytes(value: bigint): Uint8Array {
  if (value < 0n) throw new RangeError('bigintToBytes: negative value')
  if (value === 0n) return new Uint8Array()
  let hex = value.toString(16)
  if (hex.length % 2) hex = `0${hex}`
  return hexToBytes(hex)
}

/** Big-endian bytes → bigint (empty → 0). */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n
  return BigInt(bytesToHex(bytes, true))
}

/** Fixed-width unsigned 64-bit big-endian encoding. */
export function u64ToBytes(value: bigint): Uint8Array {
  const out = new Uint8Array(8)
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(64, value), false)
  return out
}

/** Cryptographically secure random bytes. */
export function randomBytes(length: number): Uint8Array {
  const out = new Uint8Array(length)
  globalThis.crypto.getRandomValues(out)
  return out
}

export default {
  isUint8Array,
  isHexString,
  strip0x,
  add0x,
  hexToBytes,
  bytesToHex,
  utf8ToBytes,
  bytesToUtf8,
  bytesToBase64,
  base64ToBytes,
  toBytes,
  concatBytes,
  equalBytes,
  compareBytes,
  encodeUvarint,
  decodeUvarint,
  bigintToBytes,
  bytesToBigInt,
  u64ToBytes,
  randomBytes
}
