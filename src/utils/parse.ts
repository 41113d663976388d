/**
 * Parsers for user-supplied values: token amounts, broadcast modes,
 * metadata pairs and integers.
 */

import { InvalidCallError } from '../errors'
import { BROADCAST_MODES, type BroadcastMode } from '../tx/broadcast'

/** Atto units per whole token. */
export const ATTO_PER_TOKEN = 10n ** 18n
const TOKEN_DECIMALS = 18

/** Whole-token decimal string ("1.5") to atto units. */
export function parseTokenAmount(input: string): bigint {
  const s = input.trim()
  const m = /^(\d*)(?:\.(\d*))?$/.exec(s)
  if (!m || s === '' || s === '.') {
    throw new InvalidCallError(`invalid token amount "${input}"`, { field: 'amount' })
  }
  const whole = m[1] ?? ''
  const frac = m[2] ?? ''
  if (frac.length > TOKEN_DECIMALS) {
    throw new InvalidCallError(`token amount "${input}" has more than ${TOKEN_DECIMALS} decimal places`, {
      field: 'amount'
    })
  }
  return BigInt(whole || '0') * ATTO_PER_TOKEN + BigInt(frac.padEnd(TOKEN_DECIMALS, '0') || '0')
}

/** Atto units to a whole-token decimal string without trailing zeros. */
export function formatTokenAmount(atto: bigint): string {
  const negative = atto < 0n
  const abs = negative ? -atto : atto
  const whole = abs / ATTO_PER_TOKEN
  const frac = (abs % ATTO_PER_TOKEN).toString().padStart(TOKEN_DECIMALS, '0').replace(/0+$/, '')
  return `${negative ? '-' : ''}${whole}${frac ? `.${frac}` : ''}`
}

export function parseBroadcastMode(input: string): BroadcastMode {
  const s = input.trim().toLowerCase()
  const mode = BROADCAST_MODES.find((m) => m === s)
  if (!mode) {
    throw new InvalidCallError(`invalid broadcast mode "${input}": expected ${BROADCAST_MODES.join(', ')}`, {
      field: 'broadcastMode'
    })
  }
  return mode
}

/** `KEY=VALUE` pair; the value may contain further `=` signs. */
export function parseMetadataPair(input: string): [string, string] {
  const at = input.indexOf('=')
  if (at <= 0) throw new InvalidCallError(`invalid metadata "${input}": expected KEY=VALUE`, { field: 'metadata' })
  return [input.slice(0, at), input.slice(at + 1)]
}

export function parseMetadata(pairs: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {}
  for (const p of pairs) {
    const [k, v] = parseMetadataPair(p)
    out[k] = v
  }
  return out
}

/** Metadata update: `KEY=VALUE` sets, `KEY` or `KEY=` removes. */
export function parseMetadataUpdate(pairs: readonly string[]): Record<string, string | null> {
  const out: Record<string, string | null> = {}
  for (const p of pairs) {
    if (!p.includes('=')) {
      if (p === '') throw new InvalidCallError('empty metadata key', { field: 'metadata' })
      out[p] = null
      continue
    }
    const [k, v] = parseMetadataPair(p)
    out[k] = v === '' ? null : v
  }
  return out
}

/** Non-negative integer as bigint. */
export function parseUint(input: string, field: string): bigint {
  const s = input.trim()
  if (!/^\d+$/.test(s)) throw new InvalidCallError(`invalid ${field} "${input}": expected a non-negative integer`, { field })
  return BigInt(s)
}

/** Non-negative safe integer as number. */
export function parseCount(input: string, field: string): number {
  const n = parseUint(input, field)
  if (n > BigInt(Number.MAX_SAFE_INTEGER)) throw new InvalidCallError(`${field} is too large`, { field })
  return Number(n)
}
