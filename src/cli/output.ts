/**
 * CLI output: pretty JSON with chain types rendered as strings.
 *   bigint → decimal string, bytes → base64, Address → text form, CID → string
 */

import { CID } from 'multiformats/cid'
import { Address, type Network } from '../address'
import { bytesToBase64 } from '../utils/bytes'

/** JSON-safe copy of a value. */
export function toPlain(value: unknown, network: Network = 'testnet'): unknown {
  if (typeof value === 'bigint') return value.toString()
  if (value instanceof Uint8Array) return bytesToBase64(value)
  if (value instanceof Address) return value.toString(network)
  const cid = CID.asCID(value)
  if (cid) return cid.toString()
  if (Array.isArray(value)) return value.map((v) => toPlain(v, network))
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) out[k] = toPlain(v, network)
    }
    return out
  }
  return value
}

export function renderJson(value: unknown, network?: Network): string {
  return `${JSON.stringify(toPlain(value, network), null, 2)}\n`
}
