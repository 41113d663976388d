/**
 * Height selectors for state queries.
 *
 *  - 'committed'  latest finalized block (sent as 0)
 *  - 'pending'    latest state including uncommitted transactions (sent as 2^63 - 1)
 *  - bigint       explicit historical height
 */

import { InvalidCallError } from '../errors'

export type Height = 'committed' | 'pending' | bigint

export const COMMITTED_HEIGHT = 0n
export const PENDING_HEIGHT = 9_223_372_036_854_775_807n

/** Wire value of a height selector. */
export function heightToWire(h: Height): bigint {
  if (h === 'committed') return COMMITTED_HEIGHT
  if (h === 'pending') return PENDING_HEIGHT
  if (h < 0n || h > PENDING_HEIGHT) throw new InvalidCallError(`height out of range: ${h}`, { field: 'height' })
  return h
}

/** Parse `committed`, `pending`, or a non-negative integer. */
export function parseHeight(input: string): Height {
  const s = input.trim().toLowerCase()
  if (s === 'committed' || s === 'pending') return s
  if (/^\d+$/.test(s)) return heightToWire(BigInt(s))
  throw new InvalidCallError(`invalid height "${input}": expected committed, pending or a block number`, {
    field: 'height'
  })
}

export function formatHeight(h: Height): string {
  return typeof h === 'bigint' ? h.toString() : h
}
