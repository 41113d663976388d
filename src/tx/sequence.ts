/**
 * Per-account sequence tracking.
 *
 * The first use of an account reads its on-chain sequence (pending height) as
 * the baseline; later allocations hand out baseline + issued, where issued
 * counts reservations made since that read. Reservations for one account are
 * serialized through a keyed mutex, so concurrent senders never share a
 * sequence; the lock covers only the read and the increment, never a
 * broadcast. The cache is advisory: a sequence the chain never used, or a
 * mismatch it reported, drops it and the next reservation reads the chain
 * again.
 */

import type { Address } from '../address'
import type { Height } from '../query/height'
import { createLogger, type Logger } from '../utils/logger'
import { KeyedMutex } from '../utils/mutex'

/** Where baselines come from (the query engine in practice). */
export interface SequenceSource {
  actorState(address: Address, height?: Height): Promise<{ sequence: bigint } | null>
}

interface Entry {
  baseline: bigint
  issued: bigint
}

export class SequenceTracker {
  private source: SequenceSource
  private mutex = new KeyedMutex()
  private cache = new Map<string, Entry>()
  private log: Logger

  constructor(source: SequenceSource, opts?: { logger?: Logger }) {
    this.source = source
    this.log = opts?.logger ?? createLogger('vaultline:sequence')
  }

  /** Next sequence for the account, without reserving it. */
  async next(address: Address): Promise<bigint> {
    return this.mutex.run(address.key(), async () => {
      const e = await this.entry(address)
      return e.baseline + e.issued
    })
  }

  /** Reserve the next sequence for a transaction that will be sent later. */
  async reserve(address: Address): Promise<bigint> {
    return this.mutex.run(address.key(), async () => {
      const e = await this.entry(address)
      const seq = e.baseline + e.issued
      e.issued += 1n
      return seq
    })
  }

  /** Forget the cached baseline; the next allocation reads the chain. */
  invalidate(address: Address): void {
    this.cache.delete(address.key())
  }

  /** Cached state, for diagnostics. */
  peek(address: Address): Readonly<Entry> | undefined {
    return this.cache.get(address.key())
  }

  private async entry(address: Address): Promise<Entry> {
    const key = address.key()
    const cached = this.cache.get(key)
    if (cached) return cached
    const state = await this.source.actorState(address, 'pending')
    const e: Entry = { baseline: state?.sequence ?? 0n, issued: 0n }
    this.log.debug('sequence baseline', { address: address.toString(), sequence: e.baseline })
    this.cache.set(key, e)
    return e
  }
}

export default SequenceTracker
