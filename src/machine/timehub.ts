/**
 * Timehub handle: append entries and read the log's leaves, count, peaks and root.
 * Peaks and root are computed on chain and returned as CIDs.
 */

import type { CID } from 'multiformats/cid'
import type { PushReturn, TimehubLeaf } from '../query/decode'
import type { Height } from '../query/height'
import type { TxReceipt } from '../tx/broadcast'
import type { SendOptions } from '../tx/send'
import { MachineHandle } from './handle'

export class Timehub extends MachineHandle {
  /** Append a value; in commit mode the receipt carries its index and the new root. */
  async push(value: Uint8Array, opts: SendOptions = {}): Promise<TxReceipt<PushReturn>> {
    return this.client.sender(this.requireSigner()).sendOrThrow({ kind: 'pushEntry', timehub: this.address, value }, opts)
  }

  async leaf(index: bigint, height?: Height): Promise<TimehubLeaf> {
    return this.client.query.timehubLeaf(this.address, index, height)
  }

  async count(height?: Height): Promise<bigint> {
    return this.client.query.timehubCount(this.address, height)
  }

  async peaks(height?: Height): Promise<CID[]> {
    return this.client.query.timehubPeaks(this.address, height)
  }

  async root(height?: Height): Promise<CID> {
    return this.client.query.timehubRoot(this.address, height)
  }
}

export default Timehub
