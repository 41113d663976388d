/**
 * Output shapes shared by commands.
 */

import type { ObjectRecord, ObjectSummary } from '../../query/decode'
import type { TxReceipt } from '../../tx/broadcast'
import { bytesToHex } from '../../utils/bytes'

export function receiptView<T>(receipt: TxReceipt<T>, data?: unknown): Record<string, unknown> {
  return {
    hash: receipt.hash,
    status: receipt.status,
    height: receipt.height,
    gasUsed: receipt.gasUsed,
    ...(data === undefined ? {} : { data })
  }
}

export function objectView(o: ObjectSummary | ObjectRecord): Record<string, unknown> {
  return {
    hash: bytesToHex(o.hash, false),
    ...('recoveryHash' in o ? { recoveryHash: bytesToHex(o.recoveryHash, false) } : {}),
    size: o.size,
    expiry: o.expiry,
    metadata: o.metadata
  }
}
