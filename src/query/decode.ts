/**
 * Decoders for actor return values and query payloads.
 *
 * Every decoder takes raw CBOR bytes (or an already decoded value) and
 * narrows it into a typed record, raising DecodeError with the failing path.
 */

import type { CID } from 'multiformats/cid'
import { Address } from '../address'
import { DecodeError } from '../errors'
import {
  decodeCbor,
  readArray,
  readBigInt,
  readBytes,
  readCid,
  readNumber,
  readOptional,
  readString,
  readStringMap
} from '../utils/cbor'
import { decodeTokenAmount } from '../tx/message'

// ──────────────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────────────

export type MachineKind = 'Bucket' | 'Timehub'
export type WriteAccess = 'OnlyOwner' | 'Public'
export type Metadata = Record<string, string>

export interface ActorState {
  code: CID
  state: CID
  sequence: bigint
  balance: bigint
  delegatedAddress: Address | null
}

/** Stored object as returned by a point lookup. */
export interface ObjectRecord {
  hash: Uint8Array
  recoveryHash: Uint8Array
  size: bigint
  expiry: bigint
  metadata: Metadata
}

/** Stored object as it appears in a listing. */
export interface ObjectSummary {
  hash: Uint8Array
  size: bigint
  expiry: bigint
  metadata: Metadata
}

export interface ObjectPage {
  objects: Array<{ key: Uint8Array; object: ObjectSummary }>
  commonPrefixes: Uint8Array[]
  nextKey: Uint8Array | null
}

export interface MachineMetadata {
  kind: MachineKind
  owner: Address
  metadata: Metadata
}

export interface MachineListing {
  kind: MachineKind
  address: Address
  metadata: Metadata
}

export interface CreatedMachine {
  actorId: bigint
  address: Address
  robustAddress: Address | null
}

export interface TimehubLeaf {
  timestamp: bigint
  value: Uint8Array
}

export interface PushReturn {
  root: CID
  index: bigint
}

/** Storage credit held by one account. */
export interface CreditAccount {
  creditFree: bigint
  creditCommitted: bigint
  /** Epoch of the last debit; null before the first one. */
  lastDebitEpoch: bigint | null
}

/** Subnet-wide credit totals. */
export interface CreditStats {
  /** Tokens paid to the blobs actor (atto). */
  balance: bigint
  creditSold: bigint
  creditCommitted: bigint
  creditDebited: bigint
  /** Credits debited per byte per block. */
  creditDebitRate: bigint
  numAccounts: bigint
}

/** Permission for one account to spend another's credit. */
export interface CreditApproval {
  /** Most credit the receiver may commit; null for no limit. */
  limit: bigint | null
  /** Block after which the approval lapses; null for never. */
  expiry: bigint | null
  committed: bigint
}

export type BlobStatus = 'Pending' | 'Resolved' | 'Failed'

/** Outcome of a read-only call evaluated by the node. */
export interface DeliveryRecord {
  exitCode: number
  data: Uint8Array
  info: string
  gasUsed: bigint
}

export interface GasEstimate {
  exitCode: number
  info: string
  returnData: Uint8Array
  gasLimit: bigint
}

export interface StateParams {
  baseFee: bigint
  circulatingSupply: bigint
  chainId: bigint
  networkVersion: number
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

export function readMachineKind(v: unknown, path: string): MachineKind {
  const s = readString(v, path)
  if (s === 'Bucket' || s === 'Timehub') return s
  throw new DecodeError(`${path}: unknown machine kind "${s}"`)
}

function readAddress(v: unknown, path: string): Address {
  return Address.fromBytes(readBytes(v, path))
}

// ──────────────────────────────────────────────────────────────────────────────
// Chain state
// ──────────────────────────────────────────────────────────────────────────────

export function decodeActorState(bytes: Uint8Array): ActorState {
  const t = readArray(decodeCbor(bytes), 'actor', 5)
  return {
    code: readCid(t[0], 'actor.code'),
    state: readCid(t[1], 'actor.state'),
    sequence: readBigInt(t[2], 'actor.sequence'),
    balance: decodeTokenAmount(readBytes(t[3], 'actor.balance')),
    delegatedAddress: readOptional(t[4], (v) => readAddress(v, 'actor.delegated_address'))
  }
}

export function decodeDeliveryRecord(bytes: Uint8Array): DeliveryRecord {
  const t = readArray(decodeCbor(bytes), 'delivery', 4)
  return {
    exitCode: readNumber(t[0], 'delivery.exit_code'),
    data: readBytes(t[1], 'delivery.data'),
    info: readString(t[2], 'delivery.info'),
    gasUsed: readBigInt(t[3], 'delivery.gas_used')
  }
}

export function decodeGasEstimate(bytes: Uint8Array): GasEstimate {
  const t = readArray(decodeCbor(bytes), 'estimate', 4)
  return {
    exitCode: readNumber(t[0], 'estimate.exit_code'),
    info: readString(t[1], 'estimate.info'),
    returnData: readBytes(t[2], 'estimate.return_data'),
    gasLimit: readBigInt(t[3], 'estimate.gas_limit')
  }
}

export function decodeStateParams(bytes: Uint8Array): StateParams {
  const t = readArray(decodeCbor(bytes), 'state_params', 4)
  return {
    baseFee: decodeTokenAmount(readBytes(t[0], 'state_params.base_fee')),
    circulatingSupply: decodeTokenAmount(readBytes(t[1], 'state_params.circ_supply')),
    chainId: readBigInt(t[2], 'state_params.chain_id'),
    networkVersion: readNumber(t[3], 'state_params.network_version')
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Machines
// ──────────────────────────────────────────────────────────────────────────────

export function decodeMachineMetadata(bytes: Uint8Array): MachineMetadata {
  const t = readArray(decodeCbor(bytes), 'machine', 3)
  return {
    kind: readMachineKind(t[0], 'machine.kind'),
    owner: readAddress(t[1], 'machine.owner'),
    metadata: readStringMap(t[2], 'machine.metadata')
  }
}

export function decodeMachineList(bytes: Uint8Array): MachineListing[] {
  return readArray(decodeCbor(bytes), 'machines').map((item, i) => {
    const t = readArray(item, `machines[${i}]`, 3)
    return {
      kind: readMachineKind(t[0], `machines[${i}].kind`),
      address: readAddress(t[1], `machines[${i}].address`),
      metadata: readStringMap(t[2], `machines[${i}].metadata`)
    }
  })
}

export function decodeCreatedMachine(bytes: Uint8Array): CreatedMachine {
  const t = readArray(decodeCbor(bytes), 'create', 2)
  const actorId = readBigInt(t[0], 'create.actor_id')
  return {
    actorId,
    address: Address.fromId(actorId),
    robustAddress: readOptional(t[1], (v) => readAddress(v, 'create.robust_address'))
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Buckets
// ──────────────────────────────────────────────────────────────────────────────

function readObjectRecord(v: unknown): ObjectRecord {
  const t = readArray(v, 'object', 5)
  return {
    hash: readBytes(t[0], 'object.hash'),
    recoveryHash: readBytes(t[1], 'object.recovery_hash'),
    size: readBigInt(t[2], 'object.size'),
    expiry: readBigInt(t[3], 'object.expiry'),
    metadata: readStringMap(t[4], 'object.metadata')
  }
}

export function decodeObjectRecord(bytes: Uint8Array): ObjectRecord {
  return readObjectRecord(decodeCbor(bytes))
}

export function decodeOptionalObject(bytes: Uint8Array): ObjectRecord | null {
  return readOptional(decodeCbor(bytes), readObjectRecord)
}

export function decodeObjectPage(bytes: Uint8Array): ObjectPage {
  const t = readArray(decodeCbor(bytes), 'list', 3)
  const objects = readArray(t[0], 'list.objects').map((item, i) => {
    const pair = readArray(item, `list.objects[${i}]`, 2)
    const s = readArray(pair[1], `list.objects[${i}].state`, 4)
    return {
      key: readBytes(pair[0], `list.objects[${i}].key`),
      object: {
        hash: readBytes(s[0], `list.objects[${i}].hash`),
        size: readBigInt(s[1], `list.objects[${i}].size`),
        expiry: readBigInt(s[2], `list.objects[${i}].expiry`),
        metadata: readStringMap(s[3], `list.objects[${i}].metadata`)
      }
    }
  })
  return {
    objects,
    commonPrefixes: readArray(t[1], 'list.common_prefixes').map((p, i) => readBytes(p, `list.common_prefixes[${i}]`)),
    nextKey: readOptional(t[2], (v) => readBytes(v, 'list.next_key'))
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Credits & blobs
// ──────────────────────────────────────────────────────────────────────────────

export const EMPTY_CREDIT_ACCOUNT: Readonly<CreditAccount> = Object.freeze({
  creditFree: 0n,
  creditCommitted: 0n,
  lastDebitEpoch: null
})

function readCreditAccount(v: unknown): CreditAccount {
  const t = readArray(v, 'credit_account', 3)
  const epoch = readBigInt(t[2], 'credit_account.last_debit_epoch')
  return {
    creditFree: readBigInt(t[0], 'credit_account.credit_free'),
    creditCommitted: readBigInt(t[1], 'credit_account.credit_committed'),
    lastDebitEpoch: epoch === 0n ? null : epoch
  }
}

export function decodeCreditAccount(bytes: Uint8Array): CreditAccount {
  return readCreditAccount(decodeCbor(bytes))
}

export function decodeOptionalCreditAccount(bytes: Uint8Array): CreditAccount | null {
  return readOptional(decodeCbor(bytes), readCreditAccount)
}

export function decodeCreditStats(bytes: Uint8Array): CreditStats {
  const t = readArray(decodeCbor(bytes), 'credit_stats', 6)
  return {
    balance: decodeTokenAmount(readBytes(t[0], 'credit_stats.balance')),
    creditSold: readBigInt(t[1], 'credit_stats.credit_sold'),
    creditCommitted: readBigInt(t[2], 'credit_stats.credit_committed'),
    creditDebited: readBigInt(t[3], 'credit_stats.credit_debited'),
    creditDebitRate: readBigInt(t[4], 'credit_stats.credit_debit_rate'),
    numAccounts: readBigInt(t[5], 'credit_stats.num_accounts')
  }
}

function readCreditApproval(v: unknown): CreditApproval {
  const t = readArray(v, 'approval', 3)
  return {
    limit: readOptional(t[0], (x) => readBigInt(x, 'approval.limit')),
    expiry: readOptional(t[1], (x) => readBigInt(x, 'approval.expiry')),
    committed: readBigInt(t[2], 'approval.committed')
  }
}

export function decodeCreditApproval(bytes: Uint8Array): CreditApproval {
  return readCreditApproval(decodeCbor(bytes))
}

export function decodeOptionalCreditApproval(bytes: Uint8Array): CreditApproval | null {
  return readOptional(decodeCbor(bytes), readCreditApproval)
}

export function decodeBlobStatus(bytes: Uint8Array): BlobStatus | null {
  return readOptional(decodeCbor(bytes), (v) => {
    const s = readString(v, 'blob_status')
    if (s === 'Pending' || s === 'Resolved' || s === 'Failed') return s
    throw new DecodeError(`blob_status: unknown status "${s}"`)
  })
}

// ──────────────────────────────────────────────────────────────────────────────
// Timehubs
// ──────────────────────────────────────────────────────────────────────────────

export function decodeTimehubLeaf(bytes: Uint8Array): TimehubLeaf | null {
  return readOptional(decodeCbor(bytes), (v) => {
    const t = readArray(v, 'leaf', 2)
    const raw = t[1]
    return {
      timestamp: readBigInt(t[0], 'leaf.timestamp'),
      value: raw instanceof Uint8Array ? raw : readCid(raw, 'leaf.value').bytes
    }
  })
}

export function decodePushReturn(bytes: Uint8Array): PushReturn {
  const t = readArray(decodeCbor(bytes), 'push', 2)
  return { root: readCid(t[0], 'push.root'), index: readBigInt(t[1], 'push.index') }
}

export function decodeCount(bytes: Uint8Array): bigint {
  return readBigInt(decodeCbor(bytes), 'count')
}

export function decodeCid(bytes: Uint8Array): CID {
  return readCid(decodeCbor(bytes), 'cid')
}

export function decodeCidList(bytes: Uint8Array): CID[] {
  return readArray(decodeCbor(bytes), 'peaks').map((v, i) => readCid(v, `peaks[${i}]`))
}
