/**
 * Typed calls: the transactions an account can issue, as a tagged union.
 *
 * Each variant carries only its own fields. `validateCall` checks call-specific
 * constraints before anything touches the network; `resolveCall` turns a call
 * into the target actor, method number, value and encoded params; and
 * `decodeCallReturn` reads the committed return payload into the variant's
 * result type.
 */

import type { Address } from '../address'
import { InvalidCallError, PayloadTooLargeError } from '../errors'
import { utf8ToBytes } from '../utils/bytes'
import { encodeCbor } from '../utils/cbor'
import {
  decodeCreatedMachine,
  decodeCreditAccount,
  decodeCreditApproval,
  decodeObjectRecord,
  decodePushReturn,
  type CreatedMachine,
  type CreditAccount,
  type CreditApproval,
  type MachineKind,
  type Metadata,
  type ObjectRecord,
  type PushReturn,
  type WriteAccess
} from '../query/decode'
import { BLOBS_ACTOR, MACHINE_MANAGER_ACTOR, METHOD_SEND, Method } from './methods'

// ──────────────────────────────────────────────────────────────────────────────
// Limits
// ──────────────────────────────────────────────────────────────────────────────

/** Largest timehub entry (500 KiB). */
export const MAX_PUSH_SIZE = 500 * 1024
/** Largest bucket object (5 GB). */
export const MAX_OBJECT_SIZE = 5_000_000_000n
export const MAX_METADATA_ENTRIES = 20
export const MAX_METADATA_KEY_SIZE = 32
export const MAX_METADATA_VALUE_SIZE = 128

// ──────────────────────────────────────────────────────────────────────────────
// Variants
// ──────────────────────────────────────────────────────────────────────────────

export interface DepositCall {
  kind: 'deposit'
  amount: bigint
  /** Recipient on the subnet; defaults to the sender. */
  to?: Address
}

export interface WithdrawCall {
  kind: 'withdraw'
  amount: bigint
  /** Recipient on the parent chain; defaults to the sender. */
  to?: Address
}

export interface TransferCall {
  kind: 'transfer'
  amount: bigint
  to: Address
}

export interface CreateMachineCall {
  kind: 'createMachine'
  machine: MachineKind
  /** Defaults to the sender. */
  owner?: Address
  writeAccess?: WriteAccess
  metadata?: Metadata
}

export interface AddObjectCall {
  kind: 'addObject'
  bucket: Address
  key: string
  /** Node id of the object API that staged the content. */
  source: Uint8Array
  /** blake3 of the content. */
  hash: Uint8Array
  recoveryHash: Uint8Array
  size: bigint
  /** Lifetime in blocks; null uses the bucket default. */
  ttl?: bigint | null
  metadata?: Metadata
  overwrite?: boolean
}

export interface DeleteObjectCall {
  kind: 'deleteObject'
  bucket: Address
  key: string
}

export interface UpdateObjectMetadataCall {
  kind: 'updateObjectMetadata'
  bucket: Address
  key: string
  /** A null value deletes the entry. */
  metadata: Record<string, string | null>
}

export interface PushEntryCall {
  kind: 'pushEntry'
  timehub: Address
  value: Uint8Array
}

export interface BuyCreditCall {
  kind: 'buyCredit'
  /** Tokens to spend (atto). */
  amount: bigint
  /** Account credited; defaults to the sender. */
  recipient?: Address
}

export interface ApproveCreditCall {
  kind: 'approveCredit'
  receiver: Address
  /** Restricts use of the approval to calls made through this actor, e.g. a bucket. */
  caller?: Address
  /** Most credit the receiver may commit. */
  limit?: bigint
  /** Lifetime in blocks. */
  ttl?: bigint
}

export interface RevokeCreditCall {
  kind: 'revokeCredit'
  receiver: Address
  caller?: Address
}

export type Call =
  | DepositCall
  | WithdrawCall
  | TransferCall
  | CreateMachineCall
  | AddObjectCall
  | DeleteObjectCall
  | UpdateObjectMetadataCall
  | PushEntryCall
  | BuyCreditCall
  | ApproveCreditCall
  | RevokeCreditCall

export type CallKind = Call['kind']

/** Result decoded from a committed call of each kind. */
export interface CallReturnMap {
  deposit: null
  withdraw: null
  transfer: null
  createMachine: CreatedMachine
  addObject: ObjectRecord
  deleteObject: null
  updateObjectMetadata: null
  pushEntry: PushReturn
  buyCredit: CreditAccount
  approveCredit: CreditApproval
  revokeCredit: null
}

/** Target, method and payload of a call. */
export interface ResolvedCall {
  to: Address
  method: bigint
  value: bigint
  params: Uint8Array
}

export interface CallContext {
  sender: Address
  /** Subnet gateway actor, target of deposits and withdrawals. */
  gateway: Address
}

// ──────────────────────────────────────────────────────────────────────────────
// Validation
// ──────────────────────────────────────────────────────────────────────────────

function requirePositive(amount: bigint): void {
  if (amount <= 0n) throw new InvalidCallError(`amount must be positive, got ${amount}`, { field: 'amount' })
}

function requireKey(key: string): void {
  if (key.length === 0) throw new InvalidCallError('object key must not be empty', { field: 'key' })
}

/** Check metadata limits; `allowDelete` admits null values (update calls). */
export function validateMetadata(metadata: Record<string, string | null>, allowDelete = false): void {
  const entries = Object.entries(metadata)
  if (entries.length > MAX_METADATA_ENTRIES) {
    throw new InvalidCallError(`at most ${MAX_METADATA_ENTRIES} metadata entries are allowed`, { field: 'metadata' })
  }
  for (const [key, value] of entries) {
    const keySize = utf8ToBytes(key).length
    if (keySize === 0 || keySize > MAX_METADATA_KEY_SIZE) {
      throw new InvalidCallError(`metadata key "${key}" must be 1 to ${MAX_METADATA_KEY_SIZE} bytes`, {
        field: 'metadata'
      })
    }
    if (value === null) {
      if (!allowDelete) throw new InvalidCallError(`metadata value for "${key}" is missing`, { field: 'metadata' })
      continue
    }
    const valueSize = utf8ToBytes(value).length
    if (valueSize === 0 || valueSize > MAX_METADATA_VALUE_SIZE) {
      throw new InvalidCallError(`metadata value for "${key}" must be 1 to ${MAX_METADATA_VALUE_SIZE} bytes`, {
        field: 'metadata'
      })
    }
  }
}

function requireHash(hash: Uint8Array, field: string): void {
  if (hash.length !== 32) throw new InvalidCallError(`${field} must be 32 bytes`, { field })
}

/** Call-specific checks; raised before any network access. */
export function validateCall(call: Call): void {
  switch (call.kind) {
    case 'deposit':
    case 'withdraw':
    case 'transfer':
    case 'buyCredit':
      requirePositive(call.amount)
      return
    case 'approveCredit':
      if (call.limit !== undefined && call.limit <= 0n) {
        throw new InvalidCallError('credit limit must be positive', { field: 'limit' })
      }
      if (call.ttl !== undefined && call.ttl <= 0n) throw new InvalidCallError('ttl must be positive', { field: 'ttl' })
      return
    case 'revokeCredit':
      return
    case 'createMachine':
      if (call.writeAccess === 'Public' && call.machine !== 'Timehub') {
        throw new InvalidCallError('public write access is only available for timehubs', { field: 'writeAccess' })
      }
      validateMetadata(call.metadata ?? {})
      return
    case 'addObject':
      requireKey(call.key)
      requireHash(call.hash, 'hash')
      requireHash(call.recoveryHash, 'recoveryHash')
      requireHash(call.source, 'source')
      if (call.size < 0n) throw new InvalidCallError('object size must not be negative', { field: 'size' })
      if (call.size > MAX_OBJECT_SIZE) {
        throw new PayloadTooLargeError(Number(call.size), Number(MAX_OBJECT_SIZE), { field: 'size' })
      }
      if (call.ttl != null && call.ttl <= 0n) throw new InvalidCallError('ttl must be positive', { field: 'ttl' })
      validateMetadata(call.metadata ?? {})
      return
    case 'deleteObject':
      requireKey(call.key)
      return
    case 'updateObjectMetadata':
      requireKey(call.key)
      validateMetadata(call.metadata, true)
      return
    case 'pushEntry':
      if (call.value.length > MAX_PUSH_SIZE) {
        throw new PayloadTooLargeError(call.value.length, MAX_PUSH_SIZE, { field: 'value' })
      }
      return
    default:
      return assertNever(call)
  }
}

function assertNever(x: never): never {
  throw new InvalidCallError(`unknown call ${JSON.stringify(x)}`)
}

// ──────────────────────────────────────────────────────────────────────────────
// Encoding
// ──────────────────────────────────────────────────────────────────────────────

const EMPTY = new Uint8Array()

/** Target actor, method, value and CBOR params for a call. */
export function resolveCall(call: Call, ctx: CallContext): ResolvedCall {
  switch (call.kind) {
    case 'deposit':
      return {
        to: ctx.gateway,
        method: Method.Fund,
        value: call.amount,
        params: encodeCbor([(call.to ?? ctx.sender).bytes])
      }
    case 'withdraw':
      return {
        to: ctx.gateway,
        method: Method.Release,
        value: call.amount,
        params: encodeCbor([(call.to ?? ctx.sender).bytes])
      }
    case 'transfer':
      return { to: call.to, method: METHOD_SEND, value: call.amount, params: EMPTY }
    case 'createMachine':
      return {
        to: MACHINE_MANAGER_ACTOR,
        method: Method.CreateExternal,
        value: 0n,
        params: encodeCbor([
          (call.owner ?? ctx.sender).bytes,
          call.machine,
          call.writeAccess ?? 'OnlyOwner',
          call.metadata ?? {}
        ])
      }
    case 'addObject':
      return {
        to: call.bucket,
        method: Method.AddObject,
        value: 0n,
        params: encodeCbor([
          call.source,
          utf8ToBytes(call.key),
          call.hash,
          call.recoveryHash,
          call.size,
          call.ttl ?? null,
          call.metadata ?? {},
          call.overwrite ?? false
        ])
      }
    case 'deleteObject':
      return { to: call.bucket, method: Method.DeleteObject, value: 0n, params: encodeCbor(utf8ToBytes(call.key)) }
    case 'updateObjectMetadata':
      return {
        to: call.bucket,
        method: Method.UpdateObjectMetadata,
        value: 0n,
        params: encodeCbor([utf8ToBytes(call.key), call.metadata])
      }
    case 'pushEntry':
      return { to: call.timehub, method: Method.Push, value: 0n, params: encodeCbor(call.value) }
    case 'buyCredit':
      return {
        to: BLOBS_ACTOR,
        method: Method.BuyCredit,
        value: call.amount,
        params: encodeCbor([(call.recipient ?? ctx.sender).bytes])
      }
    case 'approveCredit':
      return {
        to: BLOBS_ACTOR,
        method: Method.ApproveCredit,
        value: 0n,
        params: encodeCbor([
          ctx.sender.bytes,
          call.receiver.bytes,
          call.caller?.bytes ?? null,
          call.limit ?? null,
          call.ttl ?? null
        ])
      }
    case 'revokeCredit':
      return {
        to: BLOBS_ACTOR,
        method: Method.RevokeCredit,
        value: 0n,
        params: encodeCbor([ctx.sender.bytes, call.receiver.bytes, call.caller?.bytes ?? null])
      }
    default:
      return assertNever(call)
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Return values
// ──────────────────────────────────────────────────────────────────────────────

const none = (): null => null

const RETURN_DECODERS: { [K in CallKind]: (data: Uint8Array) => CallReturnMap[K] } = {
  deposit: none,
  withdraw: none,
  transfer: none,
  createMachine: decodeCreatedMachine,
  addObject: decodeObjectRecord,
  deleteObject: none,
  updateObjectMetadata: none,
  pushEntry: decodePushReturn,
  buyCredit: decodeCreditAccount,
  approveCredit: decodeCreditApproval,
  revokeCredit: none
}

/** Decode the CBOR return payload of a committed call. */
export function decodeCallReturn<K extends CallKind>(kind: K, data: Uint8Array): CallReturnMap[K] {
  const decode: (data: Uint8Array) => CallReturnMap[K] = RETURN_DECODERS[kind]
  return decode(data)
}

export default { validateCall, validateMetadata, resolveCall, decodeCallReturn }
