/**
 * Query engine: read-only state lookups at a chosen height.
 *
 * Application queries travel as `abci_query` with a CBOR-encoded request:
 *   { "ActorState": <address bytes> }      actor record or not-found (code 17)
 *   { "Call": <message tuple> }            read-only call, returns a delivery record
 *   { "EstimateGas": <message tuple> }     gas estimate
 *   "StateParams"                          base fee, supply, chain id, network version
 *
 * Credit and blob reads are calls to the blobs actor.
 *
 * Object content comes from the object API; the parent-chain balance from the
 * parent's EVM JSON-RPC endpoint when one is configured. Nothing here mutates
 * local or remote state.
 */

import type { CID } from 'multiformats/cid'
import type { Address } from '../address'
import { ConfigError, DecodeError, IndexOutOfRangeError, InvalidCallError, NotFoundError, RpcError } from '../errors'
import type { CometClient, RequestOptions, RpcTransport } from '../rpc'
import type { ObjectClient } from '../object/client'
import { bytesToUtf8, compareBytes, equalBytes, utf8ToBytes } from '../utils/bytes'
import { encodeCbor } from '../utils/cbor'
import { blake3 } from '../utils/hash'
import { createLogger, type Logger } from '../utils/logger'
import { localMessage, messageToTuple, type Message } from '../tx/message'
import { BLOBS_ACTOR, MACHINE_MANAGER_ACTOR, Method } from '../tx/methods'
import {
  EMPTY_CREDIT_ACCOUNT,
  decodeActorState,
  decodeBlobStatus,
  decodeCid,
  decodeCidList,
  decodeCount,
  decodeCreditStats,
  decodeDeliveryRecord,
  decodeGasEstimate,
  decodeMachineList,
  decodeMachineMetadata,
  decodeObjectPage,
  decodeOptionalCreditAccount,
  decodeOptionalCreditApproval,
  decodeOptionalObject,
  decodeStateParams,
  decodeTimehubLeaf,
  type ActorState,
  type BlobStatus,
  type CreditAccount,
  type CreditApproval,
  type CreditStats,
  type MachineKind,
  type MachineListing,
  type Metadata,
  type ObjectRecord,
  type ObjectPage,
  type ObjectSummary,
  type StateParams,
  type TimehubLeaf
} from './decode'
import { heightToWire, type Height } from './height'
import { listKeys, MAX_LIST_LIMIT, normalizeListQuery, type ListQuery } from './listing'
import { parseRangeSpec, resolveRange } from './range'

/** Exit codes that mean the target actor or record does not exist. */
export const EXIT_SYS_INVALID_RECEIVER = 6
export const EXIT_USR_NOT_FOUND = 17

export interface AccountInfo {
  address: Address
  sequence: bigint
  balance: bigint
  /** Balance on the parent chain; null when no parent endpoint is configured. */
  parentBalance: bigint | null
}

export interface MachineInfo {
  address: Address
  kind: MachineKind
  owner: Address
  metadata: Metadata
}

export interface BucketListing {
  objects: Array<{ key: string; object: ObjectSummary }>
  commonPrefixes: string[]
}

export interface ObjectGetOptions {
  /** Range string: start-end, start- or -n. */
  range?: string
  height?: Height
  /** Compare the blake3 of the full content with the stored hash. */
  verify?: boolean
  signal?: AbortSignal
}

export interface QueryEngineOptions {
  objects?: ObjectClient
  /** EVM JSON-RPC of the parent chain. */
  parent?: RpcTransport
  logger?: Logger
}

export class QueryEngine {
  readonly node: CometClient
  private objects?: ObjectClient
  private parent?: RpcTransport
  private log: Logger

  constructor(node: CometClient, opts?: QueryEngineOptions) {
    this.node = node
    this.objects = opts?.objects
    this.parent = opts?.parent
    this.log = opts?.logger ?? createLogger('vaultline:query')
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Primitives
  // ──────────────────────────────────────────────────────────────────────────

  /** Actor record, or null when no actor exists at the address. */
  async actorState(address: Address, height: Height = 'committed', opts?: RequestOptions): Promise<ActorState | null> {
    const res = await this.node.abciQuery(encodeCbor({ ActorState: address.bytes }), heightToWire(height), opts)
    if (res.code === EXIT_USR_NOT_FOUND) return null
    if (res.code !== 0) throw queryFailure('ActorState', res)
    if (res.value.length === 0) return null
    return decodeActorState(res.value)
  }

  /** Evaluate a read-only message and return its CBOR return data. */
  async call(message: Message, height: Height = 'committed', opts?: RequestOptions): Promise<Uint8Array> {
    const res = await this.node.abciQuery(encodeCbor({ Call: messageToTuple(message) }), heightToWire(height), opts)
    if (res.code === EXIT_USR_NOT_FOUND || res.code === EXIT_SYS_INVALID_RECEIVER) {
      throw notFound(message.to, res.info || res.log)
    }
    if (res.code !== 0) throw queryFailure('Call', res)
    const delivery = decodeDeliveryRecord(res.value)
    if (delivery.exitCode === EXIT_USR_NOT_FOUND || delivery.exitCode === EXIT_SYS_INVALID_RECEIVER) {
      throw notFound(message.to, delivery.info)
    }
    if (delivery.exitCode !== 0) {
      throw new RpcError('Call', `call to ${message.to.toString()} failed with exit code ${delivery.exitCode}: ${delivery.info}`, {
        code: delivery.exitCode
      })
    }
    return delivery.data
  }

  /** Gas the message is expected to use. */
  async estimateGas(message: Message, height: Height = 'pending', opts?: RequestOptions): Promise<bigint> {
    const res = await this.node.abciQuery(encodeCbor({ EstimateGas: messageToTuple(message) }), heightToWire(height), opts)
    if (res.code !== 0) throw queryFailure('EstimateGas', res)
    const estimate = decodeGasEstimate(res.value)
    if (estimate.exitCode !== 0) {
      throw new RpcError('EstimateGas', `gas estimation failed with exit code ${estimate.exitCode}: ${estimate.info}`, {
        code: estimate.exitCode
      })
    }
    return estimate.gasLimit
  }

  async stateParams(height: Height = 'committed', opts?: RequestOptions): Promise<StateParams> {
    const res = await this.node.abciQuery(encodeCbor('StateParams'), heightToWire(height), opts)
    if (res.code !== 0) throw queryFailure('StateParams', res)
    return decodeStateParams(res.value)
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Accounts & machines
  // ──────────────────────────────────────────────────────────────────────────

  /** Sequence and balances; an account the chain has never seen reads as zero. */
  async accountInfo(address: Address, height: Height = 'committed'): Promise<AccountInfo> {
    const [state, parentBalance] = await Promise.all([this.actorState(address, height), this.parentBalance(address)])
    return {
      address: state?.delegatedAddress ?? address,
      sequence: state?.sequence ?? 0n,
      balance: state?.balance ?? 0n,
      parentBalance
    }
  }

  /** Balance on the parent chain, or null without a parent endpoint or 0x form. */
  async parentBalance(address: Address): Promise<bigint | null> {
    const eth = address.toEthAddress()
    if (!this.parent || !eth) return null
    const raw = await this.parent.request('eth_getBalance', [eth, 'latest'])
    if (typeof raw !== 'string' || !/^0x[0-9a-fA-F]*$/.test(raw)) {
      throw new DecodeError(`eth_getBalance: expected a hex quantity, got ${JSON.stringify(raw)}`)
    }
    return raw === '0x' ? 0n : BigInt(raw)
  }

  async machineInfo(address: Address, height: Height = 'committed'): Promise<MachineInfo> {
    const data = await this.call(localMessage(address, Method.GetMetadata), height)
    const meta = decodeMachineMetadata(data)
    return { address, ...meta }
  }

  async listMachines(owner: Address, height: Height = 'committed'): Promise<MachineListing[]> {
    const data = await this.call(localMessage(MACHINE_MANAGER_ACTOR, Method.ListMetadata, encodeCbor([owner.bytes])), height)
    return decodeMachineList(data)
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Credits & blobs
  // ──────────────────────────────────────────────────────────────────────────

  async creditStats(height: Height = 'committed'): Promise<CreditStats> {
    return decodeCreditStats(await this.call(localMessage(BLOBS_ACTOR, Method.GetStats), height))
  }

  /** Credit held by an account; one that never bought any reads as zero. */
  async creditBalance(address: Address, height: Height = 'committed'): Promise<CreditAccount> {
    const data = await this.call(localMessage(BLOBS_ACTOR, Method.GetAccount, encodeCbor([address.bytes])), height)
    return decodeOptionalCreditAccount(data) ?? { ...EMPTY_CREDIT_ACCOUNT }
  }

  /** Approval granted by `from` to `receiver`, optionally scoped to a caller; null when none exists. */
  async creditApproval(
    from: Address,
    receiver: Address,
    caller: Address | null = null,
    height: Height = 'committed'
  ): Promise<CreditApproval | null> {
    const params = encodeCbor([from.bytes, receiver.bytes, caller?.bytes ?? null])
    return decodeOptionalCreditApproval(await this.call(localMessage(BLOBS_ACTOR, Method.GetCreditApproval, params), height))
  }

  /** Resolution status of a blob by its blake3 hash; null when the blobs actor does not know it. */
  async blobStatus(hash: Uint8Array, height: Height = 'committed'): Promise<BlobStatus | null> {
    if (hash.length !== 32) throw new InvalidCallError('blob hash must be 32 bytes', { field: 'hash' })
    return decodeBlobStatus(await this.call(localMessage(BLOBS_ACTOR, Method.GetBlobStatus, encodeCbor([hash])), height))
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Buckets
  // ──────────────────────────────────────────────────────────────────────────

  /** One page of the actor's listing, starting at `start` (inclusive). */
  async listPage(
    bucket: Address,
    page: { prefix: string; delimiter: string; start: Uint8Array | null; limit: number },
    height: Height = 'committed'
  ): Promise<ObjectPage> {
    const params = encodeCbor([utf8ToBytes(page.prefix), utf8ToBytes(page.delimiter), page.start, page.limit])
    return decodeObjectPage(await this.call(localMessage(bucket, Method.ListObjects, params), height))
  }

  /**
   * Objects and common prefixes under a prefix. Prefix, delimiter and a page
   * size go to the actor. Without a delimiter the scan stops once offset +
   * limit objects are in; with one it reads every page, since common prefixes
   * are reported in full. Cost then grows with the number of entries directly
   * under the prefix.
   */
  async bucketQuery(bucket: Address, query: ListQuery = {}, height: Height = 'committed'): Promise<BucketListing> {
    const q = normalizeListQuery(query)
    const want = q.delimiter === '' ? q.offset + q.limit : Number.POSITIVE_INFINITY
    const entries: Array<{ key: string; value: ObjectSummary }> = []
    const grouped = new Set<string>()

    let start: Uint8Array | null = null
    let pages = 0
    for (;;) {
      const limit = Math.min(MAX_LIST_LIMIT, want - entries.length)
      const page = await this.listPage(bucket, { prefix: q.prefix, delimiter: q.delimiter, start, limit }, height)
      pages++
      for (const { key, object } of page.objects) entries.push({ key: bytesToUtf8(key), value: object })
      for (const p of page.commonPrefixes) grouped.add(bytesToUtf8(p))
      if (entries.length >= want || !page.nextKey || (start && equalBytes(page.nextKey, start))) break
      start = page.nextKey
    }

    const listed = listKeys(entries, q)
    for (const p of listed.commonPrefixes) grouped.add(p)
    this.log.debug('bucket query', { bucket: bucket.toString(), pages, scanned: entries.length, listed: listed.objects.length })
    return {
      objects: listed.objects.map(({ key, value }) => ({ key, object: value })),
      commonPrefixes: [...grouped].sort((a, b) => compareBytes(utf8ToBytes(a), utf8ToBytes(b)))
    }
  }

  /** Stored object record; NotFound when the key is absent. */
  async getObject(bucket: Address, key: string, height: Height = 'committed'): Promise<ObjectRecord> {
    const data = await this.call(localMessage(bucket, Method.GetObject, encodeCbor(utf8ToBytes(key))), height)
    const record = decodeOptionalObject(data)
    if (!record) throw new NotFoundError(`object "${key}" not found in ${bucket.toString()}`)
    return record
  }

  /** Object content, optionally limited to a byte range. */
  async objectGet(bucket: Address, key: string, opts: ObjectGetOptions = {}): Promise<Uint8Array> {
    const objects = this.requireObjects()
    const height = opts.height ?? 'committed'
    if (opts.range !== undefined) {
      const spec = parseRangeSpec(opts.range)
      const size = await objects.objectSize(bucket, key, height, opts.signal)
      const range = resolveRange(spec, size, opts.range)
      return objects.download(bucket, key, { range, height, signal: opts.signal })
    }
    const data = await objects.download(bucket, key, { height, signal: opts.signal })
    if (opts.verify) {
      const record = await this.getObject(bucket, key, height)
      if (!equalBytes(blake3(data), record.hash)) {
        throw new DecodeError(`content of "${key}" does not match its stored hash`)
      }
    }
    return data
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Timehubs
  // ──────────────────────────────────────────────────────────────────────────

  async timehubCount(timehub: Address, height: Height = 'committed'): Promise<bigint> {
    return decodeCount(await this.call(localMessage(timehub, Method.Count), height))
  }

  async timehubLeaf(timehub: Address, index: bigint, height: Height = 'committed'): Promise<TimehubLeaf> {
    if (index < 0n) throw new IndexOutOfRangeError(index, await this.timehubCount(timehub, height))
    const data = await this.call(localMessage(timehub, Method.Get, encodeCbor(index)), height)
    const leaf = decodeTimehubLeaf(data)
    if (!leaf) throw new IndexOutOfRangeError(index, await this.timehubCount(timehub, height))
    return leaf
  }

  async timehubPeaks(timehub: Address, height: Height = 'committed'): Promise<CID[]> {
    return decodeCidList(await this.call(localMessage(timehub, Method.Peaks), height))
  }

  async timehubRoot(timehub: Address, height: Height = 'committed'): Promise<CID> {
    return decodeCid(await this.call(localMessage(timehub, Method.Root), height))
  }

  // ──────────────────────────────────────────────────────────────────────────

  private requireObjects(): ObjectClient {
    if (!this.objects) throw new ConfigError('no object API endpoint is configured')
    return this.objects
  }
}

function notFound(address: Address, detail: string): NotFoundError {
  return new NotFoundError(`no machine or actor at ${address.toString()}${detail ? `: ${detail}` : ''}`)
}

function queryFailure(kind: string, res: { code: number; log: string; info: string }): RpcError {
  const detail = res.info || res.log
  return new RpcError('abci_query', `${kind} query failed with code ${res.code}${detail ? `: ${detail}` : ''}`, {
    code: res.code
  })
}

export default QueryEngine
