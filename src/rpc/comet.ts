/**
 * Consensus-node RPC client: application queries and transaction broadcast.
 *
 * Wraps any RpcTransport with the node's endpoints and validates every
 * response with zod before it reaches the SDK:
 *  - abci_query            (application state at a height)
 *  - broadcast_tx_async    (hash only)
 *  - broadcast_tx_sync     (hash + mempool check result)
 *  - broadcast_tx_commit   (hash + check and execution results + block height)
 *  - tx                    (lookup of an included transaction)
 */

import { z } from 'zod'
import type { RpcTransport, RequestOptions } from './types'
import { DecodeError } from '../errors'
import { base64ToBytes, bytesToBase64, bytesToHex, hexToBytes } from '../utils/bytes'
import { formatZodError } from '../network/schema'

// ──────────────────────────────────────────────────────────────────────────────
// Response schemas
// ──────────────────────────────────────────────────────────────────────────────

const Int64 = z
  .union([z.string().regex(/^-?\d+$/), z.number().int()])
  .transform((v) => BigInt(v))

const Base64Bytes = z
  .string()
  .nullish()
  .transform((v) => (v ? base64ToBytes(v) : new Uint8Array()))

const ExecResult = z.object({
  code: z.number().int().default(0),
  data: Base64Bytes,
  log: z.string().default(''),
  info: z.string().default(''),
  gas_wanted: Int64.default('0'),
  gas_used: Int64.default('0'),
  codespace: z.string().default('')
})
export type ExecResult = z.output<typeof ExecResult>

const AbciQueryResult = z.object({
  response: z.object({
    code: z.number().int().default(0),
    log: z.string().default(''),
    info: z.string().default(''),
    key: Base64Bytes,
    value: Base64Bytes,
    height: Int64.default('0'),
    codespace: z.string().default('')
  })
})
export type AbciQueryResponse = z.output<typeof AbciQueryResult>['response']

const BroadcastResult = z.object({
  code: z.number().int().default(0),
  data: Base64Bytes,
  log: z.string().default(''),
  codespace: z.string().default(''),
  hash: z.string()
})
export type BroadcastResponse = z.output<typeof BroadcastResult>

// Older nodes report execution as deliver_tx, newer ones as tx_result.
const CommitResult = z
  .object({
    check_tx: ExecResult,
    deliver_tx: ExecResult.optional(),
    tx_result: ExecResult.optional(),
    hash: z.string(),
    height: Int64
  })
  .transform(({ check_tx, deliver_tx, tx_result, hash, height }) => ({
    checkTx: check_tx,
    deliverTx: tx_result ?? deliver_tx ?? ExecResult.parse({}),
    hash,
    height
  }))
export type CommitResponse = z.output<typeof CommitResult>

const TxResult = z
  .object({
    hash: z.string(),
    height: Int64,
    tx_result: ExecResult
  })
  .transform(({ hash, height, tx_result }) => ({ hash, height, txResult: tx_result }))
export type TxLookup = z.output<typeof TxResult>

function parseResult<S extends z.ZodTypeAny>(schema: S, method: string, raw: unknown): z.output<S> {
  const r = schema.safeParse(raw)
  if (!r.success) {
    throw new DecodeError(`${method}: unexpected response (${formatZodError(r.error)})`, { data: raw })
  }
  return r.data
}

// ──────────────────────────────────────────────────────────────────────────────
// Client
// ──────────────────────────────────────────────────────────────────────────────

export class CometClient {
  readonly transport: RpcTransport

  constructor(transport: RpcTransport) {
    this.transport = transport
  }

  /** Query application state. `height` 0 means latest committed. */
  async abciQuery(data: Uint8Array, height: bigint, opts?: RequestOptions): Promise<AbciQueryResponse> {
    const raw = await this.transport.request(
      'abci_query',
      { path: '', data: bytesToHex(data, false), height: height.toString(), prove: false },
      opts
    )
    return parseResult(AbciQueryResult, 'abci_query', raw).response
  }

  async broadcastTxAsync(tx: Uint8Array, opts?: RequestOptions): Promise<BroadcastResponse> {
    const raw = await this.transport.request('broadcast_tx_async', { tx: bytesToBase64(tx) }, opts)
    return parseResult(BroadcastResult, 'broadcast_tx_async', raw)
  }

  async broadcastTxSync(tx: Uint8Array, opts?: RequestOptions): Promise<BroadcastResponse> {
    const raw = await this.transport.request('broadcast_tx_sync', { tx: bytesToBase64(tx) }, opts)
    return parseResult(BroadcastResult, 'broadcast_tx_sync', raw)
  }

  async broadcastTxCommit(tx: Uint8Array, opts?: RequestOptions): Promise<CommitResponse> {
    const raw = await this.transport.request('broadcast_tx_commit', { tx: bytesToBase64(tx) }, opts)
    return parseResult(CommitResult, 'broadcast_tx_commit', raw)
  }

  /** Look up an included transaction by its upper-case hex hash. */
  async tx(hash: string, opts?: RequestOptions): Promise<TxLookup> {
    const raw = await this.transport.request('tx', { hash: bytesToBase64(hexToBytes(hash)), prove: false }, opts)
    return parseResult(TxResult, 'tx', raw)
  }
}

export default CometClient
