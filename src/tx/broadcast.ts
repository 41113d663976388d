/**
 * Broadcaster: submits signed envelopes and normalizes node responses.
 *
 * Modes:
 *  - async   hand the bytes to the node; only the hash comes back
 *  - sync    wait for the mempool check; hash plus accept/reject
 *  - commit  wait for block inclusion; hash, height, gas used, decoded return
 *
 * Outcomes are values, not exceptions: `submit` returns
 * `{ ok: true, value: receipt } | { ok: false, error }` where the error is a
 * typed SDK error. Transport failures were already retried with backoff by the
 * RPC transport. A commit broadcast is resent only when the connection failed
 * before any response, and never past the commit deadline; a node that answers
 * the resend with "tx already exists in cache" is polled through `tx` until
 * the transaction lands.
 */

import {
  ConfirmationTimeoutError,
  DecodeError,
  NetworkError,
  RpcError,
  SequenceMismatchError,
  TransactionRejectedError,
  type RejectionStage
} from '../errors'
import type { CometClient, CommitResponse, ExecResult, RequestOptions, TxLookup } from '../rpc'
import { createLogger, type Logger } from '../utils/logger'
import { sleep } from '../utils/retry'
import type { SignedTx } from './encode'

export type BroadcastMode = 'async' | 'sync' | 'commit'
export const BROADCAST_MODES: readonly BroadcastMode[] = ['async', 'sync', 'commit']

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export type BroadcastFailure =
  | SequenceMismatchError
  | TransactionRejectedError
  | ConfirmationTimeoutError
  | NetworkError
  | RpcError
  | DecodeError

export type TxStatus = 'pending' | 'accepted' | 'committed'

export interface TxReceipt<T> {
  hash: string
  /** pending (async), accepted (sync) or committed (commit). */
  status: TxStatus
  height: bigint | null
  gasUsed: bigint | null
  /** Decoded call return; commit mode only. */
  data: T | null
}

export interface BroadcasterOptions {
  /** Local wait for block inclusion in commit mode (ms). Default 60_000. */
  commitTimeoutMs?: number
  /** Interval between `tx` lookups while waiting on a resubmitted commit (ms). Default 1_000. */
  pollIntervalMs?: number
  logger?: Logger
}

/** Exit code the chain uses for an invalid sender state (bad sequence). */
export const EXIT_SYS_SENDER_STATE_INVALID = 2

const COMMIT_TIMEOUT_RE = /timed out waiting for tx/i
const NOT_FOUND_RE = /not found/i
const IN_CACHE_RE = /tx already exists in cache/i

export function isSequenceMismatch(r: { code: number; log: string; info: string }): boolean {
  return r.code === EXIT_SYS_SENDER_STATE_INVALID || /sequence|nonce/i.test(`${r.log} ${r.info}`)
}

export class Broadcaster {
  readonly node: CometClient
  private commitTimeoutMs: number
  private pollIntervalMs: number
  private log: Logger

  constructor(node: CometClient, opts?: BroadcasterOptions) {
    this.node = node
    this.commitTimeoutMs = opts?.commitTimeoutMs ?? 60_000
    this.pollIntervalMs = opts?.pollIntervalMs ?? 1_000
    this.log = opts?.logger ?? createLogger('vaultline:broadcast')
  }

  async submit<T>(
    tx: SignedTx,
    mode: BroadcastMode,
    decode: (data: Uint8Array) => T
  ): Promise<Result<TxReceipt<T>, BroadcastFailure>> {
    this.log.debug('broadcast', { hash: tx.hash, mode, sequence: tx.message.sequence })
    try {
      switch (mode) {
        case 'async':
        case 'sync': {
          const res =
            mode === 'async' ? await this.node.broadcastTxAsync(tx.bytes) : await this.node.broadcastTxSync(tx.bytes)
          if (res.code !== 0) return fail(rejection(tx, { ...res, info: '' }, 'check'))
          return ok({ hash: tx.hash, status: mode === 'async' ? 'pending' : 'accepted', height: null, gasUsed: null, data: null })
        }
        case 'commit':
          return await this.commit(tx, decode)
      }
    } catch (e) {
      return fail(toFailure(e, tx, this.commitTimeoutMs))
    }
  }

  /** Look up a transaction by hash; null when the node does not know it (yet). */
  async lookup(hash: string, opts?: RequestOptions): Promise<TxLookup | null> {
    try {
      return await this.node.tx(hash, opts)
    } catch (e) {
      if (e instanceof RpcError && NOT_FOUND_RE.test(rpcErrorText(e))) return null
      throw e
    }
  }

  private async commit<T>(tx: SignedTx, decode: (data: Uint8Array) => T): Promise<Result<TxReceipt<T>, BroadcastFailure>> {
    const timer = new AbortController()
    const id = setTimeout(() => timer.abort(), this.commitTimeoutMs)
    try {
      let res: CommitResponse
      try {
        res = await this.node.broadcastTxCommit(tx.bytes, {
          signal: timer.signal,
          retryOn: 'connection',
          timeoutMs: this.commitTimeoutMs + 1_000
        })
      } catch (e) {
        if (!(e instanceof RpcError && IN_CACHE_RE.test(rpcErrorText(e)))) throw e
        this.log.debug('already in the mempool; waiting for inclusion', { hash: tx.hash })
        const found = await this.awaitInclusion(tx.hash, timer.signal)
        return this.settle(tx, found.txResult, found.height, decode)
      }
      if (res.checkTx.code !== 0) return fail(rejection(tx, res.checkTx, 'check'))
      return this.settle(tx, res.deliverTx, res.height, decode)
    } catch (e) {
      if (timer.signal.aborted) return fail(new ConfirmationTimeoutError(tx.hash, this.commitTimeoutMs, { cause: e }))
      return fail(toFailure(e, tx, this.commitTimeoutMs))
    } finally {
      clearTimeout(id)
    }
  }

  /** Receipt for an included transaction. A return value that fails to decode is logged, not fatal. */
  private settle<T>(
    tx: SignedTx,
    exec: ExecResult,
    height: bigint,
    decode: (data: Uint8Array) => T
  ): Result<TxReceipt<T>, BroadcastFailure> {
    if (exec.code !== 0) return fail(rejection(tx, exec, 'deliver'))
    let data: T | null = null
    try {
      data = decode(exec.data)
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e
      this.log.warn('committed, but the return value did not decode', { hash: tx.hash, error: e.message })
    }
    this.log.info('committed', { hash: tx.hash, height, gasUsed: exec.gas_used })
    return ok({ hash: tx.hash, status: 'committed', height, gasUsed: exec.gas_used, data })
  }

  private async awaitInclusion(hash: string, signal: AbortSignal): Promise<TxLookup> {
    for (;;) {
      const found = await this.lookup(hash, { signal })
      if (found) return found
      await sleep(this.pollIntervalMs, signal)
    }
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

/** Nodes put the detail of an RPC error in `data`, not the message. */
function rpcErrorText(e: RpcError): string {
  return typeof e.data === 'string' ? `${e.message} ${e.data}` : e.message
}

function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

function fail(error: BroadcastFailure): { ok: false; error: BroadcastFailure } {
  return { ok: false, error }
}

function rejection(
  tx: SignedTx,
  r: Pick<ExecResult, 'code' | 'log' | 'info' | 'codespace'>,
  stage: RejectionStage
): SequenceMismatchError | TransactionRejectedError {
  if (isSequenceMismatch(r)) {
    return new SequenceMismatchError(`sequence ${tx.message.sequence} rejected: ${r.info || r.log}`, {
      code: r.code,
      sequence: tx.message.sequence,
      txHash: tx.hash
    })
  }
  return new TransactionRejectedError(r.code, {
    stage,
    log: r.log,
    info: r.info,
    codespace: r.codespace,
    txHash: tx.hash
  })
}

/** Known SDK failures become values; anything else is a bug and propagates. */
function toFailure(e: unknown, tx: SignedTx, commitTimeoutMs: number): BroadcastFailure {
  if (e instanceof RpcError && COMMIT_TIMEOUT_RE.test(rpcErrorText(e))) {
    return new ConfirmationTimeoutError(tx.hash, commitTimeoutMs, { cause: e })
  }
  if (e instanceof NetworkError || e instanceof RpcError || e instanceof DecodeError) return e
  throw e
}

export default Broadcaster
