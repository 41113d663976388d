/**
 * Sender: build, sign, sequence and broadcast a call in one step.
 *
 * Policy:
 *  - the call is validated and priced before any sequence is taken
 *  - only the sequence reservation runs under the account lock; signing and
 *    the broadcast (including a commit wait) run outside it, so several sends
 *    from one account can be in flight at once
 *  - a sequence counts as used when the node accepted the bytes (ok, commit
 *    timeout, or execution failure); any other outcome drops the cached
 *    baseline so the next send re-reads the chain
 *  - a SequenceMismatch drops the cached baseline and is retried exactly once
 *    with a freshly read sequence; a second mismatch is returned as is
 */

import { ConfirmationTimeoutError, InvalidKeyError, SequenceMismatchError, TransactionRejectedError } from '../errors'
import { createLogger, type Logger } from '../utils/logger'
import type { Signer } from '../wallet/signer'
import type { Broadcaster, BroadcastFailure, BroadcastMode, Result, TxReceipt } from './broadcast'
import type { GasOverrides, TransactionBuilder } from './build'
import { decodeCallReturn, type Call, type CallReturnMap } from './calls'
import { signTx } from './encode'
import type { SequenceTracker } from './sequence'

export interface SendOptions {
  mode?: BroadcastMode
  gas?: GasOverrides
}

export interface TxSenderOptions {
  signer: Signer
  chainId: bigint
  builder: TransactionBuilder
  broadcaster: Broadcaster
  sequences: SequenceTracker
  /** Default broadcast mode. Default 'commit'. */
  mode?: BroadcastMode
  logger?: Logger
}

export type SendResult<C extends Call> = Result<TxReceipt<CallReturnMap[C['kind']]>, BroadcastFailure>

/** Attempts in total when the chain reports a sequence mismatch. */
const MAX_ATTEMPTS = 2

/** Whether a broadcast outcome used up its sequence on chain. */
export function sequenceConsumed(result: Result<unknown, BroadcastFailure>): boolean {
  if (result.ok) return true
  const { error } = result
  return (
    error instanceof ConfirmationTimeoutError ||
    (error instanceof TransactionRejectedError && error.stage === 'deliver')
  )
}

export class TxSender {
  readonly signer: Signer
  readonly chainId: bigint
  readonly mode: BroadcastMode
  private builder: TransactionBuilder
  private broadcaster: Broadcaster
  private sequences: SequenceTracker
  private log: Logger

  constructor(opts: TxSenderOptions) {
    this.signer = opts.signer
    this.chainId = opts.chainId
    this.mode = opts.mode ?? 'commit'
    this.builder = opts.builder
    this.broadcaster = opts.broadcaster
    this.sequences = opts.sequences
    this.log = opts.logger ?? createLogger('vaultline:tx')
  }

  async send<C extends Call>(call: C, opts: SendOptions = {}): Promise<SendResult<C>> {
    if (!this.signer.canSign) {
      throw new InvalidKeyError(`a secret key is required to send transactions from ${this.signer.address.toString()}`)
    }
    const from = this.signer.address
    const mode = opts.mode ?? this.mode
    const prepared = await this.builder.prepare(call, from, opts.gas)
    const decode = (data: Uint8Array): CallReturnMap[C['kind']] => decodeCallReturn<C['kind']>(call.kind, data)

    for (let attempt = 1; ; attempt++) {
      const sequence = await this.sequences.reserve(from)
      let result: SendResult<C>
      try {
        const signed = await signTx(this.signer, this.builder.bind(prepared, sequence), this.chainId)
        result = await this.broadcaster.submit(signed, mode, decode)
      } catch (e) {
        this.sequences.invalidate(from)
        throw e
      }
      if (!sequenceConsumed(result)) {
        this.log.debug('sequence not consumed; dropping cached baseline', { kind: call.kind, sequence })
        this.sequences.invalidate(from)
      }
      if (!result.ok && result.error instanceof SequenceMismatchError && attempt < MAX_ATTEMPTS) {
        this.log.warn('sequence mismatch; re-reading account sequence and retrying', {
          kind: call.kind,
          sequence: result.error.sequence
        })
        continue
      }
      if (!result.ok) this.log.debug('send failed', { kind: call.kind, error: result.error.kind })
      return result
    }
  }

  /** send(), throwing the typed failure instead of returning it. */
  async sendOrThrow<C extends Call>(call: C, opts?: SendOptions): Promise<TxReceipt<CallReturnMap[C['kind']]>> {
    const result = await this.send(call, opts)
    if (!result.ok) throw result.error
    return result.value
  }
}

export default TxSender
