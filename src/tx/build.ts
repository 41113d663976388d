/**
 * Transaction builder.
 *
 * Turns a typed call into an unsigned chain message:
 *   1. validate the call (no network access)
 *   2. resolve target actor, method, value and params
 *   3. fill gas parameters: each of limit, fee cap and premium may be
 *      overridden on its own; unset ones come from the chain
 *   4. bind the account's next sequence
 *
 * Gas defaults:
 *   - limit    EstimateGas at the pending height (sequence 0), padded by 25%,
 *              capped at the block gas limit
 *   - premium  MIN_GAS_PREMIUM
 *   - fee cap  max(base fee + premium, MIN_GAS_FEE_CAP)
 */

import type { Address } from '../address'
import type { Height } from '../query/height'
import type { StateParams } from '../query/decode'
import { createLogger, type Logger } from '../utils/logger'
import { resolveCall, validateCall, type Call, type CallContext, type ResolvedCall } from './calls'
import {
  BLOCK_GAS_LIMIT,
  MIN_GAS_FEE_CAP,
  MIN_GAS_PREMIUM,
  clampGasParams,
  type GasParams,
  type Message
} from './message'
import type { SequenceTracker } from './sequence'

/** Each field independently overridable. */
export type GasOverrides = Partial<GasParams>

/** Chain reads used to fill gas defaults (the query engine in practice). */
export interface GasSource {
  estimateGas(message: Message, height?: Height): Promise<bigint>
  stateParams(height?: Height): Promise<StateParams>
}

export interface PreparedCall<C extends Call = Call> {
  call: C
  from: Address
  resolved: ResolvedCall
  gas: GasParams
}

export interface TransactionBuilderOptions {
  chain: GasSource
  sequences: SequenceTracker
  /** Subnet gateway actor. */
  gateway: Address
  logger?: Logger
}

/** Padding applied to estimates, as a fraction (numerator / denominator). */
const GAS_PADDING = { num: 5n, den: 4n } as const

export class TransactionBuilder {
  private chain: GasSource
  private sequences: SequenceTracker
  private gateway: Address
  private log: Logger

  constructor(opts: TransactionBuilderOptions) {
    this.chain = opts.chain
    this.sequences = opts.sequences
    this.gateway = opts.gateway
    this.log = opts.logger ?? createLogger('vaultline:tx')
  }

  /** Validate, resolve and price a call; the sequence is bound later. */
  async prepare<C extends Call>(call: C, from: Address, gas: GasOverrides = {}): Promise<PreparedCall<C>> {
    validateCall(call)
    const ctx: CallContext = { sender: from, gateway: this.gateway }
    const resolved = resolveCall(call, ctx)

    const gasPremium = gas.gasPremium ?? MIN_GAS_PREMIUM
    const [gasLimit, gasFeeCap] = await Promise.all([
      gas.gasLimit ?? this.defaultGasLimit(resolved, from),
      gas.gasFeeCap ?? this.defaultFeeCap(gasPremium)
    ])
    const params = clampGasParams({ gasLimit, gasFeeCap, gasPremium })
    this.log.debug('prepared call', {
      kind: call.kind,
      to: resolved.to.toString(),
      gasLimit: params.gasLimit,
      gasFeeCap: params.gasFeeCap,
      gasPremium: params.gasPremium
    })
    return { call, from, resolved, gas: params }
  }

  /** Unsigned message for a prepared call at a sequence. */
  bind(prepared: PreparedCall, sequence: bigint): Message {
    return toMessage(prepared.from, prepared.resolved, prepared.gas, sequence)
  }

  /** Prepare and reserve the next sequence in one step. */
  async build(call: Call, from: Address, gas?: GasOverrides): Promise<Message> {
    const prepared = await this.prepare(call, from, gas)
    const sequence = await this.sequences.reserve(from)
    return this.bind(prepared, sequence)
  }

  private async defaultGasLimit(resolved: ResolvedCall, from: Address): Promise<bigint> {
    const draft = toMessage(from, resolved, { gasLimit: BLOCK_GAS_LIMIT, gasFeeCap: 0n, gasPremium: 0n }, 0n)
    const estimate = await this.chain.estimateGas(draft, 'pending')
    const padded = (estimate * GAS_PADDING.num) / GAS_PADDING.den
    return padded > BLOCK_GAS_LIMIT ? BLOCK_GAS_LIMIT : padded
  }

  private async defaultFeeCap(premium: bigint): Promise<bigint> {
    const { baseFee } = await this.chain.stateParams('pending')
    const cap = baseFee + premium
    return cap > MIN_GAS_FEE_CAP ? cap : MIN_GAS_FEE_CAP
  }
}

function toMessage(from: Address, r: ResolvedCall, gas: GasParams, sequence: bigint): Message {
  return {
    version: 0,
    to: r.to,
    from,
    sequence,
    value: r.value,
    gasLimit: gas.gasLimit,
    gasFeeCap: gas.gasFeeCap,
    gasPremium: gas.gasPremium,
    method: r.method,
    params: r.params
  }
}

export default TransactionBuilder
