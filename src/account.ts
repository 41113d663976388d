/**
 * Account handle: balances, sequence and fund movements for one signer,
 * plus the storage credit it buys and shares.
 */

import type { Address } from './address'
import type { Client } from './client'
import type { CreditAccount, CreditApproval } from './query/decode'
import type { AccountInfo } from './query/engine'
import type { Height } from './query/height'
import type { TxReceipt } from './tx/broadcast'
import type { SendOptions } from './tx/send'
import type { Signer } from './wallet/signer'

export interface Balances {
  /** Subnet balance (atto). */
  balance: bigint
  /** Parent-chain balance (atto); null without a parent endpoint. */
  parentBalance: bigint | null
}

export interface FundOptions extends SendOptions {
  /** Recipient; defaults to this account. */
  to?: Address
}

export interface ApproveCreditOptions extends SendOptions {
  /** Only usable through this actor, e.g. a bucket. */
  caller?: Address
  limit?: bigint
  /** Lifetime in blocks. */
  ttl?: bigint
}

export interface RevokeCreditOptions extends SendOptions {
  caller?: Address
}

export class Account {
  readonly signer: Signer
  private client: Client

  constructor(client: Client, signer: Signer) {
    this.client = client
    this.signer = signer
  }

  get address(): Address {
    return this.signer.address
  }

  async info(height: Height = 'committed'): Promise<AccountInfo> {
    return this.client.query.accountInfo(this.address, height)
  }

  /** On-chain sequence; `pending` includes transactions not yet committed. */
  async sequence(height: Height = 'pending'): Promise<bigint> {
    const state = await this.client.query.actorState(this.address, height)
    return state?.sequence ?? 0n
  }

  async balances(height: Height = 'committed'): Promise<Balances> {
    const { balance, parentBalance } = await this.info(height)
    return { balance, parentBalance }
  }

  /** Move funds from the parent chain into the subnet. */
  async deposit(amount: bigint, opts: FundOptions = {}): Promise<TxReceipt<null>> {
    return this.client.sender(this.signer).sendOrThrow({ kind: 'deposit', amount, to: opts.to }, opts)
  }

  /** Move funds from the subnet back to the parent chain. */
  async withdraw(amount: bigint, opts: FundOptions = {}): Promise<TxReceipt<null>> {
    return this.client.sender(this.signer).sendOrThrow({ kind: 'withdraw', amount, to: opts.to }, opts)
  }

  async transfer(to: Address, amount: bigint, opts: SendOptions = {}): Promise<TxReceipt<null>> {
    return this.client.sender(this.signer).sendOrThrow({ kind: 'transfer', amount, to }, opts)
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Credit
  // ──────────────────────────────────────────────────────────────────────────

  async credit(height: Height = 'committed'): Promise<CreditAccount> {
    return this.client.query.creditBalance(this.address, height)
  }

  /** Spend tokens on storage credit for this account or `opts.to`. */
  async buyCredit(amount: bigint, opts: FundOptions = {}): Promise<TxReceipt<CreditAccount>> {
    return this.client.sender(this.signer).sendOrThrow({ kind: 'buyCredit', amount, recipient: opts.to }, opts)
  }

  /** Let `receiver` commit credit from this account. */
  async approveCredit(receiver: Address, opts: ApproveCreditOptions = {}): Promise<TxReceipt<CreditApproval>> {
    return this.client
      .sender(this.signer)
      .sendOrThrow({ kind: 'approveCredit', receiver, caller: opts.caller, limit: opts.limit, ttl: opts.ttl }, opts)
  }

  async revokeCredit(receiver: Address, opts: RevokeCreditOptions = {}): Promise<TxReceipt<null>> {
    return this.client.sender(this.signer).sendOrThrow({ kind: 'revokeCredit', receiver, caller: opts.caller }, opts)
  }
}

export default Account
