import type { CreditAccount } from '../../query/decode'
import { formatTokenAmount, parseTokenAmount, parseUint } from '../../utils/parse'
import type { CommandGroup } from '../context'
import { receiptView } from './views'

function creditView(account: CreditAccount): Record<string, unknown> {
  return {
    creditFree: account.creditFree,
    creditCommitted: account.creditCommitted,
    lastDebitEpoch: account.lastDebitEpoch
  }
}

/** `account credit …` subcommands. */
export const creditCommands: CommandGroup = {
  async stats(ctx) {
    const stats = await ctx.client.query.creditStats(ctx.height)
    ctx.print({ ...stats, balance: formatTokenAmount(stats.balance) })
  },

  async balance(ctx) {
    const address = ctx.addressOr(ctx.flags.address, 'address')
    ctx.print({ address, ...creditView(await ctx.client.query.creditBalance(address, ctx.height)) })
  },

  async buy(ctx, args) {
    const amount = parseTokenAmount(ctx.requireArg(args, 0, 'amount'))
    const to = ctx.flags.to ? ctx.addressOr(ctx.flags.to, 'to') : undefined
    const receipt = await ctx.client.account(ctx.requireSigner()).buyCredit(amount, { to, mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt, receipt.data === null ? undefined : creditView(receipt.data)))
  },

  async approve(ctx) {
    const receiver = ctx.addressOr(ctx.requireFlag(ctx.flags.to, 'to'), 'to')
    const caller = ctx.flags.caller ? ctx.addressOr(ctx.flags.caller, 'caller') : undefined
    const limit = ctx.flags.limit ? parseUint(ctx.flags.limit, 'limit') : undefined
    const ttl = ctx.flags.ttl ? parseUint(ctx.flags.ttl, 'ttl') : undefined
    const receipt = await ctx.client
      .account(ctx.requireSigner())
      .approveCredit(receiver, { caller, limit, ttl, mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt, receipt.data ?? undefined))
  },

  async approval(ctx) {
    const receiver = ctx.addressOr(ctx.requireFlag(ctx.flags.to, 'to'), 'to')
    const from = ctx.addressOr(ctx.flags.from, 'from')
    const caller = ctx.flags.caller ? ctx.addressOr(ctx.flags.caller, 'caller') : null
    const approval = await ctx.client.query.creditApproval(from, receiver, caller, ctx.height)
    ctx.print({ from, to: receiver, caller, approval })
  },

  async revoke(ctx) {
    const receiver = ctx.addressOr(ctx.requireFlag(ctx.flags.to, 'to'), 'to')
    const caller = ctx.flags.caller ? ctx.addressOr(ctx.flags.caller, 'caller') : undefined
    const receipt = await ctx.client
      .account(ctx.requireSigner())
      .revokeCredit(receiver, { caller, mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt))
  }
}
