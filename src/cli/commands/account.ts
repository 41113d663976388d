import { formatTokenAmount, parseTokenAmount } from '../../utils/parse'
import { Wallet } from '../../wallet/signer'
import { selectCommand, type CommandGroup } from '../context'
import { creditCommands } from './credit'
import { receiptView } from './views'

export const accountCommands: CommandGroup = {
  async create(ctx) {
    const wallet = Wallet.random()
    ctx.print({
      privateKey: wallet.exportSecretKey(),
      address: wallet.address,
      ethAddress: wallet.ethAddress
    })
    wallet.destroy()
  },

  async info(ctx) {
    const address = ctx.addressOr(ctx.flags.address, 'address')
    const info = await ctx.client.query.accountInfo(address, ctx.height)
    ctx.print({
      address: info.address,
      ethAddress: info.address.toEthAddress() ?? null,
      sequence: info.sequence,
      balance: formatTokenAmount(info.balance),
      parentBalance: info.parentBalance === null ? null : formatTokenAmount(info.parentBalance)
    })
  },

  async sequence(ctx) {
    const address = ctx.addressOr(ctx.flags.address, 'address')
    const sequence = await ctx.client.account(address).sequence(ctx.flags.height ? ctx.height : 'pending')
    ctx.print({ address, sequence })
  },

  async balance(ctx) {
    const address = ctx.addressOr(ctx.flags.address, 'address')
    const { balance, parentBalance } = await ctx.client.account(address).balances(ctx.height)
    ctx.print({
      address,
      balance: formatTokenAmount(balance),
      parentBalance: parentBalance === null ? null : formatTokenAmount(parentBalance)
    })
  },

  async deposit(ctx, args) {
    const amount = parseTokenAmount(ctx.requireArg(args, 0, 'amount'))
    const to = ctx.flags.to ? ctx.addressOr(ctx.flags.to, 'to') : undefined
    const receipt = await ctx.client.account(ctx.requireSigner()).deposit(amount, { to, mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt))
  },

  async withdraw(ctx, args) {
    const amount = parseTokenAmount(ctx.requireArg(args, 0, 'amount'))
    const to = ctx.flags.to ? ctx.addressOr(ctx.flags.to, 'to') : undefined
    const receipt = await ctx.client.account(ctx.requireSigner()).withdraw(amount, { to, mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt))
  },

  async transfer(ctx, args) {
    const amount = parseTokenAmount(ctx.requireArg(args, 0, 'amount'))
    const to = ctx.addressOr(ctx.requireFlag(ctx.flags.to, 'to'), 'to')
    const receipt = await ctx.client.account(ctx.requireSigner()).transfer(to, amount, { mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt))
  },

  async credit(ctx, args) {
    const [command, ...rest] = args
    await selectCommand(creditCommands, 'account credit', command)(ctx, rest)
  }
}
