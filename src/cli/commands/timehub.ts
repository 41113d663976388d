import { Address } from '../../address'
import { utf8ToBytes } from '../../utils/bytes'
import { parseMetadata, parseUint } from '../../utils/parse'
import type { CliContext, CommandGroup } from '../context'
import { listOwned } from './machine'
import { receiptView } from './views'

function timehubOf(ctx: CliContext, write: boolean) {
  const address = Address.parse(ctx.requireFlag(ctx.flags.address, 'address'))
  return ctx.client.timehub(address, write ? ctx.requireSigner() : undefined)
}

export const timehubCommands: CommandGroup = {
  async create(ctx) {
    const { timehub, receipt } = await ctx.client.createTimehub(ctx.requireSigner(), {
      owner: ctx.flags.owner ? Address.parse(ctx.flags.owner) : undefined,
      writeAccess: ctx.flags['public-write'] ? 'Public' : 'OnlyOwner',
      metadata: parseMetadata(ctx.flags.metadata ?? []),
      gas: ctx.gas
    })
    ctx.print({ address: timehub.address, robustAddress: receipt.data?.robustAddress ?? null, tx: receiptView(receipt) })
  },

  async list(ctx) {
    ctx.print(await listOwned(ctx, 'Timehub'))
  },

  async push(ctx, args) {
    const timehub = timehubOf(ctx, true)
    const input = ctx.requireArg(args, 0, 'value')
    const value = input === '-' ? await ctx.io.readStdin() : utf8ToBytes(input)
    const receipt = await timehub.push(value, { mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt, receipt.data ?? undefined))
  },

  async leaf(ctx, args) {
    const index = parseUint(ctx.requireArg(args, 0, 'index'), 'index')
    const leaf = await timehubOf(ctx, false).leaf(index, ctx.height)
    ctx.print({ index, timestamp: leaf.timestamp, value: leaf.value })
  },

  async count(ctx) {
    ctx.print({ count: await timehubOf(ctx, false).count(ctx.height) })
  },

  async peaks(ctx) {
    ctx.print({ peaks: await timehubOf(ctx, false).peaks(ctx.height) })
  },

  async root(ctx) {
    ctx.print({ root: await timehubOf(ctx, false).root(ctx.height) })
  }
}
