import type { CommandGroup } from '../context'

export const txCommands: CommandGroup = {
  /** Whether a transaction (e.g. one that timed out) has landed. */
  async status(ctx, args) {
    const hash = ctx.requireArg(args, 0, 'hash').replace(/^0x/i, '').toUpperCase()
    const found = await ctx.client.txStatus(hash)
    if (!found) {
      ctx.print({ hash, found: false })
      return
    }
    ctx.print({
      hash: found.hash,
      found: true,
      height: found.height,
      code: found.txResult.code,
      log: found.txResult.log,
      gasUsed: found.txResult.gas_used
    })
  }
}
