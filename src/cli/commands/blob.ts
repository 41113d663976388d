import { InvalidCallError } from '../../errors'
import { hexToBytes } from '../../utils/bytes'
import type { CommandGroup } from '../context'

export const blobCommands: CommandGroup = {
  /** Resolution status of a stored blob, by its hex blake3 hash. */
  async status(ctx, args) {
    const raw = ctx.requireArg(args, 0, 'hash')
    if (!/^(0x)?[0-9a-fA-F]{64}$/.test(raw)) {
      throw new InvalidCallError(`invalid blob hash "${raw}": expected 32 bytes of hex`, { field: 'hash' })
    }
    const status = await ctx.client.query.blobStatus(hexToBytes(raw), ctx.height)
    ctx.print({ hash: raw.replace(/^0x/i, '').toLowerCase(), status })
  }
}
