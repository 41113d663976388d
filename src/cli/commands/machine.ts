import { Address } from '../../address'
import type { MachineKind, MachineListing } from '../../query/decode'
import type { CliContext, CommandGroup } from '../context'

/** Machines owned by --owner (or the signer), optionally of one kind. */
export async function listOwned(ctx: CliContext, kind?: MachineKind): Promise<MachineListing[]> {
  const owner = ctx.addressOr(ctx.flags.owner, 'owner')
  const machines = await ctx.client.listMachines(owner, ctx.height)
  return kind ? machines.filter((m) => m.kind === kind) : machines
}

export const machineCommands: CommandGroup = {
  async info(ctx) {
    const address = Address.parse(ctx.requireFlag(ctx.flags.address, 'address'))
    ctx.print(await ctx.client.machineInfo(address, ctx.height))
  },

  async list(ctx) {
    ctx.print(await listOwned(ctx))
  }
}
