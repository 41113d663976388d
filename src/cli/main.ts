/**
 * vaultline command-line entry point.
 *
 *   vaultline account info --address t410f...
 *   vaultline bucket add --address t2... --key docs/a.txt ./a.txt
 *
 * Results print as JSON on stdout (object content as raw bytes); errors print
 * as `error: <message>` on stderr with exit status 1.
 */

import { pathToFileURL } from 'node:url'
import { InvalidCallError, formatError } from '../errors'
import { createLogger } from '../utils/logger'
import { USAGE, parseCommandLine } from './args'
import { accountCommands } from './commands/account'
import { blobCommands } from './commands/blob'
import { bucketCommands } from './commands/bucket'
import { machineCommands } from './commands/machine'
import { timehubCommands } from './commands/timehub'
import { txCommands } from './commands/tx'
import { CliContext, processIO, selectCommand, type CliDeps, type CliIO, type CommandGroup, type CommandHandler } from './context'

const GROUPS: Record<string, CommandGroup> = {
  account: accountCommands,
  machine: machineCommands,
  bucket: bucketCommands,
  timehub: timehubCommands,
  blob: blobCommands,
  tx: txCommands
}

function lookup(group: string, command: string | undefined): CommandHandler {
  const commands = Object.hasOwn(GROUPS, group) ? GROUPS[group] : undefined
  if (!commands) throw new InvalidCallError(`unknown command group "${group}"`, { field: 'command' })
  return selectCommand(commands, group, command)
}

/** Run one invocation and return the process exit status. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io: CliIO = { ...processIO, ...deps }
  try {
    const { flags, group, command, args } = parseCommandLine(argv)
    if (flags.help || !group) {
      io.stdout(USAGE)
      return 0
    }
    const handler = lookup(group, command)
    const ctx = new CliContext(flags, io, deps)
    await handler(ctx, args)
    return 0
  } catch (e) {
    createLogger('vaultline:cli').debug('command failed', { error: e })
    io.stderr(`error: ${formatError(e)}`)
    return 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      process.stderr.write(`error: ${formatError(e)}\n`)
      process.exitCode = 1
    }
  )
}

export default main
