/**
 * Command-line parsing on node:util parseArgs.
 *
 *   vaultline [global flags] <group> <command> [args] [command flags]
 *
 * Flags may appear anywhere after the program name. Value flags that start
 * with a dash need the `--flag=value` form (e.g. `--range=-5`).
 */

import { parseArgs } from 'node:util'
import { InvalidCallError } from '../errors'

export const OPTIONS = {
  // global
  network: { type: 'string' },
  'network-config': { type: 'string' },
  'rpc-url': { type: 'string' },
  'object-api-url': { type: 'string' },
  'private-key': { type: 'string' },
  'broadcast-mode': { type: 'string' },
  height: { type: 'string' },
  'gas-limit': { type: 'string' },
  'gas-fee-cap': { type: 'string' },
  'gas-premium': { type: 'string' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  quiet: { type: 'boolean', short: 'q' },
  help: { type: 'boolean', short: 'h' },
  // command
  address: { type: 'string', short: 'a' },
  to: { type: 'string' },
  from: { type: 'string' },
  caller: { type: 'string' },
  owner: { type: 'string' },
  key: { type: 'string', short: 'k' },
  ttl: { type: 'string' },
  overwrite: { type: 'boolean' },
  metadata: { type: 'string', short: 'm', multiple: true },
  range: { type: 'string' },
  output: { type: 'string', short: 'o' },
  verify: { type: 'boolean' },
  prefix: { type: 'string' },
  delimiter: { type: 'string' },
  offset: { type: 'string' },
  limit: { type: 'string' },
  'public-write': { type: 'boolean' }
} as const

export type Flags = ReturnType<typeof parseFlags>['values']

function parseFlags(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true })
}

export interface ParsedCommand {
  flags: Flags
  group?: string
  command?: string
  args: string[]
}

export function parseCommandLine(argv: string[]): ParsedCommand {
  let parsed: ReturnType<typeof parseFlags>
  try {
    parsed = parseFlags(argv)
  } catch (e) {
    throw new InvalidCallError(e instanceof Error ? e.message : String(e), { cause: e })
  }
  const [group, command, ...args] = parsed.positionals
  return { flags: parsed.values, group, command, args }
}

export const USAGE = `Usage: vaultline [global flags] <group> <command> [args]

Global flags:
  --network <name>          network from the networks file (default: testnet)
  --network-config <path>   alternative networks file
  --rpc-url <url>           consensus-node RPC endpoint
  --object-api-url <url>    object API endpoint
  --private-key <hex>       signing key (or VAULTLINE_PRIVATE_KEY)
  --broadcast-mode <mode>   async | sync | commit (default: commit)
  --height <h>              committed | pending | <block> (default: committed)
  --gas-limit <n>  --gas-fee-cap <atto>  --gas-premium <atto>
  -v, --verbose             more logging (repeatable)
  -q, --quiet               no logging

Commands:
  account  create | info | sequence | balance [--address]
           deposit <amount> [--to] | withdraw <amount> [--to] | transfer <amount> --to <addr>
           credit stats | credit balance [--address] | credit buy <amount> [--to]
           credit approve --to <addr> [--caller] [--limit] [--ttl]
           credit approval --to <addr> [--from] [--caller] | credit revoke --to <addr> [--caller]
  machine  info --address | list [--owner]
  bucket   create [--owner] [-m K=V]... | list [--owner]
           add --address --key <key> <path|-> [--ttl] [--overwrite] [-m K=V]...
           get --address --key <key> [--range] [--output] [--verify]
           head --address --key <key>
           delete --address --key <key>
           query --address [--prefix] [--delimiter] [--offset] [--limit]
           metadata --address --key <key> K[=V]...
  timehub  create [--owner] [--public-write] [-m K=V]... | list [--owner]
           push --address <value|-> | leaf --address <index>
           count --address | peaks --address | root --address
  blob     status <hash>
  tx       status <hash>
`
