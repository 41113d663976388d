/**
 * Per-invocation CLI context: resolved network, signer, height, broadcast
 * mode and gas overrides, plus the client built from them.
 * Flags win over environment variables.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { Address } from '../address'
import { Client, type ClientOptions } from '../client'
import { InvalidCallError, InvalidKeyError } from '../errors'
import { resolveNetwork, type Env, type NetworkSettings } from '../network/config'
import type { Height } from '../query/height'
import { parseHeight } from '../query/height'
import type { BroadcastMode } from '../tx/broadcast'
import type { GasOverrides } from '../tx/build'
import { isLogLevel, setDefaultLevel, type LogLevel } from '../utils/logger'
import { parseBroadcastMode, parseUint } from '../utils/parse'
import { Wallet, type Signer } from '../wallet/signer'
import type { Flags } from './args'
import { renderJson } from './output'

export interface CliIO {
  stdout(chunk: string | Uint8Array): void
  stderr(line: string): void
  readStdin(): Promise<Uint8Array>
  readFile(path: string): Promise<Uint8Array>
  writeFile(path: string, data: Uint8Array): Promise<void>
  env: Env
}

export interface CliDeps extends Partial<CliIO> {
  /** Client construction hook; tests pass in-process transports here. */
  createClient?: (network: NetworkSettings, opts: ClientOptions) => Client
}

async function readAll(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
  const chunks: Uint8Array[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
  }
  return new Uint8Array(Buffer.concat(chunks))
}

export const processIO: CliIO = {
  stdout: (chunk) => {
    process.stdout.write(chunk)
  },
  stderr: (line) => {
    process.stderr.write(line.endsWith('\n') ? line : `${line}\n`)
  },
  readStdin: () => readAll(process.stdin),
  readFile: async (path) => new Uint8Array(await readFile(path)),
  writeFile: (path, data) => writeFile(path, data),
  env: process.env
}

/** Log level from -v/-q, then VAULTLINE_LOG_LEVEL, then warn. */
export function cliLogLevel(flags: Flags, env: Env): LogLevel {
  if (flags.quiet) return 'silent'
  const verbosity = flags.verbose?.length ?? 0
  if (verbosity >= 2) return 'debug'
  if (verbosity === 1) return 'info'
  const fromEnv = env.VAULTLINE_LOG_LEVEL
  return isLogLevel(fromEnv) ? fromEnv : 'warn'
}

export class CliContext {
  readonly flags: Flags
  readonly io: CliIO
  private deps: CliDeps
  private cachedNetwork?: NetworkSettings
  private cachedClient?: Client
  private cachedWallet?: Wallet | null

  constructor(flags: Flags, io: CliIO, deps: CliDeps = {}) {
    this.flags = flags
    this.io = io
    this.deps = deps
    setDefaultLevel(cliLogLevel(flags, io.env))
  }

  get network(): NetworkSettings {
    if (!this.cachedNetwork) {
      this.cachedNetwork = resolveNetwork(
        {
          network: this.flags.network,
          networkConfig: this.flags['network-config'],
          rpcUrl: this.flags['rpc-url'],
          objectApiUrl: this.flags['object-api-url']
        },
        this.io.env
      )
    }
    return this.cachedNetwork
  }

  get client(): Client {
    if (!this.cachedClient) {
      const opts: ClientOptions = { mode: this.mode }
      this.cachedClient = this.deps.createClient
        ? this.deps.createClient(this.network, opts)
        : new Client(this.network, opts)
    }
    return this.cachedClient
  }

  get mode(): BroadcastMode {
    const raw = this.flags['broadcast-mode'] ?? this.io.env.VAULTLINE_BROADCAST_MODE
    return raw ? parseBroadcastMode(raw) : 'commit'
  }

  get height(): Height {
    return this.flags.height ? parseHeight(this.flags.height) : 'committed'
  }

  get gas(): GasOverrides {
    const gas: GasOverrides = {}
    if (this.flags['gas-limit']) gas.gasLimit = parseUint(this.flags['gas-limit'], 'gas-limit')
    if (this.flags['gas-fee-cap']) gas.gasFeeCap = parseUint(this.flags['gas-fee-cap'], 'gas-fee-cap')
    if (this.flags['gas-premium']) gas.gasPremium = parseUint(this.flags['gas-premium'], 'gas-premium')
    return gas
  }

  /** Wallet from --private-key or VAULTLINE_PRIVATE_KEY, if either is set. */
  get wallet(): Wallet | null {
    if (this.cachedWallet === undefined) {
      const key = this.flags['private-key'] ?? this.io.env.VAULTLINE_PRIVATE_KEY
      this.cachedWallet = key ? new Wallet(key) : null
    }
    return this.cachedWallet
  }

  /** Signing wallet; InvalidKey when no key was supplied. */
  requireSigner(): Signer {
    const w = this.wallet
    if (!w) throw new InvalidKeyError('a private key is required: pass --private-key or set VAULTLINE_PRIVATE_KEY')
    return w
  }

  /** Address from a flag value, falling back to the signer's. */
  addressOr(value: string | undefined, flag: string): Address {
    if (value) return Address.parse(value)
    const w = this.wallet
    if (!w) throw new InvalidCallError(`--${flag} is required without a private key`, { field: flag })
    return w.address
  }

  requireFlag(value: string | undefined, flag: string): string {
    if (value === undefined || value === '') throw new InvalidCallError(`--${flag} is required`, { field: flag })
    return value
  }

  requireArg(args: string[], index: number, name: string): string {
    const v = args[index]
    if (v === undefined) throw new InvalidCallError(`missing argument <${name}>`, { field: name })
    return v
  }

  print(value: unknown): void {
    this.io.stdout(renderJson(value))
  }

  async readInput(source: string): Promise<Uint8Array> {
    return source === '-' ? this.io.readStdin() : this.io.readFile(source)
  }
}

export type CommandHandler = (ctx: CliContext, args: string[]) => Promise<void>
export type CommandGroup = Record<string, CommandHandler>

/** Handler for `command` in a group; `label` names the group in the error. */
export function selectCommand(commands: CommandGroup, label: string, command: string | undefined): CommandHandler {
  if (command === undefined || !Object.hasOwn(commands, command)) {
    const known = Object.keys(commands).join(', ')
    throw new InvalidCallError(`unknown ${label} command "${command ?? ''}" (expected one of: ${known})`, {
      field: 'command'
    })
  }
  return commands[command]
}
