/**
 * Network configuration: presets from config/networks.json (or the file named
 * by VAULTLINE_NETWORK_CONFIG) plus per-value overrides.
 *
 * Precedence, highest first: explicit overrides (CLI flags), environment
 * variables, the selected file entry.
 *
 * Environment:
 *  - VAULTLINE_NETWORK_CONFIG   path to a networks file
 *  - VAULTLINE_NETWORK          network name (default: testnet)
 *  - VAULTLINE_RPC_URL          consensus-node RPC endpoint
 *  - VAULTLINE_OBJECT_API_URL   object API endpoint
 *  - VAULTLINE_PRIVATE_KEY      hex secret key
 *  - VAULTLINE_BROADCAST_MODE   async | sync | commit
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import type { Address } from '../address'
import { ConfigError } from '../errors'
import { createLogger } from '../utils/logger'
import { HttpUrl, NetworksFileSchema, parseOrThrow, type NetworkEntry, type ParentChain } from './schema'

const log = createLogger('vaultline:config')

export const DEFAULT_NETWORK = 'testnet'
export const DEFAULT_NETWORKS_FILE = fileURLToPath(new URL('../../config/networks.json', import.meta.url))

export interface NetworkSettings {
  name: string
  chainId: bigint
  rpcUrl: string
  objectApiUrl: string
  evmRpcUrl?: string
  gatewayAddress: Address
  registryAddress: Address
  parent?: ParentChain
}

export interface NetworkOverrides {
  network?: string
  networkConfig?: string
  rpcUrl?: string
  objectApiUrl?: string
}

export type Env = Record<string, string | undefined>

// ──────────────────────────────────────────────────────────────────────────────
// Loading
// ──────────────────────────────────────────────────────────────────────────────

/** Read and validate a networks file. */
export function loadNetworks(path: string = DEFAULT_NETWORKS_FILE): Record<string, NetworkEntry> {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (e) {
    throw new ConfigError(`cannot read network config ${path}`, { cause: e })
  }
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    throw new ConfigError(`network config ${path} is not valid JSON`, { cause: e })
  }
  log.debug('loaded network config', { path })
  return parseOrThrow(NetworksFileSchema, json, `network config ${path}`)
}

function overrideUrl(value: string | undefined, label: string): string | undefined {
  if (value === undefined || value === '') return undefined
  return parseOrThrow(HttpUrl, value, label)
}

/** Resolve the active network from overrides, environment and the networks file. */
export function resolveNetwork(overrides: NetworkOverrides = {}, env: Env = process.env): NetworkSettings {
  const file = overrides.networkConfig ?? env.VAULTLINE_NETWORK_CONFIG ?? DEFAULT_NETWORKS_FILE
  const name = overrides.network ?? env.VAULTLINE_NETWORK ?? DEFAULT_NETWORK
  const networks = loadNetworks(file)
  const entry = networks[name]
  if (!entry) {
    throw new ConfigError(`unknown network "${name}"; known: ${Object.keys(networks).join(', ')}`, {
      context: { file }
    })
  }
  const rpcUrl = overrideUrl(overrides.rpcUrl ?? env.VAULTLINE_RPC_URL, 'rpc url') ?? entry.rpcUrl
  const objectApiUrl =
    overrideUrl(overrides.objectApiUrl ?? env.VAULTLINE_OBJECT_API_URL, 'object api url') ?? entry.objectApiUrl

  return {
    name,
    chainId: entry.chainId,
    rpcUrl,
    objectApiUrl,
    evmRpcUrl: entry.evmRpcUrl,
    gatewayAddress: entry.gatewayAddress,
    registryAddress: entry.registryAddress,
    parent: entry.parent
  }
}

export default resolveNetwork
