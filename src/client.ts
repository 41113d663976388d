/**
 * Client: wires the network configuration to the RPC transport, query engine,
 * builder, broadcaster and sequence tracker, and hands out account, bucket
 * and timehub handles.
 *
 * Usage:
 *   import { Client, Wallet } from 'vaultline'
 *   const client = Client.fromNetwork({ network: 'localnet' })
 *   const account = client.account(new Wallet(secretKey))
 *   const { bucket } = await client.createBucket(account.signer)
 *   await bucket.add('docs/readme.txt', utf8ToBytes('hello'))
 */

import { Address, toAddress, type Network } from './address'
import { Account } from './account'
import { Bucket, createMachine, Timehub, type CreateMachineOptions } from './machine'
import { resolveNetwork, type NetworkOverrides, type NetworkSettings } from './network/config'
import { ObjectClient } from './object/client'
import { QueryEngine, type MachineInfo } from './query/engine'
import type { Height } from './query/height'
import { CometClient, createHttpClient, type RpcTransport, type TxLookup } from './rpc'
import { Broadcaster, type BroadcastMode, type TxReceipt } from './tx/broadcast'
import { TransactionBuilder } from './tx/build'
import type { CreatedMachine, MachineListing } from './query/decode'
import { TxSender } from './tx/send'
import { SequenceTracker } from './tx/sequence'
import { DecodeError } from './errors'
import { createLogger, type Logger } from './utils/logger'
import { VoidSigner, type Signer } from './wallet/signer'

export interface ClientOptions {
  /** Consensus-node transport; defaults to HTTP JSON-RPC at network.rpcUrl. */
  transport?: RpcTransport
  /** Object API client; defaults to one at network.objectApiUrl. */
  objects?: ObjectClient
  /** Parent-chain EVM JSON-RPC; defaults to network.parent.evmRpcUrl when configured. */
  parent?: RpcTransport | null
  /** Default broadcast mode for senders. Default 'commit'. */
  mode?: BroadcastMode
  commitTimeoutMs?: number
  /** Prefix used when printing addresses. Default 'testnet'. */
  addressNetwork?: Network
  logger?: Logger
}

export class Client {
  readonly network: NetworkSettings
  readonly node: CometClient
  readonly query: QueryEngine
  readonly objects: ObjectClient
  readonly broadcaster: Broadcaster
  readonly sequences: SequenceTracker
  readonly builder: TransactionBuilder
  readonly mode: BroadcastMode
  readonly addressNetwork: Network
  private log: Logger
  private senders = new Map<string, TxSender>()

  constructor(network: NetworkSettings, opts: ClientOptions = {}) {
    this.network = network
    this.log = opts.logger ?? createLogger('vaultline:client')
    this.mode = opts.mode ?? 'commit'
    this.addressNetwork = opts.addressNetwork ?? 'testnet'

    this.node = new CometClient(opts.transport ?? createHttpClient(network.rpcUrl))
    this.objects = opts.objects ?? new ObjectClient(network.objectApiUrl)
    const parent =
      opts.parent === undefined
        ? network.parent
          ? createHttpClient(network.parent.evmRpcUrl, { logger: createLogger('vaultline:parent') })
          : undefined
        : opts.parent ?? undefined

    this.query = new QueryEngine(this.node, { objects: this.objects, parent })
    this.broadcaster = new Broadcaster(this.node, { commitTimeoutMs: opts.commitTimeoutMs })
    this.sequences = new SequenceTracker(this.query)
    this.builder = new TransactionBuilder({
      chain: this.query,
      sequences: this.sequences,
      gateway: network.gatewayAddress
    })
    this.log.debug('client ready', { network: network.name, rpcUrl: network.rpcUrl, chainId: network.chainId })
  }

  /** Client for a configured network (file presets, env and overrides). */
  static fromNetwork(overrides: NetworkOverrides = {}, opts?: ClientOptions): Client {
    return new Client(resolveNetwork(overrides), opts)
  }

  /** Sender for a signer; one per address so they share the account lock. */
  sender(signer: Signer): TxSender {
    const key = signer.address.key()
    const cached = this.senders.get(key)
    if (cached && cached.signer === signer) return cached
    const sender = new TxSender({
      signer,
      chainId: this.network.chainId,
      builder: this.builder,
      broadcaster: this.broadcaster,
      sequences: this.sequences,
      mode: this.mode
    })
    this.senders.set(key, sender)
    return sender
  }

  account(signerOrAddress: Signer | Address | string): Account {
    return new Account(this, toSigner(signerOrAddress))
  }

  bucket(address: Address | string, signer?: Signer): Bucket {
    return new Bucket(this, toAddress(address), signer)
  }

  timehub(address: Address | string, signer?: Signer): Timehub {
    return new Timehub(this, toAddress(address), signer)
  }

  async createBucket(
    signer: Signer,
    opts: Omit<CreateMachineOptions, 'writeAccess'> = {}
  ): Promise<{ bucket: Bucket; receipt: TxReceipt<CreatedMachine> }> {
    const receipt = await createMachine(this, signer, 'Bucket', opts)
    return { bucket: this.bucket(requireCreated(receipt).address, signer), receipt }
  }

  async createTimehub(
    signer: Signer,
    opts: CreateMachineOptions = {}
  ): Promise<{ timehub: Timehub; receipt: TxReceipt<CreatedMachine> }> {
    const receipt = await createMachine(this, signer, 'Timehub', opts)
    return { timehub: this.timehub(requireCreated(receipt).address, signer), receipt }
  }

  async machineInfo(address: Address | string, height?: Height): Promise<MachineInfo> {
    return this.query.machineInfo(toAddress(address), height)
  }

  async listMachines(owner: Address | string, height?: Height): Promise<MachineListing[]> {
    return this.query.listMachines(toAddress(owner), height)
  }

  /** Look up a transaction by hash, e.g. after a ConfirmationTimeout. */
  async txStatus(hash: string): Promise<TxLookup | null> {
    return this.broadcaster.lookup(hash)
  }

  /** Text form of an address using the client's network prefix. */
  formatAddress(address: Address): string {
    return address.toString(this.addressNetwork)
  }
}

function toSigner(s: Signer | Address | string): Signer {
  if (typeof s === 'string') return new VoidSigner(Address.parse(s))
  if (s instanceof Address) return new VoidSigner(s)
  return s
}

/** Create calls always wait for commit, so a receipt without data is malformed. */
function requireCreated(receipt: TxReceipt<CreatedMachine>): CreatedMachine {
  if (!receipt.data) throw new DecodeError(`receipt ${receipt.hash} carries no machine address`)
  return receipt.data
}

export default Client
