/**
 * @module machine
 * Machines are actors created through the address manager: key-value
 * buckets and append-only timehubs.
 */

import type { Address } from '../address'
import type { Client } from '../client'
import type { CreatedMachine, MachineKind, Metadata, WriteAccess } from '../query/decode'
import type { TxReceipt } from '../tx/broadcast'
import type { GasOverrides } from '../tx/build'
import type { Signer } from '../wallet/signer'

export interface CreateMachineOptions {
  /** Defaults to the signer. */
  owner?: Address
  /** Timehubs only; buckets are always owner-written. */
  writeAccess?: WriteAccess
  metadata?: Metadata
  gas?: GasOverrides
}

/** Create a machine; always waits for commit so the new address is known. */
export async function createMachine(
  client: Client,
  signer: Signer,
  machine: MachineKind,
  opts: CreateMachineOptions = {}
): Promise<TxReceipt<CreatedMachine>> {
  return client.sender(signer).sendOrThrow(
    { kind: 'createMachine', machine, owner: opts.owner, writeAccess: opts.writeAccess, metadata: opts.metadata },
    { mode: 'commit', gas: opts.gas }
  )
}

export { MachineHandle } from './handle'
export { Bucket } from './bucket'
export { Timehub } from './timehub'
export type { AddObjectOptions, AddObjectResult } from './bucket'
