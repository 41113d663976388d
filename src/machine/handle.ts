import type { Address } from '../address'
import type { Client } from '../client'
import { InvalidKeyError } from '../errors'
import type { Signer } from '../wallet/signer'

/** Base for machine handles bound to an address and an optional signer. */
export abstract class MachineHandle {
  readonly address: Address
  protected client: Client
  protected signer?: Signer

  constructor(client: Client, address: Address, signer?: Signer) {
    this.client = client
    this.address = address
    this.signer = signer
  }

  protected requireSigner(): Signer {
    if (!this.signer?.canSign) {
      throw new InvalidKeyError(`a secret key is required to write to ${this.address.toString()}`)
    }
    return this.signer
  }
}
