/**
 * Bucket handle: staged uploads, range reads, listing and metadata updates.
 *
 * Adding an object is two steps: the content is staged on the object API
 * under a signed upload authorization, then an add-object transaction records
 * key, hash, size and metadata in the bucket.
 */

import type { ObjectGetOptions, BucketListing } from '../query/engine'
import type { Height } from '../query/height'
import type { ListQuery } from '../query/listing'
import type { Metadata, ObjectRecord } from '../query/decode'
import type { TxReceipt } from '../tx/broadcast'
import type { SendOptions } from '../tx/send'
import { MAX_OBJECT_SIZE, validateMetadata } from '../tx/calls'
import { signTx } from '../tx/encode'
import { objectUploadMessage } from '../tx/message'
import { Method } from '../tx/methods'
import { InvalidCallError, PayloadTooLargeError } from '../errors'
import { encodeCbor } from '../utils/cbor'
import { blake3 } from '../utils/hash'
import { createLogger } from '../utils/logger'
import { MachineHandle } from './handle'

const log = createLogger('vaultline:bucket')

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

export interface AddObjectOptions extends SendOptions {
  /** Lifetime in blocks; omitted uses the bucket default. */
  ttl?: bigint | null
  metadata?: Metadata
  /** Replace an existing object under the same key. */
  overwrite?: boolean
}

export interface AddObjectResult {
  receipt: TxReceipt<ObjectRecord>
  /** blake3 of the content, computed before upload. */
  hash: Uint8Array
  size: bigint
}

export class Bucket extends MachineHandle {
  async add(key: string, content: Uint8Array | Blob, opts: AddObjectOptions = {}): Promise<AddObjectResult> {
    const signer = this.requireSigner()
    if (key.length === 0) throw new InvalidCallError('object key must not be empty', { field: 'key' })

    const data = content instanceof Blob ? new Uint8Array(await content.arrayBuffer()) : content
    const size = BigInt(data.length)
    if (size > MAX_OBJECT_SIZE) throw new PayloadTooLargeError(data.length, Number(MAX_OBJECT_SIZE), { field: 'content' })

    const metadata: Metadata = { 'content-type': DEFAULT_CONTENT_TYPE, ...(opts.metadata ?? {}) }
    validateMetadata(metadata)

    const hash = blake3(data)
    const { objects, network } = this.client
    const source = await objects.nodeId()
    const authorization = await signTx(
      signer,
      objectUploadMessage(signer.address, this.address, Method.AddObject, encodeCbor([source, hash, size])),
      network.chainId
    )
    const { metadataHash } = await objects.upload({
      chainId: network.chainId,
      message: authorization.bytes,
      hash,
      size,
      data
    })
    log.debug('staged object', { bucket: this.address.toString(), key, size })

    const receipt = await this.client.sender(signer).sendOrThrow(
      {
        kind: 'addObject',
        bucket: this.address,
        key,
        source,
        hash,
        recoveryHash: metadataHash,
        size,
        ttl: opts.ttl ?? null,
        metadata,
        overwrite: opts.overwrite ?? false
      },
      opts
    )
    return { receipt, hash, size }
  }

  /** Content (or a byte range of it) at a height. */
  async get(key: string, opts: ObjectGetOptions = {}): Promise<Uint8Array> {
    return this.client.query.objectGet(this.address, key, opts)
  }

  /** Stored record without content. */
  async head(key: string, height?: Height): Promise<ObjectRecord> {
    return this.client.query.getObject(this.address, key, height)
  }

  async query(query: ListQuery = {}, height?: Height): Promise<BucketListing> {
    return this.client.query.bucketQuery(this.address, query, height)
  }

  async delete(key: string, opts: SendOptions = {}): Promise<TxReceipt<null>> {
    return this.client.sender(this.requireSigner()).sendOrThrow({ kind: 'deleteObject', bucket: this.address, key }, opts)
  }

  /** Set or (with null) remove metadata entries on a stored object. */
  async updateMetadata(
    key: string,
    metadata: Record<string, string | null>,
    opts: SendOptions = {}
  ): Promise<TxReceipt<null>> {
    return this.client
      .sender(this.requireSigner())
      .sendOrThrow({ kind: 'updateObjectMetadata', bucket: this.address, key, metadata }, opts)
  }
}

export default Bucket
