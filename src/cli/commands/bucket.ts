import { Address } from '../../address'
import { bytesToHex } from '../../utils/bytes'
import { parseCount, parseMetadata, parseMetadataUpdate, parseUint } from '../../utils/parse'
import type { CliContext, CommandGroup } from '../context'
import { listOwned } from './machine'
import { objectView, receiptView } from './views'

function bucketOf(ctx: CliContext, write: boolean) {
  const address = Address.parse(ctx.requireFlag(ctx.flags.address, 'address'))
  return ctx.client.bucket(address, write ? ctx.requireSigner() : undefined)
}

export const bucketCommands: CommandGroup = {
  async create(ctx) {
    const { bucket, receipt } = await ctx.client.createBucket(ctx.requireSigner(), {
      owner: ctx.flags.owner ? Address.parse(ctx.flags.owner) : undefined,
      metadata: parseMetadata(ctx.flags.metadata ?? []),
      gas: ctx.gas
    })
    ctx.print({ address: bucket.address, robustAddress: receipt.data?.robustAddress ?? null, tx: receiptView(receipt) })
  },

  async list(ctx) {
    ctx.print(await listOwned(ctx, 'Bucket'))
  },

  async add(ctx, args) {
    const bucket = bucketOf(ctx, true)
    const key = ctx.requireFlag(ctx.flags.key, 'key')
    const data = await ctx.readInput(ctx.requireArg(args, 0, 'path'))
    const { receipt, hash, size } = await bucket.add(key, data, {
      ttl: ctx.flags.ttl ? parseUint(ctx.flags.ttl, 'ttl') : null,
      overwrite: ctx.flags.overwrite ?? false,
      metadata: parseMetadata(ctx.flags.metadata ?? []),
      mode: ctx.mode,
      gas: ctx.gas
    })
    ctx.print({
      key,
      hash: bytesToHex(hash, false),
      size,
      tx: receiptView(receipt, receipt.data ? objectView(receipt.data) : undefined)
    })
  },

  async get(ctx) {
    const bucket = bucketOf(ctx, false)
    const key = ctx.requireFlag(ctx.flags.key, 'key')
    const data = await bucket.get(key, { range: ctx.flags.range, height: ctx.height, verify: ctx.flags.verify })
    if (ctx.flags.output) await ctx.io.writeFile(ctx.flags.output, data)
    else ctx.io.stdout(data)
  },

  async head(ctx) {
    const bucket = bucketOf(ctx, false)
    const key = ctx.requireFlag(ctx.flags.key, 'key')
    ctx.print({ key, ...objectView(await bucket.head(key, ctx.height)) })
  },

  async delete(ctx) {
    const bucket = bucketOf(ctx, true)
    const receipt = await bucket.delete(ctx.requireFlag(ctx.flags.key, 'key'), { mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt))
  },

  async query(ctx) {
    const bucket = bucketOf(ctx, false)
    const listing = await bucket.query(
      {
        prefix: ctx.flags.prefix,
        delimiter: ctx.flags.delimiter,
        offset: ctx.flags.offset ? parseCount(ctx.flags.offset, 'offset') : undefined,
        limit: ctx.flags.limit ? parseCount(ctx.flags.limit, 'limit') : undefined
      },
      ctx.height
    )
    ctx.print({
      objects: listing.objects.map(({ key, object }) => ({ key, ...objectView(object) })),
      commonPrefixes: listing.commonPrefixes
    })
  },

  async metadata(ctx, args) {
    const bucket = bucketOf(ctx, true)
    const key = ctx.requireFlag(ctx.flags.key, 'key')
    ctx.requireArg(args, 0, 'KEY[=VALUE]')
    const receipt = await bucket.updateMetadata(key, parseMetadataUpdate(args), { mode: ctx.mode, gas: ctx.gas })
    ctx.print(receiptView(receipt))
  }
}
