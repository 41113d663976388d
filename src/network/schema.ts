/**
 * zod schemas for the network-configuration file plus small helpers for
 * turning validation failures into one-line messages.
 *
 * File shape (config/networks.json):
 *   {
 *     "<name>": {
 *       "chainId": 2481632 | "2481632" | { "name": "<chain name>" },
 *       "rpcUrl": "http://…",
 *       "objectApiUrl": "http://…",
 *       "evmRpcUrl": "http://…",            (optional)
 *       "gatewayAddress": "t064",
 *       "registryAddress": "t065",
 *       "parent": {                          (optional)
 *         "evmRpcUrl": "http://…",
 *         "gatewayAddress": "0x…",
 *         "registryAddress": "0x…"
 *       }
 *     }
 *   }
 */

import { z } from 'zod'
import { Address } from '../address'
import { ConfigError } from '../errors'
import { chainIdFromName } from './chainid'

/** Pretty zod error formatter (one line per issue). */
export function formatZodError(e: z.ZodError): string {
  return e.issues
    .map((i) => {
      const path = i.path.length ? i.path.join('.') : '(root)'
      return `${path}: ${i.message}`
    })
    .join('; ')
}

/** Parse or throw ConfigError with a compact message. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, label?: string): z.output<S> {
  const r = schema.safeParse(data)
  if (!r.success) {
    const msg = formatZodError(r.error)
    throw new ConfigError(label ? `${label} invalid: ${msg}` : msg, { data })
  }
  return r.data
}

// ──────────────────────────────────────────────────────────────────────────────
// Primitive schemas
// ──────────────────────────────────────────────────────────────────────────────

export const HttpUrl = z
  .string()
  .url()
  .refine((u) => u.startsWith('http://') || u.startsWith('https://'), { message: 'expected http(s) URL' })
  .transform((u) => u.replace(/\/+$/, ''))

export const EthAddress = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, { message: 'expected 0x followed by 40 hex characters' })
  .transform((s) => s.toLowerCase())

/** Chain address in text form, parsed to an Address. */
export const ChainAddress = z.string().transform((s, ctx) => {
  try {
    return Address.parse(s)
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : 'invalid address' })
    return z.NEVER
  }
})

/** Chain id as number, decimal string, or a chain name to derive it from. */
export const ChainId = z
  .union([
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/),
    z.object({ name: z.string().min(1) })
  ])
  .transform((v) => (typeof v === 'object' ? chainIdFromName(v.name) : BigInt(v)))

// ──────────────────────────────────────────────────────────────────────────────
// File schemas
// ──────────────────────────────────────────────────────────────────────────────

export const ParentChainSchema = z.object({
  evmRpcUrl: HttpUrl,
  gatewayAddress: EthAddress,
  registryAddress: EthAddress
})
export type ParentChain = z.output<typeof ParentChainSchema>

export const NetworkEntrySchema = z.object({
  chainId: ChainId,
  rpcUrl: HttpUrl,
  objectApiUrl: HttpUrl,
  evmRpcUrl: HttpUrl.optional(),
  gatewayAddress: ChainAddress,
  registryAddress: ChainAddress,
  parent: ParentChainSchema.optional()
})
export type NetworkEntry = z.output<typeof NetworkEntrySchema>

export const NetworksFileSchema = z
  .record(z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, { message: 'invalid network name' }), NetworkEntrySchema)
  .refine((r) => Object.keys(r).length > 0, { message: 'at least one network is required' })
export type NetworksFile = z.output<typeof NetworksFileSchema>

export default { formatZodError, parseOrThrow, NetworksFileSchema, NetworkEntrySchema }
