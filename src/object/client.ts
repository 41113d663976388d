/**
 * Object API client: stages object content before the add-object transaction
 * and serves byte-range reads of stored objects.
 *
 * Endpoints:
 *  - GET  v1/node                                   → { node_id }
 *  - POST v1/objects                                 multipart: chain_id, msg, hash, size, data
 *  - HEAD v1/objects/{bucket}/{key}?height=h         content-length = object size
 *  - GET  v1/objects/{bucket}/{key}?height=h         Range: bytes=s-e → 206 (or 200, sliced here)
 *
 * 404 surfaces as NotFound and 416 as RangeNotSatisfiable; other failures left
 * after bounded retry surface as NetworkError.
 */

import { z } from 'zod'
import type { Address } from '../address'
import { DecodeError, NetworkError, NotFoundError, RangeNotSatisfiableError } from '../errors'
import { formatZodError } from '../network/schema'
import { bytesToBase64, bytesToHex, hexToBytes } from '../utils/bytes'
import { createLogger, type Logger } from '../utils/logger'
import { fetchWithRetry, HttpError, TimeoutError, type FetchRetryOptions } from '../utils/retry'
import { heightToWire, type Height } from '../query/height'
import { rangeHeader, rangeLength, type ByteRange } from '../query/range'
import { userAgent } from '../version'

export interface ObjectClientOptions {
  headers?: Record<string, string>
  retry?: FetchRetryOptions
  /** Per-attempt timeout (ms). Default 60_000. */
  timeoutMs?: number
  logger?: Logger
}

export interface UploadRequest {
  chainId: bigint
  /** Signed upload-authorization envelope. */
  message: Uint8Array
  /** blake3 of the content. */
  hash: Uint8Array
  size: bigint
  data: Blob | Uint8Array
}

export interface UploadResult {
  metadataHash: Uint8Array
}

const NodeInfo = z.object({ node_id: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/) })
const UploadResponse = z.object({ metadata_hash: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/) })

function objectPath(bucket: Address, key: string): string {
  return `v1/objects/${bucket.toString()}/${key.split('/').map(encodeURIComponent).join('/')}`
}

export class ObjectClient {
  readonly url: string
  private headers: Record<string, string>
  private retry: FetchRetryOptions
  private timeoutMs: number
  private log: Logger

  constructor(baseUrl: string, opts?: ObjectClientOptions) {
    this.url = baseUrl.replace(/\s+/g, '').replace(/\/+$/, '')
    this.headers = { 'user-agent': userAgent(), ...(opts?.headers ?? {}) }
    this.retry = { retries: 3, minDelay: 200, factor: 2, maxDelay: 10_000, jitter: 'full', ...(opts?.retry ?? {}) }
    this.timeoutMs = opts?.timeoutMs ?? 60_000
    this.log = opts?.logger ?? createLogger('vaultline:objects')
  }

  /** Node id of the object API, used as the upload source. */
  async nodeId(signal?: AbortSignal): Promise<Uint8Array> {
    const res = await this.fetch('v1/node', { method: 'GET' }, signal)
    const body = parseBody(NodeInfo, 'v1/node', await readJson(res, this.url))
    return hexToBytes(body.node_id)
  }

  /** Stage content. The upload is not retried: the body is a one-shot stream. */
  async upload(req: UploadRequest, signal?: AbortSignal): Promise<UploadResult> {
    const form = new FormData()
    form.set('chain_id', req.chainId.toString())
    form.set('msg', bytesToBase64(req.message, true))
    form.set('hash', bytesToHex(req.hash, false))
    form.set('size', req.size.toString())
    form.set('data', req.data instanceof Blob ? req.data : new Blob([req.data.slice()]), 'data')

    this.log.debug('uploading object', { size: req.size.toString(), hash: bytesToHex(req.hash, false) })
    const res = await this.fetch('v1/objects', { method: 'POST', body: form }, signal, { retries: 0 })
    const body = parseBody(UploadResponse, 'v1/objects', await readJson(res, this.url))
    return { metadataHash: hexToBytes(body.metadata_hash) }
  }

  /** Object size at a height. */
  async objectSize(bucket: Address, key: string, height: Height = 'committed', signal?: AbortSignal): Promise<number> {
    const path = `${objectPath(bucket, key)}?height=${heightToWire(height)}`
    const res = await this.fetch(path, { method: 'HEAD' }, signal, { acceptStatus: [404] })
    if (res.status === 404) throw new NotFoundError(`object "${key}" not found in ${bucket.toString()}`)
    const len = Number(res.headers.get('content-length'))
    if (!Number.isSafeInteger(len) || len < 0) {
      throw new DecodeError(`HEAD ${path}: missing or invalid content-length`)
    }
    return len
  }

  /** Object content, or the inclusive byte range of it. */
  async download(
    bucket: Address,
    key: string,
    opts: { range?: ByteRange; height?: Height; signal?: AbortSignal } = {}
  ): Promise<Uint8Array> {
    const path = `${objectPath(bucket, key)}?height=${heightToWire(opts.height ?? 'committed')}`
    const headers: Record<string, string> = opts.range ? { range: rangeHeader(opts.range) } : {}
    const res = await this.fetch(path, { method: 'GET', headers }, opts.signal, { acceptStatus: [404, 416] })

    if (res.status === 404) throw new NotFoundError(`object "${key}" not found in ${bucket.toString()}`)
    if (res.status === 416) {
      throw new RangeNotSatisfiableError(opts.range ? rangeHeader(opts.range) : '', {
        size: parseUnsatisfiedSize(res.headers.get('content-range'))
      })
    }

    const body = new Uint8Array(await res.arrayBuffer())
    const { range } = opts
    if (!range || res.status === 206) return body
    // Server ignored the Range header.
    if (range.end >= body.length) throw new RangeNotSatisfiableError(rangeHeader(range), { size: body.length })
    return body.subarray(range.start, range.start + rangeLength(range))
  }

  // ────────────────────────────────────────────────────────────────────────────

  private async fetch(
    path: string,
    init: RequestInit,
    signal?: AbortSignal,
    extra?: FetchRetryOptions
  ): Promise<Response> {
    const url = `${this.url}/${path}`
    const headers = { ...this.headers, ...headerRecord(init.headers) }
    try {
      return await fetchWithRetry(
        url,
        { ...init, headers },
        {
          ...this.retry,
          attemptTimeoutMs: this.timeoutMs,
          signal,
          ...extra,
          onRetry: ({ attempt, nextDelayMs, error }) => {
            this.log.warn('retrying object request', {
              path,
              attempt,
              nextDelayMs,
              error: error instanceof Error ? error.message : String(error)
            })
          }
        }
      )
    } catch (e) {
      if (e instanceof HttpError) {
        throw new NetworkError(`${init.method ?? 'GET'} ${path}: ${e.message}`, {
          url,
          status: e.status,
          cause: e,
          data: e.bodyText
        })
      }
      if (e instanceof TimeoutError || e instanceof TypeError) {
        throw new NetworkError(`${init.method ?? 'GET'} ${path}: ${e.message}`, { url, cause: e })
      }
      throw e
    }
  }
}

function headerRecord(h: RequestInit['headers']): Record<string, string> {
  if (!h) return {}
  return Object.fromEntries(new Headers(h).entries())
}

async function readJson(res: Response, url: string): Promise<unknown> {
  const text = await res.text()
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new NetworkError(`invalid JSON from object API`, { url, status: res.status, cause: e })
  }
}

function parseBody<S extends z.ZodTypeAny>(schema: S, path: string, raw: unknown): z.output<S> {
  const r = schema.safeParse(raw)
  if (!r.success) throw new DecodeError(`${path}: unexpected response (${formatZodError(r.error)})`, { data: raw })
  return r.data
}

/** `bytes *\/123` → 123 */
function parseUnsatisfiedSize(contentRange: string | null): number | undefined {
  const m = contentRange ? /\/(\d+)$/.exec(contentRange) : null
  return m ? Number(m[1]) : undefined
}

export default ObjectClient
