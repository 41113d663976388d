/**
 * In-process object API on node:http for tests.
 *
 *  - GET  /v1/node            node id
 *  - POST /v1/objects         multipart upload; checks the signed authorization
 *  - HEAD /v1/objects/...     size of the object a bucket key points at
 *  - GET  /v1/objects/...     content, honoring single byte ranges
 *
 * Keys resolve to content through the FakeNode's committed bucket state.
 */

import http from 'node:http'
import { Address } from '../../src/address'
import { decodeEnvelope } from '../../src/tx/encode'
import { bytesToHex, base64ToBytes, concatBytes, equalBytes, hexToBytes } from '../../src/utils/bytes'
import { decodeCbor, readArray, readBigInt, readBytes } from '../../src/utils/cbor'
import { blake3 } from '../../src/utils/hash'
import { verifyMessageSignature } from '../../src/wallet/signer'
import type { FakeNode } from './fakeNode'

export const NODE_ID = new Uint8Array(32).fill(7)

export interface ObjectServer {
  url: string
  /** Content by blake3 hex. */
  blobs: Map<string, Uint8Array>
  /** Request log: "METHOD path" plus the Range header when present. */
  requests: string[]
  /** Answer ranged GETs with the whole body and status 200. */
  ignoreRanges: boolean
  /** Status for the next upload instead of handling it (e.g. 503). */
  failUploads: number | null
  close(): Promise<void>
}

/** Metadata hash the server reports for staged content. */
export function metadataHashOf(hash: Uint8Array): Uint8Array {
  return blake3(concatBytes([hash, new TextEncoder().encode('metadata')]))
}

async function readBody(req: http.IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  return Buffer.concat(chunks)
}

function send(res: http.ServerResponse, status: number, body?: string | Uint8Array, headers: http.OutgoingHttpHeaders = {}) {
  res.writeHead(status, headers)
  res.end(body)
}

export async function startObjectServer(node: FakeNode): Promise<ObjectServer> {
  const state: Omit<ObjectServer, 'url' | 'close'> = {
    blobs: new Map(),
    requests: [],
    ignoreRanges: false,
    failUploads: null
  }

  async function upload(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (state.failUploads !== null) {
      send(res, state.failUploads, 'unavailable')
      return
    }
    const body = await readBody(req)
    const headers = new Headers()
    for (const [k, v] of Object.entries(req.headers)) if (typeof v === 'string') headers.set(k, v)
    const form = await new Request('http://object-api/v1/objects', { method: 'POST', headers, body }).formData()

    const msg = form.get('msg')
    const hash = form.get('hash')
    const size = form.get('size')
    const chainId = form.get('chain_id')
    const data = form.get('data')
    if (typeof msg !== 'string' || typeof hash !== 'string' || typeof size !== 'string' || typeof chainId !== 'string') {
      send(res, 400, 'missing fields')
      return
    }
    if (!(data instanceof Blob)) {
      send(res, 400, 'missing data')
      return
    }
    const { message, signature } = decodeEnvelope(base64ToBytes(msg))
    if (!verifyMessageSignature(message, BigInt(chainId), signature)) {
      send(res, 401, 'bad authorization')
      return
    }
    const [source, signedHash, signedSize] = readArray(decodeCbor(message.params), 'upload', 3)
    const content = new Uint8Array(await data.arrayBuffer())
    const contentHash = blake3(content)
    if (
      !equalBytes(readBytes(source, 'source'), NODE_ID) ||
      !equalBytes(readBytes(signedHash, 'hash'), hexToBytes(hash)) ||
      !equalBytes(contentHash, hexToBytes(hash)) ||
      readBigInt(signedSize, 'size') !== BigInt(size) ||
      BigInt(content.length) !== BigInt(size)
    ) {
      send(res, 400, 'upload does not match its authorization')
      return
    }
    state.blobs.set(hash, content)
    send(res, 200, JSON.stringify({ metadata_hash: bytesToHex(metadataHashOf(contentHash), false) }), {
      'content-type': 'application/json'
    })
  }

  function object(req: http.IncomingMessage, res: http.ServerResponse, url: URL): void {
    const [bucketText, ...keyParts] = url.pathname.slice('/v1/objects/'.length).split('/')
    const key = keyParts.map(decodeURIComponent).join('/')
    const height = BigInt(url.searchParams.get('height') ?? '0')
    const hash = node.objectHash(Address.parse(bucketText), key, height)
    const content = hash ? state.blobs.get(bytesToHex(hash, false)) : undefined
    if (!content) {
      send(res, 404, req.method === 'HEAD' ? undefined : 'not found')
      return
    }
    if (req.method === 'HEAD') {
      send(res, 200, undefined, { 'content-length': content.length })
      return
    }
    const range = req.headers.range
    if (!range || state.ignoreRanges) {
      send(res, 200, content, { 'content-length': content.length })
      return
    }
    const m = /^bytes=(\d+)-(\d+)$/.exec(range)
    const start = m ? Number(m[1]) : NaN
    const end = m ? Math.min(Number(m[2]), content.length - 1) : NaN
    if (!m || start > end || start >= content.length) {
      send(res, 416, undefined, { 'content-range': `bytes */${content.length}` })
      return
    }
    send(res, 206, content.subarray(start, end + 1), {
      'content-range': `bytes ${start}-${end}/${content.length}`,
      'content-length': end - start + 1
    })
  }

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://object-api')
    state.requests.push(`${req.method} ${url.pathname}${req.headers.range ? ` ${req.headers.range}` : ''}`)
    const handle = async (): Promise<void> => {
      if (req.method === 'GET' && url.pathname === '/v1/node') {
        send(res, 200, JSON.stringify({ node_id: bytesToHex(NODE_ID, false) }), { 'content-type': 'application/json' })
      } else if (req.method === 'POST' && url.pathname === '/v1/objects') {
        await upload(req, res)
      } else if ((req.method === 'GET' || req.method === 'HEAD') && url.pathname.startsWith('/v1/objects/')) {
        object(req, res, url)
      } else {
        send(res, 404, 'no route')
      }
    }
    handle().catch((e: unknown) => send(res, 500, e instanceof Error ? e.message : String(e)))
  })

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const addr = server.address()
  if (!addr || typeof addr === 'string') throw new Error('object server has no TCP address')

  return Object.assign(state, {
    url: `http://127.0.0.1:${addr.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((e) => (e ? reject(e) : resolve()))
        server.closeAllConnections()
      })
  })
}
