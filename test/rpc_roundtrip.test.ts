import http from 'node:http'
import { afterAll, beforeAll, beforeEach, describe, expect, test } from 'vitest'
import { z } from 'zod'
import { Address } from '../src/address'
import { DecodeError, NetworkError, RpcError } from '../src/errors'
import { CometClient, createHttpClient } from '../src/rpc'
import { Broadcaster } from '../src/tx/broadcast'
import { signTx } from '../src/tx/encode'
import { localMessage } from '../src/tx/message'
import { METHOD_SEND } from '../src/tx/methods'
import { bytesToBase64, utf8ToBytes } from '../src/utils/bytes'
import { userAgent } from '../src/version'
import { Wallet } from '../src/wallet/signer'

// Lightweight JSON-RPC 2.0 mock server for tests
const RpcRequest = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown(),
  id: z.union([z.number(), z.string()])
})

let server: http.Server
let url: string
/** Status codes to answer with before handling requests normally. */
let failures: number[] = []
let seen: Array<{ method: string; params: unknown; userAgent?: string }> = []
/** Requests whose connection is dropped before any response. */
let resets = 0
/** Commit broadcasts answer that the node already holds the tx. */
let commitInCache = false
/** `tx` lookups that miss before the transaction is found. */
let lookupMisses = 0

function result(id: number | string, value: unknown) {
  return { jsonrpc: '2.0', result: value, id }
}

function handle(req: z.output<typeof RpcRequest>): unknown {
  switch (req.method) {
    case 'status':
      return result(req.id, { node_info: { network: 'test-chain' }, sync_info: { latest_block_height: '42' } })
    case 'abci_query':
      return result(req.id, { response: { code: 0, value: bytesToBase64(utf8ToBytes('hi')), height: '7' } })
    case 'broadcast_tx_commit':
      if (commitInCache) {
        return {
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal error', data: 'error on broadcastTxCommit: tx already exists in cache' },
          id: req.id
        }
      }
      // Older nodes name the execution result deliver_tx.
      return result(req.id, {
        check_tx: { code: 0 },
        deliver_tx: { code: 0, gas_used: '1234', data: bytesToBase64(utf8ToBytes('ok')) },
        hash: 'AA',
        height: 9
      })
    case 'broadcast_tx_sync':
      return result(req.id, { hash: 42 })
    case 'tx':
      if (lookupMisses > 0) {
        lookupMisses--
        return { jsonrpc: '2.0', error: { code: -32603, message: 'Internal error', data: 'tx not found' }, id: req.id }
      }
      return result(req.id, {
        hash: 'AB',
        height: '11',
        tx_result: { code: 0, gas_used: '77', data: bytesToBase64(utf8ToBytes('ok')) }
      })
    case 'shapeless':
      return { jsonrpc: '2.0', id: req.id }
    default:
      return { jsonrpc: '2.0', error: { code: -32601, message: 'Method not found', data: req.method }, id: req.id }
  }
}

beforeAll(async () => {
  server = http.createServer(async (req, res) => {
    const chunks: Buffer[] = []
    for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c))
    const parsed = RpcRequest.safeParse(JSON.parse(Buffer.concat(chunks).toString('utf8')))
    if (!parsed.success) {
      res.writeHead(400).end()
      return
    }
    seen.push({ method: parsed.data.method, params: parsed.data.params, userAgent: req.headers['user-agent'] })

    if (resets > 0) {
      resets--
      req.socket.destroy()
      return
    }
    const status = failures.shift()
    if (status !== undefined) {
      res.writeHead(status, { 'content-type': 'text/plain' }).end('busy')
      return
    }
    if (parsed.data.method === 'hang') return
    if (parsed.data.method === 'garbage') {
      res.writeHead(200, { 'content-type': 'text/plain' }).end('oops')
      return
    }
    res.writeHead(200, { 'content-type': 'application/json' }).end(JSON.stringify(handle(parsed.data)))
  })

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const addr = server.address()
  if (!addr || typeof addr === 'string') throw new Error('no addr')
  url = `http://127.0.0.1:${addr.port}`
})

afterAll(async () => {
  server.closeAllConnections()
  await new Promise<void>((resolve) => server.close(() => resolve()))
})

beforeEach(() => {
  failures = []
  seen = []
  resets = 0
  commitInCache = false
  lookupMisses = 0
})

const fastRetry = { minDelay: 1, maxDelay: 5 }

describe('HttpClient', () => {
  test('returns the result and identifies itself', async () => {
    const rpc = createHttpClient(url)
    const status = await rpc.request('status')
    expect(status).toEqual({ node_info: { network: 'test-chain' }, sync_info: { latest_block_height: '42' } })
    expect(seen).toEqual([{ method: 'status', params: undefined, userAgent: userAgent() }])
  })

  test('sends params as given', async () => {
    await createHttpClient(url).request('status', { verbose: true })
    expect(seen[0].params).toEqual({ verbose: true })
  })

  test('raises JSON-RPC errors as RpcError', async () => {
    const err = await createHttpClient(url).request('nope').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RpcError)
    if (!(err instanceof RpcError)) return
    expect(err.method).toBe('nope')
    expect(err.code).toBe(-32601)
    expect(err.message).toBe('Method not found')
    expect(err.data).toBe('nope')
  })

  test('retries busy responses', async () => {
    failures = [503, 502]
    const rpc = createHttpClient(url, { retry: fastRetry })
    await expect(rpc.request('status')).resolves.toBeDefined()
    expect(seen).toHaveLength(3)
  })

  test('gives up after the retry budget', async () => {
    failures = [503, 503, 503]
    const err = await createHttpClient(url, { retry: { ...fastRetry, retries: 1 } })
      .request('status')
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NetworkError)
    expect(err instanceof NetworkError && err.status).toBe(503)
    expect(seen).toHaveLength(2)
  })

  test('does not retry when disabled per request', async () => {
    failures = [503]
    await expect(createHttpClient(url, { retry: fastRetry }).request('status', undefined, { retries: 0 })).rejects.toThrow(
      NetworkError
    )
    expect(seen).toHaveLength(1)
  })

  test('does not retry client errors', async () => {
    failures = [400]
    await expect(createHttpClient(url, { retry: fastRetry }).request('status')).rejects.toThrow(NetworkError)
    expect(seen).toHaveLength(1)
  })

  test('times out a silent server', async () => {
    const err = await createHttpClient(url, { timeoutMs: 50, retry: { enabled: false } })
      .request('hang')
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NetworkError)
    expect(err instanceof NetworkError && err.message).toBe('hang: Attempt timed out after 50ms')
  })

  test('rejects bodies that are not JSON-RPC', async () => {
    await expect(createHttpClient(url).request('garbage')).rejects.toThrow('Invalid JSON from server; body="oops"')
    await expect(createHttpClient(url).request('shapeless')).rejects.toThrow('Invalid JSON-RPC response shape')
  })

  test('reports unreachable endpoints as NetworkError', async () => {
    const rpc = createHttpClient('http://127.0.0.1:1', { retry: { enabled: false } })
    await expect(rpc.request('status')).rejects.toThrow(NetworkError)
  })
})

describe('CometClient', () => {
  test('sends queries as hex and decodes the value', async () => {
    const node = new CometClient(createHttpClient(url))
    const res = await node.abciQuery(utf8ToBytes('q'), 5n)
    expect(seen[0].params).toEqual({ path: '', data: '71', height: '5', prove: false })
    expect(res.value).toEqual(utf8ToBytes('hi'))
    expect(res.height).toBe(7n)
    expect(res.code).toBe(0)
  })

  test('accepts the older deliver_tx field', async () => {
    const node = new CometClient(createHttpClient(url))
    const res = await node.broadcastTxCommit(utf8ToBytes('tx'))
    expect(seen[0].params).toEqual({ tx: bytesToBase64(utf8ToBytes('tx')) })
    expect(res.height).toBe(9n)
    expect(res.deliverTx.gas_used).toBe(1234n)
    expect(res.deliverTx.data).toEqual(utf8ToBytes('ok'))
  })

  test('rejects malformed responses', async () => {
    const node = new CometClient(createHttpClient(url))
    await expect(node.broadcastTxSync(utf8ToBytes('tx'))).rejects.toThrow(DecodeError)
  })
})

describe('Broadcaster over HTTP', () => {
  const wallet = new Wallet(`0x${'0'.repeat(63)}1`)
  const signed = () =>
    signTx(
      wallet,
      {
        ...localMessage(Address.fromId(1024), METHOD_SEND),
        from: wallet.address,
        value: 5n,
        gasLimit: 1_000_000n,
        gasFeeCap: 200n,
        gasPremium: 100_000n
      },
      314159n
    )
  const identity = (data: Uint8Array) => data

  test('resends a commit whose connection dropped before any response', async () => {
    resets = 1
    const tx = await signed()
    const broadcaster = new Broadcaster(new CometClient(createHttpClient(url, { retry: fastRetry })))
    const res = await broadcaster.submit(tx, 'commit', identity)
    expect(res).toEqual({
      ok: true,
      value: { hash: tx.hash, status: 'committed', height: 9n, gasUsed: 1234n, data: utf8ToBytes('ok') }
    })
    expect(seen.map((r) => r.method)).toEqual(['broadcast_tx_commit', 'broadcast_tx_commit'])
  })

  test('does not resend a commit the node answered with an error status', async () => {
    failures = [503]
    const broadcaster = new Broadcaster(new CometClient(createHttpClient(url, { retry: fastRetry })))
    const res = await broadcaster.submit(await signed(), 'commit', identity)
    expect(!res.ok && res.error).toBeInstanceOf(NetworkError)
    expect(seen).toHaveLength(1)
  })

  test('waits for inclusion when the node already holds the tx', async () => {
    commitInCache = true
    lookupMisses = 2
    const tx = await signed()
    const broadcaster = new Broadcaster(new CometClient(createHttpClient(url)), { pollIntervalMs: 1 })
    const res = await broadcaster.submit(tx, 'commit', identity)
    expect(res).toEqual({
      ok: true,
      value: { hash: tx.hash, status: 'committed', height: 11n, gasUsed: 77n, data: utf8ToBytes('ok') }
    })
    expect(seen.map((r) => r.method)).toEqual(['broadcast_tx_commit', 'tx', 'tx', 'tx'])
  })
})
