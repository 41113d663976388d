/**
 * HTTP JSON-RPC 2.0 transport (fetch-based) with retries & AbortSignal support.
 *
 * Usage:
 *   import { createHttpClient } from 'vaultline/rpc'
 *   const rpc = createHttpClient('http://127.0.0.1:26657')
 *   const status = await rpc.request('status')
 *
 * Features:
 *  - Exponential backoff with jitter (429/5xx aware, honors Retry-After)
 *  - Per-attempt timeout and external AbortSignal
 *  - Transport failures left after retry surface as NetworkError;
 *    JSON-RPC error objects surface as RpcError
 */

import type { RpcTransport, RequestOptions, JsonRpcRequest } from './types'
import { isJsonRpcFailure, isJsonRpcSuccess } from './types'
import { fetchWithRetry, HttpError, isConnectionError, TimeoutError, type FetchRetryOptions } from '../utils/retry'
import { NetworkError, RpcError, ensureError } from '../errors'
import { createLogger, type Logger } from '../utils/logger'
import { userAgent } from '../version'

/** Options for the HTTP JSON-RPC client. */
export interface HttpClientOptions {
  /** Extra headers to send with every request (e.g., API keys). */
  headers?: Record<string, string>
  /**
   * Retry settings. Enable/disable and tune backoff/jitter.
   * Defaults: enabled=true, minDelay=200ms, factor=2, maxDelay=10s, full jitter, retries=3.
   */
  retry?: (FetchRetryOptions & { enabled?: boolean }) | undefined
  /**
   * Default per-attempt timeout (ms). Can be overridden per call via RequestOptions.timeoutMs.
   * Default: 15_000 ms.
   */
  timeoutMs?: number
  /** Function to create JSON-RPC ids. Default is an incrementing integer counter. */
  idFactory?: () => number | string
  logger?: Logger
}

/** Factory to create an HTTP JSON-RPC transport bound to a base URL. */
export function createHttpClient(baseUrl: string, opts?: HttpClientOptions): HttpClient {
  return new HttpClient(baseUrl, opts)
}

export class HttpClient implements RpcTransport {
  readonly url: string
  private headers: Record<string, string>
  private retry: FetchRetryOptions & { enabled: boolean }
  private timeoutMs: number
  private idFactory: () => number | string
  private log: Logger
  private seq = 1

  constructor(baseUrl: string, opts?: HttpClientOptions) {
    this.url = baseUrl.replace(/\s+/g, '')
    this.headers = {
      'content-type': 'application/json',
      accept: 'application/json',
      'user-agent': userAgent(),
      ...(opts?.headers ?? {})
    }
    const r = opts?.retry ?? {}
    this.retry = {
      ...r,
      enabled: r.enabled !== false,
      retries: r.retries ?? 3,
      minDelay: r.minDelay ?? 200,
      factor: r.factor ?? 2,
      maxDelay: r.maxDelay ?? 10_000,
      jitter: r.jitter ?? 'full',
      honorRetryAfter: r.honorRetryAfter ?? true,
      // Node RPC calls are reads or resubmissions of the same signed bytes.
      retryMethods: r.retryMethods ?? ['POST']
    }
    this.timeoutMs = opts?.timeoutMs ?? 15_000
    this.idFactory = opts?.idFactory ?? (() => this.seq++)
    this.log = opts?.logger ?? createLogger('vaultline:rpc')
  }

  /** Perform a single JSON-RPC request and return the raw result. */
  async request(method: string, params?: unknown, opts?: RequestOptions): Promise<unknown> {
    const id = this.idFactory()
    const payload: JsonRpcRequest = { jsonrpc: '2.0', method, id }
    if (params !== undefined) payload.params = params

    const retries = opts?.retries ?? (this.retry.enabled ? this.retry.retries : 0)
    const attemptTimeoutMs = opts?.timeoutMs ?? this.timeoutMs

    this.log.debug('request', { method, id })
    let response: Response
    try {
      response = await fetchWithRetry(
        this.url,
        { method: 'POST', headers: this.headers, body: JSON.stringify(payload) },
        {
          ...this.retry,
          retries,
          shouldRetry: opts?.retryOn === 'connection' ? isConnectionError : this.retry.shouldRetry,
          attemptTimeoutMs,
          signal: opts?.signal,
          onRetry: ({ attempt, error, nextDelayMs }) => {
            this.log.warn('retrying request', { method, attempt, nextDelayMs, error: ensureError(error).message })
          }
        }
      )
    } catch (e) {
      throw toNetworkError(e, this.url, method)
    }

    const json = await parseJson(response, this.url)
    if (isJsonRpcSuccess(json)) return json.result
    if (isJsonRpcFailure(json)) {
      throw new RpcError(method, json.error.message, { code: json.error.code, data: json.error.data })
    }
    throw new RpcError(method, 'Invalid JSON-RPC response shape', { code: -32603, data: json })
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

/** Map transport failures into NetworkError; aborts pass through untouched. */
function toNetworkError(e: unknown, url: string, method: string): unknown {
  if (e instanceof HttpError) {
    return new NetworkError(`${method}: ${e.message}`, { url, status: e.status, cause: e, data: e.bodyText })
  }
  if (e instanceof TimeoutError) {
    return new NetworkError(`${method}: ${e.message}`, { url, cause: e })
  }
  if (e instanceof TypeError) {
    return new NetworkError(`${method}: ${e.message}`, { url, cause: e })
  }
  return e
}

async function parseJson(res: Response, url: string): Promise<unknown> {
  const text = await res.text()
  try {
    return JSON.parse(text)
  } catch (e) {
    const hint = text && text.length < 2048 ? `; body="${text}"` : ''
    throw new NetworkError(`Invalid JSON from server${hint}`, { url, status: res.status, cause: e })
  }
}

export type { FetchRetryOptions } from '../utils/retry'
export default createHttpClient
