/**
 * JSON-RPC 2.0 envelopes, the transport contract, and response guards.
 */

export type JsonRpcId = string | number | null

export interface JsonRpcRequest<P = unknown> {
  jsonrpc: '2.0'
  method: string
  params?: P
  id: JsonRpcId
}

export interface JsonRpcErrorObject<D = unknown> {
  code: number
  message: string
  data?: D
}

export interface JsonRpcSuccess<R = unknown> {
  jsonrpc: '2.0'
  result: R
  id: JsonRpcId
}

export interface JsonRpcFailure<D = unknown> {
  jsonrpc: '2.0'
  error: JsonRpcErrorObject<D>
  id: JsonRpcId
}

export type JsonRpcResponse<R = unknown, D = unknown> = JsonRpcSuccess<R> | JsonRpcFailure<D>

/** Options common to transports */
export interface RequestOptions {
  /** Abort the in-flight request */
  signal?: AbortSignal
  /** Per-request timeout (ms). */
  timeoutMs?: number
  /** Override the transport's retry count for this call (0 disables retries). */
  retries?: number
  /**
   * Which failures are retried. 'transient' (default) covers connection
   * failures, attempt timeouts and 408/429/5xx; 'connection' only failures
   * before any response arrived.
   */
  retryOn?: 'transient' | 'connection'
}

/**
 * Minimal transport interface used throughout the SDK. Results are untyped
 * JSON; callers validate them before use.
 */
export interface RpcTransport {
  request(method: string, params?: unknown, opts?: RequestOptions): Promise<unknown>
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x)
}

/** Guard for JSON-RPC failure responses */
export function isJsonRpcFailure(x: unknown): x is JsonRpcFailure {
  return (
    isRecord(x) &&
    x.jsonrpc === '2.0' &&
    isRecord(x.error) &&
    typeof x.error.code === 'number' &&
    typeof x.error.message === 'string'
  )
}

/** Guard for JSON-RPC success responses */
export function isJsonRpcSuccess(x: unknown): x is JsonRpcSuccess {
  return isRecord(x) && x.jsonrpc === '2.0' && 'result' in x
}
