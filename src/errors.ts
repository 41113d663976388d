/**
 * Typed errors for the vaultline SDK.
 *
 * Every error carries a `kind` discriminator so SDK and CLI callers can branch
 * without instanceof checks across module copies:
 *  - InvalidKey / InvalidCall (PayloadTooLarge): validation, raised before any network call
 *  - SequenceMismatch / TransactionRejected / ConfirmationTimeout: broadcast outcomes
 *  - NetworkError: transport failures left after bounded retry
 *  - NotFound / RangeNotSatisfiable / IndexOutOfRange: query outcomes
 *  - RpcError / DecodeError / ConfigError: protocol, codec and configuration failures
 */

export type ErrorKind =
  | 'InvalidKey'
  | 'InvalidCall'
  | 'SequenceMismatch'
  | 'TransactionRejected'
  | 'ConfirmationTimeout'
  | 'NetworkError'
  | 'NotFound'
  | 'RangeNotSatisfiable'
  | 'IndexOutOfRange'
  | 'RpcError'
  | 'DecodeError'
  | 'ConfigError'

export interface ErrorOptions {
  /** Optional numeric code (chain exit code, JSON-RPC error code or HTTP status). */
  code?: number
  /** Arbitrary structured data (e.g., JSON-RPC error.data). */
  data?: unknown
  /** Original cause. */
  cause?: unknown
  /** Additional context fields (safe to log). */
  context?: Record<string, unknown>
}

/** Narrow error-like shapes without forcing instanceof checks across realms. */
export function isErrorLike(x: unknown): x is { message: string } {
  return typeof x === 'object' && x !== null && 'message' in x && typeof x.message === 'string'
}

/** Coerce unknown into an Error with best-effort message. */
export function ensureError(e: unknown, fallback = 'Unknown error'): Error {
  if (e instanceof Error) return e
  if (isErrorLike(e)) return new Error(e.message)
  if (typeof e === 'string') return new Error(e)
  try {
    return new Error(JSON.stringify(e) ?? fallback)
  } catch {
    return new Error(fallback)
  }
}

/** Base SDK error with a kind discriminator and optional machine-readable fields. */
export abstract class BaseError extends Error {
  abstract readonly kind: ErrorKind
  readonly code?: number
  readonly data?: unknown
  override readonly cause?: unknown
  readonly context?: Record<string, unknown>

  constructor(message: string, opts: ErrorOptions = {}) {
    super(message, { cause: opts.cause })
    this.name = new.target.name
    this.code = opts.code
    this.data = opts.data
    this.cause = opts.cause
    this.context = opts.context
  }
}

/** Malformed or unusable signing key material. */
export class InvalidKeyError extends BaseError {
  readonly kind = 'InvalidKey'
}

/** Call-specific validation failure. */
export class InvalidCallError extends BaseError {
  readonly kind = 'InvalidCall'
  /** Offending field, when one can be named. */
  readonly field?: string

  constructor(message: string, opts: ErrorOptions & { field?: string } = {}) {
    super(message, opts)
    this.field = opts.field
  }
}

/** Payload exceeds a size limit. */
export class PayloadTooLargeError extends InvalidCallError {
  readonly limit: number
  readonly size: number

  constructor(size: number, limit: number, opts: ErrorOptions & { field?: string } = {}) {
    super(`payload of ${size} bytes exceeds the maximum of ${limit} bytes`, opts)
    this.size = size
    this.limit = limit
  }
}

/** The chain expected a different sequence than the one attached. */
export class SequenceMismatchError extends BaseError {
  readonly kind = 'SequenceMismatch'
  readonly sequence?: bigint
  readonly txHash?: string

  constructor(message: string, opts: ErrorOptions & { sequence?: bigint; txHash?: string } = {}) {
    super(message, opts)
    this.sequence = opts.sequence
    this.txHash = opts.txHash
  }
}

/** Where in the node a transaction was rejected. */
export type RejectionStage = 'check' | 'deliver'

/** Chain-level rejection carrying the chain's diagnostic code and log. */
export class TransactionRejectedError extends BaseError {
  readonly kind = 'TransactionRejected'
  readonly stage: RejectionStage
  readonly log: string
  readonly info: string
  readonly codespace: string
  readonly txHash?: string

  constructor(
    code: number,
    opts: ErrorOptions & { stage: RejectionStage; log?: string; info?: string; codespace?: string; txHash?: string }
  ) {
    const log = opts.log ?? ''
    const info = opts.info ?? ''
    const detail = [info && `info: ${info}`, log && `log: ${log}`].filter(Boolean).join('; ')
    super(`transaction rejected (code ${code})${detail ? `: ${detail}` : ''}`, { ...opts, code })
    this.stage = opts.stage
    this.log = log
    this.info = info
    this.codespace = opts.codespace ?? ''
    this.txHash = opts.txHash
  }
}

/** Local wait for block inclusion expired. The hash stays valid for later lookup. */
export class ConfirmationTimeoutError extends BaseError {
  readonly kind = 'ConfirmationTimeout'
  readonly txHash: string
  readonly timeoutMs: number

  constructor(txHash: string, timeoutMs: number, opts: ErrorOptions = {}) {
    super(`timed out after ${timeoutMs}ms waiting for ${txHash} to commit; it may still be included`, opts)
    this.txHash = txHash
    this.timeoutMs = timeoutMs
  }
}

/** Transport failure that survived bounded retry. */
export class NetworkError extends BaseError {
  readonly kind = 'NetworkError'
  readonly url?: string
  readonly status?: number

  constructor(message: string, opts: ErrorOptions & { url?: string; status?: number } = {}) {
    super(message, opts)
    this.url = opts.url
    this.status = opts.status
  }
}

/** Queried machine, object, or actor does not exist at the requested height. */
export class NotFoundError extends BaseError {
  readonly kind = 'NotFound'
}

/** Byte range cannot be served for the object. */
export class RangeNotSatisfiableError extends BaseError {
  readonly kind = 'RangeNotSatisfiable'
  readonly range: string
  readonly size?: number

  constructor(range: string, opts: ErrorOptions & { size?: number } = {}) {
    super(
      opts.size === undefined
        ? `range "${range}" is not satisfiable`
        : `range "${range}" is not satisfiable for an object of ${opts.size} bytes`,
      opts
    )
    this.range = range
    this.size = opts.size
  }
}

/** Timehub index at or beyond the current count. */
export class IndexOutOfRangeError extends BaseError {
  readonly kind = 'IndexOutOfRange'
  readonly index: bigint
  readonly count: bigint

  constructor(index: bigint, count: bigint, opts: ErrorOptions = {}) {
    super(`index ${index} is out of range; timehub holds ${count} entries`, opts)
    this.index = index
    this.count = count
  }
}

/** JSON-RPC error object, or a query the chain answered with a failure code. */
export class RpcError extends BaseError {
  readonly kind = 'RpcError'
  readonly method: string

  constructor(method: string, message: string, opts: ErrorOptions = {}) {
    super(message, opts)
    this.method = method
  }
}

/** Response bytes did not match the expected shape. */
export class DecodeError extends BaseError {
  readonly kind = 'DecodeError'
}

/** Network configuration missing or invalid. */
export class ConfigError extends BaseError {
  readonly kind = 'ConfigError'
}

/** Union of every SDK error. */
export type VaultlineError =
  | InvalidKeyError
  | InvalidCallError
  | SequenceMismatchError
  | TransactionRejectedError
  | ConfirmationTimeoutError
  | NetworkError
  | NotFoundError
  | RangeNotSatisfiableError
  | IndexOutOfRangeError
  | RpcError
  | DecodeError
  | ConfigError

/** Type guard for SDK errors. */
export function isVaultlineError(e: unknown): e is VaultlineError {
  return e instanceof BaseError
}

/** Kind of an SDK error, or undefined for foreign errors. */
export function errorKind(e: unknown): ErrorKind | undefined {
  return e instanceof BaseError ? e.kind : undefined
}

/**
 * Human-friendly stringification of an error for logs and CLI output.
 */
export function formatError(e: unknown): string {
  if (e instanceof BaseError) {
    const parts = [e.kind, e.message]
    if (e instanceof RpcError) parts.push(`method=${e.method}`)
    if (e.code !== undefined && !(e instanceof TransactionRejectedError)) parts.push(`code=${e.code}`)
    if (e instanceof TransactionRejectedError && e.txHash) parts.push(`hash=${e.txHash}`)
    return parts.join(' | ')
  }
  const err = ensureError(e)
  return `${err.name}: ${err.message}`
}
