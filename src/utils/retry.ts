/**
 * Retry helpers with exponential backoff, jitter, AbortSignal support and per-attempt timeouts.
 *
 * Exports:
 *  - sleep(ms, signal)
 *  - backoffDelay(attempt, opts)
 *  - retryAsync(fn, opts)
 *  - fetchWithRetry(url, init?, opts?)
 *  - parseRetryAfter(header)
 *  - mergeSignals(signals)
 *  - isConnectionError(err)
 */

export type JitterMode = 'none' | 'full'

export interface BackoffOptions {
  /** Base delay (ms) for the first retry attempt. Default: 200ms */
  minDelay?: number
  /** Exponential factor. Default: 2 */
  factor?: number
  /** Cap for delay (ms). Default: 10_000ms */
  maxDelay?: number
  /** Jitter strategy. Default: 'full' */
  jitter?: JitterMode
}

export interface RetryOptions extends BackoffOptions {
  /** Total number of retries (not counting the initial attempt). Default: 5 */
  retries?: number
  /** Hard timeout per attempt (ms). If elapsed, the attempt fails with TimeoutError. */
  attemptTimeoutMs?: number
  /** An AbortSignal to cancel the whole retry loop. */
  signal?: AbortSignal
  /**
   * Called before each retry wait. Return false to cancel further retries and rethrow the error.
   */
  onRetry?: (info: { attempt: number; error: unknown; nextDelayMs: number }) => void | boolean
  /**
   * Custom predicate to decide if an error should be retried.
   * If omitted, built-ins apply (network errors, timeouts, 408/429/5xx).
   */
  shouldRetry?: (err: unknown, attempt: number) => boolean
  /** Override the computed backoff for a specific error (e.g. a Retry-After hint). */
  delayFor?: (err: unknown, computedMs: number) => number
}

export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortError'
  }
}

/** A single attempt exceeded attemptTimeoutMs. */
export class TimeoutError extends Error {
  readonly timeoutMs: number
  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** Abortable sleep */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve, reject) => {
    const t = setTimeout(done, ms)
    function done() {
      cleanup()
      resolve()
    }
    function onAbort() {
      cleanup()
      reject(new AbortError())
    }
    function cleanup() {
      clearTimeout(t)
      signal?.removeEventListener('abort', onAbort)
    }
    if (signal?.aborted) return onAbort()
    signal?.addEventListener('abort', onAbort)
  })
}

/** Compute backoff delay (ms) for attempt number (1-based) */
export function backoffDelay(attempt: number, opts?: BackoffOptions): number {
  const factor = opts?.factor ?? 2
  const min = opts?.minDelay ?? 200
  const max = opts?.maxDelay ?? 10_000
  const jitter = opts?.jitter ?? 'full'
  const base = Math.min(max, Math.floor(min * Math.pow(factor, Math.max(0, attempt - 1))))
  if (jitter === 'none') return base
  // full jitter: uniform in [0, base]
  return Math.floor(Math.random() * (base + 1))
}

/**
 * Retry an async factory `fn` up to `retries` times on failure.
 * The factory receives (attempt, signal) where attempt starts at 1.
 */
export async function retryAsync<T>(
  fn: (attempt: number, signal: AbortSignal) => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const retries = opts?.retries ?? 5
  const backoffOpts: BackoffOptions = {
    minDelay: opts?.minDelay,
    factor: opts?.factor,
    maxDelay: opts?.maxDelay,
    jitter: opts?.jitter
  }
  const globalSignal = opts?.signal

  for (let attempt = 1; ; attempt++) {
    if (globalSignal?.aborted) throw new AbortError()

    const ctl = new AbortController()
    const cleanups: Array<() => void> = []
    const cleanup = () => cleanups.forEach((f) => f())

    const onAbort = () => ctl.abort(new AbortError())
    if (globalSignal) {
      globalSignal.addEventListener('abort', onAbort)
      cleanups.push(() => globalSignal.removeEventListener('abort', onAbort))
    }

    let timedOut: TimeoutError | undefined
    const timeoutMs = opts?.attemptTimeoutMs
    if (timeoutMs && timeoutMs > 0) {
      const id = setTimeout(() => {
        timedOut = new TimeoutError(timeoutMs)
        ctl.abort(timedOut)
      }, timeoutMs)
      cleanups.push(() => clearTimeout(id))
    }

    try {
      const res = await fn(attempt, ctl.signal)
      cleanup()
      return res
    } catch (thrown) {
      cleanup()
      // An abort caused by our own attempt timer is a timeout, not a cancellation.
      const err = timedOut && isAbortLike(thrown) ? timedOut : thrown

      if (isAbortLike(err)) throw err

      const willRetry =
        attempt <= retries &&
        (opts?.shouldRetry ? safeShouldRetry(opts.shouldRetry, err, attempt) : defaultRetryPredicate(err))

      if (!willRetry) throw err

      const computed = backoffDelay(attempt, backoffOpts)
      const delay = opts?.delayFor ? opts.delayFor(err, computed) : computed
      if (opts?.onRetry?.({ attempt, error: err, nextDelayMs: delay }) === false) throw err

      await sleep(delay, globalSignal)
    }
  }
}

/** Default retry predicate: retry likely-transient errors. */
export function defaultRetryPredicate(err: unknown): boolean {
  if (isConnectionError(err)) return true
  if (err instanceof TimeoutError) return true
  if (typeof err === 'object' && err !== null) {
    if ('retryable' in err && typeof err.retryable === 'boolean') return err.retryable
    if ('status' in err && typeof err.status === 'number') return isRetryableStatus(err.status)
  }
  return false
}

/** The request never got a response (refused, reset, DNS). fetch() reports these as TypeError. */
export function isConnectionError(err: unknown): boolean {
  return err instanceof TypeError
}

function isRetryableStatus(s: number): boolean {
  return s === 408 || s === 429 || (s >= 500 && s <= 599)
}

function safeShouldRetry(fn: (err: unknown, attempt: number) => boolean, err: unknown, attempt: number): boolean {
  try {
    return fn(err, attempt)
  } catch {
    return false
  }
}

function isAbortLike(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError'
}

/** HTTP failure raised by fetchWithRetry for non-OK responses */
export class HttpError extends Error {
  readonly status: number
  readonly statusText: string
  readonly bodyText?: string
  constructor(message: string, status: number, statusText: string, bodyText?: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.statusText = statusText
    this.bodyText = bodyText
  }
}

/** Options specific to fetchWithRetry */
export interface FetchRetryOptions extends RetryOptions {
  /**
   * Methods considered safe/idempotent for retries. Default: ['GET','HEAD','PUT','DELETE','OPTIONS']
   * For POSTs, explicitly include 'POST' here if the endpoint is idempotent on your server.
   */
  retryMethods?: string[]
  /** Honor Retry-After (seconds or HTTP-date) on 429/503. Default: true */
  honorRetryAfter?: boolean
  /** Extra status codes treated as retryable. */
  extraRetryStatus?: number[]
  /** Status codes returned as-is instead of raising HttpError (e.g. 206, 404 handled by caller). */
  acceptStatus?: number[]
}

/** Non-OK response carried through retryAsync. */
class RetryableResponse extends Error {
  readonly response: Response
  readonly status: number
  readonly retryAfterMs?: number
  constructor(response: Response, retryAfterMs?: number) {
    super(`HTTP ${response.status} ${response.statusText}`)
    this.response = response
    this.status = response.status
    this.retryAfterMs = retryAfterMs
  }
}

/**
 * fetchWithRetry: retries transient HTTP failures (408, 429, 5xx, network, attempt timeout) with backoff.
 * Returns a Response (ok, or listed in acceptStatus) or throws HttpError for other non-ok responses.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<Response> {
  const retryMethods = (opts?.retryMethods ?? ['GET', 'HEAD', 'PUT', 'DELETE', 'OPTIONS']).map((m) => m.toUpperCase())
  const method = (init?.method ?? 'GET').toUpperCase()
  const methodRetryable = retryMethods.includes(method)
  const honorRetryAfter = opts?.honorRetryAfter ?? true
  const accept = opts?.acceptStatus ?? []

  const shouldRetry = (err: unknown, attempt: number): boolean => {
    if (!methodRetryable) return false
    if (opts?.shouldRetry) return safeShouldRetry(opts.shouldRetry, err, attempt)
    if (err instanceof RetryableResponse) {
      return isRetryableStatus(err.status) || (opts?.extraRetryStatus?.includes(err.status) ?? false)
    }
    return defaultRetryPredicate(err)
  }

  const mergedSignal = mergeSignals([opts?.signal, init?.signal])

  try {
    return await retryAsync<Response>(
      async (_attempt, signal) => {
        const response = await fetch(url, { ...init, signal: mergeSignals([signal, mergedSignal]) })
        if (response.ok || accept.includes(response.status)) return response

        let retryAfterMs: number | undefined
        if (honorRetryAfter && (response.status === 429 || response.status === 503)) {
          const ra = response.headers.get('retry-after')
          retryAfterMs = ra ? parseRetryAfter(ra) : undefined
        }
        throw new RetryableResponse(response, retryAfterMs)
      },
      {
        ...opts,
        signal: mergedSignal,
        shouldRetry,
        delayFor: (err, computed) =>
          err instanceof RetryableResponse && err.retryAfterMs ? Math.max(computed, err.retryAfterMs) : computed
      }
    )
  } catch (err) {
    if (err instanceof RetryableResponse) {
      const bodyText = await err.response.text().catch(() => undefined)
      throw new HttpError(err.message, err.status, err.response.statusText, bodyText)
    }
    throw err
  }
}

/** Parse Retry-After header value to milliseconds (returns 0 if invalid). */
export function parseRetryAfter(v: string): number {
  if (!v) return 0
  const sec = Number(v)
  if (Number.isFinite(sec) && sec >= 0) return Math.floor(sec * 1000)
  const when = Date.parse(v)
  if (!Number.isNaN(when)) {
    const ms = when - Date.now()
    return ms > 0 ? ms : 0
  }
  return 0
}

/** Merge multiple AbortSignals into one. If any aborts, the merged aborts with the same reason. */
export function mergeSignals(signals: Array<AbortSignal | undefined | null>): AbortSignal | undefined {
  const list = signals.filter((s): s is AbortSignal => s != null)
  if (list.length === 0) return undefined
  if (list.length === 1) return list[0]
  const ctl = new AbortController()
  for (const s of list) {
    if (s.aborted) {
      ctl.abort(s.reason)
      return ctl.signal
    }
  }
  const listeners = list.map((s) => {
    const onAbort = () => ctl.abort(s.reason)
    s.addEventListener('abort', onAbort)
    return () => s.removeEventListener('abort', onAbort)
  })
  ctl.signal.addEventListener('abort', () => listeners.forEach((off) => off()))
  return ctl.signal
}

export default {
  AbortError,
  TimeoutError,
  sleep,
  backoffDelay,
  retryAsync,
  fetchWithRetry,
  parseRetryAfter,
  mergeSignals,
  HttpError,
  isConnectionError
}
