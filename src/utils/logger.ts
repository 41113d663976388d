/**
 * Minimal namespaced logger for the SDK and CLI.
 *
 * Features:
 *  - Levels: debug, info, warn, error, silent
 *  - Namespace filtering via patterns (like `debug`) from VAULTLINE_DEBUG,
 *    e.g. "vaultline:tx*,vaultline:rpc"
 *  - Global level from VAULTLINE_LOG_LEVEL; tests default to "warn", otherwise "info"
 *  - Timers: time()/timeEnd() using performance.now()
 *  - Pluggable reporter hook to forward records to external sinks
 *
 * Output goes to stderr so that command output on stdout stays machine readable.
 */

import { BaseError } from '../errors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface LogRecord {
  ts: number
  ns: string
  level: LogLevel
  msg: string
  data?: unknown[]
}

export type LogReporter = (rec: LogRecord) => void
export type LogSink = (line: string) => void

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && (LOG_LEVELS as readonly string[]).includes(v)
}

// ──────────────────────────────────────────────────────────────────────────────
// Env read
// ──────────────────────────────────────────────────────────────────────────────

function readGlobalLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env.VAULTLINE_LOG_LEVEL?.trim().toLowerCase()
  if (isLogLevel(fromEnv)) return fromEnv
  const isTest = Boolean(env.VITEST || env.NODE_ENV === 'test')
  return isTest ? 'warn' : 'info'
}

function compilePattern(pat: string): RegExp {
  // "vaultline:*", "rpc" → regex
  const esc = pat.replace(/[-/\\^$+?.()|[\]{}]/g, '\\$&').replace(/\*/g, '.*')
  return new RegExp(`^${esc}$`)
}

let nsFilters: RegExp[] = []

/** Replace the namespace filter. An empty list enables every namespace. */
export function setNamespaceFilter(patterns: string | readonly string[]): void {
  const list = typeof patterns === 'string' ? patterns.split(/[,\s]+/) : patterns
  nsFilters = list.map((s) => s.trim()).filter(Boolean).map(compilePattern)
}

setNamespaceFilter(process.env.VAULTLINE_DEBUG ?? '')

function nsEnabled(ns: string): boolean {
  if (nsFilters.length === 0) return true
  return nsFilters.some((re) => re.test(ns))
}

// ──────────────────────────────────────────────────────────────────────────────
// Reporter & sink
// ──────────────────────────────────────────────────────────────────────────────

let reporter: LogReporter | undefined
let sink: LogSink = (line) => {
  process.stderr.write(`${line}\n`)
}

/** Install an optional reporter (e.g., to forward errors). */
export function setReporter(r: LogReporter | undefined): void {
  reporter = r
}

/** Redirect formatted lines (tests capture them; default is stderr). */
export function setSink(s: LogSink): void {
  sink = s
}

// ──────────────────────────────────────────────────────────────────────────────
// Logger
// ──────────────────────────────────────────────────────────────────────────────

export interface Logger {
  readonly ns: string
  getLevel(): LogLevel
  setLevel(lvl: LogLevel): void

  debug(msg: string, ...data: unknown[]): void
  info(msg: string, ...data: unknown[]): void
  warn(msg: string, ...data: unknown[]): void
  error(msg: string, ...data: unknown[]): void

  /** Start a timer; call timeEnd with the same label to log duration. */
  time(label?: string): void
  timeEnd(label?: string, msg?: string, ...data: unknown[]): void

  /** Create a child logger with an extended namespace (ns:child). */
  child(suffix: string): Logger

  /** Log only once per unique key for this logger instance. */
  once(key: string, level: LogLevel, msg: string, ...data: unknown[]): void
}

class LoggerImpl implements Logger {
  readonly ns: string
  private level: LogLevel | undefined
  private timers = new Map<string, number>()
  private onceKeys = new Set<string>()

  constructor(ns: string, level?: LogLevel) {
    this.ns = ns
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level ?? rootLevel
  }

  setLevel(lvl: LogLevel): void {
    this.level = lvl
  }

  child(suffix: string): Logger {
    return new LoggerImpl(suffix ? `${this.ns}:${suffix}` : this.ns, this.level)
  }

  private shouldLog(level: LogLevel): boolean {
    if (level === 'silent') return false
    const current = this.getLevel()
    if (current === 'silent') return false
    if (!nsEnabled(this.ns)) return false
    return LEVEL_ORDER[level] >= LEVEL_ORDER[current]
  }

  private emit(level: LogLevel, msg: string, args: unknown[]) {
    const ts = Date.now()
    const time = new Date(ts).toISOString().slice(11, 23)
    const extra = args.length ? ` ${args.map(renderArg).join(' ')}` : ''
    sink(`[${time}] ${this.ns} ${level}: ${msg}${extra}`)
    try {
      reporter?.({ ts, ns: this.ns, level, msg, data: args })
    } catch (e) {
      sink(`[${time}] ${this.ns} error: log reporter failed ${renderArg(serializeError(e))}`)
    }
  }

  debug(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('debug')) this.emit('debug', msg, data)
  }
  info(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('info')) this.emit('info', msg, data)
  }
  warn(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('warn')) this.emit('warn', msg, data)
  }
  error(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('error')) this.emit('error', msg, data)
  }

  time(label = 'default'): void {
    this.timers.set(label, performance.now())
  }

  timeEnd(label = 'default', msg = 'completed', ...data: unknown[]): void {
    const start = this.timers.get(label)
    this.timers.delete(label)
    if (start === undefined) {
      this.warn(`timer "${label}" ended without start`)
      return
    }
    this.debug(`${msg} (${label})`, { duration_ms: +(performance.now() - start).toFixed(3) }, ...data)
  }

  once(key: string, level: LogLevel, msg: string, ...data: unknown[]): void {
    const k = `${this.ns}::${key}`
    if (this.onceKeys.has(k)) return
    this.onceKeys.add(k)
    if (this.shouldLog(level)) this.emit(level, msg, data)
  }
}

function renderArg(a: unknown): string {
  if (typeof a === 'string') return a
  try {
    return JSON.stringify(a, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
  } catch {
    return String(a)
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Public API
// ──────────────────────────────────────────────────────────────────────────────

let rootLevel: LogLevel = readGlobalLevel()

/** Change the level used by every logger that has no explicit level of its own. */
export function setDefaultLevel(lvl: LogLevel): void {
  rootLevel = lvl
}

export function getDefaultLevel(): LogLevel {
  return rootLevel
}

/** Create a logger for a given namespace. */
export function createLogger(namespace: string): Logger {
  return new LoggerImpl(namespace)
}

/** Convenience root logger. */
export const log = createLogger('vaultline')

// ──────────────────────────────────────────────────────────────────────────────
// Error utilities
// ──────────────────────────────────────────────────────────────────────────────

/** Serialize unknown error into a safe object for logging or reporting. */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof BaseError) {
    return {
      name: err.name,
      kind: err.kind,
      message: err.message,
      code: err.code,
      context: err.context,
      cause: err.cause === undefined ? undefined : serializeError(err.cause)
    }
  }
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      cause: err.cause === undefined ? undefined : serializeError(err.cause)
    }
  }
  return { message: String(err) }
}
