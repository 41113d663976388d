/**
 * Byte ranges for object reads.
 *
 * Accepted forms, each optionally prefixed with `bytes=`:
 *   start-end   inclusive bounds; an end past the object is clamped
 *   start-      from start to the end of the object
 *   -n          the last n bytes
 */

import { InvalidCallError, RangeNotSatisfiableError } from '../errors'

export type RangeSpec =
  | { kind: 'bounded'; start: number; end: number }
  | { kind: 'from'; start: number }
  | { kind: 'suffix'; length: number }

/** Inclusive byte range within an object. */
export interface ByteRange {
  start: number
  end: number
}

const RANGE_RE = /^(?:bytes=)?(\d*)-(\d*)$/

function toInt(s: string, input: string): number {
  const n = Number(s)
  if (!Number.isSafeInteger(n)) throw new InvalidCallError(`invalid range "${input}": bound too large`, { field: 'range' })
  return n
}

/** Parse range syntax; bounds are checked against an object size by resolveRange. */
export function parseRangeSpec(input: string): RangeSpec {
  const m = RANGE_RE.exec(input.trim())
  if (!m || (m[1] === '' && m[2] === '')) {
    throw new InvalidCallError(`invalid range "${input}": expected start-end, start- or -n`, { field: 'range' })
  }
  const [, a, b] = m
  if (a === '') return { kind: 'suffix', length: toInt(b, input) }
  if (b === '') return { kind: 'from', start: toInt(a, input) }
  return { kind: 'bounded', start: toInt(a, input), end: toInt(b, input) }
}

/** Resolve a spec against an object of `size` bytes. */
export function resolveRange(spec: RangeSpec, size: number, input = formatRangeSpec(spec)): ByteRange {
  const unsatisfiable = () => new RangeNotSatisfiableError(input, { size })
  if (size === 0) throw unsatisfiable()
  switch (spec.kind) {
    case 'bounded':
      if (spec.start > spec.end || spec.start >= size) throw unsatisfiable()
      return { start: spec.start, end: Math.min(spec.end, size - 1) }
    case 'from':
      if (spec.start >= size) throw unsatisfiable()
      return { start: spec.start, end: size - 1 }
    case 'suffix':
      if (spec.length === 0) throw unsatisfiable()
      return { start: Math.max(0, size - spec.length), end: size - 1 }
  }
}

export function parseRange(input: string, size: number): ByteRange {
  return resolveRange(parseRangeSpec(input), size, input)
}

export function formatRangeSpec(spec: RangeSpec): string {
  switch (spec.kind) {
    case 'bounded':
      return `${spec.start}-${spec.end}`
    case 'from':
      return `${spec.start}-`
    case 'suffix':
      return `-${spec.length}`
  }
}

/** HTTP Range header value. */
export function rangeHeader(r: ByteRange): string {
  return `bytes=${r.start}-${r.end}`
}

export function rangeLength(r: ByteRange): number {
  return r.end - r.start + 1
}
