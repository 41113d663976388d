/**
 * Prefix/delimiter listing over bucket keys.
 *
 * Among keys starting with `prefix`: when the remainder after the prefix
 * contains `delimiter`, the part up to and including its first occurrence is
 * reported once under `commonPrefixes` and the key itself is left out;
 * otherwise the key is listed. Listed objects are ordered by key (byte order)
 * and sliced to [offset, offset + limit). A limit of 0 means MAX_LIST_LIMIT.
 * An empty delimiter disables grouping.
 */

import { InvalidCallError } from '../errors'
import { compareBytes, utf8ToBytes } from '../utils/bytes'

export const DEFAULT_DELIMITER = '/'
export const MAX_LIST_LIMIT = 1000

export interface ListQuery {
  prefix?: string
  delimiter?: string
  offset?: number
  limit?: number
}

export interface Listed<T> {
  objects: Array<{ key: string; value: T }>
  commonPrefixes: string[]
}

/** Normalized query with defaults applied. */
export function normalizeListQuery(q: ListQuery = {}): Required<ListQuery> {
  const offset = q.offset ?? 0
  const limit = q.limit ?? 0
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new InvalidCallError(`offset must be a non-negative integer, got ${offset}`, { field: 'offset' })
  }
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new InvalidCallError(`limit must be a non-negative integer, got ${limit}`, { field: 'limit' })
  }
  return {
    prefix: q.prefix ?? '',
    delimiter: q.delimiter ?? DEFAULT_DELIMITER,
    offset,
    limit: limit === 0 || limit > MAX_LIST_LIMIT ? MAX_LIST_LIMIT : limit
  }
}

export function listKeys<T>(entries: Iterable<{ key: string; value: T }>, query?: ListQuery): Listed<T> {
  const { prefix, delimiter, offset, limit } = normalizeListQuery(query)

  const sorted = Array.from(entries)
    .map((e) => ({ ...e, raw: utf8ToBytes(e.key) }))
    .sort((a, b) => compareBytes(a.raw, b.raw))

  const objects: Array<{ key: string; value: T }> = []
  const seen = new Set<string>()
  const commonPrefixes: string[] = []

  for (const { key, value } of sorted) {
    if (!key.startsWith(prefix)) continue
    const rest = key.slice(prefix.length)
    const at = delimiter === '' ? -1 : rest.indexOf(delimiter)
    if (at >= 0) {
      const common = prefix + rest.slice(0, at + delimiter.length)
      if (!seen.has(common)) {
        seen.add(common)
        commonPrefixes.push(common)
      }
      continue
    }
    objects.push({ key, value })
  }

  return { objects: objects.slice(offset, offset + limit), commonPrefixes }
}

export default listKeys
