/**
 * Deterministic JSON encoding, with object keys in sorted order
 *
 * @module utils/stable-json
 */

import { isObject } from './type-utils'

/**
 * Encode a value so that equal parameter sets produce equal strings
 *
 * Bigints and byte arrays, which JSON cannot carry, get tagged encodings.
 *
 * @throws Error on circular structures
 */
export function stableStringify(value: unknown, seen = new WeakSet<object>()): string {
  if (typeof value === 'bigint') return `${value.toString()}n`
  if (value === undefined) return 'null'
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value)
  }
  if (value instanceof Uint8Array) return `bytes(${Array.from(value).join(',')})`
  if (seen.has(value)) {
    throw new Error('Cannot stable-stringify circular structure')
  }
  seen.add(value)
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item, seen)).join(',')}]`
  }
  if (!isObject(value)) return JSON.stringify(value)
  const keys = Object.keys(value).sort()
  const entries = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key], seen)}`)
  return `{${entries.join(',')}}`
}
