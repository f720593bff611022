/**
 * Type utilities for narrowing values that arrive as `unknown`
 *
 * Engine rows, pragma results and parsed YAML are untyped. These helpers
 * narrow them without unsafe type assertions.
 *
 * @module utils/type-utils
 */

/**
 * Check if a value is a plain object (not null, not array, not primitive)
 *
 * @example
 * isObject({}) // true
 * isObject([]) // false
 * isObject(null) // false
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Read a string property from an untyped record
 */
export function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key]
  return typeof value === 'string' ? value : null
}

/**
 * Read a numeric property from an untyped record (bigint is narrowed to number)
 */
export function readNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key]
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  return null
}
