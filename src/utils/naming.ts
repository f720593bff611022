/**
 * Naming helpers for property and type names derived from SQL identifiers
 *
 * @module utils/naming
 */

import pluralize from 'pluralize'
import { ROW_TYPE_SUFFIX } from '../constants'

/**
 * How column names become property names
 */
export type PropertyNameGenerator = 'plain' | 'lowerCamelCase'

export const PROPERTY_NAME_GENERATORS: readonly PropertyNameGenerator[] = ['plain', 'lowerCamelCase']

function splitWords(name: string): string[] {
  return name.split(/[_\s-]+/).filter((part) => part.length > 0)
}

function normalizeWord(word: string): string {
  return word === word.toUpperCase() ? word.toLowerCase() : word
}

function upperFirst(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

function lowerFirst(word: string): string {
  return word.charAt(0).toLowerCase() + word.slice(1)
}

/**
 * Convert an identifier to lowerCamelCase
 *
 * @example
 * lowerCamelCase('first_name') // 'firstName'
 * lowerCamelCase('myFirstName') // 'myFirstName'
 * lowerCamelCase('ID') // 'id'
 */
export function lowerCamelCase(name: string): string {
  const words = splitWords(name).map(normalizeWord)
  if (words.length === 0) return name
  const [first, ...rest] = words
  return lowerFirst(first ?? '') + rest.map(upperFirst).join('')
}

/**
 * Convert an identifier to PascalCase
 *
 * @example
 * pascalCase('person_address') // 'PersonAddress'
 * pascalCase('selectAll') // 'SelectAll'
 */
export function pascalCase(name: string): string {
  const words = splitWords(name).map(normalizeWord)
  if (words.length === 0) return name
  return words.map(upperFirst).join('')
}

/**
 * Apply a property name generator to a column name
 */
export function toPropertyName(name: string, generator: PropertyNameGenerator): string {
  return generator === 'plain' ? name : lowerCamelCase(name)
}

/**
 * Singularize a (possibly camelCased) word
 *
 * Uses the 'pluralize' library, so irregular forms are handled:
 * - addresses -> address
 * - categories -> category
 * - people -> person
 */
export function singularize(word: string): string {
  return pluralize.singular(word)
}

/**
 * Default type name of a nested result node
 *
 * Collection fields name their element type, so the field name is singularized.
 *
 * @example
 * nestedTypeName('addresses', true) // 'AddressRow'
 * nestedTypeName('personDetails', false) // 'PersonDetailsRow'
 */
export function nestedTypeName(fieldName: string, isCollection: boolean): string {
  const base = isCollection ? singularize(fieldName) : fieldName
  return `${pascalCase(base)}${ROW_TYPE_SUFFIX}`
}
