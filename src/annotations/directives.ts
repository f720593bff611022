/**
 * Conversion of scoped annotation blocks into typed directive objects
 *
 * Every scope has a closed key set; keys outside it are rejected rather than
 * ignored, and values are checked against the type each key expects.
 *
 * @module annotations/directives
 */

import { AnnotationError, ErrorCode, type SourceLocation } from '../errors'
import { PROPERTY_NAME_GENERATORS, type PropertyNameGenerator } from '../utils/naming'
import type { DirectiveValue } from './parser'
import {
  MAPPING_TYPES,
  SCOPE_KEYS,
  type AnnotationBlock,
  type CascadeNotify,
  type DynamicFieldDirective,
  type FieldDirectives,
  type MappingType,
  type StatementDirectives,
  type TableDirectives,
} from './types'

// =============================================================================
// Key validation
// =============================================================================

/**
 * Reject keys that do not belong to the block's scope
 */
export function validateScopeKeys(block: AnnotationBlock): void {
  const allowed = SCOPE_KEYS[block.scope]
  for (const key of block.entries.keys()) {
    if (!allowed.includes(key)) {
      throw new AnnotationError(
        `Unknown ${block.scope} directive key "${key}". Supported keys: ${allowed.join(', ')}`,
        block.location,
        ErrorCode.ANNOTATION_UNKNOWN_KEY,
        { key, scope: block.scope }
      )
    }
  }
}

/**
 * Merge the entries of several blocks of one scope; a key may appear once
 */
function mergeEntries(blocks: AnnotationBlock[]): { entries: Map<string, DirectiveValue>; locations: Map<string, SourceLocation> } {
  const entries = new Map<string, DirectiveValue>()
  const locations = new Map<string, SourceLocation>()
  for (const block of blocks) {
    validateScopeKeys(block)
    for (const [key, value] of block.entries) {
      if (entries.has(key)) {
        throw new AnnotationError(`Duplicate directive key "${key}"`, block.location, ErrorCode.ANNOTATION_DUPLICATE_KEY, { key })
      }
      entries.set(key, value)
      locations.set(key, block.location)
    }
  }
  return { entries, locations }
}

// =============================================================================
// Value readers
// =============================================================================

function invalid(key: string, expected: string, location: SourceLocation): AnnotationError {
  return new AnnotationError(
    `Directive key "${key}" expects ${expected}`,
    location,
    ErrorCode.ANNOTATION_INVALID_VALUE,
    { key }
  )
}

function readText(entries: Map<string, DirectiveValue>, key: string, location: SourceLocation): string | undefined {
  const value = entries.get(key)
  if (value === undefined) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw invalid(key, 'a text value', location)
}

function readBoolean(entries: Map<string, DirectiveValue>, key: string, location: SourceLocation): boolean | undefined {
  const value = entries.get(key)
  if (value === undefined) return undefined
  if (typeof value === 'boolean') return value
  throw invalid(key, 'true or false', location)
}

function readGenerator(entries: Map<string, DirectiveValue>, location: SourceLocation): PropertyNameGenerator | undefined {
  const value = readText(entries, 'propertyNameGenerator', location)
  if (value === undefined) return undefined
  const generator = PROPERTY_NAME_GENERATORS.find((candidate) => candidate === value)
  if (!generator) throw invalid('propertyNameGenerator', PROPERTY_NAME_GENERATORS.join(' or '), location)
  return generator
}

function readTableList(value: DirectiveValue, key: string, location: SourceLocation): string[] {
  if (typeof value === 'string') return [value.toLowerCase()]
  if (Array.isArray(value)) {
    return value.map((item) => {
      if (typeof item !== 'string') throw invalid(key, 'a list of table names', location)
      return item.toLowerCase()
    })
  }
  throw invalid(key, 'a list of table names', location)
}

function readCascadeNotify(value: DirectiveValue | undefined, location: SourceLocation): CascadeNotify {
  const cascade: CascadeNotify = { delete: [], update: [] }
  if (value === undefined) return cascade
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw invalid('cascadeNotify', 'a map with "delete" and/or "update" lists', location)
  }
  for (const [kind, tables] of Object.entries(value)) {
    if (kind !== 'delete' && kind !== 'update') {
      throw new AnnotationError(
        `Unknown cascadeNotify key "${kind}". Supported keys: delete, update`,
        location,
        ErrorCode.ANNOTATION_UNKNOWN_KEY,
        { key: kind }
      )
    }
    cascade[kind] = readTableList(tables, `cascadeNotify.${kind}`, location)
  }
  return cascade
}

// =============================================================================
// Typed conversions
// =============================================================================

export function toTableDirectives(blocks: AnnotationBlock[]): TableDirectives {
  const { entries, locations } = mergeEntries(blocks)
  const at = (key: string): SourceLocation => locations.get(key) ?? { file: '<unknown>', line: 0, column: 0 }
  return {
    name: readText(entries, 'name', at('name')),
    propertyNameGenerator: readGenerator(entries, at('propertyNameGenerator')),
    cascadeNotify: readCascadeNotify(entries.get('cascadeNotify'), at('cascadeNotify')),
  }
}

export function toStatementDirectives(blocks: AnnotationBlock[]): StatementDirectives {
  const { entries, locations } = mergeEntries(blocks)
  const at = (key: string): SourceLocation => locations.get(key) ?? { file: '<unknown>', line: 0, column: 0 }
  return {
    name: readText(entries, 'name', at('name')),
    propertyNameGenerator: readGenerator(entries, at('propertyNameGenerator')),
    queryResult: readText(entries, 'queryResult', at('queryResult')),
    collectionKey: readText(entries, 'collectionKey', at('collectionKey')),
    mapTo: readText(entries, 'mapTo', at('mapTo')),
  }
}

/**
 * Convert the column blocks of one statement, merging blocks that target the
 * same field. Keys are matched case-insensitively.
 */
export function toFieldDirectives(blocks: AnnotationBlock[]): Map<string, FieldDirectives> {
  const grouped = new Map<string, AnnotationBlock[]>()
  for (const block of blocks) {
    validateScopeKeys(block)
    const field = readText(block.entries, 'field', block.location) ?? block.boundColumn
    if (field === undefined) {
      throw new AnnotationError('Column directive is not bound to any column', block.location, ErrorCode.ANNOTATION_UNATTACHED)
    }
    const key = field.toLowerCase()
    grouped.set(key, [...(grouped.get(key) ?? []), { ...block, boundColumn: field }])
  }

  const result = new Map<string, FieldDirectives>()
  for (const [key, group] of grouped) {
    const first = group[0]
    if (!first) continue
    const withoutField = group.map((block) => {
      const entries = new Map(block.entries)
      entries.delete('field')
      return { ...block, entries }
    })
    const { entries } = mergeEntries(withoutField)
    const location = first.location
    result.set(key, {
      field: first.boundColumn ?? key,
      propertyName: readText(entries, 'propertyName', location),
      propertyType: readText(entries, 'propertyType', location),
      notNull: readBoolean(entries, 'notNull', location),
      adapter: readText(entries, 'adapter', location),
      sqlTypeHint: readText(entries, 'sqlTypeHint', location),
      location,
    })
  }
  return result
}

export function toDynamicFieldDirective(block: AnnotationBlock): DynamicFieldDirective {
  validateScopeKeys(block)
  const { entries, location } = block

  const name = readText(entries, 'dynamicField', location)
  if (!name) throw invalid('dynamicField', 'a property name', location)

  const mappingTypeText = readText(entries, 'mappingType', location)
  const mappingType: MappingType | undefined = MAPPING_TYPES.find((candidate) => candidate === mappingTypeText)
  if (!mappingType) throw invalid('mappingType', MAPPING_TYPES.join(', '), location)

  const aliasPrefix = readText(entries, 'aliasPrefix', location)
  const removeAliasPrefix = readText(entries, 'removeAliasPrefix', location)
  const prefix = aliasPrefix ?? removeAliasPrefix
  if (!prefix) {
    throw new AnnotationError(
      `Dynamic field "${name}" needs an aliasPrefix or removeAliasPrefix`,
      location,
      ErrorCode.ANNOTATION_INVALID_VALUE
    )
  }

  const sourceTable = readText(entries, 'sourceTable', location)
  if (mappingType !== 'entity' && !sourceTable) {
    throw new AnnotationError(
      `Dynamic field "${name}" with mappingType=${mappingType} needs a sourceTable`,
      location,
      ErrorCode.ANNOTATION_INVALID_VALUE
    )
  }

  return {
    name,
    mappingType,
    propertyType: readText(entries, 'propertyType', location),
    sourceTable,
    aliasPrefix: prefix,
    removeAliasPrefix: removeAliasPrefix ?? prefix,
    collectionKey: readText(entries, 'collectionKey', location),
    notNull: readBoolean(entries, 'notNull', location) ?? false,
    defaultValue: entries.get('defaultValue'),
    location,
  }
}
