/**
 * Directive scopes, their closed key sets and the typed directive objects
 *
 * @module annotations/types
 */

import type { SourceLocation } from '../errors'
import type { PropertyNameGenerator } from '../utils/naming'
import type { DirectiveValue } from './parser'

// =============================================================================
// Scopes
// =============================================================================

export type AnnotationScope = 'table' | 'column' | 'statement' | 'dynamicField'

/**
 * A directive bound to exactly one scope
 */
export interface AnnotationBlock {
  scope: AnnotationScope
  entries: Map<string, DirectiveValue>
  location: SourceLocation
  /** Column the block is bound to, for column blocks without an explicit `field` */
  boundColumn?: string | undefined
}

export const TABLE_KEYS = ['name', 'propertyNameGenerator', 'cascadeNotify'] as const

export const STATEMENT_KEYS = ['name', 'propertyNameGenerator', 'queryResult', 'collectionKey', 'mapTo'] as const

export const COLUMN_KEYS = ['field', 'propertyName', 'propertyType', 'notNull', 'adapter', 'sqlTypeHint'] as const

export const DYNAMIC_FIELD_KEYS = [
  'dynamicField',
  'mappingType',
  'propertyType',
  'sourceTable',
  'aliasPrefix',
  'removeAliasPrefix',
  'collectionKey',
  'notNull',
  'defaultValue',
] as const

export const SCOPE_KEYS: Record<AnnotationScope, readonly string[]> = {
  table: TABLE_KEYS,
  statement: STATEMENT_KEYS,
  column: COLUMN_KEYS,
  dynamicField: DYNAMIC_FIELD_KEYS,
}

// =============================================================================
// Typed directives
// =============================================================================

export interface CascadeNotify {
  delete: string[]
  update: string[]
}

export interface TableDirectives {
  name?: string | undefined
  propertyNameGenerator?: PropertyNameGenerator | undefined
  cascadeNotify: CascadeNotify
}

export interface StatementDirectives {
  /** Overrides the query name for views and the result type name for queries */
  name?: string | undefined
  propertyNameGenerator?: PropertyNameGenerator | undefined
  /** Shared result name */
  queryResult?: string | undefined
  /** Parent identity column of results that contain collections */
  collectionKey?: string | undefined
  /** Output mapper target type, passed through to emitters */
  mapTo?: string | undefined
}

export interface FieldDirectives {
  /** Column or projection alias the directive applies to */
  field: string
  propertyName?: string | undefined
  propertyType?: string | undefined
  notNull?: boolean | undefined
  adapter?: string | undefined
  sqlTypeHint?: string | undefined
  location: SourceLocation
}

export type MappingType = 'entity' | 'perRow' | 'collection'

export const MAPPING_TYPES: readonly MappingType[] = ['entity', 'perRow', 'collection']

export interface DynamicFieldDirective {
  /** Property the regrouped columns are placed under */
  name: string
  mappingType: MappingType
  propertyType?: string | undefined
  sourceTable?: string | undefined
  /** Prefix that selects the field's columns */
  aliasPrefix: string
  /** Prefix stripped from the selected columns to name their properties */
  removeAliasPrefix: string
  collectionKey?: string | undefined
  notNull: boolean
  defaultValue?: DirectiveValue | undefined
  location: SourceLocation
}
