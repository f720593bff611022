/**
 * Compiled query and result shape types
 *
 * @module query/types
 */

import type { SourceLocation } from '../errors'
import type { DirectiveValue } from '../annotations/parser'

// =============================================================================
// Result shape
// =============================================================================

export type ResultNodeKind = 'flat' | 'entity' | 'perRow' | 'collection'

/**
 * One output property backed by one projected column
 */
export interface ResultField {
  /** Column name (projection alias) as reported by the engine */
  columnName: string
  propertyName: string
  propertyType: string
  /** Storage type used for the mapping, upper-cased; empty for untyped expressions */
  sqlType: string
  notNull: boolean
  adapter?: string | undefined
}

/**
 * Nested result tree. The root of a query result is `flat`; dynamic fields
 * add `entity`, `perRow` and `collection` children.
 */
export interface ResultNode {
  kind: ResultNodeKind
  typeName: string
  /** Property the node is placed under on its parent (not set for the root) */
  propertyName?: string | undefined
  /** Declared property type of a dynamic field */
  propertyType?: string | undefined
  aliasPrefix?: string | undefined
  sourceTable?: string | undefined
  /** Column that identifies distinct elements of a collection */
  groupingKey?: string | undefined
  /** Columns that identify one parent result when the tree contains collections */
  identity?: string[] | undefined
  notNull: boolean
  defaultValue?: DirectiveValue | undefined
  fields: ResultField[]
  children: ResultNode[]
}

// =============================================================================
// Queries
// =============================================================================

export type QueryKind = 'read' | 'insert' | 'update' | 'delete'

export interface ParameterSpec {
  name: string
  propertyType: string
  nullable: boolean
  adapter?: string | undefined
  /** Column the type was inferred from */
  column?: { table: string; column: string } | undefined
}

export interface QuerySpec {
  namespace: string
  name: string
  sql: string
  kind: QueryKind
  /** Write statement with a RETURNING clause */
  returning: boolean
  parameters: ParameterSpec[]
  /** Shape of the returned rows, for statements that return rows */
  result?: ResultNode | undefined
  /** Shared result name, when the shape is shared across queries */
  sharedResult?: string | undefined
  mapTo?: string | undefined
  readTables: string[]
  writeTables: string[]
  /** Tables whose mutation re-evaluates this query (reads) */
  invalidationSet: string[]
  /** Tables a run of this statement marks as changed (writes) */
  affectedTables: string[]
  location: SourceLocation
}

/**
 * Whether a statement hands rows back to the caller
 */
export function returnsRows(query: Pick<QuerySpec, 'kind' | 'returning'>): boolean {
  return query.kind === 'read' || query.returning
}
