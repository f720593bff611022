/**
 * Schema model types
 *
 * @module schema/types
 */

import type { SourceLocation } from '../errors'
import type { CascadeNotify, DynamicFieldDirective, StatementDirectives } from '../annotations/types'
import type { ResultNode } from '../query/types'

/**
 * A column of a table or view. Queries never mutate it; overrides produce
 * query-local result fields instead.
 */
export interface ColumnSpec {
  name: string
  /** Declared storage type, upper-cased (empty when undeclared) */
  sqlType: string
  notNull: boolean
  propertyName: string
  propertyType: string
  /** Storage type used for the property mapping instead of the declared one */
  typeHint?: string | undefined
  adapter?: string | undefined
  primaryKey: boolean
  /** Default value expression as the engine reports it */
  defaultValue: string | null
}

export interface ForeignKeySpec {
  /** Referenced table */
  table: string
  from: string[]
  to: string[]
  onDelete: string
  onUpdate: string
}

export type TableKind = 'table' | 'view'

export interface TableSpec {
  name: string
  namespace: string
  kind: TableKind
  typeName: string
  columns: ColumnSpec[]
  primaryKey: string[]
  foreignKeys: ForeignKeySpec[]
  cascadeNotify: CascadeNotify
  readOnly: boolean
  sql: string
  location: SourceLocation
  /** Resolved projection shape (views) */
  result?: ResultNode | undefined
  /** Dynamic fields declared on the view, inherited by queries that read it */
  dynamicFields?: DynamicFieldDirective[] | undefined
  /** Statement directives declared on the view */
  directives?: StatementDirectives | undefined
}

/**
 * Find a column by name, ignoring case
 */
export function findColumn(table: TableSpec, name: string): ColumnSpec | undefined {
  const lower = name.toLowerCase()
  return table.columns.find((column) => column.name.toLowerCase() === lower)
}
