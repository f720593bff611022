/**
 * Result shape resolution
 *
 * Turns a typed projection plus the statement's dynamic-field directives into
 * a nested ResultNode tree. Each projected column belongs to the dynamic field
 * with the longest alias prefix it starts with, or stays on the root row; a
 * dynamic field whose prefix extends another field's prefix nests inside it.
 *
 * @module query/result-shape
 */

import { AnnotationError, ErrorCode, SchemaConflictError, type SourceLocation } from '../errors'
import { RESULT_TYPE_SUFFIX } from '../constants'
import type { DynamicFieldDirective, StatementDirectives } from '../annotations/types'
import { unwrapListType } from '../schema/type-mapping'
import { nestedTypeName, pascalCase, toPropertyName, type PropertyNameGenerator } from '../utils/naming'
import type { ResolvedColumn, TableLookup } from './columns'
import { findSource, primarySource, type SourceTable } from './sources'
import type { ResultField, ResultNode } from './types'

// =============================================================================
// Types
// =============================================================================

/**
 * A typed projection column, before it is placed in the result tree
 */
export interface ProjectedField extends ResultField {
  /** Table column the engine traced the output column to */
  origin?: ResolvedColumn | undefined
  /** Nullability of the origin column itself, without outer-join widening */
  baseNotNull: boolean
  /** propertyName came from a field directive */
  explicitName: boolean
  /** notNull came from a field directive */
  explicitNotNull: boolean
}

export interface ShapeInput {
  queryName: string
  fields: ProjectedField[]
  dynamicFields: DynamicFieldDirective[]
  /** Dynamic fields taken over from views the statement reads */
  inheritedFields?: ReadonlySet<DynamicFieldDirective> | undefined
  directives: StatementDirectives
  sources: SourceTable[]
  lookup: TableLookup
  generator: PropertyNameGenerator
  location: SourceLocation
}

interface FieldGroup {
  directive: DynamicFieldDirective
  prefix: string
  fields: ProjectedField[]
  parent: FieldGroup | null
  children: FieldGroup[]
}

// =============================================================================
// Helpers
// =============================================================================

function toResultField(field: ProjectedField, overrides: { propertyName?: string; notNull?: boolean } = {}): ResultField {
  const result: ResultField = {
    columnName: field.columnName,
    propertyName: overrides.propertyName ?? field.propertyName,
    propertyType: field.propertyType,
    sqlType: field.sqlType,
    notNull: overrides.notNull ?? field.notNull,
  }
  if (field.adapter !== undefined) result.adapter = field.adapter
  return result
}

/**
 * Property name of a column inside a dynamic field: the alias with the
 * field's prefix removed, or the schema property name when what remains is
 * the origin column's own name.
 */
function nestedPropertyName(field: ProjectedField, directive: DynamicFieldDirective, generator: PropertyNameGenerator): string {
  if (field.explicitName) return field.propertyName
  const prefix = directive.removeAliasPrefix.toLowerCase()
  const stripped = field.columnName.toLowerCase().startsWith(prefix)
    ? field.columnName.slice(prefix.length)
    : field.columnName
  if (field.origin && stripped.toLowerCase() === field.origin.column.name.toLowerCase()) {
    return field.origin.column.propertyName
  }
  return toPropertyName(stripped, generator)
}

function findProjected(fields: ProjectedField[], name: string): ProjectedField | undefined {
  const lower = name.toLowerCase()
  return fields.find((field) => field.columnName.toLowerCase() === lower)
}

/**
 * Root type name: the shared result name, the statement name, or one derived
 * from the query name
 */
export function rootTypeName(queryName: string, directives: StatementDirectives): string {
  return directives.queryResult ?? directives.name ?? `${pascalCase(queryName)}${RESULT_TYPE_SUFFIX}`
}

// =============================================================================
// Grouping
// =============================================================================

function groupFields(input: ShapeInput): { root: ProjectedField[]; groups: FieldGroup[] } {
  const groups: FieldGroup[] = input.dynamicFields.map((directive) => ({
    directive,
    prefix: directive.aliasPrefix.toLowerCase(),
    fields: [],
    parent: null,
    children: [],
  }))

  for (const group of groups) {
    const twin = groups.find((other) => other !== group && other.prefix === group.prefix)
    if (twin) {
      throw new AnnotationError(
        `Dynamic fields "${twin.directive.name}" and "${group.directive.name}" share the alias prefix "${group.directive.aliasPrefix}"`,
        group.directive.location,
        ErrorCode.ANNOTATION_INVALID_VALUE
      )
    }
    let parent: FieldGroup | null = null
    for (const other of groups) {
      if (other === group || !group.prefix.startsWith(other.prefix)) continue
      if (!parent || other.prefix.length > parent.prefix.length) parent = other
    }
    group.parent = parent
  }
  for (const group of groups) group.parent?.children.push(group)

  const root: ProjectedField[] = []
  for (const field of input.fields) {
    const column = field.columnName.toLowerCase()
    let owner: FieldGroup | null = null
    for (const group of groups) {
      if (!column.startsWith(group.prefix)) continue
      if (!owner || group.prefix.length > owner.prefix.length) owner = group
    }
    if (owner) owner.fields.push(field)
    else root.push(field)
  }

  for (const group of groups) {
    const hasColumns = group.fields.length > 0 || group.children.length > 0
    if (!hasColumns) {
      throw new AnnotationError(
        `Dynamic field "${group.directive.name}" matches no projected column (alias prefix "${group.directive.aliasPrefix}")`,
        group.directive.location,
        ErrorCode.ANNOTATION_INVALID_VALUE
      )
    }
  }

  return { root, groups }
}

function validateSourceTable(group: FieldGroup, input: ShapeInput): SourceTable | undefined {
  const { directive } = group
  if (input.inheritedFields?.has(directive)) return undefined

  if (directive.mappingType === 'entity') {
    if (directive.sourceTable === undefined) return undefined
    const primary = primarySource(input.sources)
    const source = findSource(input.sources, directive.sourceTable)
    if (!primary || source !== primary) {
      throw new AnnotationError(
        `Dynamic field "${directive.name}" with mappingType=entity must use the primary source, not "${directive.sourceTable}"`,
        directive.location,
        ErrorCode.ANNOTATION_INVALID_VALUE
      )
    }
    return source
  }

  const source = directive.sourceTable === undefined ? undefined : findSource(input.sources, directive.sourceTable)
  if (!source) {
    throw new AnnotationError(
      `Dynamic field "${directive.name}" names unknown source table "${directive.sourceTable ?? ''}"`,
      directive.location,
      ErrorCode.ANNOTATION_INVALID_VALUE
    )
  }
  return source
}

/**
 * Grouping key of a collection: the explicit collectionKey, or the consumed
 * column that is the source table's primary key
 */
function groupingKeyOf(group: FieldGroup, source: SourceTable | undefined, input: ShapeInput): string {
  const { directive } = group
  if (directive.collectionKey !== undefined) {
    const key =
      findProjected(input.fields, directive.collectionKey) ??
      findProjected(input.fields, `${directive.aliasPrefix}${directive.collectionKey}`)
    if (!key) {
      throw new SchemaConflictError(
        `Collection "${directive.name}" groups by "${directive.collectionKey}", which is not in the projection`,
        ErrorCode.MISSING_GROUPING_KEY,
        { field: directive.name, collectionKey: directive.collectionKey }
      )
    }
    return key.columnName
  }

  const candidates = group.fields.filter(
    (field) => field.origin?.column.primaryKey === true && field.origin.table.primaryKey.length === 1
  )
  const sourceTable = source?.table.toLowerCase()
  const preferred = candidates.find((field) => field.origin?.table.name.toLowerCase() === sourceTable) ?? candidates[0]
  if (!preferred) {
    throw new SchemaConflictError(
      `Collection "${directive.name}" has no grouping key: add a collectionKey or project the source table's primary key`,
      ErrorCode.MISSING_GROUPING_KEY,
      { field: directive.name }
    )
  }
  return preferred.columnName
}

function buildNode(group: FieldGroup, input: ShapeInput): ResultNode {
  const { directive } = group
  const source = validateSourceTable(group, input)
  const isCollection = directive.mappingType === 'collection'

  const node: ResultNode = {
    kind: directive.mappingType,
    typeName: directive.propertyType ? unwrapListType(directive.propertyType) : nestedTypeName(directive.name, isCollection),
    propertyName: directive.name,
    propertyType: directive.propertyType,
    aliasPrefix: directive.aliasPrefix,
    sourceTable: directive.sourceTable,
    notNull: directive.mappingType === 'perRow' ? directive.notNull : true,
    defaultValue: directive.defaultValue,
    fields: group.fields.map((field) =>
      toResultField(field, {
        propertyName: nestedPropertyName(field, directive, input.generator),
        notNull: field.explicitNotNull ? field.notNull : field.baseNotNull,
      })
    ),
    children: group.children.map((child) => buildNode(child, input)),
  }
  if (isCollection) node.groupingKey = groupingKeyOf(group, source, input)
  return node
}

function containsCollection(node: ResultNode): boolean {
  return node.children.some((child) => child.kind === 'collection' || containsCollection(child))
}

/**
 * Identity of one root result: the statement collectionKey, or the primary
 * table's primary key columns in the flat projection
 */
function rootIdentity(root: ProjectedField[], input: ShapeInput): string[] {
  const { collectionKey } = input.directives
  if (collectionKey !== undefined) {
    const key = findProjected(input.fields, collectionKey)
    if (!key) {
      throw new SchemaConflictError(
        `collectionKey "${collectionKey}" of ${input.queryName} is not in the projection`,
        ErrorCode.MISSING_GROUPING_KEY,
        { query: input.queryName, collectionKey }
      )
    }
    return [key.columnName]
  }

  const primary = primarySource(input.sources)
  const table = primary ? input.lookup(primary.table.toLowerCase()) : undefined
  const identity = (table?.primaryKey ?? []).map((pk) =>
    root.find(
      (field) =>
        field.origin?.table.name.toLowerCase() === table?.name.toLowerCase() &&
        field.origin?.column.name.toLowerCase() === pk.toLowerCase()
    )
  )
  if (identity.length === 0 || identity.some((field) => field === undefined)) {
    throw new SchemaConflictError(
      `${input.queryName} returns collections but has no parent identity: add a collectionKey or project the primary key of ${primary?.table ?? 'its primary table'}`,
      ErrorCode.MISSING_GROUPING_KEY,
      { query: input.queryName }
    )
  }
  return identity.flatMap((field) => (field ? [field.columnName] : []))
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Build the result tree of a statement
 *
 * @throws AnnotationError when a dynamic field matches no column or names an unusable source
 * @throws SchemaConflictError when a grouping key or the parent identity is missing
 */
export function resolveResultShape(input: ShapeInput): ResultNode {
  const { root, groups } = groupFields(input)

  const node: ResultNode = {
    kind: 'flat',
    typeName: rootTypeName(input.queryName, input.directives),
    notNull: true,
    fields: root.map((field) => toResultField(field)),
    children: groups.filter((group) => group.parent === null).map((group) => buildNode(group, input)),
  }

  if (containsCollection(node)) node.identity = rootIdentity(root, input)
  return node
}
