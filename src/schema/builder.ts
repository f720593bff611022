/**
 * Schema model builder
 *
 * Applies the schema files to an in-memory introspection database and reads
 * the resulting tables back through the engine's pragmas. Directives adjust
 * property names and types; views are analyzed like queries.
 *
 * @module schema/builder
 */

import {
  AnnotationError,
  ErrorCode,
  SqlSyntaxError,
  toError,
  type SourceLocation,
} from '../errors'
import { blocksOf, extractAnnotations, isCreateTable, type AnnotatedStatement } from '../annotations/extractor'
import { toFieldDirectives, toTableDirectives } from '../annotations/directives'
import type { CascadeNotify } from '../annotations/types'
import { analyzeView, type AnalyzerOptions } from '../query/analyzer'
import type { TableLookup } from '../query/columns'
import { SharedResultRegistry } from '../query/shared-results'
import { openConnection, type Connection } from '../runtime/connection'
import { isKeyword, readQualifiedName, type Token } from '../sql/lexer'
import { componentLogger } from '../utils/logger'
import { pascalCase, toPropertyName } from '../utils/naming'
import { readNumber, readString } from '../utils/type-utils'
import { DependencyGraph } from './graph'
import { defaultPropertyType, implicitAdapter } from './type-mapping'
import type { ColumnSpec, ForeignKeySpec, TableSpec } from './types'

// =============================================================================
// Types
// =============================================================================

export interface SqlFile {
  /** Path relative to the database source directory, used in locations */
  path: string
  text: string
}

export interface SchemaModel {
  /** Tables and views keyed by lower-cased name */
  tables: Map<string, TableSpec>
  graph: DependencyGraph
  /** Introspection database holding the applied schema */
  connection: Connection
  /** Schema statements in the order they were applied */
  statements: string[]
  lookup: TableLookup
}

type StatementClass = 'table' | 'view' | 'other'

interface ClassifiedStatement {
  statement: AnnotatedStatement
  kind: StatementClass
  /** Created object name, for tables and views */
  name: string
}

// =============================================================================
// Statement classification
// =============================================================================

/**
 * Name of the object a CREATE TABLE / CREATE VIEW statement creates
 */
function createdName(tokens: Token[], objectKeyword: string, location: SourceLocation): string {
  let index = tokens.findIndex((token) => isKeyword(token, objectKeyword))
  if (isKeyword(tokens[index + 1], 'IF') && isKeyword(tokens[index + 2], 'NOT') && isKeyword(tokens[index + 3], 'EXISTS')) {
    index += 3
  }
  const name = readQualifiedName(tokens, index + 1)
  if (index === -1 || !name) {
    throw new SqlSyntaxError(`Cannot read the ${objectKeyword.toLowerCase()} name`, location)
  }
  return name.name
}

function isCreateView(tokens: Token[]): boolean {
  if (!isKeyword(tokens[0], 'CREATE')) return false
  return isKeyword(tokens[1], 'VIEW') || (isKeyword(tokens[1], 'TEMP', 'TEMPORARY') && isKeyword(tokens[2], 'VIEW'))
}

function classify(statement: AnnotatedStatement): ClassifiedStatement {
  const { tokens, location } = statement.source
  if (isCreateTable(tokens)) return { statement, kind: 'table', name: createdName(tokens, 'TABLE', location) }
  if (isCreateView(tokens)) return { statement, kind: 'view', name: createdName(tokens, 'VIEW', location) }
  return { statement, kind: 'other', name: '' }
}

// =============================================================================
// Applying statements
// =============================================================================

function apply(connection: Connection, statement: AnnotatedStatement): void {
  try {
    connection.exec(statement.source.text)
  } catch (err) {
    const error = toError(err)
    throw new SqlSyntaxError(error.message, statement.source.location, ErrorCode.SQL_SYNTAX, error)
  }
}

/**
 * Create views in repeated passes so that a view may read views declared
 * after it. Returns the views in creation order.
 */
function applyViews(connection: Connection, views: ClassifiedStatement[]): ClassifiedStatement[] {
  const created: ClassifiedStatement[] = []
  let pending = views
  while (pending.length > 0) {
    const failed: Array<{ view: ClassifiedStatement; error: Error }> = []
    for (const view of pending) {
      try {
        connection.exec(view.statement.source.text)
        created.push(view)
      } catch (err) {
        failed.push({ view, error: toError(err) })
      }
    }
    const first = failed[0]
    if (first && failed.length === pending.length) {
      throw new SqlSyntaxError(first.error.message, first.view.statement.source.location, ErrorCode.SQL_SYNTAX, first.error)
    }
    pending = failed.map((entry) => entry.view)
  }
  return created
}

// =============================================================================
// Tables
// =============================================================================

interface EngineColumn {
  name: string
  type: string
  notNull: boolean
  defaultValue: string | null
  /** 1-based position in the primary key, 0 when not part of it */
  pk: number
}

function readColumns(connection: Connection, table: string): EngineColumn[] {
  return connection
    .all('SELECT name, type, "notnull", dflt_value, pk FROM pragma_table_info(:table)', { table })
    .map((row) => ({
      name: readString(row, 'name') ?? '',
      type: (readString(row, 'type') ?? '').toUpperCase(),
      notNull: readNumber(row, 'notnull') === 1,
      defaultValue: readString(row, 'dflt_value'),
      pk: readNumber(row, 'pk') ?? 0,
    }))
}

function readForeignKeys(connection: Connection, table: string): ForeignKeySpec[] {
  const byId = new Map<number, ForeignKeySpec>()
  const rows = connection.all(
    'SELECT id, "table", "from", "to", on_update, on_delete FROM pragma_foreign_key_list(:table) ORDER BY id, seq',
    { table }
  )
  for (const row of rows) {
    const id = readNumber(row, 'id') ?? 0
    let fk = byId.get(id)
    if (!fk) {
      fk = {
        table: readString(row, 'table') ?? '',
        from: [],
        to: [],
        onDelete: readString(row, 'on_delete') ?? 'NO ACTION',
        onUpdate: readString(row, 'on_update') ?? 'NO ACTION',
      }
      byId.set(id, fk)
    }
    fk.from.push(readString(row, 'from') ?? '')
    const to = readString(row, 'to')
    if (to !== null) fk.to.push(to)
  }
  return [...byId.values()]
}

function buildTable(
  connection: Connection,
  entry: ClassifiedStatement,
  options: AnalyzerOptions
): TableSpec {
  const { statement, name } = entry
  const { source } = statement
  const directives = toTableDirectives(blocksOf(statement, 'table'))
  const fieldDirectives = toFieldDirectives(blocksOf(statement, 'column'))
  const generator = directives.propertyNameGenerator ?? options.propertyNameGenerator

  const engineColumns = readColumns(connection, name)
  const pkColumns = engineColumns.filter((column) => column.pk > 0).sort((a, b) => a.pk - b.pk)
  const onlyKey = pkColumns.length === 1 ? pkColumns[0] : undefined
  const rowidAlias = onlyKey?.type === 'INTEGER' ? onlyKey.name : null

  for (const [key, directive] of fieldDirectives) {
    if (!engineColumns.some((column) => column.name.toLowerCase() === key)) {
      throw new AnnotationError(
        `Field directive names unknown column "${directive.field}" of table ${name}`,
        directive.location,
        ErrorCode.ANNOTATION_INVALID_VALUE,
        { table: name, field: directive.field }
      )
    }
  }

  const columns: ColumnSpec[] = engineColumns.map((column) => {
    const directive = fieldDirectives.get(column.name.toLowerCase())
    const typeHint = directive?.sqlTypeHint?.toUpperCase()
    const storage = typeHint ?? column.type
    const propertyType = directive?.propertyType ?? defaultPropertyType(storage)
    return {
      name: column.name,
      sqlType: column.type,
      notNull: directive?.notNull ?? (column.notNull || column.name === rowidAlias),
      propertyName: directive?.propertyName ?? toPropertyName(column.name, generator),
      propertyType,
      typeHint,
      adapter: directive?.adapter ?? implicitAdapter(propertyType, storage),
      primaryKey: column.pk > 0,
      defaultValue: column.defaultValue,
    }
  })

  return {
    name,
    namespace: name.toLowerCase(),
    kind: 'table',
    typeName: directives.name ?? pascalCase(name),
    columns,
    primaryKey: pkColumns.map((column) => column.name),
    foreignKeys: readForeignKeys(connection, name),
    cascadeNotify: directives.cascadeNotify,
    readOnly: false,
    sql: source.text,
    location: source.location,
  }
}

function addCascadeEdges(graph: DependencyGraph, table: TableSpec, tables: Map<string, TableSpec>, location: SourceLocation): void {
  const kinds: Array<keyof CascadeNotify> = ['delete', 'update']
  for (const kind of kinds) {
    for (const target of table.cascadeNotify[kind]) {
      if (tables.get(target.toLowerCase())?.kind !== 'table') {
        throw new AnnotationError(
          `cascadeNotify of ${table.name} names unknown table "${target}"`,
          location,
          ErrorCode.ANNOTATION_INVALID_VALUE,
          { table: table.name, target, kind }
        )
      }
      graph.addEdge(kind, table.name, target)
    }
  }
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Build the schema model of a database from its schema files
 *
 * Files are processed in the given order. The returned introspection
 * connection stays open for query analysis; callers close it.
 *
 * @throws SqlSyntaxError, AnnotationError, SchemaConflictError or TypeInferenceError
 */
export function buildSchema(
  files: SqlFile[],
  options: AnalyzerOptions,
  sharedResults: SharedResultRegistry = new SharedResultRegistry()
): SchemaModel {
  const log = componentLogger('schema', options.logger)
  const classified = files.flatMap((file) => extractAnnotations(file.text, file.path).map(classify))

  const connection = openConnection()
  try {
    connection.exec('PRAGMA foreign_keys = ON')
    const tableStatements = classified.filter((entry) => entry.kind === 'table')
    const otherStatements = classified.filter((entry) => entry.kind === 'other')
    for (const entry of tableStatements) apply(connection, entry.statement)
    for (const entry of otherStatements) apply(connection, entry.statement)
    const views = applyViews(connection, classified.filter((entry) => entry.kind === 'view'))

    const tables = new Map<string, TableSpec>()
    const lookup: TableLookup = (name) => tables.get(name.toLowerCase())
    const graph = new DependencyGraph()

    for (const entry of tableStatements) {
      const table = buildTable(connection, entry, options)
      tables.set(table.name.toLowerCase(), table)
      graph.addTable(table.name)
    }
    for (const entry of tableStatements) {
      const table = lookup(entry.name)
      if (table) addCascadeEdges(graph, table, tables, entry.statement.source.location)
    }

    const ctx = { connection, lookup, graph, sharedResults, options }
    for (const entry of views) {
      const { source } = entry.statement
      const view = analyzeView(entry.statement, entry.name, ctx)
      tables.set(entry.name.toLowerCase(), {
        name: entry.name,
        namespace: entry.name.toLowerCase(),
        kind: 'view',
        typeName: view.typeName,
        columns: view.columns,
        primaryKey: [],
        foreignKeys: [],
        cascadeNotify: { delete: [], update: [] },
        readOnly: true,
        sql: source.text,
        location: source.location,
        result: view.result,
        dynamicFields: view.dynamicFields,
        directives: view.directives,
      })
    }

    log.debug(` ${tableStatements.length} tables, ${views.length} views`)

    return {
      tables,
      graph,
      connection,
      statements: [...tableStatements, ...otherStatements, ...views].map((entry) => entry.statement.source.text),
      lookup,
    }
  } catch (err) {
    connection.close()
    throw err
  }
}
