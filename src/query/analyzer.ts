/**
 * Query analysis
 *
 * Determines a statement's kind, its parameters and the typed, shaped
 * projection, then attaches the tables it depends on. Views go through the
 * same projection and shaping steps so that queries can build on them.
 *
 * @module query/analyzer
 */

import { UNKNOWN_PROPERTY_TYPE } from '../constants'
import {
  AnnotationError,
  ErrorCode,
  SchemaConflictError,
  SqlSyntaxError,
  TypeInferenceError,
  toError,
  type SourceLocation,
} from '../errors'
import { blocksOf, type AnnotatedStatement } from '../annotations/extractor'
import { toDynamicFieldDirective, toFieldDirectives, toStatementDirectives } from '../annotations/directives'
import type { DynamicFieldDirective, FieldDirectives, StatementDirectives } from '../annotations/types'
import { extractDependencies } from '../dependencies/extractor'
import type { ColumnMetadata, Connection, StatementInfo } from '../runtime/connection'
import type { DependencyGraph } from '../schema/graph'
import { defaultPropertyType, implicitAdapter } from '../schema/type-mapping'
import { findColumn, type ColumnSpec } from '../schema/types'
import { isKeyword, isPunctuation, keyword, parenDepths, type Token } from '../sql/lexer'
import { componentLogger, type Logger } from '../utils/logger'
import { toPropertyName, type PropertyNameGenerator } from '../utils/naming'
import { createColumnResolver, type ResolvedColumn, type TableLookup } from './columns'
import { inferParameters } from './parameters'
import { resolveResultShape, type ProjectedField } from './result-shape'
import { SharedResultRegistry } from './shared-results'
import { findSource, firstVerbIndex, primarySource, scanSources, type SourceTable } from './sources'
import { returnsRows, type QueryKind, type QuerySpec, type ResultNode } from './types'

// =============================================================================
// Types
// =============================================================================

export interface AnalyzerOptions {
  propertyNameGenerator: PropertyNameGenerator
  /** Fail instead of warning when a column type cannot be determined */
  strictTypes: boolean
  logger?: Logger | undefined
}

export interface AnalyzerContext {
  /** Introspection connection holding the schema */
  connection: Connection
  lookup: TableLookup
  graph: DependencyGraph
  sharedResults: SharedResultRegistry
  options: AnalyzerOptions
}

export interface StatementKind {
  kind: QueryKind
  returning: boolean
}

/**
 * Everything known about a statement's projection
 */
interface ProjectionInput {
  name: string
  columns: ColumnMetadata[]
  items: SelectItem[] | null
  sources: SourceTable[]
  /** Write target, for RETURNING columns without origin metadata */
  target?: SourceTable | undefined
  fieldDirectives: ReadonlyMap<string, FieldDirectives>
  generator: PropertyNameGenerator
  location: SourceLocation
}

interface SelectItem {
  qualifier: string | null
}

// =============================================================================
// Statement kind
// =============================================================================

/**
 * Kind of a statement, from the first keyword after an optional WITH clause
 *
 * @throws SqlSyntaxError for statements other than SELECT, VALUES, INSERT, REPLACE, UPDATE and DELETE
 */
export function detectKind(tokens: Token[], location: SourceLocation): StatementKind {
  const verb = keyword(tokens[firstVerbIndex(tokens)])
  const depths = parenDepths(tokens)
  const returning = tokens.some((token, index) => (depths[index] ?? 0) === 0 && isKeyword(token, 'RETURNING'))

  switch (verb) {
    case 'SELECT':
    case 'VALUES':
      return { kind: 'read', returning: false }
    case 'INSERT':
    case 'REPLACE':
      return { kind: 'insert', returning }
    case 'UPDATE':
      return { kind: 'update', returning }
    case 'DELETE':
      return { kind: 'delete', returning }
    default:
      throw new SqlSyntaxError(
        `Unsupported statement "${verb || (tokens[0]?.text ?? '')}": queries must be SELECT, INSERT, REPLACE, UPDATE or DELETE`,
        location,
        ErrorCode.SQL_UNSUPPORTED
      )
  }
}

function rejectPositionalParameters(tokens: Token[], file: string): void {
  const positional = tokens.find((token) => token.kind === 'parameter' && token.value === '?')
  if (positional) {
    throw new SqlSyntaxError(
      'Positional parameters are not supported; use named parameters such as :id',
      { file, line: positional.line, column: positional.column },
      ErrorCode.SQL_UNSUPPORTED
    )
  }
}

function describe(connection: Connection, sql: string, location: SourceLocation): StatementInfo {
  try {
    return connection.describe(sql)
  } catch (err) {
    const error = toError(err)
    throw new SqlSyntaxError(error.message, location, ErrorCode.SQL_SYNTAX, error)
  }
}

// =============================================================================
// Projection typing
// =============================================================================

/**
 * Qualifiers of the items of the top-level select list, or null when the
 * list contains a star and cannot be aligned with the engine's columns
 */
function selectItems(tokens: Token[]): SelectItem[] | null {
  const verb = firstVerbIndex(tokens)
  if (!isKeyword(tokens[verb], 'SELECT')) return null
  const depths = parenDepths(tokens)
  const base = depths[verb] ?? 0

  let start = verb + 1
  if (isKeyword(tokens[start], 'DISTINCT', 'ALL')) start++

  const items: Token[][] = [[]]
  for (let i = start; i < tokens.length; i++) {
    const token = tokens[i]
    if (!token) break
    const depth = depths[i] ?? 0
    if (depth === base && isKeyword(token, 'FROM', 'WHERE', 'GROUP', 'ORDER', 'LIMIT', 'UNION', 'EXCEPT', 'INTERSECT', 'WINDOW')) break
    if (depth === base && isPunctuation(token, ',')) {
      items.push([])
      continue
    }
    items[items.length - 1]?.push(token)
  }

  const result: SelectItem[] = []
  for (const item of items) {
    if (item.some((token, index) => token.text === '*' && (index === 0 || isPunctuation(item[index - 1], '.')))) return null
    const expression = isKeyword(item[item.length - 2], 'AS') ? item.slice(0, -2) : item
    const qualified = isPunctuation(expression[1], '.') && (expression.length === 3 || expression.length === 4)
    result.push({ qualifier: qualified ? (expression[0]?.value ?? null) : null })
  }
  return result
}

function resolveOrigin(column: ColumnMetadata, input: ProjectionInput, lookup: TableLookup): ResolvedColumn | undefined {
  if (column.table !== null && column.column !== null) {
    const table = lookup(column.table.toLowerCase())
    const spec = table ? findColumn(table, column.column) : undefined
    if (table && spec) return { table, column: spec }
  }
  if (input.target) {
    const table = lookup(input.target.table.toLowerCase())
    const spec = table ? findColumn(table, column.name) : undefined
    if (table && spec) return { table, column: spec, source: input.target }
  }
  return undefined
}

/**
 * Column of a view the statement reads, for output columns the engine traced
 * through the view to a base table or could not trace at all
 */
function viewColumn(name: string, input: ProjectionInput, lookup: TableLookup): ResolvedColumn | undefined {
  for (const source of input.sources) {
    const table = lookup(source.table.toLowerCase())
    if (table?.kind !== 'view') continue
    const column = findColumn(table, name)
    if (column) return { table, column, source }
  }
  return undefined
}

function isOuter(origin: ResolvedColumn, item: SelectItem | undefined, sources: SourceTable[]): boolean {
  if (origin.source) return origin.source.outer
  if (item?.qualifier) return findSource(sources, item.qualifier)?.outer ?? false
  const table = origin.table.name.toLowerCase()
  return sources.some((source) => source.table.toLowerCase() === table && source.outer)
}

function typeColumn(
  column: ColumnMetadata,
  item: SelectItem | undefined,
  input: ProjectionInput,
  ctx: AnalyzerContext
): ProjectedField {
  const directive = input.fieldDirectives.get(column.name.toLowerCase())
  const traced = resolveOrigin(column, input, ctx.lookup)
  const tracedTable = traced?.table.name.toLowerCase()
  const readsTraced = tracedTable !== undefined && input.sources.some((source) => source.table.toLowerCase() === tracedTable)
  const throughView = readsTraced ? undefined : viewColumn(column.name, input, ctx.lookup)
  const typed = throughView ?? traced
  const origin = traced ?? throughView
  const base: ColumnSpec | undefined = typed?.column

  const hint = directive?.sqlTypeHint?.toUpperCase()
  const sqlType = hint ?? base?.typeHint ?? base?.sqlType ?? column.type?.toUpperCase() ?? ''
  let propertyType =
    directive?.propertyType ??
    (hint !== undefined ? defaultPropertyType(hint) : undefined) ??
    base?.propertyType ??
    (column.type ? defaultPropertyType(column.type) : undefined)

  if (propertyType === undefined) {
    const message = `Cannot determine the type of column "${column.name}" in ${input.name}; add a propertyType or sqlTypeHint field directive`
    if (ctx.options.strictTypes) {
      throw new TypeInferenceError(message, { query: input.name, column: column.name, location: input.location })
    }
    componentLogger('analyzer', ctx.options.logger).warn(message)
    propertyType = UNKNOWN_PROPERTY_TYPE
  }

  const inferredNotNull = typed ? typed.column.notNull && !isOuter(typed, item, input.sources) : false
  const notNull = directive?.notNull ?? inferredNotNull
  const overridden = directive?.propertyType !== undefined || hint !== undefined

  return {
    columnName: column.name,
    propertyName:
      directive?.propertyName ??
      (base && column.name.toLowerCase() === base.name.toLowerCase()
        ? base.propertyName
        : toPropertyName(column.name, input.generator)),
    propertyType,
    sqlType,
    notNull,
    adapter: directive?.adapter ?? (overridden ? implicitAdapter(propertyType, sqlType) : base?.adapter ?? implicitAdapter(propertyType, sqlType)),
    origin,
    baseNotNull: directive?.notNull ?? base?.notNull ?? notNull,
    explicitName: directive?.propertyName !== undefined,
    explicitNotNull: directive?.notNull !== undefined,
  }
}

/**
 * Type every output column of a statement
 *
 * @throws SchemaConflictError on duplicate output column names
 * @throws TypeInferenceError in strict mode for columns without a reliable type
 */
function typeProjection(input: ProjectionInput, ctx: AnalyzerContext): ProjectedField[] {
  const seen = new Set<string>()
  for (const column of input.columns) {
    const lower = column.name.toLowerCase()
    if (seen.has(lower)) {
      throw new SchemaConflictError(
        `${input.name} returns more than one column named "${column.name}"; give them distinct aliases`,
        ErrorCode.SCHEMA_CONFLICT,
        { query: input.name, column: column.name }
      )
    }
    seen.add(lower)
  }

  const aligned = input.items !== null && input.items.length === input.columns.length ? input.items : null
  return input.columns.map((column, index) => typeColumn(column, aligned?.[index], input, ctx))
}

function checkFieldDirectives(
  fieldDirectives: ReadonlyMap<string, FieldDirectives>,
  known: ReadonlySet<string>
): void {
  for (const [key, directive] of fieldDirectives) {
    if (!known.has(key)) {
      throw new AnnotationError(
        `Field directive names "${directive.field}", which is neither a projected column nor a parameter`,
        directive.location,
        ErrorCode.ANNOTATION_INVALID_VALUE,
        { field: directive.field }
      )
    }
  }
}

// =============================================================================
// Views
// =============================================================================

/**
 * Dynamic fields and collectionKey a statement takes over from the views it
 * reads, limited to fields whose prefix matches a projected column
 */
function inheritFromViews(
  sources: SourceTable[],
  fields: ProjectedField[],
  own: DynamicFieldDirective[],
  lookup: TableLookup
): { dynamicFields: DynamicFieldDirective[]; collectionKey?: string | undefined } {
  const inherited: DynamicFieldDirective[] = []
  let collectionKey: string | undefined
  const columns = fields.map((field) => field.columnName.toLowerCase())

  for (const source of sources) {
    const view = lookup(source.table.toLowerCase())
    if (view?.kind !== 'view') continue
    for (const directive of view.dynamicFields ?? []) {
      const prefix = directive.aliasPrefix.toLowerCase()
      const shadowed = [...own, ...inherited].some(
        (other) => other.name === directive.name || other.aliasPrefix.toLowerCase() === prefix
      )
      if (!shadowed && columns.some((column) => column.startsWith(prefix))) inherited.push(directive)
    }
    const viewKey = view.directives?.collectionKey
    if (collectionKey === undefined && viewKey !== undefined && columns.includes(viewKey.toLowerCase())) {
      collectionKey = viewKey
    }
  }

  return { dynamicFields: inherited, collectionKey }
}

export interface AnalyzedView {
  columns: ColumnSpec[]
  result: ResultNode
  typeName: string
  dynamicFields: DynamicFieldDirective[]
  directives: StatementDirectives
}

/**
 * Analyze the SELECT body of a CREATE VIEW statement
 */
export function analyzeView(statement: AnnotatedStatement, viewName: string, ctx: AnalyzerContext): AnalyzedView {
  const { source } = statement
  const asIndex = source.tokens.findIndex((token) => isKeyword(token, 'AS'))
  const bodyTokens = source.tokens.slice(asIndex + 1)
  const first = source.tokens[0]
  const bodyStart = bodyTokens[0]
  if (asIndex === -1 || !first || !bodyStart) {
    throw new SqlSyntaxError(`View ${viewName} has no AS SELECT body`, source.location)
  }
  const bodySql = source.text.slice(bodyStart.start - first.start)

  const directives = toStatementDirectives(blocksOf(statement, 'statement'))
  const fieldDirectives = toFieldDirectives(blocksOf(statement, 'column'))
  const dynamicFields = blocksOf(statement, 'dynamicField').map(toDynamicFieldDirective)
  const generator = directives.propertyNameGenerator ?? ctx.options.propertyNameGenerator
  const name = directives.name ?? viewName

  const sources = scanSources(bodyTokens)
  const info = describe(ctx.connection, bodySql, source.location)
  const viewColumns = describe(ctx.connection, `SELECT * FROM "${viewName.replace(/"/g, '""')}"`, source.location).columns

  const fields = typeProjection(
    { name, columns: info.columns, items: selectItems(bodyTokens), sources, fieldDirectives, generator, location: source.location },
    ctx
  ).map((field, index) => {
    const renamed = viewColumns[index]?.name
    return renamed !== undefined && renamed !== field.columnName ? { ...field, columnName: renamed } : field
  })
  checkFieldDirectives(fieldDirectives, new Set(fields.map((field) => field.columnName.toLowerCase())))

  const inherited = inheritFromViews(sources, fields, dynamicFields, ctx.lookup)
  const result = resolveResultShape({
    queryName: name,
    fields,
    dynamicFields: [...dynamicFields, ...inherited.dynamicFields],
    inheritedFields: new Set(inherited.dynamicFields),
    directives: { ...directives, collectionKey: directives.collectionKey ?? inherited.collectionKey },
    sources,
    lookup: ctx.lookup,
    generator,
    location: source.location,
  })

  return {
    columns: fields.map((field) => ({
      name: field.columnName,
      sqlType: field.sqlType,
      notNull: field.notNull,
      propertyName: field.propertyName,
      propertyType: field.propertyType,
      adapter: field.adapter,
      primaryKey: false,
      defaultValue: null,
    })),
    result,
    typeName: result.typeName,
    dynamicFields: [...dynamicFields, ...inherited.dynamicFields],
    directives,
  }
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Analyze one query statement
 *
 * @param statement - The single statement of a query file
 * @param namespace - Namespace (directory) the query belongs to
 * @param queryName - File name without extension
 *
 * @throws SqlSyntaxError, AnnotationError, TypeInferenceError or SchemaConflictError
 */
export function analyzeQuery(
  statement: AnnotatedStatement,
  namespace: string,
  queryName: string,
  ctx: AnalyzerContext
): QuerySpec {
  const { source } = statement
  const { tokens, location } = source

  rejectPositionalParameters(tokens, source.file)
  const { kind, returning } = detectKind(tokens, location)

  const directives = toStatementDirectives(blocksOf(statement, 'statement'))
  const fieldDirectives = toFieldDirectives(blocksOf(statement, 'column'))
  const dynamicFields = blocksOf(statement, 'dynamicField').map(toDynamicFieldDirective)
  const generator = directives.propertyNameGenerator ?? ctx.options.propertyNameGenerator

  const info = describe(ctx.connection, source.text, location)
  const sources = scanSources(tokens)
  const target = kind === 'read' ? undefined : primarySource(sources)
  const resolve = createColumnResolver(sources, ctx.lookup, target)
  const parameters = inferParameters(tokens, resolve, fieldDirectives)

  let result: ResultNode | undefined
  let known = new Set(parameters.map((parameter) => parameter.name.toLowerCase()))

  if (returnsRows({ kind, returning }) && info.reader) {
    const fields = typeProjection(
      {
        name: queryName,
        columns: info.columns,
        items: kind === 'read' ? selectItems(tokens) : null,
        sources,
        target,
        fieldDirectives,
        generator,
        location,
      },
      ctx
    )
    known = new Set([...known, ...fields.map((field) => field.columnName.toLowerCase())])

    const inherited = inheritFromViews(sources, fields, dynamicFields, ctx.lookup)
    result = resolveResultShape({
      queryName,
      fields,
      dynamicFields: [...dynamicFields, ...inherited.dynamicFields],
      inheritedFields: new Set(inherited.dynamicFields),
      directives: { ...directives, collectionKey: directives.collectionKey ?? inherited.collectionKey },
      sources,
      lookup: ctx.lookup,
      generator,
      location,
    })

    if (directives.queryResult !== undefined) {
      result = ctx.sharedResults.resolve(namespace, directives.queryResult, result, `${namespace}.${queryName}`)
    }
  } else if (dynamicFields.length > 0) {
    const first = dynamicFields[0]
    if (first) {
      throw new AnnotationError('Dynamic fields need a statement that returns rows', first.location, ErrorCode.ANNOTATION_INVALID_VALUE)
    }
  }

  checkFieldDirectives(fieldDirectives, known)

  const dependencies = extractDependencies(ctx.connection, ctx.graph, { sql: source.text, kind, tokens })

  return {
    namespace,
    name: queryName,
    sql: source.text,
    kind,
    returning,
    parameters,
    result,
    sharedResult: result ? directives.queryResult : undefined,
    mapTo: directives.mapTo,
    ...dependencies,
    location,
  }
}
