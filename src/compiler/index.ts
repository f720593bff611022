/**
 * Compiler
 *
 * Runs the compile chain over one database's sources: schema model, query
 * analysis with result shaping and dependency extraction, then the init and
 * migration scripts. Either the whole database compiles or the first error
 * is thrown.
 *
 * @module compiler
 */

import { ErrorCode, SqlSyntaxError } from '../errors'
import { extractAnnotations, type AnnotatedStatement } from '../annotations/extractor'
import { resolveConfig, getConfig } from '../config'
import { analyzeQuery, type AnalyzerOptions } from '../query/analyzer'
import { SharedResultRegistry } from '../query/shared-results'
import type { QuerySpec, ResultNode } from '../query/types'
import { buildSchema, type SqlFile } from '../schema/builder'
import type { DependencyGraph } from '../schema/graph'
import type { TableSpec } from '../schema/types'
import { splitStatements } from '../sql/lexer'
import { componentLogger, type Logger } from '../utils/logger'
import type { PropertyNameGenerator } from '../utils/naming'
import { loadDatabaseSources, type DatabaseSources, type QueryFile } from './sources'

export { loadDatabaseSources } from './sources'
export type { DatabaseSources, QueryFile, MigrationFile } from './sources'
export { describeCompiledDatabase } from './describe'
export type { CompiledManifest } from './describe'

// =============================================================================
// Types
// =============================================================================

export interface CompileOptions {
  /** Defaults to the configured generator */
  propertyNameGenerator?: PropertyNameGenerator | undefined
  /** Defaults to the configured `strictTypes` */
  strictTypes?: boolean | undefined
  logger?: Logger | undefined
}

export interface NamespaceModel {
  tables: TableSpec[]
  queries: QuerySpec[]
}

export interface Migration {
  version: number
  statements: string[]
}

export interface CompiledDatabase {
  name: string
  /** Tables and views keyed by lower-cased name */
  tables: Map<string, TableSpec>
  namespaces: Map<string, NamespaceModel>
  /** Shared result shapes keyed by `namespace.name` */
  sharedResults: Map<string, ResultNode>
  graph: DependencyGraph
  schemaStatements: string[]
  initStatements: string[]
  migrations: Migration[]
}

// =============================================================================
// Compilation
// =============================================================================

function statementsOf(files: SqlFile[]): string[] {
  return files.flatMap((file) => splitStatements(file.text, file.path).statements.map((statement) => statement.text))
}

function namespaceOf(namespaces: Map<string, NamespaceModel>, name: string): NamespaceModel {
  let namespace = namespaces.get(name)
  if (!namespace) {
    namespace = { tables: [], queries: [] }
    namespaces.set(name, namespace)
  }
  return namespace
}

function singleStatement(file: QueryFile): AnnotatedStatement {
  const statements = extractAnnotations(file.text, file.path)
  const [statement, extra] = statements
  if (!statement) {
    throw new SqlSyntaxError(`Query file ${file.path} contains no statement`, undefined, ErrorCode.SQL_SYNTAX)
  }
  if (extra) {
    throw new SqlSyntaxError(
      `Query file ${file.path} must contain exactly one statement, found ${statements.length}`,
      extra.source.location,
      ErrorCode.SQL_UNSUPPORTED
    )
  }
  return statement
}

/**
 * Compile one database
 *
 * @throws AnnotationError, SqlSyntaxError, SchemaConflictError or TypeInferenceError
 */
export function compileDatabase(sources: DatabaseSources, options: CompileOptions = {}): CompiledDatabase {
  const config = resolveConfig(getConfig())
  const log = componentLogger('compiler', options.logger)
  const analyzerOptions: AnalyzerOptions = {
    propertyNameGenerator: options.propertyNameGenerator ?? config.propertyNameGenerator,
    strictTypes: options.strictTypes ?? config.strictTypes,
    logger: options.logger,
  }

  const sharedResults = new SharedResultRegistry()
  const schema = buildSchema(sources.schema, analyzerOptions, sharedResults)

  try {
    const namespaces = new Map<string, NamespaceModel>()
    for (const table of schema.tables.values()) namespaceOf(namespaces, table.namespace).tables.push(table)

    const ctx = {
      connection: schema.connection,
      lookup: schema.lookup,
      graph: schema.graph,
      sharedResults,
      options: analyzerOptions,
    }
    for (const file of sources.queries) {
      const query = analyzeQuery(singleStatement(file), file.namespace, file.name, ctx)
      namespaceOf(namespaces, file.namespace).queries.push(query)
      log.debug(`compiled ${file.namespace}.${file.name} (${query.kind})`)
    }

    const compiled: CompiledDatabase = {
      name: sources.name,
      tables: schema.tables,
      namespaces,
      sharedResults: sharedResults.entries(),
      graph: schema.graph,
      schemaStatements: schema.statements,
      initStatements: statementsOf(sources.init),
      migrations: sources.migrations.map((migration) => ({
        version: migration.version,
        statements: statementsOf([migration]),
      })),
    }
    log.info(`compiled database ${sources.name}: ${schema.tables.size} tables and views, ${sources.queries.length} queries`)
    return compiled
  } finally {
    schema.connection.close()
  }
}

/**
 * Load and compile a database source directory
 */
export async function compileDatabaseDir(dir: string, options: CompileOptions = {}): Promise<CompiledDatabase> {
  return compileDatabase(await loadDatabaseSources(dir), options)
}
