/**
 * sqlweave - annotated SQL compiler and reactive runtime for SQLite
 *
 * @example
 * ```typescript
 * import { compileDatabaseDir, openDatabase, MemorySnapshotStore } from 'sqlweave'
 *
 * const compiled = await compileDatabaseDir('./db/library')
 * const db = await openDatabase(compiled, { store: new MemorySnapshotStore() })
 *
 * const authors = await db.query('author', 'withBooks').asList()
 * await db.close()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Compiler
// =============================================================================

export {
  compileDatabase,
  compileDatabaseDir,
  describeCompiledDatabase,
  loadDatabaseSources,
} from './compiler'
export type {
  CompiledDatabase,
  CompiledManifest,
  CompileOptions,
  DatabaseSources,
  Migration,
  MigrationFile,
  NamespaceModel,
  QueryFile,
} from './compiler'

export { extractAnnotations, type AnnotatedStatement } from './annotations/extractor'
export { parseDirectives, type DirectiveMap, type DirectiveValue } from './annotations/parser'
export type {
  AnnotationScope,
  CascadeNotify,
  DynamicFieldDirective,
  FieldDirectives,
  MappingType,
  StatementDirectives,
  TableDirectives,
} from './annotations/types'

export { splitStatements, tokenize, type Token } from './sql/lexer'
export * from './schema'
export * from './query'
export { extractDependencies, touchedTables, type Dependencies, type TouchedTables } from './dependencies/extractor'

// =============================================================================
// Runtime
// =============================================================================

export * from './runtime'
export * from './transaction'
export * from './subscriptions'
export * from './persistence'

// =============================================================================
// Configuration, Errors & Logging
// =============================================================================

export * from './config'
export * from './errors'
export {
  componentLogger,
  consoleLogger,
  createConsoleLogger,
  getLogger,
  noopLogger,
  setLogger,
  type LogComponent,
  type Logger,
  type LogLevel,
} from './utils/logger'
export {
  FireAndForgetMetricsCollector,
  fireAndForget,
  globalFireAndForgetMetrics,
  type FireAndForgetMetrics,
} from './utils/fire-and-forget'
export { lowerCamelCase, pascalCase, singularize, type PropertyNameGenerator } from './utils/naming'
