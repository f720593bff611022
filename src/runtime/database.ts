/**
 * Database facade
 *
 * Opens a compiled database on a connection, bootstraps or migrates it, and
 * runs compiled queries and ad-hoc statements through the transaction
 * coordinator. Mutation events feed the subscription manager and the
 * persistence controller.
 *
 * @example
 * ```typescript
 * const compiled = await compileDatabaseDir('./db/library')
 * const db = await openDatabase(compiled, { store: new FsSnapshotStore('./data') })
 *
 * await db.query('book', 'insert').execute({ title: 'Placeholder', authorId: 1 })
 * const books = await db.query('book', 'byAuthor').asList({ authorId: 1 })
 *
 * const live = db.query('book', 'all').subscribe({}, { next: (rows) => render(rows) })
 * live.cancel()
 * await db.close()
 * ```
 *
 * @module runtime/database
 */

import type { CompiledDatabase } from '../compiler'
import { getConfig, resolveConfig } from '../config'
import { AD_HOC_CACHE_SIZE, IN_MEMORY_FILENAME } from '../constants'
import { extractDependencies, type Dependencies } from '../dependencies/extractor'
import { ErrorCode, QueryError, TransactionError } from '../errors'
import { NoopPersistenceController, SnapshotPersistenceController } from '../persistence/controller'
import type { PersistenceController, SnapshotStore } from '../persistence/types'
import { detectKind, type StatementKind } from '../query/analyzer'
import { returnsRows, type QuerySpec } from '../query/types'
import { tokenize, type Token } from '../sql/lexer'
import { ReactiveSubscriptionManager } from '../subscriptions/manager'
import type { LiveSubscription, SubscriptionSink, SubscriptionStats } from '../subscriptions/types'
import {
  TransactionCoordinator,
  type RunOptions,
  type TransactionOptions,
} from '../transaction/coordinator'
import { componentLogger, consoleLogger, type Logger } from '../utils/logger'
import { LRUCache } from '../utils/lru-cache'
import { readNumber } from '../utils/type-utils'
import { AdapterRegistry, type TypeAdapter } from './adapters'
import { bindParameters, openConnection, type BindParams, type Connection, type RunResult } from './connection'
import { RowAssembler, type ResultRow } from './row-assembler'

// =============================================================================
// Types
// =============================================================================

export interface OpenDatabaseOptions {
  /** Snapshot name in the store (default: the compiled database's name) */
  name?: string | undefined
  /** Database file; `:memory:` by default */
  filename?: string | undefined
  /** Snapshot store of an in-memory database; file databases persist on their own */
  store?: SnapshotStore | undefined
  /** Flush after every mutation (default: the configured `autoFlush`) */
  autoFlush?: boolean | undefined
  /** Custom type adapters, by the name columns and parameters use */
  adapters?: Readonly<Record<string, TypeAdapter>> | undefined
  logger?: Logger | undefined
}

export type ExecuteResult = RunResult

export interface QueryRunner {
  readonly spec: QuerySpec
  asList(params?: BindParams, options?: RunOptions): Promise<ResultRow[]>
  /** @throws QueryError unless there is exactly one result */
  asOne(params?: BindParams, options?: RunOptions): Promise<ResultRow>
  /** @throws QueryError when there is more than one result */
  asOneOrNull(params?: BindParams, options?: RunOptions): Promise<ResultRow | null>
  /** Run a write that returns no rows */
  execute(params?: BindParams, options?: RunOptions): Promise<ExecuteResult>
  /** Live results of a read */
  subscribe(params: BindParams, sink: SubscriptionSink<ResultRow[]>): LiveSubscription
}

interface AdHocStatement extends StatementKind {
  sql: string
  tokens: Token[]
  dependencies?: Dependencies | undefined
}

interface DatabaseParts {
  name: string
  compiled: CompiledDatabase
  connection: Connection
  coordinator: TransactionCoordinator
  subscriptions: ReactiveSubscriptionManager
  persistence: PersistenceController
  adapters: AdapterRegistry
  logger: Logger | undefined
}

const AD_HOC_LOCATION = { file: '<ad-hoc>', line: 1, column: 1 }

// =============================================================================
// Database
// =============================================================================

export class Database {
  readonly name: string
  private readonly parts: DatabaseParts
  private readonly queries = new Map<string, QuerySpec>()
  private readonly assemblers = new Map<QuerySpec, RowAssembler>()
  private readonly adHoc = new LRUCache<string, AdHocStatement>({ maxEntries: AD_HOC_CACHE_SIZE })
  private readonly detach: Array<() => void> = []
  private closed = false

  constructor(parts: DatabaseParts) {
    this.parts = parts
    this.name = parts.name
    for (const namespace of parts.compiled.namespaces.values()) {
      for (const query of namespace.queries) this.queries.set(`${query.namespace}.${query.name}`, query)
    }

    const { coordinator, subscriptions, persistence } = parts
    this.detach.push(
      coordinator.addListener((event) => subscriptions.handleMutation(event)),
      coordinator.addListener((event) => persistence.handleMutation(event))
    )
  }

  private get logger(): Logger {
    return componentLogger('database', this.parts.logger)
  }

  get isOpen(): boolean {
    return !this.closed && this.parts.connection.isOpen
  }

  // ===========================================================================
  // Compiled queries
  // ===========================================================================

  /**
   * Runner of a compiled query
   *
   * @throws QueryError when the namespace has no such query
   */
  query(namespace: string, name: string): QueryRunner {
    const key = `${namespace}.${name}`
    const spec = this.queries.get(key)
    if (!spec) {
      throw new QueryError(`Unknown query ${key}`, ErrorCode.QUERY_NOT_FOUND, { namespace, name })
    }

    return {
      spec,
      asList: (params = {}, options = {}) => this.rows(spec, params, options),
      asOne: async (params = {}, options = {}) => {
        const rows = await this.rows(spec, params, options)
        const [row] = rows
        if (!row || rows.length > 1) {
          throw new QueryError(`${key} returned ${rows.length} results, expected exactly one`, ErrorCode.UNEXPECTED_ROW_COUNT, {
            query: key,
            count: rows.length,
          })
        }
        return row
      },
      asOneOrNull: async (params = {}, options = {}) => {
        const rows = await this.rows(spec, params, options)
        if (rows.length > 1) {
          throw new QueryError(`${key} returned ${rows.length} results, expected at most one`, ErrorCode.UNEXPECTED_ROW_COUNT, {
            query: key,
            count: rows.length,
          })
        }
        return rows[0] ?? null
      },
      execute: (params = {}, options = {}) => this.write(spec, params, options),
      subscribe: (params, sink) => this.subscribe(spec, params, sink),
    }
  }

  private assemblerFor(spec: QuerySpec): RowAssembler {
    let assembler = this.assemblers.get(spec)
    if (!assembler) {
      if (!spec.result) {
        throw new QueryError(`${spec.namespace}.${spec.name} has no result shape`, ErrorCode.QUERY_ERROR)
      }
      assembler = new RowAssembler(spec.result, this.parts.adapters)
      this.assemblers.set(spec, assembler)
    }
    return assembler
  }

  private fetch(spec: QuerySpec, params: BindParams): ResultRow[] {
    const raw = this.parts.connection.raw(spec.sql, this.parts.adapters.encodeParameters(spec.parameters, params))
    return this.assemblerFor(spec).assemble(raw)
  }

  private async rows(spec: QuerySpec, params: BindParams, options: RunOptions): Promise<ResultRow[]> {
    this.ensureOpen()
    if (!returnsRows(spec)) {
      throw new QueryError(`${spec.namespace}.${spec.name} returns no rows; use execute()`, ErrorCode.QUERY_ERROR, {
        query: `${spec.namespace}.${spec.name}`,
      })
    }
    if (spec.kind === 'read') {
      return this.parts.coordinator.run(
        () => ({ value: this.fetch(spec, params), affectedTables: [], mutated: false }),
        options
      )
    }
    return this.parts.coordinator.run(() => {
      const value = this.fetch(spec, params)
      this.parts.persistence.invalidate()
      return { value, affectedTables: spec.affectedTables, mutated: true }
    }, options)
  }

  private async write(spec: QuerySpec, params: BindParams, options: RunOptions): Promise<ExecuteResult> {
    this.ensureOpen()
    if (spec.kind === 'read' || spec.returning) {
      throw new QueryError(`${spec.namespace}.${spec.name} returns rows; use asList()`, ErrorCode.QUERY_ERROR, {
        query: `${spec.namespace}.${spec.name}`,
      })
    }
    return this.parts.coordinator.run(() => {
      const value = this.parts.connection.run(spec.sql, this.parts.adapters.encodeParameters(spec.parameters, params))
      this.parts.persistence.invalidate()
      return { value, affectedTables: spec.affectedTables, mutated: true }
    }, options)
  }

  private subscribe(spec: QuerySpec, params: BindParams, sink: SubscriptionSink<ResultRow[]>): LiveSubscription {
    this.ensureOpen()
    const key = `${spec.namespace}.${spec.name}`
    if (spec.kind !== 'read') {
      throw new QueryError(`Cannot subscribe to ${key}: only reads can be observed`, ErrorCode.QUERY_ERROR, { query: key })
    }
    bindParameters(
      spec.parameters.map((parameter) => parameter.name),
      params
    )
    return this.parts.subscriptions.subscribe(
      { key, invalidationSet: spec.invalidationSet, execute: () => this.fetch(spec, params) },
      params,
      sink
    )
  }

  // ===========================================================================
  // Ad-hoc statements
  // ===========================================================================

  private statement(sql: string): AdHocStatement {
    let statement = this.adHoc.get(sql)
    if (!statement) {
      const tokens = tokenize(sql, AD_HOC_LOCATION.file)
      statement = { sql, tokens, ...detectKind(tokens, AD_HOC_LOCATION) }
      this.adHoc.set(sql, statement)
    }
    return statement
  }

  /** Computed inside the slot, against the live schema */
  private affectedBy(statement: AdHocStatement): string[] {
    statement.dependencies ??= extractDependencies(this.parts.connection, this.parts.compiled.graph, statement)
    return statement.dependencies.affectedTables
  }

  /**
   * Run a statement that is not a compiled query and return its rows as
   * plain objects
   *
   * @throws QueryError for writes without RETURNING
   */
  async select(sql: string, params: BindParams = {}, options: RunOptions = {}): Promise<ResultRow[]> {
    this.ensureOpen()
    const statement = this.statement(sql)
    if (!returnsRows(statement)) {
      throw new QueryError('Statement returns no rows; use execute()', ErrorCode.QUERY_ERROR, { sql })
    }
    const { connection } = this.parts
    if (statement.kind === 'read') {
      return this.parts.coordinator.run(() => ({ value: connection.all(sql, params), affectedTables: [], mutated: false }), options)
    }
    return this.parts.coordinator.run(() => {
      const affectedTables = this.affectedBy(statement)
      const value = connection.all(sql, params)
      this.parts.persistence.invalidate()
      return { value, affectedTables, mutated: true }
    }, options)
  }

  /**
   * Run a write that is not a compiled query; subscriptions on the tables it
   * affects are refreshed as for compiled writes
   *
   * @throws QueryError for statements that return rows
   */
  async execute(sql: string, params: BindParams = {}, options: RunOptions = {}): Promise<ExecuteResult> {
    this.ensureOpen()
    const statement = this.statement(sql)
    if (returnsRows(statement)) {
      throw new QueryError('Statement returns rows; use select()', ErrorCode.QUERY_ERROR, { sql })
    }
    return this.parts.coordinator.run(() => {
      const affectedTables = this.affectedBy(statement)
      const value = this.parts.connection.run(sql, params)
      this.parts.persistence.invalidate()
      return { value, affectedTables, mutated: true }
    }, options)
  }

  // ===========================================================================
  // Transactions, notifications & lifecycle
  // ===========================================================================

  async transaction<T>(block: () => T | Promise<T>, options: TransactionOptions = {}): Promise<T> {
    this.ensureOpen()
    return this.parts.coordinator.transaction(block, options)
  }

  /**
   * Persist a snapshot now
   *
   * @throws PersistenceError when the store fails
   */
  async flush(): Promise<void> {
    this.ensureOpen()
    return this.parts.persistence.flush()
  }

  enableNotifications(): void {
    this.parts.subscriptions.enableNotifications()
  }

  disableNotifications(): void {
    this.parts.subscriptions.disableNotifications()
  }

  getSubscriptionStats(): SubscriptionStats {
    return this.parts.subscriptions.getStats()
  }

  /**
   * Cancel subscriptions, run the final flush and close the connection.
   * The connection is closed even when the flush fails.
   *
   * @throws PersistenceError when the final flush fails
   * @throws TransactionError when called inside a transaction or the execution slot
   */
  async close(): Promise<void> {
    if (this.closed) return
    if (this.parts.coordinator.insideSlot) {
      throw new TransactionError(
        `Cannot close ${this.name} inside a transaction`,
        ErrorCode.TRANSACTION_ERROR,
        { database: this.name }
      )
    }
    this.closed = true
    this.parts.subscriptions.close()
    try {
      await this.parts.persistence.close()
    } finally {
      this.detach.forEach((remove) => remove())
      await this.parts.coordinator.drain()
      this.parts.connection.close()
      this.logger.debug(`closed ${this.name}`)
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new TransactionError(`Database ${this.name} is closed`, ErrorCode.CONNECTION_CLOSED, { database: this.name })
    }
  }
}

// =============================================================================
// Opening
// =============================================================================

function userVersion(connection: Connection): number {
  const [row] = connection.all('PRAGMA user_version')
  return (row && readNumber(row, 'user_version')) ?? 0
}

function hasUserTables(connection: Connection): boolean {
  return (
    connection.all("SELECT name FROM sqlite_master WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%' LIMIT 1")
      .length > 0
  )
}

/**
 * Create the schema of a fresh database, or run the migrations above its
 * stored version, in one transaction
 */
async function bootstrap(
  compiled: CompiledDatabase,
  connection: Connection,
  coordinator: TransactionCoordinator,
  restored: boolean,
  log: Logger
): Promise<void> {
  const migrations = [...compiled.migrations].sort((a, b) => a.version - b.version)
  const latest = migrations.reduce((max, migration) => Math.max(max, migration.version), 0)

  await coordinator.transaction(
    () => {
      const version = userVersion(connection)
      if (version === 0 && !restored && !hasUserTables(connection)) {
        for (const sql of compiled.schemaStatements) connection.exec(sql)
        for (const sql of compiled.initStatements) connection.exec(sql)
        connection.exec(`PRAGMA user_version = ${latest}`)
        log.info(`created ${compiled.name} at version ${latest}`)
        return
      }

      const pending = migrations.filter((migration) => migration.version > version)
      for (const migration of pending) {
        for (const sql of migration.statements) connection.exec(sql)
        connection.exec(`PRAGMA user_version = ${migration.version}`)
        log.info(`migrated ${compiled.name} to version ${migration.version}`)
      }
    },
    { mode: 'immediate' }
  )
}

/**
 * Check every adapter the schema and the queries name
 */
function verifyAdapters(compiled: CompiledDatabase, adapters: AdapterRegistry): void {
  for (const table of compiled.tables.values()) {
    for (const column of table.columns) {
      if (column.adapter !== undefined) adapters.get(column.adapter)
    }
  }
  for (const namespace of compiled.namespaces.values()) {
    for (const query of namespace.queries) {
      adapters.verify(query.parameters, query.result, { query: `${query.namespace}.${query.name}` })
    }
  }
}

/**
 * Open a compiled database
 *
 * An in-memory database with a store starts from the stored snapshot when
 * there is one. A fresh database gets the schema and init scripts; an
 * existing one gets the migrations above its `user_version`.
 *
 * @throws ConfigurationError when a column or parameter names an unknown adapter
 * @throws PersistenceError when the stored snapshot cannot be read
 */
export async function openDatabase(compiled: CompiledDatabase, options: OpenDatabaseOptions = {}): Promise<Database> {
  const config = resolveConfig(getConfig())
  const logger = options.logger ?? (config.debug ? consoleLogger : undefined)
  const log = componentLogger('database', logger)
  const name = options.name ?? compiled.name

  const adapters = new AdapterRegistry(options.adapters)
  verifyAdapters(compiled, adapters)

  const inMemory = options.filename === undefined || options.filename === IN_MEMORY_FILENAME
  const store = inMemory ? options.store : undefined
  if (options.store && !inMemory) {
    log.debug(`${name} is a file database; the snapshot store is not used`)
  }

  const snapshot = store ? await store.load(name) : null
  const connection = openConnection({ filename: options.filename, snapshot: snapshot ?? undefined })

  try {
    connection.exec('PRAGMA foreign_keys = ON')
    const coordinator = new TransactionCoordinator(connection, { logger })
    await bootstrap(compiled, connection, coordinator, snapshot !== null, log)

    const persistence: PersistenceController = store
      ? new SnapshotPersistenceController({
          dbName: name,
          store,
          connection,
          coordinator,
          autoFlush: options.autoFlush ?? config.autoFlush,
          logger,
        })
      : new NoopPersistenceController()
    const subscriptions = new ReactiveSubscriptionManager(coordinator, { logger, debug: config.debug })

    log.debug(`opened ${name}${snapshot ? ' from snapshot' : ''}`)
    return new Database({ name, compiled, connection, coordinator, subscriptions, persistence, adapters, logger })
  } catch (error) {
    connection.close()
    throw error
  }
}
