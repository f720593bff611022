/**
 * Connection capability
 *
 * Everything above this module talks to the engine through the `Connection`
 * interface; `BetterSqliteConnection` is the Node.js implementation. The
 * compiler uses the same interface against an in-memory introspection
 * database.
 *
 * @module runtime/connection
 */

import Database from 'better-sqlite3'
import { IN_MEMORY_FILENAME, STATEMENT_CACHE_SIZE } from '../constants'
import { ErrorCode, QueryError, TransactionError } from '../errors'
import { parameterNames, tokenize } from '../sql/lexer'
import { LRUCache } from '../utils/lru-cache'
import { isObject } from '../utils/type-utils'

// =============================================================================
// Types
// =============================================================================

/**
 * Named parameter values, keyed without their `:`, `@` or `$` prefix
 */
export type BindParams = Readonly<Record<string, unknown>>

export interface RunResult {
  changes: number
  lastInsertRowid: number | bigint
}

/**
 * Metadata the engine reports for one result column
 */
export interface ColumnMetadata {
  name: string
  /** Origin table, when the column maps directly to a table column */
  table: string | null
  /** Origin column */
  column: string | null
  /** Declared type of the origin column */
  type: string | null
}

export interface StatementInfo {
  /** Statement returns rows */
  reader: boolean
  /** Statement does not write */
  readonly: boolean
  columns: ColumnMetadata[]
  parameters: string[]
}

export interface RawRows {
  columns: string[]
  rows: unknown[][]
}

export interface Connection {
  readonly isOpen: boolean
  readonly inTransaction: boolean
  /** Run one or more statements without parameters */
  exec(sql: string): void
  /** Prepare a statement and report its metadata without running it */
  describe(sql: string): StatementInfo
  run(sql: string, params?: BindParams): RunResult
  /** Rows as objects keyed by column name */
  all(sql: string, params?: BindParams): Record<string, unknown>[]
  /** Rows as value arrays, in projection order */
  raw(sql: string, params?: BindParams): RawRows
  /** Byte image of the whole database */
  serialize(): Uint8Array
  close(): void
}

export interface ConnectionOptions {
  /** Database file, `:memory:` by default */
  filename?: string | undefined
  /** Snapshot bytes to open instead of a file */
  snapshot?: Uint8Array | undefined
  /** Prepared statements to keep (default 256) */
  statementCacheSize?: number | undefined
}

// =============================================================================
// Parameter binding
// =============================================================================

function toBindValue(value: unknown): unknown {
  if (value === undefined) return null
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value instanceof Uint8Array && !Buffer.isBuffer(value)) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }
  return value
}

/**
 * Build the bind object for a statement's named parameters
 *
 * @throws QueryError when a named parameter has no value
 */
export function bindParameters(names: readonly string[], params: BindParams = {}): Record<string, unknown> {
  const bound: Record<string, unknown> = {}
  for (const name of names) {
    if (!(name in params)) {
      throw new QueryError(`Missing value for parameter "${name}"`, ErrorCode.MISSING_PARAMETER, { parameter: name })
    }
    bound[name] = toBindValue(params[name])
  }
  return bound
}

// =============================================================================
// better-sqlite3 implementation
// =============================================================================

interface PreparedEntry {
  statement: Database.Statement
  parameters: string[]
}

export class BetterSqliteConnection implements Connection {
  private readonly db: Database.Database
  private readonly cache: LRUCache<string, PreparedEntry>

  constructor(options: ConnectionOptions = {}) {
    this.cache = new LRUCache<string, PreparedEntry>({ maxEntries: options.statementCacheSize ?? STATEMENT_CACHE_SIZE })
    this.db = options.snapshot
      ? new Database(Buffer.from(options.snapshot))
      : new Database(options.filename ?? IN_MEMORY_FILENAME)
  }

  get isOpen(): boolean {
    return this.db.open
  }

  /** Prepared statements currently cached */
  get cachedStatements(): number {
    return this.cache.size
  }

  get inTransaction(): boolean {
    return this.db.inTransaction
  }

  exec(sql: string): void {
    this.ensureOpen()
    this.db.exec(sql)
  }

  describe(sql: string): StatementInfo {
    const { statement, parameters } = this.prepare(sql)
    const columns = statement.reader
      ? statement.columns().map((column) => ({
          name: column.name,
          table: column.table,
          column: column.column,
          type: column.type,
        }))
      : []
    return { reader: statement.reader, readonly: statement.readonly, columns, parameters }
  }

  run(sql: string, params?: BindParams): RunResult {
    const { statement, parameters } = this.prepare(sql)
    const result = parameters.length > 0 ? statement.run(bindParameters(parameters, params)) : statement.run()
    return { changes: result.changes, lastInsertRowid: result.lastInsertRowid }
  }

  all(sql: string, params?: BindParams): Record<string, unknown>[] {
    const { statement, parameters } = this.prepare(sql)
    statement.raw(false)
    const rows: unknown[] = parameters.length > 0 ? statement.all(bindParameters(parameters, params)) : statement.all()
    return rows.filter(isObject)
  }

  raw(sql: string, params?: BindParams): RawRows {
    const { statement, parameters } = this.prepare(sql)
    statement.raw(true)
    try {
      const rows: unknown[] = parameters.length > 0 ? statement.all(bindParameters(parameters, params)) : statement.all()
      return {
        columns: statement.columns().map((column) => column.name),
        rows: rows.filter((row): row is unknown[] => Array.isArray(row)),
      }
    } finally {
      statement.raw(false)
    }
  }

  serialize(): Uint8Array {
    this.ensureOpen()
    return this.db.serialize()
  }

  close(): void {
    this.cache.clear()
    if (this.db.open) this.db.close()
  }

  private prepare(sql: string): PreparedEntry {
    this.ensureOpen()
    let entry = this.cache.get(sql)
    if (!entry) {
      entry = { statement: this.db.prepare(sql), parameters: parameterNames(tokenize(sql)) }
      this.cache.set(sql, entry)
    }
    return entry
  }

  private ensureOpen(): void {
    if (!this.db.open) {
      throw new TransactionError('Connection is closed', ErrorCode.CONNECTION_CLOSED)
    }
  }
}

/**
 * Open a connection on a file, `:memory:`, or snapshot bytes
 */
export function openConnection(options: ConnectionOptions = {}): Connection {
  return new BetterSqliteConnection(options)
}
