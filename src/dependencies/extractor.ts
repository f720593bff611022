/**
 * Dependency extraction
 *
 * Touched tables are read from the engine's bytecode listing: cursors opened
 * for reading mark read tables, cursors opened for writing (and table clears)
 * mark written tables. Index cursors count for the index's table. Writes are
 * then expanded through the cascade graph along the edge kind matching the
 * write.
 *
 * @module dependencies/extractor
 */

import type { Connection } from '../runtime/connection'
import type { CascadeKind, DependencyGraph } from '../schema/graph'
import { isKeyword, parenDepths, parameterNames, tokenize, type Token } from '../sql/lexer'
import { firstVerbIndex } from '../query/sources'
import type { QueryKind } from '../query/types'
import { readNumber, readString } from '../utils/type-utils'

export interface TouchedTables {
  read: Set<string>
  write: Set<string>
}

export interface Dependencies {
  readTables: string[]
  writeTables: string[]
  /** Tables whose mutation re-evaluates the statement (reads) */
  invalidationSet: string[]
  /** Tables a run of the statement marks as changed (writes) */
  affectedTables: string[]
}

const READ_OPCODES = new Set(['OpenRead', 'ReopenIdx'])
const WRITE_OPCODES = new Set(['OpenWrite'])

/**
 * Map root pages of the main schema to their (lower-cased) table names
 */
function rootPages(connection: Connection): Map<number, string> {
  const pages = new Map<number, string>()
  for (const row of connection.all('SELECT tbl_name, rootpage FROM sqlite_master WHERE rootpage > 0')) {
    const page = readNumber(row, 'rootpage')
    const table = readString(row, 'tbl_name')
    if (page !== null && table !== null) pages.set(page, table.toLowerCase())
  }
  return pages
}

function isInternalTable(table: string): boolean {
  return table.startsWith('sqlite_')
}

/**
 * Tables a statement reads and writes, according to its bytecode
 */
export function touchedTables(connection: Connection, sql: string): TouchedTables {
  const bindings = Object.fromEntries(parameterNames(tokenize(sql)).map((name) => [name, null]))
  const pages = rootPages(connection)
  const touched: TouchedTables = { read: new Set(), write: new Set() }

  for (const row of connection.all(`EXPLAIN ${sql}`, bindings)) {
    const opcode = readString(row, 'opcode')
    if (opcode === null) continue

    let page: number | null = null
    let database: number | null = null
    let target: Set<string> | null = null
    if (READ_OPCODES.has(opcode) || WRITE_OPCODES.has(opcode)) {
      page = readNumber(row, 'p2')
      database = readNumber(row, 'p3')
      target = WRITE_OPCODES.has(opcode) ? touched.write : touched.read
    } else if (opcode === 'Clear') {
      page = readNumber(row, 'p1')
      database = readNumber(row, 'p2')
      target = touched.write
    }
    if (target === null || page === null || database !== 0) continue

    const table = pages.get(page)
    if (table !== undefined && !isInternalTable(table)) target.add(table)
  }

  return touched
}

/**
 * Cascade edge kinds a write walks
 *
 * - DELETE walks delete edges and UPDATE walks update edges
 * - a plain INSERT walks none
 * - an upsert (ON CONFLICT ... DO UPDATE) walks update edges
 * - REPLACE and INSERT OR REPLACE walk delete edges, since the replaced row is deleted first
 */
export function cascadeKindsFor(kind: QueryKind, tokens: Token[]): CascadeKind[] {
  if (kind === 'delete') return ['delete']
  if (kind === 'update') return ['update']
  if (kind !== 'insert') return []

  const kinds: CascadeKind[] = []
  const verb = firstVerbIndex(tokens)
  const replaces =
    isKeyword(tokens[verb], 'REPLACE') ||
    (isKeyword(tokens[verb], 'INSERT') && isKeyword(tokens[verb + 1], 'OR') && isKeyword(tokens[verb + 2], 'REPLACE'))
  if (replaces) kinds.push('delete')

  const depths = parenDepths(tokens)
  const upsert = tokens.some(
    (token, index) => (depths[index] ?? 0) === 0 && isKeyword(token, 'DO') && isKeyword(tokens[index + 1], 'UPDATE')
  )
  if (upsert) kinds.push('update')
  return kinds
}

/**
 * Read, write, invalidation and affected table sets of one statement
 */
export function extractDependencies(
  connection: Connection,
  graph: DependencyGraph,
  statement: { sql: string; kind: QueryKind; tokens: Token[] }
): Dependencies {
  const touched = touchedTables(connection, statement.sql)
  const readTables = [...touched.read].sort()
  const writeTables = [...touched.write].sort()

  if (statement.kind === 'read') {
    return { readTables, writeTables, invalidationSet: readTables, affectedTables: [] }
  }

  const affected = graph.expand(touched.write, cascadeKindsFor(statement.kind, statement.tokens))
  return { readTables, writeTables, invalidationSet: [], affectedTables: [...affected].sort() }
}
