/**
 * Row assembler
 *
 * Turns the flat rows of a statement into the nested objects its result tree
 * describes. Rows are grouped into one result per parent identity when the
 * tree contains collections; each collection then groups the rows of its
 * parent by its own grouping key, so unrelated one-to-many joins in the same
 * statement do not multiply each other's elements.
 *
 * @module runtime/row-assembler
 */

import { ErrorCode, QueryError } from '../errors'
import type { ResultNode } from '../query/types'
import { stableStringify } from '../utils/stable-json'
import type { RawRows } from './connection'
import type { AdapterRegistry } from './adapters'

export type ResultRow = Record<string, unknown>

type Row = unknown[]

/**
 * Column positions of one raw result, by exact and lower-cased name
 */
class ColumnIndex {
  private readonly exact = new Map<string, number>()
  private readonly folded = new Map<string, number>()

  constructor(columns: readonly string[]) {
    columns.forEach((name, position) => {
      if (!this.exact.has(name)) this.exact.set(name, position)
      const lower = name.toLowerCase()
      if (!this.folded.has(lower)) this.folded.set(lower, position)
    })
  }

  position(name: string): number {
    const position = this.exact.get(name) ?? this.folded.get(name.toLowerCase())
    if (position === undefined) {
      throw new QueryError(`Result column "${name}" is missing from the row`, ErrorCode.QUERY_ERROR, { column: name })
    }
    return position
  }
}

/**
 * Group rows by a key, keeping first-seen order; rows whose key is null are dropped
 */
function groupBy(rows: readonly Row[], keyOf: (row: Row) => string | null): Row[][] {
  const groups = new Map<string, Row[]>()
  for (const row of rows) {
    const key = keyOf(row)
    if (key === null) continue
    const group = groups.get(key)
    if (group) group.push(row)
    else groups.set(key, [row])
  }
  return [...groups.values()]
}

export class RowAssembler {
  constructor(
    private readonly root: ResultNode,
    private readonly adapters: AdapterRegistry
  ) {}

  /**
   * Assemble every result of a raw row set
   */
  assemble(raw: RawRows): ResultRow[] {
    const index = new ColumnIndex(raw.columns)
    const { identity } = this.root
    if (!identity || identity.length === 0) {
      return raw.rows.map((row) => this.build(this.root, [row], index))
    }

    const positions = identity.map((name) => index.position(name))
    const groups = groupBy(raw.rows, (row) => stableStringify(positions.map((position) => row[position] ?? null)))
    return groups.map((rows) => this.build(this.root, rows, index))
  }

  private build(node: ResultNode, rows: Row[], index: ColumnIndex): ResultRow {
    const [first] = rows
    const result: ResultRow = {}
    for (const field of node.fields) {
      const value = first?.[index.position(field.columnName)] ?? null
      result[field.propertyName] = value !== null && field.adapter ? this.adapters.get(field.adapter).decode(value) : value
    }

    for (const child of node.children) {
      const property = child.propertyName ?? child.typeName
      switch (child.kind) {
        case 'collection': {
          const key = child.groupingKey
          if (key === undefined) {
            result[property] = []
            break
          }
          const position = index.position(key)
          const groups = groupBy(rows, (row) => {
            const value = row[position] ?? null
            return value === null ? null : stableStringify(value)
          })
          result[property] = groups.map((group) => this.build(child, group, index))
          break
        }
        case 'perRow':
          result[property] = first && this.present(child, first, index) ? this.build(child, rows, index) : this.absent(child, rows, index)
          break
        default:
          result[property] = this.build(child, rows, index)
      }
    }
    return result
  }

  /**
   * A joined object is present when any of its columns is non-null
   */
  private present(node: ResultNode, row: Row, index: ColumnIndex): boolean {
    if (node.fields.some((field) => (row[index.position(field.columnName)] ?? null) !== null)) return true
    return node.children.some((child) => child.kind !== 'collection' && this.present(child, row, index))
  }

  private absent(node: ResultNode, rows: Row[], index: ColumnIndex): unknown {
    if (node.defaultValue !== undefined) return structuredClone(node.defaultValue)
    return node.notNull ? this.build(node, rows, index) : null
  }
}
