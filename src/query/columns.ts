/**
 * Column reference resolution
 *
 * @module query/columns
 */

import { findColumn, type ColumnSpec, type TableSpec } from '../schema/types'
import { findSource, type SourceTable } from './sources'

export interface ResolvedColumn {
  table: TableSpec
  column: ColumnSpec
  source?: SourceTable | undefined
}

/**
 * Resolves `[qualifier.]column` references against a statement's sources
 */
export type ColumnResolver = (qualifier: string | null, name: string) => ResolvedColumn | undefined

/**
 * Lookup of table and view specs by lower-cased name
 */
export type TableLookup = (name: string) => TableSpec | undefined

export function createColumnResolver(
  sources: SourceTable[],
  lookup: TableLookup,
  writeTarget?: SourceTable
): ColumnResolver {
  const inSource = (source: SourceTable, name: string): ResolvedColumn | undefined => {
    const table = lookup(source.table)
    const column = table ? findColumn(table, name) : undefined
    return table && column ? { table, column, source } : undefined
  }

  return (qualifier, name) => {
    if (qualifier !== null) {
      if (qualifier.toLowerCase() === 'excluded' && writeTarget) return inSource(writeTarget, name)
      const source = findSource(sources, qualifier)
      if (source) return inSource(source, name)
      const table = lookup(qualifier)
      const column = table ? findColumn(table, name) : undefined
      return table && column ? { table, column } : undefined
    }
    const shallowest = [...sources].sort((a, b) => a.depth - b.depth)
    for (const source of shallowest) {
      const resolved = inSource(source, name)
      if (resolved) return resolved
    }
    return undefined
  }
}
