/**
 * JSON manifest of a compiled database, for external emitters
 *
 * @module compiler/describe
 */

import type { QuerySpec, ResultNode } from '../query/types'
import type { CascadeKind } from '../schema/graph'
import type { TableSpec } from '../schema/types'
import type { CompiledDatabase, Migration } from './index'

export interface CompiledManifest {
  name: string
  namespaces: Record<string, { tables: TableSpec[]; queries: QuerySpec[] }>
  sharedResults: Record<string, ResultNode>
  cascades: Record<CascadeKind, Record<string, string[]>>
  schemaStatements: string[]
  initStatements: string[]
  migrations: Migration[]
}

/**
 * Plain-object form of a compiled database; maps become records sorted by key
 */
export function describeCompiledDatabase(compiled: CompiledDatabase): CompiledManifest {
  const namespaces = [...compiled.namespaces.keys()].sort()
  return {
    name: compiled.name,
    namespaces: Object.fromEntries(
      namespaces.map((name) => {
        const namespace = compiled.namespaces.get(name) ?? { tables: [], queries: [] }
        return [name, { tables: [...namespace.tables], queries: [...namespace.queries] }]
      })
    ),
    sharedResults: Object.fromEntries([...compiled.sharedResults].sort(([a], [b]) => a.localeCompare(b))),
    cascades: compiled.graph.toJSON(),
    schemaStatements: [...compiled.schemaStatements],
    initStatements: [...compiled.initStatements],
    migrations: compiled.migrations.map((migration) => ({ ...migration, statements: [...migration.statements] })),
  }
}
