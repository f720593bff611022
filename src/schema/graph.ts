/**
 * Cascade notification graph
 *
 * Nodes are lower-cased table names. Edges are declared with `cascadeNotify`
 * and walked breadth-first when a write's affected tables are expanded.
 * Cycles and self-edges are allowed; the walk tracks visited tables.
 *
 * @module schema/graph
 */

export type CascadeKind = 'delete' | 'update'

export class DependencyGraph {
  private readonly nodes = new Set<string>()
  private readonly edges: Record<CascadeKind, Map<string, Set<string>>> = {
    delete: new Map(),
    update: new Map(),
  }

  addTable(table: string): void {
    this.nodes.add(table.toLowerCase())
  }

  addEdge(kind: CascadeKind, from: string, to: string): void {
    const source = from.toLowerCase()
    const target = to.toLowerCase()
    this.nodes.add(source)
    this.nodes.add(target)
    let targets = this.edges[kind].get(source)
    if (!targets) {
      targets = new Set()
      this.edges[kind].set(source, targets)
    }
    targets.add(target)
  }

  /**
   * Direct targets of a table along one edge kind
   */
  targets(kind: CascadeKind, from: string): string[] {
    return [...(this.edges[kind].get(from.toLowerCase()) ?? [])]
  }

  tables(): string[] {
    return [...this.nodes]
  }

  /**
   * Tables reachable from the start set along the given edge kinds, start set
   * included
   */
  expand(start: Iterable<string>, kinds: readonly CascadeKind[]): Set<string> {
    const visited = new Set<string>()
    const queue: string[] = []
    for (const table of start) {
      const lower = table.toLowerCase()
      if (!visited.has(lower)) {
        visited.add(lower)
        queue.push(lower)
      }
    }

    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      for (const kind of kinds) {
        for (const next of this.edges[kind].get(current) ?? []) {
          if (visited.has(next)) continue
          visited.add(next)
          queue.push(next)
        }
      }
    }

    return visited
  }

  toJSON(): Record<CascadeKind, Record<string, string[]>> {
    const serialize = (kind: CascadeKind): Record<string, string[]> =>
      Object.fromEntries([...this.edges[kind]].map(([from, to]) => [from, [...to].sort()]))
    return { delete: serialize('delete'), update: serialize('update') }
  }
}
