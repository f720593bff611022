/**
 * Shared result registry
 *
 * Queries of one namespace that declare the same `queryResult` name must
 * resolve to the same shape. The first query registers the canonical node;
 * later queries get that node back or a SchemaConflictError describing the
 * difference.
 *
 * @module query/shared-results
 */

import { ErrorCode, SchemaConflictError } from '../errors'
import type { ResultField, ResultNode } from './types'

export interface ResultDiff {
  /** Fields of the canonical shape the new query lacks */
  missing: string[]
  /** Fields the new query adds */
  added: string[]
  /** Fields present in both with a different property, type or nullability */
  changed: string[]
}

function describeField(field: ResultField): string {
  return `${field.propertyName}: ${field.propertyType}${field.notNull ? '' : ' | null'}`
}

function compareInto(canonical: ResultNode, candidate: ResultNode, path: string, diff: ResultDiff): void {
  const prefix = path ? `${path}.` : ''
  const expected = new Map(canonical.fields.map((field) => [field.columnName.toLowerCase(), field]))
  const actual = new Map(candidate.fields.map((field) => [field.columnName.toLowerCase(), field]))

  for (const [key, field] of expected) {
    const other = actual.get(key)
    if (!other) {
      diff.missing.push(`${prefix}${field.columnName}`)
    } else if (
      other.propertyName !== field.propertyName ||
      other.propertyType !== field.propertyType ||
      other.notNull !== field.notNull
    ) {
      diff.changed.push(`${prefix}${field.columnName} (${describeField(field)} vs ${describeField(other)})`)
    }
  }
  for (const [key, field] of actual) {
    if (!expected.has(key)) diff.added.push(`${prefix}${field.columnName}`)
  }

  const expectedChildren = new Map(canonical.children.map((child) => [child.propertyName ?? '', child]))
  const actualChildren = new Map(candidate.children.map((child) => [child.propertyName ?? '', child]))
  for (const [name, child] of expectedChildren) {
    const other = actualChildren.get(name)
    if (!other) diff.missing.push(`${prefix}${name}`)
    else if (other.kind !== child.kind) diff.changed.push(`${prefix}${name} (${child.kind} vs ${other.kind})`)
    else compareInto(child, other, `${prefix}${name}`, diff)
  }
  for (const name of actualChildren.keys()) {
    if (!expectedChildren.has(name)) diff.added.push(`${prefix}${name}`)
  }
}

/**
 * Structural difference between two result trees; field order is ignored
 */
export function compareResultNodes(canonical: ResultNode, candidate: ResultNode): ResultDiff {
  const diff: ResultDiff = { missing: [], added: [], changed: [] }
  compareInto(canonical, candidate, '', diff)
  return diff
}

export function isEmptyDiff(diff: ResultDiff): boolean {
  return diff.missing.length === 0 && diff.added.length === 0 && diff.changed.length === 0
}

function formatDiff(diff: ResultDiff): string {
  const parts: string[] = []
  if (diff.missing.length > 0) parts.push(`missing: ${diff.missing.join(', ')}`)
  if (diff.added.length > 0) parts.push(`new: ${diff.added.join(', ')}`)
  if (diff.changed.length > 0) parts.push(`changed: ${diff.changed.join(', ')}`)
  return parts.join('; ')
}

export class SharedResultRegistry {
  private readonly results = new Map<string, { node: ResultNode; owner: string }>()

  static key(namespace: string, name: string): string {
    return `${namespace}.${name}`
  }

  /**
   * Register a query's shape under a shared name and return the canonical node
   *
   * @throws SchemaConflictError when the shape differs from the registered one
   */
  resolve(namespace: string, name: string, node: ResultNode, queryName: string): ResultNode {
    const key = SharedResultRegistry.key(namespace, name)
    const existing = this.results.get(key)
    if (!existing) {
      this.results.set(key, { node, owner: queryName })
      return node
    }

    const diff = compareResultNodes(existing.node, node)
    if (!isEmptyDiff(diff)) {
      throw new SchemaConflictError(
        `Shared result ${key} of ${queryName} does not match the shape declared by ${existing.owner}: ${formatDiff(diff)}`,
        ErrorCode.SHARED_RESULT_MISMATCH,
        { sharedResult: key, query: queryName, canonicalQuery: existing.owner, ...diff }
      )
    }
    return existing.node
  }

  get(namespace: string, name: string): ResultNode | undefined {
    return this.results.get(SharedResultRegistry.key(namespace, name))?.node
  }

  entries(): Map<string, ResultNode> {
    return new Map([...this.results].map(([key, value]) => [key, value.node]))
  }
}
