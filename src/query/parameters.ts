/**
 * Parameter type inference
 *
 * A parameter takes the type of the column it is compared with, assigned to,
 * or inserted into. Every use must agree on the type; the parameter is
 * nullable only when every use is.
 *
 * @module query/parameters
 */

import { TypeInferenceError } from '../errors'
import { UNKNOWN_PROPERTY_TYPE } from '../constants'
import type { FieldDirectives } from '../annotations/types'
import {
  findClosingParen,
  identifierName,
  isKeyword,
  isPunctuation,
  parameterNames,
  type Token,
} from '../sql/lexer'
import { implicitAdapter } from '../schema/type-mapping'
import type { ColumnResolver, ResolvedColumn } from './columns'
import type { ParameterSpec } from './types'

const COMPARISON_OPERATORS = new Set(['=', '==', '!=', '<>', '<', '<=', '>', '>='])
const COMPARISON_KEYWORDS = ['LIKE', 'GLOB', 'REGEXP', 'MATCH', 'IS']

interface ParameterUse {
  propertyType: string
  nullable: boolean
  adapter?: string | undefined
  column?: ResolvedColumn | undefined
}

// =============================================================================
// Column references around a token
// =============================================================================

function isComparison(token: Token | undefined): boolean {
  if (!token) return false
  if (token.kind === 'operator') return COMPARISON_OPERATORS.has(token.value)
  return isKeyword(token, ...COMPARISON_KEYWORDS)
}

/**
 * Column reference ending at index
 */
function columnBefore(tokens: Token[], end: number, resolve: ColumnResolver): ResolvedColumn | undefined {
  const name = identifierName(tokens[end])
  if (name === null) return undefined
  if (isPunctuation(tokens[end - 1], '.')) {
    return resolve(identifierName(tokens[end - 2]), name)
  }
  return resolve(null, name)
}

/**
 * Column reference starting at index
 */
function columnAfter(tokens: Token[], start: number, resolve: ColumnResolver): ResolvedColumn | undefined {
  const first = identifierName(tokens[start])
  if (first === null) return undefined
  if (isPunctuation(tokens[start + 1], '.')) {
    const name = identifierName(tokens[start + 2])
    return name === null ? undefined : resolve(first, name)
  }
  return resolve(null, first)
}

/**
 * Skip an optional NOT before index, returning the index of the token before it
 */
function skipNot(tokens: Token[], index: number): number {
  return isKeyword(tokens[index], 'NOT') ? index - 1 : index
}

/**
 * Column compared with the IN list that contains the parameter at index
 */
function inListColumn(tokens: Token[], index: number, resolve: ColumnResolver): ResolvedColumn | undefined {
  let j = index - 1
  while (j >= 0 && (isPunctuation(tokens[j], ',') || tokens[j]?.kind === 'parameter' || tokens[j]?.kind === 'number' || tokens[j]?.kind === 'string')) {
    j--
  }
  if (!isPunctuation(tokens[j], '(') || !isKeyword(tokens[j - 1], 'IN')) return undefined
  return columnBefore(tokens, skipNot(tokens, j - 2), resolve)
}

function useOf(resolved: ResolvedColumn, nullable: boolean): ParameterUse {
  return {
    propertyType: resolved.column.propertyType,
    adapter: resolved.column.adapter,
    nullable,
    column: resolved,
  }
}

/**
 * The use of the parameter token at index, from its surrounding expression
 */
function contextualUse(tokens: Token[], index: number, resolve: ColumnResolver): ParameterUse | undefined {
  const previous = tokens[index - 1]
  const next = tokens[index + 1]

  if (isKeyword(previous, 'LIMIT', 'OFFSET')) {
    return { propertyType: 'number', nullable: false }
  }

  if (isComparison(previous)) {
    const isNull = isKeyword(previous, 'IS')
    // a NOT LIKE :p
    const end = skipNot(tokens, index - 2)
    const resolved = columnBefore(tokens, end, resolve)
    if (resolved) return useOf(resolved, isNull || !resolved.column.notNull)
  }

  if (isKeyword(previous, 'NOT') && isKeyword(tokens[index - 2], 'IS')) {
    const resolved = columnBefore(tokens, index - 3, resolve)
    if (resolved) return useOf(resolved, true)
  }

  if (isComparison(next) && !isKeyword(next, 'IS')) {
    const resolved = columnAfter(tokens, index + 2, resolve)
    if (resolved) return useOf(resolved, !resolved.column.notNull)
  }

  if (isKeyword(previous, 'BETWEEN')) {
    const resolved = columnBefore(tokens, skipNot(tokens, index - 2), resolve)
    if (resolved) return useOf(resolved, !resolved.column.notNull)
  }

  if (isKeyword(previous, 'AND') && isKeyword(tokens[index - 3], 'BETWEEN')) {
    const resolved = columnBefore(tokens, skipNot(tokens, index - 4), resolve)
    if (resolved) return useOf(resolved, !resolved.column.notNull)
  }

  if (isPunctuation(previous, '(') || isPunctuation(previous, ',')) {
    const resolved = inListColumn(tokens, index, resolve)
    if (resolved) return useOf(resolved, !resolved.column.notNull)
  }

  return undefined
}

// =============================================================================
// INSERT column positions
// =============================================================================

/**
 * Uses of parameters placed directly in the VALUES tuples of an INSERT
 */
function insertUses(tokens: Token[], resolve: ColumnResolver): Map<number, ParameterUse> {
  const uses = new Map<number, ParameterUse>()
  const into = tokens.findIndex((token) => isKeyword(token, 'INTO'))
  if (into === -1) return uses

  let open = into + 2
  if (isPunctuation(tokens[into + 2], '.')) open = into + 4
  while (open < tokens.length && !isPunctuation(tokens[open], '(') && !isKeyword(tokens[open], 'VALUES', 'SELECT', 'DEFAULT')) {
    open++
  }
  if (!isPunctuation(tokens[open], '(')) return uses
  const close = findClosingParen(tokens, open)

  const columns: Array<string | null> = []
  for (let i = open + 1; i < close; i += 2) columns.push(identifierName(tokens[i]))

  let cursor = close + 1
  if (!isKeyword(tokens[cursor], 'VALUES')) return uses
  cursor++

  while (isPunctuation(tokens[cursor], '(')) {
    const tupleEnd = findClosingParen(tokens, cursor)
    let position = 0
    let segmentStart = cursor + 1
    let depth = 0
    for (let i = cursor + 1; i <= tupleEnd; i++) {
      if (isPunctuation(tokens[i], '(')) depth++
      else if (isPunctuation(tokens[i], ')') && i !== tupleEnd) depth--
      if (i !== tupleEnd && !(depth === 0 && isPunctuation(tokens[i], ','))) continue

      const token = tokens[segmentStart]
      const columnName = columns[position]
      if (i - segmentStart === 1 && token?.kind === 'parameter' && columnName) {
        const resolved = resolve(null, columnName)
        if (resolved) uses.set(segmentStart, useOf(resolved, !resolved.column.notNull))
      }
      position++
      segmentStart = i + 1
    }
    cursor = tupleEnd + 1
    if (!isPunctuation(tokens[cursor], ',')) break
    cursor++
  }

  return uses
}

// =============================================================================
// Inference
// =============================================================================

/**
 * Infer every named parameter of a statement, in order of first appearance
 *
 * Field directives whose `field` names a parameter override the inferred
 * property type, adapter and nullability.
 *
 * @throws TypeInferenceError when uses of one parameter disagree on the type
 */
export function inferParameters(
  tokens: Token[],
  resolve: ColumnResolver,
  overrides: ReadonlyMap<string, FieldDirectives> = new Map()
): ParameterSpec[] {
  const insertPositions = tokens.some((token) => isKeyword(token, 'INTO'))
    ? insertUses(tokens, resolve)
    : new Map<number, ParameterUse>()

  const uses = new Map<string, ParameterUse[]>()
  tokens.forEach((token, index) => {
    if (token.kind !== 'parameter' || token.value === '?') return
    const use = insertPositions.get(index) ?? contextualUse(tokens, index, resolve)
    const list = uses.get(token.value) ?? []
    if (use) list.push(use)
    uses.set(token.value, list)
  })

  return parameterNames(tokens).map((name) => {
    const list = uses.get(name) ?? []
    const override = overrides.get(name.toLowerCase())
    const first = list[0]

    for (const use of list) {
      if (first && use.propertyType !== first.propertyType) {
        throw new TypeInferenceError(
          `Parameter "${name}" is used as both ${first.propertyType} and ${use.propertyType}`,
          { parameter: name, types: [first.propertyType, use.propertyType] }
        )
      }
    }

    const propertyType = override?.propertyType ?? first?.propertyType ?? UNKNOWN_PROPERTY_TYPE
    const adapter = override?.adapter ?? (override?.propertyType ? implicitAdapter(propertyType, first?.column?.column.sqlType ?? '') : first?.adapter)
    const nullable = override?.notNull !== undefined ? !override.notNull : list.length === 0 || list.every((use) => use.nullable)
    const column = first?.column

    return {
      name,
      propertyType,
      nullable,
      adapter,
      column: column ? { table: column.table.name, column: column.column.name } : undefined,
    }
  })
}
