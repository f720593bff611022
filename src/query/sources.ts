/**
 * FROM / JOIN source scanning
 *
 * Reads the table references of a statement together with their aliases and
 * whether an outer join can null them out. Only named tables are recorded;
 * subqueries in FROM are skipped.
 *
 * @module query/sources
 */

import {
  findClosingParen,
  identifierName,
  isKeyword,
  isPunctuation,
  keyword,
  parenDepths,
  readQualifiedName,
  type Token,
} from '../sql/lexer'

export interface SourceTable {
  /** Alias, or the table name when there is none */
  alias: string
  table: string
  /** Reached through an outer join */
  outer: boolean
  /** Parenthesis depth of the reference */
  depth: number
}

const NON_ALIAS_KEYWORDS = new Set([
  'WHERE', 'JOIN', 'LEFT', 'RIGHT', 'FULL', 'INNER', 'OUTER', 'CROSS', 'NATURAL', 'ON', 'USING',
  'GROUP', 'ORDER', 'LIMIT', 'OFFSET', 'HAVING', 'WINDOW', 'UNION', 'EXCEPT', 'INTERSECT',
  'RETURNING', 'SET', 'VALUES', 'DEFAULT', 'SELECT', 'INDEXED', 'NOT', 'DO', 'AS',
])

function readAlias(tokens: Token[], index: number): { alias: string | null; next: number } {
  if (isKeyword(tokens[index], 'AS')) {
    return { alias: identifierName(tokens[index + 1]), next: index + 2 }
  }
  const token = tokens[index]
  if (token?.kind === 'identifier') return { alias: token.value, next: index + 1 }
  if (token?.kind === 'word' && !NON_ALIAS_KEYWORDS.has(keyword(token))) {
    return { alias: token.value, next: index + 1 }
  }
  return { alias: null, next: index }
}

/**
 * Read one table reference at index; subqueries return null
 */
function readReference(
  tokens: Token[],
  index: number,
  depth: number,
  outer: boolean,
  target = false
): { source: SourceTable | null; next: number } {
  if (isPunctuation(tokens[index], '(')) {
    const close = findClosingParen(tokens, index)
    const after = readAlias(tokens, close + 1)
    return { source: null, next: after.next }
  }
  const name = readQualifiedName(tokens, index)
  if (!name) return { source: null, next: index + 1 }
  // table-valued functions such as json_each(...); an INSERT target is followed by its column list
  if (!target && isPunctuation(tokens[name.next], '(')) {
    const close = findClosingParen(tokens, name.next)
    const after = readAlias(tokens, close + 1)
    return { source: null, next: after.next }
  }
  const { alias, next } = readAlias(tokens, name.next)
  return { source: { alias: alias ?? name.name, table: name.name, outer, depth }, next }
}

/**
 * Scan the FROM / JOIN clauses and the write target of a statement
 */
export function scanSources(tokens: Token[]): SourceTable[] {
  const depths = parenDepths(tokens)
  const verb = firstVerbIndex(tokens)
  const sources: SourceTable[] = []

  const push = (source: SourceTable | null): void => {
    if (source) sources.push(source)
  }

  for (let i = 0; i < tokens.length; i++) {
    const kw = keyword(tokens[i])
    const depth = depths[i] ?? 0

    if (kw === 'UPDATE' && i === verb) {
      let j = i + 1
      if (isKeyword(tokens[j], 'OR')) j += 2
      push(readReference(tokens, j, depth, false, true).source)
      continue
    }

    if (kw === 'INTO' && isKeyword(tokens[i - 1], 'INSERT', 'REPLACE', 'IGNORE', 'ABORT', 'FAIL', 'ROLLBACK')) {
      push(readReference(tokens, i + 1, depth, false, true).source)
      continue
    }

    if (kw === 'FROM') {
      let reference = readReference(tokens, i + 1, depth, false)
      push(reference.source)
      // comma joins
      while (isPunctuation(tokens[reference.next], ',') && (depths[reference.next] ?? 0) === depth) {
        reference = readReference(tokens, reference.next + 1, depth, false)
        push(reference.source)
      }
      continue
    }

    if (kw === 'JOIN') {
      const before = [keyword(tokens[i - 1]), keyword(tokens[i - 2])]
      const left = before.includes('LEFT')
      const right = before.includes('RIGHT')
      const full = before.includes('FULL')
      if (right || full) {
        for (const source of sources) {
          if (source.depth === depth) source.outer = true
        }
      }
      push(readReference(tokens, i + 1, depth, left || full).source)
    }
  }

  return sources
}

/**
 * Index of the statement verb, after an optional WITH clause
 */
export function firstVerbIndex(tokens: Token[]): number {
  if (!isKeyword(tokens[0], 'WITH')) return 0
  const depths = parenDepths(tokens)
  for (let i = 1; i < tokens.length; i++) {
    if ((depths[i] ?? 0) === 0 && isKeyword(tokens[i], 'SELECT', 'INSERT', 'REPLACE', 'UPDATE', 'DELETE', 'VALUES')) {
      const previous = tokens[i - 1]
      if (isPunctuation(previous, ')')) return i
    }
  }
  return 0
}

/**
 * The primary source: the first table reference at the shallowest depth
 */
export function primarySource(sources: SourceTable[]): SourceTable | undefined {
  const shallowest = Math.min(...sources.map((source) => source.depth))
  return sources.find((source) => source.depth === shallowest)
}

/**
 * Find a source by alias or table name, ignoring case
 */
export function findSource(sources: SourceTable[], label: string): SourceTable | undefined {
  const lower = label.toLowerCase()
  return (
    sources.find((source) => source.alias.toLowerCase() === lower) ??
    sources.find((source) => source.table.toLowerCase() === lower)
  )
}
