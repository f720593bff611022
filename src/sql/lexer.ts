/**
 * SQL lexer
 *
 * A small tokenizer. The engine parses and validates statements;
 * this lexer only recognizes what the engine does not report back: comments
 * (where directives live), statement boundaries, named parameters and the
 * identifiers around FROM/JOIN clauses and column definitions.
 *
 * @module sql/lexer
 */

import { SqlSyntaxError, type SourceLocation } from '../errors'

// =============================================================================
// Tokens
// =============================================================================

export type TokenKind =
  | 'word'
  | 'identifier'
  | 'string'
  | 'number'
  | 'parameter'
  | 'operator'
  | 'punctuation'
  | 'comment'

export interface Token {
  kind: TokenKind
  /** Raw source text of the token */
  text: string
  /**
   * Interpreted value: unquoted identifier, unescaped string, parameter name
   * without its prefix (`?` for positional), comment body without delimiters
   */
  value: string
  start: number
  end: number
  line: number
  column: number
  commentStyle?: 'line' | 'block' | undefined
}

/**
 * One statement of a source file
 */
export interface StatementSource {
  file: string
  /** SQL text from the first to the last token, without the terminating `;` */
  text: string
  /** Non-comment tokens */
  tokens: Token[]
  /** Comments between the previous statement and this one */
  leadingComments: Token[]
  /** Comments between the first and the last token */
  bodyComments: Token[]
  location: SourceLocation
}

export interface SplitResult {
  statements: StatementSource[]
  /** Comments after the last statement */
  trailingComments: Token[]
}

const TWO_CHAR_OPERATORS = new Set(['<=', '>=', '<>', '!=', '==', '||', '<<', '>>'])
const PUNCTUATION = new Set(['(', ')', ',', ';', '.'])

const WORD_PATTERN = /[A-Za-z_\u0080-\uffff][A-Za-z0-9_$\u0080-\uffff]*/y
const PARAMETER_NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y
const NUMBER_PATTERN = /0[xX][0-9a-fA-F]+|(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y

function matchAt(pattern: RegExp, text: string, index: number): string | null {
  pattern.lastIndex = index
  const match = pattern.exec(text)
  return match ? match[0] : null
}

function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_\u0080-\uffff]/.test(ch)
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9'
}

// =============================================================================
// Positions
// =============================================================================

/**
 * Maps offsets of a source text to 1-based lines and columns
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0]

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1)
    }
  }

  /** 1-based line and column of an offset */
  positionAt(offset: number): { line: number; column: number } {
    let low = 0
    let high = this.lineStarts.length - 1
    while (low < high) {
      const mid = (low + high + 1) >> 1
      if ((this.lineStarts[mid] ?? 0) <= offset) low = mid
      else high = mid - 1
    }
    return { line: low + 1, column: offset - (this.lineStarts[low] ?? 0) + 1 }
  }
}

// =============================================================================
// Tokenizer
// =============================================================================

/**
 * Tokenize SQL text
 *
 * @throws SqlSyntaxError on unterminated strings, quoted identifiers or block comments
 */
export function tokenize(text: string, file = '<inline>'): Token[] {
  const lines = new LineIndex(text)
  const tokens: Token[] = []
  let i = 0

  const push = (kind: TokenKind, start: number, end: number, value: string, commentStyle?: 'line' | 'block'): void => {
    const { line, column } = lines.positionAt(start)
    tokens.push({ kind, text: text.slice(start, end), value, start, end, line, column, commentStyle })
  }

  const fail = (message: string, offset: number): never => {
    throw new SqlSyntaxError(message, { file, ...lines.positionAt(offset) })
  }

  const scanQuoted = (start: number, close: string, what: string): { end: number; value: string } => {
    let value = ''
    let j = start + 1
    for (;;) {
      if (j >= text.length) fail(`Unterminated ${what}`, start)
      const ch = text[j]
      if (ch === close) {
        if (close !== ']' && text[j + 1] === close) {
          value += close
          j += 2
          continue
        }
        return { end: j + 1, value }
      }
      value += ch
      j++
    }
  }

  while (i < text.length) {
    const ch = text[i]
    const next = text[i + 1]

    if (ch === undefined) break
    if (/\s/.test(ch)) {
      i++
      continue
    }

    const start = i

    if (ch === '-' && next === '-') {
      const newline = text.indexOf('\n', i)
      const end = newline === -1 ? text.length : newline
      push('comment', start, end, text.slice(i + 2, end), 'line')
      i = end
      continue
    }

    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2)
      if (close === -1) fail('Unterminated block comment', start)
      push('comment', start, close + 2, text.slice(i + 2, close), 'block')
      i = close + 2
      continue
    }

    if (ch === "'") {
      const { end, value } = scanQuoted(start, "'", 'string literal')
      push('string', start, end, value)
      i = end
      continue
    }

    if (ch === '"' || ch === '`' || ch === '[') {
      const close = ch === '[' ? ']' : ch
      const { end, value } = scanQuoted(start, close, 'quoted identifier')
      push('identifier', start, end, value)
      i = end
      continue
    }

    if (isDigit(ch) || (ch === '.' && isDigit(next))) {
      const number = matchAt(NUMBER_PATTERN, text, i) ?? ch
      push('number', start, i + number.length, number)
      i += number.length
      continue
    }

    if ((ch === ':' || ch === '@' || ch === '$') && next !== undefined && /[A-Za-z_]/.test(next)) {
      const name = matchAt(PARAMETER_NAME_PATTERN, text, i + 1) ?? ''
      push('parameter', start, i + 1 + name.length, name)
      i += 1 + name.length
      continue
    }

    if (ch === '?') {
      let end = i + 1
      while (isDigit(text[end])) end++
      push('parameter', start, end, '?')
      i = end
      continue
    }

    if (isIdentifierStart(ch)) {
      const word = matchAt(WORD_PATTERN, text, i) ?? ch
      push('word', start, i + word.length, word)
      i += word.length
      continue
    }

    const pair = ch + (next ?? '')
    if (TWO_CHAR_OPERATORS.has(pair)) {
      push('operator', start, i + 2, pair)
      i += 2
      continue
    }

    push(PUNCTUATION.has(ch) ? 'punctuation' : 'operator', start, i + 1, ch)
    i++
  }

  return tokens
}

// =============================================================================
// Token helpers
// =============================================================================

/**
 * Upper-cased keyword of a word token, or '' for anything else
 */
export function keyword(token: Token | undefined): string {
  return token?.kind === 'word' ? token.value.toUpperCase() : ''
}

export function isKeyword(token: Token | undefined, ...words: string[]): boolean {
  const kw = keyword(token)
  return kw !== '' && words.includes(kw)
}

export function isPunctuation(token: Token | undefined, value: string): boolean {
  return token?.kind === 'punctuation' && token.value === value
}

/**
 * Name carried by a word or quoted identifier token
 */
export function identifierName(token: Token | undefined): string | null {
  if (!token) return null
  if (token.kind === 'word' || token.kind === 'identifier') return token.value
  return null
}

/**
 * Parenthesis depth before each token
 */
export function parenDepths(tokens: Token[]): number[] {
  const depths: number[] = []
  let depth = 0
  for (const token of tokens) {
    if (isPunctuation(token, ')')) depth = Math.max(0, depth - 1)
    depths.push(depth)
    if (isPunctuation(token, '(')) depth++
  }
  return depths
}

/**
 * Index of the `)` matching the `(` at openIndex, or -1
 */
export function findClosingParen(tokens: Token[], openIndex: number): number {
  let depth = 0
  for (let i = openIndex; i < tokens.length; i++) {
    if (isPunctuation(tokens[i], '(')) depth++
    else if (isPunctuation(tokens[i], ')')) {
      depth--
      if (depth === 0) return i
    }
  }
  return -1
}

/**
 * Read a possibly schema-qualified name starting at index
 */
export function readQualifiedName(
  tokens: Token[],
  index: number
): { schema: string | null; name: string; next: number } | null {
  const first = identifierName(tokens[index])
  if (first === null) return null
  if (isPunctuation(tokens[index + 1], '.')) {
    const second = identifierName(tokens[index + 2])
    if (second !== null) return { schema: first, name: second, next: index + 3 }
  }
  return { schema: null, name: first, next: index + 1 }
}

/**
 * Names of the named parameters in order of first appearance
 */
export function parameterNames(tokens: Token[]): string[] {
  const names: string[] = []
  for (const token of tokens) {
    if (token.kind === 'parameter' && token.value !== '?' && !names.includes(token.value)) {
      names.push(token.value)
    }
  }
  return names
}

// =============================================================================
// Statement splitting
// =============================================================================

function isTriggerHeader(tokens: Token[]): boolean {
  const words = tokens.slice(0, 3).map(keyword)
  if (words[0] !== 'CREATE') return false
  return words[1] === 'TRIGGER' || ((words[1] === 'TEMP' || words[1] === 'TEMPORARY') && words[2] === 'TRIGGER')
}

/**
 * Split source text into statements
 *
 * Statements end at `;` outside parentheses, `CASE ... END` and (inside
 * CREATE TRIGGER) `BEGIN ... END`.
 */
export function splitStatements(text: string, file = '<inline>'): SplitResult {
  const statements: StatementSource[] = []
  let pending: Token[] = []
  let leading: Token[] = []
  let current: Token[] = []
  let body: Token[] = []
  let parenDepth = 0
  let blockDepth = 0
  let trigger = false

  const finish = (): void => {
    const first = current[0]
    const last = current[current.length - 1]
    if (first && last) {
      statements.push({
        file,
        text: text.slice(first.start, last.end),
        tokens: current,
        leadingComments: leading,
        bodyComments: body,
        location: { file, line: first.line, column: first.column },
      })
    }
    current = []
    body = []
    leading = []
    parenDepth = 0
    blockDepth = 0
    trigger = false
  }

  for (const token of tokenize(text, file)) {
    if (token.kind === 'comment') {
      if (current.length === 0) pending.push(token)
      else body.push(token)
      continue
    }

    if (isPunctuation(token, ';') && parenDepth === 0 && blockDepth === 0) {
      if (current.length > 0) finish()
      continue
    }

    if (current.length === 0) {
      leading = pending
      pending = []
    }
    current.push(token)

    if (isPunctuation(token, '(')) parenDepth++
    else if (isPunctuation(token, ')')) parenDepth = Math.max(0, parenDepth - 1)

    const kw = keyword(token)
    if (kw === 'CASE' || (kw === 'BEGIN' && trigger)) blockDepth++
    else if (kw === 'END') blockDepth = Math.max(0, blockDepth - 1)

    if (!trigger && current.length <= 3) trigger = isTriggerHeader(current)
  }

  if (current.length > 0) finish()

  return { statements, trailingComments: pending }
}
