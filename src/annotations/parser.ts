/**
 * Directive block parser
 *
 * Parses the `@@{ key=value, ... }` blocks found in SQL comments. Values are
 * bare scalars, quoted strings, `[lists]` or `{maps}`; entries are separated by
 * commas or newlines and use `=` or `:` between key and value.
 *
 * @module annotations/parser
 */

import { DIRECTIVE_MARKER } from '../constants'
import { AnnotationError, ErrorCode, type SourceLocation } from '../errors'

// =============================================================================
// Types
// =============================================================================

export type DirectiveValue = string | number | boolean | DirectiveValue[] | DirectiveMap

export interface DirectiveMap {
  [key: string]: DirectiveValue
}

/**
 * A parsed directive block before its scope is known
 */
export interface RawDirective {
  /** Entries in source order */
  entries: Map<string, DirectiveValue>
  /** Location of the `@@{` marker */
  location: SourceLocation
  /** Offset of the marker inside the comment text */
  offset: number
}

/**
 * Resolves an offset inside the comment text to a source location
 */
export type Locator = (offset: number) => SourceLocation

// =============================================================================
// Parser
// =============================================================================

const NUMBER_LITERAL = /^-?\d+(?:\.\d+)?$/
const BARE_TERMINATORS = new Set([',', '}', ']', '\n', '{', '['])

function toScalar(bare: string): DirectiveValue {
  if (bare === 'true') return true
  if (bare === 'false') return false
  if (NUMBER_LITERAL.test(bare)) return Number(bare)
  return bare
}

class DirectiveParser {
  private pos: number

  constructor(
    private readonly text: string,
    start: number,
    private readonly locate: Locator
  ) {
    this.pos = start
  }

  get position(): number {
    return this.pos
  }

  parseBlock(): Map<string, DirectiveValue> {
    const open = this.pos
    this.pos += DIRECTIVE_MARKER.length
    return this.parseMembers('}', open)
  }

  private fail(message: string, offset: number, code: ErrorCode = ErrorCode.ANNOTATION_SYNTAX): never {
    throw new AnnotationError(message, this.locate(offset), code)
  }

  private peek(): string | undefined {
    return this.text[this.pos]
  }

  private skipInlineSpace(): void {
    while (this.pos < this.text.length && /[ \t\r]/.test(this.text[this.pos] ?? '')) this.pos++
  }

  private skipSeparators(): void {
    while (this.pos < this.text.length && /[\s,]/.test(this.text[this.pos] ?? '')) this.pos++
  }

  private parseMembers(close: '}', open: number): Map<string, DirectiveValue> {
    const entries = new Map<string, DirectiveValue>()
    for (;;) {
      this.skipSeparators()
      const ch = this.peek()
      if (ch === undefined) this.fail(`Unbalanced braces in directive: missing "${close}"`, open)
      if (ch === close) {
        this.pos++
        return entries
      }
      if (ch === ']') this.fail('Unbalanced brackets in directive: unexpected "]"', this.pos)

      const keyOffset = this.pos
      const key = this.parseKey()
      this.skipInlineSpace()
      const sep = this.peek()
      if (sep !== '=' && sep !== ':') this.fail(`Expected "=" after directive key "${key}"`, this.pos)
      this.pos++
      this.skipInlineSpace()

      const value = this.parseValue(key)
      if (entries.has(key)) {
        this.fail(`Duplicate directive key "${key}"`, keyOffset, ErrorCode.ANNOTATION_DUPLICATE_KEY)
      }
      entries.set(key, value)
    }
  }

  private parseKey(): string {
    const ch = this.peek()
    if (ch === '"' || ch === "'") return this.parseQuoted()
    const start = this.pos
    while (this.pos < this.text.length && /[A-Za-z0-9_.-]/.test(this.text[this.pos] ?? '')) this.pos++
    const key = this.text.slice(start, this.pos)
    if (key.length === 0) this.fail(`Unexpected character "${ch ?? ''}" in directive`, start)
    return key
  }

  private parseValue(key: string): DirectiveValue {
    const ch = this.peek()
    if (ch === '{') {
      const open = this.pos
      this.pos++
      return Object.fromEntries(this.parseMembers('}', open))
    }
    if (ch === '[') return this.parseList()
    if (ch === '"' || ch === "'") return this.parseQuoted()

    const start = this.pos
    while (this.pos < this.text.length && !BARE_TERMINATORS.has(this.text[this.pos] ?? '')) this.pos++
    const bare = this.text.slice(start, this.pos).trim()
    if (bare.length === 0) this.fail(`Missing value for directive key "${key}"`, start)
    return toScalar(bare)
  }

  private parseList(): DirectiveValue[] {
    const open = this.pos
    this.pos++
    const items: DirectiveValue[] = []
    for (;;) {
      this.skipSeparators()
      const ch = this.peek()
      if (ch === undefined) this.fail('Unbalanced brackets in directive: missing "]"', open)
      if (ch === ']') {
        this.pos++
        return items
      }
      if (ch === '}') this.fail('Unbalanced braces in directive: unexpected "}"', this.pos)
      items.push(this.parseValue('list item'))
    }
  }

  private parseQuoted(): string {
    const quote = this.peek()
    const open = this.pos
    this.pos++
    let value = ''
    for (;;) {
      const ch = this.peek()
      if (ch === undefined || ch === '\n') this.fail('Unterminated string in directive', open)
      this.pos++
      if (ch === '\\') {
        value += this.peek() ?? ''
        this.pos++
        continue
      }
      if (ch === quote) return value
      value += ch
    }
  }
}

/**
 * Report stray closing braces between a block's end and the next marker
 */
function checkTrailing(text: string, from: number, to: number, locate: Locator): void {
  let braces = 0
  let brackets = 0
  for (let i = from; i < to; i++) {
    const ch = text[i]
    if (ch === '{') braces++
    else if (ch === '}') braces--
    else if (ch === '[') brackets++
    else if (ch === ']') brackets--
    if (braces < 0) {
      throw new AnnotationError('Unbalanced braces in directive: unexpected "}"', locate(i))
    }
    if (brackets < 0) {
      throw new AnnotationError('Unbalanced brackets in directive: unexpected "]"', locate(i))
    }
  }
}

/**
 * Parse every directive block in a comment's text
 *
 * @throws AnnotationError on unbalanced braces, malformed entries or duplicate keys
 */
export function parseDirectives(text: string, locate: Locator): RawDirective[] {
  const directives: RawDirective[] = []
  let offset = text.indexOf(DIRECTIVE_MARKER)
  while (offset !== -1) {
    const parser = new DirectiveParser(text, offset, locate)
    const entries = parser.parseBlock()
    directives.push({ entries, location: locate(offset), offset })

    const next = text.indexOf(DIRECTIVE_MARKER, parser.position)
    checkTrailing(text, parser.position, next === -1 ? text.length : next, locate)
    offset = next
  }
  return directives
}

/**
 * Check whether a comment contains a directive marker
 */
export function hasDirective(text: string): boolean {
  return text.includes(DIRECTIVE_MARKER)
}
