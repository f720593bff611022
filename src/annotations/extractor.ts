/**
 * Annotation extraction
 *
 * Splits a source file into statements, groups the comments around each
 * statement, parses the directive blocks they contain and binds every block to
 * one scope: the table, one of its columns, the statement, or an inline
 * dynamic field.
 *
 * @module annotations/extractor
 */

import { AnnotationError, ErrorCode, type SourceLocation } from '../errors'
import {
  LineIndex,
  findClosingParen,
  identifierName,
  isKeyword,
  isPunctuation,
  keyword,
  splitStatements,
  type StatementSource,
  type Token,
} from '../sql/lexer'
import { hasDirective, parseDirectives, type Locator } from './parser'
import type { AnnotationBlock, AnnotationScope } from './types'

// =============================================================================
// Types
// =============================================================================

/**
 * A statement together with the directive blocks attached to it
 */
export interface AnnotatedStatement {
  source: StatementSource
  blocks: AnnotationBlock[]
}

/**
 * A run of comments read as one directive text
 */
interface CommentGroup {
  text: string
  /** Group offset and file offset of every joined comment body */
  segments: Array<{ groupOffset: number; fileOffset: number }>
  start: number
}

/**
 * Column definition span inside a CREATE TABLE column list
 */
interface ColumnSpan {
  name: string
  start: number
  end: number
  endLine: number
}

interface ColumnList {
  open: number
  close: number
  columns: ColumnSpan[]
}

const TABLE_CONSTRAINT_KEYWORDS = ['CONSTRAINT', 'PRIMARY', 'UNIQUE', 'CHECK', 'FOREIGN']

// =============================================================================
// Comment grouping
// =============================================================================

function bodyOffset(token: Token): number {
  return token.start + 2
}

/**
 * Group comments: consecutive line comments on consecutive lines are joined
 * with newlines, and every block comment stands alone.
 */
export function groupComments(comments: Token[]): CommentGroup[] {
  const groups: CommentGroup[] = []
  let current: CommentGroup | null = null
  let lastLine = -1

  for (const comment of comments) {
    const continues = current !== null && comment.commentStyle === 'line' && comment.line === lastLine + 1
    if (current !== null && continues) {
      current.text += '\n'
      current.segments.push({ groupOffset: current.text.length, fileOffset: bodyOffset(comment) })
      current.text += comment.value
    } else {
      current = {
        text: comment.value,
        segments: [{ groupOffset: 0, fileOffset: bodyOffset(comment) }],
        start: comment.start,
      }
      groups.push(current)
    }
    lastLine = comment.commentStyle === 'line' ? comment.line : -1
    if (comment.commentStyle === 'block') current = null
  }

  return groups
}

/**
 * File offset of an offset inside a group's joined text
 */
function fileOffsetOf(group: CommentGroup, offset: number): number {
  let fileOffset = group.start
  for (const segment of group.segments) {
    if (segment.groupOffset <= offset) fileOffset = segment.fileOffset + (offset - segment.groupOffset)
  }
  return fileOffset
}

function locatorFor(group: CommentGroup, file: string, lines: LineIndex): Locator {
  return (offset: number): SourceLocation => ({ file, ...lines.positionAt(fileOffsetOf(group, offset)) })
}

// =============================================================================
// CREATE TABLE column positions
// =============================================================================

/**
 * Whether the statement is a CREATE [TEMP] TABLE
 */
export function isCreateTable(tokens: Token[]): boolean {
  if (!isKeyword(tokens[0], 'CREATE')) return false
  const second = keyword(tokens[1])
  if (second === 'TABLE') return true
  return (second === 'TEMP' || second === 'TEMPORARY') && isKeyword(tokens[2], 'TABLE')
}

function readColumnList(tokens: Token[]): ColumnList | null {
  const openIndex = tokens.findIndex((token) => isPunctuation(token, '('))
  if (openIndex === -1) return null
  const closeIndex = findClosingParen(tokens, openIndex)
  const open = tokens[openIndex]
  const close = tokens[closeIndex]
  if (!open || !close) return null

  const columns: ColumnSpan[] = []
  let segmentStart = openIndex + 1
  let depth = 0
  for (let i = openIndex + 1; i <= closeIndex; i++) {
    const token = tokens[i]
    if (isPunctuation(token, '(')) depth++
    else if (isPunctuation(token, ')') && i !== closeIndex) depth--

    const endsSegment = i === closeIndex || (depth === 0 && isPunctuation(token, ','))
    if (!endsSegment) continue

    const first = tokens[segmentStart]
    const last = tokens[i - 1]
    const name = identifierName(first)
    const isConstraint = first?.kind === 'word' && TABLE_CONSTRAINT_KEYWORDS.includes(keyword(first))
    if (first && last && name !== null && !isConstraint && i > segmentStart) {
      columns.push({ name, start: first.start, end: last.end, endLine: last.line })
    }
    segmentStart = i + 1
  }

  return { open: open.start, close: close.start, columns }
}

/**
 * Column a body comment inside the column list refers to: the column it
 * trails on the same line, otherwise the next column, otherwise the last one.
 */
function nearestColumn(list: ColumnList, offset: number, line: number): string | undefined {
  const trailing = [...list.columns].reverse().find((column) => column.end <= offset)
  if (trailing && trailing.endLine === line) return trailing.name
  const following = list.columns.find((column) => column.start > offset)
  return following?.name ?? trailing?.name
}

// =============================================================================
// Extraction
// =============================================================================

function detectScope(entries: Map<string, unknown>, inColumnList: boolean, createTable: boolean): AnnotationScope {
  if (entries.has('dynamicField')) return 'dynamicField'
  if (entries.has('field') || inColumnList) return 'column'
  return createTable ? 'table' : 'statement'
}

function extractBlocks(
  comments: Token[],
  source: StatementSource,
  lines: LineIndex,
  inBody: boolean
): AnnotationBlock[] {
  const createTable = isCreateTable(source.tokens)
  const columnList = createTable && inBody ? readColumnList(source.tokens) : null
  const blocks: AnnotationBlock[] = []

  for (const group of groupComments(comments)) {
    if (!hasDirective(group.text)) continue
    const locate = locatorFor(group, source.file, lines)
    const inColumnList = columnList !== null && group.start > columnList.open && group.start < columnList.close

    for (const raw of parseDirectives(group.text, locate)) {
      const scope = detectScope(raw.entries, inColumnList, createTable)
      const block: AnnotationBlock = { scope, entries: raw.entries, location: raw.location }
      if (scope === 'column' && !raw.entries.has('field') && columnList !== null) {
        const at = fileOffsetOf(group, raw.offset)
        block.boundColumn = nearestColumn(columnList, at, lines.positionAt(at).line)
        if (block.boundColumn === undefined) {
          throw new AnnotationError(
            'Column directive is not followed or preceded by any column',
            raw.location,
            ErrorCode.ANNOTATION_UNATTACHED
          )
        }
      }
      blocks.push(block)
    }
  }

  return blocks
}

/**
 * Extract every statement of a source file with its directive blocks
 *
 * @throws AnnotationError on malformed directives or directives attached to no statement
 * @throws SqlSyntaxError on unterminated strings or comments
 */
export function extractAnnotations(text: string, file: string): AnnotatedStatement[] {
  const lines = new LineIndex(text)
  const { statements, trailingComments } = splitStatements(text, file)

  const dangling = groupComments(trailingComments).find((group) => hasDirective(group.text))
  if (dangling) {
    const location = { file, ...lines.positionAt(dangling.start) }
    throw new AnnotationError('Directive is not attached to any statement', location, ErrorCode.ANNOTATION_UNATTACHED)
  }

  return statements.map((source) => ({
    source,
    blocks: [
      ...extractBlocks(source.leadingComments, source, lines, false),
      ...extractBlocks(source.bodyComments, source, lines, true),
    ],
  }))
}

/**
 * Blocks of one scope
 */
export function blocksOf(statement: AnnotatedStatement, scope: AnnotationScope): AnnotationBlock[] {
  return statement.blocks.filter((block) => block.scope === scope)
}
