/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  AnnotationError,
  ErrorCode,
  QueryError,
  SqlSyntaxError,
  SqlWeaveError,
  TransactionError,
  hasErrorCode,
  isQueryError,
  isSqlWeaveError,
  toError,
} from '../../src/errors'

describe('errors', () => {
  it('should append the source location to compile errors', () => {
    const error = new AnnotationError('Unknown key "colour"', { file: 'schema/a.sql', line: 3, column: 7 }, ErrorCode.ANNOTATION_UNKNOWN_KEY)

    expect(error.message).toBe('Unknown key "colour" (at schema/a.sql:3:7)')
    expect(error.context).toEqual({ location: { file: 'schema/a.sql', line: 3, column: 7 } })
    expect(new SqlSyntaxError('Bad statement').message).toBe('Bad statement')
  })

  it('should keep the class chain for instanceof checks', () => {
    const error = new QueryError('Unknown query a.b', ErrorCode.QUERY_NOT_FOUND)

    expect(error).toBeInstanceOf(SqlWeaveError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('QueryError')
    expect(isQueryError(error)).toBe(true)
    expect(isSqlWeaveError(new Error('plain'))).toBe(false)
  })

  it('should match error codes', () => {
    const error = new TransactionError('Database library is closed', ErrorCode.CONNECTION_CLOSED)

    expect(error.is(ErrorCode.CONNECTION_CLOSED)).toBe(true)
    expect(hasErrorCode(error, ErrorCode.TRANSACTION_ERROR)).toBe(false)
    expect(hasErrorCode('not an error', ErrorCode.CONNECTION_CLOSED)).toBe(false)
  })

  it('should serialize codes, context and causes', () => {
    const cause = new QueryError('inner', ErrorCode.QUERY_ERROR)
    const error = new TransactionError('Commit failed', ErrorCode.TRANSACTION_ERROR, { database: 'library' }, cause)
    const json = error.toJSON()

    expect(json).toMatchObject({
      name: 'TransactionError',
      code: ErrorCode.TRANSACTION_ERROR,
      message: 'Commit failed',
      context: { database: 'library' },
      cause: { name: 'QueryError', code: ErrorCode.QUERY_ERROR, message: 'inner' },
    })
    expect(json.cause?.context).toBeUndefined()
  })

  it('should normalize thrown values', () => {
    const error = new Error('x')
    expect(toError(error)).toBe(error)
    expect(toError('boom').message).toBe('boom')
  })
})
