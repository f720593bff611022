/**
 * Tests for query analysis: statement kind, parameter inference and
 * projection typing
 */

import { describe, it, expect, vi } from 'vitest'
import { detectKind } from '../../src/query/analyzer'
import type { QuerySpec } from '../../src/query/types'
import type { CompiledDatabase } from '../../src/compiler'
import {
  AnnotationError,
  ErrorCode,
  SchemaConflictError,
  SqlSyntaxError,
  TypeInferenceError,
} from '../../src/errors'
import { tokenize } from '../../src/sql/lexer'
import type { Logger } from '../../src/utils/logger'
import { catchError, compileInline } from '../helpers'

const SCHEMA = `
CREATE TABLE person (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  nickname TEXT,
  age INTEGER
);

CREATE TABLE address (
  id INTEGER PRIMARY KEY,
  person_id INTEGER NOT NULL REFERENCES person (id),
  city TEXT NOT NULL
);
`

function compileQuery(sql: string, options: Parameters<typeof compileInline>[1] = {}): QuerySpec {
  const compiled = compileInline({ schema: SCHEMA, queries: { 'person/q': sql } }, options)
  return findQuery(compiled, 'person', 'q')
}

function findQuery(compiled: CompiledDatabase, namespace: string, name: string): QuerySpec {
  const query = compiled.namespaces.get(namespace)?.queries.find((candidate) => candidate.name === name)
  if (!query) throw new Error(`query ${namespace}.${name} not compiled`)
  return query
}

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('detectKind', () => {
  const location = { file: 'q.sql', line: 1, column: 1 }
  const kindOf = (sql: string) => detectKind(tokenize(sql), location)

  it('should classify reads and writes', () => {
    expect(kindOf('SELECT 1')).toEqual({ kind: 'read', returning: false })
    expect(kindOf('WITH x AS (SELECT 1) SELECT * FROM x')).toEqual({ kind: 'read', returning: false })
    expect(kindOf('INSERT INTO t (a) VALUES (1) RETURNING a')).toEqual({ kind: 'insert', returning: true })
    expect(kindOf('REPLACE INTO t (a) VALUES (1)')).toEqual({ kind: 'insert', returning: false })
    expect(kindOf('UPDATE t SET a = 1')).toEqual({ kind: 'update', returning: false })
    expect(kindOf('DELETE FROM t WHERE a IN (SELECT 1)')).toEqual({ kind: 'delete', returning: false })
  })

  it('should reject other statements', () => {
    const error = catchError(() => kindOf('CREATE TABLE t (a INTEGER)'))
    expect(error).toBeInstanceOf(SqlSyntaxError)
    if (error instanceof SqlSyntaxError) expect(error.code).toBe(ErrorCode.SQL_UNSUPPORTED)
  })
})

describe('analyzeQuery', () => {
  describe('parameters', () => {
    it('should infer types and nullability from compared columns', () => {
      const query = compileQuery('SELECT id, name FROM person WHERE name LIKE :pattern AND age > :minAge LIMIT :limit')

      expect(query.parameters).toEqual([
        { name: 'pattern', propertyType: 'string', nullable: false, adapter: undefined, column: { table: 'person', column: 'name' } },
        { name: 'minAge', propertyType: 'number', nullable: true, adapter: undefined, column: { table: 'person', column: 'age' } },
        { name: 'limit', propertyType: 'number', nullable: false, adapter: undefined, column: undefined },
      ])
    })

    it('should treat IS comparisons as nullable', () => {
      const query = compileQuery('SELECT id FROM person WHERE name IS :name')
      expect(query.parameters[0]).toMatchObject({ name: 'name', propertyType: 'string', nullable: true })
    })

    it('should type INSERT values by their column', () => {
      const query = compileQuery('INSERT INTO person (name, nickname) VALUES (:name, :nickname)')

      expect(query.kind).toBe('insert')
      expect(query.result).toBeUndefined()
      expect(query.parameters.map((parameter) => [parameter.name, parameter.propertyType, parameter.nullable])).toEqual([
        ['name', 'string', false],
        ['nickname', 'string', true],
      ])
    })

    it('should type parameters of IN lists and BETWEEN ranges', () => {
      const query = compileQuery('SELECT id FROM person WHERE id IN (:first, :second) AND age BETWEEN :low AND :high')

      expect(query.parameters.map((parameter) => [parameter.name, parameter.propertyType, parameter.nullable])).toEqual([
        ['first', 'number', false],
        ['second', 'number', false],
        ['low', 'number', true],
        ['high', 'number', true],
      ])
    })

    it('should apply field directives that name a parameter', () => {
      const query = compileQuery('-- @@{ field=flag, propertyType=boolean }\nSELECT id FROM person WHERE age = :flag')
      expect(query.parameters[0]).toMatchObject({ name: 'flag', propertyType: 'boolean', adapter: 'boolean', nullable: true })
    })

    it('should reject a parameter used with two types', () => {
      expect(() => compileQuery('SELECT id FROM person WHERE name = :v OR age = :v')).toThrow(TypeInferenceError)
    })

    it('should reject positional parameters', () => {
      const error = catchError(() => compileQuery('SELECT id FROM person WHERE id = ?'))
      expect(error).toBeInstanceOf(SqlSyntaxError)
      if (error instanceof SqlSyntaxError) {
        expect(error.code).toBe(ErrorCode.SQL_UNSUPPORTED)
        expect(error.location).toEqual({ file: 'queries/person/q.sql', line: 1, column: 34 })
      }
    })
  })

  describe('projection', () => {
    it('should widen nullability under outer joins', () => {
      const query = compileQuery('SELECT p.id, p.name, a.city FROM person p LEFT JOIN address a ON a.person_id = p.id')

      expect(query.result?.fields.map((field) => [field.propertyName, field.propertyType, field.notNull])).toEqual([
        ['id', 'number', true],
        ['name', 'string', true],
        ['city', 'string', false],
      ])
      expect(query.invalidationSet).toEqual(['address', 'person'])
    })

    it('should name aliased columns with the generator', () => {
      const query = compileQuery('SELECT nickname AS nick_name FROM person')
      expect(query.result?.fields[0]).toMatchObject({ columnName: 'nick_name', propertyName: 'nickName', notNull: false })
    })

    it('should fall back to unknown and warn for untyped expressions', () => {
      const logger = spyLogger()
      const query = compileQuery('SELECT count(*) AS total FROM person', { logger })

      expect(query.result?.fields[0]).toMatchObject({ propertyName: 'total', propertyType: 'unknown', notNull: false })
      expect(logger.warn).toHaveBeenCalledTimes(1)
      expect(logger.warn.mock.calls[0]?.[0]).toContain('Cannot determine the type of column "total" in q')
    })

    it('should fail on untyped expressions in strict mode', () => {
      expect(() => compileQuery('SELECT count(*) AS total FROM person', { strictTypes: true })).toThrow(TypeInferenceError)
    })

    it('should let field directives type expressions', () => {
      const query = compileQuery('-- @@{ field=total, propertyType=number, notNull=true }\nSELECT count(*) AS total FROM person', {
        strictTypes: true,
      })
      expect(query.result?.fields[0]).toMatchObject({ propertyName: 'total', propertyType: 'number', notNull: true })
    })

    it('should use the name directive for the result type only and pass mapTo through', () => {
      const query = compileQuery('-- @@{ name=PersonSummary, mapTo=Summary }\nSELECT id FROM person')

      expect(query.result?.typeName).toBe('PersonSummary')
      expect(query.name).toBe('q')
      expect(query.mapTo).toBe('Summary')
    })

    it('should derive the result type name from the query name', () => {
      expect(compileQuery('SELECT id FROM person').result?.typeName).toBe('QResult')
    })
  })

  describe('errors', () => {
    it('should reject duplicate output column names', () => {
      const error = catchError(() => compileQuery('SELECT p.id, a.id FROM person p JOIN address a ON a.person_id = p.id'))
      expect(error).toBeInstanceOf(SchemaConflictError)
    })

    it('should reject field directives that match nothing', () => {
      expect(() => compileQuery('-- @@{ field=nope, notNull=true }\nSELECT id FROM person')).toThrow(AnnotationError)
    })

    it('should reject dynamic fields on statements without rows', () => {
      expect(() =>
        compileQuery('-- @@{ dynamicField=x, mappingType=entity, aliasPrefix=x_ }\nDELETE FROM person WHERE id = :id')
      ).toThrow('Dynamic fields need a statement that returns rows')
    })

    it('should reject query files with more than one statement', () => {
      const error = catchError(() => compileQuery('SELECT 1;\nSELECT 2;'))
      expect(error).toBeInstanceOf(SqlSyntaxError)
      if (error instanceof SqlSyntaxError) expect(error.code).toBe(ErrorCode.SQL_UNSUPPORTED)
    })

    it('should report statements the engine cannot prepare', () => {
      expect(() => compileQuery('SELECT missing_column FROM person')).toThrow(SqlSyntaxError)
    })
  })
})
