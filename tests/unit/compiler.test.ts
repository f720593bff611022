/**
 * Tests for compiling a database source directory
 */

import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest'
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describeCompiledDatabase, loadDatabaseSources, type CompiledDatabase } from '../../src/compiler'
import type { QuerySpec } from '../../src/query/types'
import { ConfigurationError } from '../../src/errors'
import { catchRejection, cleanupTempDir, compileFixture, createIsolatedTempDir } from '../helpers'

function findQuery(compiled: CompiledDatabase, namespace: string, name: string): QuerySpec {
  const query = compiled.namespaces.get(namespace)?.queries.find((candidate) => candidate.name === name)
  if (!query) throw new Error(`query ${namespace}.${name} not compiled`)
  return query
}

describe('compileDatabaseDir', () => {
  let compiled: CompiledDatabase

  beforeAll(async () => {
    compiled = await compileFixture('library')
  })

  describe('namespaces', () => {
    it('should name the database after its directory', () => {
      expect(compiled.name).toBe('library')
    })

    it('should place tables and queries in namespaces', () => {
      expect([...compiled.namespaces.keys()].sort()).toEqual(['author', 'book', 'book_summary', 'review', 'summary'])
      expect(compiled.namespaces.get('author')?.tables.map((table) => table.name)).toEqual(['author'])
      expect(compiled.namespaces.get('author')?.queries.map((query) => query.name)).toEqual(['all', 'delete', 'insert'])
      expect(compiled.namespaces.get('summary')?.tables).toEqual([])
    })
  })

  describe('queries', () => {
    it('should shape nested results with perRow and collection fields', () => {
      const query = findQuery(compiled, 'book', 'byAuthor')
      const result = query.result

      expect(query.kind).toBe('read')
      expect(query.parameters).toEqual([
        { name: 'authorId', propertyType: 'number', nullable: false, adapter: undefined, column: { table: 'book', column: 'author_id' } },
      ])
      expect(result?.typeName).toBe('ByAuthorResult')
      expect(result?.identity).toEqual(['id'])
      expect(result?.fields.map((field) => [field.propertyName, field.propertyType, field.adapter])).toEqual([
        ['id', 'number', undefined],
        ['title', 'string', undefined],
        ['meta', 'BookMeta', 'json'],
      ])
      expect(result?.children.map((child) => [child.propertyName, child.kind, child.typeName, child.notNull])).toEqual([
        ['author', 'perRow', 'AuthorRow', true],
        ['reviews', 'collection', 'ReviewRow', true],
      ])
      expect(result?.children[1]?.groupingKey).toBe('review_id')
      expect(result?.children[0]?.fields.map((field) => field.propertyName)).toEqual(['id', 'name'])
      expect(query.invalidationSet).toEqual(['author', 'book', 'review'])
    })

    it('should type write parameters from the written columns', () => {
      const query = findQuery(compiled, 'book', 'insert')

      expect(query.kind).toBe('insert')
      expect(query.returning).toBe(true)
      expect(query.parameters.map((parameter) => [parameter.name, parameter.propertyType, parameter.nullable, parameter.adapter])).toEqual([
        ['authorId', 'number', false, undefined],
        ['title', 'string', false, undefined],
        ['meta', 'BookMeta', true, 'json'],
      ])
      expect(query.result?.fields.map((field) => field.propertyName)).toEqual(['id', 'title'])
    })

    it('should carry the boolean adapter onto parameters', () => {
      const query = findQuery(compiled, 'author', 'insert')
      expect(query.parameters[1]).toMatchObject({ name: 'active', propertyType: 'boolean', adapter: 'boolean' })
    })

    it('should expand affected tables along cascade edges', () => {
      expect(findQuery(compiled, 'author', 'delete').affectedTables).toEqual(['author', 'book', 'review'])
      expect(findQuery(compiled, 'book', 'delete').affectedTables).toEqual(['book', 'review'])
      expect(findQuery(compiled, 'book', 'insert').affectedTables).toEqual(['book'])
      expect(findQuery(compiled, 'book', 'rename').affectedTables).toEqual(['book'])
    })

    it('should share one result object between queries with the same queryResult', () => {
      const byId = findQuery(compiled, 'book', 'byId')
      const byTitle = findQuery(compiled, 'book', 'byTitle')

      expect(byId.result).toBe(byTitle.result)
      expect(compiled.sharedResults.get('book.BookItem')).toBe(byId.result)
      expect(byId.result?.fields.map((field) => field.propertyName)).toEqual(['id', 'authorId', 'title'])
    })

    it('should type columns read through a view', () => {
      const query = findQuery(compiled, 'summary', 'all')
      expect(query.result?.fields.map((field) => field.propertyName)).toEqual(['id', 'title', 'authorName'])
      expect(query.invalidationSet).toEqual(['author', 'book'])
    })
  })

  describe('scripts', () => {
    it('should keep schema, init and migration statements in file order', () => {
      expect(compiled.schemaStatements).toHaveLength(6)
      expect(compiled.schemaStatements[5]).toMatch(/^CREATE VIEW book_summary AS/)
      expect(compiled.initStatements).toHaveLength(3)
      expect(compiled.migrations).toEqual([
        { version: 1, statements: ['CREATE INDEX IF NOT EXISTS book_title_idx ON book (title)'] },
      ])
    })
  })

  describe('describeCompiledDatabase', () => {
    it('should turn maps into records', () => {
      const manifest = describeCompiledDatabase(compiled)

      expect(Object.keys(manifest.namespaces)).toEqual(['author', 'book', 'book_summary', 'review', 'summary'])
      expect(Object.keys(manifest.sharedResults)).toEqual(['book.BookItem'])
      expect(manifest.cascades).toEqual({ delete: { author: ['book'], book: ['review'] }, update: {} })
      expect(manifest.migrations).toEqual(compiled.migrations)
      expect(manifest.migrations[0]).not.toBe(compiled.migrations[0])
    })
  })
})

describe('loadDatabaseSources', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createIsolatedTempDir()
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  it('should return empty lists for missing directories', async () => {
    await mkdir(join(tempDir, 'schema'))
    await writeFile(join(tempDir, 'schema', 'a.sql'), 'CREATE TABLE a (id INTEGER)')

    const sources = await loadDatabaseSources(tempDir)
    expect(sources.schema).toEqual([{ path: 'schema/a.sql', text: 'CREATE TABLE a (id INTEGER)' }])
    expect(sources.queries).toEqual([])
    expect(sources.init).toEqual([])
    expect(sources.migrations).toEqual([])
  })

  it('should sort migrations by version number', async () => {
    await mkdir(join(tempDir, 'migration'))
    await writeFile(join(tempDir, 'migration', '10.sql'), 'SELECT 10')
    await writeFile(join(tempDir, 'migration', '2.sql'), 'SELECT 2')

    const sources = await loadDatabaseSources(tempDir)
    expect(sources.migrations.map((migration) => migration.version)).toEqual([2, 10])
  })

  it('should reject migrations not named after a version', async () => {
    await mkdir(join(tempDir, 'migration'))
    await writeFile(join(tempDir, 'migration', 'add_index.sql'), 'SELECT 1')

    const error = await catchRejection(loadDatabaseSources(tempDir))
    expect(error).toBeInstanceOf(ConfigurationError)
  })
})
