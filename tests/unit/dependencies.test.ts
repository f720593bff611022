/**
 * Tests for read/write table extraction and cascade expansion
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { cascadeKindsFor, extractDependencies, touchedTables } from '../../src/dependencies/extractor'
import { BetterSqliteConnection } from '../../src/runtime/connection'
import { DependencyGraph } from '../../src/schema/graph'
import { tokenize } from '../../src/sql/lexer'

describe('cascadeKindsFor', () => {
  const kindsOf = (kind: 'read' | 'insert' | 'update' | 'delete', sql: string) => cascadeKindsFor(kind, tokenize(sql))

  it('should walk delete edges for deletes and update edges for updates', () => {
    expect(kindsOf('delete', 'DELETE FROM t')).toEqual(['delete'])
    expect(kindsOf('update', 'UPDATE t SET a = 1')).toEqual(['update'])
    expect(kindsOf('read', 'SELECT 1')).toEqual([])
  })

  it('should walk no edges for plain inserts', () => {
    expect(kindsOf('insert', 'INSERT INTO t (a) VALUES (1)')).toEqual([])
  })

  it('should treat replacing inserts as deletes', () => {
    expect(kindsOf('insert', 'REPLACE INTO t (a) VALUES (1)')).toEqual(['delete'])
    expect(kindsOf('insert', 'INSERT OR REPLACE INTO t (a) VALUES (1)')).toEqual(['delete'])
  })

  it('should treat upserts as updates', () => {
    expect(kindsOf('insert', 'INSERT INTO t (a) VALUES (1) ON CONFLICT (a) DO UPDATE SET a = 2')).toEqual(['update'])
    expect(kindsOf('insert', 'INSERT INTO t (a) VALUES (1) ON CONFLICT DO NOTHING')).toEqual([])
  })
})

describe('touchedTables', () => {
  let connection: BetterSqliteConnection

  beforeEach(() => {
    connection = new BetterSqliteConnection()
    connection.exec(`
      CREATE TABLE note (id INTEGER PRIMARY KEY, title TEXT NOT NULL);
      CREATE INDEX note_title_idx ON note (title);
      CREATE TABLE tag (id INTEGER PRIMARY KEY, note_id INTEGER, label TEXT);
    `)
  })

  afterEach(() => {
    connection.close()
  })

  it('should report the tables a join reads', () => {
    const touched = touchedTables(connection, 'SELECT n.title, t.label FROM note n JOIN tag t ON t.note_id = n.id')
    expect([...touched.read].sort()).toEqual(['note', 'tag'])
    expect(touched.write.size).toBe(0)
  })

  it('should map index cursors to their table', () => {
    const touched = touchedTables(connection, 'SELECT id FROM note WHERE title = :title')
    expect([...touched.read]).toEqual(['note'])
  })

  it('should report written tables of parameterized writes', () => {
    expect([...touchedTables(connection, 'UPDATE note SET title = :title WHERE id = :id').write]).toEqual(['note'])
    expect([...touchedTables(connection, 'INSERT INTO tag (note_id, label) VALUES (:noteId, :label)').write]).toEqual([
      'tag',
    ])
  })

  it('should not run the statement', () => {
    touchedTables(connection, "INSERT INTO note (title) VALUES ('x')")
    expect(connection.all('SELECT count(*) AS n FROM note')).toEqual([{ n: 0 }])
  })
})

describe('extractDependencies', () => {
  let connection: BetterSqliteConnection
  const graph = new DependencyGraph()
  graph.addEdge('delete', 'note', 'tag')

  beforeEach(() => {
    connection = new BetterSqliteConnection()
    connection.exec(`
      CREATE TABLE note (id INTEGER PRIMARY KEY, title TEXT NOT NULL);
      CREATE TABLE tag (id INTEGER PRIMARY KEY, note_id INTEGER, label TEXT);
    `)
  })

  afterEach(() => {
    connection.close()
  })

  it('should use read tables as the invalidation set of reads', () => {
    const sql = 'SELECT title FROM note'
    expect(extractDependencies(connection, graph, { sql, kind: 'read', tokens: tokenize(sql) })).toEqual({
      readTables: ['note'],
      writeTables: [],
      invalidationSet: ['note'],
      affectedTables: [],
    })
  })

  it('should expand deletes through delete edges', () => {
    const sql = 'DELETE FROM note WHERE id = :id'
    const dependencies = extractDependencies(connection, graph, { sql, kind: 'delete', tokens: tokenize(sql) })

    expect(dependencies.invalidationSet).toEqual([])
    expect(dependencies.affectedTables).toEqual(['note', 'tag'])
  })

  it('should not expand updates through delete edges', () => {
    const sql = 'UPDATE note SET title = :title WHERE id = :id'
    const dependencies = extractDependencies(connection, graph, { sql, kind: 'update', tokens: tokenize(sql) })
    expect(dependencies.affectedTables).toEqual(['note'])
  })
})
