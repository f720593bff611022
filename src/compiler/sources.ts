/**
 * Database source loading
 *
 * Reads a database source directory:
 * - `schema/*.sql`
 * - `queries/<namespace>/*.sql`
 * - `init/*.sql`
 * - `migration/<version>.sql`
 *
 * Files are returned in sorted order; paths are relative to the directory.
 *
 * @module compiler/sources
 */

import { promises as fs } from 'node:fs'
import { basename, join } from 'node:path'
import { INIT_DIR, MIGRATION_DIR, QUERIES_DIR, SCHEMA_DIR, SQL_EXTENSION } from '../constants'
import { ConfigurationError, ErrorCode } from '../errors'
import type { SqlFile } from '../schema/builder'

export interface QueryFile extends SqlFile {
  namespace: string
  /** File name without extension */
  name: string
}

export interface MigrationFile extends SqlFile {
  version: number
}

export interface DatabaseSources {
  /** Database name, taken from the directory name */
  name: string
  schema: SqlFile[]
  queries: QueryFile[]
  init: SqlFile[]
  migrations: MigrationFile[]
}

function isMissing(error: unknown): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

async function listEntries(dir: string): Promise<Array<{ name: string; isDirectory: boolean }>> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    return entries
      .map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  } catch (error: unknown) {
    if (isMissing(error)) return []
    throw error
  }
}

async function readSqlFiles(root: string, relativeDir: string): Promise<SqlFile[]> {
  const entries = await listEntries(join(root, relativeDir))
  const files = entries.filter((entry) => !entry.isDirectory && entry.name.endsWith(SQL_EXTENSION))
  return Promise.all(
    files.map(async (entry) => {
      const path = `${relativeDir}/${entry.name}`
      return { path, text: await fs.readFile(join(root, path), 'utf8') }
    })
  )
}

/**
 * Load every SQL source of one database directory
 *
 * @throws ConfigurationError when a migration file name is not a version number
 */
export async function loadDatabaseSources(dir: string): Promise<DatabaseSources> {
  const schema = await readSqlFiles(dir, SCHEMA_DIR)
  const init = await readSqlFiles(dir, INIT_DIR)

  const queries: QueryFile[] = []
  for (const entry of await listEntries(join(dir, QUERIES_DIR))) {
    if (!entry.isDirectory) continue
    for (const file of await readSqlFiles(dir, `${QUERIES_DIR}/${entry.name}`)) {
      queries.push({ ...file, namespace: entry.name, name: basename(file.path, SQL_EXTENSION) })
    }
  }

  const migrations: MigrationFile[] = []
  for (const file of await readSqlFiles(dir, MIGRATION_DIR)) {
    const stem = basename(file.path, SQL_EXTENSION)
    if (!/^\d+$/.test(stem)) {
      throw new ConfigurationError(
        `Migration file ${file.path} must be named after its version number`,
        ErrorCode.INVALID_CONFIG,
        { file: file.path }
      )
    }
    migrations.push({ ...file, version: Number(stem) })
  }
  migrations.sort((a, b) => a.version - b.version)

  return { name: basename(dir), schema, queries, init, migrations }
}
