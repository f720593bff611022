/**
 * Filesystem snapshot store
 *
 * One file per database name inside a root directory. Snapshots are written
 * to a temporary file and renamed into place, so a reader never sees a
 * partial snapshot. Database names that could leave the root directory are
 * rejected.
 *
 * @module persistence/fs-store
 */

import { promises as fs } from 'node:fs'
import { join, resolve } from 'node:path'
import { ErrorCode, PersistenceError, toError } from '../errors'
import { componentLogger, type Logger } from '../utils/logger'
import type { SnapshotStore } from './types'

const SNAPSHOT_EXTENSION = '.sqlite'

function isNotFound(error: unknown): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

export interface FsSnapshotStoreOptions {
  logger?: Logger | undefined
}

export class FsSnapshotStore implements SnapshotStore {
  private readonly root: string
  private readonly logger: Logger | undefined
  private tempCounter = 0

  /**
   * @param rootPath - Directory holding the snapshot files; created on first write
   */
  constructor(rootPath: string, options: FsSnapshotStoreOptions = {}) {
    this.root = resolve(rootPath)
    this.logger = options.logger
  }

  /**
   * Path of a database's snapshot file
   *
   * @throws PersistenceError for names containing path separators, NUL or `..`
   */
  pathOf(dbName: string): string {
    if (
      dbName.length === 0 ||
      dbName.includes('/') ||
      dbName.includes('\\') ||
      dbName.includes('\x00') ||
      dbName.includes('..')
    ) {
      throw new PersistenceError(`Invalid database name "${dbName}"`, ErrorCode.INVALID_DATABASE_NAME, { dbName })
    }
    const path = join(this.root, `${dbName}${SNAPSHOT_EXTENSION}`)
    if (!path.startsWith(this.root + '/') && !path.startsWith(this.root + '\\')) {
      throw new PersistenceError(`Invalid database name "${dbName}"`, ErrorCode.INVALID_DATABASE_NAME, { dbName })
    }
    return path
  }

  async load(dbName: string): Promise<Uint8Array | null> {
    const path = this.pathOf(dbName)
    try {
      const buffer = await fs.readFile(path)
      return new Uint8Array(buffer)
    } catch (error: unknown) {
      if (isNotFound(error)) return null
      throw new PersistenceError(
        `Failed to read snapshot of ${dbName}`,
        ErrorCode.SNAPSHOT_READ_ERROR,
        { dbName, path },
        toError(error)
      )
    }
  }

  async persist(dbName: string, snapshot: Uint8Array): Promise<void> {
    const path = this.pathOf(dbName)
    const tempPath = `${path}.${process.pid}.${++this.tempCounter}.tmp`
    try {
      await fs.mkdir(this.root, { recursive: true })
      await fs.writeFile(tempPath, snapshot)
      await fs.rename(tempPath, path)
    } catch (error: unknown) {
      await fs.unlink(tempPath).catch((unlinkError: unknown) => {
        if (!isNotFound(unlinkError)) {
          componentLogger('persistence', this.logger).warn(`Could not remove temporary snapshot ${tempPath}`, unlinkError)
        }
      })
      throw new PersistenceError(
        `Failed to write snapshot of ${dbName}`,
        ErrorCode.SNAPSHOT_WRITE_ERROR,
        { dbName, path },
        toError(error)
      )
    }
  }
}
