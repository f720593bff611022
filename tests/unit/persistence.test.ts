/**
 * Tests for snapshot stores and the persistence controller
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { readdir } from 'node:fs/promises'
import {
  FsSnapshotStore,
  MemorySnapshotStore,
  NoopPersistenceController,
  SnapshotPersistenceController,
  type SnapshotStore,
} from '../../src/persistence'
import { BetterSqliteConnection } from '../../src/runtime/connection'
import { TransactionCoordinator } from '../../src/transaction'
import { ErrorCode, PersistenceError, TransactionError } from '../../src/errors'
import { FireAndForgetMetricsCollector } from '../../src/utils/fire-and-forget'
import { catchError, catchRejection, cleanupTempDir, createIsolatedTempDir } from '../helpers'

describe('MemorySnapshotStore', () => {
  it('should return null for unknown databases', async () => {
    expect(await new MemorySnapshotStore().load('library')).toBeNull()
  })

  it('should copy bytes in and out', async () => {
    const store = new MemorySnapshotStore()
    const bytes = new Uint8Array([1, 2, 3])
    await store.persist('library', bytes)
    bytes[0] = 9

    const loaded = await store.load('library')
    expect(loaded).toEqual(new Uint8Array([1, 2, 3]))
    if (loaded) loaded[1] = 9
    expect(await store.load('library')).toEqual(new Uint8Array([1, 2, 3]))
  })

  it('should report and delete snapshots', async () => {
    const store = new MemorySnapshotStore()
    await store.persist('library', new Uint8Array([1]))

    expect(store.has('library')).toBe(true)
    expect(store.delete('library')).toBe(true)
    expect(store.has('library')).toBe(false)
  })
})

describe('FsSnapshotStore', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createIsolatedTempDir()
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  it('should return null before the first snapshot', async () => {
    expect(await new FsSnapshotStore(`${tempDir}/snapshots`).load('library')).toBeNull()
  })

  it('should write one file per database and read it back', async () => {
    const store = new FsSnapshotStore(`${tempDir}/snapshots`)
    await store.persist('library', new Uint8Array([1, 2]))
    await store.persist('library', new Uint8Array([3, 4, 5]))

    expect(await store.load('library')).toEqual(new Uint8Array([3, 4, 5]))
    expect(await readdir(`${tempDir}/snapshots`)).toEqual(['library.sqlite'])
  })

  it('should reject names that leave the root directory', () => {
    const store = new FsSnapshotStore(tempDir)
    for (const name of ['', '../escape', 'a/b', 'a\\b', 'nul\x00']) {
      const error = catchError(() => store.pathOf(name))
      expect(error).toBeInstanceOf(PersistenceError)
      if (error instanceof PersistenceError) expect(error.code).toBe(ErrorCode.INVALID_DATABASE_NAME)
    }
  })
})

describe('SnapshotPersistenceController', () => {
  let connection: BetterSqliteConnection
  let coordinator: TransactionCoordinator
  let store: MemorySnapshotStore

  beforeEach(() => {
    connection = new BetterSqliteConnection()
    connection.exec("CREATE TABLE note (id INTEGER PRIMARY KEY, title TEXT); INSERT INTO note (title) VALUES ('a')")
    coordinator = new TransactionCoordinator(connection)
    store = new MemorySnapshotStore()
  })

  afterEach(() => {
    connection.close()
  })

  const mutated = { type: 'operationComplete' as const, affectedTables: new Set(['note']), mutated: true }

  it('should write a snapshot the engine can open', async () => {
    const controller = new SnapshotPersistenceController({ dbName: 'library', store, connection, coordinator })
    await controller.flush()

    const snapshot = await store.load('library')
    expect(snapshot).not.toBeNull()
    if (!snapshot) return
    const restored = new BetterSqliteConnection({ snapshot })
    expect(restored.all('SELECT title FROM note')).toEqual([{ title: 'a' }])
    restored.close()
  })

  it('should flush after a mutation when autoFlush is on', async () => {
    const controller = new SnapshotPersistenceController({ dbName: 'library', store, connection, coordinator })
    await controller.handleMutation(mutated)
    await coordinator.drain()

    expect(store.has('library')).toBe(true)
  })

  it('should ignore operations that did not write', async () => {
    const controller = new SnapshotPersistenceController({ dbName: 'library', store, connection, coordinator })
    await controller.handleMutation({ ...mutated, mutated: false })
    await coordinator.drain()

    expect(store.has('library')).toBe(false)
  })

  it('should wait for flush() when autoFlush is off', async () => {
    const controller = new SnapshotPersistenceController({ dbName: 'library', store, connection, coordinator, autoFlush: false })
    await controller.handleMutation(mutated)
    await coordinator.drain()
    expect(store.has('library')).toBe(false)

    await controller.close()
    expect(store.has('library')).toBe(true)
  })

  it('should take a new image after invalidation', async () => {
    const persist = vi.fn<SnapshotStore['persist']>(async () => undefined)
    const spyStore: SnapshotStore = { load: async () => null, persist }
    const controller = new SnapshotPersistenceController({ dbName: 'library', store: spyStore, connection, coordinator })

    await controller.flush()
    connection.exec("INSERT INTO note (title) VALUES ('b')")
    await controller.flush()
    const [first, second] = persist.mock.calls.map((call) => call[1])
    expect(second).toBe(first)

    controller.invalidate()
    await controller.flush()
    expect(persist.mock.calls[2]?.[1]).not.toBe(first)
  })

  it('should refuse to flush inside a transaction', async () => {
    const controller = new SnapshotPersistenceController({ dbName: 'library', store, connection, coordinator })
    const error = await catchRejection(coordinator.transaction(() => controller.flush()))
    expect(error).toBeInstanceOf(TransactionError)
  })

  it('should report store failures from flush()', async () => {
    const failing: SnapshotStore = {
      load: async () => null,
      persist: async () => {
        throw new Error('disk full')
      },
    }
    const controller = new SnapshotPersistenceController({ dbName: 'library', store: failing, connection, coordinator })

    const error = await catchRejection(controller.flush())
    expect(error).toBeInstanceOf(PersistenceError)
    if (error instanceof PersistenceError) {
      expect(error.code).toBe(ErrorCode.SNAPSHOT_WRITE_ERROR)
      expect(error.cause?.message).toBe('disk full')
    }
  })

  it('should count failed automatic flushes without throwing', async () => {
    const metrics = new FireAndForgetMetricsCollector()
    const failing: SnapshotStore = {
      load: async () => null,
      persist: async () => {
        throw new Error('disk full')
      },
    }
    const controller = new SnapshotPersistenceController({ dbName: 'library', store: failing, connection, coordinator, metrics })

    await controller.handleMutation(mutated)
    await vi.waitFor(() => expect(metrics.getMetrics('auto-flush').failed).toBe(1))
    expect(metrics.getMetrics('auto-flush').lastError).toBe('disk full')
  })
})

describe('NoopPersistenceController', () => {
  it('should be disabled and do nothing', async () => {
    const controller = new NoopPersistenceController()
    expect(controller.enabled).toBe(false)
    await expect(controller.flush()).resolves.toBeUndefined()
  })
})
