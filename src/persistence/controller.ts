/**
 * Persistence controllers
 *
 * SnapshotPersistenceController keeps a cached image of the database that a
 * write invalidates. After each mutated operation or commit it schedules a
 * best-effort flush; flush() forces one and reports failures to the caller.
 * Snapshots are taken and written inside the execution slot, so they never
 * see a half-finished transaction.
 *
 * @module persistence/controller
 */

import { ErrorCode, PersistenceError, TransactionError, isPersistenceError, toError } from '../errors'
import type { Connection } from '../runtime/connection'
import type { MutationEvent, TransactionCoordinator } from '../transaction/coordinator'
import { fireAndForget, type FireAndForgetMetricsCollector } from '../utils/fire-and-forget'
import { componentLogger, type Logger } from '../utils/logger'
import type { PersistenceController, SnapshotStore } from './types'

export interface SnapshotPersistenceOptions {
  dbName: string
  store: SnapshotStore
  connection: Connection
  coordinator: TransactionCoordinator
  /** Flush after every mutation (default: true) */
  autoFlush?: boolean | undefined
  logger?: Logger | undefined
  metrics?: FireAndForgetMetricsCollector | undefined
}

interface CachedSnapshot {
  bytes: Uint8Array
  persisted: boolean
}

export class SnapshotPersistenceController implements PersistenceController {
  readonly enabled = true

  private readonly options: SnapshotPersistenceOptions
  private readonly autoFlush: boolean
  private cache: CachedSnapshot | null = null

  constructor(options: SnapshotPersistenceOptions) {
    this.options = options
    this.autoFlush = options.autoFlush ?? true
  }

  private get logger(): Logger {
    return componentLogger('persistence', this.options.logger)
  }

  invalidate(): void {
    this.cache = null
  }

  async handleMutation(event: MutationEvent): Promise<void> {
    if (!event.mutated) return
    this.invalidate()
    if (!this.autoFlush) return

    const { coordinator, dbName, logger, metrics } = this.options
    void fireAndForget(
      'auto-flush',
      () => coordinator.enqueue(() => this.flushInSlot(false)),
      { logger, metrics },
      { dbName }
    )
  }

  /**
   * @throws TransactionError when called from inside a transaction block
   * @throws PersistenceError when the store fails
   */
  async flush(): Promise<void> {
    if (this.options.coordinator.insideSlot) {
      throw new TransactionError('flush() cannot be called inside a transaction', ErrorCode.TRANSACTION_ERROR, {
        dbName: this.options.dbName,
      })
    }
    try {
      await this.options.coordinator.enqueue(() => this.flushInSlot(true))
    } catch (error) {
      if (isPersistenceError(error)) throw error
      throw new PersistenceError(
        `Failed to flush ${this.options.dbName}`,
        ErrorCode.SNAPSHOT_WRITE_ERROR,
        { dbName: this.options.dbName },
        toError(error)
      )
    }
  }

  close(): Promise<void> {
    return this.flush()
  }

  private async flushInSlot(force: boolean): Promise<void> {
    const { connection, store, dbName } = this.options
    if (!connection.isOpen) return
    if (this.cache?.persisted && !force) return

    const cached = this.cache ?? { bytes: connection.serialize(), persisted: false }
    this.cache = cached
    await store.persist(dbName, cached.bytes)
    cached.persisted = true
    this.logger.debug(`persisted ${dbName} (${cached.bytes.byteLength} bytes)`)
  }
}

/**
 * Controller of in-memory databases without a store
 */
export class NoopPersistenceController implements PersistenceController {
  readonly enabled = false

  invalidate(): void {}

  async handleMutation(): Promise<void> {}

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}
