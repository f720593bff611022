/**
 * Transaction coordinator
 *
 * Every operation on a connection passes through one FIFO execution slot, a
 * promise chain owned by the coordinator. Work started from inside a slot
 * task (the body of a transaction block) runs in place instead of queueing
 * behind the task that started it; the slot is tracked with
 * AsyncLocalStorage.
 *
 * Transactions nest by depth. The first entry issues BEGIN and the outermost
 * exit issues COMMIT or ROLLBACK. A nested block that fails marks the whole
 * transaction rollback-only.
 *
 * After the slot task of an operation finishes, the coordinator notifies its
 * listeners and awaits them before the operation's promise settles:
 * - `operationComplete` after each operation outside a transaction
 * - `transactionCommitted` after the outermost commit, with the union of the
 *   tables the transaction affected
 *
 * @module transaction/coordinator
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { DEFAULT_TRANSACTION_MODE } from '../constants'
import { CancelledError, ErrorCode, TransactionError, toError } from '../errors'
import type { Connection } from '../runtime/connection'
import { componentLogger, type Logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export type TransactionMode = 'deferred' | 'immediate' | 'exclusive'

export interface MutationEvent {
  type: 'operationComplete' | 'transactionCommitted'
  /** Lower-cased names of the tables the operation or transaction affected */
  affectedTables: ReadonlySet<string>
  /** At least one statement wrote to the database */
  mutated: boolean
}

export type MutationListener = (event: MutationEvent) => void | Promise<void>

/**
 * What a unit of work reports back to the coordinator
 */
export interface OperationResult<T> {
  value: T
  affectedTables: Iterable<string>
  mutated: boolean
}

export interface RunOptions {
  signal?: AbortSignal | undefined
}

export interface TransactionOptions extends RunOptions {
  /** BEGIN mode of the outermost entry (default: deferred) */
  mode?: TransactionMode | undefined
}

export interface CoordinatorOptions {
  logger?: Logger | undefined
}

/**
 * Marks the async context of one slot task. A continuation that outlives its
 * task sees `active: false` and queues like any other caller.
 */
interface SlotToken {
  active: boolean
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError()
}

// =============================================================================
// TransactionCoordinator
// =============================================================================

export class TransactionCoordinator {
  private readonly storage = new AsyncLocalStorage<SlotToken>()
  private readonly listeners = new Set<MutationListener>()
  private readonly logger: Logger | undefined
  private tail: Promise<void> = Promise.resolve()

  private depth = 0
  private rollbackOnly = false
  private pendingTables = new Set<string>()
  private pendingMutation = false

  constructor(
    private readonly connection: Connection,
    options: CoordinatorOptions = {}
  ) {
    this.logger = options.logger
  }

  get inTransaction(): boolean {
    return this.depth > 0
  }

  get transactionDepth(): number {
    return this.depth
  }

  /** Whether the caller runs inside a slot task, such as a transaction block */
  get insideSlot(): boolean {
    return this.storage.getStore()?.active === true
  }

  /**
   * Register a listener for mutation events
   *
   * @returns A function that removes the listener
   */
  addListener(listener: MutationListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Append a task to the execution slot, even when called from inside it
   */
  enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    return this.admit(task)
  }

  /**
   * Resolves once every task queued so far has finished
   */
  async drain(): Promise<void> {
    await this.tail
  }

  /**
   * Run one statement-level unit of work
   *
   * Outside a transaction the operation's event is delivered before the
   * returned promise resolves. Inside one, the affected tables accumulate
   * until the outermost commit.
   *
   * @throws CancelledError when options.signal was aborted
   */
  async run<T>(work: () => OperationResult<T>, options: RunOptions = {}): Promise<T> {
    const { signal } = options
    const inPlace = this.insideSlot

    const outcome = await this.schedule(() => {
      const result = work()
      if (this.depth > 0) {
        if (result.mutated) {
          this.pendingMutation = true
          for (const table of result.affectedTables) this.pendingTables.add(table)
        }
        return { result, notify: false }
      }
      return { result, notify: !inPlace }
    }, signal)

    if (outcome.notify) {
      await this.emit({
        type: 'operationComplete',
        affectedTables: new Set(outcome.result.affectedTables),
        mutated: outcome.result.mutated,
      })
    }
    throwIfAborted(signal)
    return outcome.result.value
  }

  /**
   * Run a block inside a transaction
   *
   * @throws The block's own error after rolling back
   * @throws TransactionError when a nested block failed and the outermost exit rolled back
   * @throws CancelledError when options.signal was aborted
   */
  async transaction<T>(block: () => T | Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const { signal } = options
    const mode = options.mode ?? DEFAULT_TRANSACTION_MODE

    const outcome = await this.schedule(async () => {
      const outermost = this.depth === 0
      if (outermost) {
        this.connection.exec(`BEGIN ${mode.toUpperCase()}`)
        this.rollbackOnly = false
        this.pendingTables = new Set()
        this.pendingMutation = false
      }
      this.depth++

      let value: T
      try {
        value = await block()
      } catch (error) {
        this.depth--
        if (outermost) this.rollback()
        else this.rollbackOnly = true
        throw error
      }
      this.depth--

      if (!outermost) return { value, committed: null }
      if (this.rollbackOnly) {
        this.rollback()
        throw new TransactionError(
          'Transaction rolled back because a nested transaction failed',
          ErrorCode.TRANSACTION_ROLLED_BACK
        )
      }

      try {
        this.connection.exec('COMMIT')
      } catch (error) {
        this.rollback()
        throw new TransactionError('Commit failed', ErrorCode.TRANSACTION_ERROR, {}, toError(error))
      }

      const committed: MutationEvent = {
        type: 'transactionCommitted',
        affectedTables: this.pendingTables,
        mutated: this.pendingMutation,
      }
      this.pendingTables = new Set()
      this.pendingMutation = false
      return { value, committed }
    }, signal)

    if (outcome.committed) await this.emit(outcome.committed)
    throwIfAborted(signal)
    return outcome.value
  }

  // ===========================================================================
  // Slot
  // ===========================================================================

  private schedule<T>(task: () => T | Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    if (this.insideSlot) {
      throwIfAborted(signal)
      return Promise.resolve(task())
    }
    return this.admit(task, signal)
  }

  private admit<T>(task: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const run = this.tail.then(async () => {
      throwIfAborted(signal)
      const token: SlotToken = { active: true }
      try {
        return await this.storage.run(token, task)
      } finally {
        token.active = false
      }
    })
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private rollback(): void {
    this.pendingTables = new Set()
    this.pendingMutation = false
    this.rollbackOnly = false
    if (!this.connection.isOpen || !this.connection.inTransaction) return
    try {
      this.connection.exec('ROLLBACK')
    } catch (error) {
      componentLogger('coordinator', this.logger).error('Transaction rollback failed', error)
    }
  }

  private async emit(event: MutationEvent): Promise<void> {
    for (const listener of [...this.listeners]) {
      try {
        await listener(event)
      } catch (error) {
        componentLogger('coordinator', this.logger).error(`${event.type} listener failed`, error)
      }
    }
  }
}
