/**
 * Tests for the transaction coordinator
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { TransactionCoordinator, type MutationEvent } from '../../src/transaction'
import { BetterSqliteConnection } from '../../src/runtime/connection'
import { CancelledError, ErrorCode, TransactionError } from '../../src/errors'
import { catchRejection } from '../helpers'

describe('TransactionCoordinator', () => {
  let connection: BetterSqliteConnection
  let coordinator: TransactionCoordinator
  let events: MutationEvent[]

  const insert = (title: string) => () => ({
    value: connection.run('INSERT INTO note (title) VALUES (:title)', { title }).changes,
    affectedTables: ['note'],
    mutated: true,
  })
  const titles = () => connection.all('SELECT title FROM note ORDER BY id').map((row) => row.title)

  beforeEach(() => {
    connection = new BetterSqliteConnection()
    connection.exec('CREATE TABLE note (id INTEGER PRIMARY KEY, title TEXT NOT NULL)')
    coordinator = new TransactionCoordinator(connection)
    events = []
    coordinator.addListener((event) => {
      events.push(event)
    })
  })

  afterEach(() => {
    connection.close()
  })

  describe('run', () => {
    it('should deliver the operation event before resolving', async () => {
      const changes = await coordinator.run(insert('a'))

      expect(changes).toBe(1)
      expect(events).toEqual([{ type: 'operationComplete', affectedTables: new Set(['note']), mutated: true }])
    })

    it('should run operations in call order', async () => {
      const order: number[] = []
      await Promise.all([1, 2, 3].map((n) => coordinator.run(() => ({ value: order.push(n), affectedTables: [], mutated: false }))))
      expect(order).toEqual([1, 2, 3])
    })

    it('should not start aborted work', async () => {
      const controller = new AbortController()
      controller.abort()
      const work = vi.fn(insert('a'))

      const error = await catchRejection(coordinator.run(work, { signal: controller.signal }))
      expect(error).toBeInstanceOf(CancelledError)
      expect(work).not.toHaveBeenCalled()
    })

    it('should keep running when a listener fails', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const failing = new TransactionCoordinator(connection, { logger })
      failing.addListener(() => {
        throw new Error('listener broke')
      })

      await expect(failing.run(insert('a'))).resolves.toBe(1)
      expect(logger.error).toHaveBeenCalledWith('[sqlweave:coordinator] operationComplete listener failed', expect.any(Error))
    })

    it('should stop delivering to removed listeners', async () => {
      const listener = vi.fn()
      const remove = coordinator.addListener(listener)
      remove()

      await coordinator.run(insert('a'))
      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('transaction', () => {
    it('should commit and deliver one event with every affected table', async () => {
      const value = await coordinator.transaction(async () => {
        await coordinator.run(insert('a'))
        await coordinator.run(() => ({ value: null, affectedTables: ['tag'], mutated: true }))
        expect(events).toEqual([])
        return 'done'
      })

      expect(value).toBe('done')
      expect(titles()).toEqual(['a'])
      expect(events).toEqual([{ type: 'transactionCommitted', affectedTables: new Set(['note', 'tag']), mutated: true }])
    })

    it('should roll back and rethrow when the block fails', async () => {
      const error = await catchRejection(
        coordinator.transaction(async () => {
          await coordinator.run(insert('a'))
          throw new Error('block failed')
        })
      )

      expect(error).toEqual(new Error('block failed'))
      expect(titles()).toEqual([])
      expect(events).toEqual([])
      expect(coordinator.inTransaction).toBe(false)
    })

    it('should track the nesting depth', async () => {
      const depths: number[] = []
      await coordinator.transaction(async () => {
        depths.push(coordinator.transactionDepth)
        await coordinator.transaction(() => {
          depths.push(coordinator.transactionDepth)
        })
        depths.push(coordinator.transactionDepth)
      })

      expect(depths).toEqual([1, 2, 1])
      expect(coordinator.transactionDepth).toBe(0)
    })

    it('should roll back everything when a nested block fails', async () => {
      const error = await catchRejection(
        coordinator.transaction(async () => {
          await coordinator.run(insert('outer'))
          await coordinator
            .transaction(async () => {
              await coordinator.run(insert('inner'))
              throw new Error('inner failed')
            })
            .catch(() => undefined)
        })
      )

      expect(error).toBeInstanceOf(TransactionError)
      if (error instanceof TransactionError) expect(error.code).toBe(ErrorCode.TRANSACTION_ROLLED_BACK)
      expect(titles()).toEqual([])
      expect(events).toEqual([])
    })

    it('should report no mutation for a read-only transaction', async () => {
      await coordinator.transaction(() => coordinator.run(() => ({ value: titles(), affectedTables: ['note'], mutated: false })))
      expect(events).toEqual([{ type: 'transactionCommitted', affectedTables: new Set(), mutated: false }])
    })
  })

  describe('slot', () => {
    it('should report whether the caller is inside a slot task', async () => {
      expect(coordinator.insideSlot).toBe(false)
      await coordinator.transaction(() => {
        expect(coordinator.insideSlot).toBe(true)
      })
    })

    it('should queue enqueued tasks behind the running one', async () => {
      const order: string[] = []
      await coordinator.transaction(() => {
        void coordinator.enqueue(() => {
          order.push('queued')
        })
        order.push('body')
      })
      await coordinator.drain()

      expect(order).toEqual(['body', 'queued'])
    })
  })
})
