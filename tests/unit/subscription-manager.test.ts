/**
 * Tests for live query registrations and refresh on mutation
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { ReactiveSubscriptionManager, registrationKey } from '../../src/subscriptions/manager'
import type { LiveQuery } from '../../src/subscriptions/types'
import { TransactionCoordinator, type MutationEvent } from '../../src/transaction'
import { BetterSqliteConnection } from '../../src/runtime/connection'

function mutation(tables: string[], mutated = true): MutationEvent {
  return { type: 'operationComplete', affectedTables: new Set(tables), mutated }
}

/**
 * Live query over a counter; every execution returns the next number
 */
function counterQuery(invalidationSet: string[] = ['note']): LiveQuery<number> & { executions: number } {
  return {
    key: 'note.count',
    invalidationSet,
    executions: 0,
    execute() {
      this.executions++
      return this.executions
    },
  }
}

describe('ReactiveSubscriptionManager', () => {
  let connection: BetterSqliteConnection
  let coordinator: TransactionCoordinator
  let manager: ReactiveSubscriptionManager

  beforeEach(() => {
    connection = new BetterSqliteConnection()
    coordinator = new TransactionCoordinator(connection)
    manager = new ReactiveSubscriptionManager(coordinator)
  })

  afterEach(() => {
    manager.close()
    connection.close()
  })

  describe('subscribe', () => {
    it('should deliver the initial result', async () => {
      const next = vi.fn()
      const subscription = manager.subscribe(counterQuery(), {}, { next })
      await subscription.ready

      expect(next).toHaveBeenCalledWith(1)
      expect(subscription.id).toBe('sub_1')
      expect(manager.getStats()).toEqual({
        activeRegistrations: 1,
        activeSubscribers: 1,
        deliveries: 1,
        refreshes: 1,
        errors: 0,
      })
    })

    it('should share one execution between subscribers of the same parameters', async () => {
      const query = counterQuery()
      const first = vi.fn()
      const second = vi.fn()
      const a = manager.subscribe(query, { id: 1 }, { next: first })
      const b = manager.subscribe(query, { id: 1 }, { next: second })
      await Promise.all([a.ready, b.ready])

      expect(a.key).toBe(b.key)
      expect(query.executions).toBe(1)
      expect(first).toHaveBeenCalledWith(1)
      expect(second).toHaveBeenCalledWith(1)
    })

    it('should hand a late subscriber the last result', async () => {
      const query = counterQuery()
      await manager.subscribe(query, {}, { next: vi.fn() }).ready

      const late = vi.fn()
      await manager.subscribe(query, {}, { next: late }).ready
      expect(late).toHaveBeenCalledWith(1)
      expect(query.executions).toBe(1)
    })

    it('should register different parameters separately', async () => {
      const query = counterQuery()
      await manager.subscribe(query, { id: 1 }, { next: vi.fn() }).ready
      await manager.subscribe(query, { id: 2 }, { next: vi.fn() }).ready

      expect(manager.getStats().activeRegistrations).toBe(2)
      expect(query.executions).toBe(2)
    })

    it('should send execution failures to the error callback', async () => {
      const failing: LiveQuery<number> = {
        key: 'note.broken',
        invalidationSet: ['note'],
        execute() {
          throw new Error('no such table: note')
        },
      }
      const error = vi.fn()
      await manager.subscribe(failing, {}, { next: vi.fn(), error }).ready

      expect(error).toHaveBeenCalledWith(new Error('no such table: note'))
      expect(manager.getStats().errors).toBe(1)
    })
  })

  describe('handleMutation', () => {
    it('should refresh registrations that read an affected table', async () => {
      const next = vi.fn()
      await manager.subscribe(counterQuery(['note', 'tag']), {}, { next }).ready

      await manager.handleMutation(mutation(['TAG']))
      expect(next.mock.calls).toEqual([[1], [2]])
    })

    it('should leave other registrations alone', async () => {
      const query = counterQuery()
      await manager.subscribe(query, {}, { next: vi.fn() }).ready

      await manager.handleMutation(mutation(['tag']))
      await manager.handleMutation(mutation(['note'], false))
      expect(query.executions).toBe(1)
    })

    it('should refresh once per mutation however many tables match', async () => {
      const query = counterQuery(['note', 'tag'])
      await manager.subscribe(query, {}, { next: vi.fn() }).ready

      await manager.handleMutation(mutation(['note', 'tag']))
      expect(query.executions).toBe(2)
    })

    it('should skip refreshes while notifications are disabled', async () => {
      const query = counterQuery()
      await manager.subscribe(query, {}, { next: vi.fn() }).ready

      manager.disableNotifications()
      await manager.handleMutation(mutation(['note']))
      expect(query.executions).toBe(1)

      manager.enableNotifications()
      await manager.handleMutation(mutation(['note']))
      expect(query.executions).toBe(2)
    })

    it('should keep delivering to others when a sink throws', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const logged = new ReactiveSubscriptionManager(coordinator, { logger })
      const query = counterQuery()
      const healthy = vi.fn()
      logged.subscribe(query, {}, {
        next: () => {
          throw new Error('sink broke')
        },
      })
      await logged.subscribe(query, {}, { next: healthy }).ready

      expect(healthy).toHaveBeenCalledWith(1)
      expect(logger.error).toHaveBeenCalledWith('[sqlweave:subscriptions] subscriber sub_1 threw while handling a result', expect.any(Error))
      logged.close()
    })
  })

  describe('cancel', () => {
    it('should drop the registration with its last subscriber', async () => {
      const query = counterQuery()
      const next = vi.fn()
      const a = manager.subscribe(query, {}, { next })
      const b = manager.subscribe(query, {}, { next: vi.fn() })
      await a.ready

      a.cancel()
      expect(a.cancelled).toBe(true)
      expect(manager.getStats().activeSubscribers).toBe(1)

      b.cancel()
      expect(manager.getStats().activeRegistrations).toBe(0)

      await manager.handleMutation(mutation(['note']))
      expect(query.executions).toBe(1)
      expect(next).toHaveBeenCalledTimes(1)
    })

    it('should cancel every subscriber on close', async () => {
      const subscription = manager.subscribe(counterQuery(), {}, { next: vi.fn() })
      await subscription.ready

      manager.close()
      expect(subscription.cancelled).toBe(true)
      expect(manager.getStats().activeRegistrations).toBe(0)
    })
  })
})

describe('registrationKey', () => {
  it('should not depend on parameter order', () => {
    expect(registrationKey('note.byId', { b: 1, a: 2 })).toBe(registrationKey('note.byId', { a: 2, b: 1 }))
    expect(registrationKey('note.byId', { a: 1 })).not.toBe(registrationKey('note.byId', { a: 2 }))
  })
})
