/**
 * Reactive Subscription Manager
 *
 * Keeps one registration per (query, parameters) pair. Subscribers of the
 * same pair share the registration; the subscriber set doubles as its
 * reference count. After a mutation the manager re-executes every
 * registration whose invalidation set intersects the affected tables, once
 * per mutation, and hands the result to all of its subscribers.
 *
 * Executions go through the transaction coordinator's execution slot.
 * Deliveries happen outside the slot, so a sink may run further statements.
 */

import { toError } from '../errors'
import type { BindParams } from '../runtime/connection'
import type { MutationEvent, TransactionCoordinator } from '../transaction/coordinator'
import { componentLogger, type Logger } from '../utils/logger'
import { stableStringify } from '../utils/stable-json'
import type {
  LiveQuery,
  LiveSubscription,
  SubscriptionManagerConfig,
  SubscriptionSink,
  SubscriptionStats,
} from './types'

// =============================================================================
// Registrations
// =============================================================================

type Outcome = { ok: true; value: unknown } | { ok: false; error: Error }

interface Subscriber {
  id: string
  sink: SubscriptionSink<unknown>
  cancelled: boolean
  delivered: boolean
  markReady: () => void
}

interface Registration {
  key: string
  query: LiveQuery<unknown>
  invalidationSet: ReadonlySet<string>
  subscribers: Map<string, Subscriber>
  last: Outcome | undefined
}

/**
 * Registration key of a query bound to parameter values
 */
export function registrationKey(queryKey: string, params: BindParams): string {
  return `${queryKey}:${stableStringify(params)}`
}

// =============================================================================
// ReactiveSubscriptionManager
// =============================================================================

/**
 * Manages live query registrations for one database
 *
 * @example
 * ```typescript
 * const manager = new ReactiveSubscriptionManager(coordinator)
 * coordinator.addListener((event) => manager.handleMutation(event))
 *
 * const subscription = manager.subscribe(liveQuery, { id: 1 }, {
 *   next: (rows) => render(rows),
 * })
 * subscription.cancel()
 * ```
 */
export class ReactiveSubscriptionManager {
  private readonly registrations = new Map<string, Registration>()
  private readonly config: SubscriptionManagerConfig
  private notifications = true
  private nextId = 0
  private stats: Omit<SubscriptionStats, 'activeRegistrations' | 'activeSubscribers'> = {
    deliveries: 0,
    refreshes: 0,
    errors: 0,
  }

  constructor(
    private readonly coordinator: TransactionCoordinator,
    config: SubscriptionManagerConfig = {}
  ) {
    this.config = config
  }

  private get logger(): Logger {
    return componentLogger('subscriptions', this.config.logger)
  }

  // ===========================================================================
  // Subscription Management
  // ===========================================================================

  /**
   * Subscribe to a live query
   *
   * The first subscriber of a (query, parameters) pair triggers the initial
   * execution; later subscribers receive the last result right away or wait
   * for the initial one.
   */
  subscribe<T>(query: LiveQuery<T>, params: BindParams, sink: SubscriptionSink<T>): LiveSubscription {
    const key = registrationKey(query.key, params)
    let registration = this.registrations.get(key)
    const created = !registration
    if (!registration) {
      registration = {
        key,
        query,
        invalidationSet: new Set(query.invalidationSet.map((table) => table.toLowerCase())),
        subscribers: new Map(),
        last: undefined,
      }
      this.registrations.set(key, registration)
    }

    let markReady: () => void = () => undefined
    const ready = new Promise<void>((resolve) => {
      markReady = resolve
    })
    const subscriber: Subscriber = {
      id: `sub_${++this.nextId}`,
      sink,
      cancelled: false,
      delivered: false,
      markReady,
    }
    registration.subscribers.set(subscriber.id, subscriber)

    if (this.config.debug) {
      this.logger.debug(`subscriber ${subscriber.id} added to ${key}`)
    }

    if (created) {
      void this.refresh(registration)
    } else {
      const last = registration.last
      if (last) queueMicrotask(() => this.deliverTo(subscriber, last))
    }

    const owner = registration
    return {
      id: subscriber.id,
      key,
      ready,
      get cancelled() {
        return subscriber.cancelled
      },
      cancel: () => this.unsubscribe(owner, subscriber),
    }
  }

  private unsubscribe(registration: Registration, subscriber: Subscriber): void {
    if (subscriber.cancelled) return
    subscriber.cancelled = true
    subscriber.markReady()
    registration.subscribers.delete(subscriber.id)

    if (registration.subscribers.size === 0 && this.registrations.get(registration.key) === registration) {
      this.registrations.delete(registration.key)
      if (this.config.debug) {
        this.logger.debug(`registration ${registration.key} destroyed`)
      }
    }
  }

  // ===========================================================================
  // Mutation Processing
  // ===========================================================================

  /**
   * Re-execute the registrations a mutation invalidates and deliver their
   * results; resolves once every delivery has been made
   */
  async handleMutation(event: MutationEvent): Promise<void> {
    if (!this.notifications || !event.mutated || event.affectedTables.size === 0) return

    const stale = [...this.registrations.values()].filter((registration) =>
      [...event.affectedTables].some((table) => registration.invalidationSet.has(table.toLowerCase()))
    )
    if (stale.length === 0) return

    if (this.config.debug) {
      this.logger.debug(`${event.type} on ${[...event.affectedTables].join(', ')} refreshes ${stale.length} registrations`)
    }
    await Promise.all(stale.map((registration) => this.refresh(registration)))
  }

  /**
   * Execute a registration in the execution slot and deliver the outcome.
   * Never rejects: failures go to the subscribers' error callbacks.
   */
  private async refresh(registration: Registration): Promise<void> {
    this.stats.refreshes++
    let outcome: Outcome
    try {
      const value = await this.coordinator.enqueue(() => registration.query.execute())
      outcome = { ok: true, value }
    } catch (err) {
      const error = toError(err)
      this.stats.errors++
      this.logger.warn(`live query ${registration.key} failed: ${error.message}`)
      outcome = { ok: false, error }
    }

    if (this.registrations.get(registration.key) !== registration) return
    registration.last = outcome
    for (const subscriber of [...registration.subscribers.values()]) {
      this.deliverTo(subscriber, outcome)
    }
  }

  private deliverTo(subscriber: Subscriber, outcome: Outcome): void {
    if (subscriber.cancelled) return
    try {
      if (outcome.ok) {
        this.stats.deliveries++
        subscriber.sink.next(outcome.value)
      } else {
        subscriber.sink.error?.(outcome.error)
      }
    } catch (error) {
      this.logger.error(`subscriber ${subscriber.id} threw while handling a result`, error)
    } finally {
      if (!subscriber.delivered) {
        subscriber.delivered = true
        subscriber.markReady()
      }
    }
  }

  // ===========================================================================
  // Notification Switch
  // ===========================================================================

  enableNotifications(): void {
    this.notifications = true
  }

  disableNotifications(): void {
    this.notifications = false
  }

  get notificationsEnabled(): boolean {
    return this.notifications
  }

  // ===========================================================================
  // Lifecycle & Stats
  // ===========================================================================

  getStats(): SubscriptionStats {
    let activeSubscribers = 0
    for (const registration of this.registrations.values()) activeSubscribers += registration.subscribers.size
    return {
      activeRegistrations: this.registrations.size,
      activeSubscribers,
      ...this.stats,
    }
  }

  /**
   * Cancel every subscriber and drop all registrations
   */
  close(): void {
    for (const registration of [...this.registrations.values()]) {
      for (const subscriber of [...registration.subscribers.values()]) {
        this.unsubscribe(registration, subscriber)
      }
    }
    this.registrations.clear()
  }
}
