/**
 * Live query subscription types
 *
 * A live query is a compiled read statement bound to parameter values. Its
 * subscribers receive the first result and a fresh result after every
 * mutation that touches one of the tables the statement reads.
 */

import type { Logger } from '../utils/logger'

// =============================================================================
// Live queries
// =============================================================================

/**
 * A read statement that can be re-executed inside the execution slot
 */
export interface LiveQuery<T> {
  /** Query identity, `namespace.name` for compiled queries */
  key: string
  /** Lower-cased tables whose mutation makes the result stale */
  invalidationSet: readonly string[]
  /** Run the statement; called inside the execution slot */
  execute(): T
}

/**
 * Receiver of live results
 */
export interface SubscriptionSink<T> {
  next(value: T): void
  error?(error: Error): void
}

export interface LiveSubscription {
  readonly id: string
  /** Registration key shared by every subscriber of the same query and parameters */
  readonly key: string
  readonly cancelled: boolean
  /** Resolves once this subscriber received its first result or error */
  readonly ready: Promise<void>
  cancel(): void
}

// =============================================================================
// Manager
// =============================================================================

export interface SubscriptionManagerConfig {
  /** Log registrations and refreshes */
  debug?: boolean | undefined
  logger?: Logger | undefined
}

export interface SubscriptionStats {
  /** Distinct (query, parameters) registrations */
  activeRegistrations: number
  activeSubscribers: number
  /** Values handed to sinks */
  deliveries: number
  /** Statement executions, initial ones included */
  refreshes: number
  /** Executions that failed */
  errors: number
}
