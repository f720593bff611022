/**
 * Live query subscriptions
 *
 * @example
 * ```typescript
 * const subscription = db.query('book', 'all').subscribe({}, {
 *   next: (books) => console.log(books.length),
 *   error: (error) => console.error(error),
 * })
 * await subscription.ready
 * subscription.cancel()
 * ```
 */

export { ReactiveSubscriptionManager, registrationKey } from './manager'
export type {
  LiveQuery,
  LiveSubscription,
  SubscriptionManagerConfig,
  SubscriptionSink,
  SubscriptionStats,
} from './types'
