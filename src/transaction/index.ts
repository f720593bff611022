/**
 * Transactions
 *
 * @module transaction
 */

export { TransactionCoordinator } from './coordinator'
export type {
  CoordinatorOptions,
  MutationEvent,
  MutationListener,
  OperationResult,
  RunOptions,
  TransactionMode,
  TransactionOptions,
} from './coordinator'
