/**
 * Fire-and-Forget Error Handler
 *
 * Centralized error handling for best-effort background operations such as
 * automatic snapshot flushes. Their errors never fail the operation that
 * triggered them; they are logged and counted instead.
 *
 * @module utils/fire-and-forget
 */

import { componentLogger, type Logger } from './logger'
import { toError } from '../errors'

// =============================================================================
// Types
// =============================================================================

/**
 * Type of fire-and-forget operation
 */
export type FireAndForgetOperationType =
  | 'auto-flush'
  | 'custom'

/**
 * Metrics for a specific operation type
 */
export interface FireAndForgetMetrics {
  /** Total number of operations started */
  started: number
  /** Total number of successful operations */
  succeeded: number
  /** Total number of failed operations */
  failed: number
  /** Last error message (if any) */
  lastError?: string | undefined
  /** Timestamp of last error */
  lastErrorAt?: number | undefined
  /** Timestamp of last success */
  lastSuccessAt?: number | undefined
}

/**
 * Error handler callback signature
 */
export type ErrorHandler = (
  error: Error,
  operation: FireAndForgetOperationType,
  context?: Record<string, unknown>
) => void

/**
 * Configuration for fire-and-forget operations
 */
export interface FireAndForgetConfig {
  /** Optional custom logger (defaults to the process-wide logger) */
  logger?: Logger | undefined
  /** Additional error handler callback */
  onError?: ErrorHandler | undefined
  /** Collector to record into (defaults to the global collector) */
  metrics?: FireAndForgetMetricsCollector | undefined
}

// =============================================================================
// Metrics Collector
// =============================================================================

function createEmptyMetrics(): FireAndForgetMetrics {
  return {
    started: 0,
    succeeded: 0,
    failed: 0,
  }
}

/**
 * Collector for fire-and-forget operation metrics
 */
export class FireAndForgetMetricsCollector {
  private metrics: Map<FireAndForgetOperationType, FireAndForgetMetrics> = new Map()

  recordStart(operation: FireAndForgetOperationType): void {
    this.getOrCreateMetrics(operation).started++
  }

  recordSuccess(operation: FireAndForgetOperationType): void {
    const m = this.getOrCreateMetrics(operation)
    m.succeeded++
    m.lastSuccessAt = Date.now()
  }

  recordFailure(operation: FireAndForgetOperationType, error: Error): void {
    const m = this.getOrCreateMetrics(operation)
    m.failed++
    m.lastError = error.message
    m.lastErrorAt = Date.now()
  }

  /**
   * Get metrics for a specific operation type
   */
  getMetrics(operation: FireAndForgetOperationType): FireAndForgetMetrics {
    return { ...this.getOrCreateMetrics(operation) }
  }

  /**
   * Get failure rate for a specific operation type
   */
  getFailureRate(operation: FireAndForgetOperationType): number {
    const m = this.metrics.get(operation)
    if (!m || m.started === 0) return 0
    return m.failed / m.started
  }

  reset(): void {
    this.metrics.clear()
  }

  private getOrCreateMetrics(operation: FireAndForgetOperationType): FireAndForgetMetrics {
    let m = this.metrics.get(operation)
    if (!m) {
      m = createEmptyMetrics()
      this.metrics.set(operation, m)
    }
    return m
  }
}

/**
 * Global metrics collector for fire-and-forget operations
 */
export const globalFireAndForgetMetrics = new FireAndForgetMetricsCollector()

// =============================================================================
// Fire-and-Forget Executor
// =============================================================================

/**
 * Execute an operation in fire-and-forget mode
 *
 * The returned promise settles once the operation has finished and its outcome
 * has been recorded. It never rejects; callers are free to ignore it.
 *
 * @example
 * ```typescript
 * fireAndForget('auto-flush', async () => {
 *   await controller.persistSnapshot(false)
 * }, {}, { dbName: 'library' })
 * ```
 */
export function fireAndForget(
  operation: FireAndForgetOperationType,
  fn: () => Promise<void>,
  config: FireAndForgetConfig = {},
  context?: Record<string, unknown>
): Promise<void> {
  const log = componentLogger('background', config.logger)
  const metrics = config.metrics ?? globalFireAndForgetMetrics

  metrics.recordStart(operation)

  return fn()
    .then(() => {
      metrics.recordSuccess(operation)
    })
    .catch((err: unknown) => {
      const error = toError(err)
      metrics.recordFailure(operation, error)
      log.warn(`Fire-and-forget ${operation} failed: ${error.message}`, context)

      if (config.onError) {
        try {
          config.onError(error, operation, context)
        } catch (handlerErr) {
          log.error('Error in fire-and-forget error handler', handlerErr)
        }
      }
    })
}
