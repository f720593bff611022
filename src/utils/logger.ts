/**
 * Logging for sqlweave
 *
 * Every part of the tree logs through a component logger, which prefixes its
 * messages with `[sqlweave:<component>]` and forwards them to a target: the
 * logger injected into that runtime object, or else the process-wide default.
 * The default is the noop logger; `debug: true` in config or `setLogger()`
 * switches to console output.
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Parts of the tree that log */
export type LogComponent =
  | 'compiler'
  | 'schema'
  | 'analyzer'
  | 'database'
  | 'coordinator'
  | 'subscriptions'
  | 'persistence'
  | 'background'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

// =============================================================================
// Targets
// =============================================================================

/**
 * Console output at or above `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(message, ...args)
    },
    info(message, ...args) {
      if (enabled('info')) console.info(message, ...args)
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(message, ...args)
    },
    error(message, error, ...args) {
      if (!enabled('error')) return
      if (error !== undefined) console.error(message, error, ...args)
      else console.error(message, ...args)
    },
  }
}

export const consoleLogger: Logger = createConsoleLogger('debug')

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

let defaultLogger: Logger = noopLogger

/**
 * Set the process-wide default logger
 *
 * @example
 * ```typescript
 * setLogger(createConsoleLogger('info'))
 * ```
 */
export function setLogger(l: Logger): void {
  defaultLogger = l
}

export function getLogger(): Logger {
  return defaultLogger
}

// =============================================================================
// Component loggers
// =============================================================================

/**
 * Logger for one component. The target is looked up on every call, so a
 * later setLogger() still reaches objects created before it.
 */
export function componentLogger(component: LogComponent, injected?: Logger): Logger {
  const prefix = `[sqlweave:${component}]`
  const target = () => injected ?? defaultLogger
  return {
    debug(message, ...args) {
      target().debug(`${prefix} ${message}`, ...args)
    },
    info(message, ...args) {
      target().info(`${prefix} ${message}`, ...args)
    },
    warn(message, ...args) {
      target().warn(`${prefix} ${message}`, ...args)
    },
    error(message, error, ...args) {
      if (error === undefined && args.length === 0) target().error(`${prefix} ${message}`)
      else target().error(`${prefix} ${message}`, error, ...args)
    },
  }
}
