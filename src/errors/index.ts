/**
 * sqlweave Error Handling Module
 *
 * Provides a standardized error hierarchy for the compiler and the runtime.
 * All errors extend from SqlWeaveError which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - SqlWeaveError (base class)
 *   - AnnotationError (malformed or misplaced directives)
 *   - SqlSyntaxError (statements rejected by the lexer or the engine)
 *   - SchemaConflictError (incompatible result shapes)
 *   - TypeInferenceError (column or parameter types that cannot be settled)
 *   - QueryError (runtime query failures)
 *   - TransactionError (transaction lifecycle failures)
 *   - PersistenceError (snapshot store failures)
 *   - ConfigurationError (invalid configuration)
 *   - CancelledError (aborted requests)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for sqlweave operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  CANCELLED = 'CANCELLED',

  // Compile errors
  ANNOTATION_SYNTAX = 'ANNOTATION_SYNTAX',
  ANNOTATION_UNKNOWN_KEY = 'ANNOTATION_UNKNOWN_KEY',
  ANNOTATION_DUPLICATE_KEY = 'ANNOTATION_DUPLICATE_KEY',
  ANNOTATION_INVALID_VALUE = 'ANNOTATION_INVALID_VALUE',
  ANNOTATION_UNATTACHED = 'ANNOTATION_UNATTACHED',
  SQL_SYNTAX = 'SQL_SYNTAX',
  SQL_UNSUPPORTED = 'SQL_UNSUPPORTED',
  SCHEMA_CONFLICT = 'SCHEMA_CONFLICT',
  SHARED_RESULT_MISMATCH = 'SHARED_RESULT_MISMATCH',
  MISSING_GROUPING_KEY = 'MISSING_GROUPING_KEY',
  TYPE_INFERENCE = 'TYPE_INFERENCE',

  // Runtime errors
  QUERY_ERROR = 'QUERY_ERROR',
  QUERY_NOT_FOUND = 'QUERY_NOT_FOUND',
  UNEXPECTED_ROW_COUNT = 'UNEXPECTED_ROW_COUNT',
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  TRANSACTION_ERROR = 'TRANSACTION_ERROR',
  TRANSACTION_ROLLED_BACK = 'TRANSACTION_ROLLED_BACK',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  SNAPSHOT_READ_ERROR = 'SNAPSHOT_READ_ERROR',
  SNAPSHOT_WRITE_ERROR = 'SNAPSHOT_WRITE_ERROR',
  INVALID_DATABASE_NAME = 'INVALID_DATABASE_NAME',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_ADAPTER = 'UNKNOWN_ADAPTER',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

/**
 * Position of a construct inside a SQL source file
 */
export interface SourceLocation {
  file: string
  line: number
  column: number
}

/**
 * Render a location as `file:line:column`
 */
export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}:${location.column}`
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all sqlweave errors.
 *
 * @example
 * ```typescript
 * throw new SqlWeaveError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'compile',
 *   namespace: 'person'
 * })
 * ```
 */
export class SqlWeaveError extends Error {
  override readonly name: string = 'SqlWeaveError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof SqlWeaveError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Compile Errors
// =============================================================================

/**
 * Malformed directive syntax, a key outside its scope's key set, a duplicate
 * key, or a directive that cannot be attached to any construct.
 */
export class AnnotationError extends SqlWeaveError {
  override readonly name = 'AnnotationError'
  readonly location: SourceLocation

  constructor(
    message: string,
    location: SourceLocation,
    code: ErrorCode = ErrorCode.ANNOTATION_SYNTAX,
    context?: Record<string, unknown>
  ) {
    super(`${message} (at ${formatLocation(location)})`, code, { ...context, location })
    this.location = location
    Object.setPrototypeOf(this, AnnotationError.prototype)
  }
}

/**
 * A statement that the lexer cannot tokenize, the engine refuses to prepare,
 * or that uses SQL this project does not model.
 */
export class SqlSyntaxError extends SqlWeaveError {
  override readonly name = 'SqlSyntaxError'
  readonly location: SourceLocation | undefined

  constructor(
    message: string,
    location?: SourceLocation,
    code: ErrorCode = ErrorCode.SQL_SYNTAX,
    cause?: Error
  ) {
    super(
      location ? `${message} (at ${formatLocation(location)})` : message,
      code,
      location ? { location } : {},
      cause
    )
    this.location = location
    Object.setPrototypeOf(this, SqlSyntaxError.prototype)
  }
}

/**
 * Structurally incompatible result shapes: a shared result declared twice with
 * different fields, a collection without its grouping key, or ambiguous output
 * column names.
 */
export class SchemaConflictError extends SqlWeaveError {
  override readonly name = 'SchemaConflictError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCHEMA_CONFLICT,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    Object.setPrototypeOf(this, SchemaConflictError.prototype)
  }
}

/**
 * A column or parameter type that cannot be determined reliably and has no
 * override directive.
 */
export class TypeInferenceError extends SqlWeaveError {
  override readonly name = 'TypeInferenceError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.TYPE_INFERENCE, context)
    Object.setPrototypeOf(this, TypeInferenceError.prototype)
  }
}

// =============================================================================
// Runtime Errors
// =============================================================================

/**
 * Error raised while running a compiled or ad-hoc query.
 */
export class QueryError extends SqlWeaveError {
  override readonly name = 'QueryError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.QUERY_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, QueryError.prototype)
  }
}

/**
 * Error raised by the transaction coordinator.
 */
export class TransactionError extends SqlWeaveError {
  override readonly name = 'TransactionError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TRANSACTION_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, TransactionError.prototype)
  }
}

/**
 * Error raised while loading, persisting or clearing a database snapshot.
 */
export class PersistenceError extends SqlWeaveError {
  override readonly name = 'PersistenceError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PERSISTENCE_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, PersistenceError.prototype)
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends SqlWeaveError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

/**
 * Error delivered in place of a result whose request was aborted.
 */
export class CancelledError extends SqlWeaveError {
  override readonly name = 'CancelledError'

  constructor(message = 'Operation was cancelled', context?: Record<string, unknown>) {
    super(message, ErrorCode.CANCELLED, context)
    Object.setPrototypeOf(this, CancelledError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSqlWeaveError(error: unknown): error is SqlWeaveError {
  return error instanceof SqlWeaveError
}

export function isAnnotationError(error: unknown): error is AnnotationError {
  return error instanceof AnnotationError
}

export function isSchemaConflictError(error: unknown): error is SchemaConflictError {
  return error instanceof SchemaConflictError
}

export function isTypeInferenceError(error: unknown): error is TypeInferenceError {
  return error instanceof TypeInferenceError
}

export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError
}

export function isTransactionError(error: unknown): error is TransactionError {
  return error instanceof TransactionError
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}

/**
 * Check if an error carries a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isSqlWeaveError(error) && error.code === code
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
