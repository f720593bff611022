/**
 * sqlweave Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Directives
// =============================================================================

/**
 * Marker that opens a directive block inside a SQL comment
 */
export const DIRECTIVE_MARKER = '@@{'

// =============================================================================
// Source Layout
// =============================================================================

/** Directory holding CREATE TABLE / CREATE VIEW files */
export const SCHEMA_DIR = 'schema'

/** Directory holding one sub-directory of query files per namespace */
export const QUERIES_DIR = 'queries'

/** Directory holding seed statements run once on a fresh database */
export const INIT_DIR = 'init'

/** Directory holding numbered migration files */
export const MIGRATION_DIR = 'migration'

/** Extension of every SQL source file */
export const SQL_EXTENSION = '.sql'

// =============================================================================
// Compiler
// =============================================================================

/** Property type given to columns whose type cannot be determined */
export const UNKNOWN_PROPERTY_TYPE = 'unknown'

/** Suffix of generated root result type names */
export const RESULT_TYPE_SUFFIX = 'Result'

/** Suffix of generated table row type names */
export const ROW_TYPE_SUFFIX = 'Row'

// =============================================================================
// Runtime
// =============================================================================

/** Filename used when no file is configured */
export const IN_MEMORY_FILENAME = ':memory:'

/** Prepared statements kept per connection */
export const STATEMENT_CACHE_SIZE = 256

/** Parsed ad-hoc statements kept per database */
export const AD_HOC_CACHE_SIZE = 128

/** Default transaction mode on first entry */
export const DEFAULT_TRANSACTION_MODE = 'deferred'

/** Name of the configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'sqlweave.config.yaml'
