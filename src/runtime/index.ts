/**
 * Runtime
 *
 * @module runtime
 */

export { Database, openDatabase } from './database'
export type { ExecuteResult, OpenDatabaseOptions, QueryRunner } from './database'
export { AdapterRegistry, BUILT_IN_ADAPTERS, booleanAdapter, jsonAdapter, type TypeAdapter } from './adapters'
export { RowAssembler, type ResultRow } from './row-assembler'
export { BetterSqliteConnection, bindParameters, openConnection } from './connection'
export type { BindParams, ColumnMetadata, Connection, ConnectionOptions, RawRows, RunResult, StatementInfo } from './connection'
