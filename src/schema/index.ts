/**
 * Schema Module
 *
 * Exports the schema model builder, the cascade graph and the storage type
 * mapping.
 */

export { buildSchema, type SchemaModel, type SqlFile } from './builder'
export { DependencyGraph, type CascadeKind } from './graph'
export { affinityOf, defaultPropertyType, implicitAdapter, unwrapListType, type Affinity } from './type-mapping'
export { findColumn, type ColumnSpec, type ForeignKeySpec, type TableKind, type TableSpec } from './types'
