/**
 * Query Module
 *
 * Statement analysis and result shapes.
 */

export { analyzeQuery, analyzeView, detectKind } from './analyzer'
export type { AnalyzedView, AnalyzerContext, AnalyzerOptions, StatementKind } from './analyzer'
export { resolveResultShape, rootTypeName } from './result-shape'
export type { ProjectedField, ShapeInput } from './result-shape'
export { SharedResultRegistry, compareResultNodes, isEmptyDiff, type ResultDiff } from './shared-results'
export { returnsRows } from './types'
export type {
  ParameterSpec,
  QueryKind,
  QuerySpec,
  ResultField,
  ResultNode,
  ResultNodeKind,
} from './types'
