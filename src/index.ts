/**
 * Integer width narrowing for a tensor loop IR
 */

export * from "./tir/ir/data_type.js";
export * from "./tir/ir/expr.js";
export * from "./tir/ir/stmt.js";
export * from "./tir/ir/prim_func.js";
export { printExpr, printFunc, printModule, printStmt } from "./tir/ir/printer.js";
export {
  structuralEqual,
  structuralEqualExpr,
  structuralEqualModule,
  structuralEqualStmt,
} from "./tir/ir/structural_equal.js";
export {
  type BufferContents,
  type ExternFunction,
  type RunOptions,
  runPrimFunc,
  type Scalar,
  type Value,
} from "./tir/ir/interpreter.js";
export * from "./tir/analysis/interval.js";
export { BoundAnalyzer, bound } from "./tir/analysis/bound_analyzer.js";
export {
  type Candidate,
  CandidateOrigin,
  type CollectedFunction,
  collectCandidates,
  type ExprRoot,
  type IndexSite,
  SiteContext,
} from "./tir/analysis/candidate_collector.js";
export {
  type DecisionMap,
  DecisionReason,
  decideWidths,
  MAX_TARGET_BITS,
  MIN_TARGET_BITS,
  type WidthDecision,
  type WidthDecisions,
} from "./tir/passes/width_decision.js";
export { coerce, rewriteDataTypes } from "./tir/passes/dtype_rewriter.js";
export {
  type FunctionReport,
  formatDecision,
  type NarrowDataTypeOptions,
  NarrowDataTypePass,
  type NarrowResult,
  narrowDataType,
  narrowFunction,
} from "./tir/passes/narrow_datatype.js";
export {
  decodeModule,
  encodeExpr,
  encodeModule,
  encodeStmt,
  parseModule,
} from "./tir/serialization/module_codec.js";
export type { ModuleJson } from "./tir/serialization/schema.js";
export { ErrorCollector, joinPath } from "./tir/errors/error_collector.js";
export {
  AggregateTirError,
  TirError,
  type TirErrorCode,
} from "./tir/errors/tir_errors.js";
