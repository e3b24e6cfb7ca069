/**
 * Statement nodes of the tensor IR
 */

import type { Buffer, Expr, Var } from "./expr.js";

/**
 * Statement kinds
 */
export enum StmtKind {
  For = "For",
  ThreadBinding = "ThreadBinding",
  Block = "Block",
  IfThenElse = "IfThenElse",
  BufferStore = "BufferStore",
  Seq = "Seq",
  Evaluate = "Evaluate",
}

/**
 * How the iterations of a loop are executed
 */
export enum ForKind {
  Serial = "serial",
  Parallel = "parallel",
  Vectorized = "vectorized",
  Unrolled = "unrolled",
}

export enum IterType {
  Spatial = "spatial",
  Reduce = "reduce",
}

/**
 * for loopVar in [min, min + extent)
 */
export interface ForStmt {
  readonly kind: StmtKind.For;
  readonly loopVar: Var;
  readonly min: Expr;
  readonly extent: Expr;
  readonly forKind: ForKind;
  readonly body: Stmt;
}

/**
 * Parallel axis: threadVar ranges over [0, extent) concurrently.
 */
export interface ThreadBindingStmt {
  readonly kind: StmtKind.ThreadBinding;
  readonly threadVar: Var;
  readonly threadTag: string;
  readonly extent: Expr;
  readonly body: Stmt;
}

export interface IterVar {
  readonly variable: Var;
  readonly min: Expr;
  readonly extent: Expr;
  readonly iterType: IterType;
}

/**
 * Block with iteration variables bound to iterValues (one per iter var).
 */
export interface BlockStmt {
  readonly kind: StmtKind.Block;
  readonly name: string;
  readonly iterVars: readonly IterVar[];
  readonly iterValues: readonly Expr[];
  readonly predicate?: Expr;
  readonly body: Stmt;
}

export interface IfThenElseStmt {
  readonly kind: StmtKind.IfThenElse;
  readonly condition: Expr;
  readonly thenCase: Stmt;
  readonly elseCase?: Stmt;
}

export interface BufferStoreStmt {
  readonly kind: StmtKind.BufferStore;
  readonly buffer: Buffer;
  readonly indices: readonly Expr[];
  readonly value: Expr;
}

export interface SeqStmt {
  readonly kind: StmtKind.Seq;
  readonly stmts: readonly Stmt[];
}

export interface EvaluateStmt {
  readonly kind: StmtKind.Evaluate;
  readonly value: Expr;
}

export type Stmt =
  | ForStmt
  | ThreadBindingStmt
  | BlockStmt
  | IfThenElseStmt
  | BufferStoreStmt
  | SeqStmt
  | EvaluateStmt;

/**
 * Helper functions to create statements
 */
export function createFor(
  loopVar: Var,
  min: Expr,
  extent: Expr,
  body: Stmt,
  forKind: ForKind = ForKind.Serial,
): ForStmt {
  return { kind: StmtKind.For, loopVar, min, extent, forKind, body };
}

export function createThreadBinding(
  threadVar: Var,
  threadTag: string,
  extent: Expr,
  body: Stmt,
): ThreadBindingStmt {
  return { kind: StmtKind.ThreadBinding, threadVar, threadTag, extent, body };
}

export function createIterVar(
  variable: Var,
  min: Expr,
  extent: Expr,
  iterType: IterType = IterType.Spatial,
): IterVar {
  return { variable, min, extent, iterType };
}

export function createBlock(
  name: string,
  iterVars: readonly IterVar[],
  iterValues: readonly Expr[],
  body: Stmt,
  predicate?: Expr,
): BlockStmt {
  return {
    kind: StmtKind.Block,
    name,
    iterVars,
    iterValues,
    body,
    ...(predicate ? { predicate } : {}),
  };
}

export function createIfThenElse(
  condition: Expr,
  thenCase: Stmt,
  elseCase?: Stmt,
): IfThenElseStmt {
  return {
    kind: StmtKind.IfThenElse,
    condition,
    thenCase,
    ...(elseCase ? { elseCase } : {}),
  };
}

export function createBufferStore(
  buffer: Buffer,
  indices: readonly Expr[],
  value: Expr,
): BufferStoreStmt {
  return { kind: StmtKind.BufferStore, buffer, indices, value };
}

export function createSeq(stmts: readonly Stmt[]): SeqStmt {
  return { kind: StmtKind.Seq, stmts };
}

export function createEvaluate(value: Expr): EvaluateStmt {
  return { kind: StmtKind.Evaluate, value };
}
