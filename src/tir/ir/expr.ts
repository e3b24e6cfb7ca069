/**
 * Expression nodes of the tensor IR
 */

import { DataTypes, type DataType } from "./data_type.js";

/**
 * Expression kinds
 */
export enum ExprKind {
  Var = "Var",
  IntImm = "IntImm",
  FloatImm = "FloatImm",
  Add = "Add",
  Sub = "Sub",
  Mul = "Mul",
  FloorDiv = "FloorDiv",
  FloorMod = "FloorMod",
  Min = "Min",
  Max = "Max",
  Compare = "Compare",
  And = "And",
  Or = "Or",
  Not = "Not",
  Select = "Select",
  Cast = "Cast",
  BufferLoad = "BufferLoad",
  Ramp = "Ramp",
  Broadcast = "Broadcast",
  Call = "Call",
}

export type ArithKind =
  | ExprKind.Add
  | ExprKind.Sub
  | ExprKind.Mul
  | ExprKind.FloorDiv
  | ExprKind.FloorMod
  | ExprKind.Min
  | ExprKind.Max;

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

/**
 * Variable declaration slot. References share the object, so identity
 * (not name) decides which variable a node refers to.
 */
export interface Var {
  readonly kind: ExprKind.Var;
  readonly name: string;
  readonly dtype: DataType;
}

export interface IntImm {
  readonly kind: ExprKind.IntImm;
  readonly value: bigint;
  readonly dtype: DataType;
}

export interface FloatImm {
  readonly kind: ExprKind.FloatImm;
  readonly value: number;
  readonly dtype: DataType;
}

export interface ArithExpr {
  readonly kind: ArithKind;
  readonly a: Expr;
  readonly b: Expr;
  readonly dtype: DataType;
}

export interface CompareExpr {
  readonly kind: ExprKind.Compare;
  readonly op: CompareOp;
  readonly a: Expr;
  readonly b: Expr;
  readonly dtype: DataType;
}

export interface LogicalExpr {
  readonly kind: ExprKind.And | ExprKind.Or;
  readonly a: Expr;
  readonly b: Expr;
  readonly dtype: DataType;
}

export interface NotExpr {
  readonly kind: ExprKind.Not;
  readonly value: Expr;
  readonly dtype: DataType;
}

export interface SelectExpr {
  readonly kind: ExprKind.Select;
  readonly condition: Expr;
  readonly trueValue: Expr;
  readonly falseValue: Expr;
  readonly dtype: DataType;
}

export interface CastExpr {
  readonly kind: ExprKind.Cast;
  readonly value: Expr;
  readonly dtype: DataType;
}

export interface Buffer {
  readonly name: string;
  readonly dtype: DataType;
  readonly shape: readonly Expr[];
}

export interface BufferLoad {
  readonly kind: ExprKind.BufferLoad;
  readonly buffer: Buffer;
  readonly indices: readonly Expr[];
  readonly dtype: DataType;
}

/**
 * Vector of lanes values base, base + stride, ...
 */
export interface RampExpr {
  readonly kind: ExprKind.Ramp;
  readonly base: Expr;
  readonly stride: Expr;
  readonly lanes: number;
  readonly dtype: DataType;
}

export interface BroadcastExpr {
  readonly kind: ExprKind.Broadcast;
  readonly value: Expr;
  readonly lanes: number;
  readonly dtype: DataType;
}

/**
 * Opaque call; nothing is known about its result.
 */
export interface CallExpr {
  readonly kind: ExprKind.Call;
  readonly op: string;
  readonly args: readonly Expr[];
  readonly dtype: DataType;
}

export type Expr =
  | Var
  | IntImm
  | FloatImm
  | ArithExpr
  | CompareExpr
  | LogicalExpr
  | NotExpr
  | SelectExpr
  | CastExpr
  | BufferLoad
  | RampExpr
  | BroadcastExpr
  | CallExpr;

/**
 * Helper functions to create expressions
 */
export function createVar(name: string, dtype: DataType = DataTypes.int32): Var {
  return { kind: ExprKind.Var, name, dtype };
}

export function createIntImm(
  value: bigint | number,
  dtype: DataType = DataTypes.int32,
): IntImm {
  return { kind: ExprKind.IntImm, value: BigInt(value), dtype };
}

export function createFloatImm(
  value: number,
  dtype: DataType = DataTypes.float32,
): FloatImm {
  return { kind: ExprKind.FloatImm, value, dtype };
}

export function createArith(
  kind: ArithKind,
  a: Expr,
  b: Expr,
  dtype: DataType = a.dtype,
): ArithExpr {
  return { kind, a, b, dtype };
}

export const createAdd = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.Add, a, b);
export const createSub = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.Sub, a, b);
export const createMul = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.Mul, a, b);
export const createFloorDiv = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.FloorDiv, a, b);
export const createFloorMod = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.FloorMod, a, b);
export const createMin = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.Min, a, b);
export const createMax = (a: Expr, b: Expr): ArithExpr =>
  createArith(ExprKind.Max, a, b);

export function createCompare(op: CompareOp, a: Expr, b: Expr): CompareExpr {
  return {
    kind: ExprKind.Compare,
    op,
    a,
    b,
    dtype: DataTypes.bool.withLanes(a.dtype.lanes),
  };
}

export function createAnd(a: Expr, b: Expr): LogicalExpr {
  return { kind: ExprKind.And, a, b, dtype: a.dtype };
}

export function createOr(a: Expr, b: Expr): LogicalExpr {
  return { kind: ExprKind.Or, a, b, dtype: a.dtype };
}

export function createNot(value: Expr): NotExpr {
  return { kind: ExprKind.Not, value, dtype: value.dtype };
}

export function createSelect(
  condition: Expr,
  trueValue: Expr,
  falseValue: Expr,
): SelectExpr {
  return {
    kind: ExprKind.Select,
    condition,
    trueValue,
    falseValue,
    dtype: trueValue.dtype,
  };
}

export function createCast(dtype: DataType, value: Expr): CastExpr {
  return { kind: ExprKind.Cast, value, dtype };
}

export function createBuffer(
  name: string,
  shape: readonly (Expr | number)[],
  dtype: DataType = DataTypes.float32,
): Buffer {
  return {
    name,
    dtype,
    shape: shape.map((dim) =>
      typeof dim === "number" ? createIntImm(dim) : dim,
    ),
  };
}

export function createBufferLoad(
  buffer: Buffer,
  indices: readonly Expr[],
): BufferLoad {
  const lanes = indices.reduce((max, index) => Math.max(max, index.dtype.lanes), 1);
  return {
    kind: ExprKind.BufferLoad,
    buffer,
    indices,
    dtype: buffer.dtype.withLanes(buffer.dtype.lanes * lanes),
  };
}

export function createRamp(base: Expr, stride: Expr, lanes: number): RampExpr {
  return {
    kind: ExprKind.Ramp,
    base,
    stride,
    lanes,
    dtype: base.dtype.withLanes(lanes),
  };
}

export function createBroadcast(value: Expr, lanes: number): BroadcastExpr {
  return {
    kind: ExprKind.Broadcast,
    value,
    lanes,
    dtype: value.dtype.withLanes(lanes),
  };
}

export function createCall(
  op: string,
  args: readonly Expr[],
  dtype: DataType,
): CallExpr {
  return { kind: ExprKind.Call, op, args, dtype };
}

/**
 * Value of an integer literal, looking through a broadcast of one.
 */
export const getLiteralValue = (expr: Expr): bigint | null => {
  if (expr.kind === ExprKind.IntImm) return expr.value;
  if (expr.kind === ExprKind.Broadcast && expr.value.kind === ExprKind.IntImm) {
    return expr.value.value;
  }
  return null;
};
