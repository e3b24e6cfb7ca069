/**
 * Reference evaluator for primitive functions.
 *
 * Integer arithmetic wraps to the node's dtype, so a width change that loses
 * information shows up as a different result.
 */

import { TirError } from "../errors/tir_errors.js";
import { floorDivBig, floorModBig } from "../analysis/interval.js";
import { unreachable } from "../utils/traversal.js";
import { type DataType, wrapToType } from "./data_type.js";
import {
  type Buffer,
  type CompareOp,
  createIntImm,
  type Expr,
  ExprKind,
  type Var,
} from "./expr.js";
import type { PrimFunc } from "./prim_func.js";
import { type Stmt, StmtKind } from "./stmt.js";

export type Scalar = bigint | number;
export type Value = Scalar | readonly Scalar[];

export type ExternFunction = (args: readonly Value[]) => Value;

export interface RunOptions {
  /** Scalar parameters by name */
  scalars?: Readonly<Record<string, Scalar>>;
  /** Initial contents of buffer parameters by name, flattened row-major */
  buffers?: Readonly<Record<string, readonly Scalar[]>>;
  /** Implementations of opaque calls by op name */
  externs?: Readonly<Record<string, ExternFunction>>;
  /** Upper bound on executed loop iterations */
  maxIterations?: number;
}

export type BufferContents = Record<string, Scalar[]>;

const DEFAULT_MAX_ITERATIONS = 1_000_000;

const toBigInt = (value: Scalar): bigint =>
  typeof value === "bigint" ? value : BigInt(Math.trunc(value));

const toNumber = (value: Scalar): number =>
  typeof value === "number" ? value : Number(value);

const isTruthy = (value: Scalar): boolean =>
  typeof value === "bigint" ? value !== 0n : value !== 0;

const runtimeError = (message: string, path = ""): TirError =>
  new TirError("RuntimeError", message, path);

const lanesOf = (value: Value): number =>
  typeof value === "object" ? value.length : 1;

const laneAt = (value: Value, lane: number): Scalar => {
  if (typeof value !== "object") return value;
  const scalar = value[lane];
  if (scalar === undefined) {
    throw runtimeError(`Lane ${lane} out of range for a ${value.length}-lane value`);
  }
  return scalar;
};

/**
 * Apply fn lane by lane, broadcasting scalars.
 */
const lanewise = (
  values: readonly Value[],
  fn: (lanes: readonly Scalar[]) => Scalar,
): Value => {
  const lanes = values.reduce<number>((max, value) => Math.max(max, lanesOf(value)), 1);
  const isVector = values.some((value) => typeof value === "object");
  if (!isVector) return fn(values.map((value) => laneAt(value, 0)));
  const result: Scalar[] = [];
  for (let lane = 0; lane < lanes; lane++) {
    result.push(fn(values.map((value) => laneAt(value, lane))));
  }
  return result;
};

const scalarOf = (value: Value, what: string): Scalar => {
  if (typeof value === "object") {
    throw runtimeError(`${what} must be a scalar`);
  }
  return value;
};

const castScalar = (value: Scalar, dtype: DataType): Scalar => {
  if (dtype.isFloat()) return toNumber(value);
  if (dtype.isBool()) return isTruthy(value) ? 1n : 0n;
  return wrapToType(toBigInt(value), dtype);
};

const compareScalars = (op: CompareOp, a: Scalar, b: Scalar): boolean => {
  switch (op) {
    case "==":
      return a === b;
    case "!=":
      return a !== b;
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case ">=":
      return a >= b;
    default:
      return unreachable(op, "comparison");
  }
};

const intArith = (kind: ExprKind, a: bigint, b: bigint): bigint => {
  switch (kind) {
    case ExprKind.Add:
      return a + b;
    case ExprKind.Sub:
      return a - b;
    case ExprKind.Mul:
      return a * b;
    case ExprKind.FloorDiv:
      if (b === 0n) throw runtimeError("Integer division by zero");
      return floorDivBig(a, b);
    case ExprKind.FloorMod:
      if (b === 0n) throw runtimeError("Integer modulo by zero");
      return floorModBig(a, b);
    case ExprKind.Min:
      return a < b ? a : b;
    case ExprKind.Max:
      return a > b ? a : b;
    default:
      throw new TirError("InternalError", `Not an arithmetic kind: ${kind}`);
  }
};

const floatArith = (kind: ExprKind, a: number, b: number): number => {
  switch (kind) {
    case ExprKind.Add:
      return a + b;
    case ExprKind.Sub:
      return a - b;
    case ExprKind.Mul:
      return a * b;
    case ExprKind.FloorDiv:
      return Math.floor(a / b);
    case ExprKind.FloorMod:
      return a - Math.floor(a / b) * b;
    case ExprKind.Min:
      return Math.min(a, b);
    case ExprKind.Max:
      return Math.max(a, b);
    default:
      throw new TirError("InternalError", `Not an arithmetic kind: ${kind}`);
  }
};

class Interpreter {
  private readonly env = new Map<Var, Value>();
  private readonly storage = new Map<Buffer, Scalar[]>();
  private readonly shapes = new Map<Buffer, bigint[]>();
  private iterations = 0;
  private readonly maxIterations: number;

  constructor(
    private readonly func: PrimFunc,
    private readonly options: RunOptions,
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  run(): BufferContents {
    const scalars = this.options.scalars ?? {};
    for (const param of this.func.params) {
      const value = scalars[param.name];
      if (value === undefined) {
        throw new TirError(
          "InvalidArgument",
          `Missing value for scalar parameter '${param.name}'`,
          `scalars.${param.name}`,
        );
      }
      this.env.set(param, castScalar(value, param.dtype));
    }

    const initial = this.options.buffers ?? {};
    for (const buffer of this.func.buffers) {
      if (!buffer.dtype.isScalar()) {
        throw runtimeError(
          `Buffer '${buffer.name}' has vector elements (${buffer.dtype.toString()}), which cannot be executed`,
        );
      }
      const shape = buffer.shape.map((dim) =>
        toBigInt(scalarOf(this.evalExpr(dim), `Shape of '${buffer.name}'`)),
      );
      const size = shape.reduce((total, dim) => total * dim, 1n);
      const contents = initial[buffer.name];
      const zero: Scalar = buffer.dtype.isFloat() ? 0 : 0n;
      const data: Scalar[] = contents
        ? contents.map((value) => castScalar(value, buffer.dtype.element()))
        : Array.from({ length: Number(size) }, () => zero);
      if (BigInt(data.length) !== size) {
        throw new TirError(
          "InvalidArgument",
          `Buffer '${buffer.name}' expects ${size.toString()} elements, got ${data.length}`,
          `buffers.${buffer.name}`,
        );
      }
      this.storage.set(buffer, data);
      this.shapes.set(buffer, shape);
    }

    this.execStmt(this.func.body);

    const result: BufferContents = {};
    for (const buffer of this.func.buffers) {
      result[buffer.name] = this.bufferData(buffer);
    }
    return result;
  }

  private bufferData(buffer: Buffer): Scalar[] {
    const data = this.storage.get(buffer);
    if (!data) {
      throw runtimeError(`Buffer '${buffer.name}' is not a parameter of the function`);
    }
    return data;
  }

  private offsets(buffer: Buffer, indices: readonly Expr[]): number[] {
    const shape = this.shapes.get(buffer);
    if (!shape || shape.length !== indices.length) {
      throw runtimeError(
        `Buffer '${buffer.name}' accessed with ${indices.length} indices`,
      );
    }
    const values = indices.map((index) => this.evalExpr(index));
    const lanes = values.reduce<number>((max, value) => Math.max(max, lanesOf(value)), 1);
    const result: number[] = [];
    for (let lane = 0; lane < lanes; lane++) {
      let flat = 0n;
      values.forEach((value, dim) => {
        const extent = shape[dim] ?? 0n;
        const index = toBigInt(laneAt(value, lane));
        if (index < 0n || index >= extent) {
          throw runtimeError(
            `Index ${index.toString()} out of bounds for dimension ${dim} of '${buffer.name}' (extent ${extent.toString()})`,
          );
        }
        flat = flat * extent + index;
      });
      result.push(Number(flat));
    }
    return result;
  }

  evalExpr(expr: Expr): Value {
    switch (expr.kind) {
      case ExprKind.Var: {
        const value = this.env.get(expr);
        if (value === undefined) {
          throw runtimeError(`Variable '${expr.name}' is not bound`);
        }
        return value;
      }
      case ExprKind.IntImm:
        return wrapToType(expr.value, expr.dtype);
      case ExprKind.FloatImm:
        return expr.value;
      case ExprKind.Add:
      case ExprKind.Sub:
      case ExprKind.Mul:
      case ExprKind.FloorDiv:
      case ExprKind.FloorMod:
      case ExprKind.Min:
      case ExprKind.Max: {
        const kind = expr.kind;
        const dtype = expr.dtype.element();
        return lanewise([this.evalExpr(expr.a), this.evalExpr(expr.b)], ([a = 0n, b = 0n]) =>
          dtype.isFloat()
            ? floatArith(kind, toNumber(a), toNumber(b))
            : wrapToType(intArith(kind, toBigInt(a), toBigInt(b)), dtype),
        );
      }
      case ExprKind.Compare: {
        const op = expr.op;
        return lanewise([this.evalExpr(expr.a), this.evalExpr(expr.b)], ([a = 0n, b = 0n]) =>
          compareScalars(op, a, b) ? 1n : 0n,
        );
      }
      case ExprKind.And:
        return lanewise([this.evalExpr(expr.a), this.evalExpr(expr.b)], ([a = 0n, b = 0n]) =>
          isTruthy(a) && isTruthy(b) ? 1n : 0n,
        );
      case ExprKind.Or:
        return lanewise([this.evalExpr(expr.a), this.evalExpr(expr.b)], ([a = 0n, b = 0n]) =>
          isTruthy(a) || isTruthy(b) ? 1n : 0n,
        );
      case ExprKind.Not:
        return lanewise([this.evalExpr(expr.value)], ([value = 0n]) =>
          isTruthy(value) ? 0n : 1n,
        );
      case ExprKind.Select:
        return lanewise(
          [
            this.evalExpr(expr.condition),
            this.evalExpr(expr.trueValue),
            this.evalExpr(expr.falseValue),
          ],
          ([condition = 0n, trueValue = 0n, falseValue = 0n]) =>
            isTruthy(condition) ? trueValue : falseValue,
        );
      case ExprKind.Cast: {
        const dtype = expr.dtype.element();
        return lanewise([this.evalExpr(expr.value)], ([value = 0n]) =>
          castScalar(value, dtype),
        );
      }
      case ExprKind.BufferLoad: {
        const data = this.bufferData(expr.buffer);
        const values = this.offsets(expr.buffer, expr.indices).map((offset) => {
          const value = data[offset];
          if (value === undefined) {
            throw runtimeError(`Offset ${offset} out of bounds for '${expr.buffer.name}'`);
          }
          return value;
        });
        return values.length === 1 ? laneAt(values, 0) : values;
      }
      case ExprKind.Ramp: {
        const base = toBigInt(scalarOf(this.evalExpr(expr.base), "Ramp base"));
        const stride = toBigInt(scalarOf(this.evalExpr(expr.stride), "Ramp stride"));
        const dtype = expr.dtype.element();
        return Array.from({ length: expr.lanes }, (_, lane) =>
          wrapToType(base + stride * BigInt(lane), dtype),
        );
      }
      case ExprKind.Broadcast: {
        const value = scalarOf(this.evalExpr(expr.value), "Broadcast value");
        return Array.from({ length: expr.lanes }, () => value);
      }
      case ExprKind.Call: {
        const extern = this.options.externs?.[expr.op];
        if (!extern) throw runtimeError(`Unknown call '${expr.op}'`);
        return extern(expr.args.map((arg) => this.evalExpr(arg)));
      }
      default:
        return unreachable(expr, "expression");
    }
  }

  private bindLoop(variable: Var, min: Expr, extent: Expr, body: Stmt): void {
    const start = toBigInt(scalarOf(this.evalExpr(min), "Loop min"));
    const count = toBigInt(scalarOf(this.evalExpr(extent), "Loop extent"));
    for (let offset = 0n; offset < count; offset++) {
      this.iterations++;
      if (this.iterations > this.maxIterations) {
        throw runtimeError(`Exceeded ${this.maxIterations} loop iterations`);
      }
      this.env.set(variable, castScalar(start + offset, variable.dtype));
      this.execStmt(body);
    }
    this.env.delete(variable);
  }

  execStmt(stmt: Stmt): void {
    switch (stmt.kind) {
      case StmtKind.For:
        this.bindLoop(stmt.loopVar, stmt.min, stmt.extent, stmt.body);
        return;
      case StmtKind.ThreadBinding:
        // Threads run one after another.
        this.bindLoop(
          stmt.threadVar,
          createIntImm(0n, stmt.extent.dtype),
          stmt.extent,
          stmt.body,
        );
        return;
      case StmtKind.Block: {
        const values = stmt.iterValues.map((value) => this.evalExpr(value));
        stmt.iterVars.forEach((iter, index) => {
          const value = values[index];
          if (value === undefined) {
            throw runtimeError(`Block '${stmt.name}' has no binding for '${iter.variable.name}'`);
          }
          this.env.set(iter.variable, lanewise([value], ([lane = 0n]) => castScalar(lane, iter.variable.dtype)));
        });
        const enabled =
          !stmt.predicate ||
          isTruthy(scalarOf(this.evalExpr(stmt.predicate), "Block predicate"));
        if (enabled) this.execStmt(stmt.body);
        for (const iter of stmt.iterVars) this.env.delete(iter.variable);
        return;
      }
      case StmtKind.IfThenElse:
        if (isTruthy(scalarOf(this.evalExpr(stmt.condition), "Condition"))) {
          this.execStmt(stmt.thenCase);
        } else if (stmt.elseCase) {
          this.execStmt(stmt.elseCase);
        }
        return;
      case StmtKind.BufferStore: {
        const data = this.bufferData(stmt.buffer);
        const offsets = this.offsets(stmt.buffer, stmt.indices);
        const value = this.evalExpr(stmt.value);
        const element = stmt.buffer.dtype.element();
        offsets.forEach((offset, lane) => {
          data[offset] = castScalar(laneAt(value, lane), element);
        });
        return;
      }
      case StmtKind.Seq:
        for (const child of stmt.stmts) this.execStmt(child);
        return;
      case StmtKind.Evaluate:
        this.evalExpr(stmt.value);
        return;
      default:
        unreachable(stmt, "statement");
    }
  }
}

/**
 * Execute func and return the final contents of every buffer parameter.
 */
export const runPrimFunc = (
  func: PrimFunc,
  options: RunOptions = {},
): BufferContents => {
  return new Interpreter(func, options).run();
};
