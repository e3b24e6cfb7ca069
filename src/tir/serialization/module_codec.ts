/**
 * JSON encoding of IR modules
 */

import { ErrorCollector, joinPath } from "../errors/error_collector.js";
import { TirError } from "../errors/tir_errors.js";
import {
  DataType,
  DataTypes,
  fitsInRange,
  getIntegerRange,
} from "../ir/data_type.js";
import {
  type ArithKind,
  type Buffer,
  createAnd,
  createArith,
  createBroadcast,
  createBufferLoad,
  createCall,
  createCast,
  createCompare,
  createFloatImm,
  createIntImm,
  createNot,
  createOr,
  createRamp,
  createSelect,
  createVar,
  type Expr,
  ExprKind,
  type Var,
} from "../ir/expr.js";
import {
  createModule,
  createPrimFunc,
  type IRModule,
  type PrimFunc,
} from "../ir/prim_func.js";
import {
  createBlock,
  createBufferStore,
  createEvaluate,
  createFor,
  createIfThenElse,
  createIterVar,
  createSeq,
  createThreadBinding,
  ForKind,
  IterType,
  type IterVar,
  type Stmt,
  StmtKind,
} from "../ir/stmt.js";
import { unreachable } from "../utils/traversal.js";
import {
  type ArithKindJson,
  type BufferJson,
  type ExprJson,
  type FunctionJson,
  type IntegerJson,
  type IterVarJson,
  type ModuleJson,
  ModuleSchema,
  type StmtJson,
  type VarDeclJson,
} from "./schema.js";

const ARITH_KINDS: Record<ArithKindJson, ArithKind> = {
  Add: ExprKind.Add,
  Sub: ExprKind.Sub,
  Mul: ExprKind.Mul,
  FloorDiv: ExprKind.FloorDiv,
  FloorMod: ExprKind.FloorMod,
  Min: ExprKind.Min,
  Max: ExprKind.Max,
};

const ARITH_NAMES: Record<ArithKind, ArithKindJson> = {
  [ExprKind.Add]: "Add",
  [ExprKind.Sub]: "Sub",
  [ExprKind.Mul]: "Mul",
  [ExprKind.FloorDiv]: "FloorDiv",
  [ExprKind.FloorMod]: "FloorMod",
  [ExprKind.Min]: "Min",
  [ExprKind.Max]: "Max",
};

type ForKindJson = NonNullable<Extract<StmtJson, { kind: "For" }>["forKind"]>;
type IterTypeJson = NonNullable<IterVarJson["iterType"]>;

const FOR_KINDS: Record<ForKindJson, ForKind> = {
  serial: ForKind.Serial,
  parallel: ForKind.Parallel,
  vectorized: ForKind.Vectorized,
  unrolled: ForKind.Unrolled,
};

const FOR_KIND_NAMES: Record<ForKind, ForKindJson> = {
  [ForKind.Serial]: "serial",
  [ForKind.Parallel]: "parallel",
  [ForKind.Vectorized]: "vectorized",
  [ForKind.Unrolled]: "unrolled",
};

const ITER_TYPES: Record<IterTypeJson, IterType> = {
  spatial: IterType.Spatial,
  reduce: IterType.Reduce,
};

const ITER_TYPE_NAMES: Record<IterType, IterTypeJson> = {
  [IterType.Spatial]: "spatial",
  [IterType.Reduce]: "reduce",
};

/**
 * Lexical scope of variable declarations, innermost last
 */
class Scope {
  private readonly frames: Map<string, Var>[] = [new Map()];

  lookup(name: string): Var | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const found = this.frames[i]?.get(name);
      if (found) return found;
    }
    return undefined;
  }

  withFrame<T>(vars: readonly Var[], fn: () => T): T {
    this.frames.push(new Map(vars.map((variable) => [variable.name, variable])));
    try {
      return fn();
    } finally {
      this.frames.pop();
    }
  }

  declare(variable: Var): void {
    this.frames[this.frames.length - 1]?.set(variable.name, variable);
  }
}

class FunctionDecoder {
  private readonly scope = new Scope();
  private readonly buffers = new Map<string, Buffer>();

  constructor(private readonly errors: ErrorCollector) {}

  decode(json: FunctionJson, path: string): PrimFunc {
    const params = json.params.map((param, index) =>
      this.decodeVarDecl(param, joinPath(joinPath(path, "params"), index)),
    );
    params.forEach((param) => this.scope.declare(param));
    const buffers = json.buffers.map((buffer, index) =>
      this.decodeBuffer(buffer, joinPath(joinPath(path, "buffers"), index)),
    );
    const body = this.decodeStmt(json.body, joinPath(path, "body"));
    return createPrimFunc(buffers, body, params);
  }

  private decodeDType(text: string, path: string): DataType {
    const dtype = DataType.parse(text);
    if (dtype) return dtype;
    this.errors.report(
      "MalformedModule",
      `Unknown dtype '${text}'`,
      path,
      "use forms like int32, uint8, float32x4 or bool",
    );
    return DataTypes.int32;
  }

  private decodeVarDecl(json: VarDeclJson, path: string): Var {
    return createVar(json.name, this.decodeDType(json.dtype, joinPath(path, "dtype")));
  }

  private decodeBuffer(json: BufferJson, path: string): Buffer {
    if (this.buffers.has(json.name)) {
      this.errors.report("MalformedModule", `Duplicate buffer '${json.name}'`, path);
    }
    const buffer: Buffer = {
      name: json.name,
      dtype: this.decodeDType(json.dtype, joinPath(path, "dtype")),
      shape: json.shape.map((dim, index) =>
        this.decodeExpr(dim, joinPath(joinPath(path, "shape"), index)),
      ),
    };
    this.buffers.set(json.name, buffer);
    return buffer;
  }

  private lookupBuffer(name: string, path: string): Buffer {
    const buffer = this.buffers.get(name);
    if (buffer) return buffer;
    this.errors.report(
      "UnknownReference",
      `Unknown buffer '${name}'`,
      path,
      "declare it in the function's buffers",
    );
    const placeholder: Buffer = { name, dtype: DataTypes.float32, shape: [] };
    this.buffers.set(name, placeholder);
    return placeholder;
  }

  private decodeInteger(value: IntegerJson, dtype: DataType, path: string): Expr {
    const big = BigInt(value);
    const range = getIntegerRange(dtype);
    if (range && !fitsInRange(big, range)) {
      this.errors.report(
        "MalformedModule",
        `Literal ${big.toString()} does not fit ${dtype.toString()}`,
        path,
      );
    }
    return createIntImm(big, dtype);
  }

  private decodeExprs(list: readonly ExprJson[], path: string): Expr[] {
    return list.map((item, index) => this.decodeExpr(item, joinPath(path, index)));
  }

  decodeExpr(json: ExprJson, path: string): Expr {
    const at = (key: string): string => joinPath(path, key);
    switch (json.kind) {
      case "Var": {
        const found = this.scope.lookup(json.name);
        if (found) return found;
        this.errors.report(
          "UnknownReference",
          `Unknown variable '${json.name}'`,
          path,
          "declare it as a parameter or in an enclosing loop, thread binding or block",
        );
        return createVar(json.name);
      }
      case "IntImm":
        return this.decodeInteger(
          json.value,
          json.dtype ? this.decodeDType(json.dtype, at("dtype")) : DataTypes.int32,
          at("value"),
        );
      case "FloatImm":
        return createFloatImm(
          json.value,
          json.dtype ? this.decodeDType(json.dtype, at("dtype")) : DataTypes.float32,
        );
      case "Add":
      case "Sub":
      case "Mul":
      case "FloorDiv":
      case "FloorMod":
      case "Min":
      case "Max": {
        const a = this.decodeExpr(json.a, at("a"));
        const b = this.decodeExpr(json.b, at("b"));
        const dtype = json.dtype ? this.decodeDType(json.dtype, at("dtype")) : a.dtype;
        return createArith(ARITH_KINDS[json.kind], a, b, dtype);
      }
      case "Compare":
        return createCompare(
          json.op,
          this.decodeExpr(json.a, at("a")),
          this.decodeExpr(json.b, at("b")),
        );
      case "And":
      case "Or": {
        const a = this.decodeExpr(json.a, at("a"));
        const b = this.decodeExpr(json.b, at("b"));
        return json.kind === "And" ? createAnd(a, b) : createOr(a, b);
      }
      case "Not":
        return createNot(this.decodeExpr(json.value, at("value")));
      case "Select":
        return createSelect(
          this.decodeExpr(json.condition, at("condition")),
          this.decodeExpr(json.trueValue, at("trueValue")),
          this.decodeExpr(json.falseValue, at("falseValue")),
        );
      case "Cast":
        return createCast(
          this.decodeDType(json.dtype, at("dtype")),
          this.decodeExpr(json.value, at("value")),
        );
      case "BufferLoad":
        return createBufferLoad(
          this.lookupBuffer(json.buffer, at("buffer")),
          this.decodeExprs(json.indices, at("indices")),
        );
      case "Ramp":
        return createRamp(
          this.decodeExpr(json.base, at("base")),
          this.decodeExpr(json.stride, at("stride")),
          json.lanes,
        );
      case "Broadcast":
        return createBroadcast(this.decodeExpr(json.value, at("value")), json.lanes);
      case "Call":
        return createCall(
          json.op,
          this.decodeExprs(json.args, at("args")),
          this.decodeDType(json.dtype, at("dtype")),
        );
      default:
        return unreachable(json, "expression");
    }
  }

  private decodeIterVar(json: IterVarJson, path: string): IterVar {
    return createIterVar(
      this.decodeVarDecl(json.var, joinPath(path, "var")),
      this.decodeExpr(json.min, joinPath(path, "min")),
      this.decodeExpr(json.extent, joinPath(path, "extent")),
      json.iterType ? ITER_TYPES[json.iterType] : IterType.Spatial,
    );
  }

  decodeStmt(json: StmtJson, path: string): Stmt {
    const at = (key: string): string => joinPath(path, key);
    switch (json.kind) {
      case "For": {
        const loopVar = this.decodeVarDecl(json.var, at("var"));
        const min = this.decodeExpr(json.min, at("min"));
        const extent = this.decodeExpr(json.extent, at("extent"));
        const body = this.scope.withFrame([loopVar], () =>
          this.decodeStmt(json.body, at("body")),
        );
        return createFor(
          loopVar,
          min,
          extent,
          body,
          json.forKind ? FOR_KINDS[json.forKind] : ForKind.Serial,
        );
      }
      case "ThreadBinding": {
        const threadVar = this.decodeVarDecl(json.var, at("var"));
        const extent = this.decodeExpr(json.extent, at("extent"));
        const body = this.scope.withFrame([threadVar], () =>
          this.decodeStmt(json.body, at("body")),
        );
        return createThreadBinding(threadVar, json.threadTag, extent, body);
      }
      case "Block": {
        if (json.iterVars.length !== json.iterValues.length) {
          this.errors.report(
            "MalformedModule",
            `Block '${json.name}' has ${json.iterVars.length} iteration variables but ${json.iterValues.length} bindings`,
            at("iterValues"),
          );
        }
        const iterVars = json.iterVars.map((iter, index) =>
          this.decodeIterVar(iter, joinPath(at("iterVars"), index)),
        );
        const iterValues = this.decodeExprs(json.iterValues, at("iterValues"));
        return this.scope.withFrame(
          iterVars.map((iter) => iter.variable),
          () => {
            const predicate = json.predicate
              ? this.decodeExpr(json.predicate, at("predicate"))
              : undefined;
            const body = this.decodeStmt(json.body, at("body"));
            return createBlock(json.name, iterVars, iterValues, body, predicate);
          },
        );
      }
      case "IfThenElse":
        return createIfThenElse(
          this.decodeExpr(json.condition, at("condition")),
          this.decodeStmt(json.thenCase, at("thenCase")),
          json.elseCase ? this.decodeStmt(json.elseCase, at("elseCase")) : undefined,
        );
      case "BufferStore":
        return createBufferStore(
          this.lookupBuffer(json.buffer, at("buffer")),
          this.decodeExprs(json.indices, at("indices")),
          this.decodeExpr(json.value, at("value")),
        );
      case "Seq":
        return createSeq(
          json.stmts.map((stmt, index) => this.decodeStmt(stmt, joinPath(at("stmts"), index))),
        );
      case "Evaluate":
        return createEvaluate(this.decodeExpr(json.value, at("value")));
      default:
        return unreachable(json, "statement");
    }
  }
}

/**
 * Validate a JSON document and build the module it describes.
 * Throws AggregateTirError listing every problem found.
 */
export function decodeModule(json: unknown): IRModule {
  const errors = new ErrorCollector();
  const parsed = ModuleSchema.safeParse(json);
  if (!parsed.success) {
    errors.reportSchemaIssues(parsed.error.issues);
    errors.throwIfErrors();
    throw new TirError("InternalError", "Schema validation failed without issues");
  }

  const functions: Record<string, PrimFunc> = {};
  for (const [name, func] of Object.entries(parsed.data.functions)) {
    functions[name] = new FunctionDecoder(errors).decode(
      func,
      joinPath("functions", name),
    );
  }
  errors.throwIfErrors();
  return createModule(functions);
}

/**
 * Parse module text (JSON) and decode it.
 */
export function parseModule(text: string): IRModule {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TirError("MalformedModule", `Invalid JSON: ${reason}`);
  }
  return decodeModule(json);
}

const encodeInteger = (value: bigint): IntegerJson => {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
};

const encodeVarDecl = (variable: Var): VarDeclJson => ({
  name: variable.name,
  dtype: variable.dtype.toString(),
});

export function encodeExpr(expr: Expr): ExprJson {
  switch (expr.kind) {
    case ExprKind.Var:
      return { kind: "Var", name: expr.name };
    case ExprKind.IntImm:
      return expr.dtype.equals(DataTypes.int32)
        ? { kind: "IntImm", value: encodeInteger(expr.value) }
        : { kind: "IntImm", value: encodeInteger(expr.value), dtype: expr.dtype.toString() };
    case ExprKind.FloatImm:
      return expr.dtype.equals(DataTypes.float32)
        ? { kind: "FloatImm", value: expr.value }
        : { kind: "FloatImm", value: expr.value, dtype: expr.dtype.toString() };
    case ExprKind.Add:
    case ExprKind.Sub:
    case ExprKind.Mul:
    case ExprKind.FloorDiv:
    case ExprKind.FloorMod:
    case ExprKind.Min:
    case ExprKind.Max:
      return {
        kind: ARITH_NAMES[expr.kind],
        a: encodeExpr(expr.a),
        b: encodeExpr(expr.b),
        ...(expr.dtype.equals(expr.a.dtype) ? {} : { dtype: expr.dtype.toString() }),
      };
    case ExprKind.Compare:
      return { kind: "Compare", op: expr.op, a: encodeExpr(expr.a), b: encodeExpr(expr.b) };
    case ExprKind.And:
      return { kind: "And", a: encodeExpr(expr.a), b: encodeExpr(expr.b) };
    case ExprKind.Or:
      return { kind: "Or", a: encodeExpr(expr.a), b: encodeExpr(expr.b) };
    case ExprKind.Not:
      return { kind: "Not", value: encodeExpr(expr.value) };
    case ExprKind.Select:
      return {
        kind: "Select",
        condition: encodeExpr(expr.condition),
        trueValue: encodeExpr(expr.trueValue),
        falseValue: encodeExpr(expr.falseValue),
      };
    case ExprKind.Cast:
      return { kind: "Cast", dtype: expr.dtype.toString(), value: encodeExpr(expr.value) };
    case ExprKind.BufferLoad:
      return {
        kind: "BufferLoad",
        buffer: expr.buffer.name,
        indices: expr.indices.map(encodeExpr),
      };
    case ExprKind.Ramp:
      return {
        kind: "Ramp",
        base: encodeExpr(expr.base),
        stride: encodeExpr(expr.stride),
        lanes: expr.lanes,
      };
    case ExprKind.Broadcast:
      return { kind: "Broadcast", value: encodeExpr(expr.value), lanes: expr.lanes };
    case ExprKind.Call:
      return {
        kind: "Call",
        op: expr.op,
        args: expr.args.map(encodeExpr),
        dtype: expr.dtype.toString(),
      };
    default:
      return unreachable(expr, "expression");
  }
}

export function encodeStmt(stmt: Stmt): StmtJson {
  switch (stmt.kind) {
    case StmtKind.For:
      return {
        kind: "For",
        var: encodeVarDecl(stmt.loopVar),
        min: encodeExpr(stmt.min),
        extent: encodeExpr(stmt.extent),
        ...(stmt.forKind !== ForKind.Serial ? { forKind: FOR_KIND_NAMES[stmt.forKind] } : {}),
        body: encodeStmt(stmt.body),
      };
    case StmtKind.ThreadBinding:
      return {
        kind: "ThreadBinding",
        var: encodeVarDecl(stmt.threadVar),
        threadTag: stmt.threadTag,
        extent: encodeExpr(stmt.extent),
        body: encodeStmt(stmt.body),
      };
    case StmtKind.Block:
      return {
        kind: "Block",
        name: stmt.name,
        iterVars: stmt.iterVars.map((iter) => ({
          var: encodeVarDecl(iter.variable),
          min: encodeExpr(iter.min),
          extent: encodeExpr(iter.extent),
          ...(iter.iterType !== IterType.Spatial ? { iterType: ITER_TYPE_NAMES[iter.iterType] } : {}),
        })),
        iterValues: stmt.iterValues.map(encodeExpr),
        ...(stmt.predicate ? { predicate: encodeExpr(stmt.predicate) } : {}),
        body: encodeStmt(stmt.body),
      };
    case StmtKind.IfThenElse:
      return {
        kind: "IfThenElse",
        condition: encodeExpr(stmt.condition),
        thenCase: encodeStmt(stmt.thenCase),
        ...(stmt.elseCase ? { elseCase: encodeStmt(stmt.elseCase) } : {}),
      };
    case StmtKind.BufferStore:
      return {
        kind: "BufferStore",
        buffer: stmt.buffer.name,
        indices: stmt.indices.map(encodeExpr),
        value: encodeExpr(stmt.value),
      };
    case StmtKind.Seq:
      return { kind: "Seq", stmts: stmt.stmts.map(encodeStmt) };
    case StmtKind.Evaluate:
      return { kind: "Evaluate", value: encodeExpr(stmt.value) };
    default:
      return unreachable(stmt, "statement");
  }
}

export function encodeModule(module: IRModule): ModuleJson {
  const functions: Record<string, FunctionJson> = {};
  for (const [name, func] of module.functions) {
    functions[name] = {
      params: func.params.map(encodeVarDecl),
      buffers: func.buffers.map((buffer) => ({
        name: buffer.name,
        dtype: buffer.dtype.toString(),
        shape: buffer.shape.map(encodeExpr),
      })),
      body: encodeStmt(func.body),
    };
  }
  return { functions };
}
