import { type Buffer, type Expr, ExprKind, type Var } from "./expr.js";
import type { IRModule, PrimFunc } from "./prim_func.js";
import { type Stmt, StmtKind } from "./stmt.js";

/**
 * Structural comparison up to consistent renaming of variables and buffers.
 *
 * Variables are paired on first encounter and the pairing must stay one to
 * one; names are ignored, dtypes are not.
 */
class StructuralComparator {
  private readonly vars = new Map<Var, Var>();
  private readonly reverseVars = new Map<Var, Var>();
  private readonly buffers = new Map<Buffer, Buffer>();
  private readonly reverseBuffers = new Map<Buffer, Buffer>();

  varEqual(a: Var, b: Var): boolean {
    if (!a.dtype.equals(b.dtype)) return false;
    const mapped = this.vars.get(a);
    const reverse = this.reverseVars.get(b);
    if (mapped || reverse) return mapped === b && reverse === a;
    this.vars.set(a, b);
    this.reverseVars.set(b, a);
    return true;
  }

  bufferEqual(a: Buffer, b: Buffer): boolean {
    const mapped = this.buffers.get(a);
    const reverse = this.reverseBuffers.get(b);
    if (mapped || reverse) return mapped === b && reverse === a;
    if (!a.dtype.equals(b.dtype) || !this.exprListEqual(a.shape, b.shape)) {
      return false;
    }
    this.buffers.set(a, b);
    this.reverseBuffers.set(b, a);
    return true;
  }

  exprListEqual(a: readonly Expr[], b: readonly Expr[]): boolean {
    return (
      a.length === b.length &&
      a.every((item, index) => {
        const other = b[index];
        return other !== undefined && this.exprEqual(item, other);
      })
    );
  }

  exprEqual(a: Expr, b: Expr): boolean {
    if (a.kind !== b.kind || !a.dtype.equals(b.dtype)) return false;
    switch (a.kind) {
      case ExprKind.Var:
        return b.kind === ExprKind.Var && this.varEqual(a, b);
      case ExprKind.IntImm:
        return b.kind === ExprKind.IntImm && a.value === b.value;
      case ExprKind.FloatImm:
        return b.kind === ExprKind.FloatImm && Object.is(a.value, b.value);
      case ExprKind.Add:
      case ExprKind.Sub:
      case ExprKind.Mul:
      case ExprKind.FloorDiv:
      case ExprKind.FloorMod:
      case ExprKind.Min:
      case ExprKind.Max:
      case ExprKind.And:
      case ExprKind.Or:
        return (
          "a" in b && this.exprEqual(a.a, b.a) && this.exprEqual(a.b, b.b)
        );
      case ExprKind.Compare:
        return (
          b.kind === ExprKind.Compare &&
          a.op === b.op &&
          this.exprEqual(a.a, b.a) &&
          this.exprEqual(a.b, b.b)
        );
      case ExprKind.Not:
        return b.kind === ExprKind.Not && this.exprEqual(a.value, b.value);
      case ExprKind.Cast:
        return b.kind === ExprKind.Cast && this.exprEqual(a.value, b.value);
      case ExprKind.Select:
        return (
          b.kind === ExprKind.Select &&
          this.exprEqual(a.condition, b.condition) &&
          this.exprEqual(a.trueValue, b.trueValue) &&
          this.exprEqual(a.falseValue, b.falseValue)
        );
      case ExprKind.BufferLoad:
        return (
          b.kind === ExprKind.BufferLoad &&
          this.bufferEqual(a.buffer, b.buffer) &&
          this.exprListEqual(a.indices, b.indices)
        );
      case ExprKind.Ramp:
        return (
          b.kind === ExprKind.Ramp &&
          a.lanes === b.lanes &&
          this.exprEqual(a.base, b.base) &&
          this.exprEqual(a.stride, b.stride)
        );
      case ExprKind.Broadcast:
        return (
          b.kind === ExprKind.Broadcast &&
          a.lanes === b.lanes &&
          this.exprEqual(a.value, b.value)
        );
      case ExprKind.Call:
        return (
          b.kind === ExprKind.Call &&
          a.op === b.op &&
          this.exprListEqual(a.args, b.args)
        );
      default:
        return false;
    }
  }

  private optionalExprEqual(a: Expr | undefined, b: Expr | undefined): boolean {
    if (a === undefined || b === undefined) return a === b;
    return this.exprEqual(a, b);
  }

  private optionalStmtEqual(a: Stmt | undefined, b: Stmt | undefined): boolean {
    if (a === undefined || b === undefined) return a === b;
    return this.stmtEqual(a, b);
  }

  stmtEqual(a: Stmt, b: Stmt): boolean {
    switch (a.kind) {
      case StmtKind.For:
        return (
          b.kind === StmtKind.For &&
          a.forKind === b.forKind &&
          this.varEqual(a.loopVar, b.loopVar) &&
          this.exprEqual(a.min, b.min) &&
          this.exprEqual(a.extent, b.extent) &&
          this.stmtEqual(a.body, b.body)
        );
      case StmtKind.ThreadBinding:
        return (
          b.kind === StmtKind.ThreadBinding &&
          a.threadTag === b.threadTag &&
          this.varEqual(a.threadVar, b.threadVar) &&
          this.exprEqual(a.extent, b.extent) &&
          this.stmtEqual(a.body, b.body)
        );
      case StmtKind.Block:
        return (
          b.kind === StmtKind.Block &&
          a.name === b.name &&
          a.iterVars.length === b.iterVars.length &&
          a.iterVars.every((iter, index) => {
            const other = b.iterVars[index];
            return (
              other !== undefined &&
              iter.iterType === other.iterType &&
              this.varEqual(iter.variable, other.variable) &&
              this.exprEqual(iter.min, other.min) &&
              this.exprEqual(iter.extent, other.extent)
            );
          }) &&
          this.exprListEqual(a.iterValues, b.iterValues) &&
          this.optionalExprEqual(a.predicate, b.predicate) &&
          this.stmtEqual(a.body, b.body)
        );
      case StmtKind.IfThenElse:
        return (
          b.kind === StmtKind.IfThenElse &&
          this.exprEqual(a.condition, b.condition) &&
          this.stmtEqual(a.thenCase, b.thenCase) &&
          this.optionalStmtEqual(a.elseCase, b.elseCase)
        );
      case StmtKind.BufferStore:
        return (
          b.kind === StmtKind.BufferStore &&
          this.bufferEqual(a.buffer, b.buffer) &&
          this.exprListEqual(a.indices, b.indices) &&
          this.exprEqual(a.value, b.value)
        );
      case StmtKind.Seq:
        return (
          b.kind === StmtKind.Seq &&
          a.stmts.length === b.stmts.length &&
          a.stmts.every((stmt, index) => {
            const other = b.stmts[index];
            return other !== undefined && this.stmtEqual(stmt, other);
          })
        );
      case StmtKind.Evaluate:
        return b.kind === StmtKind.Evaluate && this.exprEqual(a.value, b.value);
      default:
        return false;
    }
  }

  funcEqual(a: PrimFunc, b: PrimFunc): boolean {
    if (
      a.params.length !== b.params.length ||
      a.buffers.length !== b.buffers.length
    ) {
      return false;
    }
    const paramsEqual = a.params.every((param, index) => {
      const other = b.params[index];
      return other !== undefined && this.varEqual(param, other);
    });
    const buffersEqual = a.buffers.every((buffer, index) => {
      const other = b.buffers[index];
      return other !== undefined && this.bufferEqual(buffer, other);
    });
    return paramsEqual && buffersEqual && this.stmtEqual(a.body, b.body);
  }
}

export const structuralEqualExpr = (a: Expr, b: Expr): boolean =>
  new StructuralComparator().exprEqual(a, b);

export const structuralEqualStmt = (a: Stmt, b: Stmt): boolean =>
  new StructuralComparator().stmtEqual(a, b);

export const structuralEqual = (a: PrimFunc, b: PrimFunc): boolean =>
  new StructuralComparator().funcEqual(a, b);

export const structuralEqualModule = (a: IRModule, b: IRModule): boolean => {
  if (a.functions.size !== b.functions.size) return false;
  for (const [name, func] of a.functions) {
    const other = b.functions.get(name);
    if (!other || !structuralEqual(func, other)) return false;
  }
  return true;
};
