import {
  type DataType,
  fitsInRange,
  getIntegerRange,
} from "../ir/data_type.js";
import {
  createArith,
  createBroadcast,
  createCast,
  createCompare,
  createIntImm,
  createRamp,
  createSelect,
  createVar,
  type Expr,
  ExprKind,
  getLiteralValue,
  type Var,
} from "../ir/expr.js";
import { type PrimFunc, withBody } from "../ir/prim_func.js";
import { type IterVar, type Stmt, StmtKind } from "../ir/stmt.js";
import { unreachable } from "../utils/traversal.js";
import type { DecisionMap } from "./width_decision.js";

const sameList = <T>(a: readonly T[], b: readonly T[]): boolean =>
  a.length === b.length && a.every((item, index) => item === b[index]);

/**
 * Re-emit an integer literal (or a broadcast of one) at dtype, or null when
 * the value does not fit.
 */
const retypeLiteral = (expr: Expr, dtype: DataType): Expr | null => {
  const value = getLiteralValue(expr);
  if (value === null) return null;
  const range = getIntegerRange(dtype);
  if (!range || !fitsInRange(value, range)) return null;
  if (expr.kind === ExprKind.Broadcast) {
    return createBroadcast(createIntImm(value, dtype.element()), expr.lanes);
  }
  return createIntImm(value, dtype);
};

/**
 * expr at exactly dtype: unchanged, a re-emitted literal, or a cast.
 */
export const coerce = (expr: Expr, dtype: DataType): Expr => {
  if (expr.dtype.equals(dtype)) return expr;
  return retypeLiteral(expr, dtype) ?? createCast(dtype, expr);
};

/**
 * The operand of a cast that widens a value from exactly dtype, or null.
 */
const peelWideningCast = (expr: Expr, dtype: DataType): Expr | null =>
  expr.kind === ExprKind.Cast && expr.value.dtype.equals(dtype) ? expr.value : null;

/**
 * Bring two operands to one dtype. A wide literal follows a narrower operand
 * when its value fits, and a cast up from the narrower dtype is dropped;
 * otherwise the narrower operand is cast up.
 */
const unifyOperands = (a: Expr, b: Expr): [Expr, Expr] => {
  if (a.dtype.equals(b.dtype)) return [a, b];
  if (a.dtype.bits > b.dtype.bits) {
    const narrowed = retypeLiteral(a, b.dtype) ?? peelWideningCast(a, b.dtype);
    return narrowed ? [narrowed, b] : [a, coerce(b, a.dtype)];
  }
  if (b.dtype.bits > a.dtype.bits) {
    const narrowed = retypeLiteral(b, a.dtype) ?? peelWideningCast(b, a.dtype);
    return narrowed ? [a, narrowed] : [coerce(a, b.dtype), b];
  }
  return [a, coerce(b, a.dtype)];
};

/**
 * Rebuild func with every declared variable retyped to its resolved dtype.
 *
 * Each retyped variable gets one fresh Var, substituted at its declaration and
 * at every reference. Subtrees without a retyped variable are returned as is,
 * so the input is shared rather than copied and never mutated.
 */
export const rewriteDataTypes = (
  func: PrimFunc,
  dtypes: DecisionMap,
): PrimFunc => {
  const substitution = new Map<Var, Var>();
  for (const [variable, dtype] of dtypes) {
    if (!variable.dtype.equals(dtype)) {
      substitution.set(variable, createVar(variable.name, dtype));
    }
  }
  if (substitution.size === 0) return func;

  const exprMemo = new Map<Expr, Expr>();

  const mutateExpr = (expr: Expr): Expr => {
    const cached = exprMemo.get(expr);
    if (cached) return cached;
    const result = rebuildExpr(expr);
    exprMemo.set(expr, result);
    return result;
  };

  // Operands whose dtype is fixed by their consumer go back to it.
  const restore = (original: Expr): Expr =>
    coerce(mutateExpr(original), original.dtype);

  const rebuildExpr = (expr: Expr): Expr => {
    switch (expr.kind) {
      case ExprKind.Var:
        return substitution.get(expr) ?? expr;
      case ExprKind.IntImm:
      case ExprKind.FloatImm:
        return expr;
      case ExprKind.Add:
      case ExprKind.Sub:
      case ExprKind.Mul:
      case ExprKind.FloorDiv:
      case ExprKind.FloorMod:
      case ExprKind.Min:
      case ExprKind.Max: {
        const a = mutateExpr(expr.a);
        const b = mutateExpr(expr.b);
        if (a === expr.a && b === expr.b) return expr;
        const [ua, ub] = unifyOperands(a, b);
        return createArith(expr.kind, ua, ub, ua.dtype);
      }
      case ExprKind.Compare: {
        const a = mutateExpr(expr.a);
        const b = mutateExpr(expr.b);
        if (a === expr.a && b === expr.b) return expr;
        const [ua, ub] = unifyOperands(a, b);
        return createCompare(expr.op, ua, ub);
      }
      case ExprKind.And:
      case ExprKind.Or: {
        const a = mutateExpr(expr.a);
        const b = mutateExpr(expr.b);
        if (a === expr.a && b === expr.b) return expr;
        return { ...expr, a, b };
      }
      case ExprKind.Not: {
        const value = mutateExpr(expr.value);
        return value === expr.value ? expr : { ...expr, value };
      }
      case ExprKind.Select: {
        const condition = mutateExpr(expr.condition);
        const trueValue = mutateExpr(expr.trueValue);
        const falseValue = mutateExpr(expr.falseValue);
        if (
          condition === expr.condition &&
          trueValue === expr.trueValue &&
          falseValue === expr.falseValue
        ) {
          return expr;
        }
        const [t, f] = unifyOperands(trueValue, falseValue);
        return createSelect(condition, t, f);
      }
      case ExprKind.Cast: {
        const value = mutateExpr(expr.value);
        if (value === expr.value) return expr;
        if (value.dtype.equals(expr.dtype)) return value;
        return createCast(expr.dtype, value);
      }
      case ExprKind.BufferLoad: {
        const indices = expr.indices.map(mutateExpr);
        return sameList(indices, expr.indices) ? expr : { ...expr, indices };
      }
      case ExprKind.Ramp: {
        const base = mutateExpr(expr.base);
        const stride = mutateExpr(expr.stride);
        if (base === expr.base && stride === expr.stride) return expr;
        const [ub, us] = unifyOperands(base, stride);
        return createRamp(ub, us, expr.lanes);
      }
      case ExprKind.Broadcast: {
        const value = mutateExpr(expr.value);
        return value === expr.value ? expr : createBroadcast(value, expr.lanes);
      }
      case ExprKind.Call: {
        const args = expr.args.map(restore);
        return sameList(args, expr.args) ? expr : { ...expr, args };
      }
      default:
        return unreachable(expr, "expression");
    }
  };

  const retype = (variable: Var): Var => substitution.get(variable) ?? variable;

  /**
   * Expression bound to a declared variable (loop range, iter domain, iter
   * value) follows the variable's new dtype.
   */
  const bindTo = (original: Expr, variable: Var): Expr => {
    const next = mutateExpr(original);
    if (next === original && !substitution.has(variable)) return original;
    return coerce(next, retype(variable).dtype);
  };

  const mutateStmt = (stmt: Stmt): Stmt => {
    switch (stmt.kind) {
      case StmtKind.For: {
        const loopVar = retype(stmt.loopVar);
        const min = bindTo(stmt.min, stmt.loopVar);
        const extent = bindTo(stmt.extent, stmt.loopVar);
        const body = mutateStmt(stmt.body);
        if (
          loopVar === stmt.loopVar &&
          min === stmt.min &&
          extent === stmt.extent &&
          body === stmt.body
        ) {
          return stmt;
        }
        return { ...stmt, loopVar, min, extent, body };
      }
      case StmtKind.ThreadBinding: {
        const threadVar = retype(stmt.threadVar);
        const extent = bindTo(stmt.extent, stmt.threadVar);
        const body = mutateStmt(stmt.body);
        if (
          threadVar === stmt.threadVar &&
          extent === stmt.extent &&
          body === stmt.body
        ) {
          return stmt;
        }
        return { ...stmt, threadVar, extent, body };
      }
      case StmtKind.Block: {
        const iterVars = stmt.iterVars.map((iter): IterVar => {
          const variable = retype(iter.variable);
          const min = bindTo(iter.min, iter.variable);
          const extent = bindTo(iter.extent, iter.variable);
          if (
            variable === iter.variable &&
            min === iter.min &&
            extent === iter.extent
          ) {
            return iter;
          }
          return { ...iter, variable, min, extent };
        });
        const iterValues = stmt.iterValues.map((value, index) => {
          const iter = stmt.iterVars[index];
          return iter ? bindTo(value, iter.variable) : mutateExpr(value);
        });
        const predicate = stmt.predicate ? mutateExpr(stmt.predicate) : undefined;
        const body = mutateStmt(stmt.body);
        if (
          sameList(iterVars, stmt.iterVars) &&
          sameList(iterValues, stmt.iterValues) &&
          predicate === stmt.predicate &&
          body === stmt.body
        ) {
          return stmt;
        }
        return { ...stmt, iterVars, iterValues, predicate, body };
      }
      case StmtKind.IfThenElse: {
        const condition = mutateExpr(stmt.condition);
        const thenCase = mutateStmt(stmt.thenCase);
        const elseCase = stmt.elseCase ? mutateStmt(stmt.elseCase) : undefined;
        if (
          condition === stmt.condition &&
          thenCase === stmt.thenCase &&
          elseCase === stmt.elseCase
        ) {
          return stmt;
        }
        return { ...stmt, condition, thenCase, elseCase };
      }
      case StmtKind.BufferStore: {
        const indices = stmt.indices.map(mutateExpr);
        const value = restore(stmt.value);
        if (sameList(indices, stmt.indices) && value === stmt.value) return stmt;
        return { ...stmt, indices, value };
      }
      case StmtKind.Seq: {
        const stmts = stmt.stmts.map(mutateStmt);
        return sameList(stmts, stmt.stmts) ? stmt : { ...stmt, stmts };
      }
      case StmtKind.Evaluate: {
        const value = restore(stmt.value);
        return value === stmt.value ? stmt : { ...stmt, value };
      }
      default:
        return unreachable(stmt, "statement");
    }
  };

  const body = mutateStmt(func.body);
  return body === func.body ? func : withBody(func, body);
};
