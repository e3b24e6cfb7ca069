import { TirError } from "../errors/tir_errors.js";
import { type Expr, ExprKind, type Var } from "../ir/expr.js";

export const unreachable = (value: never, what: string): never => {
  const node: unknown = value;
  const kind =
    typeof node === "object" && node !== null && "kind" in node
      ? String(node.kind)
      : String(node);
  throw new TirError("InternalError", `Unhandled ${what} kind: ${kind}`);
};

export const getExprChildren = (expr: Expr): readonly Expr[] => {
  switch (expr.kind) {
    case ExprKind.Var:
    case ExprKind.IntImm:
    case ExprKind.FloatImm:
      return [];
    case ExprKind.Add:
    case ExprKind.Sub:
    case ExprKind.Mul:
    case ExprKind.FloorDiv:
    case ExprKind.FloorMod:
    case ExprKind.Min:
    case ExprKind.Max:
    case ExprKind.Compare:
    case ExprKind.And:
    case ExprKind.Or:
      return [expr.a, expr.b];
    case ExprKind.Not:
    case ExprKind.Cast:
    case ExprKind.Broadcast:
      return [expr.value];
    case ExprKind.Select:
      return [expr.condition, expr.trueValue, expr.falseValue];
    case ExprKind.BufferLoad:
      return expr.indices;
    case ExprKind.Ramp:
      return [expr.base, expr.stride];
    case ExprKind.Call:
      return expr.args;
    default:
      return unreachable(expr, "expression");
  }
};

/**
 * Variables referenced anywhere under expr. Shared subtrees are visited once.
 */
export const collectVars = (expr: Expr): Set<Var> => {
  const vars = new Set<Var>();
  const visited = new Set<Expr>();
  const stack: Expr[] = [expr];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current || visited.has(current)) continue;
    visited.add(current);
    if (current.kind === ExprKind.Var) {
      vars.add(current);
      continue;
    }
    stack.push(...getExprChildren(current));
  }
  return vars;
};
