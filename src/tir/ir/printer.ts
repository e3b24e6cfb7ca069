/**
 * Script-like text rendering of the IR
 */

import { DataTypes } from "./data_type.js";
import { type Expr, ExprKind } from "./expr.js";
import type { IRModule, PrimFunc } from "./prim_func.js";
import { type Stmt, StmtKind } from "./stmt.js";
import { unreachable } from "../utils/traversal.js";

const INDENT = "  ";

// Higher binds tighter.
const precedence = (expr: Expr): number => {
  switch (expr.kind) {
    case ExprKind.Or:
      return 1;
    case ExprKind.And:
      return 2;
    case ExprKind.Not:
      return 3;
    case ExprKind.Compare:
      return 4;
    case ExprKind.Add:
    case ExprKind.Sub:
      return 5;
    case ExprKind.Mul:
      return 6;
    default:
      return 10;
  }
};

const wrap = (child: Expr, minPrecedence: number): string => {
  const text = printExpr(child);
  return precedence(child) < minPrecedence ? `(${text})` : text;
};

const infix = (expr: Expr, a: Expr, b: Expr, op: string): string => {
  const level = precedence(expr);
  // Left-associative: the right operand needs parentheses at equal precedence.
  return `${wrap(a, level)} ${op} ${wrap(b, level + 1)}`;
};

export function printExpr(expr: Expr): string {
  switch (expr.kind) {
    case ExprKind.Var:
      return expr.name;
    case ExprKind.IntImm:
      return expr.dtype.equals(DataTypes.int32)
        ? expr.value.toString()
        : `${expr.dtype.toString()}(${expr.value.toString()})`;
    case ExprKind.FloatImm:
      return `${expr.dtype.toString()}(${String(expr.value)})`;
    case ExprKind.Add:
      return infix(expr, expr.a, expr.b, "+");
    case ExprKind.Sub:
      return infix(expr, expr.a, expr.b, "-");
    case ExprKind.Mul:
      return infix(expr, expr.a, expr.b, "*");
    case ExprKind.FloorDiv:
      return `floordiv(${printExpr(expr.a)}, ${printExpr(expr.b)})`;
    case ExprKind.FloorMod:
      return `floormod(${printExpr(expr.a)}, ${printExpr(expr.b)})`;
    case ExprKind.Min:
      return `min(${printExpr(expr.a)}, ${printExpr(expr.b)})`;
    case ExprKind.Max:
      return `max(${printExpr(expr.a)}, ${printExpr(expr.b)})`;
    case ExprKind.Compare:
      return infix(expr, expr.a, expr.b, expr.op);
    case ExprKind.And:
      return infix(expr, expr.a, expr.b, "and");
    case ExprKind.Or:
      return infix(expr, expr.a, expr.b, "or");
    case ExprKind.Not:
      return `not ${wrap(expr.value, precedence(expr))}`;
    case ExprKind.Select:
      return `select(${printExpr(expr.condition)}, ${printExpr(expr.trueValue)}, ${printExpr(expr.falseValue)})`;
    case ExprKind.Cast:
      return `cast(${expr.dtype.toString()}, ${printExpr(expr.value)})`;
    case ExprKind.BufferLoad:
      return `${expr.buffer.name}[${expr.indices.map(printExpr).join(", ")}]`;
    case ExprKind.Ramp:
      return `ramp(${printExpr(expr.base)}, ${printExpr(expr.stride)}, ${expr.lanes})`;
    case ExprKind.Broadcast:
      return `broadcast(${printExpr(expr.value)}, ${expr.lanes})`;
    case ExprKind.Call:
      return `${expr.op}(${expr.args.map(printExpr).join(", ")}): ${expr.dtype.toString()}`;
    default:
      return unreachable(expr, "expression");
  }
}

const printStmtLines = (stmt: Stmt, depth: number, out: string[]): void => {
  const pad = INDENT.repeat(depth);
  switch (stmt.kind) {
    case StmtKind.For:
      out.push(
        `${pad}for ${stmt.loopVar.name}: ${stmt.loopVar.dtype.toString()} in ${stmt.forKind}(${printExpr(stmt.min)}, ${printExpr(stmt.extent)}):`,
      );
      printStmtLines(stmt.body, depth + 1, out);
      return;
    case StmtKind.ThreadBinding:
      out.push(
        `${pad}${stmt.threadVar.name}: ${stmt.threadVar.dtype.toString()} = thread_binding("${stmt.threadTag}", ${printExpr(stmt.extent)})`,
      );
      printStmtLines(stmt.body, depth, out);
      return;
    case StmtKind.Block: {
      out.push(`${pad}with block("${stmt.name}"):`);
      const inner = INDENT.repeat(depth + 1);
      stmt.iterVars.forEach((iter, index) => {
        const value = stmt.iterValues[index];
        const binding = value ? printExpr(value) : "?";
        out.push(
          `${inner}${iter.variable.name}: ${iter.variable.dtype.toString()} = axis.${iter.iterType}((${printExpr(iter.min)}, ${printExpr(iter.extent)}), ${binding})`,
        );
      });
      if (stmt.predicate) {
        out.push(`${inner}where(${printExpr(stmt.predicate)})`);
      }
      printStmtLines(stmt.body, depth + 1, out);
      return;
    }
    case StmtKind.IfThenElse:
      out.push(`${pad}if ${printExpr(stmt.condition)}:`);
      printStmtLines(stmt.thenCase, depth + 1, out);
      if (stmt.elseCase) {
        out.push(`${pad}else:`);
        printStmtLines(stmt.elseCase, depth + 1, out);
      }
      return;
    case StmtKind.BufferStore:
      out.push(
        `${pad}${stmt.buffer.name}[${stmt.indices.map(printExpr).join(", ")}] = ${printExpr(stmt.value)}`,
      );
      return;
    case StmtKind.Seq:
      for (const child of stmt.stmts) printStmtLines(child, depth, out);
      return;
    case StmtKind.Evaluate:
      out.push(`${pad}${printExpr(stmt.value)}`);
      return;
    default:
      unreachable(stmt, "statement");
  }
};

export function printStmt(stmt: Stmt, depth = 0): string {
  const out: string[] = [];
  printStmtLines(stmt, depth, out);
  return out.join("\n");
}

export function printFunc(name: string, func: PrimFunc): string {
  const params = [
    ...func.buffers.map(
      (buffer) =>
        `${buffer.name}: Buffer((${buffer.shape.map(printExpr).join(", ")}), "${buffer.dtype.toString()}")`,
    ),
    ...func.params.map(
      (param) => `${param.name}: ${param.dtype.toString()}`,
    ),
  ];
  return `def ${name}(${params.join(", ")}):\n${printStmt(func.body, 1)}`;
}

export function printModule(module: IRModule): string {
  return Array.from(module.functions.entries())
    .map(([name, func]) => printFunc(name, func))
    .join("\n\n");
}
