import type { Buffer, Expr, Var } from "../ir/expr.js";
import { createIntImm, ExprKind } from "../ir/expr.js";
import type { PrimFunc } from "../ir/prim_func.js";
import { type Stmt, StmtKind } from "../ir/stmt.js";
import {
  collectVars,
  getExprChildren,
  unreachable,
} from "../utils/traversal.js";
import { type Interval, pointInterval, UNBOUNDED, unionIntervals } from "./interval.js";

export enum CandidateOrigin {
  Loop = "loop",
  Thread = "thread",
  BlockIter = "block-iter",
}

export interface Candidate {
  readonly variable: Var;
  readonly origin: CandidateOrigin;
  readonly interval: Interval;
  /** Literal extent, when both min and extent are integer literals */
  readonly extent: bigint | null;
  /** Declared more than once; interval and extent are the union */
  readonly redeclared: boolean;
}

/**
 * Where an expression root sits in its statement
 */
export enum SiteContext {
  LoopMin = "loop-min",
  LoopExtent = "loop-extent",
  ThreadExtent = "thread-extent",
  IterMin = "iter-min",
  IterExtent = "iter-extent",
  IterValue = "iter-value",
  BlockPredicate = "block-predicate",
  Condition = "condition",
  StoreIndex = "store-index",
  StoreValue = "store-value",
  Evaluate = "evaluate",
}

export interface ExprRoot {
  readonly expr: Expr;
  readonly context: SiteContext;
}

export interface IndexSite {
  readonly buffer: Buffer;
  readonly access: "load" | "store";
  readonly position: number;
  readonly index: Expr;
  /** Declared candidate variables referenced by the index */
  readonly vars: ReadonlySet<Var>;
}

export interface CollectedFunction {
  readonly candidates: ReadonlyMap<Var, Candidate>;
  /**
   * Buffer accesses and the candidates they index with. The decision engine
   * scans `roots`, which cover these indices; the sites are for callers
   * inspecting access patterns.
   */
  readonly indexSites: readonly IndexSite[];
  readonly roots: readonly ExprRoot[];
}

const declaredInterval = (
  min: Expr,
  extent: Expr,
): { interval: Interval; extent: bigint | null } => {
  if (min.kind !== ExprKind.IntImm || extent.kind !== ExprKind.IntImm) {
    return { interval: UNBOUNDED, extent: null };
  }
  // An empty range never binds the variable; keep the interval well-formed.
  if (extent.value <= 0n) {
    return { interval: pointInterval(min.value), extent: extent.value };
  }
  return {
    interval: { min: min.value, max: min.value + extent.value - 1n },
    extent: extent.value,
  };
};

/**
 * Single walk over the function body gathering narrowing candidates,
 * buffer index sites and every expression root.
 */
export const collectCandidates = (func: PrimFunc): CollectedFunction => {
  const candidates = new Map<Var, Candidate>();
  const roots: ExprRoot[] = [];
  const rawSites: Omit<IndexSite, "vars">[] = [];
  const visited = new Set<Expr>();

  const declare = (
    variable: Var,
    origin: CandidateOrigin,
    min: Expr,
    extent: Expr,
  ): void => {
    const declared = declaredInterval(min, extent);
    const existing = candidates.get(variable);
    if (existing) {
      candidates.set(variable, {
        ...existing,
        redeclared: true,
        interval: unionIntervals(existing.interval, declared.interval),
        extent:
          existing.extent !== null &&
          declared.extent !== null &&
          declared.extent > existing.extent
            ? declared.extent
            : existing.extent,
      });
      return;
    }
    candidates.set(variable, { variable, origin, ...declared, redeclared: false });
  };

  const visitExpr = (expr: Expr, context: SiteContext): void => {
    roots.push({ expr, context });
    const stack: Expr[] = [expr];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current || visited.has(current)) continue;
      visited.add(current);
      if (current.kind === ExprKind.BufferLoad) {
        current.indices.forEach((index, position) => {
          rawSites.push({
            buffer: current.buffer,
            access: "load",
            position,
            index,
          });
        });
      }
      stack.push(...getExprChildren(current));
    }
  };

  const visitStmt = (stmt: Stmt): void => {
    switch (stmt.kind) {
      case StmtKind.For:
        declare(stmt.loopVar, CandidateOrigin.Loop, stmt.min, stmt.extent);
        visitExpr(stmt.min, SiteContext.LoopMin);
        visitExpr(stmt.extent, SiteContext.LoopExtent);
        visitStmt(stmt.body);
        return;
      case StmtKind.ThreadBinding:
        declare(
          stmt.threadVar,
          CandidateOrigin.Thread,
          createIntImm(0n, stmt.extent.dtype),
          stmt.extent,
        );
        visitExpr(stmt.extent, SiteContext.ThreadExtent);
        visitStmt(stmt.body);
        return;
      case StmtKind.Block:
        for (const iter of stmt.iterVars) {
          declare(iter.variable, CandidateOrigin.BlockIter, iter.min, iter.extent);
          visitExpr(iter.min, SiteContext.IterMin);
          visitExpr(iter.extent, SiteContext.IterExtent);
        }
        for (const value of stmt.iterValues) {
          visitExpr(value, SiteContext.IterValue);
        }
        if (stmt.predicate) visitExpr(stmt.predicate, SiteContext.BlockPredicate);
        visitStmt(stmt.body);
        return;
      case StmtKind.IfThenElse:
        visitExpr(stmt.condition, SiteContext.Condition);
        visitStmt(stmt.thenCase);
        if (stmt.elseCase) visitStmt(stmt.elseCase);
        return;
      case StmtKind.BufferStore:
        stmt.indices.forEach((index, position) => {
          rawSites.push({ buffer: stmt.buffer, access: "store", position, index });
          visitExpr(index, SiteContext.StoreIndex);
        });
        visitExpr(stmt.value, SiteContext.StoreValue);
        return;
      case StmtKind.Seq:
        for (const child of stmt.stmts) visitStmt(child);
        return;
      case StmtKind.Evaluate:
        visitExpr(stmt.value, SiteContext.Evaluate);
        return;
      default:
        unreachable(stmt, "statement");
    }
  };

  visitStmt(func.body);

  const indexSites: IndexSite[] = rawSites.map((site) => {
    const vars = new Set<Var>();
    for (const variable of collectVars(site.index)) {
      if (candidates.has(variable)) vars.add(variable);
    }
    return { ...site, vars };
  });

  return { candidates, indexSites, roots };
};
