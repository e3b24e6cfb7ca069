import type { BoundAnalyzer } from "../analysis/bound_analyzer.js";
import type {
  CandidateOrigin,
  CollectedFunction,
} from "../analysis/candidate_collector.js";
import {
  fitsRange,
  type Interval,
  intervalToString,
  rangeInterval,
} from "../analysis/interval.js";
import {
  type DataType,
  fitsInRange,
  getIntegerRange,
  type IntegerRange,
} from "../ir/data_type.js";
import { type Expr, ExprKind, getLiteralValue, type Var } from "../ir/expr.js";
import { printExpr } from "../ir/printer.js";
import { TirError } from "../errors/tir_errors.js";
import { getExprChildren } from "../utils/traversal.js";

export const MIN_TARGET_BITS = 1;
export const MAX_TARGET_BITS = 64;

export enum DecisionReason {
  Narrowed = "narrowed",
  AlreadyNarrow = "already-narrow",
  Unbounded = "unbounded",
  OutOfRange = "out-of-range",
  OverflowRisk = "overflow-risk",
}

export interface WidthDecision {
  readonly variable: Var;
  readonly origin: CandidateOrigin;
  readonly original: DataType;
  readonly resolved: DataType;
  readonly reason: DecisionReason;
  readonly interval: Interval;
  readonly detail: string;
}

/** Resolved dtype per declared variable, keyed by identity */
export type DecisionMap = ReadonlyMap<Var, DataType>;

export interface WidthDecisions {
  readonly dtypes: DecisionMap;
  /** One record per candidate, in declaration order */
  readonly decisions: readonly WidthDecision[];
}

/**
 * How a wide integer node fares once the eligible variables are narrowed.
 * A literal is flexible: it takes the width of its neighbour when it fits.
 */
type NodeWidth =
  | { readonly kind: "narrow"; readonly vars: ReadonlySet<Var> }
  | { readonly kind: "literal"; readonly value: bigint }
  | { readonly kind: "fixed" };

const FIXED: NodeWidth = { kind: "fixed" };

export const validateTargetBits = (targetBits: number): void => {
  if (
    !Number.isInteger(targetBits) ||
    targetBits < MIN_TARGET_BITS ||
    targetBits > MAX_TARGET_BITS
  ) {
    throw new TirError(
      "InvalidArgument",
      `targetBits must be an integer in [${MIN_TARGET_BITS}, ${MAX_TARGET_BITS}], got ${String(targetBits)}`,
      "targetBits",
    );
  }
};

const isWideInteger = (dtype: DataType, targetBits: number): boolean =>
  dtype.isInteger() && dtype.bits > targetBits;

/**
 * Narrow integer range for dtype. Callers only pass integer dtypes.
 */
const narrowRange = (dtype: DataType, targetBits: number): IntegerRange => {
  const range = getIntegerRange(dtype.withBits(targetBits));
  if (!range) {
    throw new TirError(
      "InternalError",
      `No integer range for ${dtype.toString()}`,
    );
  }
  return range;
};

const unify = (
  a: NodeWidth,
  b: NodeWidth,
  range: IntegerRange,
): NodeWidth => {
  if (a.kind === "fixed" || b.kind === "fixed") return FIXED;
  if (a.kind === "literal" && b.kind === "literal") return FIXED;
  if (a.kind === "narrow" && b.kind === "narrow") {
    return { kind: "narrow", vars: new Set([...a.vars, ...b.vars]) };
  }
  if (a.kind === "narrow" && b.kind === "literal") {
    return fitsInRange(b.value, range) ? a : FIXED;
  }
  if (a.kind === "literal" && b.kind === "narrow") {
    return fitsInRange(a.value, range) ? b : FIXED;
  }
  return FIXED;
};

/**
 * Choose one width per candidate variable.
 *
 * Candidates whose declared range fits the narrow type are assumed narrowed
 * together; every wide node that would then be computed at the narrow width
 * must keep its bound inside the narrow range, otherwise all variables under
 * it stay wide. Removing variables only shrinks the narrowed node set, so the
 * single scan stays sound.
 */
export const decideWidths = (
  collected: CollectedFunction,
  targetBits: number,
  analyzer: BoundAnalyzer,
): WidthDecisions => {
  validateTargetBits(targetBits);

  const rejected = new Map<Var, { reason: DecisionReason; detail: string }>();
  const eligible = new Set<Var>();

  for (const candidate of collected.candidates.values()) {
    const { variable, interval, extent } = candidate;
    const dtype = variable.dtype;
    if (!isWideInteger(dtype, targetBits)) {
      rejected.set(variable, {
        reason: DecisionReason.AlreadyNarrow,
        detail: dtype.isInteger()
          ? `${dtype.toString()} is not wider than ${targetBits} bits`
          : `${dtype.toString()} is not an integer type`,
      });
      continue;
    }
    if (interval.min === null || interval.max === null) {
      rejected.set(variable, {
        reason: DecisionReason.Unbounded,
        detail: "declared range is not constant",
      });
      continue;
    }
    const target = dtype.withBits(targetBits);
    const range = narrowRange(dtype, targetBits);
    if (!fitsRange(interval, range) || (extent !== null && !fitsInRange(extent, range))) {
      rejected.set(variable, {
        reason: DecisionReason.OutOfRange,
        detail: `declared range ${intervalToString(interval)}${extent !== null ? ` (extent ${extent.toString()})` : ""} does not fit ${target.toString()}`,
      });
      continue;
    }
    eligible.add(variable);
  }

  const overflow = new Map<Var, string>();
  const widths = new Map<Expr, NodeWidth>();

  const check = (expr: Expr, width: NodeWidth): NodeWidth => {
    if (width.kind !== "narrow") return width;
    const interval = analyzer.bound(expr);
    const range = narrowRange(expr.dtype, targetBits);
    if (!fitsRange(interval, range)) {
      const detail = `${printExpr(expr)} has bound ${intervalToString(interval)} outside ${expr.dtype.withBits(targetBits).toString()}`;
      for (const variable of width.vars) {
        if (!overflow.has(variable)) overflow.set(variable, detail);
      }
    }
    return width;
  };

  const classifyChildren = (expr: Expr): NodeWidth => {
    for (const child of getExprChildren(expr)) classify(child);
    return FIXED;
  };

  const classify = (expr: Expr): NodeWidth => {
    const cached = widths.get(expr);
    if (cached) return cached;
    const result = compute(expr);
    widths.set(expr, result);
    return result;
  };

  const compute = (expr: Expr): NodeWidth => {
    if (!isWideInteger(expr.dtype, targetBits)) return classifyChildren(expr);
    const literal = getLiteralValue(expr);
    if (literal !== null) return { kind: "literal", value: literal };
    switch (expr.kind) {
      case ExprKind.Var:
        return eligible.has(expr) ? { kind: "narrow", vars: new Set([expr]) } : FIXED;
      case ExprKind.Add:
      case ExprKind.Sub:
      case ExprKind.Mul:
      case ExprKind.FloorDiv:
      case ExprKind.FloorMod:
      case ExprKind.Min:
      case ExprKind.Max: {
        const a = classify(expr.a);
        const b = classify(expr.b);
        return check(expr, unify(a, b, narrowRange(expr.dtype, targetBits)));
      }
      case ExprKind.Select: {
        classify(expr.condition);
        const a = classify(expr.trueValue);
        const b = classify(expr.falseValue);
        return check(expr, unify(a, b, narrowRange(expr.dtype, targetBits)));
      }
      case ExprKind.Ramp: {
        const base = classify(expr.base);
        const stride = classify(expr.stride);
        return check(expr, unify(base, stride, narrowRange(expr.dtype, targetBits)));
      }
      case ExprKind.Broadcast: {
        const value = classify(expr.value);
        return value.kind === "narrow" ? value : FIXED;
      }
      case ExprKind.Cast: {
        // Widening a value that is already at the narrow dtype: the rewrite
        // drops the cast, so the node behaves like a narrow leaf whose bound
        // is the source range.
        const source = expr.value.dtype;
        classifyChildren(expr);
        const range = getIntegerRange(source);
        if (!range || !source.equals(expr.dtype.withBits(targetBits))) return FIXED;
        const inner = analyzer.bound(expr.value);
        analyzer.assume(expr, fitsRange(inner, range) ? inner : rangeInterval(range));
        return { kind: "narrow", vars: new Set() };
      }
      default:
        // Loads and calls keep their declared dtype.
        return classifyChildren(expr);
    }
  };

  for (const root of collected.roots) classify(root.expr);

  const dtypes = new Map<Var, DataType>();
  const decisions: WidthDecision[] = [];
  for (const candidate of collected.candidates.values()) {
    const { variable } = candidate;
    const base = {
      variable,
      origin: candidate.origin,
      original: variable.dtype,
      interval: candidate.interval,
    };
    const note = candidate.redeclared ? "; declared more than once, ranges merged" : "";
    const rejection = rejected.get(variable);
    const risk = overflow.get(variable);
    if (rejection) {
      dtypes.set(variable, variable.dtype);
      decisions.push({
        ...base,
        resolved: variable.dtype,
        reason: rejection.reason,
        detail: rejection.detail + note,
      });
    } else if (risk !== undefined) {
      dtypes.set(variable, variable.dtype);
      decisions.push({
        ...base,
        resolved: variable.dtype,
        reason: DecisionReason.OverflowRisk,
        detail: risk + note,
      });
    } else {
      const resolved = variable.dtype.withBits(targetBits);
      dtypes.set(variable, resolved);
      decisions.push({
        ...base,
        resolved,
        reason: DecisionReason.Narrowed,
        detail: `declared range ${intervalToString(candidate.interval)} fits ${resolved.toString()}${note}`,
      });
    }
  }

  return { dtypes, decisions };
};
