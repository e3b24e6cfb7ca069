import { type Expr, ExprKind, type Var } from "../ir/expr.js";
import { unreachable } from "../utils/traversal.js";
import {
  addIntervals,
  floorDivByInterval,
  floorDivInterval,
  floorModInterval,
  type Interval,
  makeInterval,
  maxIntervals,
  minIntervals,
  mulIntervals,
  pointInterval,
  subIntervals,
  UNBOUNDED,
  unionIntervals,
} from "./interval.js";

const BOOLEAN_INTERVAL: Interval = { min: 0n, max: 1n };

const positiveConstant = (expr: Expr): bigint | null => {
  if (expr.kind !== ExprKind.IntImm) return null;
  return expr.value > 0n ? expr.value : null;
};

/**
 * Bound analysis over integer expressions.
 *
 * Results are cached by node identity: a shared subexpression is analyzed
 * once, while two separately built but structurally equal subtrees each get
 * their own entry. Variable intervals are fixed at construction, so cached
 * results never go stale.
 */
export class BoundAnalyzer {
  private readonly cache = new Map<Expr, Interval>();

  constructor(private readonly varIntervals: ReadonlyMap<Var, Interval>) {}

  get cacheSize(): number {
    return this.cache.size;
  }

  /**
   * Fix the bound of an opaque node known from elsewhere, such as a widening
   * cast whose source dtype limits its value. A node already analyzed keeps
   * its computed bound.
   */
  assume(expr: Expr, interval: Interval): void {
    if (!this.cache.has(expr)) this.cache.set(expr, interval);
  }

  bound(expr: Expr): Interval {
    const cached = this.cache.get(expr);
    if (cached) return cached;
    const result = this.compute(expr);
    this.cache.set(expr, result);
    return result;
  }

  private compute(expr: Expr): Interval {
    switch (expr.kind) {
      case ExprKind.Var:
        return this.varIntervals.get(expr) ?? UNBOUNDED;
      case ExprKind.IntImm:
        return pointInterval(expr.value);
      case ExprKind.FloatImm:
        return UNBOUNDED;
      case ExprKind.Add:
        return addIntervals(this.bound(expr.a), this.bound(expr.b));
      case ExprKind.Sub:
        return subIntervals(this.bound(expr.a), this.bound(expr.b));
      case ExprKind.Mul:
        return mulIntervals(this.bound(expr.a), this.bound(expr.b));
      case ExprKind.Min:
        return minIntervals(this.bound(expr.a), this.bound(expr.b));
      case ExprKind.Max:
        return maxIntervals(this.bound(expr.a), this.bound(expr.b));
      case ExprKind.FloorDiv: {
        const dividend = this.bound(expr.a);
        const divisor = positiveConstant(expr.b);
        if (divisor !== null) return floorDivInterval(dividend, divisor);
        return floorDivByInterval(dividend, this.bound(expr.b));
      }
      case ExprKind.FloorMod: {
        const dividend = this.bound(expr.a);
        const modulus = positiveConstant(expr.b);
        return modulus === null ? UNBOUNDED : floorModInterval(dividend, modulus);
      }
      case ExprKind.Compare:
      case ExprKind.And:
      case ExprKind.Or:
      case ExprKind.Not:
        return BOOLEAN_INTERVAL;
      case ExprKind.Select:
        return unionIntervals(
          this.bound(expr.trueValue),
          this.bound(expr.falseValue),
        );
      case ExprKind.Cast:
        // Independent of the target dtype, except for a cast to bool.
        return expr.dtype.isBool() ? BOOLEAN_INTERVAL : this.bound(expr.value);
      case ExprKind.Ramp: {
        const base = this.bound(expr.base);
        const stride = this.bound(expr.stride);
        const steps = makeInterval(0n, BigInt(Math.max(expr.lanes - 1, 0)));
        return addIntervals(base, mulIntervals(stride, steps));
      }
      case ExprKind.Broadcast:
        return this.bound(expr.value);
      case ExprKind.BufferLoad:
      case ExprKind.Call:
        return UNBOUNDED;
      default:
        return unreachable(expr, "expression");
    }
  }
}

/**
 * One-shot bound of expr under the given variable intervals.
 */
export const bound = (
  expr: Expr,
  varIntervals: ReadonlyMap<Var, Interval>,
): Interval => {
  return new BoundAnalyzer(varIntervals).bound(expr);
};
