/**
 * Integer intervals with infinite endpoints
 */

import type { IntegerRange } from "../ir/data_type.js";

/**
 * Closed interval [min, max]. A null endpoint is minus (min) or plus (max)
 * infinity.
 */
export interface Interval {
  readonly min: bigint | null;
  readonly max: bigint | null;
}

export const UNBOUNDED: Interval = { min: null, max: null };

export const makeInterval = (
  min: bigint | null,
  max: bigint | null,
): Interval => {
  if (min !== null && max !== null && min > max) {
    return { min: max, max: min };
  }
  return { min, max };
};

export const pointInterval = (value: bigint): Interval => ({
  min: value,
  max: value,
});

export const isBounded = (
  interval: Interval,
): interval is { min: bigint; max: bigint } => {
  return interval.min !== null && interval.max !== null;
};

export const isNonNegative = (interval: Interval): boolean => {
  return interval.min !== null && interval.min >= 0n;
};

const bigMin = (a: bigint, b: bigint): bigint => (a < b ? a : b);
const bigMax = (a: bigint, b: bigint): bigint => (a > b ? a : b);

/**
 * Floor division for bigints (bigint "/" truncates toward zero).
 */
export const floorDivBig = (a: bigint, b: bigint): bigint => {
  const q = a / b;
  if (a % b !== 0n && a < 0n !== b < 0n) return q - 1n;
  return q;
};

export const floorModBig = (a: bigint, b: bigint): bigint => {
  return a - floorDivBig(a, b) * b;
};

export const addIntervals = (a: Interval, b: Interval): Interval => {
  return {
    min: a.min === null || b.min === null ? null : a.min + b.min,
    max: a.max === null || b.max === null ? null : a.max + b.max,
  };
};

export const subIntervals = (a: Interval, b: Interval): Interval => {
  return {
    min: a.min === null || b.max === null ? null : a.min - b.max,
    max: a.max === null || b.min === null ? null : a.max - b.min,
  };
};

export const mulIntervals = (a: Interval, b: Interval): Interval => {
  if (isBounded(a) && isBounded(b)) {
    const products = [a.min * b.min, a.min * b.max, a.max * b.min, a.max * b.max];
    return {
      min: products.reduce(bigMin),
      max: products.reduce(bigMax),
    };
  }
  if (isNonNegative(a) && isNonNegative(b) && a.min !== null && b.min !== null) {
    return { min: a.min * b.min, max: null };
  }
  return UNBOUNDED;
};

export const minIntervals = (a: Interval, b: Interval): Interval => {
  return {
    min: a.min === null || b.min === null ? null : bigMin(a.min, b.min),
    max:
      a.max === null ? b.max : b.max === null ? a.max : bigMin(a.max, b.max),
  };
};

export const maxIntervals = (a: Interval, b: Interval): Interval => {
  return {
    min:
      a.min === null ? b.min : b.min === null ? a.min : bigMax(a.min, b.min),
    max: a.max === null || b.max === null ? null : bigMax(a.max, b.max),
  };
};

export const unionIntervals = (a: Interval, b: Interval): Interval => {
  return {
    min: a.min === null || b.min === null ? null : bigMin(a.min, b.min),
    max: a.max === null || b.max === null ? null : bigMax(a.max, b.max),
  };
};

/**
 * floordiv(x, divisor) for a positive constant divisor.
 */
export const floorDivInterval = (x: Interval, divisor: bigint): Interval => {
  if (divisor <= 0n) return UNBOUNDED;
  return {
    min: x.min === null ? null : floorDivBig(x.min, divisor),
    max: x.max === null ? null : floorDivBig(x.max, divisor),
  };
};

/**
 * floordiv(x, d) for a divisor interval with min >= 1. Both operands must be
 * bounded; the extremes sit at the corners.
 */
export const floorDivByInterval = (x: Interval, d: Interval): Interval => {
  if (!isBounded(x) || !isBounded(d) || d.min < 1n) return UNBOUNDED;
  const corners = [
    floorDivBig(x.min, d.min),
    floorDivBig(x.min, d.max),
    floorDivBig(x.max, d.min),
    floorDivBig(x.max, d.max),
  ];
  return {
    min: corners.reduce(bigMin),
    max: corners.reduce(bigMax),
  };
};

/**
 * floormod(x, modulus) for a positive constant modulus.
 */
export const floorModInterval = (x: Interval, modulus: bigint): Interval => {
  if (modulus <= 0n) return UNBOUNDED;
  if (isBounded(x) && x.min >= 0n && x.max < modulus) return x;
  return { min: 0n, max: modulus - 1n };
};

export const rangeInterval = (range: IntegerRange): Interval => ({
  min: range.min,
  max: range.max,
});

export const fitsRange = (interval: Interval, range: IntegerRange): boolean => {
  return (
    interval.min !== null &&
    interval.max !== null &&
    interval.min >= range.min &&
    interval.max <= range.max
  );
};

export const intervalToString = (interval: Interval): string => {
  const min = interval.min === null ? "-inf" : interval.min.toString();
  const max = interval.max === null ? "+inf" : interval.max.toString();
  return `[${min}, ${max}]`;
};
