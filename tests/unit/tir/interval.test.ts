import { describe, expect, it } from "vitest";
import {
  addIntervals,
  DataTypes,
  fitsRange,
  floorDivBig,
  floorDivByInterval,
  floorDivInterval,
  floorModBig,
  floorModInterval,
  getIntegerRange,
  type IntegerRange,
  intervalToString,
  makeInterval,
  maxIntervals,
  minIntervals,
  mulIntervals,
  subIntervals,
  UNBOUNDED,
  unionIntervals,
} from "../../../src/index.js";

const int8Range = (): IntegerRange => {
  const range = getIntegerRange(DataTypes.int8);
  if (!range) throw new Error("int8 has no range");
  return range;
};

describe("interval arithmetic", () => {
  it("adds and subtracts endpoints", () => {
    expect(addIntervals({ min: 0n, max: 9n }, { min: 1n, max: 1n })).toEqual({
      min: 1n,
      max: 10n,
    });
    expect(subIntervals({ min: 0n, max: 9n }, { min: 1n, max: 2n })).toEqual({
      min: -2n,
      max: 8n,
    });
    expect(addIntervals({ min: 0n, max: 9n }, UNBOUNDED)).toEqual(UNBOUNDED);
  });

  it("multiplies signed intervals through all endpoint products", () => {
    expect(mulIntervals({ min: -2n, max: 3n }, { min: 4n, max: 5n })).toEqual({
      min: -10n,
      max: 15n,
    });
  });

  it("keeps a lower bound for half-open non-negative products", () => {
    expect(mulIntervals({ min: 0n, max: null }, { min: 2n, max: 3n })).toEqual({
      min: 0n,
      max: null,
    });
    expect(mulIntervals({ min: -1n, max: null }, { min: 2n, max: 3n })).toEqual(
      UNBOUNDED,
    );
  });

  it("uses floor semantics for division and modulo", () => {
    expect(floorDivBig(-7n, 2n)).toBe(-4n);
    expect(floorDivBig(7n, -2n)).toBe(-4n);
    expect(floorModBig(-7n, 2n)).toBe(1n);
    expect(floorDivInterval({ min: -7n, max: 7n }, 2n)).toEqual({
      min: -4n,
      max: 3n,
    });
    expect(floorDivInterval({ min: 0n, max: 7n }, 0n)).toEqual(UNBOUNDED);
  });

  it("divides by a positive divisor range at its corners", () => {
    expect(floorDivByInterval({ min: -10n, max: 20n }, { min: 1n, max: 4n })).toEqual({
      min: -10n,
      max: 20n,
    });
    expect(floorDivByInterval({ min: 8n, max: 20n }, { min: 3n, max: 4n })).toEqual({
      min: 2n,
      max: 6n,
    });
    expect(floorDivByInterval({ min: 0n, max: 7n }, { min: 0n, max: 4n })).toEqual(
      UNBOUNDED,
    );
    expect(floorDivByInterval({ min: 0n, max: null }, { min: 1n, max: 4n })).toEqual(
      UNBOUNDED,
    );
  });

  it("tightens modulo only when the dividend already lies in range", () => {
    expect(floorModInterval({ min: 0n, max: 5n }, 8n)).toEqual({
      min: 0n,
      max: 5n,
    });
    expect(floorModInterval({ min: 0n, max: 20n }, 8n)).toEqual({
      min: 0n,
      max: 7n,
    });
    expect(floorModInterval({ min: -1n, max: 3n }, 8n)).toEqual({
      min: 0n,
      max: 7n,
    });
  });

  it("takes endpoint-wise min, max and union", () => {
    expect(
      minIntervals({ min: 0n, max: 9n }, { min: null, max: 5n }),
    ).toEqual({ min: null, max: 5n });
    expect(
      maxIntervals({ min: 0n, max: 9n }, { min: null, max: 5n }),
    ).toEqual({ min: 0n, max: 9n });
    expect(
      unionIntervals({ min: 0n, max: 3n }, { min: 5n, max: 9n }),
    ).toEqual({ min: 0n, max: 9n });
  });

  it("checks containment in a type range", () => {
    expect(fitsRange({ min: 0n, max: 127n }, int8Range())).toBe(true);
    expect(fitsRange({ min: 0n, max: 128n }, int8Range())).toBe(false);
    expect(fitsRange(UNBOUNDED, int8Range())).toBe(false);
  });

  it("normalizes and prints intervals", () => {
    expect(makeInterval(5n, 1n)).toEqual({ min: 1n, max: 5n });
    expect(intervalToString({ min: null, max: 5n })).toBe("[-inf, 5]");
    expect(intervalToString(UNBOUNDED)).toBe("[-inf, +inf]");
  });
});
