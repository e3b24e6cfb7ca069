import { describe, expect, it } from "vitest";
import {
  BoundAnalyzer,
  bound,
  createAdd,
  createBroadcast,
  createBuffer,
  createBufferLoad,
  createCast,
  createCompare,
  createFloorDiv,
  createFloorMod,
  createMax,
  createMin,
  createMul,
  createRamp,
  createSelect,
  createSub,
  createVar,
  DataTypes,
  type Interval,
  type Var,
} from "../../../src/index.js";
import { int64 } from "../../helpers/builders.js";

const i = createVar("i", DataTypes.int64);
const j = createVar("j", DataTypes.int64);
const intervals = new Map<Var, Interval>([
  [i, { min: 0n, max: 15n }],
  [j, { min: 0n, max: 3n }],
]);

describe("BoundAnalyzer", () => {
  it("bounds strided index arithmetic", () => {
    const index = createAdd(createMul(i, int64(4)), j);
    expect(bound(index, intervals)).toEqual({ min: 0n, max: 63n });
  });

  it("treats unknown variables as unbounded", () => {
    const n = createVar("n", DataTypes.int64);
    expect(bound(createAdd(i, n), intervals)).toEqual({ min: null, max: null });
  });

  it("divides and reduces by positive constants", () => {
    expect(bound(createFloorDiv(i, int64(4)), intervals)).toEqual({
      min: 0n,
      max: 3n,
    });
    expect(bound(createFloorMod(createAdd(i, j), int64(8)), intervals)).toEqual({
      min: 0n,
      max: 7n,
    });
    expect(bound(createFloorDiv(i, j), intervals)).toEqual({
      min: null,
      max: null,
    });
    expect(bound(createFloorMod(i, int64(0)), intervals)).toEqual({
      min: null,
      max: null,
    });
  });

  it("divides by a divisor range that stays positive", () => {
    const A = createBuffer("A", [16], DataTypes.int64);
    const divisor = createMax(j, int64(1));
    expect(bound(createFloorDiv(i, divisor), intervals)).toEqual({
      min: 0n,
      max: 15n,
    });
    expect(
      bound(createFloorDiv(createSub(int64(0), i), divisor), intervals),
    ).toEqual({ min: -15n, max: 0n });
    expect(
      bound(createFloorDiv(createBufferLoad(A, [i]), divisor), intervals),
    ).toEqual({ min: null, max: null });
  });

  it("clamps with min and max", () => {
    expect(bound(createMin(i, int64(10)), intervals)).toEqual({
      min: 0n,
      max: 10n,
    });
    expect(
      bound(createMax(createSub(i, int64(20)), int64(0)), intervals),
    ).toEqual({ min: 0n, max: 0n });
  });

  it("joins both arms of a select", () => {
    const select = createSelect(createCompare("<", i, int64(4)), i, j);
    expect(bound(select, intervals)).toEqual({ min: 0n, max: 15n });
  });

  it("bounds a cast by its operand, whatever the target dtype", () => {
    expect(bound(createCast(DataTypes.int32, i), intervals)).toEqual({
      min: 0n,
      max: 15n,
    });
    expect(
      bound(createCast(DataTypes.int8, createMul(i, int64(100))), intervals),
    ).toEqual({ min: 0n, max: 1500n });
    const A = createBuffer("A", [16], DataTypes.int64);
    expect(
      bound(createCast(DataTypes.int32, createBufferLoad(A, [i])), intervals),
    ).toEqual({ min: null, max: null });
    expect(bound(createCast(DataTypes.bool, i), intervals)).toEqual({
      min: 0n,
      max: 1n,
    });
  });

  it("covers every lane of ramps and broadcasts", () => {
    const ramp = createRamp(createMul(i, int64(4)), int64(1), 4);
    expect(bound(ramp, intervals)).toEqual({ min: 0n, max: 63n });
    expect(bound(createBroadcast(j, 4), intervals)).toEqual({ min: 0n, max: 3n });
  });

  it("knows nothing about loaded values", () => {
    const A = createBuffer("A", [16], DataTypes.int64);
    expect(bound(createBufferLoad(A, [i]), intervals)).toEqual({
      min: null,
      max: null,
    });
  });

  it("analyzes a shared subexpression once", () => {
    const product = createMul(i, int64(4));
    const analyzer = new BoundAnalyzer(intervals);
    expect(analyzer.bound(createAdd(product, product))).toEqual({
      min: 0n,
      max: 120n,
    });
    // sum, product, i, literal
    expect(analyzer.cacheSize).toBe(4);
  });

  it("analyzes structurally equal but separate subtrees independently", () => {
    const four = int64(4);
    const analyzer = new BoundAnalyzer(intervals);
    analyzer.bound(createAdd(createMul(i, four), createMul(i, four)));
    // sum, two products, i, literal
    expect(analyzer.cacheSize).toBe(5);
  });

  it("takes an assumed bound for an opaque node", () => {
    const A = createBuffer("A", [16], DataTypes.int8);
    const load = createBufferLoad(A, [i]);
    const widened = createCast(DataTypes.int64, load);
    const analyzer = new BoundAnalyzer(intervals);
    analyzer.assume(widened, { min: -128n, max: 127n });
    expect(analyzer.bound(createAdd(widened, j))).toEqual({
      min: -128n,
      max: 130n,
    });
  });

  it("keeps a computed bound over a later assumption", () => {
    const analyzer = new BoundAnalyzer(intervals);
    const product = createMul(i, int64(2));
    analyzer.bound(product);
    analyzer.assume(product, { min: 0n, max: 1n });
    expect(analyzer.bound(product)).toEqual({ min: 0n, max: 30n });
  });
});
