import { describe, expect, it } from "vitest";
import {
  BoundAnalyzer,
  collectCandidates,
  createAdd,
  createBuffer,
  createBufferLoad,
  createBufferStore,
  createCast,
  createFloatImm,
  createFloorDiv,
  createFor,
  createMax,
  createPrimFunc,
  createSeq,
  createVar,
  DataTypes,
  DecisionReason,
  decideWidths,
  type Expr,
  type Interval,
  type PrimFunc,
  TirError,
  type Var,
  type WidthDecisions,
} from "../../../src/index.js";
import { buildFlatCopy, int64 } from "../../helpers/builders.js";

const decide = (func: PrimFunc, targetBits: number): WidthDecisions => {
  const collected = collectCandidates(func);
  const intervals = new Map<Var, Interval>();
  for (const candidate of collected.candidates.values()) {
    intervals.set(candidate.variable, candidate.interval);
  }
  return decideWidths(collected, targetBits, new BoundAnalyzer(intervals));
};

const reasonOf = (result: WidthDecisions, variable: Var): DecisionReason | undefined =>
  result.decisions.find((decision) => decision.variable === variable)?.reason;

const detailOf = (result: WidthDecisions, variable: Var): string | undefined =>
  result.decisions.find((decision) => decision.variable === variable)?.detail;

describe("decideWidths", () => {
  it("narrows variables whose every derived index fits", () => {
    const { func, i, j } = buildFlatCopy(16n, 4n);
    const result = decide(func, 32);
    expect(result.dtypes.get(i)?.toString()).toBe("int32");
    expect(result.dtypes.get(j)?.toString()).toBe("int32");
    expect(reasonOf(result, i)).toBe(DecisionReason.Narrowed);
    expect(detailOf(result, i)).toBe("declared range [0, 15] fits int32");
  });

  it("never widens variables already at the target width", () => {
    const { func, i } = buildFlatCopy(16n, 4n, DataTypes.int32);
    const result = decide(func, 32);
    expect(result.dtypes.get(i)?.toString()).toBe("int32");
    expect(reasonOf(result, i)).toBe(DecisionReason.AlreadyNarrow);
    expect(detailOf(result, i)).toBe("int32 is not wider than 32 bits");
  });

  it("keeps symbolic loops wide", () => {
    const n = createVar("n", DataTypes.int64);
    const k = createVar("k", DataTypes.int64);
    const A = createBuffer("A", [n], DataTypes.float32);
    const func = createPrimFunc(
      [A],
      createFor(k, int64(0), n, createBufferStore(A, [k], createFloatImm(0))),
      [n],
    );
    const result = decide(func, 32);
    expect(result.dtypes.get(k)?.toString()).toBe("int64");
    expect(reasonOf(result, k)).toBe(DecisionReason.Unbounded);
    expect(detailOf(result, k)).toBe("declared range is not constant");
  });

  it("keeps variables whose own range does not fit", () => {
    const k = createVar("k", DataTypes.int64);
    const A = createBuffer("A", [int64(2n ** 40n)], DataTypes.float32);
    const func = createPrimFunc(
      [A],
      createFor(k, int64(0), int64(2n ** 40n), createBufferStore(A, [k], createFloatImm(0))),
    );
    const result = decide(func, 32);
    expect(reasonOf(result, k)).toBe(DecisionReason.OutOfRange);
    expect(detailOf(result, k)).toBe(
      "declared range [0, 1099511627775] (extent 1099511627776) does not fit int32",
    );
  });

  it("rejects a literal extent that does not fit even when the range does", () => {
    const k = createVar("k", DataTypes.int64);
    const A = createBuffer("A", [int64(2n ** 31n)], DataTypes.float32);
    const func = createPrimFunc(
      [A],
      createFor(k, int64(0), int64(2n ** 31n), createBufferStore(A, [k], createFloatImm(0))),
    );
    const result = decide(func, 32);
    expect(reasonOf(result, k)).toBe(DecisionReason.OutOfRange);
  });

  it("keeps every variable of an overflowing flattened index wide", () => {
    const { func, i, j } = buildFlatCopy(65536n, 65536n);
    const result = decide(func, 32);
    expect(result.dtypes.get(i)?.toString()).toBe("int64");
    expect(result.dtypes.get(j)?.toString()).toBe("int64");
    expect(reasonOf(result, i)).toBe(DecisionReason.OverflowRisk);
    expect(detailOf(result, i)).toBe(
      "i * int64(65536) has bound [0, 4294901760] outside int32",
    );
    expect(detailOf(result, j)).toBe(
      "i * int64(65536) + j has bound [0, 4294967295] outside int32",
    );
  });

  describe("widening casts", () => {
    const k = createVar("k", DataTypes.int64);
    const P = createBuffer("P", [16], DataTypes.int32);
    const C = createBuffer("C", [16], DataTypes.int32);
    const widened = createCast(DataTypes.int64, createBufferLoad(P, [k]));
    const loopStoring = (value: Expr) =>
      createPrimFunc(
        [P, C],
        createFor(k, int64(0), int64(16), createBufferStore(C, [k], value)),
      );

    it("narrows through a cast up from the narrow dtype", () => {
      const quotient = createFloorDiv(widened, createMax(k, int64(1)));
      const result = decide(loopStoring(createCast(DataTypes.int32, quotient)), 32);
      expect(reasonOf(result, k)).toBe(DecisionReason.Narrowed);
    });

    it("bounds the cast by its source dtype", () => {
      const sum = createAdd(widened, k);
      const result = decide(loopStoring(createCast(DataTypes.int32, sum)), 32);
      expect(reasonOf(result, k)).toBe(DecisionReason.OverflowRisk);
      expect(detailOf(result, k)).toBe(
        "cast(int64, P[k]) + k has bound [-2147483648, 2147483662] outside int32",
      );
    });
  });

  it("notes a variable declared twice in its decision", () => {
    const k = createVar("k", DataTypes.int64);
    const A = createBuffer("A", [8], DataTypes.float32);
    const store = createBufferStore(A, [k], createFloatImm(0));
    const func = createPrimFunc(
      [A],
      createSeq([
        createFor(k, int64(0), int64(4), store),
        createFor(k, int64(0), int64(8), store),
      ]),
    );
    const result = decide(func, 32);
    expect(reasonOf(result, k)).toBe(DecisionReason.Narrowed);
    expect(detailOf(result, k)).toBe(
      "declared range [0, 7] fits int32; declared more than once, ranges merged",
    );
  });

  it("does not hold a variable back for a literal that cannot narrow", () => {
    const k = createVar("k", DataTypes.int64);
    const A = createBuffer("A", [int64(2n ** 41n)], DataTypes.float32);
    const index = createAdd(k, int64(2n ** 40n));
    const func = createPrimFunc(
      [A],
      createFor(k, int64(0), int64(16), createBufferStore(A, [index], createFloatImm(0))),
    );
    const result = decide(func, 32);
    expect(reasonOf(result, k)).toBe(DecisionReason.Narrowed);
  });

  it("reports one decision per candidate in declaration order", () => {
    const { func, i, j } = buildFlatCopy(2n, 2n);
    const result = decide(func, 16);
    expect(result.decisions.map((decision) => decision.variable)).toEqual([i, j]);
    expect(result.decisions.map((decision) => decision.resolved.toString())).toEqual([
      "int16",
      "int16",
    ]);
  });

  it("validates the target width", () => {
    const { func } = buildFlatCopy(2n, 2n);
    expect(() => decide(func, 0)).toThrow(TirError);
    expect(() => decide(func, 65)).toThrow(
      "targetBits must be an integer in [1, 64], got 65",
    );
    expect(() => decide(func, 16.5)).toThrow(TirError);
  });
});
