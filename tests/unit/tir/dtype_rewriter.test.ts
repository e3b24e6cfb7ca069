import { describe, expect, it } from "vitest";
import {
  createAdd,
  createBlock,
  createBuffer,
  createBufferLoad,
  createBufferStore,
  createCall,
  createCast,
  createCompare,
  createEvaluate,
  createFloatImm,
  createFor,
  createIfThenElse,
  createIterVar,
  createMul,
  createPrimFunc,
  createSeq,
  createVar,
  type DataType,
  DataTypes,
  type Expr,
  ExprKind,
  printExpr,
  printStmt,
  rewriteDataTypes,
  type Stmt,
  StmtKind,
  type Var,
} from "../../../src/index.js";
import { int64 } from "../../helpers/builders.js";

const narrowTo32 = (...vars: Var[]): Map<Var, DataType> =>
  new Map(vars.map((variable) => [variable, DataTypes.int32]));

const storeValue = (stmt: Stmt): Expr => {
  if (stmt.kind !== StmtKind.BufferStore) throw new Error(`expected a store, got ${stmt.kind}`);
  return stmt.value;
};

describe("rewriteDataTypes", () => {
  const i = createVar("i", DataTypes.int64);
  const A = createBuffer("A", [16], DataTypes.float32);
  const B = createBuffer("B", [16], DataTypes.float32);

  const loopOver = (body: Stmt, params: Var[] = []) =>
    createPrimFunc([A, B], createFor(i, int64(0), int64(16), body), params);

  it("returns the input when no variable changes", () => {
    const func = loopOver(createBufferStore(B, [i], createBufferLoad(A, [i])));
    expect(rewriteDataTypes(func, new Map())).toBe(func);
    expect(rewriteDataTypes(func, new Map([[i, DataTypes.int64]]))).toBe(func);
  });

  it("retypes the declaration, its range and every reference", () => {
    const func = loopOver(createBufferStore(B, [i], createBufferLoad(A, [i])));
    const result = rewriteDataTypes(func, narrowTo32(i));
    const loop = result.body;
    if (loop.kind !== StmtKind.For) throw new Error("expected a loop");
    expect(loop.loopVar).not.toBe(i);
    expect(loop.loopVar.name).toBe("i");
    expect(loop.loopVar.dtype.toString()).toBe("int32");
    expect(loop.min).toEqual({ kind: ExprKind.IntImm, value: 0n, dtype: DataTypes.int32 });
    expect(loop.extent).toEqual({ kind: ExprKind.IntImm, value: 16n, dtype: DataTypes.int32 });
    const store = loop.body;
    if (store.kind !== StmtKind.BufferStore) throw new Error("expected a store");
    expect(store.indices[0]).toBe(loop.loopVar);
    const value = store.value;
    if (value.kind !== ExprKind.BufferLoad) throw new Error("expected a load");
    expect(value.indices[0]).toBe(loop.loopVar);
    expect(value.dtype).toBe(DataTypes.float32);
    // The input is left as it was.
    expect(i.dtype.toString()).toBe("int64");
    expect(func.body.kind === StmtKind.For && func.body.loopVar).toBe(i);
  });

  it("re-emits literals next to a narrowed operand", () => {
    const func = loopOver(
      createBufferStore(B, [createAdd(i, int64(1))], createFloatImm(0)),
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    expect(printStmt(result.body)).toBe(
      ["for i: int32 in serial(0, 16):", "  B[i + 1] = float32(0)"].join("\n"),
    );
  });

  it("casts a narrowed operand up next to a wide one", () => {
    const n = createVar("n", DataTypes.int64);
    const func = loopOver(
      createBufferStore(B, [createMul(i, n)], createFloatImm(0)),
      [n],
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    const loop = result.body;
    if (loop.kind !== StmtKind.For || loop.body.kind !== StmtKind.BufferStore) {
      throw new Error("expected a loop over a store");
    }
    const index = loop.body.indices[0];
    expect(index && printExpr(index)).toBe("cast(int64, i) * n");
    expect(index?.dtype).toBe(DataTypes.int64);
  });

  it("drops casts that become no-ops and keeps the others", () => {
    const func = loopOver(
      createSeq([
        createBufferStore(B, [createCast(DataTypes.int32, i)], createFloatImm(0)),
        createBufferStore(B, [i], createCast(DataTypes.float32, i)),
      ]),
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    expect(printStmt(result.body)).toBe(
      [
        "for i: int32 in serial(0, 16):",
        "  B[i] = float32(0)",
        "  B[i] = cast(float32, i)",
      ].join("\n"),
    );
  });

  it("drops a widening cast next to an operand of its source dtype", () => {
    const P = createBuffer("P", [16], DataTypes.int32);
    const Q = createBuffer("Q", [16], DataTypes.int16);
    const C = createBuffer("C", [16], DataTypes.int32);
    const D = createBuffer("D", [16], DataTypes.int64);
    const widened = createCast(DataTypes.int64, createBufferLoad(P, [i]));
    const func = createPrimFunc(
      [P, Q, C, D],
      createFor(
        i,
        int64(0),
        int64(16),
        createSeq([
          createBufferStore(C, [i], createCast(DataTypes.int32, createAdd(widened, i))),
          createBufferStore(
            D,
            [i],
            createAdd(createCast(DataTypes.int64, createBufferLoad(Q, [i])), i),
          ),
        ]),
      ),
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    expect(printStmt(result.body)).toBe(
      [
        "for i: int32 in serial(0, 16):",
        "  C[i] = P[i] + i",
        "  D[i] = cast(int64, Q[i]) + cast(int64, i)",
      ].join("\n"),
    );
  });

  it("keeps store values and call arguments at their original dtype", () => {
    const C = createBuffer("C", [16], DataTypes.int64);
    const func = createPrimFunc(
      [C],
      createFor(
        i,
        int64(0),
        int64(16),
        createSeq([
          createBufferStore(C, [i], i),
          createEvaluate(createCall("consume", [i], DataTypes.int32)),
        ]),
      ),
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    expect(printStmt(result.body)).toBe(
      [
        "for i: int32 in serial(0, 16):",
        "  C[i] = cast(int64, i)",
        "  consume(cast(int64, i)): int32",
      ].join("\n"),
    );
  });

  it("unifies comparison operands", () => {
    const func = loopOver(
      createIfThenElse(
        createCompare("<", i, int64(8)),
        createBufferStore(B, [i], createFloatImm(1)),
      ),
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    expect(printStmt(result.body)).toBe(
      [
        "for i: int32 in serial(0, 16):",
        "  if i < 8:",
        "    B[i] = float32(1)",
      ].join("\n"),
    );
  });

  it("shares untouched statements and rewrites shared nodes once", () => {
    const j = createVar("j", DataTypes.int64);
    const shared = createAdd(i, int64(1));
    const untouched = createFor(
      j,
      int64(0),
      int64(4),
      createBufferStore(A, [j], createFloatImm(0)),
    );
    const func = createPrimFunc(
      [A, B],
      createSeq([
        createFor(
          i,
          int64(0),
          int64(15),
          createBufferStore(B, [shared], createBufferLoad(A, [shared])),
        ),
        untouched,
      ]),
    );
    const result = rewriteDataTypes(func, narrowTo32(i));
    if (result.body.kind !== StmtKind.Seq) throw new Error("expected a sequence");
    expect(result.body.stmts[1]).toBe(untouched);
    const loop = result.body.stmts[0];
    if (loop?.kind !== StmtKind.For || loop.body.kind !== StmtKind.BufferStore) {
      throw new Error("expected a loop over a store");
    }
    const load = storeValue(loop.body);
    if (load.kind !== ExprKind.BufferLoad) throw new Error("expected a load");
    expect(load.indices[0]).toBe(loop.body.indices[0]);
  });

  it("coerces block iteration domains and bindings", () => {
    const vi = createVar("vi", DataTypes.int64);
    const k = createVar("k", DataTypes.int64);
    const body = createBlock(
      "copy",
      [createIterVar(vi, int64(0), int64(16))],
      [k],
      createBufferStore(B, [vi], createBufferLoad(A, [vi])),
    );
    const func = createPrimFunc([A, B], createFor(k, int64(0), int64(16), body));

    const both = rewriteDataTypes(func, narrowTo32(vi, k));
    expect(printStmt(both.body)).toBe(
      [
        "for k: int32 in serial(0, 16):",
        '  with block("copy"):',
        "    vi: int32 = axis.spatial((0, 16), k)",
        "    B[vi] = A[vi]",
      ].join("\n"),
    );

    const onlyIter = rewriteDataTypes(func, narrowTo32(vi));
    expect(printStmt(onlyIter.body)).toBe(
      [
        "for k: int64 in serial(int64(0), int64(16)):",
        '  with block("copy"):',
        "    vi: int32 = axis.spatial((0, 16), cast(int32, k))",
        "    B[vi] = A[vi]",
      ].join("\n"),
    );
  });
});
