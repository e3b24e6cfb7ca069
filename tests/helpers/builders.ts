import {
  type Buffer,
  createAdd,
  createBuffer,
  createBufferLoad,
  createBufferStore,
  createFloatImm,
  createFor,
  createIntImm,
  createMul,
  createPrimFunc,
  createVar,
  type DataType,
  DataTypes,
  type IntImm,
  type PrimFunc,
  type Var,
} from "../../src/index.js";

export const int64 = (value: number | bigint): IntImm =>
  createIntImm(value, DataTypes.int64);

export interface FlatCopy {
  func: PrimFunc;
  i: Var;
  j: Var;
  A: Buffer;
  B: Buffer;
}

/**
 * for i in [0, m): for j in [0, n): B[i * n + j] = A[i * n + j] + 1
 */
export const buildFlatCopy = (
  m: bigint,
  n: bigint,
  dtype: DataType = DataTypes.int64,
): FlatCopy => {
  const i = createVar("i", dtype);
  const j = createVar("j", dtype);
  const size = int64(m * n);
  const A = createBuffer("A", [size], DataTypes.float32);
  const B = createBuffer("B", [size], DataTypes.float32);
  const index = createAdd(createMul(i, createIntImm(n, dtype)), j);
  const store = createBufferStore(
    B,
    [index],
    createAdd(createBufferLoad(A, [index]), createFloatImm(1)),
  );
  const func = createPrimFunc(
    [A, B],
    createFor(
      i,
      createIntImm(0, dtype),
      createIntImm(m, dtype),
      createFor(j, createIntImm(0, dtype), createIntImm(n, dtype), store),
    ),
  );
  return { func, i, j, A, B };
};

export const range = (count: number): number[] =>
  Array.from({ length: count }, (_, index) => index);
