import type { Buffer, Var } from "./expr.js";
import type { Stmt } from "./stmt.js";

/**
 * Primitive function: scalar params, buffer params and a body.
 */
export interface PrimFunc {
  readonly params: readonly Var[];
  readonly buffers: readonly Buffer[];
  readonly body: Stmt;
}

export interface IRModule {
  readonly functions: ReadonlyMap<string, PrimFunc>;
}

export function createPrimFunc(
  buffers: readonly Buffer[],
  body: Stmt,
  params: readonly Var[] = [],
): PrimFunc {
  return { params, buffers, body };
}

export function createModule(
  functions: Readonly<Record<string, PrimFunc>>,
): IRModule {
  return { functions: new Map(Object.entries(functions)) };
}

/**
 * Build a new function with a replaced body, keeping params and buffers.
 */
export function withBody(func: PrimFunc, body: Stmt): PrimFunc {
  return { ...func, body };
}
