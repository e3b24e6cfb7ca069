import { z } from "zod";

// ------------------------------------------------------------------
// JSON document types
// ------------------------------------------------------------------

/** Integer literal value: a safe integer or a decimal string */
export type IntegerJson = number | string;

export type ArithKindJson =
  | "Add"
  | "Sub"
  | "Mul"
  | "FloorDiv"
  | "FloorMod"
  | "Min"
  | "Max";

export type CompareOpJson = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type ExprJson =
  | { kind: "Var"; name: string }
  | { kind: "IntImm"; value: IntegerJson; dtype?: string }
  | { kind: "FloatImm"; value: number; dtype?: string }
  | { kind: ArithKindJson; a: ExprJson; b: ExprJson; dtype?: string }
  | { kind: "Compare"; op: CompareOpJson; a: ExprJson; b: ExprJson }
  | { kind: "And" | "Or"; a: ExprJson; b: ExprJson }
  | { kind: "Not"; value: ExprJson }
  | {
      kind: "Select";
      condition: ExprJson;
      trueValue: ExprJson;
      falseValue: ExprJson;
    }
  | { kind: "Cast"; dtype: string; value: ExprJson }
  | { kind: "BufferLoad"; buffer: string; indices: ExprJson[] }
  | { kind: "Ramp"; base: ExprJson; stride: ExprJson; lanes: number }
  | { kind: "Broadcast"; value: ExprJson; lanes: number }
  | { kind: "Call"; op: string; args: ExprJson[]; dtype: string };

export interface VarDeclJson {
  name: string;
  dtype: string;
}

export interface IterVarJson {
  var: VarDeclJson;
  min: ExprJson;
  extent: ExprJson;
  iterType?: "spatial" | "reduce";
}

export type StmtJson =
  | {
      kind: "For";
      var: VarDeclJson;
      min: ExprJson;
      extent: ExprJson;
      forKind?: "serial" | "parallel" | "vectorized" | "unrolled";
      body: StmtJson;
    }
  | {
      kind: "ThreadBinding";
      var: VarDeclJson;
      threadTag: string;
      extent: ExprJson;
      body: StmtJson;
    }
  | {
      kind: "Block";
      name: string;
      iterVars: IterVarJson[];
      iterValues: ExprJson[];
      predicate?: ExprJson;
      body: StmtJson;
    }
  | {
      kind: "IfThenElse";
      condition: ExprJson;
      thenCase: StmtJson;
      elseCase?: StmtJson;
    }
  | { kind: "BufferStore"; buffer: string; indices: ExprJson[]; value: ExprJson }
  | { kind: "Seq"; stmts: StmtJson[] }
  | { kind: "Evaluate"; value: ExprJson };

export interface BufferJson {
  name: string;
  dtype: string;
  shape: ExprJson[];
}

export interface FunctionJson {
  params: VarDeclJson[];
  buffers: BufferJson[];
  body: StmtJson;
}

export interface ModuleJson {
  functions: Record<string, FunctionJson>;
}

// ------------------------------------------------------------------
// Zod Schemas
// ------------------------------------------------------------------

const IntegerSchema = z.union([
  z.number().int().refine(Number.isSafeInteger, "must be a safe integer"),
  z.string().regex(/^-?\d+$/, "must be a decimal integer string"),
]);

const DTypeSchema = z.string().min(1);
const LanesSchema = z.number().int().positive();

export const ExprSchema: z.ZodType<ExprJson> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("Var"), name: z.string().min(1) }),
    z.object({
      kind: z.literal("IntImm"),
      value: IntegerSchema,
      dtype: DTypeSchema.optional(),
    }),
    z.object({
      kind: z.literal("FloatImm"),
      value: z.number(),
      dtype: DTypeSchema.optional(),
    }),
    z.object({
      kind: z.enum(["Add", "Sub", "Mul", "FloorDiv", "FloorMod", "Min", "Max"]),
      a: ExprSchema,
      b: ExprSchema,
      dtype: DTypeSchema.optional(),
    }),
    z.object({
      kind: z.literal("Compare"),
      op: z.enum(["==", "!=", "<", "<=", ">", ">="]),
      a: ExprSchema,
      b: ExprSchema,
    }),
    z.object({ kind: z.enum(["And", "Or"]), a: ExprSchema, b: ExprSchema }),
    z.object({ kind: z.literal("Not"), value: ExprSchema }),
    z.object({
      kind: z.literal("Select"),
      condition: ExprSchema,
      trueValue: ExprSchema,
      falseValue: ExprSchema,
    }),
    z.object({ kind: z.literal("Cast"), dtype: DTypeSchema, value: ExprSchema }),
    z.object({
      kind: z.literal("BufferLoad"),
      buffer: z.string().min(1),
      indices: z.array(ExprSchema),
    }),
    z.object({
      kind: z.literal("Ramp"),
      base: ExprSchema,
      stride: ExprSchema,
      lanes: LanesSchema,
    }),
    z.object({
      kind: z.literal("Broadcast"),
      value: ExprSchema,
      lanes: LanesSchema,
    }),
    z.object({
      kind: z.literal("Call"),
      op: z.string().min(1),
      args: z.array(ExprSchema),
      dtype: DTypeSchema,
    }),
  ]),
);

const VarDeclSchema = z.object({
  name: z.string().min(1),
  dtype: DTypeSchema,
});

const IterVarSchema = z.object({
  var: VarDeclSchema,
  min: ExprSchema,
  extent: ExprSchema,
  iterType: z.enum(["spatial", "reduce"]).optional(),
});

export const StmtSchema: z.ZodType<StmtJson> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("For"),
      var: VarDeclSchema,
      min: ExprSchema,
      extent: ExprSchema,
      forKind: z.enum(["serial", "parallel", "vectorized", "unrolled"]).optional(),
      body: StmtSchema,
    }),
    z.object({
      kind: z.literal("ThreadBinding"),
      var: VarDeclSchema,
      threadTag: z.string().min(1),
      extent: ExprSchema,
      body: StmtSchema,
    }),
    z.object({
      kind: z.literal("Block"),
      name: z.string(),
      iterVars: z.array(IterVarSchema),
      iterValues: z.array(ExprSchema),
      predicate: ExprSchema.optional(),
      body: StmtSchema,
    }),
    z.object({
      kind: z.literal("IfThenElse"),
      condition: ExprSchema,
      thenCase: StmtSchema,
      elseCase: StmtSchema.optional(),
    }),
    z.object({
      kind: z.literal("BufferStore"),
      buffer: z.string().min(1),
      indices: z.array(ExprSchema),
      value: ExprSchema,
    }),
    z.object({ kind: z.literal("Seq"), stmts: z.array(StmtSchema) }),
    z.object({ kind: z.literal("Evaluate"), value: ExprSchema }),
  ]),
);

const BufferSchema = z.object({
  name: z.string().min(1),
  dtype: DTypeSchema,
  shape: z.array(ExprSchema),
});

const FunctionSchema = z.object({
  params: z.array(VarDeclSchema).default([]),
  buffers: z.array(BufferSchema).default([]),
  body: StmtSchema,
});

export const ModuleSchema = z.object({
  functions: z.record(FunctionSchema),
});
