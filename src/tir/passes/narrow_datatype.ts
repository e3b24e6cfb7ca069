/**
 * Integer width narrowing pass: loop, thread and block iteration variables
 * whose full value range fits targetBits are retyped to the narrow width.
 */

import { BoundAnalyzer } from "../analysis/bound_analyzer.js";
import { collectCandidates } from "../analysis/candidate_collector.js";
import type { Interval } from "../analysis/interval.js";
import type { Var } from "../ir/expr.js";
import type { IRModule, PrimFunc } from "../ir/prim_func.js";
import { rewriteDataTypes } from "./dtype_rewriter.js";
import {
  decideWidths,
  validateTargetBits,
  type WidthDecision,
} from "./width_decision.js";

export interface NarrowDataTypeOptions {
  /** Log one line per decision */
  verbose?: boolean;
}

export interface FunctionReport {
  name: string;
  decisions: readonly WidthDecision[];
  changed: boolean;
}

export interface NarrowResult {
  module: IRModule;
  reports: FunctionReport[];
}

interface FunctionResult {
  func: PrimFunc;
  decisions: readonly WidthDecision[];
}

const runOnFunction = (func: PrimFunc, targetBits: number): FunctionResult => {
  const collected = collectCandidates(func);
  const varIntervals = new Map<Var, Interval>();
  for (const candidate of collected.candidates.values()) {
    varIntervals.set(candidate.variable, candidate.interval);
  }
  const analyzer = new BoundAnalyzer(varIntervals);
  const { dtypes, decisions } = decideWidths(collected, targetBits, analyzer);
  return { func: rewriteDataTypes(func, dtypes), decisions };
};

export const formatDecision = (
  functionName: string,
  decision: WidthDecision,
): string => {
  const { variable, original, resolved, reason } = decision;
  return `[narrow] ${functionName}: ${variable.name} ${original.toString()} -> ${resolved.toString()} (${reason})`;
};

/**
 * Narrowing pass over every function of a module
 */
export class NarrowDataTypePass {
  private readonly verbose: boolean;

  constructor(
    private readonly targetBits: number,
    options: NarrowDataTypeOptions = {},
  ) {
    validateTargetBits(targetBits);
    this.verbose = options.verbose ?? false;
  }

  run(module: IRModule): NarrowResult {
    const functions = new Map<string, PrimFunc>();
    const reports: FunctionReport[] = [];
    let changed = false;

    for (const [name, func] of module.functions) {
      const result = runOnFunction(func, this.targetBits);
      if (this.verbose) {
        for (const decision of result.decisions) {
          console.warn(formatDecision(name, decision));
        }
      }
      const funcChanged = result.func !== func;
      changed ||= funcChanged;
      functions.set(name, result.func);
      reports.push({ name, decisions: result.decisions, changed: funcChanged });
    }

    return { module: changed ? { functions } : module, reports };
  }
}

/**
 * Narrow one function. The input is returned as is when nothing narrows.
 */
export const narrowFunction = (
  func: PrimFunc,
  targetBits: number,
  options: NarrowDataTypeOptions = {},
): PrimFunc => {
  validateTargetBits(targetBits);
  const result = runOnFunction(func, targetBits);
  if (options.verbose) {
    for (const decision of result.decisions) {
      console.warn(formatDecision("<function>", decision));
    }
  }
  return result.func;
};

export const narrowDataType = (
  module: IRModule,
  targetBits: number,
  options: NarrowDataTypeOptions = {},
): IRModule => {
  return new NarrowDataTypePass(targetBits, options).run(module).module;
};
