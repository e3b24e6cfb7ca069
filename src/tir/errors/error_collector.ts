/**
 * Diagnostics gathered while decoding a module, keyed by document path
 */

import type { ZodIssue } from "zod";
import { AggregateTirError, TirError, type TirErrorCode } from "./tir_errors.js";

/**
 * Extend a document path: `functions.main` + `body` or `stmts` + `0` gives
 * `functions.main.body`, `stmts[0]`.
 */
export const joinPath = (path: string, key: string | number): string => {
  if (typeof key === "number") return `${path}[${key}]`;
  return path ? `${path}.${key}` : key;
};

const isUnder = (path: string, prefix: string): boolean =>
  prefix === "" ||
  path === prefix ||
  path.startsWith(`${prefix}.`) ||
  path.startsWith(`${prefix}[`);

export class ErrorCollector {
  private readonly errors: TirError[] = [];
  private readonly seen = new Set<string>();

  /**
   * Record a problem at path. The same code and message at the same path is
   * kept once.
   */
  report(
    code: TirErrorCode,
    message: string,
    path = "",
    suggestion?: string,
  ): void {
    const key = `${code}|${path}|${message}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.errors.push(new TirError(code, message, path, suggestion));
  }

  reportSchemaIssues(issues: readonly ZodIssue[]): void {
    for (const issue of issues) {
      const path = issue.path.reduce<string>(
        (joined, key) => joinPath(joined, key),
        "",
      );
      this.report("MalformedModule", issue.message, path);
    }
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /** Errors at prefix or inside it, in report order; "" selects all */
  errorsUnder(prefix = ""): TirError[] {
    return this.errors.filter((error) => isUnder(error.path, prefix));
  }

  throwIfErrors(): void {
    if (this.errors.length > 0) {
      throw new AggregateTirError([...this.errors]);
    }
  }
}
