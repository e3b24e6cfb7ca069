/**
 * Error types raised by the IR tooling
 */

export type TirErrorCode =
  | "InvalidArgument"
  | "MalformedModule"
  | "UnknownReference"
  | "RuntimeError"
  | "InternalError";

export class TirError extends Error {
  readonly code: TirErrorCode;
  readonly path: string;
  readonly suggestion?: string;

  constructor(
    code: TirErrorCode,
    message: string,
    path = "",
    suggestion?: string,
  ) {
    super(message);
    this.name = "TirError";
    this.code = code;
    this.path = path;
    this.suggestion = suggestion;
  }
}

export class AggregateTirError extends Error {
  readonly errors: TirError[];

  constructor(errors: TirError[]) {
    super(AggregateTirError.formatMessage(errors));
    this.name = "AggregateTirError";
    this.errors = errors;
  }

  private static formatMessage(errors: TirError[]): string {
    const header = `Failed with ${errors.length} error(s):`;
    const lines = errors.map((err) => {
      const loc = err.path ? ` ${err.path}` : "";
      const suggestion = err.suggestion ? ` (hint: ${err.suggestion})` : "";
      return `- [${err.code}]${loc} ${err.message}${suggestion}`;
    });
    return [header, ...lines].join("\n");
  }
}
