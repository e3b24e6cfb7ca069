import { describe, expect, it } from "vitest";
import {
  AggregateTirError,
  ErrorCollector,
  joinPath,
  TirError,
} from "../../../src/index.js";

describe("TirError", () => {
  it("carries a code, a path and an optional hint", () => {
    const error = new TirError("UnknownReference", "Unknown buffer 'C'", "functions.main.body", "declare it");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("TirError");
    expect(error.code).toBe("UnknownReference");
    expect(error.path).toBe("functions.main.body");
    expect(error.suggestion).toBe("declare it");
    expect(new TirError("InvalidArgument", "bad").path).toBe("");
  });
});

describe("joinPath", () => {
  it("builds dotted paths with bracketed indices", () => {
    expect(joinPath("", "functions")).toBe("functions");
    expect(joinPath(joinPath("functions.main", "stmts"), 0)).toBe(
      "functions.main.stmts[0]",
    );
  });
});

describe("ErrorCollector", () => {
  it("does nothing without errors", () => {
    const collector = new ErrorCollector();
    expect(collector.hasErrors()).toBe(false);
    expect(() => collector.throwIfErrors()).not.toThrow();
  });

  it("throws every reported error at once", () => {
    const collector = new ErrorCollector();
    collector.report("MalformedModule", "first", "a.b");
    collector.report("UnknownReference", "second", "", "look up");
    expect(collector.hasErrors()).toBe(true);

    let thrown: unknown;
    try {
      collector.throwIfErrors();
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(AggregateTirError);
    if (!(thrown instanceof AggregateTirError)) return;
    expect(thrown.errors.map((error) => error.message)).toEqual(["first", "second"]);
    expect(thrown.message).toBe(
      [
        "Failed with 2 error(s):",
        "- [MalformedModule] a.b first",
        "- [UnknownReference] second (hint: look up)",
      ].join("\n"),
    );
  });

  it("keeps a repeated report once", () => {
    const collector = new ErrorCollector();
    collector.report("UnknownReference", "Unknown variable 'k'", "functions.main.body");
    collector.report("UnknownReference", "Unknown variable 'k'", "functions.main.body");
    collector.report("UnknownReference", "Unknown variable 'k'", "functions.main.extent");
    expect(collector.errorsUnder().map((error) => error.path)).toEqual([
      "functions.main.body",
      "functions.main.extent",
    ]);
  });

  it("selects errors by path prefix", () => {
    const collector = new ErrorCollector();
    collector.report("MalformedModule", "a", "functions.main.params[0]");
    collector.report("MalformedModule", "b", "functions.mainline.body");
    collector.report("MalformedModule", "c", "functions.main");
    collector.report("MalformedModule", "d", "functions.other.body");
    expect(
      collector.errorsUnder("functions.main").map((error) => error.message),
    ).toEqual(["a", "c"]);
    expect(collector.errorsUnder("functions.main.params")).toHaveLength(1);
    expect(collector.errorsUnder()).toHaveLength(4);
  });

  it("maps schema issues to document paths", () => {
    const collector = new ErrorCollector();
    collector.reportSchemaIssues([
      {
        code: "invalid_type",
        expected: "object",
        received: "undefined",
        path: ["functions", "main", "body", "stmts", 2, "value"],
        message: "Required",
      },
    ]);
    const [error] = collector.errorsUnder();
    expect(error?.code).toBe("MalformedModule");
    expect(error?.path).toBe("functions.main.body.stmts[2].value");
    expect(error?.message).toBe("Required");
  });
});
