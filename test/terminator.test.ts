import { describe, expect, test } from "vitest";
import { findConflictingAnchor } from "../src/common/edits";
import { Rewriter } from "../src/common/rewriter";
import { TerminatorMessages, evaluateTerminators } from "../src/linter/terminator";
import type { AnalysisResult, RuleOptions } from "../src/linter/types";
import { parseSql } from "../src/parser";

const defaults: RuleOptions = { multilineNewline: false, requireFinalSemicolon: false };
const multiline: RuleOptions = { multilineNewline: true, requireFinalSemicolon: false };
const requireFinal: RuleOptions = { multilineNewline: false, requireFinalSemicolon: true };
const strict: RuleOptions = { multilineNewline: true, requireFinalSemicolon: true };

function evaluate(source: string, options: RuleOptions = defaults): AnalysisResult[] {
  return evaluateTerminators(parseSql(source), options);
}

/**
 * Apply every edit of a single evaluation pass.
 */
function fixOnce(source: string, options: RuleOptions = defaults): string {
  const file = parseSql(source);
  const edits = evaluateTerminators(file, options).flatMap((result) => result.edits);
  return new Rewriter().apply(file, edits);
}

describe("Statement terminator placement", () => {
  test("accepts a terminator directly after the statement", () => {
    expect(evaluate("SELECT a FROM foo;")).toEqual([]);
    expect(evaluate("SELECT 1;\nSELECT 2;\n")).toEqual([]);
  });

  test("moves a terminator next to the statement", () => {
    const results = evaluate("SELECT a FROM foo ;");

    expect(results.map((result) => result.message)).toEqual([TerminatorMessages.sameLine]);
    expect(fixOnce("SELECT a FROM foo ;")).toBe("SELECT a FROM foo;");
  });

  test("pulls a terminator up from the next line", () => {
    expect(fixOnce("SELECT a FROM foo\n;")).toBe("SELECT a FROM foo;");
    expect(fixOnce("select a\nfrom t\n;")).toBe("select a\nfrom t;");
  });

  test("never moves or deletes an inline comment", () => {
    const results = evaluate("select a -- noqa\n;");

    expect(results).toHaveLength(1);
    const edits = results[0]?.edits ?? [];
    expect(edits.some((edit) => edit.anchor.kind === "comment")).toBe(false);
    expect(fixOnce("select a -- noqa\n;")).toBe("select a; -- noqa");
  });

  test("ignores terminators without a statement", () => {
    expect(evaluate(";")).toEqual([]);
  });
});

describe("Terminators of multi-line statements", () => {
  test("accepts a terminator on its own line", () => {
    expect(evaluate("select a\nfrom t\n;", multiline)).toEqual([]);
  });

  test("moves a trailing terminator onto its own line", () => {
    const results = evaluate("select\n a ;", multiline);

    expect(results.map((result) => result.message)).toEqual([TerminatorMessages.ownLine]);
    expect(fixOnce("select\n a ;", multiline)).toBe("select\n a\n;");
    expect(fixOnce("select\n a;", multiline)).toBe("select\n a\n;");
  });

  test("keeps single-line statements on one line", () => {
    expect(fixOnce("select a ;", multiline)).toBe("select a;");
  });

  test("treats a terminator after an inline comment on the last line as placed", () => {
    expect(evaluate("select\n a -- c\n;", multiline)).toEqual([]);
  });

  test("inserts after a trailing inline comment", () => {
    expect(fixOnce("select a\nfrom t; -- c", multiline)).toBe("select a\nfrom t -- c\n;");
  });

  test("keeps the next statement's inline comment with that statement", () => {
    const source = "select a\nfrom t ; select b -- y\n";
    const results = evaluate(source, multiline);

    expect(results.map((result) => result.message)).toEqual([TerminatorMessages.ownLine]);
    expect(results[0]?.anchor.kind).toBe("meta");
    expect(fixOnce(source, multiline)).toBe("select a\nfrom t\n; select b -- y\n");
  });
});

describe("Repeated terminators", () => {
  test("collapses a run of terminators into one result", () => {
    const results = evaluate("select 1;;;");

    expect(results).toHaveLength(1);
    expect(results[0]?.message).toBe(TerminatorMessages.repeated);
    expect(results[0]?.edits.map((edit) => edit.kind)).toEqual(["delete", "delete"]);
    expect(fixOnce("select 1;;;")).toBe("select 1;");
  });

  test("deletes whitespace between repeated terminators", () => {
    expect(fixOnce("select 1; ;\nselect 2;")).toBe("select 1;\nselect 2;");
  });

  test("pulls a terminator on the next line up to the previous one", () => {
    const results = evaluate("select 1;\n;");

    expect(results.map((result) => result.message)).toEqual([TerminatorMessages.sameLine]);
    expect(results[0]?.edits.map((edit) => edit.kind)).toEqual(["replace", "delete"]);
    expect(fixOnce("select 1;\n;")).toBe("select 1;;");
  });
});

describe("Missing terminators", () => {
  test("adds a final terminator to a single-line file", () => {
    const results = evaluate("select 1", requireFinal);

    expect(results).toHaveLength(1);
    expect(results[0]?.message).toBe(TerminatorMessages.missingFinal);
    expect(results[0]?.edits.map((edit) => [edit.kind, edit.anchor.kind])).toEqual([
      ["insert_after", "statement"],
    ]);
    expect(fixOnce("select 1", requireFinal)).toBe("select 1;");
    expect(fixOnce("select 1\n", requireFinal)).toBe("select 1;\n");
  });

  test("keeps a trailing inline comment after the added terminator", () => {
    expect(fixOnce("select 1 -- c\n", requireFinal)).toBe("select 1; -- c\n");
  });

  test("adds the final terminator on its own line", () => {
    expect(fixOnce("select\n1\n", strict)).toBe("select\n1\n;\n");
    expect(fixOnce("select\n1 -- c\n", strict)).toBe("select\n1 -- c\n;\n");
  });

  test("adds a terminator to a statement followed by another", () => {
    const results = evaluate("select 1\nselect 2;", requireFinal);

    expect(results.map((result) => result.message)).toEqual([TerminatorMessages.missing]);
    expect(fixOnce("select 1\nselect 2;", requireFinal)).toBe("select 1;\nselect 2;");
    expect(fixOnce("select 1 -- c\nselect 2;", requireFinal)).toBe("select 1; -- c\nselect 2;");
  });

  test("adds a terminator after the comment of a multi-line statement", () => {
    expect(fixOnce("select\n1 -- c\nselect 2;", strict)).toBe("select\n1 -- c\n;\nselect 2;");
  });

  test("terminates every statement of a file without terminators", () => {
    expect(evaluate("select 1\nselect 2", requireFinal)).toHaveLength(2);
    expect(fixOnce("select 1\nselect 2", requireFinal)).toBe("select 1;\nselect 2;");
  });

  test("leaves the last statement alone once any terminator exists", () => {
    expect(evaluate("select 1; select 2", requireFinal)).toEqual([]);
  });

  test("treats a terminated last statement with trailing trivia as terminated", () => {
    expect(evaluate("select 1;\n-- done\n", requireFinal)).toEqual([]);
    expect(evaluate("select 1;\nselect 2;\n\n/* end */\n", requireFinal)).toEqual([]);
  });

  test("counts Oracle slashes as terminators", () => {
    const file = parseSql("SELECT 1 FROM dual\n/\nSELECT 2 FROM dual\n/\n", "oracle");

    expect(evaluateTerminators(file, requireFinal)).toEqual([]);
  });

  test("does nothing for files without code", () => {
    expect(evaluate("", requireFinal)).toEqual([]);
    expect(evaluate("-- nothing\n", requireFinal)).toEqual([]);
  });

  test("does not require terminators unless configured", () => {
    expect(evaluate("select 1\nselect 2")).toEqual([]);
  });
});

describe("Edit consistency", () => {
  const sources = [
    "SELECT a FROM foo ;",
    "select a -- c\n;",
    "select\n a ;",
    "select 1 ; ;",
    "select 1\nselect 2",
    "select\n1 -- c\n",
  ];

  test.each(sources)("no result deletes and writes the same segment: %j", (source) => {
    for (const options of [defaults, multiline, requireFinal, strict]) {
      for (const result of evaluate(source, options)) {
        expect(findConflictingAnchor(result.edits)).toBeUndefined();
      }
    }
  });
});
