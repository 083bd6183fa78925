import { describe, expect, test } from "vitest";
import type { Composite, Segment } from "../src/common/segment";
import { ConfigError } from "../src/errors";
import { ORACLE, Parser, parseSql, tokenize } from "../src/parser";

function kinds(segment: Composite): string[] {
  return segment.segments.map((child) => child.kind);
}

function statements(segment: Composite): string[] {
  return segment.segments.filter((child) => child.kind === "statement").map((child) => child.raw);
}

function child(segment: Composite, index: number): Segment | undefined {
  return segment.segments[index];
}

describe("SQL Parser", () => {
  test("keeps every character of the source", () => {
    const source = "-- head\nSELECT a, 'x;y' FROM \"t\" ;  \n";
    expect(parseSql(source).raw).toBe(source);
  });

  test("splits statements on semicolons", () => {
    const file = parseSql("SELECT 1;\nSELECT 2;\n");
    expect(kinds(file)).toEqual([
      "statement",
      "statement_terminator",
      "newline",
      "statement",
      "statement_terminator",
      "newline",
      "meta",
    ]);
    expect(statements(file)).toEqual(["SELECT 1", "SELECT 2"]);
  });

  test("keeps trivia between statements at file level", () => {
    const file = parseSql("SELECT a FROM foo ;");
    expect(kinds(file)).toEqual(["statement", "whitespace", "statement_terminator", "meta"]);
    const statement = child(file, 0);
    expect(statement?.kind).toBe("statement");
    if (statement?.kind !== "statement") return;
    expect(kinds(statement)).toEqual([
      "code",
      "meta",
      "whitespace",
      "code",
      "whitespace",
      "code",
      "whitespace",
      "code",
      "meta",
    ]);
  });

  test("places indent after the first token and dedent last", () => {
    const statement = child(parseSql("SELECT 1"), 0);
    if (statement?.kind !== "statement") throw new Error("expected a statement");
    const metas = statement.segments.filter((segment) => segment.kind === "meta");
    expect(metas.map((segment) => (segment.kind === "meta" ? segment.metaKind : ""))).toEqual([
      "indent",
      "dedent",
    ]);
    expect(statement.segments.at(-1)?.kind).toBe("meta");
  });

  test("starts a new statement at an opening keyword on a new line", () => {
    expect(statements(parseSql("SELECT 1\nSELECT 2"))).toEqual(["SELECT 1", "SELECT 2"]);
  });

  test("continues statements after INSERT and UNION", () => {
    expect(statements(parseSql("INSERT INTO t\nSELECT 1"))).toEqual(["INSERT INTO t\nSELECT 1"]);
    expect(statements(parseSql("SELECT a\nUNION\nSELECT b"))).toEqual([
      "SELECT a\nUNION\nSELECT b",
    ]);
  });

  test("groups parentheses into bracketed segments", () => {
    const statement = child(parseSql("SELECT (1, (2));"), 0);
    if (statement?.kind !== "statement") throw new Error("expected a statement");
    const bracketed = statement.segments.find((segment) => segment.kind === "bracketed");
    expect(bracketed?.raw).toBe("(1, (2))");
    if (bracketed?.kind !== "bracketed") return;
    expect(bracketed.segments.filter((segment) => segment.kind === "bracketed").length).toBe(1);
  });

  test("does not end a statement on a semicolon inside brackets", () => {
    const file = parseSql("SELECT (1;2);");
    expect(statements(file)).toEqual(["SELECT (1;2)"]);
  });

  test("records positions", () => {
    const file = parseSql("-- head\nSELECT 1 -- tail\n;");
    expect(kinds(file)).toEqual([
      "comment",
      "newline",
      "statement",
      "whitespace",
      "comment",
      "newline",
      "statement_terminator",
      "meta",
    ]);
    const terminator = child(file, 6);
    expect(terminator?.position).toEqual({ line: 3, column: 1, offset: 25 });
    const tail = child(file, 4);
    expect(tail?.kind === "comment" ? tail.commentKind : undefined).toBe("inline");
    expect(tail?.position?.line).toBe(2);
  });

  test("ends the file with an end_of_file marker", () => {
    const file = parseSql("");
    expect(kinds(file)).toEqual(["meta"]);
    const marker = child(file, 0);
    expect(marker?.kind === "meta" ? marker.metaKind : undefined).toBe("end_of_file");
  });

  test("tokenizes unknown characters instead of failing", () => {
    expect(tokenize("SELECT $ ;").map((token) => token.image)).toEqual([
      "SELECT",
      " ",
      "$",
      " ",
      ";",
    ]);
  });

  test("treats any horizontal whitespace as whitespace", () => {
    expect(tokenize("select\u20031\u2028;").map((token) => token.image)).toEqual([
      "select",
      "\u2003",
      "1",
      "\u2028",
      ";",
    ]);

    const file = parseSql("select\u20031 ;");
    expect(file.raw).toBe("select\u20031 ;");
    expect(kinds(file)).toEqual(["statement", "whitespace", "statement_terminator", "meta"]);
    expect(statements(file)).toEqual(["select\u20031"]);
  });

  test("rejects unknown dialects", () => {
    expect(() => parseSql("SELECT 1", "postgres")).toThrow(ConfigError);
  });
});

describe("Oracle dialect", () => {
  const parser = new Parser(ORACLE);

  test("treats a slash on its own line as a terminator", () => {
    const file = parser.parse("BEGIN\n  NULL;\nEND;\n/\n");
    expect(kinds(file)).toEqual([
      "statement",
      "statement_terminator",
      "newline",
      "statement_terminator",
      "newline",
      "meta",
    ]);
    expect(statements(file)).toEqual(["BEGIN\n  NULL;\nEND"]);
  });

  test("keeps inner semicolons of a procedure in one statement", () => {
    const file = parser.parse("CREATE OR REPLACE PROCEDURE p AS\nBEGIN\n  NULL;\nEND p;\n/");
    expect(kinds(file)).toEqual([
      "statement",
      "statement_terminator",
      "newline",
      "statement_terminator",
      "meta",
    ]);
  });

  test("treats a slash after a terminator on the same line as a terminator", () => {
    const file = parser.parse("SELECT 1 FROM dual; /");
    expect(kinds(file)).toEqual([
      "statement",
      "statement_terminator",
      "whitespace",
      "statement_terminator",
      "meta",
    ]);
  });

  test("treats a slash inside an expression as division", () => {
    expect(statements(parser.parse("SELECT 10 / 2 FROM dual;"))).toEqual([
      "SELECT 10 / 2 FROM dual",
    ]);
  });

  test("splits PL/SQL blocks on semicolons under ansi", () => {
    expect(statements(parseSql("BEGIN\n  NULL;\nEND;"))).toEqual(["BEGIN\n  NULL", "END"]);
  });
});
