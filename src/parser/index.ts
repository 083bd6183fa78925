// Parser module
// Turns SQL source into segment trees

import type { FileSegment } from "../common/segment";
import { type Dialect, getDialect } from "./dialects";
import { Parser } from "./parser";

export { Parser } from "./parser";
export { tokenize } from "./lexer";
export { ANSI, ORACLE, dialectNames, getDialect, isDialectName } from "./dialects";
/** Dialect settings and names. */
export type { Dialect, DialectName } from "./dialects";

/**
 * Parse SQL source with the named dialect.
 */
export function parseSql(source: string, dialect: string | Dialect = "ansi"): FileSegment {
  const resolved = typeof dialect === "string" ? getDialect(dialect) : dialect;
  return new Parser(resolved).parse(source);
}
