/**
 * sqlterm: statement terminator linting for SQL
 *
 * Parses SQL into a segment tree, checks that every statement ends with a
 * single, correctly placed terminator and rewrites the source to fix it.
 *
 * @packageDocumentation
 * @module sqlterm
 *
 * @example
 * ```typescript
 * import { Linter } from "sqlterm";
 *
 * const linter = new Linter({ requireFinalSemicolon: true });
 * linter.lint("SELECT 1 ;").map((d) => d.message);
 * // ["Statement terminator should directly follow the statement."]
 *
 * linter.fix("SELECT 1\nSELECT 2").source;
 * // "SELECT 1;\nSELECT 2;"
 * ```
 */

// Version information
export { VERSION } from "./version";

// Linter and rules
export * from "./linter";

// Parser and segment tree
export * from "./parser";
export * from "./common/segment";
export { Segments, sp, type SegmentPredicate, type SelectOptions } from "./common/selector";
export { Edit, type EditKind, type EditOp, describeEdit, findConflictingAnchor } from "./common/edits";
export { Rewriter } from "./common/rewriter";
export { pathTo, parentOf, walk, KindVisitor, type Visitor } from "./common/visitor";

// Configuration and errors
export {
  DEFAULT_CONFIG_FILE,
  defaultLinterOptions,
  findConfig,
  loadConfig,
  parseConfig,
  resolveOptions,
  type LinterOptions,
} from "./config";
export { ConfigError, ParseError, SqltermError } from "./errors";
export { logger, setLogLevel, type LogLevelName } from "./logger";
