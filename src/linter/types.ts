import type { EditOp } from "../common/edits";
import type { FileSegment, Segment } from "../common/segment";
import type { Dialect } from "../parser/dialects";

/**
 * Severity levels used by lint diagnostics.
 */
export type LintSeverity = "info" | "warning";

/**
 * Source location for a diagnostic.
 */
export type LintLocation = {
  line: number;
  column: number;
};

/**
 * Issue found by a rule, with the edits that fix it.
 */
export type AnalysisResult = {
  /** Segment the diagnostic is reported on. */
  anchor: Segment;
  message: string;
  edits: EditOp[];
};

/**
 * Reported lint issue for a file.
 */
export type LintDiagnostic = {
  rule: string;
  message: string;
  severity: LintSeverity;
  anchor: Segment;
  location?: LintLocation;
  edits: readonly EditOp[];
};

/**
 * Resolved options rules read while evaluating a file.
 */
export type RuleOptions = {
  /** Require the terminator of a multi-line statement on its own line. */
  multilineNewline: boolean;
  /** Require a terminator after the last statement of the file. */
  requireFinalSemicolon: boolean;
};

/**
 * Lint context passed to rules.
 */
export type LintContext = {
  dialect: Dialect;
  options: RuleOptions;
  report: (result: AnalysisResult) => void;
};

/**
 * Lint rule implementation.
 */
export type LintRule = {
  name: string;
  description: string;
  apply: (file: FileSegment, ctx: LintContext) => void;
};
