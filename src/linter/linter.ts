import { type EditOp, describeEdit } from "../common/edits";
import { Rewriter } from "../common/rewriter";
import type { FileSegment, Segment } from "../common/segment";
import { type LinterOptions, resolveOptions } from "../config";
import { logger } from "../logger";
import { type Dialect, getDialect } from "../parser/dialects";
import { Parser } from "../parser/parser";
import { defaultRules } from "./rules";
import type {
  AnalysisResult,
  LintContext,
  LintDiagnostic,
  LintLocation,
  LintRule,
  RuleOptions,
} from "./types";

/**
 * Public linter type exports.
 */
export type {
  AnalysisResult,
  LintContext,
  LintDiagnostic,
  LintLocation,
  LintRule,
  LintSeverity,
  RuleOptions,
} from "./types";

/**
 * Outcome of {@link Linter.fix}.
 */
export interface FixResult {
  /** Source after all applied fixes. */
  source: string;
  /** Whether any fix was applied. */
  fixed: boolean;
  /** Number of passes that applied at least one fix. */
  loops: number;
  /** Diagnostics left in the final source. */
  remaining: LintDiagnostic[];
}

/**
 * Linter runs SQL lint rules over a parsed file and applies their fixes.
 */
export class Linter {
  private readonly rules: readonly LintRule[];
  private readonly dialect: Dialect;
  private readonly ruleOptions: RuleOptions;
  private readonly fixLoopLimit: number;
  private readonly parser: Parser;
  private readonly rewriter = new Rewriter();

  constructor(options: LinterOptions = {}, rules: readonly LintRule[] = defaultRules) {
    const resolved = resolveOptions(options);
    this.rules = rules.filter((rule) => resolved.rules.includes(rule.name));
    this.dialect = getDialect(resolved.dialect);
    this.ruleOptions = {
      multilineNewline: resolved.multilineNewline,
      requireFinalSemicolon: resolved.requireFinalSemicolon,
    };
    this.fixLoopLimit = resolved.fixLoopLimit;
    this.parser = new Parser(this.dialect);
  }

  /**
   * Parse and lint SQL source.
   */
  lint(source: string): LintDiagnostic[] {
    return this.lintTree(this.parser.parse(source));
  }

  /**
   * Lint an already parsed file.
   */
  lintTree(file: FileSegment): LintDiagnostic[] {
    const diagnostics: LintDiagnostic[] = [];
    for (const rule of this.rules) {
      const ctx: LintContext = {
        dialect: this.dialect,
        options: this.ruleOptions,
        report: (result) => {
          diagnostics.push(this.toDiagnostic(rule, result, file));
        },
      };
      rule.apply(file, ctx);
    }
    return diagnostics.sort(compareDiagnostics);
  }

  /**
   * Lint and fix SQL source until it is clean or the pass limit is reached.
   */
  fix(source: string): FixResult {
    let current = source;
    let loops = 0;
    let file = this.parser.parse(current);
    let diagnostics = this.lintTree(file);

    while (loops < this.fixLoopLimit) {
      const edits = selectEdits(diagnostics);
      if (edits.length === 0) {
        break;
      }
      loops++;
      logger.debug(`Fix pass ${loops}: applying ${edits.length} edits`);
      for (const edit of edits) {
        logger.debug(`  ${describeEdit(edit)}`);
      }
      current = this.rewriter.apply(file, edits);
      file = this.parser.parse(current);
      diagnostics = this.lintTree(file);
    }

    if (diagnostics.some((diagnostic) => diagnostic.edits.length > 0)) {
      logger.debug(`Fix loop stopped after ${loops} passes with fixes pending`);
    }
    return { source: current, fixed: current !== source, loops, remaining: diagnostics };
  }

  private toDiagnostic(rule: LintRule, result: AnalysisResult, file: FileSegment): LintDiagnostic {
    const diagnostic: LintDiagnostic = {
      rule: rule.name,
      message: result.message,
      severity: "warning",
      anchor: result.anchor,
      edits: result.edits,
    };
    return this.decorateLocation(diagnostic, file);
  }

  private decorateLocation(diagnostic: LintDiagnostic, file: FileSegment): LintDiagnostic {
    const position = locate(diagnostic.anchor, file);
    if (position === undefined) {
      return diagnostic;
    }
    const location: LintLocation = { line: position.line, column: position.column };
    return { ...diagnostic, location };
  }
}

/**
 * Position of a segment, falling back to the nearest positioned raw segment
 * before it.
 */
function locate(anchor: Segment, file: FileSegment): LintLocation | undefined {
  if (anchor.position !== undefined) {
    return anchor.position;
  }
  const raws = file.rawSegments();
  const first = anchor.isComposite() ? anchor.rawSegments()[0] : anchor;
  const index = raws.findIndex((raw) => raw === first);
  for (let i = index; i >= 0; i--) {
    const position = raws[i]?.position;
    if (position !== undefined) {
      return position;
    }
  }
  return undefined;
}

function compareDiagnostics(a: LintDiagnostic, b: LintDiagnostic): number {
  const lineA = a.location?.line ?? Number.MAX_SAFE_INTEGER;
  const lineB = b.location?.line ?? Number.MAX_SAFE_INTEGER;
  if (lineA !== lineB) {
    return lineA - lineB;
  }
  return (a.location?.column ?? 0) - (b.location?.column ?? 0);
}

/**
 * Edits of every diagnostic whose segments were not touched by an earlier one.
 * Skipped diagnostics are recomputed on the next pass.
 */
function selectEdits(diagnostics: readonly LintDiagnostic[]): EditOp[] {
  const touched = new Set<Segment>();
  const accepted: EditOp[] = [];
  for (const diagnostic of diagnostics) {
    if (diagnostic.edits.length === 0) {
      continue;
    }
    if (diagnostic.edits.some((edit) => touched.has(edit.anchor))) {
      continue;
    }
    for (const edit of diagnostic.edits) {
      touched.add(edit.anchor);
      accepted.push(edit);
    }
  }
  return accepted;
}
