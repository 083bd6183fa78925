import type { FileSegment } from "../../common/segment";
import type { LintContext, LintRule } from "../types";
import { evaluateTerminators } from "./driver";

export { evaluateTerminators, Messages as TerminatorMessages } from "./driver";
export {
  analyzePlacement,
  isSingleLineStatement,
  locateStatementContext,
  needsNewlineBeforeTerminator,
  type PlacementContext,
} from "./placement";
export { chooseAnchor, synthesizeTerminatorEdits } from "./synthesizer";

function applyStatementTerminator(file: FileSegment, ctx: LintContext): void {
  for (const result of evaluateTerminators(file, ctx.options)) {
    ctx.report(result);
  }
}

/**
 * Statements end with exactly one `;` placed right after the statement,
 * or on its own line when configured for multi-line statements.
 */
export const statementTerminatorRule: LintRule = {
  name: "statement-terminator",
  description: "Statements should end with a single, correctly placed semicolon.",
  apply: applyStatementTerminator,
};
