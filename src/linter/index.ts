// Linter module
// Rules, the linter and its fix loop

export { Linter, type FixResult } from "./linter";
export { defaultRules, ruleNames } from "./rules";
export { SLASH_MESSAGE, slashTerminatorRule } from "./slash-terminator";
export {
  TerminatorMessages,
  evaluateTerminators,
  statementTerminatorRule,
} from "./terminator";
export type {
  AnalysisResult,
  LintContext,
  LintDiagnostic,
  LintLocation,
  LintRule,
  LintSeverity,
  RuleOptions,
} from "./types";
