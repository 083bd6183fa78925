import { slashTerminatorRule } from "./slash-terminator";
import { statementTerminatorRule } from "./terminator";
import type { LintRule } from "./types";

export const defaultRules: LintRule[] = [statementTerminatorRule, slashTerminatorRule];

export const ruleNames: readonly string[] = defaultRules.map((rule) => rule.name);
