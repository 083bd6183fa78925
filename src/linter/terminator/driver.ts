// File-level terminator evaluation.
// One left-to-right pass over the children of the file: terminators are
// checked for repetition and placement, statements left without one are
// reported at the end.

import { Edit, type EditOp } from "../../common/edits";
import { Segments } from "../../common/selector";
import {
  type FileSegment,
  type Segment,
  type StatementSegment,
  newline,
  semicolon,
} from "../../common/segment";
import { logger } from "../../logger";
import type { AnalysisResult, RuleOptions } from "../types";
import {
  analyzePlacement,
  isInSingleLineStatement,
  isSingleLineStatement,
  needsNewlineBeforeTerminator,
  protectPrecedingInlineComments,
  protectTrailingInlineComments,
} from "./placement";
import { chooseAnchor, synthesizeTerminatorEdits } from "./synthesizer";

export const Messages = {
  repeated: "Statement is terminated more than once.",
  sameLine: "Statement terminator should directly follow the statement.",
  ownLine: "Statement terminator should be on its own line after a multi-line statement.",
  missing: "Statement is missing a terminator.",
  missingFinal: "File should end with a statement terminator.",
} as const;

function isSemicolonTerminator(segment: Segment): boolean {
  return segment.kind === "statement_terminator" && segment.raw === ";";
}

/**
 * Evaluate terminator placement over a whole file.
 */
export function evaluateTerminators(file: FileSegment, options: RuleOptions): AnalysisResult[] {
  const results: AnalysisResult[] = [];
  const pending: StatementSegment[] = [];
  const collapsed = new Set<Segment>();
  const children = file.segments;

  children.forEach((segment, index) => {
    let result: AnalysisResult | undefined;

    if (segment.kind === "statement") {
      pending.push(segment);
    }

    if (segment.kind === "statement_terminator") {
      if (collapsed.has(segment)) {
        return;
      }
      logger.debug(`Handling terminator ${segment.toString()} at index ${index}`);
      result = handleTerminator(segment, file, options, collapsed);
      pending.pop();
    } else if (options.requireFinalSemicolon && index === children.length - 1) {
      logger.debug(`Handling final segment ${segment.toString()}`);
      result = ensureFinalTerminator(file, options);
    }

    if (result !== undefined) {
      results.push(result);
    }
  });

  if (options.requireFinalSemicolon) {
    const lastStatement = new Segments(children)
      .last((segment) => segment.kind === "statement")
      .get(0);
    for (const statement of pending) {
      if (statement === lastStatement) {
        continue;
      }
      const result = handleMissingTerminator(statement, file, options);
      if (result !== undefined) {
        results.push(result);
      }
    }
  }

  return results;
}

function handleTerminator(
  target: Segment,
  file: FileSegment,
  options: RuleOptions,
  collapsed: Set<Segment>
): AnalysisResult | undefined {
  // Other terminators, such as the Oracle slash, are left alone.
  if (target.raw !== ";") {
    return undefined;
  }

  const repeated = collapseRepeatedTerminators(target, file);
  if (repeated !== undefined) {
    for (const segment of repeated.removed) {
      collapsed.add(segment);
    }
    return repeated.result;
  }

  const context = analyzePlacement(target, file);
  const ownLine = needsNewlineBeforeTerminator(options.multilineNewline, context.isSingleLineStatement);
  logger.debug(`Terminator on own line: ${ownLine}`);

  if (!ownLine) {
    if (context.precedingTrivia.isEmpty()) {
      return undefined;
    }
    return {
      anchor: context.anchor,
      message: Messages.sameLine,
      edits: synthesizeTerminatorEdits(
        file,
        target,
        context.anchor,
        context.whitespaceToDelete,
        [semicolon()]
      ),
    };
  }

  const adjusted = protectPrecedingInlineComments(context.precedingTrivia, context.anchor);
  if (
    adjusted.precedingTrivia.length === 1 &&
    adjusted.precedingTrivia.all((segment) => segment.kind === "newline")
  ) {
    return undefined;
  }

  const anchor = protectTrailingInlineComments(file, adjusted.anchor, target);
  const edits: EditOp[] =
    anchor === target
      ? [Edit.replace(target, [newline(), semicolon()])]
      : synthesizeTerminatorEdits(file, target, anchor, context.whitespaceToDelete, [
          newline(),
          semicolon(),
        ]);
  return { anchor, message: Messages.ownLine, edits };
}

/**
 * Collapse a run of `;` terminators separated at most by whitespace.
 * The first is kept; later ones and the whitespace between them are deleted.
 */
function collapseRepeatedTerminators(
  target: Segment,
  file: FileSegment
): { result: AnalysisResult; removed: Segment[] } | undefined {
  const children = file.segments;
  const start = children.indexOf(target);
  if (start < 0) {
    return undefined;
  }

  const run: Segment[] = [target];
  let lastIndex = start;
  let index = start + 1;
  while (index < children.length) {
    const segment = children[index];
    if (segment === undefined) {
      break;
    }
    if (isSemicolonTerminator(segment)) {
      run.push(segment);
      lastIndex = index;
      index++;
      continue;
    }
    if (segment.kind !== "whitespace") {
      break;
    }
    let next = index + 1;
    while (children[next]?.kind === "whitespace") {
      next++;
    }
    const following = children[next];
    if (following === undefined || !isSemicolonTerminator(following)) {
      break;
    }
    index++;
  }

  if (run.length < 2) {
    return undefined;
  }

  const removed = run.slice(1);
  const edits = removed.map((segment) => Edit.delete(segment));
  for (let i = start + 1; i < lastIndex; i++) {
    const segment = children[i];
    if (segment !== undefined && segment.kind === "whitespace") {
      edits.push(Edit.delete(segment));
    }
  }
  return { result: { anchor: target, message: Messages.repeated, edits }, removed };
}

/**
 * Add a terminator at the end of a file that has none at all.
 */
function ensureFinalTerminator(file: FileSegment, options: RuleOptions): AnalysisResult | undefined {
  const children = new Segments(file.segments);
  const lastCode = children.last((segment) => segment.isCode).get(0);
  if (lastCode === undefined) {
    return undefined;
  }
  if (children.any((segment) => segment.kind === "statement_terminator")) {
    return undefined;
  }

  // Trivia after the last code, nearest the end first.
  const trailing: Segment[] = [];
  let anchor: Segment = lastCode;
  let trigger: Segment = lastCode;
  for (const segment of children.reversed()) {
    anchor = segment;
    if (segment.isCode) {
      break;
    }
    if (!segment.isMeta) {
      trailing.push(segment);
    }
    trigger = segment;
  }
  logger.debug(`Final terminator: trigger ${trigger.toString()}, anchor ${anchor.toString()}`);

  const singleLine = isInSingleLineStatement(file, lastRawCode(lastCode));
  if (!needsNewlineBeforeTerminator(options.multilineNewline, singleLine)) {
    return {
      anchor: trigger,
      message: Messages.missingFinal,
      edits: [Edit.insertAfter(chooseAnchor(file, anchor), [semicolon()])],
    };
  }

  const adjusted = protectPrecedingInlineComments(new Segments(trailing), anchor);
  logger.debug(`Final terminator: revised anchor ${adjusted.anchor.toString()}`);
  return {
    anchor: trigger,
    message: Messages.missingFinal,
    edits: [Edit.insertAfter(chooseAnchor(file, adjusted.anchor), [newline(), semicolon()])],
  };
}

/**
 * Add a terminator after a statement that is followed by another statement
 * without one.
 */
function handleMissingTerminator(
  statement: StatementSegment,
  file: FileSegment,
  options: RuleOptions
): AnalysisResult | undefined {
  const lastNonMeta = new Segments(statement.segments).last((segment) => !segment.isMeta).get(0);
  if (lastNonMeta === undefined) {
    return undefined;
  }

  const ownLine = needsNewlineBeforeTerminator(
    options.multilineNewline,
    isSingleLineStatement(statement)
  );
  // A terminator on the same line must not land after an inline comment.
  const anchor = ownLine ? protectTrailingInlineComments(file, lastNonMeta) : lastNonMeta;
  const insert = ownLine ? [newline(), semicolon()] : [semicolon()];

  return {
    anchor: lastNonMeta,
    message: Messages.missing,
    edits: [Edit.insertAfter(chooseAnchor(file, anchor), insert)],
  };
}

/**
 * Last raw code segment of a (possibly composite) code segment.
 */
function lastRawCode(segment: Segment): Segment {
  if (!segment.isComposite()) {
    return segment;
  }
  return new Segments(segment.rawSegments()).last((raw) => raw.isCode).get(0) ?? segment;
}
