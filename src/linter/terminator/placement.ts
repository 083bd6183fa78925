// Terminator placement analysis.
// Works out where a terminator should sit relative to the code before it and
// which trivia in between may be removed.

import { Segments, sp } from "../../common/selector";
import type { Composite, FileSegment, Segment, StatementSegment } from "../../common/segment";
import { pathTo } from "../../common/visitor";

/**
 * Everything needed to move one terminator.
 */
export interface PlacementContext {
  /** Segment the terminator is re-created after. */
  anchor: Segment;
  /** No newline anywhere in the statement owning the preceding code. */
  isSingleLineStatement: boolean;
  /** Non-meta trivia between the preceding code and the terminator, nearest first. */
  precedingTrivia: Segments;
  /** Leading run of `precedingTrivia` that is plain whitespace. */
  whitespaceToDelete: Segments;
}

/**
 * Nearest `statement` ancestor of a segment, if any.
 */
export function locateStatementContext(root: Composite, segment: Segment): StatementSegment | undefined {
  const path = pathTo(root, segment);
  for (let i = path.length - 1; i >= 0; i--) {
    const ancestor = path[i];
    if (ancestor?.kind === "statement") {
      return ancestor;
    }
  }
  return undefined;
}

export function isSingleLineStatement(statement: Composite): boolean {
  return statement.recursiveCrawl("newline").next().done === true;
}

/**
 * Whether the statement containing `segment` fits on one line.
 * Segments outside any statement are treated as multi-line.
 */
export function isInSingleLineStatement(root: Composite, segment: Segment): boolean {
  const statement = locateStatementContext(root, segment);
  return statement !== undefined && isSingleLineStatement(statement);
}

export function needsNewlineBeforeTerminator(
  multilineNewline: boolean,
  singleLineStatement: boolean
): boolean {
  return multilineNewline && !singleLineStatement;
}

/**
 * Collect the trivia between a terminator and the code before it.
 */
export function analyzePlacement(target: Segment, root: FileSegment): PlacementContext {
  const reversedRaws = new Segments(root.rawSegments()).reversed();
  const beforeCode = reversedRaws.select({ loopWhile: sp.not(sp.isCode()), startSegment: target });
  const precedingTrivia = beforeCode.filter(sp.not(sp.isMeta()));
  const anchor = beforeCode.get(-1) ?? target;

  const firstCode = reversedRaws.select({ select: sp.isCode(), startSegment: target }).get(0);
  const isSingleLine =
    firstCode !== undefined ? isInSingleLineStatement(root, firstCode) : false;

  // Only plain whitespace right before the terminator is tidied; comments stay put.
  const whitespaceToDelete = precedingTrivia.select({ loopWhile: sp.isWhitespace() });

  return {
    anchor,
    isSingleLineStatement: isSingleLine,
    precedingTrivia,
    whitespaceToDelete,
  };
}

/**
 * Keep an inline comment on the same line as the anchor where it is.
 *
 * Such a comment may carry a suppression directive, so it becomes the new
 * anchor and the trivia from it backwards is dropped.
 */
export function protectPrecedingInlineComments(
  precedingTrivia: Segments,
  anchor: Segment
): { precedingTrivia: Segments; anchor: Segment } {
  const anchorLine = anchor.lastLine;
  const comment = precedingTrivia
    .first(
      (segment) =>
        sp.isInlineComment()(segment) &&
        segment.position !== undefined &&
        segment.position.line === anchorLine
    )
    .get(0);
  if (comment === undefined) {
    return { precedingTrivia, anchor };
  }
  return {
    precedingTrivia: precedingTrivia.slice(0, precedingTrivia.indexOf(comment)),
    anchor: comment,
  };
}

/**
 * Move the anchor past any inline comment sharing its line, so the
 * comment stays next to the code it annotates. Only comments before the
 * next code segment count; `target` is the terminator being moved and is
 * not treated as code. The last such comment wins.
 */
export function protectTrailingInlineComments(
  root: Composite,
  anchor: Segment,
  target?: Segment
): Segment {
  const anchorLine = anchor.lastLine;
  if (anchorLine === undefined) {
    return anchor;
  }
  const raws = root.rawSegments();
  const last = anchor.isComposite() ? anchor.rawSegments().at(-1) : anchor;
  const start = raws.findIndex((raw) => raw === last);
  if (start < 0) {
    return anchor;
  }

  let result = anchor;
  for (const raw of raws.slice(start + 1)) {
    if (raw.isCode && raw !== target) {
      break;
    }
    if (raw.kind === "comment" && raw.commentKind === "inline" && raw.position?.line === anchorLine) {
      result = raw;
    }
  }
  return result;
}
