// Oracle `/` terminators belong on a line of their own.

import { Edit } from "../common/edits";
import { type FileSegment, newline, type Segment } from "../common/segment";
import { KindVisitor, walk } from "../common/visitor";
import { logger } from "../logger";
import type { LintContext, LintRule } from "./types";

export const SLASH_MESSAGE = "Slash terminator should be on a new line.";

function startsLine(previous: Segment): boolean {
  return previous.kind === "newline" || (previous.kind === "whitespace" && previous.raw.includes("\n"));
}

function applySlashTerminator(file: FileSegment, ctx: LintContext): void {
  if (ctx.dialect.name !== "oracle") return;

  const visitor = new KindVisitor(["statement_terminator"], (segment, parent) => {
    if (segment.raw.trim() !== "/") return;
    if (segment.position?.offset === 0) return;

    const index = parent.segments.indexOf(segment);
    const previous = index > 0 ? parent.segments[index - 1] : undefined;
    if (previous === undefined || startsLine(previous)) return;

    logger.debug(`Slash terminator follows ${previous.toString()}`);
    ctx.report({
      anchor: segment,
      message: SLASH_MESSAGE,
      edits: [Edit.insertBefore(segment, [newline()])],
    });
  });
  walk(file, visitor);
}

export const slashTerminatorRule: LintRule = {
  name: "slash-terminator",
  description: "Oracle slash terminators should start a new line.",
  apply: applySlashTerminator,
};
