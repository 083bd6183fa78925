// Segment Rewriter
// Applies edit descriptions to a tree and rebuilds the subtrees that change.

import type { EditOp } from "./edits";
import {
  BracketedSegment,
  type Composite,
  FileSegment,
  type RawSegment,
  type Segment,
  StatementSegment,
} from "./segment";

interface EditPlan {
  before: RawSegment[];
  after: RawSegment[];
  replacement?: readonly RawSegment[];
  deleted: boolean;
}

/**
 * Rewriter rebuilds a file with a set of edits applied.
 */
export class Rewriter {
  /**
   * Apply edits to a file. Unchanged subtrees are shared with the input.
   */
  rewrite(file: FileSegment, edits: readonly EditOp[]): FileSegment {
    if (edits.length === 0) {
      return file;
    }
    const plans = this.plan(edits);
    const rewritten = this.rewriteComposite(file, plans);
    return rewritten instanceof FileSegment ? rewritten : file;
  }

  /**
   * Apply edits and render the resulting SQL text.
   */
  apply(file: FileSegment, edits: readonly EditOp[]): string {
    return this.rewrite(file, edits).raw;
  }

  private plan(edits: readonly EditOp[]): Map<Segment, EditPlan> {
    const plans = new Map<Segment, EditPlan>();
    const planFor = (segment: Segment): EditPlan => {
      let plan = plans.get(segment);
      if (plan === undefined) {
        plan = { before: [], after: [], deleted: false };
        plans.set(segment, plan);
      }
      return plan;
    };
    for (const edit of edits) {
      const plan = planFor(edit.anchor);
      switch (edit.kind) {
        case "insert_before":
          plan.before.push(...edit.segments);
          break;
        case "insert_after":
          plan.after.push(...edit.segments);
          break;
        case "replace":
          plan.replacement = edit.segments;
          break;
        case "delete":
          plan.deleted = true;
          break;
      }
    }
    return plans;
  }

  private rewriteComposite(
    segment: Composite,
    plans: ReadonlyMap<Segment, EditPlan>
  ): Composite {
    let changed = false;
    const children: Segment[] = [];
    for (const child of segment.segments) {
      const plan = plans.get(child);
      if (plan !== undefined) {
        changed = true;
        children.push(...plan.before);
        if (plan.replacement !== undefined) {
          children.push(...plan.replacement);
        } else if (!plan.deleted) {
          children.push(this.rewriteChild(child, plans));
        }
        children.push(...plan.after);
        continue;
      }
      const next = this.rewriteChild(child, plans);
      if (next !== child) {
        changed = true;
      }
      children.push(next);
    }
    if (!changed) {
      return segment;
    }
    switch (segment.kind) {
      case "file":
        return new FileSegment(children);
      case "statement":
        return new StatementSegment(children);
      case "bracketed":
        return new BracketedSegment(children);
    }
  }

  private rewriteChild(segment: Segment, plans: ReadonlyMap<Segment, EditPlan>): Segment {
    return segment.isComposite() ? this.rewriteComposite(segment, plans) : segment;
  }
}
