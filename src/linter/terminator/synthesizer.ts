// Edit synthesis for moving a terminator.

import { Edit, type EditOp } from "../../common/edits";
import type { Segments } from "../../common/selector";
import type { FileSegment, RawSegment, Segment } from "../../common/segment";
import { parentOf, pathTo } from "../../common/visitor";

export type InsertionSide = "insert_before" | "insert_after";

/**
 * Choose where an insertion attaches.
 *
 * A zero-width marker gives way to the nearest preceding real sibling. The
 * anchor is then hoisted to each ancestor it ends (or starts) until the file
 * level, which is the only segment allowed to begin or end with non-code.
 */
export function chooseAnchor(
  root: FileSegment,
  segment: Segment,
  side: InsertionSide = "insert_after"
): Segment {
  let anchor = skipMeta(root, segment);
  let child = anchor;
  const path = pathTo(root, anchor);
  for (let i = path.length - 1; i >= 0; i--) {
    const ancestor = path[i];
    if (ancestor === undefined || ancestor.kind === "file") {
      break;
    }
    const candidates = [
      ancestor.segments.filter((s) => !s.isMeta),
      ancestor.segments,
    ];
    const hoist = candidates.some((children) => {
      const edge = side === "insert_before" ? children[0] : children[children.length - 1];
      return edge === child;
    });
    if (!hoist) {
      break;
    }
    anchor = ancestor;
    child = ancestor;
  }
  return anchor;
}

function skipMeta(root: FileSegment, segment: Segment): Segment {
  if (!segment.isMeta) {
    return segment;
  }
  const parent = parentOf(root, segment);
  if (parent === undefined) {
    return segment;
  }
  const index = parent.segments.indexOf(segment);
  for (let i = index - 1; i >= 0; i--) {
    const sibling = parent.segments[i];
    if (sibling !== undefined && !sibling.isMeta) {
      return sibling;
    }
  }
  return segment;
}

/**
 * Edits that re-create a terminator after `anchor`, remove the original
 * `target` and remove the given whitespace.
 *
 * When the chosen anchor is itself scheduled for deletion it is replaced
 * instead, so no segment is both deleted and written to.
 */
export function synthesizeTerminatorEdits(
  root: FileSegment,
  target: Segment,
  anchor: Segment,
  whitespaceToDelete: Segments,
  insert: readonly RawSegment[]
): EditOp[] {
  const resolved = chooseAnchor(root, anchor, "insert_after");
  let deletions = whitespaceToDelete;
  let placement: EditOp;
  if (deletions.includes(resolved)) {
    placement = Edit.replace(resolved, insert);
    deletions = deletions.filter((segment) => segment !== resolved);
  } else {
    placement = Edit.insertAfter(resolved, insert);
  }
  return [placement, Edit.delete(target), ...deletions.toArray().map((segment) => Edit.delete(segment))];
}
