// Tree edit descriptions.
// Rules never mutate the tree; they describe edits which the rewriter applies.

import type { RawSegment, Segment } from "./segment";

export type EditKind = "insert_before" | "insert_after" | "replace" | "delete";

export type EditOp =
  | { kind: "insert_before"; anchor: Segment; segments: readonly RawSegment[] }
  | { kind: "insert_after"; anchor: Segment; segments: readonly RawSegment[] }
  | { kind: "replace"; anchor: Segment; segments: readonly RawSegment[] }
  | { kind: "delete"; anchor: Segment };

/**
 * Constructors for edit operations.
 */
export const Edit = {
  insertBefore: (anchor: Segment, segments: readonly RawSegment[]): EditOp => ({
    kind: "insert_before",
    anchor,
    segments,
  }),
  insertAfter: (anchor: Segment, segments: readonly RawSegment[]): EditOp => ({
    kind: "insert_after",
    anchor,
    segments,
  }),
  replace: (anchor: Segment, segments: readonly RawSegment[]): EditOp => ({
    kind: "replace",
    anchor,
    segments,
  }),
  delete: (anchor: Segment): EditOp => ({ kind: "delete", anchor }),
} as const;

/**
 * Find a segment that an edit set both deletes and inserts at or replaces.
 * Returns undefined when the set is consistent.
 */
export function findConflictingAnchor(edits: readonly EditOp[]): Segment | undefined {
  const deleted = new Set<Segment>();
  const written = new Set<Segment>();
  for (const edit of edits) {
    if (edit.kind === "delete") {
      deleted.add(edit.anchor);
    } else {
      written.add(edit.anchor);
    }
  }
  for (const segment of deleted) {
    if (written.has(segment)) {
      return segment;
    }
  }
  return undefined;
}

/**
 * Render an edit for debug output.
 */
export function describeEdit(edit: EditOp): string {
  if (edit.kind === "delete") {
    return `delete ${edit.anchor.toString()}`;
  }
  const text = edit.segments.map((segment) => segment.raw).join("");
  return `${edit.kind} ${edit.anchor.toString()} ${JSON.stringify(text)}`;
}
