// Visitor utilities for traversing segment trees.

import type { Composite, Segment, SegmentKind } from "./segment";

// ---------------------------------------------------------------------------
// Visitor Interface
// ---------------------------------------------------------------------------

/**
 * Visitor interface for traversing segments.
 */
export interface Visitor {
  /** Visit a segment together with its direct parent. */
  visitSegment(segment: Segment, parent: Composite): void;
}

// ---------------------------------------------------------------------------
// Visitor Implementations
// ---------------------------------------------------------------------------

/**
 * Visitor implementation that only forwards segments of the given kinds.
 */
export class KindVisitor implements Visitor {
  private readonly kinds: ReadonlySet<SegmentKind>;

  constructor(
    kinds: Iterable<SegmentKind>,
    private readonly segmentFunc: (segment: Segment, parent: Composite) => void
  ) {
    this.kinds = new Set(kinds);
  }

  visitSegment(segment: Segment, parent: Composite): void {
    if (this.kinds.has(segment.kind)) {
      this.segmentFunc(segment, parent);
    }
  }
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

/**
 * Walk every descendant of `root` in pre-order. The root itself is not visited.
 */
export function walk(root: Composite, visitor: Visitor): void {
  for (const segment of root.segments) {
    visitor.visitSegment(segment, root);
    if (segment.isComposite()) {
      walk(segment, visitor);
    }
  }
}

/**
 * Ancestors of `target` from `root` down to the target's direct parent.
 * Empty when `target` is `root` or is not inside it.
 */
export function pathTo(root: Composite, target: Segment): Composite[] {
  if (root.segments.includes(target)) {
    return [root];
  }
  for (const segment of root.segments) {
    if (segment.isComposite()) {
      const path = pathTo(segment, target);
      if (path.length > 0) {
        return [root, ...path];
      }
    }
  }
  return [];
}

/**
 * Direct parent of `target` within `root`.
 */
export function parentOf(root: Composite, target: Segment): Composite | undefined {
  return pathTo(root, target).at(-1);
}
