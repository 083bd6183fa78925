// Segment Selector
// Immutable sequences of segments with predicate-driven scanning.

import type { Segment, SegmentKind } from "./segment";

/** Predicate over a single segment. */
export type SegmentPredicate = (segment: Segment) => boolean;

/**
 * Options for {@link Segments.select}.
 */
export interface SelectOptions {
  /** Keep only segments matching this predicate. */
  select?: SegmentPredicate;
  /** Stop at the first segment failing this predicate. */
  loopWhile?: SegmentPredicate;
  /** Start scanning just after this segment. */
  startSegment?: Segment;
  /** Stop scanning just before this segment. */
  stopSegment?: Segment;
}

/**
 * Ordered, immutable sequence of segments.
 *
 * A reversed view is a new sequence in reverse order; anything selected from
 * it comes back nearest-first and has to be reversed again before it is
 * compared with a forward sequence.
 */
export class Segments implements Iterable<Segment> {
  private readonly items: readonly Segment[];

  constructor(items: Iterable<Segment> = []) {
    this.items = [...items];
  }

  static of(...items: Segment[]): Segments {
    return new Segments(items);
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Segment> {
    return this.items[Symbol.iterator]();
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Segment at `index`; negative indices count from the end.
   */
  get(index: number): Segment | undefined {
    return this.items.at(index);
  }

  indexOf(segment: Segment): number {
    return this.items.indexOf(segment);
  }

  includes(segment: Segment): boolean {
    return this.items.includes(segment);
  }

  toArray(): Segment[] {
    return [...this.items];
  }

  reversed(): Segments {
    return new Segments([...this.items].reverse());
  }

  slice(start?: number, end?: number): Segments {
    return new Segments(this.items.slice(start, end));
  }

  filter(predicate: SegmentPredicate): Segments {
    return new Segments(this.items.filter(predicate));
  }

  any(predicate: SegmentPredicate = () => true): boolean {
    return this.items.some(predicate);
  }

  all(predicate: SegmentPredicate): boolean {
    return this.items.every(predicate);
  }

  /**
   * First segment matching the predicate, as a sequence of zero or one.
   */
  first(predicate: SegmentPredicate = () => true): Segments {
    const found = this.items.find(predicate);
    return found === undefined ? new Segments() : Segments.of(found);
  }

  /**
   * Last segment matching the predicate, as a sequence of zero or one.
   */
  last(predicate: SegmentPredicate = () => true): Segments {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const segment = this.items[i];
      if (segment !== undefined && predicate(segment)) {
        return Segments.of(segment);
      }
    }
    return new Segments();
  }

  /**
   * Scan the segments between `startSegment` and `stopSegment` (both
   * exclusive), stopping at the first segment failing `loopWhile`, and keep
   * those matching `select`.
   *
   * A `startSegment` that is not in the sequence starts from the beginning.
   */
  select(options: SelectOptions = {}): Segments {
    const { select, loopWhile, startSegment, stopSegment } = options;
    const startIndex = startSegment === undefined ? -1 : this.items.indexOf(startSegment);
    const stopIndex =
      stopSegment === undefined ? this.items.length : this.items.indexOf(stopSegment);
    const end = stopIndex < 0 ? this.items.length : stopIndex;

    const buffer: Segment[] = [];
    for (let i = startIndex + 1; i < end; i++) {
      const segment = this.items[i];
      if (segment === undefined) {
        break;
      }
      if (loopWhile !== undefined && !loopWhile(segment)) {
        break;
      }
      if (select === undefined || select(segment)) {
        buffer.push(segment);
      }
    }
    return new Segments(buffer);
  }
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

/**
 * Segment predicate constructors.
 */
export const sp = {
  isCode: (): SegmentPredicate => (segment) => segment.isCode,
  isMeta: (): SegmentPredicate => (segment) => segment.isMeta,
  isComment: (): SegmentPredicate => (segment) => segment.isComment,
  isWhitespace: (): SegmentPredicate => (segment) => segment.isWhitespace,
  isInlineComment: (): SegmentPredicate => (segment) =>
    segment.kind === "comment" && segment.commentKind === "inline",
  isKind:
    (...kinds: SegmentKind[]): SegmentPredicate =>
    (segment) =>
      kinds.includes(segment.kind),
  rawIs:
    (...raws: string[]): SegmentPredicate =>
    (segment) =>
      raws.includes(segment.raw),
  not:
    (predicate: SegmentPredicate): SegmentPredicate =>
    (segment) =>
      !predicate(segment),
  and:
    (...predicates: SegmentPredicate[]): SegmentPredicate =>
    (segment) =>
      predicates.every((predicate) => predicate(segment)),
  or:
    (...predicates: SegmentPredicate[]): SegmentPredicate =>
    (segment) =>
      predicates.some((predicate) => predicate(segment)),
} as const;
