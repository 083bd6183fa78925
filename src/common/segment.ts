// SQL Concrete Syntax Tree
// Segments are the nodes of a parsed SQL file. Raw segments hold source text,
// composite segments group them. The tree is never mutated after parsing;
// edits are described separately and applied by the rewriter.

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

export type SegmentKind =
  | "file"
  | "statement"
  | "bracketed"
  | "statement_terminator"
  | "code"
  | "whitespace"
  | "newline"
  | "comment"
  | "meta";

export type CompositeKind = "file" | "statement" | "bracketed";

/** Classification of a code token. `other` covers anything the lexer did not recognise. */
export type CodeType = "word" | "literal" | "symbol" | "other";

export type CommentKind = "inline" | "block";

export type MetaKind = "indent" | "dedent" | "end_of_file";

export type Segment =
  | FileSegment
  | StatementSegment
  | BracketedSegment
  | TerminatorSegment
  | CodeSegment
  | WhitespaceSegment
  | NewlineSegment
  | CommentSegment
  | MetaSegment;

export type Composite = FileSegment | StatementSegment | BracketedSegment;

export type RawSegment =
  | TerminatorSegment
  | CodeSegment
  | WhitespaceSegment
  | NewlineSegment
  | CommentSegment
  | MetaSegment;

/**
 * Position of a raw segment in the source.
 * Lines and columns are 1-based, offsets 0-based.
 */
export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

/**
 * Base class providing shared behavior for segments.
 */
export abstract class BaseSegment {
  abstract readonly kind: SegmentKind;

  /** Source text covered by the segment. */
  abstract get raw(): string;

  /** First source position covered by the segment, if any. */
  abstract get position(): SourcePosition | undefined;

  get isCode(): boolean {
    return false;
  }

  get isMeta(): boolean {
    return false;
  }

  get isComment(): boolean {
    return false;
  }

  /** Whitespace in the broad sense: spaces, tabs and newlines. */
  get isWhitespace(): boolean {
    return false;
  }

  isRaw(): this is RawSegment {
    return !(this instanceof CompositeSegment);
  }

  isComposite(): this is CompositeSegment {
    return this instanceof CompositeSegment;
  }

  /**
   * Line number used for same-line comparisons.
   * Composites report the line of their last positioned raw segment.
   */
  get lastLine(): number | undefined {
    return this.position?.line;
  }

  toString(): string {
    return `${this.kind}(${JSON.stringify(this.raw)})`;
  }
}

abstract class BaseRawSegment extends BaseSegment {
  constructor(
    private readonly text: string,
    private readonly pos?: SourcePosition
  ) {
    super();
  }

  get raw(): string {
    return this.text;
  }

  get position(): SourcePosition | undefined {
    return this.pos;
  }
}

// ---------------------------------------------------------------------------
// Raw Segments
// ---------------------------------------------------------------------------

/**
 * Symbol ending a statement, `;` everywhere and `/` in Oracle.
 */
export class TerminatorSegment extends BaseRawSegment {
  readonly kind = "statement_terminator" as const;

  override get isCode(): boolean {
    return true;
  }
}

/**
 * Keyword, identifier, literal or operator token.
 */
export class CodeSegment extends BaseRawSegment {
  readonly kind = "code" as const;

  constructor(
    raw: string,
    readonly codeType: CodeType,
    position?: SourcePosition
  ) {
    super(raw, position);
  }

  override get isCode(): boolean {
    return true;
  }
}

/**
 * Run of spaces or tabs without a line break.
 */
export class WhitespaceSegment extends BaseRawSegment {
  readonly kind = "whitespace" as const;

  override get isWhitespace(): boolean {
    return true;
  }
}

/**
 * A single line break.
 */
export class NewlineSegment extends BaseRawSegment {
  readonly kind = "newline" as const;

  constructor(raw = "\n", position?: SourcePosition) {
    super(raw, position);
  }

  override get isWhitespace(): boolean {
    return true;
  }
}

export class CommentSegment extends BaseRawSegment {
  readonly kind = "comment" as const;

  constructor(
    raw: string,
    readonly commentKind: CommentKind,
    position?: SourcePosition
  ) {
    super(raw, position);
  }

  override get isComment(): boolean {
    return true;
  }
}

/**
 * Zero-width marker inserted by the parser for layout bookkeeping.
 */
export class MetaSegment extends BaseRawSegment {
  readonly kind = "meta" as const;

  constructor(
    readonly metaKind: MetaKind,
    position?: SourcePosition
  ) {
    super("", position);
  }

  override get isMeta(): boolean {
    return true;
  }
}

// ---------------------------------------------------------------------------
// Composite Segments
// ---------------------------------------------------------------------------

/**
 * Segment with ordered children.
 */
export abstract class CompositeSegment extends BaseSegment {
  abstract override readonly kind: CompositeKind;

  constructor(readonly segments: readonly Segment[]) {
    super();
  }

  get raw(): string {
    return this.segments.map((segment) => segment.raw).join("");
  }

  get position(): SourcePosition | undefined {
    for (const segment of this.rawSegments()) {
      if (segment.position !== undefined) {
        return segment.position;
      }
    }
    return undefined;
  }

  override get isCode(): boolean {
    return this.segments.some((segment) => segment.isCode);
  }

  override get lastLine(): number | undefined {
    const raws = this.rawSegments();
    for (let i = raws.length - 1; i >= 0; i--) {
      const line = raws[i]?.lastLine;
      if (line !== undefined) {
        return line;
      }
    }
    return undefined;
  }

  /**
   * Leaves of this subtree in source order, metas included.
   */
  rawSegments(): RawSegment[] {
    const result: RawSegment[] = [];
    for (const segment of this.segments) {
      if (segment.isComposite()) {
        result.push(...segment.rawSegments());
      } else if (segment.isRaw()) {
        result.push(segment);
      }
    }
    return result;
  }

  /**
   * All descendants of the given kind, in source order.
   * A matching composite is yielded before its children.
   */
  *recursiveCrawl(kind: SegmentKind): Generator<Segment> {
    for (const segment of this.segments) {
      if (segment.kind === kind) {
        yield segment;
      }
      if (segment.isComposite()) {
        yield* segment.recursiveCrawl(kind);
      }
    }
  }
}

/**
 * Root of a parsed file. May start and end with non-code segments.
 */
export class FileSegment extends CompositeSegment {
  readonly kind = "file" as const;
}

export class StatementSegment extends CompositeSegment {
  readonly kind = "statement" as const;
}

/**
 * Parenthesised run inside a statement, brackets included.
 */
export class BracketedSegment extends CompositeSegment {
  readonly kind = "bracketed" as const;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Create a fresh `;` terminator without a source position.
 */
export function semicolon(): TerminatorSegment {
  return new TerminatorSegment(";");
}

/**
 * Create a fresh newline without a source position.
 */
export function newline(): NewlineSegment {
  return new NewlineSegment();
}
