import type { IToken } from "chevrotain";
import {
  BracketedSegment,
  CodeSegment,
  type CodeType,
  CommentSegment,
  FileSegment,
  MetaSegment,
  NewlineSegment,
  type RawSegment,
  type Segment,
  type SourcePosition,
  StatementSegment,
  TerminatorSegment,
  WhitespaceSegment,
} from "../common/segment";
import { SourceInfo } from "../common/source";
import { ANSI, type Dialect } from "./dialects";
import {
  BlockComment,
  InlineComment,
  LParen,
  Newline,
  NumberLiteral,
  QuotedIdentifier,
  RParen,
  Semicolon,
  Slash,
  StringLiteral,
  Unknown,
  Whitespace,
  Word,
  tokenize,
} from "./lexer";

/** Keywords that may open a statement. */
const STATEMENT_OPENERS: ReadonlySet<string> = new Set([
  "ALTER",
  "BEGIN",
  "CALL",
  "COMMIT",
  "CREATE",
  "DECLARE",
  "DELETE",
  "DROP",
  "EXEC",
  "EXECUTE",
  "EXPLAIN",
  "GRANT",
  "INSERT",
  "MERGE",
  "REVOKE",
  "ROLLBACK",
  "SELECT",
  "SET",
  "SHOW",
  "TRUNCATE",
  "UPDATE",
  "USE",
  "WITH",
]);

/** Opening keywords that continue a statement started by one of the listed keywords. */
const CONTINUES_AFTER: Readonly<Record<string, readonly string[]>> = {
  SELECT: ["INSERT", "CREATE", "WITH", "EXPLAIN"],
  WITH: ["INSERT", "CREATE", "EXPLAIN"],
  SET: ["UPDATE", "MERGE", "ALTER"],
  INSERT: ["MERGE", "CREATE", "EXPLAIN", "WITH"],
  UPDATE: ["MERGE", "CREATE", "EXPLAIN", "WITH"],
  DELETE: ["MERGE", "CREATE", "EXPLAIN", "WITH"],
};

/** Words after which the next line always continues the statement. */
const CONTINUATION_WORDS: ReadonlySet<string> = new Set([
  "ALL",
  "AND",
  "AS",
  "BY",
  "DISTINCT",
  "ELSE",
  "EXCEPT",
  "EXISTS",
  "FROM",
  "IN",
  "INTERSECT",
  "IS",
  "JOIN",
  "MINUS",
  "NOT",
  "ON",
  "OR",
  "THEN",
  "UNION",
  "WHERE",
]);

/** Words that close a PL/SQL construct which never increased the block depth. */
const UNCOUNTED_END_TARGETS: ReadonlySet<string> = new Set(["IF", "LOOP", "WHILE", "FOR"]);

/** Number of leading words inspected for a CREATE ... PROCEDURE style header. */
const HEADER_WORDS = 6;

/**
 * Open statement being assembled.
 */
class StatementBuilder {
  /** Bracket frames; the first frame is the statement body. */
  readonly frames: Segment[][] = [[]];
  /** Trivia seen after the last code token. */
  pending: RawSegment[] = [];
  lastCode: CodeSegment | undefined;
  lastCodeEnd = 0;
  wordCount = 0;
  /** PL/SQL block: inner `;` do not end the statement. */
  block = false;
  depth = 0;
  endSeen = false;
  afterEnd = false;
  typeSeen = false;

  constructor(readonly leading: string) {}

  get frame(): Segment[] {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new Error("statement builder has no frame");
    }
    return frame;
  }

  /**
   * Whether a `;` ends the statement at this point.
   */
  get terminable(): boolean {
    if (this.frames.length > 1) {
      return false;
    }
    return !this.block || (this.endSeen && this.depth <= 0);
  }

  closeBracket(): void {
    const frame = this.frames.pop();
    if (frame === undefined || this.frames.length === 0) {
      return;
    }
    this.frame.push(new BracketedSegment(frame));
  }
}

/**
 * Parser turns SQL source into a segment tree.
 *
 * It is a lightweight stand-in for a full SQL grammar: it knows where
 * statements start and end, and leaves everything inside them flat apart
 * from parenthesised groups.
 */
export class Parser {
  constructor(private readonly dialect: Dialect = ANSI) {}

  /**
   * Parse a whole file.
   */
  parse(source: string, description?: string): FileSegment {
    const info = new SourceInfo(source, description);
    return new FileAssembler(info, this.dialect).assemble(tokenize(source));
  }
}

class FileAssembler {
  private readonly children: Segment[] = [];
  private statement: StatementBuilder | undefined;
  private lastCodeLine = 0;

  constructor(
    private readonly info: SourceInfo,
    private readonly dialect: Dialect
  ) {}

  assemble(tokens: readonly IToken[]): FileSegment {
    for (const token of tokens) {
      this.consume(token);
    }
    this.closeStatement();
    this.children.push(new MetaSegment("end_of_file", this.positionAt(this.info.source.length)));
    return new FileSegment(this.children);
  }

  private consume(token: IToken): void {
    const position = this.positionAt(token.startOffset);
    const trivia = this.toTrivia(token, position);
    if (trivia !== undefined) {
      if (this.statement !== undefined) {
        this.statement.pending.push(trivia);
      } else {
        this.children.push(trivia);
      }
      return;
    }

    const firstOnLine = position.line !== this.lastCodeLine;
    this.lastCodeLine = this.positionAt(token.startOffset + token.image.length).line;
    const word = token.tokenType === Word ? token.image.toUpperCase() : undefined;
    const statement = this.statement;

    // The word after END names what it closes and is not counted again.
    let closesConstruct = false;
    if (statement?.afterEnd) {
      statement.afterEnd = false;
      closesConstruct = word !== undefined;
      if (word === undefined || !UNCOUNTED_END_TARGETS.has(word)) {
        statement.depth--;
        statement.endSeen = true;
      }
    }

    if (this.isTerminator(token, firstOnLine)) {
      this.closeStatement();
      this.children.push(new TerminatorSegment(token.image, position));
      return;
    }

    if (statement !== undefined && word !== undefined && this.opensStatement(statement, word, firstOnLine)) {
      this.closeStatement();
    }

    const segment = new CodeSegment(token.image, codeTypeOf(token), position);
    const current = this.statement ?? this.openStatement(word ?? "");
    const isFirst = current.lastCode === undefined;
    current.frame.push(...current.pending);
    current.pending = [];

    if (token.tokenType === LParen) {
      current.frames.push([segment]);
    } else if (token.tokenType === RParen && current.frames.length > 1) {
      current.frame.push(segment);
      current.closeBracket();
    } else {
      current.frame.push(segment);
    }
    current.lastCode = segment;
    current.lastCodeEnd = token.startOffset + token.image.length;

    if (isFirst) {
      current.frame.push(new MetaSegment("indent", this.positionAt(current.lastCodeEnd)));
    }
    if (word !== undefined) {
      this.trackBlock(current, word, closesConstruct);
    }
  }

  private toTrivia(token: IToken, position: SourcePosition): RawSegment | undefined {
    switch (token.tokenType) {
      case Whitespace:
        return new WhitespaceSegment(token.image, position);
      case Newline:
        return new NewlineSegment(token.image, position);
      case InlineComment:
        return new CommentSegment(token.image, "inline", position);
      case BlockComment:
        return new CommentSegment(token.image, "block", position);
      default:
        return undefined;
    }
  }

  private isTerminator(token: IToken, firstOnLine: boolean): boolean {
    if (!this.dialect.terminators.includes(token.image)) {
      return false;
    }
    const statement = this.statement;
    if (token.tokenType === Semicolon) {
      return statement === undefined || statement.terminable;
    }
    // Anywhere else a slash is division.
    return token.tokenType === Slash && (statement === undefined || firstOnLine);
  }

  private opensStatement(statement: StatementBuilder, word: string, firstOnLine: boolean): boolean {
    if (!firstOnLine || statement.block || statement.frames.length > 1) {
      return false;
    }
    if (!STATEMENT_OPENERS.has(word)) {
      return false;
    }
    const previous = statement.lastCode;
    if (previous === undefined) {
      return false;
    }
    if (previous.codeType === "symbol" && previous.raw !== ")") {
      return false;
    }
    if (previous.codeType === "word" && CONTINUATION_WORDS.has(previous.raw.toUpperCase())) {
      return false;
    }
    return !(CONTINUES_AFTER[word] ?? []).includes(statement.leading);
  }

  private openStatement(leading: string): StatementBuilder {
    const statement = new StatementBuilder(leading);
    if (this.dialect.procedural && (leading === "DECLARE" || leading === "BEGIN")) {
      statement.block = true;
    }
    this.statement = statement;
    return statement;
  }

  private trackBlock(statement: StatementBuilder, word: string, closesConstruct: boolean): void {
    statement.wordCount++;
    if (!this.dialect.procedural) {
      return;
    }
    if (statement.leading === "CREATE" && !statement.block && statement.wordCount <= HEADER_WORDS) {
      if (word === "PACKAGE" || (word === "BODY" && statement.typeSeen)) {
        statement.block = true;
        statement.depth = 1;
      } else if (word === "PROCEDURE" || word === "FUNCTION" || word === "TRIGGER") {
        statement.block = true;
      }
      statement.typeSeen = word === "TYPE";
      return;
    }
    if (!statement.block || closesConstruct) {
      return;
    }
    if (word === "BEGIN" || word === "CASE") {
      statement.depth++;
    } else if (word === "END") {
      statement.afterEnd = true;
    }
  }

  private closeStatement(): void {
    const statement = this.statement;
    if (statement === undefined) {
      return;
    }
    while (statement.frames.length > 1) {
      statement.closeBracket();
    }
    statement.frame.push(new MetaSegment("dedent", this.positionAt(statement.lastCodeEnd)));
    this.children.push(new StatementSegment(statement.frame), ...statement.pending);
    this.statement = undefined;
  }

  private positionAt(offset: number): SourcePosition {
    const { line, column } = this.info.getLocation(offset);
    return { line, column, offset };
  }
}

function codeTypeOf(token: IToken): CodeType {
  switch (token.tokenType) {
    case Word:
    case QuotedIdentifier:
      return "word";
    case StringLiteral:
    case NumberLiteral:
      return "literal";
    case Unknown:
      return "other";
    default:
      return "symbol";
  }
}
