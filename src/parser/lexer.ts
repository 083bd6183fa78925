// SQL Lexer
// Token definitions for the chevrotain lexer. Every character of the input
// lands in exactly one token; trivia is kept, not skipped.

import { createToken, type IToken, Lexer, type TokenType } from "chevrotain";
import { ParseError } from "../errors";

export const Newline = createToken({ name: "Newline", pattern: /\r\n|\r|\n/ });
export const Whitespace = createToken({ name: "Whitespace", pattern: /[^\S\r\n]+/ });
export const InlineComment = createToken({ name: "InlineComment", pattern: /--[^\r\n]*/ });
export const BlockComment = createToken({ name: "BlockComment", pattern: /\/\*[\s\S]*?\*\// });
export const StringLiteral = createToken({ name: "StringLiteral", pattern: /'(?:[^']|'')*'/ });
export const QuotedIdentifier = createToken({
  name: "QuotedIdentifier",
  pattern: /"(?:[^"]|"")*"/,
});
export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
});
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });
export const Slash = createToken({ name: "Slash", pattern: /\// });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const Operator = createToken({
  name: "Operator",
  pattern: /<>|<=|>=|!=|\|\||::|:=|=>|[-+*%=<>,.:!|&^~@?[\]{}]/,
});
export const Word = createToken({ name: "Word", pattern: /[A-Za-z_][A-Za-z0-9_$#]*/ });
export const Unknown = createToken({ name: "Unknown", pattern: /\S/ });

/**
 * Tokens in match priority order.
 */
export const allTokens: TokenType[] = [
  Newline,
  Whitespace,
  InlineComment,
  BlockComment,
  StringLiteral,
  QuotedIdentifier,
  NumberLiteral,
  Semicolon,
  Slash,
  LParen,
  RParen,
  Operator,
  Word,
  Unknown,
];

const sqlLexer = new Lexer(allTokens, { positionTracking: "onlyOffset" });

/**
 * Split SQL source into tokens.
 */
export function tokenize(source: string): IToken[] {
  const result = sqlLexer.tokenize(source);
  const error = result.errors[0];
  if (error !== undefined) {
    throw new ParseError(`Unexpected input: ${error.message}`, error.line, error.column);
  }
  return result.tokens;
}
