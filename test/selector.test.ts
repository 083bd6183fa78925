import { describe, expect, test } from "vitest";
import { Segments, sp } from "../src/common/selector";
import {
  CodeSegment,
  CommentSegment,
  MetaSegment,
  NewlineSegment,
  TerminatorSegment,
  WhitespaceSegment,
} from "../src/common/segment";

const select = new CodeSegment("select", "word");
const one = new CodeSegment("1", "literal");
const space = new WhitespaceSegment(" ");
const comment = new CommentSegment("-- note", "inline");
const lineBreak = new NewlineSegment();
const dedent = new MetaSegment("dedent");
const terminator = new TerminatorSegment(";");

const sequence = new Segments([select, space, one, dedent, space, comment, lineBreak, terminator]);

describe("Segments", () => {
  test("get supports negative indices", () => {
    expect(sequence.get(0)).toBe(select);
    expect(sequence.get(-1)).toBe(terminator);
    expect(sequence.get(42)).toBeUndefined();
  });

  test("reversed returns a new sequence", () => {
    const reversed = sequence.reversed();
    expect(reversed.get(0)).toBe(terminator);
    expect(sequence.get(0)).toBe(select);
  });

  test("first and last return zero or one segment", () => {
    expect(sequence.first(sp.isCode()).toArray()).toEqual([select]);
    expect(sequence.last(sp.isCode()).toArray()).toEqual([terminator]);
    expect(sequence.first(sp.isKind("bracketed")).isEmpty()).toBe(true);
  });

  test("select with loopWhile stops at the first failing segment", () => {
    const before = sequence
      .reversed()
      .select({ loopWhile: sp.not(sp.isCode()), startSegment: terminator });
    expect(before.toArray()).toEqual([lineBreak, comment, space, dedent]);
  });

  test("select filters without stopping", () => {
    const whitespace = sequence.select({ select: sp.isWhitespace() });
    expect(whitespace.toArray()).toEqual([space, space, lineBreak]);
  });

  test("select honours start and stop segments", () => {
    const between = sequence.select({ startSegment: one, stopSegment: lineBreak });
    expect(between.toArray()).toEqual([dedent, space, comment]);
  });

  test("select starts from the beginning when the start segment is absent", () => {
    const absent = new CodeSegment("x", "word");
    const codes = sequence.select({ select: sp.isCode(), startSegment: absent });
    expect(codes.length).toBe(3);
  });

  test("predicates combine", () => {
    const trivia = sp.and(sp.not(sp.isCode()), sp.not(sp.isMeta()));
    expect(sequence.filter(trivia).toArray()).toEqual([space, space, comment, lineBreak]);
    expect(sequence.filter(sp.or(sp.isInlineComment(), sp.rawIs(";"))).toArray()).toEqual([
      comment,
      terminator,
    ]);
  });

  test("any and all", () => {
    expect(sequence.any(sp.isComment())).toBe(true);
    expect(sequence.all(sp.isCode())).toBe(false);
    expect(new Segments().all(sp.isCode())).toBe(true);
  });
});
