import { describe, expect, it, vi } from "vitest";
import * as N from "../../ast/nodes";
import { doc, para } from "../../test-utils/documents";
import { SplitOptionError } from "../errors";
import { BreakSplitter, DelimiterSplitter } from "./DelimiterSplitter";

vi.mock("../../utils/logger");

describe("DelimiterSplitter", () => {
  it("splits three blocks separated by two delimiters into three parts", () => {
    const input = doc(para("one"), para("***"), para("two"), para("  ***  "), para("three"));
    const parts = new DelimiterSplitter("***").split(input);

    expect(parts.map((part) => part.title)).toEqual(["Part 1", "Part 2", "Part 3"]);
    expect(parts.map((part) => part.document.children)).toEqual([[para("one")], [para("two")], [para("three")]]);
    expect(parts.map((part) => part.index)).toEqual([1, 2, 3]);
  });

  it("matches a paragraph by its whole text only", () => {
    const input = doc(para("a"), para("=== not a marker"), para("==="), para("b"));
    const parts = new DelimiterSplitter("===").split(input);
    expect(parts.map((part) => part.document.children.length)).toEqual([2, 1]);
  });

  it("treats thematic breaks as horizontal rule delimiters", () => {
    const input = doc(para("a"), new N.ThematicBreak(), para("b"));
    expect(new DelimiterSplitter("---").split(input)).toHaveLength(2);
    expect(new DelimiterSplitter("___").split(input)).toHaveLength(2);

    const unmatched = new DelimiterSplitter("%%").split(input);
    expect(unmatched).toHaveLength(1);
    expect(unmatched[0].title).toBe("Part 1");
    expect(unmatched[0].metadata).toEqual({ reason: "no_delimiters_found" });
    expect(unmatched[0].document.children).toEqual(input.children);
  });

  it("produces no empty parts for leading and trailing delimiters", () => {
    const parts = new DelimiterSplitter("===").split(doc(para("==="), para("a"), para("===")));
    expect(parts).toHaveLength(1);
    expect(parts[0].document.children).toEqual([para("a")]);
  });

  it("returns one empty part for a document of delimiters only", () => {
    const parts = new DelimiterSplitter("===").split(doc(para("==="), para("===")));
    expect(parts).toHaveLength(1);
    expect(parts[0].title).toBe("Part 1");
    expect(parts[0].document.children).toEqual([]);
    expect(parts[0].wordCount).toBe(0);
  });

  it("rejects blank delimiters", () => {
    expect(() => new DelimiterSplitter("   ")).toThrow(SplitOptionError);
    expect(() => new DelimiterSplitter("")).toThrow("Delimiter cannot be empty");
  });
});

describe("BreakSplitter", () => {
  it("splits on thematic breaks", () => {
    const input = doc(para("a"), new N.ThematicBreak(), para("b c"), new N.ThematicBreak());
    const parts = new BreakSplitter().split(input);

    expect(parts.map((part) => part.title)).toEqual(["Part 1", "Part 2"]);
    expect(parts.map((part) => part.wordCount)).toEqual([1, 2]);
  });

  it("keeps the document whole without breaks", () => {
    const parts = new BreakSplitter().split(doc(para("a"), para("***")));
    expect(parts).toHaveLength(1);
    expect(parts[0].metadata).toEqual({ reason: "no_breaks_found" });
  });
});
