import { describe, expect, it, vi } from "vitest";
import * as N from "../ast/nodes";
import { doc, heading, para } from "../test-utils/documents";
import { SplitSpecError } from "./errors";
import { formatPartFilename, splitBySections, splitDocument } from "./splitDocument";
import { SplitResult } from "./types";

vi.mock("../utils/logger");

const scenario = () =>
  doc(
    para("pre"),
    heading(1, "Intro"),
    para("a"),
    heading(1, "Methods"),
    para("b"),
    heading(1, "Results"),
    para("c"),
  );

describe("splitDocument", () => {
  it("dispatches on a specification string", () => {
    expect(splitDocument(scenario(), "h1").map((part) => part.title)).toEqual([
      "Preamble",
      "Intro",
      "Methods",
      "Results",
    ]);
    expect(splitDocument(scenario(), "h1", { includePreamble: false })).toHaveLength(3);
    expect(splitDocument(scenario(), "length=3").map((part) => part.wordCount)).toEqual([3, 2, 2]);
  });

  it("accepts an already parsed specification", () => {
    const input = doc(para("a"), new N.ThematicBreak(), para("b"));
    expect(splitDocument(input, { strategy: "break" }).map((part) => part.title)).toEqual(["Part 1", "Part 2"]);
  });

  it("passes the target to the auto strategy", () => {
    const parts = splitDocument(scenario(), "auto", { targetWords: 1 });
    expect(parts.every((part) => part.metadata.strategy === "auto:h1")).toBe(true);
  });

  it("rejects source-layout strategies", () => {
    expect(() => splitDocument(scenario(), "page")).toThrow(SplitSpecError);
    expect(() => splitDocument(scenario(), "chapter")).toThrow(
      "Split strategy 'chapter' depends on the source format and cannot be applied to a document tree",
    );
    expect(() => splitDocument(scenario(), "length=abc")).toThrow(SplitSpecError);
  });
});

describe("splitBySections", () => {
  it("splits at headings of every level", () => {
    const input = doc(para("pre"), heading(1, "A"), para("x"), heading(2, "B"), para("y"));
    expect(splitBySections(input).map((part) => part.title)).toEqual(["Preamble", "A", "B"]);
    expect(splitBySections(input, false).map((part) => part.title)).toEqual(["A", "B"]);
  });

  it("does not require a heading at any particular level", () => {
    const input = doc(heading(1, "A"), para("x"), heading(1, "B"), para("y"));
    expect(splitBySections(input).map((part) => part.title)).toEqual(["A", "B"]);
  });

  it("keeps a document without headings whole", () => {
    const parts = splitBySections(doc(para("only text")));
    expect(parts).toHaveLength(1);
    expect(parts[0].metadata).toEqual({ reason: "no_headings_found" });
  });
});

describe("formatPartFilename", () => {
  const titled = new SplitResult(doc(), 1, "Introduction", 0);
  const untitled = new SplitResult(doc(), 12, null, 0);

  it("numbers parts with zero padding and appends the slug", () => {
    expect(formatPartFilename(titled)).toBe("001-introduction.md");
    expect(formatPartFilename(untitled)).toBe("012.md");
    expect(formatPartFilename(untitled, { width: 1 })).toBe("12.md");
  });

  it("normalises the extension", () => {
    expect(formatPartFilename(titled, { extension: ".json" })).toBe("001-introduction.json");
    expect(formatPartFilename(titled, { extension: "" })).toBe("001-introduction");
  });

  it("rejects a non-positive width", () => {
    expect(() => formatPartFilename(titled, { width: 0 })).toThrow("width must be a positive integer, got 0");
  });
});
