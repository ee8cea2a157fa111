import { describe, expect, it, vi } from "vitest";
import * as N from "../ast/nodes";
import { doc, guideDocument, heading, para } from "../test-utils/documents";
import {
  addSectionAfter,
  addSectionBefore,
  extractSection,
  extractSections,
  insertIntoSection,
  parseSectionRanges,
  removeSection,
  replaceSection,
  toBlocks,
} from "./editing";
import { SectionNotFoundError, SectionRangeError } from "./errors";
import { resolveSection } from "./query";

vi.mock("../utils/logger");

describe("toBlocks", () => {
  it("flattens every kind of section content", () => {
    const guide = guideDocument();
    expect(toBlocks(resolveSection(guide, "Usage"))).toEqual([heading(2, "Usage"), para("run it")]);
    expect(toBlocks(doc(para("a"), para("b")))).toEqual([para("a"), para("b")]);
    expect(toBlocks(para("a"))).toEqual([para("a")]);
    expect(toBlocks([para("a")])).toEqual([para("a")]);
  });
});

describe("extractSection", () => {
  it("returns the section with its sub-sections as a document", () => {
    const source = new N.Document(guideDocument().children, { metadata: { source: "guide.md" } });
    const extracted = extractSection(source, "Install");

    expect(extracted.children).toEqual([heading(2, "Install"), para("npm steps"), heading(3, "Windows"), para("win steps")]);
    expect(extracted.metadata).toEqual({ source: "guide.md" });
  });
});

describe("replaceSection and removeSection", () => {
  it("replaces a section including its sub-sections", () => {
    const guide = guideDocument();
    const result = replaceSection(guide, "Install", [heading(2, "Setup"), para("new")]);

    expect(result.children).toHaveLength(9);
    expect(result.children.slice(3, 6)).toEqual([heading(2, "Setup"), para("new"), heading(2, "Usage")]);
    expect(guide.children).toHaveLength(11);
  });

  it("removes a top-level section through to the next one", () => {
    const result = removeSection(guideDocument(), "Guide");
    expect(result).toEqual(doc(para("Preamble"), heading(1, "Appendix"), para("extra")));
  });

  it("addresses sections by index", () => {
    const result = removeSection(guideDocument(), 4);
    expect(result.children).toHaveLength(9);
    expect(result.children[8]).toEqual(para("run it"));
  });
});

describe("insertIntoSection", () => {
  it("inserts directly after the heading for start and after_heading", () => {
    const start = insertIntoSection(guideDocument(), "Install", para("note"), "start");
    const afterHeading = insertIntoSection(guideDocument(), "Install", para("note"), "after_heading");

    expect(start.children[4]).toEqual(para("note"));
    expect(afterHeading).toEqual(start);
  });

  it("inserts after the last sub-section for end", () => {
    const result = insertIntoSection(guideDocument(), "Install", para("note"));
    expect(result.children.slice(6, 9)).toEqual([para("win steps"), para("note"), heading(2, "Usage")]);
  });
});

describe("addSectionBefore and addSectionAfter", () => {
  it("places new sections around the target", () => {
    const before = addSectionBefore(guideDocument(), "Usage", [heading(2, "FAQ"), para("q")]);
    expect(before.children.slice(7, 10)).toEqual([heading(2, "FAQ"), para("q"), heading(2, "Usage")]);

    const after = addSectionAfter(guideDocument(), "Install", heading(2, "FAQ"));
    expect(after.children.slice(6, 9)).toEqual([para("win steps"), heading(2, "FAQ"), heading(2, "Usage")]);
  });
});

describe("parseSectionRanges", () => {
  it("expands 1-based ranges to sorted 0-based indices", () => {
    expect(parseSectionRanges("1-3,5,8-", 10)).toEqual([0, 1, 2, 4, 7, 8, 9]);
    expect(parseSectionRanges("-2", 5)).toEqual([0, 1]);
    expect(parseSectionRanges(" 2 , 2,1 ", 5)).toEqual([0, 1]);
  });

  it("swaps reversed ranges and ignores numbers past the end", () => {
    expect(parseSectionRanges("3-1", 5)).toEqual([0, 1, 2]);
    expect(parseSectionRanges("2,99", 3)).toEqual([1]);
    expect(parseSectionRanges("0", 3)).toEqual([]);
  });

  it("rejects tokens that are not numbers", () => {
    expect(() => parseSectionRanges("x", 3)).toThrow("Invalid section range 'x': 'x' is not a positive integer");
    expect(() => parseSectionRanges("1-a", 3)).toThrow("Invalid section range '1-a': 'a' is not a positive integer");
  });
});

describe("extractSections", () => {
  const guide = guideDocument();

  it("does not repeat a section nested in an earlier selection", () => {
    const result = extractSections(guide, "#:1,3");
    expect(result).toEqual(new N.Document(guide.children.slice(1, 9)));
  });

  it("separates selected sections with a thematic break by default", () => {
    const result = extractSections(guide, "#:2,5");
    expect(result.children.map((child) => child.kind)).toEqual([
      "Heading",
      "Paragraph",
      "Heading",
      "Paragraph",
      "ThematicBreak",
      "Heading",
      "Paragraph",
    ]);
    expect(extractSections(guide, "#:2,5", { separator: null }).children).toHaveLength(6);
    expect(extractSections(guide, "#:2,5", { separator: para("~") }).children[4]).toEqual(para("~"));
  });

  it("selects sections by heading pattern", () => {
    expect(extractSections(guide, "usage")).toEqual(doc(heading(2, "Usage"), para("run it")));
    expect(extractSections(guide, "*").children).toHaveLength(11);
  });

  it("selects sections by 0-based index or index list", () => {
    expect(extractSections(guide, 3)).toEqual(doc(heading(2, "Usage"), para("run it")));
    expect(extractSections(guide, [3, 4]).children).toHaveLength(5);
  });

  it("reports selections that match nothing", () => {
    expect(() => extractSections(guide, [7, 8])).toThrow("No valid sections in index list: 7, 8");
    expect(() => extractSections(guide, "#:9")).toThrow("No valid sections in range: #:9");
    expect(() => extractSections(guide, "Nope*")).toThrow(new SectionNotFoundError("Nope*", []));
    expect(() => extractSections(doc(para("x")), "*")).toThrow(SectionRangeError);
    expect(() => extractSections(doc(para("x")), "*")).toThrow("Document contains no sections (headings)");
  });
});
