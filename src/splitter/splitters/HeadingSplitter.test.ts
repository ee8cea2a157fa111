import { describe, expect, it, vi } from "vitest";
import * as N from "../../ast/nodes";
import { doc, heading, para, words } from "../../test-utils/documents";
import { SplitOptionError } from "../errors";
import { HeadingSplitter } from "./HeadingSplitter";

vi.mock("../../utils/logger");

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

const mixed = () =>
  doc(
    para("lead"),
    new N.ThematicBreak(),
    heading(2, "Early"),
    words(3),
    heading(1, "One"),
    heading(3, "Deep"),
    words(2),
    heading(2, "Two"),
    new N.CodeBlock("code"),
    heading(4, "Deeper"),
    heading(1, "Three"),
  );

describe("HeadingSplitter", () => {
  it("yields a preamble and one part per top-level heading", () => {
    const parts = new HeadingSplitter(1).split(scenario());

    expect(parts.map((part) => part.title)).toEqual(["Preamble", "Intro", "Methods", "Results"]);
    expect(parts.map((part) => part.index)).toEqual([1, 2, 3, 4]);
    for (const part of parts) {
      expect(part.document.children.filter((child) => child.kind === "Paragraph")).toHaveLength(1);
    }
    expect(parts[1].document.children).toEqual([heading(1, "Intro"), para("a")]);
    expect(parts.map((part) => part.wordCount)).toEqual([1, 2, 2, 2]);
  });

  it("keeps deeper headings inside their part", () => {
    const parts = new HeadingSplitter(1).split(mixed());

    expect(parts.map((part) => part.title)).toEqual(["Preamble", "One", "Three"]);
    expect(parts[1].document.children.map((child) => child.kind)).toEqual([
      "Heading",
      "Heading",
      "Paragraph",
      "Heading",
      "CodeBlock",
      "Heading",
    ]);
  });

  it("reassembles the original children at every level", () => {
    for (const input of [scenario(), mixed(), doc(para("only text")), doc()]) {
      for (let level = 1; level <= 6; level++) {
        const parts = new HeadingSplitter(level).split(input);
        const reassembled = parts.flatMap((part) => part.document.children);
        expect(reassembled).toHaveLength(input.children.length);
        reassembled.forEach((child, index) => expect(child).toBe(input.children[index]));
      }
    }
  });

  it("drops the preamble when asked to", () => {
    const parts = new HeadingSplitter(1, false).split(scenario());
    expect(parts.map((part) => part.title)).toEqual(["Intro", "Methods", "Results"]);
    expect(parts[0].index).toBe(1);
  });

  it("keeps the document whole when no heading is at or above the level", () => {
    const input = doc(para("x"), heading(3, "Deep"), para("y"));
    const parts = new HeadingSplitter(2).split(input);

    expect(parts).toHaveLength(1);
    expect(parts[0].title).toBeNull();
    expect(parts[0].metadata).toEqual({ reason: "no_headings_found" });
    expect(parts[0].document.children).toEqual(input.children);
  });

  it("keeps the document whole when no heading has exactly the requested level", () => {
    const input = doc(heading(1, "A"), para("x"), heading(1, "B"), para("y"));
    const parts = new HeadingSplitter(2).split(input);

    expect(parts).toHaveLength(1);
    expect(parts[0].title).toBeNull();
    expect(parts[0].metadata).toEqual({ reason: "no_headings_found" });
    expect(parts[0].document.children).toEqual(input.children);
  });

  it("still cuts at shallower headings once the level is present", () => {
    const parts = new HeadingSplitter(2).split(mixed());
    expect(parts.map((part) => part.title)).toEqual(["Preamble", "Early", "One", "Two", "Three"]);
  });

  it("carries the source document's metadata into every part", () => {
    const input = new N.Document(scenario().children, { metadata: { source: "paper.md" } });
    for (const part of new HeadingSplitter(1).split(input)) {
      expect(part.document.metadata).toEqual({ source: "paper.md" });
    }
  });

  it("rejects levels outside 1-6", () => {
    expect(() => new HeadingSplitter(0)).toThrow(SplitOptionError);
    expect(() => new HeadingSplitter(7)).toThrow("Heading level must be between 1 and 6, got 7");
  });
});
