import { describe, expect, it, vi } from "vitest";
import { doc, heading, words } from "../../test-utils/documents";
import { SplitOptionError } from "../errors";
import { AutoSplitter } from "./AutoSplitter";

vi.mock("../../utils/logger");

describe("AutoSplitter", () => {
  it("uses H1 parts when the largest one is within twice the target", () => {
    const input = doc(heading(1, "A"), words(5), heading(1, "B"), words(5));
    const splitter = new AutoSplitter(10);

    expect(splitter.chooseStrategy(input)).toBe("auto:h1");
    const parts = splitter.split(input);
    expect(parts.map((part) => part.title)).toEqual(["A", "B"]);
    expect(parts.map((part) => part.metadata)).toEqual([{ strategy: "auto:h1" }, { strategy: "auto:h1" }]);
  });

  it("falls back to H2 sections when H1 parts are too large", () => {
    // The single H1 part holds 27 words; H2 sections average 13
    const input = doc(heading(1, "Big"), heading(2, "X"), words(12), heading(2, "Y"), words(12));
    const splitter = new AutoSplitter(10);

    expect(splitter.chooseStrategy(input)).toBe("auto:h2");
    const parts = splitter.split(input);
    expect(parts.map((part) => part.title)).toEqual(["Big", "X", "Y"]);
    expect(parts.every((part) => part.metadata.strategy === "auto:h2")).toBe(true);
  });

  it("packs by word count when sections are too large", () => {
    const input = doc(heading(2, "X"), words(40));
    const splitter = new AutoSplitter(10);

    expect(splitter.chooseStrategy(input)).toBe("auto:word_count");
    const parts = splitter.split(input);
    expect(parts).toHaveLength(1);
    expect(parts[0].title).toBe("X");
    expect(parts[0].wordCount).toBe(41);
    expect(parts[0].metadata).toEqual({ strategy: "auto:word_count" });
  });

  it("keeps reasons recorded by the chosen strategy", () => {
    const parts = new AutoSplitter(10).split(doc(words(30)));
    expect(parts[0].metadata).toEqual({ reason: "no_sections", strategy: "auto:word_count" });
  });

  it("defaults to a target of 1500 words", () => {
    expect(new AutoSplitter().chooseStrategy(doc(heading(1, "A"), words(2000)))).toBe("auto:h1");
    expect(new AutoSplitter().chooseStrategy(doc(heading(1, "A"), words(3000)))).toBe("auto:word_count");
  });

  it("rejects non-positive targets", () => {
    expect(() => new AutoSplitter(0)).toThrow(SplitOptionError);
  });
});
