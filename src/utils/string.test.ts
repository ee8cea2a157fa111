import { describe, expect, it } from "vitest";
import { countWordsInText, decodeEscapes, fullTrim, slugify, uniqueAnchor } from "./string";

describe("fullTrim", () => {
  it("should strip every kind of surrounding whitespace", () => {
    expect(fullTrim("\n\t  hello world \r\n")).toBe("hello world");
  });
});

describe("countWordsInText", () => {
  it("should count whitespace-separated words", () => {
    expect(countWordsInText("  one two\tthree\n")).toBe(3);
  });

  it("should return 0 for empty or blank text", () => {
    expect(countWordsInText("")).toBe(0);
    expect(countWordsInText("   \n ")).toBe(0);
  });
});

describe("slugify", () => {
  it("should lowercase and hyphenate a title", () => {
    expect(slugify("Chapter 1: Introduction")).toBe("chapter-1-introduction");
  });

  it("should fold diacritics to base letters", () => {
    expect(slugify("Café Société")).toBe("cafe-societe");
  });

  it("should collapse runs of spaces, underscores and hyphens and trim hyphens", () => {
    expect(slugify("  --Hello__World--  ")).toBe("hello-world");
  });

  it("should return an empty string when nothing survives", () => {
    expect(slugify("!!! ???")).toBe("");
  });

  it("should cap the length and drop a trailing hyphen left by the cut", () => {
    expect(slugify("aaaa bbbb", 5)).toBe("aaaa");
    expect(slugify("a".repeat(150))).toHaveLength(100);
  });

  it("should only ever produce [a-z0-9-] without edge hyphens", () => {
    for (const title of ["Ünïcödé & Symbols!", "  x  ", "Tabs\tand\nlines", "日本語 title", "--"]) {
      const slug = slugify(title);
      expect(slug).toMatch(/^(?:[a-z0-9]+(?:-[a-z0-9]+)*)?$/);
    }
  });
});

describe("uniqueAnchor", () => {
  it("should suffix repeated anchors with -1, -2", () => {
    const seen = new Set<string>();
    expect(uniqueAnchor("Intro", seen)).toBe("intro");
    expect(uniqueAnchor("Intro", seen)).toBe("intro-1");
    expect(uniqueAnchor("intro", seen)).toBe("intro-2");
  });

  it("should fall back to 'section' for text without slug characters", () => {
    expect(uniqueAnchor("???", new Set())).toBe("section");
  });
});

describe("decodeEscapes", () => {
  it("should decode common escapes", () => {
    expect(decodeEscapes("a\\nb\\tc\\rd")).toBe("a\nb\tc\rd");
  });

  it("should decode hex and unicode escapes", () => {
    expect(decodeEscapes("\\x41\\u00e9")).toBe("Aé");
  });

  it("should turn a double backslash into one", () => {
    expect(decodeEscapes("a\\\\n")).toBe("a\\n");
  });

  it("should keep unknown escapes as written", () => {
    expect(decodeEscapes("\\q")).toBe("\\q");
  });
});
