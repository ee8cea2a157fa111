import { describe, expect, it } from "vitest";
import { SplitSpecError } from "./errors";
import { parseSplitSpec } from "./parseSplitSpec";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an exception");
}

describe("parseSplitSpec", () => {
  it("parses heading levels", () => {
    expect(parseSplitSpec("h1")).toEqual({ strategy: "heading", level: 1 });
    expect(parseSplitSpec(" H6 ")).toEqual({ strategy: "heading", level: 6 });
  });

  it("rejects heading levels outside 1-6", () => {
    const error = thrownBy(() => parseSplitSpec("h7"));
    expect(error).toBeInstanceOf(SplitSpecError);
    if (error instanceof SplitSpecError) {
      expect(error.message).toBe("Invalid heading level in 'h7': level must be between 1 and 6, got 7");
      expect(error.token).toBe("h7");
    }
    expect(() => parseSplitSpec("h0")).toThrow("level must be between 1 and 6, got 0");
  });

  it("parses length and parts", () => {
    expect(parseSplitSpec("length=500")).toEqual({ strategy: "length", words: 500 });
    expect(parseSplitSpec("PARTS = 3")).toEqual({ strategy: "parts", parts: 3 });
  });

  it("rejects non-positive or non-numeric values", () => {
    expect(() => parseSplitSpec("length=0")).toThrow("Invalid length value '0' in 'length=0': must be a positive integer");
    expect(() => parseSplitSpec("length=abc")).toThrow(SplitSpecError);
    expect(() => parseSplitSpec("parts=-2")).toThrow("Invalid parts value '-2' in 'parts=-2': must be a positive integer");
    expect(() => parseSplitSpec("parts=1.5")).toThrow(SplitSpecError);
  });

  it("decodes escapes in delimiters", () => {
    expect(parseSplitSpec("delimiter=***")).toEqual({ strategy: "delimiter", delimiter: "***" });
    expect(parseSplitSpec("delimiter=\\n===\\n")).toEqual({ strategy: "delimiter", delimiter: "\n===\n" });
    expect(() => parseSplitSpec("delimiter=")).toThrow("Delimiter value cannot be empty in 'delimiter='");
  });

  it("rejects delimiters that decode to whitespace only", () => {
    expect(() => parseSplitSpec("delimiter=\\n")).toThrow(
      "Delimiter value in 'delimiter=\\n' is only whitespace once decoded",
    );
    try {
      parseSplitSpec("delimiter=\\t\\n");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SplitSpecError);
      expect(error).toHaveProperty("token", "delimiter=\\t\\n");
    }
  });

  it("parses keywords case-insensitively", () => {
    expect(parseSplitSpec("auto")).toEqual({ strategy: "auto" });
    expect(parseSplitSpec("BREAK")).toEqual({ strategy: "break" });
    expect(parseSplitSpec("page")).toEqual({ strategy: "page" });
    expect(parseSplitSpec("Chapter")).toEqual({ strategy: "chapter" });
  });

  it("names the rejected token for unknown strategies", () => {
    const error = thrownBy(() => parseSplitSpec("size=10"));
    expect(error).toBeInstanceOf(SplitSpecError);
    if (error instanceof SplitSpecError) {
      expect(error.token).toBe("size");
      expect(error.message).toMatch(/^Unknown split strategy 'size' in 'size=10'/);
    }
    expect(() => parseSplitSpec("sideways")).toThrow(/^Invalid split specification 'sideways'/);
    expect(() => parseSplitSpec("   ")).toThrow("Split specification is empty");
  });
});
