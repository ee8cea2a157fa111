import { describe, expect, it } from "vitest";
import { doc, para } from "../test-utils/documents";
import { SplitResult } from "./types";

const part = (title: string | null, index = 1) => new SplitResult(doc(para("x")), index, title, 1);

describe("SplitResult", () => {
  it("derives a filesystem-safe slug from the title", () => {
    expect(part("Introduction & Setup!").getFilenameSlug()).toBe("introduction-setup");
    expect(part("  --Hello__World--  ").getFilenameSlug()).toBe("hello-world");
    expect(part("Café Société").getFilenameSlug()).toBe("cafe-societe");
  });

  it("returns an empty slug without a usable title", () => {
    expect(part(null).getFilenameSlug()).toBe("");
    expect(part("").getFilenameSlug()).toBe("");
    expect(part("***").getFilenameSlug()).toBe("");
  });

  it("produces the same slug for the same title, using only [a-z0-9-]", () => {
    const titles = ["Chapter 1: The Start", "Ünïcödé Títle", "a -- b", "Preamble", "2024_report (final)"];
    for (const title of titles) {
      const slug = part(title).getFilenameSlug();
      expect(slug).toMatch(/^[a-z0-9]+(-[a-z0-9]+)*$/);
      expect(part(title, 7).getFilenameSlug()).toBe(slug);
    }
  });

  it("adds metadata without touching the original", () => {
    const original = new SplitResult(doc(), 1, "T", 0, { reason: "no_sections" });
    const extended = original.withMetadata({ strategy: "auto:word_count" });

    expect(extended.metadata).toEqual({ reason: "no_sections", strategy: "auto:word_count" });
    expect(original.metadata).toEqual({ reason: "no_sections" });
    expect(extended.document).toBe(original.document);
  });
});
