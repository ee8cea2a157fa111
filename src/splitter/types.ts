import type { Document, NodeMetadata } from "../ast/nodes";
import { slugify } from "../utils/string";

/**
 * Parsed form of a split specification such as `h2`, `length=500`,
 * `parts=3`, `delimiter=***` or a bare keyword.
 */
export type SplitSpec =
  | { strategy: "heading"; level: number }
  | { strategy: "length"; words: number }
  | { strategy: "parts"; parts: number }
  | { strategy: "delimiter"; delimiter: string }
  | { strategy: "auto" }
  | { strategy: "break" }
  | { strategy: "page" }
  | { strategy: "chapter" };

export type SplitStrategy = SplitSpec["strategy"];

/**
 * One self-contained part produced by a splitter
 */
export class SplitResult {
  constructor(
    public readonly document: Document,
    /** 1-based position among the parts */
    public readonly index: number,
    /** Heading text, "Preamble", "Part n", or null when the part has no title */
    public readonly title: string | null,
    public readonly wordCount: number,
    /** Split diagnostics such as `reason` or `strategy` */
    public readonly metadata: NodeMetadata = {},
  ) {}

  /**
   * Filesystem-safe slug of the title, restricted to `[a-z0-9-]`; empty
   * when there is no title.
   */
  getFilenameSlug(): string {
    return this.title ? slugify(this.title) : "";
  }

  withMetadata(extra: NodeMetadata): SplitResult {
    return new SplitResult(this.document, this.index, this.title, this.wordCount, {
      ...this.metadata,
      ...extra,
    });
  }
}

/**
 * Interface for a strategy that partitions a document into parts
 */
export interface DocumentSplitter {
  split(doc: Document): SplitResult[];
}
