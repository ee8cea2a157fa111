import type { BlockNode, Document, Heading } from "../ast/nodes";

/**
 * A heading together with everything up to the next heading of the same or
 * a higher level. Derived from `Document.children` on every call and never
 * stored, so it always reflects the tree it was computed from.
 */
export interface Section {
  heading: Heading;
  level: number;
  /** Blocks after the heading, deeper sub-headings included */
  content: BlockNode[];
  /** Position of the heading in `Document.children` */
  startIndex: number;
  /** Exclusive end position in `Document.children` */
  endIndex: number;
}

export interface LevelRange {
  /** Shallowest heading level that starts a section (default 1) */
  minLevel?: number;
  /** Deepest heading level that starts a section (default 6) */
  maxLevel?: number;
}

export interface MatchOptions {
  /** Compare heading text case-sensitively (default false) */
  caseSensitive?: boolean;
}

/**
 * Heading text or 0-based section index.
 */
export type SectionTarget = string | number;

/**
 * Anything that can be spliced into a document as a run of blocks.
 */
export type SectionContent = Section | Document | BlockNode | ReadonlyArray<BlockNode>;

export type InsertPosition = "start" | "end" | "after_heading";
