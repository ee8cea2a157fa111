import { type BlockNode, Document, type Heading, type NodeMetadata } from "../ast/nodes";
import { countWords } from "../ast/text";
import { headingText } from "../sections/query";
import { SplitResult } from "./types";

export const PREAMBLE_TITLE = "Preamble";

/**
 * A heading that starts a part, with every block up to the next heading at
 * or above the partition level. The heading itself is the first block.
 */
export interface HeadingRun {
  heading: Heading;
  title: string;
  blocks: BlockNode[];
}

export interface Partition {
  /** Blocks before the first heading at or above the level */
  preamble: BlockNode[];
  runs: HeadingRun[];
}

/**
 * Cuts `doc.children` at every heading whose level is at most `level`.
 *
 * Deeper headings stay inside the run they appear in, and a shallower
 * heading always starts a run of its own, so the preamble followed by the
 * runs reproduces the children exactly, in order.
 */
export function partitionByLevel(doc: Document, level: number): Partition {
  const preamble: BlockNode[] = [];
  const runs: HeadingRun[] = [];
  for (const node of doc.children) {
    if (node.kind === "Heading" && node.level <= level) {
      runs.push({ heading: node, title: headingText(node), blocks: [node] });
    } else if (runs.length > 0) {
      runs[runs.length - 1].blocks.push(node);
    } else {
      preamble.push(node);
    }
  }
  return { preamble, runs };
}

/**
 * Wraps `blocks` in a document that carries the source document's metadata
 * and location.
 */
export function partDocument(source: Document, blocks: ReadonlyArray<BlockNode>): Document {
  return new Document(blocks, { metadata: source.metadata, sourceLocation: source.sourceLocation });
}

export function buildPart(
  source: Document,
  blocks: ReadonlyArray<BlockNode>,
  index: number,
  title: string | null,
  metadata: NodeMetadata = {},
): SplitResult {
  return new SplitResult(partDocument(source, blocks), index, title, countWords(blocks), metadata);
}

/**
 * The single part returned when a strategy finds nothing to split on.
 */
export function wholeDocument(source: Document, title: string | null, metadata: NodeMetadata = {}): SplitResult {
  return buildPart(source, source.children, 1, title, metadata);
}
