import type { Document } from "../../ast/nodes";
import { logger } from "../../utils/logger";
import { SplitOptionError } from "../errors";
import { PREAMBLE_TITLE, buildPart, partitionByLevel, wholeDocument } from "../partition";
import type { DocumentSplitter, SplitResult } from "../types";

function partsFromPartition(doc: Document, level: number, includePreamble: boolean): SplitResult[] {
  const { preamble, runs } = partitionByLevel(doc, level);
  const parts: SplitResult[] = [];
  if (includePreamble && preamble.length > 0) {
    parts.push(buildPart(doc, preamble, parts.length + 1, PREAMBLE_TITLE));
  }
  for (const run of runs) {
    parts.push(buildPart(doc, run.blocks, parts.length + 1, run.title));
  }
  return parts;
}

/**
 * Splits at every heading of the given level or above. Deeper headings stay
 * inside the part they belong to; content before the first such heading
 * becomes a "Preamble" part unless `includePreamble` is off.
 *
 * A document with no heading at exactly the given level is kept whole, with
 * `metadata.reason = "no_headings_found"`.
 */
export class HeadingSplitter implements DocumentSplitter {
  constructor(
    private readonly level: number,
    private readonly includePreamble = true,
  ) {
    if (!Number.isInteger(level) || level < 1 || level > 6) {
      throw new SplitOptionError(`Heading level must be between 1 and 6, got ${level}`);
    }
  }

  split(doc: Document): SplitResult[] {
    const matches = doc.children.some((child) => child.kind === "Heading" && child.level === this.level);
    if (!matches) {
      logger.debug(`No headings at level ${this.level}; keeping the document whole`);
      return [wholeDocument(doc, null, { reason: "no_headings_found" })];
    }
    return partsFromPartition(doc, this.level, this.includePreamble);
  }
}

/**
 * One part per heading of any level, plus the preamble unless
 * `includePreamble` is off.
 */
export class SectionSplitter implements DocumentSplitter {
  constructor(private readonly includePreamble = true) {}

  split(doc: Document): SplitResult[] {
    if (!doc.children.some((child) => child.kind === "Heading")) {
      logger.debug("No headings; keeping the document whole");
      return [wholeDocument(doc, null, { reason: "no_headings_found" })];
    }
    return partsFromPartition(doc, 6, this.includePreamble);
  }
}
