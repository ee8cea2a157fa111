import type { BlockNode, Document } from "../../ast/nodes";
import { extractText } from "../../ast/text";
import { logger } from "../../utils/logger";
import { fullTrim } from "../../utils/string";
import { SplitOptionError } from "../errors";
import { buildPart, wholeDocument } from "../partition";
import type { DocumentSplitter, SplitResult } from "../types";

/** Delimiters that Markdown turns into a thematic break */
const HORIZONTAL_RULE = /^-{3,}$|^\*{3,}$|^_{3,}$/;

/**
 * Cuts the document at marker blocks. Markers are dropped, parts are titled
 * "Part 1", "Part 2", ... and a marker at the very start or end of the
 * document produces no empty part.
 */
abstract class BoundarySplitter implements DocumentSplitter {
  protected abstract isBoundary(node: BlockNode): boolean;

  /** `metadata.reason` recorded when the document holds no marker */
  protected abstract readonly missingReason: string;

  split(doc: Document): SplitResult[] {
    const parts: SplitResult[] = [];
    let current: BlockNode[] = [];
    let found = false;

    const flush = () => {
      if (current.length > 0) {
        parts.push(buildPart(doc, current, parts.length + 1, `Part ${parts.length + 1}`));
        current = [];
      }
    };

    for (const node of doc.children) {
      if (this.isBoundary(node)) {
        found = true;
        flush();
      } else {
        current.push(node);
      }
    }
    flush();

    if (!found) {
      logger.debug(`No split markers found (${this.missingReason}); keeping the document whole`);
      return [wholeDocument(doc, "Part 1", { reason: this.missingReason })];
    }
    if (parts.length === 0) {
      // Markers only: the caller still gets one (empty) part.
      return [buildPart(doc, [], 1, "Part 1")];
    }
    return parts;
  }
}

/**
 * Splits on paragraphs whose whole text, trimmed, equals the delimiter.
 * A delimiter that reads as a horizontal rule (`---`, `***`, `___`) also
 * matches thematic breaks, since that is what Markdown parses it into.
 */
export class DelimiterSplitter extends BoundarySplitter {
  protected readonly missingReason = "no_delimiters_found";
  private readonly delimiter: string;
  private readonly matchesBreaks: boolean;

  constructor(delimiter: string) {
    super();
    this.delimiter = fullTrim(delimiter);
    if (!this.delimiter) {
      throw new SplitOptionError("Delimiter cannot be empty");
    }
    this.matchesBreaks = HORIZONTAL_RULE.test(this.delimiter);
  }

  protected isBoundary(node: BlockNode): boolean {
    if (node.kind === "ThematicBreak") {
      return this.matchesBreaks;
    }
    return node.kind === "Paragraph" && fullTrim(extractText(node)) === this.delimiter;
  }
}

/**
 * Splits on thematic breaks.
 */
export class BreakSplitter extends BoundarySplitter {
  protected readonly missingReason = "no_breaks_found";

  protected isBoundary(node: BlockNode): boolean {
    return node.kind === "ThematicBreak";
  }
}
