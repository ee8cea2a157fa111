import type { Document } from "../../ast/nodes";
import { countWords } from "../../ast/text";
import { logger } from "../../utils/logger";
import { SplitOptionError } from "../errors";
import { wholeDocument } from "../partition";
import type { DocumentSplitter, SplitResult } from "../types";
import { WordCountSplitter } from "./WordCountSplitter";

/**
 * Aims for `parts` parts of roughly equal length by running the word-count
 * strategy with a target of total words / parts. The greedy packing keeps
 * sections whole, so the number of parts produced can differ from the
 * number asked for; every word ends up in exactly one part.
 */
export class PartsSplitter implements DocumentSplitter {
  constructor(private readonly parts: number) {
    if (!Number.isInteger(parts) || parts < 1) {
      throw new SplitOptionError(`parts must be a positive integer, got ${parts}`);
    }
  }

  split(doc: Document): SplitResult[] {
    const totalWords = countWords(doc.children);
    if (totalWords === 0) {
      return [wholeDocument(doc, null)];
    }
    const target = Math.max(1, Math.floor(totalWords / this.parts));
    logger.debug(`Splitting ${totalWords} words into ${this.parts} parts: target ${target} words per part`);
    return new WordCountSplitter(target).split(doc);
  }
}
