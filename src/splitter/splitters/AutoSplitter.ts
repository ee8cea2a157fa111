import { DEFAULT_AUTO_TARGET_WORDS } from "../../config";
import type { Document } from "../../ast/nodes";
import { countWords } from "../../ast/text";
import { getAllSections } from "../../sections/query";
import { logger } from "../../utils/logger";
import { SplitOptionError } from "../errors";
import { partitionByLevel } from "../partition";
import type { DocumentSplitter, SplitResult } from "../types";
import { HeadingSplitter } from "./HeadingSplitter";
import { WordCountSplitter } from "./WordCountSplitter";

export type AutoStrategy = "auto:h1" | "auto:h2" | "auto:word_count";

/**
 * Picks a strategy from the document's shape:
 *
 * 1. H1 parts when there is at least one H1 and the largest H1 part
 *    (preamble excluded) has at most twice the target words.
 * 2. Otherwise H2 parts when there is at least one H2 section and H2
 *    sections average at most 1.5 times the target.
 * 3. Otherwise word-count packing at the target.
 *
 * Every part records the branch taken in `metadata.strategy`.
 */
export class AutoSplitter implements DocumentSplitter {
  constructor(private readonly targetWords: number = DEFAULT_AUTO_TARGET_WORDS) {
    if (!Number.isInteger(targetWords) || targetWords < 1) {
      throw new SplitOptionError(`targetWords must be a positive integer, got ${targetWords}`);
    }
  }

  /**
   * The branch `split` would take for `doc`.
   */
  chooseStrategy(doc: Document): AutoStrategy {
    const h1Words = partitionByLevel(doc, 1).runs.map((run) => countWords(run.blocks));
    if (h1Words.length > 0) {
      const largest = Math.max(...h1Words);
      if (largest <= this.targetWords * 2) {
        logger.debug(`Auto split: ${h1Words.length} H1 parts, largest ${largest} words (target ${this.targetWords})`);
        return "auto:h1";
      }
    }

    const h2Words = getAllSections(doc, { minLevel: 2, maxLevel: 2 }).map((section) =>
      countWords([section.heading, ...section.content]),
    );
    if (h2Words.length > 0) {
      const average = h2Words.reduce((sum, words) => sum + words, 0) / h2Words.length;
      if (average <= this.targetWords * 1.5) {
        logger.debug(`Auto split: ${h2Words.length} H2 sections, average ${average.toFixed(1)} words`);
        return "auto:h2";
      }
    }

    logger.debug(`Auto split: falling back to word count packing at ${this.targetWords} words`);
    return "auto:word_count";
  }

  split(doc: Document): SplitResult[] {
    const strategy = this.chooseStrategy(doc);
    const splitter =
      strategy === "auto:h1"
        ? new HeadingSplitter(1)
        : strategy === "auto:h2"
          ? new HeadingSplitter(2)
          : new WordCountSplitter(this.targetWords);
    return splitter.split(doc).map((part) => part.withMetadata({ strategy }));
  }
}
