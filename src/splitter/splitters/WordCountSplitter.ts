import type { BlockNode, Document } from "../../ast/nodes";
import { countWords } from "../../ast/text";
import { logger } from "../../utils/logger";
import { SplitOptionError } from "../errors";
import { PREAMBLE_TITLE, buildPart, partitionByLevel, wholeDocument } from "../partition";
import type { DocumentSplitter, SplitResult } from "../types";

/**
 * Smallest piece the word-count strategy moves around: the preamble or one
 * heading with the blocks up to the next heading of any level.
 */
interface Unit {
  title: string;
  blocks: BlockNode[];
  words: number;
}

/**
 * Greedily packs whole sections into parts of about `targetWords` words.
 *
 * Sections are never cut: a part is closed as soon as the next section
 * would push it past the target, so a part only exceeds the target when it
 * consists of a single oversized section.
 */
export class WordCountSplitter implements DocumentSplitter {
  constructor(private readonly targetWords: number) {
    if (!Number.isInteger(targetWords) || targetWords < 1) {
      throw new SplitOptionError(`targetWords must be a positive integer, got ${targetWords}`);
    }
  }

  split(doc: Document): SplitResult[] {
    const units = this.units(doc);
    if (units === null) {
      logger.debug("Document has no headings; keeping it whole");
      return [wholeDocument(doc, null, { reason: "no_sections" })];
    }

    const parts: SplitResult[] = [];
    let current: Unit | null = null;

    for (const next of units) {
      if (current) {
        if (this.wouldExceedTarget(current, next)) {
          parts.push(buildPart(doc, current.blocks, parts.length + 1, current.title));
          current = this.cloneUnit(next);
          continue;
        }
        current.blocks.push(...next.blocks);
        current.words += next.words;
      } else {
        current = this.cloneUnit(next);
      }
    }

    if (current) {
      parts.push(buildPart(doc, current.blocks, parts.length + 1, current.title));
    }
    return parts;
  }

  /**
   * Preamble plus one unit per heading, or null when there is no heading.
   */
  private units(doc: Document): Unit[] | null {
    const { preamble, runs } = partitionByLevel(doc, 6);
    if (runs.length === 0) {
      return null;
    }
    const units: Unit[] = [];
    if (preamble.length > 0) {
      units.push({ title: PREAMBLE_TITLE, blocks: preamble, words: countWords(preamble) });
    }
    for (const run of runs) {
      units.push({ title: run.title, blocks: run.blocks, words: countWords(run.blocks) });
    }
    return units;
  }

  private wouldExceedTarget(current: Unit, next: Unit): boolean {
    return current.blocks.length > 0 && current.words + next.words > this.targetWords;
  }

  private cloneUnit(unit: Unit): Unit {
    return { title: unit.title, blocks: [...unit.blocks], words: unit.words };
  }
}
