import { DEFAULT_AUTO_TARGET_WORDS, DEFAULT_PART_FILENAME_WIDTH } from "../config";
import type { Document } from "../ast/nodes";
import { SplitOptionError, SplitSpecError } from "./errors";
import { parseSplitSpec } from "./parseSplitSpec";
import { AutoSplitter } from "./splitters/AutoSplitter";
import { BreakSplitter, DelimiterSplitter } from "./splitters/DelimiterSplitter";
import { HeadingSplitter, SectionSplitter } from "./splitters/HeadingSplitter";
import { PartsSplitter } from "./splitters/PartsSplitter";
import { WordCountSplitter } from "./splitters/WordCountSplitter";
import type { SplitResult, SplitSpec } from "./types";

export function splitByHeadingLevel(doc: Document, level: number, includePreamble = true): SplitResult[] {
  return new HeadingSplitter(level, includePreamble).split(doc);
}

export function splitByWordCount(doc: Document, targetWords: number): SplitResult[] {
  return new WordCountSplitter(targetWords).split(doc);
}

export function splitByParts(doc: Document, parts: number): SplitResult[] {
  return new PartsSplitter(parts).split(doc);
}

export function splitByDelimiter(doc: Document, delimiter: string): SplitResult[] {
  return new DelimiterSplitter(delimiter).split(doc);
}

export function splitByBreak(doc: Document): SplitResult[] {
  return new BreakSplitter().split(doc);
}

export function splitAuto(doc: Document, targetWords: number = DEFAULT_AUTO_TARGET_WORDS): SplitResult[] {
  return new AutoSplitter(targetWords).split(doc);
}

/**
 * One part per heading of any level, plus the preamble when asked for.
 */
export function splitBySections(doc: Document, includePreamble = true): SplitResult[] {
  return new SectionSplitter(includePreamble).split(doc);
}

export interface SplitOptions {
  /** Keep content before the first heading as its own part (heading strategy, default true) */
  includePreamble?: boolean;
  /** Target words per part for `auto` (default 1500) */
  targetWords?: number;
}

/**
 * Splits `doc` according to a specification string or an already parsed
 * specification. `page` and `chapter` describe source layouts a document
 * tree does not have and are rejected.
 *
 * @throws SplitSpecError for malformed or unsupported specifications
 */
export function splitDocument(doc: Document, spec: string | SplitSpec, options: SplitOptions = {}): SplitResult[] {
  const parsed = typeof spec === "string" ? parseSplitSpec(spec) : spec;
  switch (parsed.strategy) {
    case "heading":
      return splitByHeadingLevel(doc, parsed.level, options.includePreamble ?? true);
    case "length":
      return splitByWordCount(doc, parsed.words);
    case "parts":
      return splitByParts(doc, parsed.parts);
    case "delimiter":
      return splitByDelimiter(doc, parsed.delimiter);
    case "break":
      return splitByBreak(doc);
    case "auto":
      return splitAuto(doc, options.targetWords ?? DEFAULT_AUTO_TARGET_WORDS);
    case "page":
    case "chapter":
      throw new SplitSpecError(
        `Split strategy '${parsed.strategy}' depends on the source format and cannot be applied to a document tree`,
        parsed.strategy,
      );
  }
}

export interface PartFilenameOptions {
  /** File extension, with or without the leading dot (default "md") */
  extension?: string;
  /** Zero-padded width of the part number (default 3) */
  width?: number;
}

/**
 * File name for a part: `001-introduction.md`, or `001.md` when the title
 * yields no slug.
 */
export function formatPartFilename(result: SplitResult, options: PartFilenameOptions = {}): string {
  const { extension = "md", width = DEFAULT_PART_FILENAME_WIDTH } = options;
  if (!Number.isInteger(width) || width < 1) {
    throw new SplitOptionError(`width must be a positive integer, got ${width}`);
  }
  const number = String(result.index).padStart(width, "0");
  const slug = result.getFilenameSlug();
  const suffix = extension.replace(/^\.+/, "");
  const base = slug ? `${number}-${slug}` : number;
  return suffix ? `${base}.${suffix}` : base;
}
