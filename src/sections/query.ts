import Fuse from "fuse.js";
import type { BlockNode, Document, Heading } from "../ast/nodes";
import { extractText } from "../ast/text";
import { fullTrim } from "../utils/string";
import { logger } from "../utils/logger";
import { AmbiguousSectionError, SectionIndexError, SectionNotFoundError, SectionRangeError } from "./errors";
import type { LevelRange, MatchOptions, Section, SectionTarget } from "./types";

const isHeading = (node: BlockNode): node is Heading => node.kind === "Heading";

/**
 * Plain text of a heading, trimmed. Used for matching and as a title.
 */
export function headingText(heading: Heading | Section): string {
  return fullTrim(extractText("heading" in heading ? heading.heading : heading));
}

function checkLevelRange(minLevel: number, maxLevel: number): void {
  if (!(Number.isInteger(minLevel) && Number.isInteger(maxLevel) && 1 <= minLevel && minLevel <= maxLevel && maxLevel <= 6)) {
    throw new SectionRangeError(
      `Invalid level range: minLevel=${minLevel}, maxLevel=${maxLevel}. Levels must be between 1 and 6, with minLevel <= maxLevel.`,
    );
  }
}

/**
 * Every section of `doc` whose heading level lies in the requested range, in
 * document order.
 *
 * Each heading's section runs until the next heading whose level is less
 * than or equal to its own, so a section includes its sub-sections and
 * sections at different levels nest. Content before the first heading
 * belongs to no section (see getPreamble).
 */
export function getAllSections(doc: Document, options: LevelRange = {}): Section[] {
  const { minLevel = 1, maxLevel = 6 } = options;
  checkLevelRange(minLevel, maxLevel);

  const children = doc.children;
  const sections: Section[] = [];
  children.forEach((node, index) => {
    if (!isHeading(node) || node.level < minLevel || node.level > maxLevel) {
      return;
    }
    let end = index + 1;
    while (end < children.length) {
      const next = children[end];
      if (isHeading(next) && next.level <= node.level) {
        break;
      }
      end++;
    }
    sections.push({
      heading: node,
      level: node.level,
      content: children.slice(index + 1, end),
      startIndex: index,
      endIndex: end,
    });
  });
  return sections;
}

/**
 * Blocks before the first heading of any level.
 */
export function getPreamble(doc: Document): BlockNode[] {
  const firstHeading = doc.children.findIndex(isHeading);
  return firstHeading === -1 ? [...doc.children] : doc.children.slice(0, firstHeading);
}

/**
 * Number of sections, optionally only those at one heading level.
 */
export function countSections(doc: Document, level?: number): number {
  const range = level === undefined ? {} : { minLevel: level, maxLevel: level };
  return getAllSections(doc, range).length;
}

export interface HeadingMatch {
  index: number;
  heading: Heading;
}

/**
 * First heading whose text equals `text`, with its position in the
 * document's children.
 */
export function findHeading(
  doc: Document,
  text: string,
  options: MatchOptions & { level?: number } = {},
): HeadingMatch | undefined {
  const caseSensitive = options.caseSensitive ?? false;
  const wanted = normalize(fullTrim(text), caseSensitive);
  for (const [index, node] of doc.children.entries()) {
    if (!isHeading(node) || (options.level !== undefined && node.level !== options.level)) {
      continue;
    }
    if (normalize(headingText(node), caseSensitive) === wanted) {
      return { index, heading: node };
    }
  }
  return undefined;
}

function normalize(text: string, caseSensitive: boolean): string {
  return caseSensitive ? text : text.toLowerCase();
}

export const hasWildcards = (pattern: string): boolean => /[*?]/.test(pattern);

/**
 * Turns a shell-style pattern (`*` any run, `?` one character) into an
 * anchored regular expression.
 */
export function wildcardToRegExp(pattern: string, caseSensitive = false): RegExp {
  const source = Array.from(pattern)
    .map((char) => {
      if (char === "*") return ".*";
      if (char === "?") return ".";
      return char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`, caseSensitive ? "s" : "is");
}

/**
 * Heading texts similar to `target`, best match first, at most `limit`.
 */
export function suggestHeadings(sections: ReadonlyArray<Section>, target: string, limit = 3): string[] {
  const texts = [...new Set(sections.map((section) => headingText(section)))];
  if (texts.length === 0) {
    return [];
  }
  const fuse = new Fuse(texts, {
    threshold: 0.4, // 0 = exact, 1 = match anything
  });
  return fuse
    .search(target)
    .slice(0, limit)
    .map((result) => result.item);
}

export type SectionQuery =
  | string
  | number
  | ReadonlyArray<number>
  | ((section: Section, index: number) => boolean);

export interface QueryOptions extends LevelRange, MatchOptions {
  /** Only sections at exactly this level; overrides minLevel/maxLevel */
  level?: number;
}

/**
 * Finds sections by heading text (with `*` and `?` wildcards), by 0-based
 * index, by a list of indices or by predicate. Without a query every
 * section in the level range is returned.
 *
 * @throws SectionIndexError for an index outside the matching sections
 */
export function querySections(doc: Document, query?: SectionQuery, options: QueryOptions = {}): Section[] {
  const range =
    options.level !== undefined
      ? { minLevel: options.level, maxLevel: options.level }
      : { minLevel: options.minLevel, maxLevel: options.maxLevel };
  const sections = getAllSections(doc, range);

  const at = (index: number): Section => {
    if (!Number.isInteger(index) || index < 0 || index >= sections.length) {
      throw new SectionIndexError(index, sections.length);
    }
    return sections[index];
  };

  if (query === undefined) {
    return sections;
  }
  if (typeof query === "number") {
    return [at(query)];
  }
  if (typeof query === "function") {
    return sections.filter((section, index) => query(section, index));
  }
  if (typeof query === "string") {
    const caseSensitive = options.caseSensitive ?? false;
    if (hasWildcards(query)) {
      const regex = wildcardToRegExp(fullTrim(query), caseSensitive);
      return sections.filter((section) => regex.test(headingText(section)));
    }
    const wanted = normalize(fullTrim(query), caseSensitive);
    return sections.filter((section) => normalize(headingText(section), caseSensitive) === wanted);
  }
  return query.map(at);
}

/**
 * Resolves a heading text or 0-based index to exactly one section, scanning
 * sections of every level.
 *
 * @throws SectionIndexError when the index is out of range
 * @throws SectionNotFoundError when no heading has the text
 * @throws AmbiguousSectionError when several headings have the text
 */
export function resolveSection(doc: Document, target: SectionTarget, options: MatchOptions = {}): Section {
  const sections = getAllSections(doc);
  if (typeof target === "number") {
    if (!Number.isInteger(target) || target < 0 || target >= sections.length) {
      throw new SectionIndexError(target, sections.length);
    }
    return sections[target];
  }

  const caseSensitive = options.caseSensitive ?? false;
  const wanted = normalize(fullTrim(target), caseSensitive);
  const matches: number[] = [];
  sections.forEach((section, index) => {
    if (normalize(headingText(section), caseSensitive) === wanted) {
      matches.push(index);
    }
  });

  if (matches.length === 0) {
    const suggestions = suggestHeadings(sections, target);
    logger.debug(`Section '${target}' not found; suggestions: ${suggestions.join(", ") || "none"}`);
    throw new SectionNotFoundError(target, suggestions);
  }
  if (matches.length > 1) {
    throw new AmbiguousSectionError(target, matches);
  }
  return sections[matches[0]];
}
