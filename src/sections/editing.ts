import { type BlockNode, Document, ThematicBreak, isBlockNode } from "../ast/nodes";
import { SectionNotFoundError, SectionRangeError } from "./errors";
import { getAllSections, hasWildcards, headingText, resolveSection, suggestHeadings, wildcardToRegExp } from "./query";
import type { InsertPosition, MatchOptions, Section, SectionContent, SectionTarget } from "./types";

function isSection(content: SectionContent): content is Section {
  return "heading" in content && "startIndex" in content;
}

/**
 * Flattens a section, document, block or list of blocks into a block run.
 */
export function toBlocks(content: SectionContent): BlockNode[] {
  if (content instanceof Document) {
    return [...content.children];
  }
  if (isBlockNode(content)) {
    return [content];
  }
  if (isSection(content)) {
    return [content.heading, ...content.content];
  }
  return [...content];
}

/**
 * Wraps a section (heading included) in a standalone document. Metadata and
 * source location come from `source` when given.
 */
export function sectionToDocument(section: Section, source?: Document): Document {
  return withChildren(source, [section.heading, ...section.content]);
}

function withChildren(source: Document | undefined, children: ReadonlyArray<BlockNode>): Document {
  return new Document(children, {
    metadata: source?.metadata,
    sourceLocation: source?.sourceLocation,
  });
}

function splice(doc: Document, start: number, deleteCount: number, blocks: ReadonlyArray<BlockNode>): Document {
  const children = [...doc.children];
  children.splice(start, deleteCount, ...blocks);
  return withChildren(doc, children);
}

/**
 * The target section as its own document.
 */
export function extractSection(doc: Document, target: SectionTarget, options: MatchOptions = {}): Document {
  return sectionToDocument(resolveSection(doc, target, options), doc);
}

/**
 * Replaces the target section, heading and sub-sections included, with
 * `content`.
 */
export function replaceSection(
  doc: Document,
  target: SectionTarget,
  content: SectionContent,
  options: MatchOptions = {},
): Document {
  const section = resolveSection(doc, target, options);
  return splice(doc, section.startIndex, section.endIndex - section.startIndex, toBlocks(content));
}

export function removeSection(doc: Document, target: SectionTarget, options: MatchOptions = {}): Document {
  const section = resolveSection(doc, target, options);
  return splice(doc, section.startIndex, section.endIndex - section.startIndex, []);
}

/**
 * Inserts blocks into the target section. `start` and `after_heading` put
 * them directly after the heading; `end` puts them after the section's last
 * block, which for a section with sub-sections is the end of the last one.
 */
export function insertIntoSection(
  doc: Document,
  target: SectionTarget,
  content: SectionContent,
  position: InsertPosition = "end",
  options: MatchOptions = {},
): Document {
  const section = resolveSection(doc, target, options);
  let at: number;
  switch (position) {
    case "start":
    case "after_heading":
      at = section.startIndex + 1;
      break;
    case "end":
      at = section.endIndex;
      break;
    default:
      throw new SectionRangeError(`Invalid insert position: ${String(position)}`);
  }
  return splice(doc, at, 0, toBlocks(content));
}

export function addSectionBefore(
  doc: Document,
  target: SectionTarget,
  content: SectionContent,
  options: MatchOptions = {},
): Document {
  const section = resolveSection(doc, target, options);
  return splice(doc, section.startIndex, 0, toBlocks(content));
}

export function addSectionAfter(
  doc: Document,
  target: SectionTarget,
  content: SectionContent,
  options: MatchOptions = {},
): Document {
  const section = resolveSection(doc, target, options);
  return splice(doc, section.endIndex, 0, toBlocks(content));
}

/**
 * Parses 1-based section ranges such as `"1-3,5,8-"` into sorted, distinct
 * 0-based indices. An open end runs to the last section, reversed ranges are
 * swapped and numbers past `total` are ignored.
 *
 * @throws SectionRangeError for a token that is not a number or range
 */
export function parseSectionRanges(spec: string, total: number): number[] {
  const indices = new Set<number>();
  const parseBound = (value: string, token: string): number => {
    if (!/^\d+$/.test(value)) {
      throw new SectionRangeError(`Invalid section range '${token}': '${value}' is not a positive integer`);
    }
    return Number.parseInt(value, 10) - 1;
  };

  for (const rawToken of spec.split(",")) {
    const token = rawToken.trim();
    if (!token) {
      continue;
    }
    const dash = token.indexOf("-");
    let start: number;
    let end: number;
    if (dash === -1) {
      start = end = parseBound(token, token);
    } else {
      const startText = token.slice(0, dash).trim();
      const endText = token.slice(dash + 1).trim();
      start = startText ? parseBound(startText, token) : 0;
      end = endText ? parseBound(endText, token) : total - 1;
      if (start > end) {
        [start, end] = [end, start];
      }
    }
    for (let index = Math.max(start, 0); index <= Math.min(end, total - 1); index++) {
      indices.add(index);
    }
  }
  return [...indices].sort((a, b) => a - b);
}

export interface ExtractSectionsOptions extends MatchOptions {
  /** Block placed between extracted sections; null for none. Defaults to a ThematicBreak */
  separator?: BlockNode | null;
}

/**
 * Pulls several sections into one document. `spec` is a heading pattern
 * (`"Chapter*"`), `"#:"` followed by 1-based ranges (`"#:1-3,5"`), a 0-based
 * index, or a list of 0-based indices. A selected section nested inside
 * another selected section is not repeated.
 */
export function extractSections(
  doc: Document,
  spec: string | number | ReadonlyArray<number>,
  options: ExtractSectionsOptions = {},
): Document {
  const sections = getAllSections(doc);
  if (sections.length === 0) {
    throw new SectionRangeError("Document contains no sections (headings)");
  }

  let selected: Section[];
  if (typeof spec === "number") {
    selected = [resolveSection(doc, spec)];
  } else if (typeof spec !== "string") {
    selected = spec.filter((index) => index >= 0 && index < sections.length).map((index) => sections[index]);
    if (selected.length === 0) {
      throw new SectionRangeError(`No valid sections in index list: ${spec.join(", ")}`);
    }
  } else if (spec.startsWith("#:")) {
    selected = parseSectionRanges(spec.slice(2), sections.length).map((index) => sections[index]);
    if (selected.length === 0) {
      throw new SectionRangeError(`No valid sections in range: ${spec}`);
    }
  } else {
    const regex = wildcardToRegExp(spec.trim(), options.caseSensitive ?? false);
    selected = sections.filter((section) => regex.test(headingText(section)));
    if (selected.length === 0) {
      throw new SectionNotFoundError(spec, hasWildcards(spec) ? [] : suggestHeadings(sections, spec));
    }
  }

  const separator = options.separator === undefined ? new ThematicBreak() : options.separator;
  const children: BlockNode[] = [];
  let coveredUntil = -1;
  for (const section of selected) {
    if (section.startIndex < coveredUntil) {
      continue;
    }
    if (children.length > 0 && separator) {
      children.push(separator);
    }
    children.push(section.heading, ...section.content);
    coveredUntil = section.endIndex;
  }
  return withChildren(doc, children);
}
