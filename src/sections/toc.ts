import { DEFAULT_TOC_MAX_LEVEL } from "../config";
import { type BlockNode, Document, Heading, Link, List, ListItem, Paragraph, Text } from "../ast/nodes";
import { uniqueAnchor } from "../utils/string";
import { SectionRangeError } from "./errors";
import { getAllSections, headingText } from "./query";
import type { Section } from "./types";

export type TocStyle = "markdown" | "list" | "nested";

export interface TocOptions {
  /** Deepest heading level listed (1-6, default 3) */
  maxLevel?: number;
  style?: TocStyle;
}

export const TOC_TITLE = "Table of Contents";

function tocSections(doc: Document, maxLevel: number): Section[] {
  if (!Number.isInteger(maxLevel) || maxLevel < 1 || maxLevel > 6) {
    throw new SectionRangeError(`maxLevel must be between 1 and 6, got ${maxLevel}`);
  }
  return getAllSections(doc, { minLevel: 1, maxLevel });
}

/**
 * Markdown bullet list of links to every heading down to `maxLevel`,
 * indented two spaces per level. Anchors follow GitHub's scheme, with
 * `-1`, `-2`, ... appended to repeated ones.
 */
function markdownToc(sections: ReadonlyArray<Section>): string {
  if (sections.length === 0) {
    return "";
  }
  const seen = new Set<string>();
  const lines = [`# ${TOC_TITLE}`, ""];
  for (const section of sections) {
    const text = headingText(section);
    const indent = "  ".repeat(section.level - 1);
    lines.push(`${indent}- [${text}](#${uniqueAnchor(text, seen)})`);
  }
  return lines.join("\n");
}

const entryItem = (text: string, nested: BlockNode[] = []): ListItem =>
  new ListItem([new Paragraph([new Text(text)]), ...nested]);

function flatToc(sections: ReadonlyArray<Section>): List {
  return new List(
    false,
    sections.map((section) => entryItem(headingText(section))),
  );
}

interface TocEntry {
  /** null for a filler entry bridging a skipped level */
  text: string | null;
  level: number;
  children: TocEntry[];
}

/**
 * Nests entries by heading level. A jump of more than one level (H1 to H3)
 * is bridged with empty items so that every nested list sits one level
 * below its parent.
 */
function nestedToc(sections: ReadonlyArray<Section>): List {
  const baseLevel = sections.reduce((min, section) => Math.min(min, section.level), 6);
  const root: TocEntry = { text: null, level: baseLevel - 1, children: [] };
  const stack: TocEntry[] = [root];

  for (const section of sections) {
    while (stack.length > 1 && stack[stack.length - 1].level >= section.level) {
      stack.pop();
    }
    let parent = stack[stack.length - 1];
    while (parent.level < section.level - 1) {
      const filler: TocEntry = { text: null, level: parent.level + 1, children: [] };
      parent.children.push(filler);
      stack.push(filler);
      parent = filler;
    }
    const entry: TocEntry = { text: headingText(section), level: section.level, children: [] };
    parent.children.push(entry);
    stack.push(entry);
  }

  const build = (entries: ReadonlyArray<TocEntry>): List =>
    new List(
      false,
      entries.map((entry) => {
        const nested = entry.children.length > 0 ? [build(entry.children)] : [];
        return entry.text === null ? new ListItem(nested) : entryItem(entry.text, nested);
      }),
    );
  return build(root.children);
}

/**
 * Table of contents for `doc`. The `markdown` style returns Markdown text
 * (empty when there are no headings); `list` and `nested` return a List
 * node, flat or nested by heading level.
 */
export function generateToc(doc: Document, options?: TocOptions & { style?: "markdown" }): string;
export function generateToc(doc: Document, options: TocOptions & { style: "list" | "nested" }): List;
export function generateToc(doc: Document, options?: TocOptions): string | List;
export function generateToc(doc: Document, options: TocOptions = {}): string | List {
  const { maxLevel = DEFAULT_TOC_MAX_LEVEL, style = "markdown" } = options;
  const sections = tocSections(doc, maxLevel);
  switch (style) {
    case "markdown":
      return markdownToc(sections);
    case "list":
      return flatToc(sections);
    case "nested":
      return nestedToc(sections);
    default:
      throw new SectionRangeError(`Invalid table of contents style: ${String(style)}`);
  }
}

export type TocPosition = "start" | "after_first_heading";

export interface InsertTocOptions extends TocOptions {
  position?: TocPosition;
}

/**
 * Returns a copy of `doc` with a table of contents spliced in. The markdown
 * style becomes a "Table of Contents" heading followed by a list of anchor
 * links; the other styles insert their List node. Without `after_first_heading`
 * or without any heading, the table goes first. A document without headings
 * comes back unchanged.
 */
export function insertToc(doc: Document, options: InsertTocOptions = {}): Document {
  const { position = "start", maxLevel = DEFAULT_TOC_MAX_LEVEL, style = "markdown" } = options;
  const sections = tocSections(doc, maxLevel);

  let tocNodes: BlockNode[] = [];
  if (sections.length > 0) {
    if (style === "markdown") {
      const seen = new Set<string>();
      const items = sections.map((section) => {
        const text = headingText(section);
        return new ListItem([new Paragraph([new Link(`#${uniqueAnchor(text, seen)}`, [new Text(text)])])]);
      });
      tocNodes = [new Heading(1, [new Text(TOC_TITLE)]), new List(false, items, { tight: true })];
    } else {
      tocNodes = [generateToc(doc, { maxLevel, style })];
    }
  }

  let at = 0;
  if (position === "after_first_heading") {
    const firstHeading = doc.children.findIndex((node) => node.kind === "Heading");
    at = firstHeading === -1 ? 0 : firstHeading + 1;
  } else if (position !== "start") {
    throw new SectionRangeError(`Invalid table of contents position: ${String(position)}`);
  }

  const children = [...doc.children];
  children.splice(at, 0, ...tocNodes);
  return new Document(children, { metadata: doc.metadata, sourceLocation: doc.sourceLocation });
}
