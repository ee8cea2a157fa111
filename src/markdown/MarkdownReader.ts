import type {
  Definition,
  ImageReference,
  LinkReference,
  List as MdastList,
  ListItem as MdastListItem,
  Nodes,
  PhrasingContent,
  Root,
  RootContent,
  Table as MdastTable,
} from "mdast";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import * as N from "../ast/nodes";
import { logger } from "../utils/logger";

export interface MarkdownReaderOptions {
  /** Metadata attached to the resulting Document */
  metadata?: N.NodeMetadata;
}

/**
 * Builds a document tree from Markdown (CommonMark plus GitHub extensions:
 * tables, task lists, strikethrough, footnotes, autolinks).
 *
 * Every node carries a markdown source location with the line and column
 * where it starts. Link and image references are resolved against their
 * definitions; the definitions themselves produce no nodes.
 */
export class MarkdownReader {
  private definitions = new Map<string, Definition>();

  constructor(private readonly options: MarkdownReaderOptions = {}) {}

  read(source: string): N.Document {
    const tree: Root = unified().use(remarkParse).use(remarkGfm).parse(source);
    this.definitions = new Map();
    this.collectDefinitions(tree);
    return new N.Document(this.blocks(tree.children), { metadata: this.options.metadata });
  }

  private collectDefinitions(node: Nodes): void {
    if (node.type === "definition") {
      // First definition wins, as in CommonMark
      if (!this.definitions.has(node.identifier)) {
        this.definitions.set(node.identifier, node);
      }
      return;
    }
    if ("children" in node) {
      for (const child of node.children) {
        this.collectDefinitions(child);
      }
    }
  }

  private location(node: Nodes): N.NodeOptions {
    const start = node.position?.start;
    if (!start) {
      return {};
    }
    return { sourceLocation: { format: "markdown", line: start.line, column: start.column } };
  }

  private blocks(nodes: ReadonlyArray<RootContent>): N.BlockNode[] {
    const result: N.BlockNode[] = [];
    for (const node of nodes) {
      const block = this.block(node);
      if (block) {
        result.push(block);
      }
    }
    return result;
  }

  private block(node: RootContent): N.BlockNode | null {
    const options = this.location(node);
    switch (node.type) {
      case "heading":
        return new N.Heading(node.depth, this.inlines(node.children), options);
      case "paragraph":
        return new N.Paragraph(this.inlines(node.children), options);
      case "code":
        return new N.CodeBlock(node.value, {
          ...options,
          language: node.lang ?? undefined,
          metadata: node.meta ? { info: node.meta } : undefined,
        });
      case "blockquote":
        return new N.BlockQuote(this.blocks(node.children), options);
      case "list":
        return this.list(node, options);
      case "table":
        return this.table(node, options);
      case "thematicBreak":
        return new N.ThematicBreak(options);
      case "html":
        return new N.HTMLBlock(node.value, options);
      case "footnoteDefinition":
        return new N.FootnoteDefinition(node.identifier, this.blocks(node.children), options);
      case "definition":
        return null;
      default:
        logger.debug(`Skipping unsupported markdown block node '${typeOf(node)}'`);
        return null;
    }
  }

  private list(node: MdastList, options: N.NodeOptions): N.List {
    const items = node.children.map((item) => this.listItem(item));
    return new N.List(node.ordered ?? false, items, {
      ...options,
      start: node.start ?? 1,
      tight: !(node.spread ?? false),
    });
  }

  private listItem(node: MdastListItem): N.ListItem {
    const taskStatus: N.TaskStatus | undefined =
      node.checked === true ? "checked" : node.checked === false ? "unchecked" : undefined;
    return new N.ListItem(this.blocks(node.children), { ...this.location(node), taskStatus });
  }

  private table(node: MdastTable, options: N.NodeOptions): N.Table {
    const alignments = (node.align ?? []).map((align) => align ?? null);
    const rows = node.children.map(
      (row, rowIndex) =>
        new N.TableRow(
          row.children.map(
            (cell, cellIndex) =>
              new N.TableCell(this.inlines(cell.children), {
                ...this.location(cell),
                alignment: alignments[cellIndex] ?? undefined,
              }),
          ),
          { ...this.location(row), isHeader: rowIndex === 0 },
        ),
    );
    const [header, ...body] = rows;
    return new N.Table(body, { ...options, header, alignments });
  }

  private inlines(nodes: ReadonlyArray<PhrasingContent>): N.InlineNode[] {
    const result: N.InlineNode[] = [];
    for (const node of nodes) {
      result.push(...this.inline(node));
    }
    return result;
  }

  private inline(node: PhrasingContent): N.InlineNode[] {
    const options = this.location(node);
    switch (node.type) {
      case "text":
        return [new N.Text(node.value, options)];
      case "emphasis":
        return [new N.Emphasis(this.inlines(node.children), options)];
      case "strong":
        return [new N.Strong(this.inlines(node.children), options)];
      case "delete":
        return [new N.Strikethrough(this.inlines(node.children), options)];
      case "inlineCode":
        return [new N.Code(node.value, options)];
      case "break":
        return [new N.LineBreak(options)];
      case "html":
        return [new N.HTMLInline(node.value, options)];
      case "link":
        return [new N.Link(node.url, this.inlines(node.children), { ...options, title: node.title ?? undefined })];
      case "image":
        return [new N.Image(node.url, { ...options, altText: node.alt ?? "", title: node.title ?? undefined })];
      case "linkReference":
        return this.linkReference(node, options);
      case "imageReference":
        return this.imageReference(node, options);
      case "footnoteReference":
        return [new N.FootnoteReference(node.identifier, options)];
      default:
        logger.debug(`Skipping unsupported markdown inline node '${typeOf(node)}'`);
        return [];
    }
  }

  private linkReference(node: LinkReference, options: N.NodeOptions): N.InlineNode[] {
    const content = this.inlines(node.children);
    const definition = this.definitions.get(node.identifier);
    if (!definition) {
      return content;
    }
    return [new N.Link(definition.url, content, { ...options, title: definition.title ?? undefined })];
  }

  private imageReference(node: ImageReference, options: N.NodeOptions): N.InlineNode[] {
    const definition = this.definitions.get(node.identifier);
    if (!definition) {
      return node.alt ? [new N.Text(node.alt, options)] : [];
    }
    return [
      new N.Image(definition.url, { ...options, altText: node.alt ?? "", title: definition.title ?? undefined }),
    ];
  }
}

function typeOf(node: { type: string }): string {
  return node.type;
}

/**
 * Parses Markdown text into a Document.
 */
export function parseMarkdown(source: string, options: MarkdownReaderOptions = {}): N.Document {
  return new MarkdownReader(options).read(source);
}
