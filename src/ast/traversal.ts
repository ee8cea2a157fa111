import { ConstructionError } from "./errors";
import {
  BlockQuote,
  Code,
  CodeBlock,
  DefinitionDescription,
  DefinitionList,
  DefinitionTerm,
  Document,
  Emphasis,
  FootnoteDefinition,
  FootnoteReference,
  HTMLBlock,
  HTMLInline,
  Heading,
  Image,
  LineBreak,
  Link,
  List,
  ListItem,
  MathBlock,
  MathInline,
  type BlockNode,
  type InlineNode,
  type Node,
  type NodeOptions,
  Paragraph,
  Strikethrough,
  Strong,
  Subscript,
  Superscript,
  Table,
  TableCell,
  TableRow,
  Text,
  ThematicBreak,
  Underline,
  isBlockNode,
  isInlineNode,
  isListItem,
  isTableCell,
  isTableRow,
  requireKinds,
} from "./nodes";

/**
 * Maps one child to its replacement; null drops the child.
 */
export type ChildMapper = (child: Node) => Node | null;

/**
 * Direct children of `node` in document order. Tables yield their header
 * row before the data rows; definition lists yield each term followed by its
 * descriptions.
 */
export function childrenOf(node: Node): Node[] {
  switch (node.kind) {
    case "Document":
    case "BlockQuote":
    case "ListItem":
      return [...node.children];
    case "List":
      return [...node.items];
    case "Table":
      return node.header ? [node.header, ...node.rows] : [...node.rows];
    case "TableRow":
      return [...node.cells];
    case "DefinitionList":
      return node.items.flatMap(([term, descriptions]) => [term, ...descriptions]);
    case "Heading":
    case "Paragraph":
    case "TableCell":
    case "FootnoteDefinition":
    case "DefinitionTerm":
    case "DefinitionDescription":
    case "Emphasis":
    case "Strong":
    case "Link":
    case "Strikethrough":
    case "Underline":
    case "Superscript":
    case "Subscript":
      return [...node.content];
    case "CodeBlock":
    case "ThematicBreak":
    case "HTMLBlock":
    case "MathBlock":
    case "Text":
    case "Code":
    case "Image":
    case "LineBreak":
    case "HTMLInline":
    case "FootnoteReference":
    case "MathInline":
      return [];
  }
}

function options(node: Node): NodeOptions {
  return node.sourceLocation
    ? { metadata: { ...node.metadata }, sourceLocation: node.sourceLocation }
    : { metadata: { ...node.metadata } };
}

function mapAll(children: ReadonlyArray<Node>, fn: ChildMapper): Node[] {
  const result: Node[] = [];
  for (const child of children) {
    const mapped = fn(child);
    if (mapped !== null) {
      result.push(mapped);
    }
  }
  return result;
}

function expectOne<T>(
  owner: string,
  value: Node | null,
  guard: (value: unknown) => value is T,
  expected: string,
): T | null {
  if (value === null || guard(value)) {
    return value;
  }
  throw new ConstructionError(owner, `child must be ${expected}, got ${value.kind}`);
}

function isTerm(value: unknown): value is DefinitionTerm {
  return value instanceof DefinitionTerm;
}

function isDescription(value: unknown): value is DefinitionDescription {
  return value instanceof DefinitionDescription;
}

function isFlowNode(value: unknown): value is BlockNode | InlineNode {
  return isBlockNode(value) || isInlineNode(value);
}

/**
 * Rebuilds `node` with every direct child passed through `fn`, dropping
 * children mapped to null. Leaves come back as fresh copies. The result is a
 * new node; `node` is never modified.
 *
 * Replacement children are checked against the container: mapping a block
 * child to an inline node fails with a ConstructionError.
 */
export function mapChildren(node: Node, fn: ChildMapper): Node {
  const opts = options(node);
  switch (node.kind) {
    case "Document":
      return new Document(requireKinds("Document", mapAll(node.children, fn), isBlockNode, "a block node"), opts);
    case "Heading":
      // Unchecked so that a bad level from an unchecked source stays visible to validation.
      return Heading.unchecked(
        node.level,
        requireKinds("Heading", mapAll(node.content, fn), isInlineNode, "an inline node"),
        opts,
      );
    case "Paragraph":
      return new Paragraph(requireKinds("Paragraph", mapAll(node.content, fn), isInlineNode, "an inline node"), opts);
    case "CodeBlock":
      return new CodeBlock(node.content, {
        ...opts,
        language: node.language,
        fenceChar: node.fenceChar,
        fenceLength: node.fenceLength,
      });
    case "BlockQuote":
      return new BlockQuote(requireKinds("BlockQuote", mapAll(node.children, fn), isBlockNode, "a block node"), opts);
    case "List":
      return new List(node.ordered, requireKinds("List", mapAll(node.items, fn), isListItem, "a ListItem"), {
        ...opts,
        start: node.start,
        tight: node.tight,
      });
    case "ListItem":
      return new ListItem(requireKinds("ListItem", mapAll(node.children, fn), isBlockNode, "a block node"), {
        ...opts,
        taskStatus: node.taskStatus,
      });
    case "Table": {
      const header = node.header ? expectOne("Table", fn(node.header), isTableRow, "a TableRow") : null;
      return new Table(requireKinds("Table", mapAll(node.rows, fn), isTableRow, "a TableRow"), {
        ...opts,
        header: header ?? undefined,
        alignments: node.alignments,
        caption: node.caption,
      });
    }
    case "TableRow":
      return new TableRow(requireKinds("TableRow", mapAll(node.cells, fn), isTableCell, "a TableCell"), {
        ...opts,
        isHeader: node.isHeader,
      });
    case "TableCell":
      return new TableCell(requireKinds("TableCell", mapAll(node.content, fn), isInlineNode, "an inline node"), {
        ...opts,
        colspan: node.colspan,
        rowspan: node.rowspan,
        alignment: node.alignment,
      });
    case "ThematicBreak":
      return new ThematicBreak(opts);
    case "HTMLBlock":
      return new HTMLBlock(node.content, opts);
    case "FootnoteDefinition":
      return new FootnoteDefinition(
        node.identifier,
        requireKinds("FootnoteDefinition", mapAll(node.content, fn), isBlockNode, "a block node"),
        opts,
      );
    case "DefinitionList": {
      // A dropped term takes its descriptions with it, and a term that
      // lost every description is dropped.
      const items: Array<readonly [DefinitionTerm, DefinitionDescription[]]> = [];
      for (const [term, descriptions] of node.items) {
        const mappedTerm = expectOne("DefinitionList", fn(term), isTerm, "a DefinitionTerm");
        if (mappedTerm === null) continue;
        const mappedDescriptions = requireKinds(
          "DefinitionList",
          mapAll(descriptions, fn),
          isDescription,
          "a DefinitionDescription",
        );
        if (mappedDescriptions.length === 0 && descriptions.length > 0) continue;
        items.push([mappedTerm, mappedDescriptions]);
      }
      return new DefinitionList(items, opts);
    }
    case "DefinitionTerm":
      return new DefinitionTerm(
        requireKinds("DefinitionTerm", mapAll(node.content, fn), isInlineNode, "an inline node"),
        opts,
      );
    case "DefinitionDescription":
      return new DefinitionDescription(
        requireKinds("DefinitionDescription", mapAll(node.content, fn), isFlowNode, "a block or inline node"),
        opts,
      );
    case "MathBlock":
      return new MathBlock(node.content, { ...opts, notation: node.notation });
    case "Text":
      return new Text(node.content, opts);
    case "Emphasis":
      return new Emphasis(requireKinds("Emphasis", mapAll(node.content, fn), isInlineNode, "an inline node"), opts);
    case "Strong":
      return new Strong(requireKinds("Strong", mapAll(node.content, fn), isInlineNode, "an inline node"), opts);
    case "Code":
      return new Code(node.content, opts);
    case "Link":
      return new Link(node.url, requireKinds("Link", mapAll(node.content, fn), isInlineNode, "an inline node"), {
        ...opts,
        title: node.title,
      });
    case "Image":
      return new Image(node.url, {
        ...opts,
        altText: node.altText,
        title: node.title,
        width: node.width,
        height: node.height,
      });
    case "LineBreak":
      return new LineBreak({ ...opts, soft: node.soft });
    case "Strikethrough":
      return new Strikethrough(
        requireKinds("Strikethrough", mapAll(node.content, fn), isInlineNode, "an inline node"),
        opts,
      );
    case "Underline":
      return new Underline(requireKinds("Underline", mapAll(node.content, fn), isInlineNode, "an inline node"), opts);
    case "Superscript":
      return new Superscript(
        requireKinds("Superscript", mapAll(node.content, fn), isInlineNode, "an inline node"),
        opts,
      );
    case "Subscript":
      return new Subscript(requireKinds("Subscript", mapAll(node.content, fn), isInlineNode, "an inline node"), opts);
    case "HTMLInline":
      return new HTMLInline(node.content, opts);
    case "FootnoteReference":
      return new FootnoteReference(node.identifier, opts);
    case "MathInline":
      return new MathInline(node.content, { ...opts, notation: node.notation });
  }
}

/**
 * Deep structural copy of a subtree.
 */
export function cloneNode(node: Node): Node {
  return mapChildren(node, (child) => cloneNode(child));
}

/**
 * Depth-first, pre-order walk over a subtree including `node` itself.
 * Returning false from `fn` skips the children of that node.
 */
export function walk(node: Node, fn: (node: Node, depth: number) => boolean | void, depth = 0): void {
  if (fn(node, depth) === false) {
    return;
  }
  for (const child of childrenOf(node)) {
    walk(child, fn, depth + 1);
  }
}
