import { ConstructionError } from "./errors";
import type { NodeVisitor } from "./visitor";

/**
 * Free-form, format-specific annotations attached to a node
 */
export type NodeMetadata = Record<string, unknown>;

/**
 * Where a node came from in its source document
 */
export interface SourceLocation {
  /** Source format, e.g. "markdown", "pdf", "docx" */
  readonly format: string;
  readonly page?: number;
  readonly line?: number;
  readonly column?: number;
  /** Source element identifier, e.g. an HTML id */
  readonly elementId?: string;
  readonly metadata?: NodeMetadata;
}

export interface NodeOptions {
  metadata?: NodeMetadata;
  sourceLocation?: SourceLocation;
}

export type Alignment = "left" | "center" | "right";
export type TaskStatus = "checked" | "unchecked";
export type MathNotation = "latex" | "mathml" | "html";
export type FenceChar = "`" | "~";

/**
 * Common state of every node kind. Nodes are immutable once built: rewriting
 * a tree means constructing new nodes.
 */
abstract class NodeBase {
  abstract readonly kind: string;
  readonly metadata: NodeMetadata;
  readonly sourceLocation?: SourceLocation;

  protected constructor(options: NodeOptions = {}) {
    this.metadata = { ...(options.metadata ?? {}) };
    if (options.sourceLocation) {
      this.sourceLocation = options.sourceLocation;
    }
  }

  /**
   * Double dispatch: calls the visitor method matching this node's kind.
   */
  abstract accept<R>(visitor: NodeVisitor<R>): R;
}

// ============================================================================
// Root
// ============================================================================

/**
 * Root node. Holds block-level children only.
 */
export class Document extends NodeBase {
  readonly kind = "Document";
  readonly children: ReadonlyArray<BlockNode>;

  constructor(children: ReadonlyArray<BlockNode> = [], options: NodeOptions = {}) {
    super(options);
    this.children = requireKinds("Document", children, isBlockNode, "a block node");
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitDocument(this);
  }
}

// ============================================================================
// Block-level nodes
// ============================================================================

export class Heading extends NodeBase {
  readonly kind = "Heading";
  readonly level: number;
  readonly content: ReadonlyArray<InlineNode>;

  private static skipLevelCheck = false;

  /**
   * @throws ConstructionError when `level` is not an integer in 1-6
   */
  constructor(level: number, content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    if (!Heading.skipLevelCheck && !isValidHeadingLevel(level)) {
      throw new ConstructionError("Heading", `level must be an integer between 1 and 6, got ${level}`);
    }
    this.level = level;
    this.content = [...content];
  }

  /**
   * Builds a heading without checking its level. Meant for importers that
   * must represent malformed input faithfully; validation reports the level.
   */
  static unchecked(
    level: number,
    content: ReadonlyArray<InlineNode> = [],
    options: NodeOptions = {},
  ): Heading {
    Heading.skipLevelCheck = true;
    try {
      return new Heading(level, content, options);
    } finally {
      Heading.skipLevelCheck = false;
    }
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitHeading(this);
  }
}

export class Paragraph extends NodeBase {
  readonly kind = "Paragraph";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitParagraph(this);
  }
}

export interface CodeBlockOptions extends NodeOptions {
  language?: string;
  fenceChar?: FenceChar;
  fenceLength?: number;
}

export class CodeBlock extends NodeBase {
  readonly kind = "CodeBlock";
  readonly content: string;
  readonly language?: string;
  readonly fenceChar: FenceChar;
  readonly fenceLength: number;

  constructor(content: string, options: CodeBlockOptions = {}) {
    super(options);
    this.content = content;
    if (options.language) {
      this.language = options.language;
    }
    this.fenceChar = options.fenceChar ?? "`";
    this.fenceLength = options.fenceLength ?? 3;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitCodeBlock(this);
  }
}

export class BlockQuote extends NodeBase {
  readonly kind = "BlockQuote";
  readonly children: ReadonlyArray<BlockNode>;

  constructor(children: ReadonlyArray<BlockNode> = [], options: NodeOptions = {}) {
    super(options);
    this.children = requireKinds("BlockQuote", children, isBlockNode, "a block node");
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitBlockQuote(this);
  }
}

export interface ListOptions extends NodeOptions {
  /** First number of an ordered list */
  start?: number;
  /** Whether items are separated without blank lines */
  tight?: boolean;
}

export class List extends NodeBase {
  readonly kind = "List";
  readonly ordered: boolean;
  readonly items: ReadonlyArray<ListItem>;
  readonly start: number;
  readonly tight: boolean;

  constructor(ordered: boolean, items: ReadonlyArray<ListItem> = [], options: ListOptions = {}) {
    super(options);
    this.ordered = ordered;
    this.items = requireKinds("List", items, isListItem, "a ListItem");
    this.start = options.start ?? 1;
    this.tight = options.tight ?? true;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitList(this);
  }
}

export interface ListItemOptions extends NodeOptions {
  taskStatus?: TaskStatus;
}

export class ListItem extends NodeBase {
  readonly kind = "ListItem";
  readonly children: ReadonlyArray<BlockNode>;
  /** Checkbox state of a task list item; absent for plain items */
  readonly taskStatus?: TaskStatus;

  constructor(children: ReadonlyArray<BlockNode> = [], options: ListItemOptions = {}) {
    super(options);
    this.children = requireKinds("ListItem", children, isBlockNode, "a block node");
    if (options.taskStatus) {
      this.taskStatus = options.taskStatus;
    }
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitListItem(this);
  }
}

export interface TableOptions extends NodeOptions {
  header?: TableRow;
  /** Positional column alignments; null means unspecified */
  alignments?: ReadonlyArray<Alignment | null>;
  caption?: string;
}

export class Table extends NodeBase {
  readonly kind = "Table";
  readonly header?: TableRow;
  readonly rows: ReadonlyArray<TableRow>;
  readonly alignments: ReadonlyArray<Alignment | null>;
  readonly caption?: string;

  constructor(rows: ReadonlyArray<TableRow> = [], options: TableOptions = {}) {
    super(options);
    if (options.header) {
      this.header = options.header;
    }
    this.rows = requireKinds("Table", rows, isTableRow, "a TableRow");
    this.alignments = [...(options.alignments ?? [])];
    if (options.caption !== undefined) {
      this.caption = options.caption;
    }
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitTable(this);
  }
}

export interface TableRowOptions extends NodeOptions {
  isHeader?: boolean;
}

export class TableRow extends NodeBase {
  readonly kind = "TableRow";
  readonly cells: ReadonlyArray<TableCell>;
  readonly isHeader: boolean;

  constructor(cells: ReadonlyArray<TableCell> = [], options: TableRowOptions = {}) {
    super(options);
    this.cells = requireKinds("TableRow", cells, isTableCell, "a TableCell");
    this.isHeader = options.isHeader ?? false;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitTableRow(this);
  }
}

export interface TableCellOptions extends NodeOptions {
  colspan?: number;
  rowspan?: number;
  alignment?: Alignment;
}

/**
 * Spans are not checked here; non-positive spans are a validation finding.
 */
export class TableCell extends NodeBase {
  readonly kind = "TableCell";
  readonly content: ReadonlyArray<InlineNode>;
  readonly colspan: number;
  readonly rowspan: number;
  readonly alignment?: Alignment;

  constructor(content: ReadonlyArray<InlineNode> = [], options: TableCellOptions = {}) {
    super(options);
    this.content = [...content];
    this.colspan = options.colspan ?? 1;
    this.rowspan = options.rowspan ?? 1;
    if (options.alignment) {
      this.alignment = options.alignment;
    }
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitTableCell(this);
  }
}

export class ThematicBreak extends NodeBase {
  readonly kind = "ThematicBreak";

  constructor(options: NodeOptions = {}) {
    super(options);
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitThematicBreak(this);
  }
}

export class HTMLBlock extends NodeBase {
  readonly kind = "HTMLBlock";
  readonly content: string;

  constructor(content: string, options: NodeOptions = {}) {
    super(options);
    this.content = content;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitHTMLBlock(this);
  }
}

/**
 * Body of a footnote. An empty identifier is allowed so that malformed
 * input survives a round trip; validation reports it.
 */
export class FootnoteDefinition extends NodeBase {
  readonly kind = "FootnoteDefinition";
  readonly identifier: string;
  readonly content: ReadonlyArray<BlockNode>;

  constructor(identifier: string, content: ReadonlyArray<BlockNode> = [], options: NodeOptions = {}) {
    super(options);
    this.identifier = identifier;
    this.content = requireKinds("FootnoteDefinition", content, isBlockNode, "a block node");
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitFootnoteDefinition(this);
  }
}

export type DefinitionItem = readonly [DefinitionTerm, ReadonlyArray<DefinitionDescription>];

export class DefinitionList extends NodeBase {
  readonly kind = "DefinitionList";
  readonly items: ReadonlyArray<DefinitionItem>;

  constructor(items: ReadonlyArray<DefinitionItem> = [], options: NodeOptions = {}) {
    super(options);
    this.items = items.map(([term, descriptions]) => [term, [...descriptions]] as const);
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitDefinitionList(this);
  }
}

export class DefinitionTerm extends NodeBase {
  readonly kind = "DefinitionTerm";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitDefinitionTerm(this);
  }
}

export class DefinitionDescription extends NodeBase {
  readonly kind = "DefinitionDescription";
  /** Descriptions may hold inline runs or whole blocks */
  readonly content: ReadonlyArray<BlockNode | InlineNode>;

  constructor(content: ReadonlyArray<BlockNode | InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitDefinitionDescription(this);
  }
}

export interface MathOptions extends NodeOptions {
  notation?: MathNotation;
}

export class MathBlock extends NodeBase {
  readonly kind = "MathBlock";
  readonly content: string;
  readonly notation: MathNotation;

  constructor(content: string, options: MathOptions = {}) {
    super(options);
    this.content = content;
    this.notation = options.notation ?? "latex";
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitMathBlock(this);
  }
}

// ============================================================================
// Inline nodes
// ============================================================================

export class Text extends NodeBase {
  readonly kind = "Text";
  readonly content: string;

  constructor(content: string, options: NodeOptions = {}) {
    super(options);
    this.content = content;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitText(this);
  }
}

export class Emphasis extends NodeBase {
  readonly kind = "Emphasis";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitEmphasis(this);
  }
}

export class Strong extends NodeBase {
  readonly kind = "Strong";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitStrong(this);
  }
}

export class Code extends NodeBase {
  readonly kind = "Code";
  readonly content: string;

  constructor(content: string, options: NodeOptions = {}) {
    super(options);
    this.content = content;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitCode(this);
  }
}

export interface LinkOptions extends NodeOptions {
  title?: string;
}

export class Link extends NodeBase {
  readonly kind = "Link";
  readonly url: string;
  readonly content: ReadonlyArray<InlineNode>;
  readonly title?: string;

  constructor(url: string, content: ReadonlyArray<InlineNode> = [], options: LinkOptions = {}) {
    super(options);
    this.url = url;
    this.content = [...content];
    if (options.title !== undefined) {
      this.title = options.title;
    }
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitLink(this);
  }
}

export interface ImageOptions extends NodeOptions {
  altText?: string;
  title?: string;
  width?: number;
  height?: number;
}

export class Image extends NodeBase {
  readonly kind = "Image";
  readonly url: string;
  readonly altText: string;
  readonly title?: string;
  readonly width?: number;
  readonly height?: number;

  constructor(url: string, options: ImageOptions = {}) {
    super(options);
    this.url = url;
    this.altText = options.altText ?? "";
    if (options.title !== undefined) {
      this.title = options.title;
    }
    if (options.width !== undefined) {
      this.width = options.width;
    }
    if (options.height !== undefined) {
      this.height = options.height;
    }
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitImage(this);
  }
}

export interface LineBreakOptions extends NodeOptions {
  /** Soft breaks render as a space in most formats */
  soft?: boolean;
}

export class LineBreak extends NodeBase {
  readonly kind = "LineBreak";
  readonly soft: boolean;

  constructor(options: LineBreakOptions = {}) {
    super(options);
    this.soft = options.soft ?? false;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitLineBreak(this);
  }
}

export class Strikethrough extends NodeBase {
  readonly kind = "Strikethrough";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitStrikethrough(this);
  }
}

export class Underline extends NodeBase {
  readonly kind = "Underline";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitUnderline(this);
  }
}

export class Superscript extends NodeBase {
  readonly kind = "Superscript";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitSuperscript(this);
  }
}

export class Subscript extends NodeBase {
  readonly kind = "Subscript";
  readonly content: ReadonlyArray<InlineNode>;

  constructor(content: ReadonlyArray<InlineNode> = [], options: NodeOptions = {}) {
    super(options);
    this.content = [...content];
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitSubscript(this);
  }
}

export class HTMLInline extends NodeBase {
  readonly kind = "HTMLInline";
  readonly content: string;

  constructor(content: string, options: NodeOptions = {}) {
    super(options);
    this.content = content;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitHTMLInline(this);
  }
}

/**
 * Marker pointing at a FootnoteDefinition. Empty identifiers are
 * constructible; validation reports them.
 */
export class FootnoteReference extends NodeBase {
  readonly kind = "FootnoteReference";
  readonly identifier: string;

  constructor(identifier: string, options: NodeOptions = {}) {
    super(options);
    this.identifier = identifier;
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitFootnoteReference(this);
  }
}

export class MathInline extends NodeBase {
  readonly kind = "MathInline";
  readonly content: string;
  readonly notation: MathNotation;

  constructor(content: string, options: MathOptions = {}) {
    super(options);
    this.content = content;
    this.notation = options.notation ?? "latex";
  }

  accept<R>(visitor: NodeVisitor<R>): R {
    return visitor.visitMathInline(this);
  }
}

// ============================================================================
// Unions and kind predicates
// ============================================================================

/** Nodes valid as direct children of a Document */
export type BlockNode =
  | Heading
  | Paragraph
  | CodeBlock
  | BlockQuote
  | List
  | Table
  | ThematicBreak
  | HTMLBlock
  | FootnoteDefinition
  | DefinitionList
  | MathBlock;

/** Nodes valid only inside block content */
export type InlineNode =
  | Text
  | Emphasis
  | Strong
  | Code
  | Link
  | Image
  | LineBreak
  | Strikethrough
  | Underline
  | Superscript
  | Subscript
  | HTMLInline
  | FootnoteReference
  | MathInline;

/** Parts that only exist inside their owning container */
export type StructuralNode = ListItem | TableRow | TableCell | DefinitionTerm | DefinitionDescription;

export type Node = Document | BlockNode | InlineNode | StructuralNode;

export type NodeKind = Node["kind"];

const BLOCK_KINDS: ReadonlySet<string> = new Set<BlockNode["kind"]>([
  "Heading",
  "Paragraph",
  "CodeBlock",
  "BlockQuote",
  "List",
  "Table",
  "ThematicBreak",
  "HTMLBlock",
  "FootnoteDefinition",
  "DefinitionList",
  "MathBlock",
]);

const INLINE_KINDS: ReadonlySet<string> = new Set<InlineNode["kind"]>([
  "Text",
  "Emphasis",
  "Strong",
  "Code",
  "Link",
  "Image",
  "LineBreak",
  "Strikethrough",
  "Underline",
  "Superscript",
  "Subscript",
  "HTMLInline",
  "FootnoteReference",
  "MathInline",
]);

/**
 * True for any value built by one of the node classes above.
 */
export function isNode(value: unknown): value is Node {
  return value instanceof NodeBase;
}

export function isBlockNode(value: unknown): value is BlockNode {
  return isNode(value) && BLOCK_KINDS.has(value.kind);
}

export function isInlineNode(value: unknown): value is InlineNode {
  return isNode(value) && INLINE_KINDS.has(value.kind);
}

export function isListItem(value: unknown): value is ListItem {
  return value instanceof ListItem;
}

export function isTableRow(value: unknown): value is TableRow {
  return value instanceof TableRow;
}

export function isTableCell(value: unknown): value is TableCell {
  return value instanceof TableCell;
}

export function isValidHeadingLevel(level: number): boolean {
  return Number.isInteger(level) && level >= 1 && level <= 6;
}

/**
 * Copies `children` after checking every entry with `guard`, failing with a
 * ConstructionError that names the first offending position.
 */
export function requireKinds<T>(
  owner: string,
  children: ReadonlyArray<unknown>,
  guard: (value: unknown) => value is T,
  expected: string,
): T[] {
  const result: T[] = [];
  children.forEach((child, index) => {
    if (!guard(child)) {
      const found = isNode(child) ? child.kind : typeof child;
      throw new ConstructionError(owner, `child ${index} must be ${expected}, got ${found}`);
    }
    result.push(child);
  });
  return result;
}
