import { z } from "zod";
import { AstError, SerializationError } from "./errors";
import * as N from "./nodes";

/**
 * Kind-tagged plain object form of a node. Children are nested records;
 * optional fields that are absent on the node are absent on the record.
 */
export interface NodeRecord {
  nodeType: N.NodeKind;
  [field: string]: unknown;
}

export interface SourceLocationRecord {
  format: string;
  page?: number;
  line?: number;
  column?: number;
  elementId?: string;
  metadata?: N.NodeMetadata;
}

// ============================================================================
// Node -> record
// ============================================================================

function locationRecord(location: N.SourceLocation): SourceLocationRecord {
  const record: SourceLocationRecord = { format: location.format };
  if (location.page !== undefined) record.page = location.page;
  if (location.line !== undefined) record.line = location.line;
  if (location.column !== undefined) record.column = location.column;
  if (location.elementId !== undefined) record.elementId = location.elementId;
  if (location.metadata && Object.keys(location.metadata).length > 0) {
    record.metadata = { ...location.metadata };
  }
  return record;
}

function withOptional(record: NodeRecord, fields: Record<string, unknown>): NodeRecord {
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      record[key] = value;
    }
  }
  return record;
}

const records = (nodes: ReadonlyArray<N.Node>): NodeRecord[] => nodes.map((node) => toRecord(node));

/**
 * Converts a node and its subtree into plain, JSON-compatible records.
 */
export function toRecord(node: N.Node): NodeRecord {
  const record: NodeRecord = { nodeType: node.kind };
  switch (node.kind) {
    case "Document":
    case "BlockQuote":
      record.children = records(node.children);
      break;
    case "Heading":
      record.level = node.level;
      record.content = records(node.content);
      break;
    case "Paragraph":
    case "DefinitionTerm":
    case "DefinitionDescription":
    case "Emphasis":
    case "Strong":
    case "Strikethrough":
    case "Underline":
    case "Superscript":
    case "Subscript":
      record.content = records(node.content);
      break;
    case "CodeBlock":
      record.content = node.content;
      withOptional(record, { language: node.language });
      record.fenceChar = node.fenceChar;
      record.fenceLength = node.fenceLength;
      break;
    case "List":
      record.ordered = node.ordered;
      record.items = records(node.items);
      record.start = node.start;
      record.tight = node.tight;
      break;
    case "ListItem":
      record.children = records(node.children);
      withOptional(record, { taskStatus: node.taskStatus });
      break;
    case "Table":
      withOptional(record, { header: node.header ? toRecord(node.header) : undefined });
      record.rows = records(node.rows);
      record.alignments = [...node.alignments];
      withOptional(record, { caption: node.caption });
      break;
    case "TableRow":
      record.cells = records(node.cells);
      record.isHeader = node.isHeader;
      break;
    case "TableCell":
      record.content = records(node.content);
      record.colspan = node.colspan;
      record.rowspan = node.rowspan;
      withOptional(record, { alignment: node.alignment });
      break;
    case "ThematicBreak":
      break;
    case "HTMLBlock":
    case "HTMLInline":
    case "Text":
    case "Code":
      record.content = node.content;
      break;
    case "FootnoteDefinition":
      record.identifier = node.identifier;
      record.content = records(node.content);
      break;
    case "FootnoteReference":
      record.identifier = node.identifier;
      break;
    case "DefinitionList":
      record.items = node.items.map(([term, descriptions]) => ({
        term: toRecord(term),
        descriptions: records(descriptions),
      }));
      break;
    case "MathBlock":
    case "MathInline":
      record.content = node.content;
      record.notation = node.notation;
      break;
    case "Link":
      record.url = node.url;
      record.content = records(node.content);
      withOptional(record, { title: node.title });
      break;
    case "Image":
      record.url = node.url;
      record.altText = node.altText;
      withOptional(record, { title: node.title, width: node.width, height: node.height });
      break;
    case "LineBreak":
      record.soft = node.soft;
      break;
  }
  record.metadata = { ...node.metadata };
  if (node.sourceLocation) {
    record.sourceLocation = locationRecord(node.sourceLocation);
  }
  return record;
}

/**
 * Serializes a node to JSON text.
 */
export function toJson(node: N.Node, indent?: number): string {
  return JSON.stringify(toRecord(node), null, indent);
}

// ============================================================================
// Record -> node
// ============================================================================

const metadataSchema = z.record(z.unknown()).default({});

const sourceLocationSchema = z.object({
  format: z.string(),
  page: z.number().int().optional(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  elementId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const base = {
  metadata: metadataSchema,
  sourceLocation: sourceLocationSchema.optional(),
};

const childList = z.array(z.unknown()).default([]);
const alignmentSchema = z.enum(["left", "center", "right"]);
const notationSchema = z.enum(["latex", "mathml", "html"]).default("latex");

const nodeRecordSchema = z.discriminatedUnion("nodeType", [
  z.object({ nodeType: z.literal("Document"), children: childList, ...base }),
  z.object({ nodeType: z.literal("Heading"), level: z.number(), content: childList, ...base }),
  z.object({ nodeType: z.literal("Paragraph"), content: childList, ...base }),
  z.object({
    nodeType: z.literal("CodeBlock"),
    content: z.string(),
    language: z.string().optional(),
    fenceChar: z.enum(["`", "~"]).default("`"),
    fenceLength: z.number().int().default(3),
    ...base,
  }),
  z.object({ nodeType: z.literal("BlockQuote"), children: childList, ...base }),
  z.object({
    nodeType: z.literal("List"),
    ordered: z.boolean(),
    items: childList,
    start: z.number().int().default(1),
    tight: z.boolean().default(true),
    ...base,
  }),
  z.object({
    nodeType: z.literal("ListItem"),
    children: childList,
    taskStatus: z.enum(["checked", "unchecked"]).optional(),
    ...base,
  }),
  z.object({
    nodeType: z.literal("Table"),
    header: z.unknown().optional(),
    rows: childList,
    alignments: z.array(alignmentSchema.nullable()).default([]),
    caption: z.string().optional(),
    ...base,
  }),
  z.object({ nodeType: z.literal("TableRow"), cells: childList, isHeader: z.boolean().default(false), ...base }),
  z.object({
    nodeType: z.literal("TableCell"),
    content: childList,
    colspan: z.number().int().default(1),
    rowspan: z.number().int().default(1),
    alignment: alignmentSchema.optional(),
    ...base,
  }),
  z.object({ nodeType: z.literal("ThematicBreak"), ...base }),
  z.object({ nodeType: z.literal("HTMLBlock"), content: z.string(), ...base }),
  z.object({ nodeType: z.literal("FootnoteDefinition"), identifier: z.string(), content: childList, ...base }),
  z.object({
    nodeType: z.literal("DefinitionList"),
    items: z.array(z.object({ term: z.unknown(), descriptions: childList })).default([]),
    ...base,
  }),
  z.object({ nodeType: z.literal("DefinitionTerm"), content: childList, ...base }),
  z.object({ nodeType: z.literal("DefinitionDescription"), content: childList, ...base }),
  z.object({ nodeType: z.literal("MathBlock"), content: z.string(), notation: notationSchema, ...base }),
  z.object({ nodeType: z.literal("Text"), content: z.string(), ...base }),
  z.object({ nodeType: z.literal("Emphasis"), content: childList, ...base }),
  z.object({ nodeType: z.literal("Strong"), content: childList, ...base }),
  z.object({ nodeType: z.literal("Code"), content: z.string(), ...base }),
  z.object({
    nodeType: z.literal("Link"),
    url: z.string(),
    content: childList,
    title: z.string().optional(),
    ...base,
  }),
  z.object({
    nodeType: z.literal("Image"),
    url: z.string(),
    altText: z.string().default(""),
    title: z.string().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    ...base,
  }),
  z.object({ nodeType: z.literal("LineBreak"), soft: z.boolean().default(false), ...base }),
  z.object({ nodeType: z.literal("Strikethrough"), content: childList, ...base }),
  z.object({ nodeType: z.literal("Underline"), content: childList, ...base }),
  z.object({ nodeType: z.literal("Superscript"), content: childList, ...base }),
  z.object({ nodeType: z.literal("Subscript"), content: childList, ...base }),
  z.object({ nodeType: z.literal("HTMLInline"), content: z.string(), ...base }),
  z.object({ nodeType: z.literal("FootnoteReference"), identifier: z.string(), ...base }),
  z.object({ nodeType: z.literal("MathInline"), content: z.string(), notation: notationSchema, ...base }),
]);

type ParsedRecord = z.infer<typeof nodeRecordSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

class RecordReader {
  read(value: unknown, path: string): N.Node {
    const parsed = nodeRecordSchema.safeParse(value);
    if (!parsed.success) {
      throw new SerializationError(`Invalid node record: ${describeIssues(parsed.error)}`, path);
    }
    try {
      return this.build(parsed.data, path);
    } catch (error) {
      if (error instanceof SerializationError) {
        throw error;
      }
      if (error instanceof AstError) {
        throw new SerializationError(error.message, path, error);
      }
      throw error;
    }
  }

  private list<T>(
    values: ReadonlyArray<unknown>,
    path: string,
    owner: string,
    guard: (value: unknown) => value is T,
    expected: string,
  ): T[] {
    const nodes = values.map((value, index) => this.read(value, `${path}[${index}]`));
    return N.requireKinds(owner, nodes, guard, expected);
  }

  private blocks(values: ReadonlyArray<unknown>, path: string, owner: string): N.BlockNode[] {
    return this.list(values, path, owner, N.isBlockNode, "a block node");
  }

  private inlines(values: ReadonlyArray<unknown>, path: string, owner: string): N.InlineNode[] {
    return this.list(values, path, owner, N.isInlineNode, "an inline node");
  }

  private build(record: ParsedRecord, path: string): N.Node {
    const options: N.NodeOptions = { metadata: record.metadata, sourceLocation: record.sourceLocation };
    switch (record.nodeType) {
      case "Document":
        return new N.Document(this.blocks(record.children, `${path}.children`, "Document"), options);
      case "Heading":
        return new N.Heading(record.level, this.inlines(record.content, `${path}.content`, "Heading"), options);
      case "Paragraph":
        return new N.Paragraph(this.inlines(record.content, `${path}.content`, "Paragraph"), options);
      case "CodeBlock":
        return new N.CodeBlock(record.content, {
          ...options,
          language: record.language,
          fenceChar: record.fenceChar,
          fenceLength: record.fenceLength,
        });
      case "BlockQuote":
        return new N.BlockQuote(this.blocks(record.children, `${path}.children`, "BlockQuote"), options);
      case "List":
        return new N.List(
          record.ordered,
          this.list(record.items, `${path}.items`, "List", N.isListItem, "a ListItem"),
          { ...options, start: record.start, tight: record.tight },
        );
      case "ListItem":
        return new N.ListItem(this.blocks(record.children, `${path}.children`, "ListItem"), {
          ...options,
          taskStatus: record.taskStatus,
        });
      case "Table": {
        const header =
          record.header === undefined || record.header === null
            ? undefined
            : this.list([record.header], `${path}.header`, "Table", N.isTableRow, "a TableRow")[0];
        return new N.Table(this.list(record.rows, `${path}.rows`, "Table", N.isTableRow, "a TableRow"), {
          ...options,
          header,
          alignments: record.alignments,
          caption: record.caption,
        });
      }
      case "TableRow":
        return new N.TableRow(this.list(record.cells, `${path}.cells`, "TableRow", N.isTableCell, "a TableCell"), {
          ...options,
          isHeader: record.isHeader,
        });
      case "TableCell":
        return new N.TableCell(this.inlines(record.content, `${path}.content`, "TableCell"), {
          ...options,
          colspan: record.colspan,
          rowspan: record.rowspan,
          alignment: record.alignment,
        });
      case "ThematicBreak":
        return new N.ThematicBreak(options);
      case "HTMLBlock":
        return new N.HTMLBlock(record.content, options);
      case "FootnoteDefinition":
        return new N.FootnoteDefinition(
          record.identifier,
          this.blocks(record.content, `${path}.content`, "FootnoteDefinition"),
          options,
        );
      case "DefinitionList": {
        const items = record.items.map((item, index): N.DefinitionItem => {
          const itemPath = `${path}.items[${index}]`;
          const [term] = this.list([item.term], `${itemPath}.term`, "DefinitionList", isTerm, "a DefinitionTerm");
          const descriptions = this.list(
            item.descriptions,
            `${itemPath}.descriptions`,
            "DefinitionList",
            isDescription,
            "a DefinitionDescription",
          );
          return [term, descriptions];
        });
        return new N.DefinitionList(items, options);
      }
      case "DefinitionTerm":
        return new N.DefinitionTerm(this.inlines(record.content, `${path}.content`, "DefinitionTerm"), options);
      case "DefinitionDescription":
        return new N.DefinitionDescription(
          this.list(record.content, `${path}.content`, "DefinitionDescription", isFlow, "a block or inline node"),
          options,
        );
      case "MathBlock":
        return new N.MathBlock(record.content, { ...options, notation: record.notation });
      case "Text":
        return new N.Text(record.content, options);
      case "Emphasis":
        return new N.Emphasis(this.inlines(record.content, `${path}.content`, "Emphasis"), options);
      case "Strong":
        return new N.Strong(this.inlines(record.content, `${path}.content`, "Strong"), options);
      case "Code":
        return new N.Code(record.content, options);
      case "Link":
        return new N.Link(record.url, this.inlines(record.content, `${path}.content`, "Link"), {
          ...options,
          title: record.title,
        });
      case "Image":
        return new N.Image(record.url, {
          ...options,
          altText: record.altText,
          title: record.title,
          width: record.width,
          height: record.height,
        });
      case "LineBreak":
        return new N.LineBreak({ ...options, soft: record.soft });
      case "Strikethrough":
        return new N.Strikethrough(this.inlines(record.content, `${path}.content`, "Strikethrough"), options);
      case "Underline":
        return new N.Underline(this.inlines(record.content, `${path}.content`, "Underline"), options);
      case "Superscript":
        return new N.Superscript(this.inlines(record.content, `${path}.content`, "Superscript"), options);
      case "Subscript":
        return new N.Subscript(this.inlines(record.content, `${path}.content`, "Subscript"), options);
      case "HTMLInline":
        return new N.HTMLInline(record.content, options);
      case "FootnoteReference":
        return new N.FootnoteReference(record.identifier, options);
      case "MathInline":
        return new N.MathInline(record.content, { ...options, notation: record.notation });
    }
  }
}

function isTerm(value: unknown): value is N.DefinitionTerm {
  return value instanceof N.DefinitionTerm;
}

function isDescription(value: unknown): value is N.DefinitionDescription {
  return value instanceof N.DefinitionDescription;
}

function isFlow(value: unknown): value is N.BlockNode | N.InlineNode {
  return N.isBlockNode(value) || N.isInlineNode(value);
}

/**
 * Rebuilds a node from its record form. Structural problems are reported
 * as a SerializationError naming the path of the offending record.
 */
export function fromRecord(record: unknown): N.Node {
  return new RecordReader().read(record, "$");
}

/**
 * Like fromRecord, but requires the root to be a Document.
 */
export function documentFromRecord(record: unknown): N.Document {
  const node = fromRecord(record);
  if (!(node instanceof N.Document)) {
    throw new SerializationError(`Expected a Document record, got ${node.kind}`, "$");
  }
  return node;
}

/**
 * Parses JSON text produced by `toJson`.
 */
export function fromJson(text: string): N.Node {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      "",
      error instanceof Error ? error : undefined,
    );
  }
  return fromRecord(data);
}
