import { ValidationError } from "./errors";
import type * as N from "./nodes";
import { isBlockNode, isInlineNode, isValidHeadingLevel } from "./nodes";
import { WalkingVisitor } from "./visitor";

export interface ValidationOptions {
  /** Throw a ValidationError on the first finding instead of collecting it */
  strict?: boolean;
}

export interface ValidationReport {
  document: N.Document;
  findings: string[];
}

/**
 * Checks what node constructors leave alone: empty footnote identifiers,
 * non-positive table spans, heading levels that came in through unchecked
 * construction, block/inline containment, empty URLs, inconsistent tables.
 *
 * In lenient mode findings accumulate in `errors`; in strict mode the first
 * one is thrown.
 */
export class ValidationVisitor extends WalkingVisitor {
  readonly errors: string[] = [];
  readonly strict: boolean;

  constructor(options: ValidationOptions = {}) {
    super();
    this.strict = options.strict ?? false;
  }

  private addError(message: string): void {
    this.errors.push(message);
    if (this.strict) {
      throw new ValidationError(message);
    }
  }

  private checkInline(children: ReadonlyArray<unknown>, context: string): void {
    children.forEach((child, index) => {
      if (!isInlineNode(child)) {
        this.addError(`${context} can only contain inline nodes, but child ${index} is ${describe(child)}`);
      }
    });
  }

  private checkBlocks(children: ReadonlyArray<unknown>, context: string): void {
    children.forEach((child, index) => {
      if (!isBlockNode(child)) {
        this.addError(`${context} can only contain block nodes, but child ${index} is ${describe(child)}`);
      }
    });
  }

  override visitDocument(node: N.Document): undefined {
    this.checkBlocks(node.children, "Document");
    this.visitChildren(node);
    return undefined;
  }

  override visitHeading(node: N.Heading): undefined {
    if (!isValidHeadingLevel(node.level)) {
      this.addError(`Invalid heading level: ${node.level} (expected 1-6)`);
    }
    this.checkInline(node.content, "Heading");
    this.visitChildren(node);
    return undefined;
  }

  override visitParagraph(node: N.Paragraph): undefined {
    this.checkInline(node.content, "Paragraph");
    this.visitChildren(node);
    return undefined;
  }

  override visitCodeBlock(node: N.CodeBlock): undefined {
    if (node.fenceLength < 1) {
      this.addError(`CodeBlock fence length must be >= 1, got ${node.fenceLength}`);
    }
    return undefined;
  }

  override visitList(node: N.List): undefined {
    if (node.items.length === 0) {
      this.addError("List must have at least one item");
    }
    if (node.ordered && node.start < 0) {
      this.addError(`Ordered list start must be >= 0, got ${node.start}`);
    }
    this.visitChildren(node);
    return undefined;
  }

  override visitListItem(node: N.ListItem): undefined {
    this.checkBlocks(node.children, "ListItem");
    this.visitChildren(node);
    return undefined;
  }

  override visitTable(node: N.Table): undefined {
    const widthOf = (row: N.TableRow) => row.cells.reduce((sum, cell) => sum + Math.max(cell.colspan, 1), 0);
    const allRows = node.header ? [node.header, ...node.rows] : [...node.rows];
    const hasRowspans = allRows.some((row) => row.cells.some((cell) => cell.rowspan > 1));
    const expected = allRows.length > 0 ? widthOf(allRows[0]) : undefined;

    // Row spans shift cells into later rows, so widths only compare without them.
    if (expected !== undefined && !hasRowspans) {
      node.rows.forEach((row, index) => {
        const width = widthOf(row);
        if (width !== expected) {
          this.addError(`Table row ${index} spans ${width} columns, expected ${expected}`);
        }
      });
    }
    if (expected !== undefined && node.alignments.length > 0 && node.alignments.length !== expected) {
      this.addError(`Table has ${node.alignments.length} alignments but ${expected} columns`);
    }
    this.visitChildren(node);
    return undefined;
  }

  override visitTableCell(node: N.TableCell): undefined {
    if (node.colspan < 1) {
      this.addError(`TableCell colspan must be >= 1, got ${node.colspan}`);
    }
    if (node.rowspan < 1) {
      this.addError(`TableCell rowspan must be >= 1, got ${node.rowspan}`);
    }
    this.checkInline(node.content, "TableCell");
    this.visitChildren(node);
    return undefined;
  }

  override visitFootnoteReference(node: N.FootnoteReference): undefined {
    if (!node.identifier.trim()) {
      this.addError("FootnoteReference identifier must be non-empty");
    }
    return undefined;
  }

  override visitFootnoteDefinition(node: N.FootnoteDefinition): undefined {
    if (!node.identifier.trim()) {
      this.addError("FootnoteDefinition identifier must be non-empty");
    }
    this.visitChildren(node);
    return undefined;
  }

  override visitDefinitionList(node: N.DefinitionList): undefined {
    node.items.forEach(([, descriptions], index) => {
      if (descriptions.length === 0) {
        this.addError(`DefinitionList term ${index} has no descriptions`);
      }
    });
    this.visitChildren(node);
    return undefined;
  }

  override visitLink(node: N.Link): undefined {
    if (!node.url) {
      this.addError("Link url must be non-empty");
    }
    this.checkInline(node.content, "Link");
    this.visitChildren(node);
    return undefined;
  }

  override visitImage(node: N.Image): undefined {
    if (!node.url) {
      this.addError("Image url must be non-empty");
    }
    return undefined;
  }

  override visitEmphasis(node: N.Emphasis): undefined {
    this.checkInline(node.content, "Emphasis");
    this.visitChildren(node);
    return undefined;
  }

  override visitStrong(node: N.Strong): undefined {
    this.checkInline(node.content, "Strong");
    this.visitChildren(node);
    return undefined;
  }
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value && typeof value.kind === "string") {
    return value.kind;
  }
  return typeof value;
}

/**
 * Validates `doc` and returns the tree together with the findings. Under
 * `strict` the first finding is thrown as a ValidationError instead.
 */
export function validateDocument(doc: N.Document, options: ValidationOptions = {}): ValidationReport {
  const validator = new ValidationVisitor(options);
  doc.accept(validator);
  return { document: doc, findings: [...validator.errors] };
}
