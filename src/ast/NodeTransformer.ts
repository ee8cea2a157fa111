import { ConstructionError } from "./errors";
import type * as N from "./nodes";
import { Document } from "./nodes";
import { mapChildren } from "./traversal";
import type { NodeVisitor } from "./visitor";

export type TransformResult = N.Node | null;

/**
 * Rewriting visitor. Each visit method returns the node that takes the
 * visited node's place, or null to delete it from its parent.
 *
 * The defaults rebuild every container from its transformed children, so a
 * subclass that overrides nothing produces a structurally equal copy of the
 * whole tree. Overrides that want the default descent for the node they
 * handle call `genericTransform`; returning a node without calling it skips
 * that subtree.
 *
 * The input tree is never modified. An exception thrown by any visit method
 * propagates out of `transform` and no partially rebuilt tree is returned.
 */
export class NodeTransformer implements NodeVisitor<TransformResult> {
  transform(node: N.Node): TransformResult {
    return node.accept(this);
  }

  /**
   * Transforms a whole document and checks the root survived as a Document.
   */
  transformDocument(doc: N.Document): N.Document {
    const result = this.transform(doc);
    if (!(result instanceof Document)) {
      throw new ConstructionError(
        "Document",
        `transformer ${this.constructor.name} returned ${result === null ? "null" : result.kind} for the root`,
      );
    }
    return result;
  }

  protected genericTransform(node: N.Node): N.Node {
    return mapChildren(node, (child) => this.transform(child));
  }

  visitDocument(node: N.Document): TransformResult {
    return this.genericTransform(node);
  }
  visitHeading(node: N.Heading): TransformResult {
    return this.genericTransform(node);
  }
  visitParagraph(node: N.Paragraph): TransformResult {
    return this.genericTransform(node);
  }
  visitCodeBlock(node: N.CodeBlock): TransformResult {
    return this.genericTransform(node);
  }
  visitBlockQuote(node: N.BlockQuote): TransformResult {
    return this.genericTransform(node);
  }
  visitList(node: N.List): TransformResult {
    return this.genericTransform(node);
  }
  visitListItem(node: N.ListItem): TransformResult {
    return this.genericTransform(node);
  }
  visitTable(node: N.Table): TransformResult {
    return this.genericTransform(node);
  }
  visitTableRow(node: N.TableRow): TransformResult {
    return this.genericTransform(node);
  }
  visitTableCell(node: N.TableCell): TransformResult {
    return this.genericTransform(node);
  }
  visitThematicBreak(node: N.ThematicBreak): TransformResult {
    return this.genericTransform(node);
  }
  visitHTMLBlock(node: N.HTMLBlock): TransformResult {
    return this.genericTransform(node);
  }
  visitFootnoteDefinition(node: N.FootnoteDefinition): TransformResult {
    return this.genericTransform(node);
  }
  visitDefinitionList(node: N.DefinitionList): TransformResult {
    return this.genericTransform(node);
  }
  visitDefinitionTerm(node: N.DefinitionTerm): TransformResult {
    return this.genericTransform(node);
  }
  visitDefinitionDescription(node: N.DefinitionDescription): TransformResult {
    return this.genericTransform(node);
  }
  visitMathBlock(node: N.MathBlock): TransformResult {
    return this.genericTransform(node);
  }
  visitText(node: N.Text): TransformResult {
    return this.genericTransform(node);
  }
  visitEmphasis(node: N.Emphasis): TransformResult {
    return this.genericTransform(node);
  }
  visitStrong(node: N.Strong): TransformResult {
    return this.genericTransform(node);
  }
  visitCode(node: N.Code): TransformResult {
    return this.genericTransform(node);
  }
  visitLink(node: N.Link): TransformResult {
    return this.genericTransform(node);
  }
  visitImage(node: N.Image): TransformResult {
    return this.genericTransform(node);
  }
  visitLineBreak(node: N.LineBreak): TransformResult {
    return this.genericTransform(node);
  }
  visitStrikethrough(node: N.Strikethrough): TransformResult {
    return this.genericTransform(node);
  }
  visitUnderline(node: N.Underline): TransformResult {
    return this.genericTransform(node);
  }
  visitSuperscript(node: N.Superscript): TransformResult {
    return this.genericTransform(node);
  }
  visitSubscript(node: N.Subscript): TransformResult {
    return this.genericTransform(node);
  }
  visitHTMLInline(node: N.HTMLInline): TransformResult {
    return this.genericTransform(node);
  }
  visitFootnoteReference(node: N.FootnoteReference): TransformResult {
    return this.genericTransform(node);
  }
  visitMathInline(node: N.MathInline): TransformResult {
    return this.genericTransform(node);
  }
}
