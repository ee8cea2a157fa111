import type * as N from "./nodes";
import { childrenOf } from "./traversal";

/**
 * Double-dispatch contract. `node.accept(visitor)` calls the method matching
 * the node's kind, so a class implementing this interface handles every kind
 * or fails to compile.
 */
export interface NodeVisitor<R> {
  visitDocument(node: N.Document): R;
  visitHeading(node: N.Heading): R;
  visitParagraph(node: N.Paragraph): R;
  visitCodeBlock(node: N.CodeBlock): R;
  visitBlockQuote(node: N.BlockQuote): R;
  visitList(node: N.List): R;
  visitListItem(node: N.ListItem): R;
  visitTable(node: N.Table): R;
  visitTableRow(node: N.TableRow): R;
  visitTableCell(node: N.TableCell): R;
  visitThematicBreak(node: N.ThematicBreak): R;
  visitHTMLBlock(node: N.HTMLBlock): R;
  visitFootnoteDefinition(node: N.FootnoteDefinition): R;
  visitDefinitionList(node: N.DefinitionList): R;
  visitDefinitionTerm(node: N.DefinitionTerm): R;
  visitDefinitionDescription(node: N.DefinitionDescription): R;
  visitMathBlock(node: N.MathBlock): R;
  visitText(node: N.Text): R;
  visitEmphasis(node: N.Emphasis): R;
  visitStrong(node: N.Strong): R;
  visitCode(node: N.Code): R;
  visitLink(node: N.Link): R;
  visitImage(node: N.Image): R;
  visitLineBreak(node: N.LineBreak): R;
  visitStrikethrough(node: N.Strikethrough): R;
  visitUnderline(node: N.Underline): R;
  visitSuperscript(node: N.Superscript): R;
  visitSubscript(node: N.Subscript): R;
  visitHTMLInline(node: N.HTMLInline): R;
  visitFootnoteReference(node: N.FootnoteReference): R;
  visitMathInline(node: N.MathInline): R;
}

/**
 * Partial visitor: every kind falls through to `genericVisit`, which does
 * nothing and does not descend. Subclasses override the kinds they care
 * about and decide themselves whether to recurse, usually by calling
 * `visitChildren`.
 */
export abstract class BaseVisitor<R = void> implements NodeVisitor<R | undefined> {
  protected genericVisit(_node: N.Node): R | undefined {
    return undefined;
  }

  /**
   * Visits the direct children of `node` in document order.
   */
  protected visitChildren(node: N.Node): void {
    for (const child of childrenOf(node)) {
      child.accept(this);
    }
  }

  visitDocument(node: N.Document): R | undefined {
    return this.genericVisit(node);
  }
  visitHeading(node: N.Heading): R | undefined {
    return this.genericVisit(node);
  }
  visitParagraph(node: N.Paragraph): R | undefined {
    return this.genericVisit(node);
  }
  visitCodeBlock(node: N.CodeBlock): R | undefined {
    return this.genericVisit(node);
  }
  visitBlockQuote(node: N.BlockQuote): R | undefined {
    return this.genericVisit(node);
  }
  visitList(node: N.List): R | undefined {
    return this.genericVisit(node);
  }
  visitListItem(node: N.ListItem): R | undefined {
    return this.genericVisit(node);
  }
  visitTable(node: N.Table): R | undefined {
    return this.genericVisit(node);
  }
  visitTableRow(node: N.TableRow): R | undefined {
    return this.genericVisit(node);
  }
  visitTableCell(node: N.TableCell): R | undefined {
    return this.genericVisit(node);
  }
  visitThematicBreak(node: N.ThematicBreak): R | undefined {
    return this.genericVisit(node);
  }
  visitHTMLBlock(node: N.HTMLBlock): R | undefined {
    return this.genericVisit(node);
  }
  visitFootnoteDefinition(node: N.FootnoteDefinition): R | undefined {
    return this.genericVisit(node);
  }
  visitDefinitionList(node: N.DefinitionList): R | undefined {
    return this.genericVisit(node);
  }
  visitDefinitionTerm(node: N.DefinitionTerm): R | undefined {
    return this.genericVisit(node);
  }
  visitDefinitionDescription(node: N.DefinitionDescription): R | undefined {
    return this.genericVisit(node);
  }
  visitMathBlock(node: N.MathBlock): R | undefined {
    return this.genericVisit(node);
  }
  visitText(node: N.Text): R | undefined {
    return this.genericVisit(node);
  }
  visitEmphasis(node: N.Emphasis): R | undefined {
    return this.genericVisit(node);
  }
  visitStrong(node: N.Strong): R | undefined {
    return this.genericVisit(node);
  }
  visitCode(node: N.Code): R | undefined {
    return this.genericVisit(node);
  }
  visitLink(node: N.Link): R | undefined {
    return this.genericVisit(node);
  }
  visitImage(node: N.Image): R | undefined {
    return this.genericVisit(node);
  }
  visitLineBreak(node: N.LineBreak): R | undefined {
    return this.genericVisit(node);
  }
  visitStrikethrough(node: N.Strikethrough): R | undefined {
    return this.genericVisit(node);
  }
  visitUnderline(node: N.Underline): R | undefined {
    return this.genericVisit(node);
  }
  visitSuperscript(node: N.Superscript): R | undefined {
    return this.genericVisit(node);
  }
  visitSubscript(node: N.Subscript): R | undefined {
    return this.genericVisit(node);
  }
  visitHTMLInline(node: N.HTMLInline): R | undefined {
    return this.genericVisit(node);
  }
  visitFootnoteReference(node: N.FootnoteReference): R | undefined {
    return this.genericVisit(node);
  }
  visitMathInline(node: N.MathInline): R | undefined {
    return this.genericVisit(node);
  }
}

/**
 * Visitor whose generic case recurses: visits every node of a subtree in
 * pre-order. Handy for collectors that only look at a few kinds.
 */
export abstract class WalkingVisitor extends BaseVisitor<void> {
  protected override genericVisit(node: N.Node): undefined {
    this.visitChildren(node);
    return undefined;
  }
}
