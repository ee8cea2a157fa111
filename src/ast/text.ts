import { countWordsInText } from "../utils/string";
import type * as N from "./nodes";
import { isInlineNode, isNode } from "./nodes";
import { childrenOf } from "./traversal";
import { BaseVisitor } from "./visitor";

/**
 * Flattens a subtree to plain text. Inline runs are concatenated as-is,
 * block-level siblings are separated by `blockSeparator` so that words on
 * either side of a block boundary never merge.
 */
class PlainTextVisitor extends BaseVisitor<string> {
  constructor(private readonly blockSeparator: string) {
    super();
  }

  text(node: N.Node): string {
    return node.accept(this) ?? "";
  }

  private join(nodes: ReadonlyArray<N.Node>, separator: string): string {
    return nodes
      .map((child) => this.text(child))
      .filter((value) => value.length > 0)
      .join(separator);
  }

  protected override genericVisit(node: N.Node): string {
    return this.join(childrenOf(node), this.blockSeparator);
  }

  override visitHeading(node: N.Heading): string {
    return this.join(node.content, "");
  }
  override visitParagraph(node: N.Paragraph): string {
    return this.join(node.content, "");
  }
  override visitTableCell(node: N.TableCell): string {
    return this.join(node.content, "");
  }
  override visitDefinitionTerm(node: N.DefinitionTerm): string {
    return this.join(node.content, "");
  }
  override visitDefinitionDescription(node: N.DefinitionDescription): string {
    // Adjacent inline nodes form one run; runs and blocks are separated.
    const pieces: string[] = [];
    let run: N.InlineNode[] = [];
    for (const child of node.content) {
      if (isInlineNode(child)) {
        run.push(child);
        continue;
      }
      pieces.push(this.join(run, ""), this.text(child));
      run = [];
    }
    pieces.push(this.join(run, ""));
    return pieces.filter((value) => value.length > 0).join(this.blockSeparator);
  }
  override visitEmphasis(node: N.Emphasis): string {
    return this.join(node.content, "");
  }
  override visitStrong(node: N.Strong): string {
    return this.join(node.content, "");
  }
  override visitLink(node: N.Link): string {
    return this.join(node.content, "");
  }
  override visitStrikethrough(node: N.Strikethrough): string {
    return this.join(node.content, "");
  }
  override visitUnderline(node: N.Underline): string {
    return this.join(node.content, "");
  }
  override visitSuperscript(node: N.Superscript): string {
    return this.join(node.content, "");
  }
  override visitSubscript(node: N.Subscript): string {
    return this.join(node.content, "");
  }

  override visitText(node: N.Text): string {
    return node.content;
  }
  override visitCode(node: N.Code): string {
    return node.content;
  }
  override visitCodeBlock(node: N.CodeBlock): string {
    return node.content;
  }
  override visitMathInline(node: N.MathInline): string {
    return node.content;
  }
  override visitMathBlock(node: N.MathBlock): string {
    return node.content;
  }
  override visitImage(node: N.Image): string {
    return node.altText;
  }
  override visitLineBreak(node: N.LineBreak): string {
    return node.soft ? " " : "\n";
  }

  // Markup and markers carry no prose.
  override visitHTMLBlock(): string {
    return "";
  }
  override visitHTMLInline(): string {
    return "";
  }
  override visitFootnoteReference(): string {
    return "";
  }
  override visitThematicBreak(): string {
    return "";
  }
}

/**
 * Plain text of one node or a sequence of nodes. Sequences are joined with
 * `joiner`; nested blocks are always separated by a space.
 */
export function extractText(nodes: N.Node | ReadonlyArray<N.Node>, joiner = ""): string {
  const visitor = new PlainTextVisitor(" ");
  const list: ReadonlyArray<N.Node> = isNode(nodes) ? [nodes] : nodes;
  return list
    .map((node) => visitor.text(node))
    .filter((value) => value.length > 0)
    .join(joiner);
}

/**
 * Whitespace-delimited word count of a node or node sequence.
 */
export function countWords(nodes: N.Node | ReadonlyArray<N.Node>): number {
  return countWordsInText(extractText(nodes, " "));
}
