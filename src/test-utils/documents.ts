import {
  BlockQuote,
  type BlockNode,
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
} from "../ast/nodes";

export const para = (text: string): Paragraph => new Paragraph([new Text(text)]);

export const heading = (level: number, text: string): Heading => new Heading(level, [new Text(text)]);

export const doc = (...children: BlockNode[]): Document => new Document(children);

/**
 * Paragraph of `count` words: "w1 w2 ... wN" prefixed by `label`.
 */
export const words = (count: number, label = "w"): Paragraph =>
  para(Array.from({ length: count }, (_, i) => `${label}${i + 1}`).join(" "));

/**
 * A document using every node kind at least once.
 */
export function everyKindDocument(): Document {
  return new Document(
    [
      new Heading(1, [new Text("Title")], { sourceLocation: { format: "markdown", line: 1, column: 1 } }),
      new Paragraph([
        new Text("Intro "),
        new Emphasis([new Text("with")]),
        new Text(" "),
        new Strong([new Text("style")]),
        new LineBreak({ soft: true }),
        new Code("x = 1"),
        new Link("https://example.com", [new Text("link")], { title: "Example" }),
        new Image("img.png", { altText: "A picture", width: 10 }),
        new Strikethrough([new Text("old")]),
        new Underline([new Text("under")]),
        new Superscript([new Text("2")]),
        new Subscript([new Text("i")]),
        new HTMLInline("<br>"),
        new FootnoteReference("n1"),
        new MathInline("e^x"),
      ]),
      new CodeBlock("print(1)", { language: "python", fenceChar: "~", fenceLength: 4 }),
      new BlockQuote([para("quoted")]),
      new List(
        true,
        [new ListItem([para("first")], { taskStatus: "checked" }), new ListItem([para("second")])],
        { start: 2, tight: false },
      ),
      new Table([new TableRow([new TableCell([new Text("1")]), new TableCell([new Text("2")], { alignment: "right" })])], {
        header: new TableRow([new TableCell([new Text("A")]), new TableCell([new Text("B")])], { isHeader: true }),
        alignments: ["left", "right"],
        caption: "Numbers",
      }),
      new ThematicBreak(),
      new HTMLBlock("<div>raw</div>"),
      new FootnoteDefinition("n1", [para("A note")]),
      new DefinitionList([[new DefinitionTerm([new Text("Term")]), [new DefinitionDescription([new Text("Meaning")])]]]),
      new MathBlock("a^2 + b^2 = c^2", { notation: "latex" }),
    ],
    { metadata: { title: "Sample" } },
  );
}

/**
 * Preamble, then Guide (H1) > Install (H2) > Windows (H3), Usage (H2),
 * then Appendix (H1). Child indices are noted per block.
 */
export function guideDocument(): Document {
  return doc(
    para("Preamble"), // 0
    heading(1, "Guide"), // 1
    para("Welcome"), // 2
    heading(2, "Install"), // 3
    para("npm steps"), // 4
    heading(3, "Windows"), // 5
    para("win steps"), // 6
    heading(2, "Usage"), // 7
    para("run it"), // 8
    heading(1, "Appendix"), // 9
    para("extra"), // 10
  );
}
