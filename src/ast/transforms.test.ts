import { describe, expect, it } from "vitest";
import { doc, everyKindDocument, heading, para } from "../test-utils/documents";
import * as N from "./nodes";
import {
  HeadingLevelTransformer,
  LinkRewriter,
  TextReplacer,
  collectKind,
  collectNodes,
  filterNodes,
  transformNodes,
} from "./transforms";

describe("HeadingLevelTransformer", () => {
  it("shifts heading levels and clamps them to 1-6", () => {
    const input = doc(heading(1, "A"), heading(5, "B"), heading(6, "C"));

    const deeper = transformNodes(input, new HeadingLevelTransformer(1));
    expect(collectKind(deeper, "Heading").map((h) => h.level)).toEqual([2, 6, 6]);

    const shallower = transformNodes(input, new HeadingLevelTransformer(-3));
    expect(collectKind(shallower, "Heading").map((h) => h.level)).toEqual([1, 2, 3]);
  });

  it("keeps heading content", () => {
    const result = transformNodes(doc(heading(2, "Intro")), new HeadingLevelTransformer(1));
    expect(result.children[0]).toEqual(heading(3, "Intro"));
  });
});

describe("TextReplacer", () => {
  it("replaces every occurrence inside text nodes", () => {
    const result = transformNodes(doc(para("foo and foo")), new TextReplacer("foo", "bar"));
    expect(result.children[0]).toEqual(para("bar and bar"));
  });

  it("removes text nodes that end up empty", () => {
    const input = doc(new N.Paragraph([new N.Text("gone"), new N.Strong([new N.Text("kept")])]));
    const result = transformNodes(input, new TextReplacer("gone", ""));

    const paragraph = result.children[0];
    expect(paragraph).toBeInstanceOf(N.Paragraph);
    if (paragraph instanceof N.Paragraph) {
      expect(paragraph.content.map((child) => child.kind)).toEqual(["Strong"]);
    }
  });

  it("leaves code untouched", () => {
    const input = doc(new N.Paragraph([new N.Code("foo")]));
    const result = transformNodes(input, new TextReplacer("foo", "bar"));
    expect(collectKind(result, "Code")[0]?.content).toBe("foo");
  });
});

describe("LinkRewriter", () => {
  const input = doc(
    new N.Paragraph([
      new N.Link("http://example.com/a", [new N.Text("secure")], { title: "A" }),
      new N.Text(" "),
      new N.Link("mailto:someone@example.com", [new N.Emphasis([new N.Text("mail")])]),
    ]),
  );

  it("rewrites link targets", () => {
    const result = transformNodes(
      input,
      new LinkRewriter((url) => url.replace(/^http:/, "https:")),
    );
    const links = collectKind(result, "Link");
    expect(links.map((link) => link.url)).toEqual(["https://example.com/a", "mailto:someone@example.com"]);
    expect(links[0]?.title).toBe("A");
  });

  it("unwraps links when the rewrite returns null", () => {
    const result = transformNodes(
      input,
      new LinkRewriter((url) => (url.startsWith("mailto:") ? null : url)),
    );
    expect(collectKind(result, "Link")).toHaveLength(1);
    expect(collectKind(result, "Text").map((text) => text.content)).toEqual(["secure", " ", "mail"]);
  });

  it("keeps the source location of an unwrapped link", () => {
    const location = { format: "markdown", line: 3, column: 5 };
    const linked = doc(
      new N.Paragraph([new N.Link("mailto:someone@example.com", [new N.Text("mail")], { sourceLocation: location })]),
    );
    const result = transformNodes(linked, new LinkRewriter(() => null));

    const [text] = collectKind(result, "Text");
    expect(text?.content).toBe("mail");
    expect(text?.sourceLocation).toEqual(location);
  });
});

describe("filterNodes", () => {
  it("drops matching nodes with their subtrees", () => {
    const result = filterNodes(everyKindDocument(), (node) => node.kind !== "BlockQuote" && node.kind !== "Image");

    expect(collectKind(result, "BlockQuote")).toHaveLength(0);
    expect(collectKind(result, "Image")).toHaveLength(0);
    expect(collectKind(result, "Text").some((text) => text.content === "quoted")).toBe(false);
    expect(result.children).toHaveLength(10);
  });

  it("never drops the document itself", () => {
    const result = filterNodes(doc(para("x")), () => false);
    expect(result.children).toHaveLength(0);
  });
});

describe("collectNodes", () => {
  it("returns matches in document order", () => {
    const input = doc(heading(1, "One"), new N.BlockQuote([para("Two")]), para("Three"));
    const texts = collectNodes(input, (node) => node.kind === "Text");
    expect(texts.map((node) => (node instanceof N.Text ? node.content : ""))).toEqual(["One", "Two", "Three"]);
  });

  it("includes the root when it matches", () => {
    const input = doc(para("x"));
    expect(collectNodes(input, (node) => node.kind === "Document")).toEqual([input]);
  });
});
