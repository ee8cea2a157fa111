import { describe, expect, it } from "vitest";
import { doc, heading, para } from "../test-utils/documents";
import * as N from "./nodes";
import { childrenOf, cloneNode, mapChildren, walk } from "./traversal";

describe("childrenOf", () => {
  it("yields the table header before data rows", () => {
    const header = new N.TableRow([new N.TableCell([new N.Text("H")])], { isHeader: true });
    const row = new N.TableRow([new N.TableCell([new N.Text("1")])]);
    expect(childrenOf(new N.Table([row], { header }))).toEqual([header, row]);
  });

  it("interleaves definition terms with their descriptions", () => {
    const list = new N.DefinitionList([
      [new N.DefinitionTerm(), [new N.DefinitionDescription(), new N.DefinitionDescription()]],
      [new N.DefinitionTerm(), []],
    ]);
    expect(childrenOf(list).map((child) => child.kind)).toEqual([
      "DefinitionTerm",
      "DefinitionDescription",
      "DefinitionDescription",
      "DefinitionTerm",
    ]);
  });

  it("returns nothing for leaves", () => {
    expect(childrenOf(new N.Text("x"))).toEqual([]);
    expect(childrenOf(new N.CodeBlock("x"))).toEqual([]);
  });
});

describe("walk", () => {
  const input = doc(heading(1, "A"), new N.BlockQuote([para("B")]));

  it("visits nodes in pre-order with their depth", () => {
    const seen: Array<[string, number]> = [];
    walk(input, (node, depth) => {
      seen.push([node.kind, depth]);
    });
    expect(seen).toEqual([
      ["Document", 0],
      ["Heading", 1],
      ["Text", 2],
      ["BlockQuote", 1],
      ["Paragraph", 2],
      ["Text", 3],
    ]);
  });

  it("skips children when the callback returns false", () => {
    const seen: string[] = [];
    walk(input, (node) => {
      seen.push(node.kind);
      return node.kind !== "BlockQuote";
    });
    expect(seen).toEqual(["Document", "Heading", "Text", "BlockQuote"]);
  });
});

describe("mapChildren", () => {
  it("drops children mapped to null", () => {
    const result = mapChildren(doc(heading(1, "A"), para("B")), (child) => (child.kind === "Heading" ? null : child));
    expect(result).toEqual(doc(para("B")));
  });

  it("checks replacements against the container", () => {
    const list = new N.List(false, [new N.ListItem([])]);
    expect(() => mapChildren(list, () => para("x"))).toThrow(
      "Invalid List: child 0 must be a ListItem, got Paragraph",
    );
  });

  it("checks a replaced table header", () => {
    const table = new N.Table([], { header: new N.TableRow([], { isHeader: true }) });
    expect(() => mapChildren(table, () => para("x"))).toThrow(
      "Invalid Table: child must be a TableRow, got Paragraph",
    );
  });

  it("keeps list attributes", () => {
    const list = new N.List(true, [new N.ListItem([para("a")], { taskStatus: "unchecked" })], {
      start: 4,
      tight: false,
    });
    const result = mapChildren(list, (child) => child);
    expect(result).toEqual(list);
  });
});

describe("cloneNode", () => {
  it("returns an equal tree made of new nodes", () => {
    const original = doc(new N.BlockQuote([para("quoted")]));
    const copy = cloneNode(original);

    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
    if (copy instanceof N.Document) {
      expect(copy.children[0]).not.toBe(original.children[0]);
    }
  });
});
