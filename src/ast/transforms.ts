import { NodeTransformer, type TransformResult } from "./NodeTransformer";
import type * as N from "./nodes";
import { Heading, Link, Text } from "./nodes";
import { extractText } from "./text";
import { WalkingVisitor } from "./visitor";

/**
 * Shifts every heading level by `offset`, clamping the result to 1-6.
 */
export class HeadingLevelTransformer extends NodeTransformer {
  constructor(private readonly offset: number) {
    super();
  }

  override visitHeading(node: N.Heading): TransformResult {
    const copy = this.genericTransform(node);
    if (!(copy instanceof Heading)) {
      return copy;
    }
    const level = Math.min(6, Math.max(1, node.level + this.offset));
    return new Heading(level, copy.content, {
      metadata: copy.metadata,
      sourceLocation: copy.sourceLocation,
    });
  }
}

/**
 * Replaces every literal occurrence of `search` inside Text nodes.
 * Text nodes left empty are removed.
 */
export class TextReplacer extends NodeTransformer {
  constructor(
    private readonly search: string,
    private readonly replacement: string,
  ) {
    super();
  }

  override visitText(node: N.Text): TransformResult {
    if (!this.search) {
      return this.genericTransform(node);
    }
    const content = node.content.split(this.search).join(this.replacement);
    if (!content) {
      return null;
    }
    return new Text(content, { metadata: node.metadata, sourceLocation: node.sourceLocation });
  }
}

/**
 * Rewrites link targets through `rewrite`; returning null unwraps the link,
 * keeping only its text.
 */
export class LinkRewriter extends NodeTransformer {
  constructor(private readonly rewrite: (url: string) => string | null) {
    super();
  }

  override visitLink(node: N.Link): TransformResult {
    const copy = this.genericTransform(node);
    if (!(copy instanceof Link)) {
      return copy;
    }
    const url = this.rewrite(node.url);
    if (url === null) {
      return new Text(extractText(copy.content), {
        metadata: copy.metadata,
        sourceLocation: copy.sourceLocation,
      });
    }
    return new Link(url, copy.content, {
      title: copy.title,
      metadata: copy.metadata,
      sourceLocation: copy.sourceLocation,
    });
  }
}

/**
 * Drops every node for which `keep` returns false, along with its subtree.
 */
class FilteringTransformer extends NodeTransformer {
  constructor(private readonly keep: (node: N.Node) => boolean) {
    super();
  }

  override transform(node: N.Node): TransformResult {
    if (node.kind !== "Document" && !this.keep(node)) {
      return null;
    }
    return super.transform(node);
  }
}

export function filterNodes(doc: N.Document, keep: (node: N.Node) => boolean): N.Document {
  return new FilteringTransformer(keep).transformDocument(doc);
}

/**
 * Applies `transformer` to `doc`, returning the rewritten document.
 */
export function transformNodes(doc: N.Document, transformer: NodeTransformer): N.Document {
  return transformer.transformDocument(doc);
}

/**
 * Collects every node in a subtree that satisfies `predicate`, in
 * document order.
 */
export class NodeCollector extends WalkingVisitor {
  readonly collected: N.Node[] = [];

  constructor(private readonly predicate: (node: N.Node) => boolean) {
    super();
  }

  protected override genericVisit(node: N.Node): undefined {
    if (this.predicate(node)) {
      this.collected.push(node);
    }
    return super.genericVisit(node);
  }
}

export function collectNodes(root: N.Node, predicate: (node: N.Node) => boolean): N.Node[] {
  const collector = new NodeCollector(predicate);
  root.accept(collector);
  return collector.collected;
}

/**
 * All nodes of one kind, narrowed to that kind's class.
 */
export function collectKind<K extends N.NodeKind>(root: N.Node, kind: K): Array<Extract<N.Node, { kind: K }>> {
  return collectNodes(root, (node) => node.kind === kind).filter((node): node is Extract<N.Node, { kind: K }> =>
    isKind(node, kind),
  );
}

function isKind<K extends N.NodeKind>(node: N.Node, kind: K): node is Extract<N.Node, { kind: K }> {
  return node.kind === kind;
}
