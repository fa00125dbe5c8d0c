import { ElementKind, classifyElement } from "./elements.ts";
import type { RawBuffer, Span } from "./tokens.ts";

export enum NodeType {
  Document,
  Element,
  Text,
}

export interface ToTextOptions {
  readonly separator?: string;
}

export interface DescendantsOptions {
  readonly type?: NodeType | undefined;
}

/**
 * Tree node. Text and element content is read from the shared raw buffer through spans.
 */
export class Node {
  parentNode: Node | undefined;
  readonly childNodes: Node[] = [];
  /** Raw text of the matching close tag, when the element was closed explicitly. */
  closeRaw: Span | undefined;

  constructor(
    readonly type: NodeType,
    readonly source: RawBuffer,
    /** Tag name for elements, content for text; empty for the document. */
    readonly nameSpan: Span,
    readonly raw: Span,
    readonly valueSpan?: Span | undefined
  ) {}

  static document(source: RawBuffer): Node {
    const all = { start: 0, end: source.length };
    return new Node(NodeType.Document, source, { start: 0, end: 0 }, all);
  }

  appendChild(node: Node): void {
    this.childNodes.push(node);
    node.parentNode = this;
  }

  get name(): string {
    switch (this.type) {
      case NodeType.Document:
        return "#document";
      case NodeType.Text:
        return "#text";
      case NodeType.Element:
        return this.source.slice(this.nameSpan);
    }
  }

  /** Parameter value of an element, `[url=value]`. */
  get value(): string | undefined {
    return this.valueSpan ? this.source.slice(this.valueSpan) : undefined;
  }

  get kind(): ElementKind {
    return this.type === NodeType.Element
      ? classifyElement(this.name)
      : ElementKind.Unrecognized;
  }

  /** Exact source text of this node; for elements, the opening tag only. */
  get rawText(): string {
    return this.source.slice(this.raw);
  }

  get closeRawText(): string {
    return this.closeRaw ? this.source.slice(this.closeRaw) : "";
  }

  /** Content of a text node, or the concatenated descendant text of any other node. */
  get text(): string {
    return this.type === NodeType.Text ? this.source.slice(this.nameSpan) : this.toText();
  }

  /**
   * Yields descendants in document order, optionally only those of one type.
   */
  *descendants({ type }: DescendantsOptions = {}): Generator<Node, void, void> {
    const stack = [...this.childNodes].reverse();
    while (stack.length > 0) {
      const node = stack.pop()!;
      if (type === undefined || node.type === type) yield node;
      for (let i = node.childNodes.length - 1; i >= 0; i -= 1) {
        stack.push(node.childNodes[i]!);
      }
    }
  }

  toText({ separator = "" }: ToTextOptions = {}): string {
    const parts: string[] = [];
    for (const node of this.descendants({ type: NodeType.Text })) {
      parts.push(node.text);
    }
    return parts.join(separator);
  }

  hasChildNodes(): boolean {
    return this.childNodes.length > 0;
  }

  get children(): Node[] {
    return this.childNodes.filter(c => isElementNode(c));
  }
}

export function isElementNode(node: unknown): node is Node {
  return node instanceof Node && node.type === NodeType.Element;
}

export function isTextNode(node: unknown): node is Node {
  return node instanceof Node && node.type === NodeType.Text;
}
