import { type Node, NodeType } from "./node.ts";

function elementToTestFormat(node: Node): string {
  const { value } = node;
  return value === undefined ? `<${node.name}>` : `<${node.name}="${value}">`;
}

/**
 * Serializes a node tree into an indented `| <name>` dump.
 *
 * This format is primarily used in tests, not end-user output.
 */
export function toTestFormat(node: Node): string {
  const lines: string[] = [];
  const stack: [Node, number][] =
    node.type === NodeType.Document
      ? node.childNodes.map((child): [Node, number] => [child, 0]).reverse()
      : [[node, 0]];

  while (stack.length > 0) {
    const [current, indent] = stack.pop()!;
    const prefix = `| ${" ".repeat(indent)}`;

    if (current.type === NodeType.Text) {
      lines.push(`${prefix}"${current.text}"`);
      continue;
    }

    lines.push(`${prefix}${elementToTestFormat(current)}`);
    for (let i = current.childNodes.length - 1; i >= 0; i -= 1) {
      stack.push([current.childNodes[i]!, indent + 2]);
    }
  }

  return lines.join("\n");
}

function escapeText(text: string): string {
  return text.replaceAll("[", "\\[").replaceAll("]", "\\]");
}

// Inside a tag `=` and space end the name; inside a value only `]` ends the tag.
const escapeTagName = (name: string): string => escapeText(name).replace(/[= ]/g, "\\$&");

function openTag(node: Node): string {
  const name = escapeTagName(node.name);
  const { value, valueSpan } = node;
  if (value === undefined || valueSpan === undefined) return `[${name}]`;

  const separator = node.source.content.charAt(valueSpan.start - 1);
  return `[${name}${separator}${escapeText(value)}]`;
}

function closeTag(node: Node): string {
  return node.closeRaw ? `[/${escapeTagName(node.name)}]` : "";
}

function pushChildren(stack: (Node | string)[], node: Node): void {
  for (let i = node.childNodes.length - 1; i >= 0; i -= 1) {
    stack.push(node.childNodes[i]!);
  }
}

/**
 * Serializes a node tree back to BBCode.
 *
 * Brackets in text, and characters that would end a tag name or value early, are escaped
 * so the output parses to the same tree. Close tags that matched nothing are not in the
 * tree and are not written.
 */
export function nodeToBBCode(node: Node): string {
  const out: string[] = [];
  const stack: (Node | string)[] = [node];

  while (stack.length > 0) {
    const item = stack.pop()!;
    if (typeof item === "string") {
      out.push(item);
      continue;
    }

    switch (item.type) {
      case NodeType.Text:
        out.push(escapeText(item.text));
        break;
      case NodeType.Document:
        pushChildren(stack, item);
        break;
      case NodeType.Element:
        out.push(openTag(item));
        stack.push(closeTag(item));
        pushChildren(stack, item);
        break;
    }
  }

  return out.join("");
}
