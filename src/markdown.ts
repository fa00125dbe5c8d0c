import { expandTabs, resolveTabWidth } from "./config.ts";
import { ElementKind } from "./elements.ts";
import { type Node, NodeType } from "./node.ts";
import { type OutputSink, StringSink } from "./sink.ts";

/**
 * Per-node hook run before the default conversion. Return `true` when the node was
 * handled; its children are then the hook's responsibility.
 */
export type WriteElementFunction = (node: Node, ctx: WriteContext) => boolean;

export interface RenderWarning {
  readonly code: "unsupported-tag";
  readonly tagName: string;
  readonly raw: string;
  readonly message: string;
}

export interface MarkdownOptions {
  readonly writeElement?: WriteElementFunction | undefined;
  /** Opaque to the renderer; available to `writeElement` as `ctx.userData`. */
  readonly userData?: unknown;
  /** Number of spaces each tab becomes, 0 to 255. */
  readonly tabWidth?: number | undefined;
  readonly onWarning?: ((warning: RenderWarning) => void) | undefined;
}

export interface WriteContext {
  /** The node rendering started from. */
  readonly document: Node;
  readonly sink: OutputSink;
  readonly writeElement: WriteElementFunction | undefined;
  readonly userData: unknown;
  readonly tabWidth: number | undefined;
  readonly warnings: RenderWarning[];
  readonly onWarning: ((warning: RenderWarning) => void) | undefined;
}

export interface RenderResult {
  readonly warnings: readonly RenderWarning[];
}

/**
 * Output deferred by a writer, in output order: child nodes to render, or literal text.
 */
export type RenderTask = Node | string;

/**
 * Writes what comes first for an element and returns the rest as tasks. Children are
 * returned, not rendered.
 */
export type ElementWriter = (node: Node, ctx: WriteContext) => readonly RenderTask[];

/** Conversion rules of an output format, one per element kind. */
export type ElementWriters = Readonly<Record<ElementKind, ElementWriter>>;

function warn(ctx: WriteContext, node: Node): void {
  const raw = node.rawText;
  const warning: RenderWarning = {
    code: "unsupported-tag",
    tagName: node.name,
    raw,
    message: `Unsupported bbcode tag: ${raw}`,
  };
  ctx.warnings.push(warning);
  ctx.onWarning?.(warning);
}

export function writeTextElement(node: Node, ctx: WriteContext): void {
  const text = expandTabs(node.text.replaceAll("\n", "\n\n"), ctx.tabWidth);
  ctx.sink.write(text);
  ctx.sink.flush();
}

function writeAllChildrenText(node: Node, ctx: WriteContext): void {
  for (const child of node.descendants({ type: NodeType.Text })) {
    ctx.sink.write(expandTabs(child.text, ctx.tabWidth));
  }
}

function writeLinkElement(node: Node, ctx: WriteContext, scheme = ""): readonly RenderTask[] {
  const { value } = node;
  if (value === undefined) {
    const text = node.text;
    ctx.sink.write(`[${text}](${scheme}${text})`);
    return [];
  }

  ctx.sink.write("[");
  writeAllChildrenText(node, ctx);
  ctx.sink.write(`](${scheme}${value})`);
  return [];
}

const wrapChildren = (node: Node, marker: string): readonly RenderTask[] => [
  marker,
  ...node.childNodes,
  marker,
];

// BBCode items have no close tag, so the tree may hold them at any depth below the
// list. Number them in encounter order and write only their text.
function writeListElement(node: Node, ctx: WriteContext): readonly RenderTask[] {
  let i = 0;
  for (const child of node.descendants()) {
    if (child.type === NodeType.Element) {
      if (child.kind === ElementKind.ListItem) {
        i += 1;
        ctx.sink.write(`${i}. `);
      }
      continue;
    }

    const text = child.text;
    ctx.sink.write(expandTabs(text, ctx.tabWidth));
    if (!text.endsWith("\n")) ctx.sink.write("\n");
    ctx.sink.flush();
  }
  return [];
}

function writeUnrecognizedElement(node: Node, ctx: WriteContext): readonly RenderTask[] {
  warn(ctx, node);
  return [node.rawText, ...node.childNodes, node.closeRawText];
}

export const MARKDOWN_ELEMENT_WRITERS: ElementWriters = {
  [ElementKind.Bold]: node => wrapChildren(node, "**"),
  [ElementKind.Italic]: node => wrapChildren(node, "*"),
  [ElementKind.Underline]: node => node.childNodes,
  [ElementKind.Code]: node => wrapChildren(node, "`"),
  [ElementKind.Blockquote]: node => ["> ", ...node.childNodes],
  [ElementKind.HorizontalRule]: () => ["\n---\n"],
  [ElementKind.Link]: (node, ctx) => writeLinkElement(node, ctx),
  [ElementKind.Email]: (node, ctx) => writeLinkElement(node, ctx, "mailto:"),
  [ElementKind.List]: writeListElement,
  [ElementKind.ListItem]: node => node.childNodes,
  [ElementKind.Unrecognized]: writeUnrecognizedElement,
};

/**
 * Runs the hook, then the default rule, and returns the work left for the node.
 */
function expandNode(node: Node, ctx: WriteContext): readonly RenderTask[] {
  if (ctx.writeElement?.(node, ctx)) return [];

  switch (node.type) {
    case NodeType.Element:
      return MARKDOWN_ELEMENT_WRITERS[node.kind](node, ctx);
    case NodeType.Text:
      writeTextElement(node, ctx);
      return [];
    case NodeType.Document:
      return node.childNodes;
  }
}

function runTasks(tasks: readonly RenderTask[], ctx: WriteContext): void {
  const stack = [...tasks].reverse();
  while (stack.length > 0) {
    const task = stack.pop()!;
    if (typeof task === "string") {
      ctx.sink.write(task);
      continue;
    }

    const next = expandNode(task, ctx);
    for (let i = next.length - 1; i >= 0; i -= 1) {
      stack.push(next[i]!);
    }
  }
}

/**
 * Renders one node: the hook first, then the default rule for its type and kind.
 */
export function renderNode(node: Node, ctx: WriteContext): void {
  runTasks([node], ctx);
}

/**
 * Renders the children of `root` in document order. Hooks call this to render the
 * children of a node they handle.
 */
export function render(root: Node, ctx: WriteContext): void {
  runTasks(root.childNodes, ctx);
}

/**
 * Renders a document (or any subtree) as Markdown into `sink`.
 *
 * Throws `ConfigurationError` for an invalid tab width before anything is written.
 * Sink errors propagate.
 */
export function renderDocument(
  root: Node,
  sink: OutputSink,
  options: MarkdownOptions = {}
): RenderResult {
  const ctx: WriteContext = {
    document: root,
    sink,
    writeElement: options.writeElement,
    userData: options.userData,
    tabWidth: resolveTabWidth(options.tabWidth),
    warnings: [],
    onWarning: options.onWarning,
  };

  if (root.type === NodeType.Document) {
    render(root, ctx);
  } else {
    renderNode(root, ctx);
  }
  sink.flush();

  return { warnings: ctx.warnings };
}

/**
 * Converts a parsed node tree to Markdown.
 */
export function toMarkdown(node: Node, options?: MarkdownOptions): string {
  const sink = new StringSink();
  renderDocument(node, sink, options);
  return sink.toString();
}
