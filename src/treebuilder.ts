import { IMPLICITLY_CLOSED_KINDS, VOID_KINDS, classifyElement } from "./elements.ts";
import { ParseError, ParseErrorCode } from "./errors.ts";
import { Node, NodeType } from "./node.ts";
import { type RawBuffer, type Token, TokenKind, type TokenList } from "./tokens.ts";

export interface TreeBuilderState {
  readonly source: RawBuffer;
  readonly collectErrors: boolean;
  readonly errors: ParseError[];
  readonly document: Node;
  /** Open elements, document first. */
  readonly openElements: Node[];
}

export type TreeBuilder = TreeBuilderState;

export function createTreeBuilder(source: RawBuffer, collectErrors = false): TreeBuilderState {
  const document = Node.document(source);
  return {
    source,
    collectErrors,
    errors: [],
    document,
    openElements: [document],
  };
}

function parseError(state: TreeBuilderState, code: ParseErrorCode, tagName?: string): void {
  if (!state.collectErrors) return;
  state.errors.push(new ParseError(code, tagName));
}

function currentNode(state: TreeBuilderState): Node {
  return state.openElements.at(-1) ?? state.document;
}

function isImplicitlyClosed(node: Node): boolean {
  return node.type === NodeType.Element && IMPLICITLY_CLOSED_KINDS.has(node.kind);
}

/**
 * Finds the open element a close tag refers to, looking through implicitly closed items.
 */
function findCloseTarget(state: TreeBuilderState, name: string): number {
  const { openElements } = state;
  for (let index = openElements.length - 1; index > 0; index -= 1) {
    const node = openElements[index]!;
    if (node.name === name) return index;
    if (!isImplicitlyClosed(node)) break;
  }
  return -1;
}

function insertText(state: TreeBuilderState, token: Token): void {
  currentNode(state).appendChild(
    new Node(NodeType.Text, state.source, token.name, token.raw)
  );
}

function insertElement(state: TreeBuilderState, token: Token): void {
  const name = state.source.slice(token.name);
  const kind = classifyElement(name);

  if (IMPLICITLY_CLOSED_KINDS.has(kind)) {
    const top = state.openElements.at(-1);
    if (top && state.openElements.length > 1 && top.kind === kind) {
      state.openElements.pop();
    }
  }

  const node = new Node(NodeType.Element, state.source, token.name, token.raw, token.value);
  currentNode(state).appendChild(node);

  if (!VOID_KINDS.has(kind)) {
    state.openElements.push(node);
  }
}

function closeElement(state: TreeBuilderState, token: Token): void {
  const name = state.source.slice(token.name);
  const index = findCloseTarget(state, name);

  if (index === -1) {
    if (!VOID_KINDS.has(classifyElement(name))) {
      parseError(state, ParseErrorCode.UnmatchedClosingTag, name);
    }
    return;
  }

  const node = state.openElements[index]!;
  node.closeRaw = token.raw;
  state.openElements.length = index;
}

/**
 * Adds one token to the tree.
 */
export function processToken(state: TreeBuilderState, token: Token): void {
  switch (token.type) {
    case TokenKind.Text:
      insertText(state, token);
      return;
    case TokenKind.ElementOpen:
      insertElement(state, token);
      return;
    case TokenKind.ElementClose:
      closeElement(state, token);
      return;
  }
}

/**
 * Closes whatever is still open at end of input and returns the document node.
 */
export function finishTreeBuilder(state: TreeBuilderState): Node {
  const { openElements } = state;
  while (openElements.length > 1) {
    const node = openElements.pop()!;
    if (!isImplicitlyClosed(node)) {
      parseError(state, ParseErrorCode.UnclosedElement, node.name);
    }
  }
  return state.document;
}

export function buildTree(tokens: TokenList, collectErrors = false): TreeBuilderState {
  const state = createTreeBuilder(tokens.buffer, collectErrors);
  for (const token of tokens.tokens) {
    processToken(state, token);
  }
  finishTreeBuilder(state);
  return state;
}
