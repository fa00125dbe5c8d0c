import type { ParseError } from "./errors.ts";
import type { Node } from "./node.ts";
import { type TokenizeOptions, tokenize } from "./tokenizer.ts";
import { TokenList } from "./tokens.ts";
import { type TreeBuilder, buildTree } from "./treebuilder.ts";

export interface ParseDocumentOptions {
  readonly collectErrors?: boolean;
  readonly tokenizerOptions?: TokenizeOptions | undefined;
}

export interface ParseDocumentResult {
  readonly root: Node;
  readonly errors: ParseError[];
  readonly tokens: TokenList;
  readonly treeBuilder: TreeBuilder;
}

/**
 * Parses BBCode into the node tree.
 *
 * @param input BBCode text, bytes decoded per `tokenizerOptions.encoding` and the BOM, or tokens
 * produced earlier, in which case `tokenizerOptions` is ignored.
 * @returns The root node plus the token list and tree builder state, useful for debugging and tests.
 */
export function parseDocument(
  input: string | Uint8Array | ArrayBuffer | TokenList,
  { collectErrors = false, tokenizerOptions }: ParseDocumentOptions = {}
): ParseDocumentResult {
  const tokens = input instanceof TokenList ? input : tokenize(input, tokenizerOptions);
  const treeBuilder = buildTree(tokens, collectErrors);

  return {
    root: treeBuilder.document,
    errors: treeBuilder.errors,
    tokens,
    treeBuilder,
  };
}
