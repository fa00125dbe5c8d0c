import { type ParseError, StrictModeError } from "./errors.ts";
import { type MarkdownOptions, type RenderResult, renderDocument, toMarkdown } from "./markdown.ts";
import type { Node, ToTextOptions } from "./node.ts";
import { parseDocument } from "./parser.ts";
import { nodeToBBCode } from "./serialize.ts";
import type { OutputSink } from "./sink.ts";
import { type TokenSource, type TokenizeOptions, tokenizeStream } from "./tokenizer.ts";
import type { TokenList } from "./tokens.ts";

export interface BBCodeDocumentOptions {
  readonly collectErrors?: boolean;
  readonly strict?: boolean;
  readonly tokenizerOptions?: TokenizeOptions | undefined;
}

/**
 * High-level API for parsing BBCode and converting the resulting tree.
 */
export class BBCodeDocument {
  readonly root: Node;
  readonly tokens: TokenList;
  readonly errors: ParseError[];
  readonly collectErrors: boolean;
  readonly strict: boolean;

  /**
   * Parses BBCode from a string, bytes, or a token list produced earlier.
   */
  constructor(
    input: string | Uint8Array | ArrayBuffer | TokenList,
    options: BBCodeDocumentOptions = {}
  ) {
    const { collectErrors = false, strict = false, tokenizerOptions } = options;
    const parsed = parseDocument(input, {
      collectErrors: collectErrors || strict,
      tokenizerOptions,
    });

    this.root = parsed.root;
    this.tokens = parsed.tokens;
    this.errors = parsed.errors;
    this.collectErrors = collectErrors;
    this.strict = strict;

    const [first] = this.errors;
    if (this.strict && first) {
      throw new StrictModeError(first);
    }
  }

  /**
   * Parses BBCode read from a chunked source such as a file or stdin stream.
   */
  static async fromStream(
    source: TokenSource,
    options: BBCodeDocumentOptions = {}
  ): Promise<BBCodeDocument> {
    const tokens = await tokenizeStream(source, options.tokenizerOptions);
    return new BBCodeDocument(tokens, options);
  }

  /**
   * Returns the text content of the document without any markup.
   */
  toText(options?: ToTextOptions): string {
    return this.root.toText(options);
  }

  /**
   * Converts the document to Markdown.
   */
  toMarkdown(options?: MarkdownOptions): string {
    return toMarkdown(this.root, options);
  }

  /**
   * Writes the document as Markdown to `sink`.
   */
  renderMarkdown(sink: OutputSink, options?: MarkdownOptions): RenderResult {
    return renderDocument(this.root, sink, options);
  }

  /**
   * Serializes the tree back to BBCode.
   */
  toBBCode(): string {
    return nodeToBBCode(this.root);
  }
}
