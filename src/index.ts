export { BBCodeDocument } from "./document.ts";
export { ConfigurationError, ParseError, ParseErrorCode, StrictModeError } from "./errors.ts";
export { ELEMENT_KINDS, ElementKind, classifyElement } from "./elements.ts";
export { MAX_TAB_WIDTH, parseTabWidth, resolveTabWidth } from "./config.ts";
export { decodeBBCode } from "./encoding.ts";
export {
  MARKDOWN_ELEMENT_WRITERS,
  render,
  renderDocument,
  renderNode,
  toMarkdown,
} from "./markdown.ts";
export { Node, NodeType } from "./node.ts";
export { parseDocument } from "./parser.ts";
export { nodeToBBCode, toTestFormat } from "./serialize.ts";
export { StringSink, WritableSink } from "./sink.ts";
export { stream } from "./stream.ts";
export {
  DEFAULT_VERBATIM_TAGS,
  createTokenizer,
  tokenize,
  tokenizeStream,
} from "./tokenizer.ts";
export { RawBuffer, TokenKind, TokenList } from "./tokens.ts";

export type {
  ElementWriter,
  ElementWriters,
  MarkdownOptions,
  RenderResult,
  RenderTask,
  RenderWarning,
  WriteContext,
  WriteElementFunction,
} from "./markdown.ts";
export type { BBCodeDocumentOptions } from "./document.ts";
export type { OutputSink } from "./sink.ts";
export type { StreamEvent } from "./stream.ts";
export type { TokenSource, TokenizeOptions, TokenizerOptions } from "./tokenizer.ts";
export type { ResolvedToken, Span, Token } from "./tokens.ts";
export type { ToTextOptions } from "./node.ts";
