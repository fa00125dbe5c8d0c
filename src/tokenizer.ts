import { createStreamDecoder, decodeBBCode } from "./encoding.ts";
import {
  RawBuffer,
  type Token,
  TokenKind,
  TokenList,
  createCloseToken,
  createOpenToken,
  createSpan,
  createTextToken,
} from "./tokens.ts";

export interface TokenizerOptions {
  /** Tags whose content is kept as text. */
  readonly verbatimTags?: Iterable<string> | undefined;
  /** When set, `[tag param]` is rejected and only `[tag=param]` carries a value. */
  readonly equalsRequiredInParameters?: boolean | undefined;
}

export interface TokenizeOptions extends TokenizerOptions {
  readonly encoding?: string | undefined;
}

export type TokenSource = AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

export const DEFAULT_VERBATIM_TAGS: readonly string[] = ["code"];

const ESCAPABLE_CHARS = new Set(["[", "]", "=", " "]);

const enum State {
  Text,
  Element,
  ClosingElement,
  ElementWithParameter,
}

/**
 * Extracts the tag name from a bracketed slice such as `[b]`, `[/b]` or `[url=x]`.
 */
export function getTagName(tag: string): string {
  if (tag.length === 2) return "";

  const start = tag[1] === "/" ? 2 : 1;
  let end = tag.length - 1;
  for (let i = start + 1; i < tag.length; i += 1) {
    const c = tag[i];
    if (c === " " || c === "=") {
      end = i;
      break;
    }
  }

  return tag.slice(start, end);
}

export function isElementValid(
  slice: string,
  verbatimTag: string | undefined,
  equalsRequiredInParameters: boolean
): boolean {
  if (verbatimTag !== undefined && verbatimTag !== getTagName(slice)) {
    return false;
  }

  if (equalsRequiredInParameters && slice.includes(" ") && !slice.includes("=")) {
    return false;
  }

  return slice.length >= 3;
}

function compactTextTokens(tokens: Token[]): Token[] {
  const out: Token[] = [];
  for (const token of tokens) {
    const last = out.at(-1);
    if (token.type === TokenKind.Text && last?.type === TokenKind.Text) {
      out[out.length - 1] = createTextToken(createSpan(last.raw.start, token.raw.end));
    } else {
      out.push(token);
    }
  }
  return out;
}

export type Tokenizer = ReturnType<typeof createTokenizer>;

/**
 * Creates an incremental BBCode tokenizer. Feed text with `write` and collect the result with `end`.
 */
export function createTokenizer(opts: TokenizerOptions = {}) {
  const verbatimTags = new Set(opts.verbatimTags ?? DEFAULT_VERBATIM_TAGS);
  const equalsRequired = opts.equalsRequiredInParameters ?? true;

  const out: string[] = [];
  const tokens: Token[] = [];
  let state = State.Text;
  let start = 0;
  let lastChar = "";
  let paramStart: number | undefined;
  let verbatimTag: string | undefined;
  let pendingBackslash = false;
  let finished = false;

  function pushText(end: number): void {
    if (end > start) {
      tokens.push(createTextToken(createSpan(start, end)));
    }
  }

  function closeElement(pos: number): void {
    const end = pos + 1;
    const slice = out.slice(start, end).join("");

    if (isElementValid(slice, verbatimTag, equalsRequired)) {
      const tagName = getTagName(slice);
      if (verbatimTags.has(tagName)) {
        verbatimTag = state === State.ClosingElement ? undefined : tagName;
      }

      const raw = createSpan(start, end);
      if (state === State.ClosingElement) {
        tokens.push(createCloseToken(createSpan(start + 2, pos), raw));
      } else if (paramStart === undefined) {
        tokens.push(createOpenToken(createSpan(start + 1, pos), raw));
      } else {
        tokens.push(
          createOpenToken(
            createSpan(start + 1, paramStart - 1),
            raw,
            createSpan(paramStart, pos)
          )
        );
      }

      start = end;
    }

    state = State.Text;
    paramStart = undefined;
  }

  function consume(c: string, pos: number): void {
    switch (c) {
      case "[":
        if (state === State.Text) {
          pushText(pos);
          state = State.Element;
          start = pos;
        }
        return;

      case " ":
        if (lastChar !== " " && state === State.Element) {
          paramStart = pos + 1;
          state = State.ElementWithParameter;
        }
        return;

      case "=":
        if (state === State.Element) {
          paramStart = pos + 1;
          state = State.ElementWithParameter;
        }
        return;

      case "/":
        if (state === State.Element && lastChar === "[") {
          state = State.ClosingElement;
        }
        return;

      case "]":
        if (state !== State.Text) {
          closeElement(pos);
        }
        return;
    }
  }

  function writeChar(c: string): void {
    if (pendingBackslash) {
      pendingBackslash = false;
      if (ESCAPABLE_CHARS.has(c)) {
        // The escaped character is literal and cannot change state.
        out.push(c);
        lastChar = c;
        return;
      }
      out.push("\\");
    } else if (c === "\\") {
      pendingBackslash = true;
      return;
    }

    out.push(c);
    consume(c, out.length - 1);
    lastChar = c;
  }

  function write(chunk: string): void {
    if (finished) {
      throw new Error("Cannot write to a tokenizer that has already ended");
    }
    for (let i = 0; i < chunk.length; i += 1) {
      writeChar(chunk[i]!);
    }
  }

  function end(): TokenList {
    if (!finished) {
      finished = true;
      if (pendingBackslash) {
        pendingBackslash = false;
        out.push("\\");
      }
      pushText(out.length);
    }

    return new TokenList(new RawBuffer(out.join("")), compactTextTokens(tokens));
  }

  return {
    write,
    end,
    get verbatimTag() {
      return verbatimTag;
    },
    get position() {
      return out.length;
    },
  };
}

/**
 * Tokenizes a complete BBCode input held in memory.
 */
export function tokenize(
  input: string | Uint8Array | ArrayBuffer,
  { encoding, ...opts }: TokenizeOptions = {}
): TokenList {
  let text: string;
  if (typeof input === "string") {
    text = input;
  } else if (input instanceof ArrayBuffer) {
    text = decodeBBCode(new Uint8Array(input), encoding).text;
  } else {
    text = decodeBBCode(input, encoding).text;
  }

  const tokenizer = createTokenizer(opts);
  tokenizer.write(text);
  return tokenizer.end();
}

/**
 * Tokenizes a chunked source such as a Node readable stream. Byte chunks are decoded as they arrive.
 *
 * Errors raised by the source propagate to the caller.
 */
export async function tokenizeStream(
  source: TokenSource,
  { encoding, ...opts }: TokenizeOptions = {}
): Promise<TokenList> {
  const tokenizer = createTokenizer(opts);
  const decoder = createStreamDecoder(encoding);

  for await (const chunk of source) {
    tokenizer.write(typeof chunk === "string" ? chunk : decoder.decode(chunk));
  }
  tokenizer.write(decoder.flush());

  return tokenizer.end();
}
