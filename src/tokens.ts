export interface Span {
  readonly start: number;
  readonly end: number;
}

export function createSpan(start: number, end: number): Span {
  return { start, end };
}

/**
 * Immutable text accumulated during tokenization. Token and node spans index into it.
 */
export class RawBuffer {
  constructor(readonly content: string) {}

  get length(): number {
    return this.content.length;
  }

  slice(span: Span): string {
    return this.content.slice(span.start, span.end);
  }
}

export enum TokenKind {
  Text,
  ElementOpen,
  ElementClose,
}

export interface Token {
  readonly type: TokenKind;
  /** Tag name, or the full content of a text token. */
  readonly name: Span;
  readonly value?: Span | undefined;
  readonly raw: Span;
}

export function createTextToken(raw: Span): Token {
  return { type: TokenKind.Text, name: raw, raw };
}

export function createOpenToken(name: Span, raw: Span, value?: Span): Token {
  return value
    ? { type: TokenKind.ElementOpen, name, value, raw }
    : { type: TokenKind.ElementOpen, name, raw };
}

export function createCloseToken(name: Span, raw: Span): Token {
  return { type: TokenKind.ElementClose, name, raw };
}

export interface ResolvedToken {
  readonly type: TokenKind;
  readonly name: string;
  readonly value?: string | undefined;
  readonly raw: string;
}

const TOKEN_KIND_NAMES: Record<TokenKind, string> = {
  [TokenKind.Text]: "text",
  [TokenKind.ElementOpen]: "element",
  [TokenKind.ElementClose]: "closingElement",
};

export function tokenKindName(kind: TokenKind): string {
  return TOKEN_KIND_NAMES[kind];
}

/**
 * Result of tokenization: the raw buffer plus the tokens pointing into it.
 */
export class TokenList implements Iterable<ResolvedToken> {
  constructor(
    readonly buffer: RawBuffer,
    readonly tokens: readonly Token[]
  ) {}

  get length(): number {
    return this.tokens.length;
  }

  resolve(token: Token): ResolvedToken {
    const { buffer } = this;
    const name = buffer.slice(token.name);
    const raw = buffer.slice(token.raw);
    return token.value
      ? { type: token.type, name, value: buffer.slice(token.value), raw }
      : { type: token.type, name, raw };
  }

  *[Symbol.iterator](): Iterator<ResolvedToken> {
    for (const token of this.tokens) {
      yield this.resolve(token);
    }
  }

  /**
   * Debug dump of the buffer, token locations and resolved tokens.
   */
  print(): string {
    const lines = ["TokenResult:", "  Buffer:", this.buffer.content, "", "  Locations:"];

    this.tokens.forEach((token, i) => {
      let line = `    [${i}]: start=${token.raw.start} end=${token.raw.end} type=${tokenKindName(token.type)}`;
      if (token.value) {
        line += ` p_start=${token.value.start} p_end=${token.value.end}`;
      }
      lines.push(line);
    });

    lines.push("", "  Tokens:");
    this.tokens.forEach((token, i) => {
      const { name, value } = this.resolve(token);
      lines.push(`    [${i}]: ${tokenKindName(token.type)} "${name}" ${value ?? ""}`);
    });

    return lines.join("\n");
  }
}
