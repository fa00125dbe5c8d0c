import { type TokenizeOptions, tokenize } from "./tokenizer.ts";
import { TokenKind } from "./tokens.ts";

export type StreamEvent =
  | ["open", [string, string | undefined]]
  | ["close", string]
  | ["text", string];

/**
 * Tokenizes BBCode and yields flat events, one per token.
 *
 * Adjacent text is already coalesced, so two `text` events never follow each other.
 */
export function* stream(
  input: string | Uint8Array | ArrayBuffer = "",
  tokenizerOptions: TokenizeOptions = {}
): Generator<StreamEvent, void, void> {
  for (const token of tokenize(input, tokenizerOptions)) {
    switch (token.type) {
      case TokenKind.Text:
        yield ["text", token.name];
        break;
      case TokenKind.ElementOpen:
        yield ["open", [token.name, token.value]];
        break;
      case TokenKind.ElementClose:
        yield ["close", token.name];
        break;
    }
  }
}
