export enum ParseErrorCode {
  UnmatchedClosingTag = "unmatched-closing-tag",
  UnclosedElement = "unclosed-element",
}

export class ParseError extends Error {
  constructor(
    readonly code: ParseErrorCode,
    readonly tagName: string | undefined
  ) {
    super(tagName === undefined ? code : `${code}: ${tagName}`);
    this.name = "ParseError";
  }
}

export class StrictModeError extends SyntaxError {
  readonly error: ParseError;

  constructor(error: ParseError) {
    super(error.message);
    this.error = error;
    this.name = "StrictModeError";
  }
}

/**
 * Raised for option values rejected before any rendering starts.
 */
export class ConfigurationError extends RangeError {
  constructor(
    readonly option: string,
    readonly value: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}
