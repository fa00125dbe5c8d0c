import { ConfigurationError } from "./errors.ts";

export const MAX_TAB_WIDTH = 255;

function invalidTabWidth(value: string): ConfigurationError {
  return new ConfigurationError(
    "tab-width",
    value,
    `tab-width must be an integer in the range [0, ${MAX_TAB_WIDTH}], got "${value}"`
  );
}

/**
 * Validates a tab width. `undefined` means tabs are left as they are.
 */
export function resolveTabWidth(value: number | undefined): number | undefined {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0 || value > MAX_TAB_WIDTH) {
    throw invalidTabWidth(String(value));
  }
  return value;
}

/**
 * Parses a tab width given as text, such as a command-line value.
 */
export function parseTabWidth(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw invalidTabWidth(text);
  }
  const value = Number.parseInt(text, 10);
  if (value > MAX_TAB_WIDTH) {
    throw invalidTabWidth(text);
  }
  return value;
}

export function expandTabs(text: string, tabWidth: number | undefined): string {
  return tabWidth === undefined ? text : text.replaceAll("\t", " ".repeat(tabWidth));
}
