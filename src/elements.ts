export enum ElementKind {
  Bold,
  Italic,
  Link,
  Email,
  Code,
  HorizontalRule,
  Blockquote,
  List,
  ListItem,
  Underline,
  Unrecognized,
}

export const ELEMENT_KINDS: ReadonlyMap<string, ElementKind> = new Map([
  ["b", ElementKind.Bold],
  ["i", ElementKind.Italic],
  ["url", ElementKind.Link],
  ["email", ElementKind.Email],
  ["code", ElementKind.Code],
  ["line", ElementKind.HorizontalRule],
  ["hr", ElementKind.HorizontalRule],
  ["quote", ElementKind.Blockquote],
  ["list", ElementKind.List],
  ["*", ElementKind.ListItem],
  ["u", ElementKind.Underline],
]);

/** Kinds that never take children. */
export const VOID_KINDS: ReadonlySet<ElementKind> = new Set([ElementKind.HorizontalRule]);

/** Kinds closed by the next sibling of the same kind or by their parent's close tag. */
export const IMPLICITLY_CLOSED_KINDS: ReadonlySet<ElementKind> = new Set([
  ElementKind.ListItem,
]);

/**
 * Classifies a tag name. Matching is exact: `B` is not `b`.
 */
export function classifyElement(name: string): ElementKind {
  return ELEMENT_KINDS.get(name) ?? ElementKind.Unrecognized;
}
