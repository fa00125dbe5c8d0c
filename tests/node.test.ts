import assert from "node:assert/strict";
import test from "node:test";

import { ElementKind } from "../src/elements.ts";
import { NodeType, isElementNode, isTextNode } from "../src/node.ts";
import { parseDocument } from "../src/parser.ts";

test("document node", () => {
  const { root } = parseDocument("[b]x[/b]");
  assert.equal(root.type, NodeType.Document);
  assert.equal(root.name, "#document");
  assert.equal(root.parentNode, undefined);
  assert.equal(root.kind, ElementKind.Unrecognized);
});

test("element accessors", () => {
  const { root } = parseDocument("[url=https://example.com]Link[/url]");
  const link = root.childNodes[0];
  assert.ok(isElementNode(link));
  assert.equal(link.name, "url");
  assert.equal(link.value, "https://example.com");
  assert.equal(link.kind, ElementKind.Link);
  assert.equal(link.rawText, "[url=https://example.com]");
  assert.equal(link.closeRawText, "[/url]");
  assert.equal(link.text, "Link");
  assert.equal(link.parentNode, root);
});

test("text accessors", () => {
  const { root } = parseDocument("[i]it[/i]");
  const text = root.childNodes[0]?.childNodes[0];
  assert.ok(isTextNode(text));
  assert.equal(text.name, "#text");
  assert.equal(text.text, "it");
  assert.equal(text.rawText, "it");
  assert.equal(text.value, undefined);
  assert.equal(text.hasChildNodes(), false);
});

test("unclosed elements have no close text", () => {
  const { root } = parseDocument("[b]x");
  assert.equal(root.childNodes[0]?.closeRawText, "");
});

test("descendants are yielded in document order", () => {
  const { root } = parseDocument("[quote]a[b]b[/b][i]c[/i][/quote]d");
  assert.deepEqual(
    Array.from(root.descendants(), node => node.name),
    ["quote", "#text", "b", "#text", "i", "#text", "#text"]
  );
  assert.deepEqual(
    Array.from(root.descendants({ type: NodeType.Element }), node => node.name),
    ["quote", "b", "i"]
  );
});

test("toText joins descendant text", () => {
  const { root } = parseDocument("[quote]a[b]b[/b][i]c[/i][/quote]d");
  assert.equal(root.toText(), "abcd");
  assert.equal(root.toText({ separator: " " }), "a b c d");
  assert.equal(root.text, "abcd");
});

test("children lists only elements", () => {
  const { root } = parseDocument("x[b]y[/b]z[i][/i]");
  assert.deepEqual(
    root.children.map(node => node.name),
    ["b", "i"]
  );
  assert.equal(root.childNodes.length, 4);
  assert.equal(root.hasChildNodes(), true);
});

test("node guards reject other values", () => {
  const { root } = parseDocument("[b]x[/b]");
  const bold = root.childNodes[0];
  assert.equal(isElementNode(bold), true);
  assert.equal(isTextNode(bold), false);
  assert.equal(isElementNode(root), false);
  assert.equal(isElementNode("b"), false);
  assert.equal(isTextNode({ type: NodeType.Text }), false);
  assert.equal(isTextNode(null), false);
});

test("descendants walk deep trees", () => {
  const depth = 20000;
  const { root } = parseDocument(`${"[i]".repeat(depth)}x`);
  let count = 0;
  for (const node of root.descendants({ type: NodeType.Element })) {
    if (node.name === "i") count += 1;
  }
  assert.equal(count, depth);
  assert.equal(root.text, "x");
});
