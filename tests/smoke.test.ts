import assert from "node:assert/strict";
import test from "node:test";

import { BBCodeDocument, NodeType } from "../src/index.ts";
import { createTokenizer } from "../src/tokenizer.ts";

test("smoke", () => {
  const bbcode = "[quote][b]Hello[/b][/quote]";
  const doc = new BBCodeDocument(bbcode);

  assert.equal(doc.errors.length, 0);
  assert.equal(doc.toText(), "Hello");
  assert.equal(doc.toMarkdown(), "> **Hello**");

  assert.equal(doc.root.name, "#document");
  assert.equal(doc.root.childNodes.length, 1);

  const quote = doc.root.childNodes[0]!;
  assert.equal(quote.name, "quote");
  assert.equal(quote.parentNode, doc.root);
  assert.equal(quote.childNodes.length, 1);

  const bold = quote.childNodes[0]!;
  assert.equal(bold.name, "b");
  assert.equal(bold.parentNode, quote);
  assert.equal(bold.childNodes.length, 1);

  const text = bold.childNodes[0]!;
  assert.equal(text.type, NodeType.Text);
  assert.equal(text.parentNode, bold);
  assert.equal(text.text, "Hello");
});

test("tokenizer takes input in pieces", () => {
  const tokenizer = createTokenizer();
  for (const c of "[b]x[/b]") tokenizer.write(c);

  const tokens = tokenizer.end();
  assert.equal(tokens.length, 3);
  assert.equal(tokens.buffer.content, "[b]x[/b]");
});
