#!/usr/bin/env -S node --import tsx
/* eslint-disable no-console */
import { BBCodeDocument, stream } from "./src/index.ts";

const doc = new BBCodeDocument("[b]Hello[/b] [url=https://example.com]world[/url]");

console.log(doc.toMarkdown()); // "**Hello** [world](https://example.com)"
console.log(doc.toText()); // "Hello world"

for (const [event, data] of stream("[i]Hi[/i]")) {
  console.log(event, data);
}
