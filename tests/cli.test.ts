import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable, Writable } from "node:stream";
import test from "node:test";

import { CliUsageError, parseArgs, runCli } from "../src/cli.ts";
import { ConfigurationError } from "../src/errors.ts";

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

async function run(argv: string[], input = "") {
  const stdout = collector();
  const stderr = collector();
  const code = await runCli(argv, {
    stdin: Readable.from([Buffer.from(input)]),
    stdout: stdout.stream,
    stderr: stderr.stream,
  });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
}

test("parseArgs", () => {
  assert.deepEqual(parseArgs(["--input", "in.bb", "--convert-tab-size", "2", "-q"]), {
    input: "in.bb",
    output: undefined,
    tabWidth: 2,
    quiet: true,
    help: false,
  });
  assert.deepEqual(parseArgs([]), {
    input: undefined,
    output: undefined,
    tabWidth: undefined,
    quiet: false,
    help: false,
  });
});

test("parseArgs rejects bad arguments", () => {
  const codeOf = (argv: string[]) => {
    try {
      parseArgs(argv);
    } catch (error) {
      return error instanceof CliUsageError ? error.code : "other";
    }
    return "none";
  };
  assert.equal(codeOf(["stray"]), "CLI_ARG_FORMAT");
  assert.equal(codeOf(["--nope", "1"]), "CLI_ARG_UNKNOWN");
  assert.equal(codeOf(["--input"]), "CLI_ARG_MISSING");
  assert.equal(codeOf(["--output", "--quiet"]), "CLI_ARG_MISSING");
  assert.throws(() => parseArgs(["--tab-width", "x"]), ConfigurationError);
});

test("help", async () => {
  const result = await run(["--help"]);
  assert.equal(result.code, 0);
  assert.equal(result.stdout.split("\n")[0], "bbmark: convert BBCode to Markdown");
  assert.equal(result.stderr, "");
});

test("converts stdin to stdout", async () => {
  const result = await run([], "[b]hi[/b] [url=https://example.com]there[/url]");
  assert.equal(result.code, 0);
  assert.equal(result.stdout, "**hi** [there](https://example.com)");
  assert.equal(result.stderr, "");
});

test("reports unsupported tags on stderr", async () => {
  const result = await run([], "[s]x[/s]");
  assert.equal(result.code, 0);
  assert.equal(result.stdout, "[s]x[/s]");
  assert.equal(result.stderr, "warning: Unsupported bbcode tag: [s]\n");

  const quiet = await run(["--quiet"], "[s]x[/s]");
  assert.equal(quiet.stdout, "[s]x[/s]");
  assert.equal(quiet.stderr, "");
});

test("tab width options", async () => {
  assert.equal((await run(["--tab-width", "2"], "a\tb")).stdout, "a  b");
  assert.equal((await run(["--convert_tab_size", "0"], "a\tb")).stdout, "ab");
  assert.equal((await run([], "a\tb")).stdout, "a\tb");
});

test("invalid tab width exits with 1 before any output", async () => {
  const result = await run(["--tab-width", "300"], "a\tb");
  assert.equal(result.code, 1);
  assert.equal(result.stdout, "");
  assert.equal(
    result.stderr.split("\n")[0],
    'error: tab-width must be an integer in the range [0, 255], got "300"'
  );
});

test("unknown option exits with 1", async () => {
  const result = await run(["--verbose", "yes"]);
  assert.equal(result.code, 1);
  assert.equal(result.stderr.split("\n")[0], "error: Unknown option: --verbose");
});

test("reads and writes files", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "bbmark-"));
  try {
    const input = path.join(dir, "in.bbcode");
    const output = path.join(dir, "out.md");
    await writeFile(input, "[list][*]a[*]b[/list]");

    const result = await run(["--input", input, "--output", output]);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "");
    assert.equal(await readFile(output, "utf8"), "1. a\n2. b\n");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("missing input file exits with 2", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "bbmark-"));
  try {
    const result = await run(["--input", path.join(dir, "missing.bbcode")]);
    assert.equal(result.code, 2);
    assert.equal(result.stdout, "");
    assert.match(result.stderr, /^error: ENOENT/);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
