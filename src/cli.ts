#!/usr/bin/env node

import { createReadStream, createWriteStream, realpathSync } from "node:fs";
import path from "node:path";
import type { Readable, Writable } from "node:stream";
import { fileURLToPath } from "node:url";

import { parseTabWidth } from "./config.ts";
import { BBCodeDocument } from "./document.ts";
import { WritableSink } from "./sink.ts";

export interface CliIO {
  readonly stdin: Readable;
  readonly stdout: Writable;
  readonly stderr: Writable;
}

interface CliArgs {
  readonly input: string | undefined;
  readonly output: string | undefined;
  readonly tabWidth: number | undefined;
  readonly quiet: boolean;
  readonly help: boolean;
}

const usage = [
  "bbmark: convert BBCode to Markdown",
  "  bbmark [--input <path>] [--output <path>] [--tab-width <0-255>] [--quiet]",
  "",
  "  --input      file to read (default: stdin)",
  "  --output     file to write (default: stdout)",
  "  --tab-width  replace each tab with this many spaces (alias: --convert-tab-size)",
  "  --quiet      do not report unsupported tags",
].join("\n");

const VALUE_FLAGS = new Map([
  ["input", "input"],
  ["output", "output"],
  ["tab-width", "tab-width"],
  ["convert-tab-size", "tab-width"],
  ["convert_tab_size", "tab-width"],
]);

export class CliUsageError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const values = new Map<string, string>();
  let quiet = false;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i]!;
    if (token === "--help" || token === "-h") {
      help = true;
      continue;
    }
    if (token === "--quiet" || token === "-q") {
      quiet = true;
      continue;
    }
    if (!token.startsWith("--")) {
      throw new CliUsageError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }

    const name = VALUE_FLAGS.get(token.slice(2));
    if (name === undefined) {
      throw new CliUsageError("CLI_ARG_UNKNOWN", `Unknown option: ${token}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new CliUsageError("CLI_ARG_MISSING", `Missing value for ${token}`);
    }
    values.set(name, value);
    i += 1;
  }

  const tabWidth = values.get("tab-width");
  return {
    input: values.get("input"),
    output: values.get("output"),
    tabWidth: tabWidth === undefined ? undefined : parseTabWidth(tabWidth),
    quiet,
    help,
  };
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown CLI error.";

/**
 * Runs the converter and returns the exit code: 0 on success, 1 for bad arguments, 2 for I/O errors.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    io.stderr.write(`error: ${errorMessage(error)}\n${usage}\n`);
    return 1;
  }

  if (args.help) {
    io.stdout.write(`${usage}\n`);
    return 0;
  }

  let output: Writable | undefined;
  try {
    const source = args.input === undefined ? io.stdin : createReadStream(args.input);
    const doc = await BBCodeDocument.fromStream(source);

    output = args.output === undefined ? io.stdout : createWriteStream(args.output);
    const sink = new WritableSink(output, { end: args.output !== undefined });
    doc.renderMarkdown(sink, {
      tabWidth: args.tabWidth,
      onWarning: warning => {
        if (!args.quiet) io.stderr.write(`warning: ${warning.message}\n`);
      },
    });
    await sink.close();
    return 0;
  } catch (error) {
    if (output && output !== io.stdout) output.destroy();
    io.stderr.write(`error: ${errorMessage(error)}\n`);
    return 2;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(path.resolve(entry)) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`error: ${errorMessage(error)}\n`);
      process.exitCode = 2;
    });
}
