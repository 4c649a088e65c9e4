import { readFile } from "node:fs/promises";
import { SelectionError } from "../lib/errors.ts";

export type LineRange = { start: number; end: number };

export function parseLineRange(input: string): LineRange {
  const match = /^\s*(\d+)\s*(?:[-:,]\s*(\d+))?\s*$/.exec(input);
  if (!match) {
    throw new SelectionError(`Invalid --lines value "${input}": expected <start>-<end>`);
  }
  const start = Number.parseInt(match[1] ?? "", 10);
  const end = match[2] === undefined ? start : Number.parseInt(match[2], 10);
  if (start < 1 || end < start) {
    throw new SelectionError(
      `Invalid --lines value "${input}": lines are 1-based and end must not precede start`,
    );
  }
  return { start, end };
}

/** Picks lines start..end (inclusive), each terminated by a newline. */
export function selectLines(text: string, range: LineRange): string {
  const lines = text.split(/\r?\n/);
  if (text.endsWith("\n")) {
    lines.pop();
  }
  if (range.start > lines.length) {
    throw new SelectionError(
      `Line ${range.start} is past the end of the file (${lines.length} lines)`,
    );
  }
  return lines
    .slice(range.start - 1, range.end)
    .map((line) => `${line}\n`)
    .join("");
}

export async function readSelection(input: {
  text?: string;
  file?: string;
  lines?: string;
  stdin?: () => Promise<string>;
}): Promise<string> {
  if (input.text !== undefined && input.file) {
    throw new SelectionError("Pass either inline text or --file, not both");
  }
  if (input.lines && !input.file) {
    throw new SelectionError("--lines requires --file");
  }

  let content: string;
  if (input.file) {
    const raw = await readFile(input.file, "utf8");
    content = input.lines ? selectLines(raw, parseLineRange(input.lines)) : raw;
  } else if (input.text !== undefined) {
    content = input.text;
  } else if (input.stdin) {
    content = await input.stdin();
  } else {
    content = "";
  }

  if (content.trim() === "") {
    throw new SelectionError("Cannot share an empty selection");
  }
  return content;
}

export async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return "";
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}
