import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  parseLineRange,
  readSelection,
  selectLines,
} from "../src/share/selection.ts";
import { SelectionError } from "../src/lib/errors.ts";

describe("parseLineRange", () => {
  test("parses start-end", () => {
    expect(parseLineRange("10-24")).toEqual({ start: 10, end: 24 });
  });

  test("a single line is its own range", () => {
    expect(parseLineRange("7")).toEqual({ start: 7, end: 7 });
  });

  test("accepts a colon separator", () => {
    expect(parseLineRange("3:4")).toEqual({ start: 3, end: 4 });
  });

  test("rejects reversed and zero ranges", () => {
    expect(() => parseLineRange("5-2")).toThrow(SelectionError);
    expect(() => parseLineRange("0-2")).toThrow(SelectionError);
  });

  test("rejects garbage", () => {
    expect(() => parseLineRange("a-b")).toThrow('Invalid --lines value "a-b"');
  });
});

describe("selectLines", () => {
  const text = "one\ntwo\nthree\nfour\n";

  test("returns the inclusive range with a newline after each line", () => {
    expect(selectLines(text, { start: 2, end: 3 })).toBe("two\nthree\n");
  });

  test("clamps the end to the last line", () => {
    expect(selectLines(text, { start: 4, end: 10 })).toBe("four\n");
  });

  test("terminates the last line even without a trailing newline", () => {
    expect(selectLines("a\nb", { start: 2, end: 2 })).toBe("b\n");
  });

  test("rejects a start past the end", () => {
    expect(() => selectLines(text, { start: 5, end: 6 })).toThrow(
      "Line 5 is past the end of the file (4 lines)",
    );
  });
});

describe("readSelection", () => {
  let dir: string;
  let file: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "slack-share-selection-"));
    file = join(dir, "snippet.py");
    await writeFile(file, "import os\nprint(1)\nprint(2)\n");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("uses inline text", async () => {
    expect(await readSelection({ text: "print(1)" })).toBe("print(1)");
  });

  test("reads a whole file", async () => {
    expect(await readSelection({ file })).toBe("import os\nprint(1)\nprint(2)\n");
  });

  test("reads a line range of a file", async () => {
    expect(await readSelection({ file, lines: "2-3" })).toBe("print(1)\nprint(2)\n");
  });

  test("falls back to stdin", async () => {
    expect(await readSelection({ stdin: async () => "from stdin\n" })).toBe("from stdin\n");
  });

  test("rejects an empty selection", async () => {
    await expect(readSelection({ text: "  \n" })).rejects.toThrow(
      "Cannot share an empty selection",
    );
    await expect(readSelection({ stdin: async () => "" })).rejects.toThrow(
      "Cannot share an empty selection",
    );
  });

  test("rejects text together with --file", async () => {
    await expect(readSelection({ text: "x", file })).rejects.toThrow(
      "Pass either inline text or --file, not both",
    );
  });

  test("rejects --lines without --file", async () => {
    await expect(readSelection({ text: "x", lines: "1-2" })).rejects.toThrow(
      "--lines requires --file",
    );
  });
});
