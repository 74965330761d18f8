/**
 * Tests for scanning, sniffing and writing delimited files
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { decode } from "../../src/bytes";
import { ConfigurationError, FileError } from "../../src/errors";
import { type ScanFileOptions, scanFile, sniffFile, writeFile } from "../../src/io/dsv-file";

const FIXTURES_DIR = mkdtempSync(join(tmpdir(), "dsvkit-files-"));
const TEST_FILES = {
  semicolons: join(FIXTURES_DIR, "semicolons.csv"),
  preamble: join(FIXTURES_DIR, "preamble.txt"),
  words: join(FIXTURES_DIR, "words.txt"),
  bom: join(FIXTURES_DIR, "bom.csv"),
  nonexistent: join(FIXTURES_DIR, "nonexistent.csv"),
};

beforeAll(() => {
  writeFileSync(TEST_FILES.semicolons, "a;b;c\n1;2;3\n");
  writeFileSync(TEST_FILES.preamble, "Report title\n\nx|y\n1|2\n3|4\n");
  writeFileSync(TEST_FILES.words, "abc\ndef\n");
  writeFileSync(TEST_FILES.bom, "\uFEFFid,name\n1,x\n2,y\n");
});

afterAll(() => {
  rmSync(FIXTURES_DIR, { recursive: true, force: true });
});

async function scanText(path: string, options?: ScanFileOptions): Promise<string[]> {
  const fields: string[] = [];
  for await (const field of scanFile(path, options)) {
    fields.push(decode(field.bytes));
  }
  return fields;
}

describe("sniffFile", () => {
  test("detects the dialect from the file head", async () => {
    expect(await sniffFile(TEST_FILES.semicolons)).toEqual({
      parameters: { separator: ";", quote: '"', escape: '"', comment: "#" },
      verified: true,
    });
  });

  test("skips a preamble before sniffing", async () => {
    const guess = await sniffFile(TEST_FILES.preamble);

    expect(guess.verified).toBe(true);
    expect(guess.parameters?.separator).toBe("|");
  });

  test("fails for a missing file", async () => {
    await expect(sniffFile(TEST_FILES.nonexistent)).rejects.toBeInstanceOf(FileError);
  });

  test("rejects a non-positive sample size", async () => {
    await expect(sniffFile(TEST_FILES.semicolons, { sampleSize: 0 })).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("scanFile", () => {
  test("uses the explicit dialect", async () => {
    expect(await scanText(TEST_FILES.semicolons)).toEqual(["a;b;c", "1;2;3"]);
    expect(await scanText(TEST_FILES.semicolons, { separator: ";", bufferSize: 2 })).toEqual([
      "a",
      "b",
      "c",
      "1",
      "2",
      "3",
    ]);
  });

  test("detects the dialect when asked", async () => {
    expect(await scanText(TEST_FILES.semicolons, { autoDetect: true })).toEqual(["a", "b", "c", "1", "2", "3"]);
  });

  test("never scans a UTF-8 BOM", async () => {
    const expected = ["id", "name", "1", "x", "2", "y"];

    expect(await scanText(TEST_FILES.bom)).toEqual(expected);
    expect(await scanText(TEST_FILES.bom, { autoDetect: true })).toEqual(expected);
    expect(await scanText(TEST_FILES.bom, { bufferSize: 2 })).toEqual(expected);
  });

  test("starts after the preamble when detecting the dialect", async () => {
    expect(await scanText(TEST_FILES.preamble, { autoDetect: true })).toEqual(["x", "y", "1", "2", "3", "4"]);
    expect(await scanText(TEST_FILES.preamble, { autoDetect: true, skipPreamble: false })).toEqual([
      "Report title",
      "",
      "x",
      "y",
      "1",
      "2",
      "3",
      "4",
    ]);
  });

  test("reports field positions", async () => {
    const fields = [];
    for await (const field of scanFile(TEST_FILES.semicolons, { separator: ";" })) {
      fields.push({ offset: field.offset, atRowEnd: field.atRowEnd });
    }

    expect(fields[3]).toEqual({ offset: 6, atRowEnd: false });
    expect(fields[5]).toEqual({ offset: 10, atRowEnd: true });
  });

  test("falls back to the given options when detection fails", async () => {
    const onWarning = vi.fn();
    const fields = await scanText(TEST_FILES.words, {
      autoDetect: true,
      sniffer: { strict: true },
      separator: "|",
      onWarning,
    });

    expect(fields).toEqual(["abc", "def"]);
    expect(onWarning).toHaveBeenCalledWith(`could not detect the dialect of ${TEST_FILES.words}, using the given options`);
  });

  test("fails for a missing file", async () => {
    await expect(scanText(TEST_FILES.nonexistent)).rejects.toBeInstanceOf(FileError);
  });

  test("rejects invalid scanner options before opening the file", async () => {
    await expect(scanText(TEST_FILES.nonexistent, { separator: "ab" })).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("writeFile", () => {
  test("writes rows that scan back", async () => {
    const path = join(FIXTURES_DIR, "out", "table.csv");
    await writeFile(path, [
      ["name", "note"],
      ["x", "a,b"],
    ]);

    expect(readFileSync(path, "utf8")).toBe('name,note\nx,"a,b"\n');
    expect(await scanText(path)).toEqual(["name", "note", "x", "a,b"]);
  });

  test("rejects invalid writer options", async () => {
    await expect(writeFile(join(FIXTURES_DIR, "bad.csv"), [["a"]], { separator: "" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
