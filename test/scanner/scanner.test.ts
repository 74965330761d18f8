/**
 * Scanner Tests
 *
 * Covers field splitting, quoting modes, comments, empty lines, offsets,
 * end-of-input recovery, sticky read errors and the async stream driver.
 */

import { describe, expect, test, vi } from "vitest";
import { decode, encode } from "../../src/bytes";
import { ConfigurationError, PieceTooLongError, SourceReadError } from "../../src/errors";
import {
  BufferSource,
  type ByteSource,
  createScanner,
  type Field,
  IterableSource,
  rows,
  Scanner,
  type ScannerOptions,
  scanStream,
} from "../../src/scanner";

interface ScannedField {
  text: string;
  offset: number;
  atRowStart: boolean;
  atRowEnd: boolean;
  isComment: boolean;
  isQuoted: boolean;
  isEmptyLine: boolean;
}

function collect(scanner: Scanner): ScannedField[] {
  const fields: ScannedField[] = [];
  while (scanner.scan()) {
    fields.push({
      text: scanner.text(),
      offset: scanner.offset,
      atRowStart: scanner.atRowStart,
      atRowEnd: scanner.atRowEnd,
      isComment: scanner.isComment,
      isQuoted: scanner.isQuoted,
      isEmptyLine: scanner.isEmptyLine,
    });
  }
  return fields;
}

function texts(input: string, options: ScannerOptions = {}): string[] {
  return collect(new Scanner(new BufferSource(input), options)).map((field) => field.text);
}

const MIXED_INPUT =
  "# This, is a comment\n" +
  " foo ,  bar  ,  baz, # This is not a comment\n" +
  "\n" +
  '", foo ",  "b\'ar,"," b"",az " ,\n';

describe("Scanner", () => {
  describe("default dialect", () => {
    test("separates comments, plain fields, empty lines and quoted fields", () => {
      const fields = collect(new Scanner(new BufferSource(MIXED_INPUT)));

      expect(fields.map((f) => f.text)).toEqual([
        " This, is a comment",
        " foo ",
        "  bar  ",
        "  baz",
        " # This is not a comment",
        "",
        ", foo ",
        "b'ar,",
        ' b",az ',
        "",
      ]);
      expect(fields.map((f) => f.isComment)).toEqual([
        true, false, false, false, false, false, false, false, false, false,
      ]);
      expect(fields.map((f) => f.isQuoted)).toEqual([
        false, false, false, false, false, false, true, true, true, false,
      ]);
      expect(fields.map((f) => f.isEmptyLine)).toEqual([
        false, false, false, false, false, true, false, false, false, false,
      ]);
      expect(fields.map((f) => f.atRowEnd)).toEqual([
        true, false, false, false, true, true, false, false, false, true,
      ]);
    });

    test("reports byte offsets of field starts", () => {
      const fields = collect(new Scanner(new BufferSource('a,bb\n"c",d\n')));

      expect(fields.map((f) => [f.text, f.offset])).toEqual([
        ["a", 0],
        ["bb", 2],
        ["c", 5],
        ["d", 9],
      ]);
    });

    test("treats the last row as terminated when input lacks a final newline", () => {
      const fields = collect(new Scanner(new BufferSource("a,b\nc,d")));

      expect(fields.map((f) => [f.text, f.offset, f.atRowStart, f.atRowEnd])).toEqual([
        ["a", 0, true, false],
        ["b", 2, false, true],
        ["c", 4, true, false],
        ["d", 6, false, true],
      ]);
    });

    test("strips CRLF line endings", () => {
      expect(texts("a,b\r\nc\r\n")).toEqual(["a", "b", "c"]);
    });

    test("keeps line breaks inside quoted fields", () => {
      const fields = collect(new Scanner(new BufferSource('"multi\nline",x\n')));

      expect(fields).toEqual([
        {
          text: "multi\nline",
          offset: 0,
          atRowStart: true,
          atRowEnd: false,
          isComment: false,
          isQuoted: true,
          isEmptyLine: false,
        },
        {
          text: "x",
          offset: 13,
          atRowStart: false,
          atRowEnd: true,
          isComment: false,
          isQuoted: false,
          isEmptyLine: false,
        },
      ]);
    });

    test("recognizes comments only at the start of a row", () => {
      const fields = collect(new Scanner(new BufferSource("a,#b\n#c\n")));

      expect(fields.map((f) => [f.text, f.isComment])).toEqual([
        ["a", false],
        ["#b", false],
        ["c", true],
      ]);
    });

    test("delivers an unterminated quoted field at end of input", () => {
      const scanner = new Scanner(new BufferSource('a,"b,c\n'));
      const fields = collect(scanner);

      expect(fields.map((f) => [f.text, f.isQuoted, f.atRowEnd])).toEqual([
        ["a", false, false],
        ["b,c\n", true, true],
      ]);
      expect(scanner.error).toBeUndefined();
    });

    test("yields nothing for empty input", () => {
      const scanner = new Scanner(new BufferSource(""));

      expect(scanner.scan()).toBe(false);
      expect(scanner.error).toBeUndefined();
    });
  });

  describe("quote modes", () => {
    test("fuzzy mode tolerates spaces around quotes", () => {
      const fields = collect(new Scanner(new BufferSource('"x" ,"y"\n')));

      expect(fields.map((f) => [f.text, f.isQuoted])).toEqual([
        ["x", true],
        ["y", true],
      ]);
    });

    test("strict mode needs the closing quote right before the separator", () => {
      const fields = collect(new Scanner(new BufferSource('"x" ,"y"\n'), { quoteMode: "strict" }));

      expect(fields.map((f) => [f.text, f.isQuoted, f.atRowStart, f.atRowEnd])).toEqual([
        ['x" ,"y', true, true, true],
      ]);
    });

    test("unescapes with a distinct escape character", () => {
      expect(texts('"a\\"b",c\n', { escape: "\\" })).toEqual(['a"b', "c"]);
    });

    test("doubled quotes collapse once", () => {
      expect(texts('a;"b""c""";"d\n', { separator: ";" })).toEqual(["a", 'b"c"', "d\n"]);
    });

    test("an empty quote disables quoting", () => {
      expect(texts('"a",b\n', { quote: "" })).toEqual(['"a"', "b"]);
    });
  });

  describe("separators and empty lines", () => {
    test("an empty separator reads one field per line", () => {
      expect(texts("a,b\nc\n", { separator: "" })).toEqual(["a,b", "c"]);
    });

    test("tab separator: a line of spaces is empty, a line with a tab is not", () => {
      const fields = collect(new Scanner(new BufferSource("   \n\t\n"), { separator: "\t" }));

      expect(fields.map((f) => [f.text, f.isEmptyLine])).toEqual([
        ["   ", true],
        ["", false],
        ["", false],
      ]);
    });

    test("a quoted empty field alone on its line is an empty line", () => {
      const input = 'a,b\n""\nc,d\n';
      const fields = collect(new Scanner(new BufferSource(input)));

      expect(fields.map((f) => [f.text, f.isQuoted, f.isEmptyLine])).toEqual([
        ["a", false, false],
        ["b", false, false],
        ["", true, true],
        ["c", false, false],
        ["d", false, false],
      ]);
      expect([...rows(new Scanner(new BufferSource(input)))]).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });

    test("comma separator: spaces and tabs make an empty line", () => {
      const fields = collect(new Scanner(new BufferSource(" \t \n")));

      expect(fields.map((f) => f.isEmptyLine)).toEqual([true]);
    });

    test("space separator: only a truly empty line is empty", () => {
      const fields = collect(new Scanner(new BufferSource("\n\t\n"), { separator: " " }));

      expect(fields.map((f) => [f.text, f.isEmptyLine])).toEqual([
        ["", true],
        ["\t", false],
      ]);
    });
  });

  describe("sources", () => {
    test("chunk boundaries do not change the result", () => {
      const whole = collect(new Scanner(new BufferSource(MIXED_INPUT)));

      for (const chunkSize of [1, 2, 3, 7]) {
        expect(collect(new Scanner(new BufferSource(MIXED_INPUT, chunkSize)))).toEqual(whole);
      }
    });

    test("IterableSource reads strings and byte chunks", () => {
      const source = new IterableSource(["a,", encode("b\nc"), ",d\n"]);

      expect(collect(new Scanner(source)).map((f) => f.text)).toEqual(["a", "b", "c", "d"]);
    });

    test("BufferSource rejects a non-positive chunk size", () => {
      expect(() => new BufferSource("a", 0)).toThrow(ConfigurationError);
    });

    test("field() returns a copy that survives the next scan", () => {
      const scanner = new Scanner(new BufferSource("first,second\n"));
      scanner.scan();
      const field: Field = scanner.field();
      scanner.scan();

      expect(decode(field.bytes)).toBe("first");
      expect(field.atRowStart).toBe(true);
      expect(scanner.text()).toBe("second");
    });
  });

  describe("errors", () => {
    test("a failing source stops the scanner and the error is sticky", () => {
      function* chunks(): Generator<string> {
        yield "a,b\n";
        throw new Error("disk gone");
      }
      const scanner = new Scanner(new IterableSource(chunks()));

      expect(collect(scanner).map((f) => f.text)).toEqual(["a", "b"]);
      const error = scanner.error;
      expect(error).toBeInstanceOf(SourceReadError);
      expect(error?.message).toBe("read failed: disk gone");
      expect(scanner.scan()).toBe(false);
      expect(scanner.error).toBe(error);
    });

    test("a piece longer than maxPieceSize fails the scan", () => {
      const scanner = new Scanner(new BufferSource("abcdefgh\n"), { maxPieceSize: 4 });

      expect(scanner.scan()).toBe(false);
      expect(scanner.error).toBeInstanceOf(PieceTooLongError);
    });

    test("a source that keeps returning empty chunks is reported", () => {
      const stuck: ByteSource = { read: () => new Uint8Array(0) };
      const scanner = new Scanner(stuck);

      expect(scanner.scan()).toBe(false);
      expect(scanner.error?.message).toBe("no progress after 100 empty reads");
    });

    test("conflicting options are rejected before reading", () => {
      let reads = 0;
      const source: ByteSource = {
        read: () => {
          reads++;
          return null;
        },
      };

      expect(() => new Scanner(source, { quote: "," })).toThrow(ConfigurationError);
      expect(() => new Scanner(source, { separator: "ab" })).toThrow(ConfigurationError);
      expect(() => new Scanner(source, { separator: "\r" })).toThrow(ConfigurationError);
      expect(() => new Scanner(source, { comment: "#,", separator: "," })).toThrow(ConfigurationError);
      expect(() => new Scanner(source, { maxPieceSize: 0 })).toThrow(ConfigurationError);
      expect(reads).toBe(0);
    });
  });

  describe("createScanner", () => {
    test("uses the given dialect with fuzzy quoting", () => {
      const scanner = createScanner(new BufferSource("'x' ;y\n"), {
        separator: ";",
        quote: "'",
        escape: "'",
        comment: "",
      });

      expect(scanner.separator).toBe(";");
      expect(scanner.quote).toBe("'");
      expect(scanner.comment).toBe("");
      expect(collect(scanner).map((f) => [f.text, f.isQuoted])).toEqual([
        ["x", true],
        ["y", false],
      ]);
    });

    test("escape defaults to the quote", () => {
      const scanner = new Scanner(new BufferSource(""), { quote: "'" });

      expect(scanner.escape).toBe("'");
      expect(scanner.separator).toBe(",");
      expect(scanner.comment).toBe("#");
    });
  });

  describe("rows", () => {
    test("groups fields and skips comments and empty lines", () => {
      const scanner = new Scanner(new BufferSource("# header\na,b\n\n1,2\n"));

      expect([...rows(scanner)]).toEqual([
        ["a", "b"],
        ["1", "2"],
      ]);
    });

    test("throws the read error after the rows read so far", () => {
      function* chunks(): Generator<string> {
        yield "a,b\nc,";
        throw new Error("unplugged");
      }
      const seen: string[][] = [];

      expect(() => {
        for (const row of rows(new Scanner(new IterableSource(chunks())))) {
          seen.push(row);
        }
      }).toThrow(SourceReadError);
      expect(seen).toEqual([["a", "b"]]);
    });
  });
});

describe("scanStream", () => {
  async function collectStream(stream: ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>): Promise<string[]> {
    const result: string[] = [];
    for await (const field of scanStream(stream)) {
      result.push(decode(field.bytes));
    }
    return result;
  }

  test("reads a ReadableStream", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encode('a,"b'));
        controller.enqueue(encode('\nc"\n'));
        controller.close();
      },
    });

    expect(await collectStream(stream)).toEqual(["a", "b\nc"]);
  });

  test("reads an async iterable", async () => {
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield encode("x;");
      yield encode("y\n");
    }

    const fields: Field[] = [];
    for await (const field of scanStream(chunks(), { separator: ";" })) {
      fields.push(field);
    }

    expect(fields.map((f) => [decode(f.bytes), f.offset, f.atRowEnd])).toEqual([
      ["x", 0, false],
      ["y", 2, true],
    ]);
  });

  test("cancels a ReadableStream the consumer stops reading", async () => {
    const cancel = vi.fn();
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(encode("a,b\n"));
      },
      cancel,
    });

    const seen: string[] = [];
    for await (const field of scanStream(stream)) {
      seen.push(decode(field.bytes));
      break;
    }

    expect(seen).toEqual(["a"]);
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(stream.locked).toBe(false);
  });

  test("does not cancel a stream that ran to completion", async () => {
    const cancel = vi.fn();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encode("a\n"));
        controller.close();
      },
      cancel,
    });

    expect(await collectStream(stream)).toEqual(["a"]);
    expect(cancel).not.toHaveBeenCalled();
  });

  test("wraps a stream failure in SourceReadError", async () => {
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield encode("a,b\n");
      throw new Error("boom");
    }
    const seen: string[] = [];

    const consume = async (): Promise<void> => {
      for await (const field of scanStream(chunks())) {
        seen.push(decode(field.bytes));
      }
    };

    await expect(consume()).rejects.toThrow("read failed: boom");
    expect(seen).toEqual(["a", "b"]);
  });

  test("rejects invalid options before reading", async () => {
    let pulled = false;
    async function* chunks(): AsyncGenerator<Uint8Array> {
      pulled = true;
      yield encode("a\n");
    }

    await expect(collectStream(chunks())).resolves.toEqual(["a"]);
    pulled = false;
    const consume = async (): Promise<void> => {
      for await (const field of scanStream(chunks(), { quote: "\n" })) {
        expect(field).toBeUndefined();
      }
    };
    await expect(consume()).rejects.toBeInstanceOf(ConfigurationError);
    expect(pulled).toBe(false);
  });
});
