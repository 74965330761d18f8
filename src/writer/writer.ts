/**
 * @module writer/writer
 * @description Delimited-text serializer
 *
 * Fields are written one at a time; the writer inserts separators and
 * line endings itself and quotes fields according to its enquote policy.
 * Output is buffered and handed to a {@link ByteSink}. The first sink
 * failure is kept in `error` and turns every later operation into a no-op.
 *
 * @example
 * ```typescript
 * const sink = new MemorySink();
 * const writer = new DSVWriter(sink, { separator: ";" });
 * writer.writeRow(["a", "b;c"]);
 * writer.flush();
 * sink.text(); // 'a;"b;c"\n'
 * ```
 */

import { ByteBuffer, CR, encode, LF, SPACE, startsWith, TAB, toBytes } from "../bytes";
import { WriteError } from "../errors";
import type { ByteSink, FieldValue, WriterOptions } from "./types";
import { type ResolvedWriterOptions, resolveWriterOptions } from "./validation";

const COMMENT_TRAILING = new Set(["\r", "\n", "\t", " "]);

function trimCommentEnd(comment: string): string {
  let end = comment.length;
  while (end > 0 && COMMENT_TRAILING.has(comment.charAt(end - 1))) {
    end--;
  }
  return comment.slice(0, end);
}

/**
 * Comment prefix without its trailing blanks: `"# "` still marks `#x` as a
 * comment for a reader whose prefix is `"#"`
 */
function commentMarker(prefix: Uint8Array): Uint8Array {
  let end = prefix.length;
  while (end > 0 && (prefix[end - 1] === SPACE || prefix[end - 1] === TAB)) {
    end--;
  }
  return prefix.subarray(0, end);
}

function trimCarriageReturns(line: string): string {
  let start = 0;
  let end = line.length;
  while (start < end && line.charAt(start) === "\r") {
    start++;
  }
  while (end > start && line.charAt(end - 1) === "\r") {
    end--;
  }
  return line.slice(start, end);
}

// =============================================================================
// CLASSES - MAIN WRITER
// =============================================================================

export class DSVWriter {
  private readonly options: ResolvedWriterOptions;
  private readonly lineEnding: Uint8Array;
  private readonly commentMarker: Uint8Array;
  private readonly buffer = new ByteBuffer();
  private rowStart = true;
  private failure: WriteError | undefined;

  /**
   * @throws {ConfigurationError} for invalid options, before anything is written
   */
  constructor(
    private readonly sink: ByteSink,
    options: WriterOptions = {}
  ) {
    this.options = resolveWriterOptions(options);
    this.lineEnding = encode(this.options.lineEnding);
    this.commentMarker = commentMarker(this.options.dialect.comment);
  }

  get atRowStart(): boolean {
    return this.rowStart;
  }

  get error(): WriteError | undefined {
    return this.failure;
  }

  /**
   * True when minimal quoting would quote this field
   */
  needsQuoting(field: FieldValue): boolean {
    const { separator, quote } = this.options.dialect;
    return toBytes(field).some(
      (byte) => byte === separator || byte === LF || byte === CR || (quote !== 0 && byte === quote)
    );
  }

  /**
   * Append a field to the current row, preceded by a separator unless it
   * is the first field of the row
   *
   * A first field starting with the comment prefix is quoted so that the
   * row does not read back as a comment.
   */
  writeField(field: FieldValue): void {
    const bytes = toBytes(field);
    const { separator, quote } = this.options.dialect;

    const enquote =
      this.options.enquote === "always" ||
      this.needsQuoting(bytes) ||
      (this.rowStart && this.commentMarker.length > 0 && startsWith(bytes, this.commentMarker));

    if (!this.rowStart) {
      this.writeByte(separator);
    }
    this.rowStart = false;

    if (!enquote) {
      this.write(bytes);
      return;
    }
    if (quote === 0) {
      this.fail(new WriteError("field needs quoting but quoting is disabled"));
      return;
    }
    this.writeByte(quote);
    this.writeEscaped(bytes);
    this.writeByte(quote);
  }

  /**
   * Write every field of a row, then end the row
   */
  writeRow(fields: Iterable<FieldValue>): void {
    for (const field of fields) {
      this.writeField(field);
    }
    this.newRow();
  }

  /**
   * End the current row; does nothing at the start of a row
   */
  newRow(): void {
    if (!this.rowStart) {
      this.write(this.lineEnding);
    }
    this.rowStart = true;
  }

  /**
   * Write a possibly multi-line comment, one prefixed line per input line
   *
   * Trailing whitespace is dropped first. An open row is ended before the
   * first comment line.
   */
  writeComment(comment: string): void {
    const prefix = this.options.dialect.comment;
    for (const line of trimCommentEnd(comment).split("\n")) {
      if (!this.rowStart) {
        this.write(this.lineEnding);
      }
      this.write(prefix);
      this.write(encode(trimCarriageReturns(line)));
      this.write(this.lineEnding);
      this.rowStart = true;
    }
  }

  /**
   * Write an empty line, ending an open row first
   */
  emptyRow(): void {
    if (!this.rowStart) {
      this.write(this.lineEnding);
    }
    this.write(this.lineEnding);
    this.rowStart = true;
  }

  /**
   * Hand buffered bytes to the sink
   */
  flush(): void {
    if (this.failure !== undefined || this.buffer.length === 0) {
      return;
    }
    const chunk = this.buffer.view().slice();
    this.buffer.clear();
    try {
      this.sink.write(chunk);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.fail(new WriteError(`write failed: ${reason}`, error));
    }
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private writeEscaped(field: Uint8Array): void {
    const { quote, escape } = this.options.dialect;
    let start = 0;
    for (let i = field.indexOf(quote); i !== -1; i = field.indexOf(quote, start)) {
      this.write(field.subarray(start, i));
      this.writeByte(escape);
      this.writeByte(quote);
      start = i + 1;
    }
    this.write(field.subarray(start));
  }

  private write(bytes: Uint8Array): void {
    if (this.failure !== undefined) {
      return;
    }
    this.buffer.append(bytes);
    this.flushIfFull();
  }

  private writeByte(byte: number): void {
    if (this.failure !== undefined) {
      return;
    }
    this.buffer.appendByte(byte);
    this.flushIfFull();
  }

  private flushIfFull(): void {
    if (this.buffer.length >= this.options.bufferSize) {
      this.flush();
    }
  }

  private fail(error: WriteError): void {
    if (this.failure === undefined) {
      this.failure = error;
    }
  }
}
