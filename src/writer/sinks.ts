/**
 * In-memory sink and one-shot formatting
 */

import { concatBytes, decode } from "../bytes";
import type { ByteSink, FieldValue, WriterOptions } from "./types";
import { DSVWriter } from "./writer";

/**
 * Collects everything written to it
 */
export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];

  write(chunk: Uint8Array): void {
    this.chunks.push(chunk);
  }

  bytes(): Uint8Array {
    return concatBytes(this.chunks);
  }

  text(): string {
    return decode(this.bytes());
  }
}

/**
 * Serialize rows to bytes
 *
 * Every row ends with the line ending; an empty row becomes an empty line.
 *
 * @throws {ConfigurationError} for invalid options
 */
export function formatRows(rows: Iterable<readonly FieldValue[]>, options: WriterOptions = {}): Uint8Array {
  const sink = new MemorySink();
  const writer = new DSVWriter(sink, options);
  for (const row of rows) {
    if (row.length === 0) {
      writer.emptyRow();
    } else {
      writer.writeRow(row);
    }
  }
  writer.flush();
  return sink.bytes();
}
