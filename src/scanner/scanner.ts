/**
 * @module scanner/scanner
 * @description Streaming tokenizer for delimited text
 *
 * `Scanner` pulls bytes from a synchronous {@link ByteSource} one field at
 * a time. The current field is exposed as a borrowed view plus position
 * flags; call `field()` to keep a copy past the next `scan()`.
 *
 * @example
 * ```typescript
 * const scanner = new Scanner(new BufferSource("a,b\n1,2\n"));
 * while (scanner.scan()) {
 *   console.log(scanner.text(), scanner.atRowEnd);
 * }
 * if (scanner.error) throw scanner.error;
 * ```
 */

import { decode } from "../bytes";
import type { DialectParameters } from "../dialect";
import { SourceReadError } from "../errors";
import { MAX_EMPTY_READS } from "./constants";
import { type AdvanceResult, FieldStateMachine } from "./state-machine";
import type { ByteSource, Field, ScannerOptions } from "./types";
import { type ResolvedScannerOptions, resolveScannerOptions } from "./validation";

// =============================================================================
// SCANNER
// =============================================================================

export class Scanner {
  private readonly options: ResolvedScannerOptions;
  private readonly machine: FieldStateMachine;
  private failure: SourceReadError | undefined;
  private emptyReads = 0;

  /**
   * @throws {ConfigurationError} for invalid options, before anything is read
   */
  constructor(
    private readonly source: ByteSource,
    options: ScannerOptions = {}
  ) {
    this.options = resolveScannerOptions(options);
    this.machine = new FieldStateMachine(this.options);
  }

  get separator(): string {
    return this.options.parameters.separator;
  }

  get quote(): string {
    return this.options.parameters.quote;
  }

  get escape(): string {
    return this.options.parameters.escape;
  }

  get comment(): string {
    return this.options.parameters.comment;
  }

  /**
   * Advance to the next field
   *
   * Returns false at end of input or after a read failure; the failure is
   * kept in `error` and every later call returns false.
   */
  scan(): boolean {
    if (this.failure !== undefined) {
      return false;
    }
    try {
      for (;;) {
        const result = this.machine.advance();
        if (result === "field") {
          return true;
        }
        if (result === "end") {
          return false;
        }
        this.pull();
      }
    } catch (error) {
      this.failure = SourceReadError.fromCause(error, this.machine.offset);
      return false;
    }
  }

  get error(): SourceReadError | undefined {
    return this.failure;
  }

  /**
   * Current field content, valid until the next `scan()`
   */
  bytes(): Uint8Array {
    return this.machine.bytes;
  }

  text(): string {
    return decode(this.machine.bytes);
  }

  field(): Field {
    return this.machine.snapshot();
  }

  get offset(): number {
    return this.machine.offset;
  }

  get atRowStart(): boolean {
    return this.machine.atRowStart;
  }

  get atRowEnd(): boolean {
    return this.machine.atRowEnd;
  }

  get isComment(): boolean {
    return this.machine.isComment;
  }

  get isQuoted(): boolean {
    return this.machine.isQuoted;
  }

  get isEmptyLine(): boolean {
    return this.machine.isEmptyLine;
  }

  private pull(): void {
    const chunk = this.source.read();
    if (chunk === null) {
      this.machine.finish();
      return;
    }
    if (chunk.length === 0) {
      this.emptyReads++;
      if (this.emptyReads >= MAX_EMPTY_READS) {
        throw new SourceReadError(`no progress after ${MAX_EMPTY_READS} empty reads`, this.machine.offset);
      }
      return;
    }
    this.emptyReads = 0;
    this.machine.push(chunk);
  }
}

/**
 * Scanner for parameters produced by the sniffer, which always assumes
 * fuzzy quoting
 */
export function createScanner(source: ByteSource, parameters: DialectParameters): Scanner {
  return new Scanner(source, { ...parameters, quoteMode: "fuzzy" });
}

// =============================================================================
// ROW GROUPING
// =============================================================================

/**
 * Group data fields into rows of strings, skipping comments and empty lines
 *
 * @throws {SourceReadError} once the scanner stops on a read failure
 */
export function* rows(scanner: Scanner): Generator<string[], void, undefined> {
  let row: string[] = [];
  while (scanner.scan()) {
    if (scanner.isComment || scanner.isEmptyLine) {
      continue;
    }
    row.push(scanner.text());
    if (scanner.atRowEnd) {
      yield row;
      row = [];
    }
  }
  if (scanner.error !== undefined) {
    throw scanner.error;
  }
}

// =============================================================================
// ASYNC STREAMS
// =============================================================================

export type ChunkStream = ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>;

async function* readChunks(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = stream.getReader();
  // set while suspended at `yield`: leaving from there means the consumer stopped early
  let suspended = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      suspended = true;
      yield value;
      suspended = false;
    }
  } finally {
    if (suspended) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

function toAsyncIterable(input: ChunkStream): AsyncIterable<Uint8Array> {
  return "getReader" in input ? readChunks(input) : input;
}

/**
 * Scan an async byte stream, yielding detached fields
 *
 * @throws {ConfigurationError} for invalid options, before the stream is read
 * @throws {SourceReadError} when the stream fails or a piece is too long
 */
export async function* scanStream(
  input: ChunkStream,
  options: ScannerOptions = {}
): AsyncGenerator<Field, void, undefined> {
  const machine = new FieldStateMachine(resolveScannerOptions(options));
  const iterator = toAsyncIterable(input)[Symbol.asyncIterator]();
  let emptyReads = 0;

  try {
    for (;;) {
      let result: AdvanceResult;
      try {
        result = machine.advance();
      } catch (error) {
        throw SourceReadError.fromCause(error, machine.offset);
      }
      if (result === "field") {
        yield machine.snapshot();
        continue;
      }
      if (result === "end") {
        return;
      }

      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (error) {
        throw SourceReadError.fromCause(error, machine.offset);
      }
      if (next.done === true) {
        machine.finish();
      } else if (next.value.length === 0) {
        emptyReads++;
        if (emptyReads >= MAX_EMPTY_READS) {
          throw new SourceReadError(`no progress after ${MAX_EMPTY_READS} empty reads`, machine.offset);
        }
      } else {
        emptyReads = 0;
        machine.push(next.value);
      }
    }
  } finally {
    await iterator.return?.();
  }
}
