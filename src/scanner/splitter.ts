/**
 * Chunk splitter
 *
 * Cuts buffered bytes into pieces, each ending with (and including) the
 * earliest separator or line feed. The splitter is push-driven: callers
 * `push()` chunks as they arrive, `finish()` at end of input, and pull
 * pieces with `next()` until it returns `undefined`.
 */

import { concatBytes, EMPTY_BYTES, LF } from "../bytes";
import { PieceTooLongError, SourceReadError } from "../errors";
import { DEFAULT_MAX_PIECE_SIZE } from "./constants";

export class ChunkSplitter {
  private buffer: Uint8Array = EMPTY_BYTES;
  private position = 0;
  private consumed = 0;
  private finished = false;

  /**
   * @param separator - separator byte; 0 or LF split on line feeds only
   */
  constructor(
    private readonly separator: number,
    private readonly maxPieceSize: number = DEFAULT_MAX_PIECE_SIZE
  ) {}

  push(chunk: Uint8Array): void {
    if (this.finished) {
      throw new SourceReadError("chunk pushed after end of input", this.consumed);
    }
    if (chunk.length === 0) {
      return;
    }
    const rest = this.buffer.subarray(this.position);
    this.buffer = rest.length === 0 ? chunk : concatBytes([rest, chunk]);
    this.position = 0;
  }

  finish(): void {
    this.finished = true;
  }

  /**
   * True once input has ended and every byte has been handed out
   */
  get drained(): boolean {
    return this.finished && this.position >= this.buffer.length;
  }

  /**
   * Next piece, or `undefined` when more input is needed (or none is left)
   *
   * The returned view is valid until the next `push()`. Trailing bytes
   * without a terminator are emitted after `finish()` with a line feed
   * appended.
   *
   * @throws {PieceTooLongError} when a piece outgrows `maxPieceSize`
   */
  next(): Uint8Array | undefined {
    const start = this.position;
    if (start >= this.buffer.length) {
      return undefined;
    }

    const end = this.findTerminator(start);
    if (end !== -1) {
      const piece = this.buffer.subarray(start, end + 1);
      this.checkLength(piece.length);
      this.position = end + 1;
      this.consumed += piece.length;
      return piece;
    }

    const pending = this.buffer.length - start;
    this.checkLength(pending);
    if (!this.finished) {
      return undefined;
    }

    const piece = new Uint8Array(pending + 1);
    piece.set(this.buffer.subarray(start));
    piece[pending] = LF;
    this.position = this.buffer.length;
    this.consumed += pending;
    return piece;
  }

  private findTerminator(start: number): number {
    const { buffer, separator } = this;
    if (separator === 0 || separator === LF) {
      return buffer.indexOf(LF, start);
    }
    for (let i = start; i < buffer.length; i++) {
      const byte = buffer[i];
      if (byte === LF || byte === separator) {
        return i;
      }
    }
    return -1;
  }

  private checkLength(length: number): void {
    if (length > this.maxPieceSize) {
      throw new PieceTooLongError(length, this.maxPieceSize, this.consumed);
    }
  }
}
