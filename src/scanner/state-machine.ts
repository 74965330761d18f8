/**
 * Field State Machine Module
 *
 * Turns pieces from the splitter into fields. At the start of every field
 * the machine tries, in order, the comment collector (only at the start of
 * a row), the quote collector, and finally a plain field. An open collector
 * keeps pulling pieces until it reports completion; if input ends first,
 * whatever was collected becomes the last field of the last row.
 *
 * The machine never reads on its own. `advance()` reports `"pending"` when
 * it needs another chunk, so the synchronous `Scanner` and the async
 * `scanStream` drive the same code.
 */

import { ByteBuffer, LF, SPACE, TAB } from "../bytes";
import {
  type Collector,
  commentCollector,
  fuzzyQuoteCollector,
  removeSeparator,
  strictQuoteCollector,
} from "./collectors";
import { ChunkSplitter } from "./splitter";
import type { Field } from "./types";
import type { ResolvedScannerOptions } from "./validation";

export type AdvanceResult = "field" | "pending" | "end";

type EmptyLinePredicate = (value: Uint8Array) => boolean;

/**
 * What counts as an empty line depends on the separator: a space-separated
 * line of spaces has fields, a tab-separated line of tabs has fields
 */
function emptyLinePredicate(separator: number): EmptyLinePredicate {
  if (separator === SPACE) {
    return (value) => value.length === 0;
  }
  if (separator === TAB) {
    return (value) => value.every((byte) => byte === SPACE);
  }
  return (value) => value.every((byte) => byte === SPACE || byte === TAB);
}

export class FieldStateMachine {
  private readonly splitter: ChunkSplitter;
  private readonly commentCollector: Collector | undefined;
  private readonly quoteCollector: Collector | undefined;
  private readonly isEmpty: EmptyLinePredicate;
  private readonly escape: number;
  private readonly quote: number;

  private readonly value = new ByteBuffer();
  private open: Collector | undefined;
  private inField = false;
  private rawLength = 0;
  private fieldOffset = 0;

  private rowStart = true;
  private rowEnd = true;
  private comment = false;
  private quoted = false;
  private emptyLine = false;

  constructor(options: ResolvedScannerOptions) {
    const { dialect } = options;
    this.splitter = new ChunkSplitter(dialect.separator, options.maxPieceSize);
    this.commentCollector = dialect.comment.length > 0 ? commentCollector(dialect.comment) : undefined;
    if (dialect.quote === 0) {
      this.quoteCollector = undefined;
    } else if (options.quoteMode === "strict") {
      this.quoteCollector = strictQuoteCollector(dialect.quote, dialect.escape);
    } else {
      this.quoteCollector = fuzzyQuoteCollector(dialect.quote, dialect.escape);
    }
    this.isEmpty = emptyLinePredicate(dialect.separator);
    this.escape = dialect.escape;
    this.quote = dialect.quote;
  }

  // ===========================================================================
  // INPUT
  // ===========================================================================

  push(chunk: Uint8Array): void {
    this.splitter.push(chunk);
  }

  finish(): void {
    this.splitter.finish();
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  /**
   * Current field content; overwritten by the next `advance()`
   */
  get bytes(): Uint8Array {
    return this.value.view();
  }

  get offset(): number {
    return this.fieldOffset;
  }

  get atRowStart(): boolean {
    return this.rowStart;
  }

  get atRowEnd(): boolean {
    return this.rowEnd;
  }

  get isComment(): boolean {
    return this.comment;
  }

  get isQuoted(): boolean {
    return this.quoted;
  }

  get isEmptyLine(): boolean {
    return this.emptyLine;
  }

  /**
   * Owned copy of the current field
   */
  snapshot(): Field {
    return {
      bytes: this.value.view().slice(),
      offset: this.fieldOffset,
      atRowStart: this.rowStart,
      atRowEnd: this.rowEnd,
      isComment: this.comment,
      isQuoted: this.quoted,
      isEmptyLine: this.emptyLine,
    };
  }

  // ===========================================================================
  // TRANSITIONS
  // ===========================================================================

  /**
   * Run until a field completes, more input is needed, or input is exhausted
   *
   * @throws {PieceTooLongError} from the splitter
   */
  advance(): AdvanceResult {
    if (!this.inField) {
      this.beginField();
    }

    for (;;) {
      const piece = this.splitter.next();
      if (piece === undefined) {
        if (!this.splitter.drained) {
          return "pending";
        }
        if (this.open === undefined) {
          return "end";
        }
        this.rowEnd = true;
        this.completeField();
        return "field";
      }

      this.rawLength += piece.length;
      this.rowEnd = piece[piece.length - 1] === LF;

      if (this.open !== undefined) {
        if (this.collect(this.open, piece)) {
          return "field";
        }
        continue;
      }

      if (this.rowStart && this.commentCollector !== undefined) {
        const [rest, matched] = this.commentCollector.start(piece);
        if (matched) {
          this.comment = true;
          this.open = this.commentCollector;
          if (this.collect(this.commentCollector, rest)) {
            return "field";
          }
          continue;
        }
      }

      if (this.quoteCollector !== undefined) {
        const [rest, matched] = this.quoteCollector.start(piece);
        if (matched) {
          this.quoted = true;
          this.open = this.quoteCollector;
          if (this.collect(this.quoteCollector, rest)) {
            return "field";
          }
          continue;
        }
      }

      this.value.append(removeSeparator(piece));
      this.completeField();
      return "field";
    }
  }

  private beginField(): void {
    this.inField = true;
    this.rowStart = this.rowEnd;
    this.fieldOffset += this.rawLength;
    this.rawLength = 0;
    this.value.clear();
    this.open = undefined;
    this.comment = false;
    this.quoted = false;
    this.emptyLine = false;
  }

  /**
   * Feed a piece to an open collector; true when the field is complete
   */
  private collect(collector: Collector, piece: Uint8Array): boolean {
    const [rest, done] = collector.end(piece);
    this.value.append(rest);
    if (done) {
      this.completeField();
    }
    return done;
  }

  private completeField(): void {
    if (this.quoted) {
      this.value.unescapeQuotes(this.escape, this.quote);
    }
    this.emptyLine = this.rowStart && this.rowEnd && this.isEmpty(this.value.view());
    this.open = undefined;
    this.inField = false;
  }
}
