/**
 * Scanner type definitions
 */

export type QuoteMode = "strict" | "fuzzy";

/**
 * Options accepted by `Scanner` and `scanStream`
 *
 * `escape` defaults to the quote character. An empty `quote` or `comment`
 * disables that feature; a separator of `""` or `"\n"` reads one field per
 * line.
 */
export interface ScannerOptions {
  separator?: string;
  quote?: string;
  escape?: string;
  comment?: string;
  quoteMode?: QuoteMode;
  maxPieceSize?: number;
}

/**
 * Synchronous pull source of bytes
 *
 * `read()` returns the next chunk, or `null` once exhausted, and may throw.
 * The scanner takes ownership of every chunk it is handed: a source must
 * not modify a chunk after returning it.
 */
export interface ByteSource {
  read(): Uint8Array | null;
}

/**
 * One field with its position flags, detached from the scanner
 */
export interface Field {
  bytes: Uint8Array;
  offset: number;
  atRowStart: boolean;
  atRowEnd: boolean;
  isComment: boolean;
  isQuoted: boolean;
  isEmptyLine: boolean;
}
