/**
 * Writer type definitions
 */

/**
 * `minimal` quotes only fields containing the quote, the separator or a
 * line break; `always` quotes every field
 */
export type EnquotePolicy = "always" | "minimal";

export type LineEnding = "\n" | "\r\n";

export interface WriterOptions {
  separator?: string;
  quote?: string;
  /** defaults to the quote character (quotes are doubled) */
  escape?: string;
  /** prefix written before every comment line */
  comment?: string;
  enquote?: EnquotePolicy;
  lineEnding?: LineEnding;
  /** bytes buffered before the sink is written to */
  bufferSize?: number;
}

/**
 * Destination of serialized bytes; may throw
 */
export interface ByteSink {
  write(chunk: Uint8Array): void;
}

export type FieldValue = string | Uint8Array;
