/**
 * Scanner module exports
 */

export {
  type Collector,
  type CollectorKind,
  commentCollector,
  type EndResult,
  fuzzyQuoteCollector,
  removeSeparator,
  type StartResult,
  strictQuoteCollector,
} from "./collectors";
export {
  DEFAULT_COMMENT,
  DEFAULT_MAX_PIECE_SIZE,
  DEFAULT_QUOTE,
  DEFAULT_QUOTE_MODE,
  DEFAULT_SEPARATOR,
  MAX_EMPTY_READS,
} from "./constants";
export { type ChunkStream, createScanner, rows, Scanner, scanStream } from "./scanner";
export { BufferSource, IterableSource } from "./sources";
export { ChunkSplitter } from "./splitter";
export { type AdvanceResult, FieldStateMachine } from "./state-machine";
export type { ByteSource, Field, QuoteMode, ScannerOptions } from "./types";
export { ScannerOptionsSchema, type ResolvedScannerOptions, resolveScannerOptions } from "./validation";
