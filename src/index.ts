/**
 * dsvkit - streaming tokenizer, serializer and dialect sniffer for
 * delimited text (CSV, TSV and their many variants)
 */

// Byte helpers
export { decode, encode, unescapeQuotes } from "./bytes";
// Dialect
export { type DialectParameters, DialectSchema, type ResolvedDialect, resolveDialect } from "./dialect";
// Error types
export {
  ConfigurationError,
  DsvError,
  FileError,
  PieceTooLongError,
  SourceReadError,
  WriteError,
} from "./errors";
// File I/O
export {
  DEFAULT_SAMPLE_SIZE,
  type ScanFileOptions,
  type SniffFileOptions,
  scanFile,
  sniffFile,
  writeFile,
} from "./io";
// Tokenizer
export {
  BufferSource,
  type ByteSource,
  type ChunkStream,
  createScanner,
  type Field,
  IterableSource,
  type QuoteMode,
  rows,
  Scanner,
  ScannerOptionsSchema,
  type ScannerOptions,
  scanStream,
} from "./scanner";
// Dialect sniffer
export {
  type DialectGuess,
  ESCAPE_SAME_AS_QUOTE,
  lenBOM,
  lenPreamble,
  type SepQuoteScore,
  Sniffer,
  type SnifferOptions,
  SnifferOptionsSchema,
  sniff,
  verifyParameters,
} from "./sniffer";
// Serializer
export {
  type ByteSink,
  DSVWriter,
  type EnquotePolicy,
  type FieldValue,
  formatRows,
  type LineEnding,
  MemorySink,
  type WriterOptions,
  WriterOptionsSchema,
} from "./writer";
