/**
 * Writer module exports
 */

export { formatRows, MemorySink } from "./sinks";
export type { ByteSink, EnquotePolicy, FieldValue, LineEnding, WriterOptions } from "./types";
export {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_WRITER_COMMENT,
  DEFAULT_WRITER_QUOTE,
  DEFAULT_WRITER_SEPARATOR,
  type ResolvedWriterOptions,
  resolveWriterOptions,
  WriterOptionsSchema,
} from "./validation";
export { DSVWriter } from "./writer";
