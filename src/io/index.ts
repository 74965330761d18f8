/**
 * File I/O exports
 */

export {
  DEFAULT_SAMPLE_SIZE,
  FileOptionsSchema,
  type ScanFileOptions,
  type SniffFileOptions,
  scanFile,
  sniffFile,
  writeFile,
} from "./dsv-file";
export { createStream, DEFAULT_READ_BUFFER_SIZE, FilePathSchema, readSample, validatePath } from "./file-reader";
export { writeBytes } from "./file-writer";
export { getPlatform } from "./runtime";
