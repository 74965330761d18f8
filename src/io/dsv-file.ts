/**
 * @module io/dsv-file
 * @description Scanning, sniffing and writing delimited files on disk
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import { scanStream } from "../scanner/scanner";
import type { Field, ScannerOptions } from "../scanner/types";
import { resolveScannerOptions } from "../scanner/validation";
import { lenBOM, lenPreamble } from "../sniffer/preamble";
import { sniff } from "../sniffer/sniffer";
import type { DialectGuess, SnifferOptions } from "../sniffer/types";
import { formatRows } from "../writer/sinks";
import type { FieldValue, WriterOptions } from "../writer/types";
import { createStream, DEFAULT_READ_BUFFER_SIZE, readSample } from "./file-reader";
import { writeBytes } from "./file-writer";

/**
 * Bytes read from the head of a file for dialect detection (64KB)
 */
export const DEFAULT_SAMPLE_SIZE = 65_536;

export interface ScanFileOptions extends ScannerOptions {
  /** sniff the dialect from the file head; explicit dialect options are then ignored */
  autoDetect?: boolean;
  /** start scanning after the preamble; defaults to `autoDetect` */
  skipPreamble?: boolean;
  sampleSize?: number;
  bufferSize?: number;
  /** candidate sets used when `autoDetect` is on */
  sniffer?: Omit<SnifferOptions, "onWarning">;
  onWarning?: (warning: string) => void;
}

export interface SniffFileOptions extends SnifferOptions {
  sampleSize?: number;
}

export const FileOptionsSchema = type({
  "autoDetect?": "boolean",
  "skipPreamble?": "boolean",
  "sampleSize?": "number.integer>0",
  "bufferSize?": "number.integer>0",
});

function validateFileOptions(options: {
  autoDetect?: boolean;
  skipPreamble?: boolean;
  sampleSize?: number;
  bufferSize?: number;
}): void {
  const validation = FileOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid file options: ${validation.summary}`, "file");
  }
}

function defaultWarning(warning: string): void {
  console.warn(`DSV File Warning: ${warning}`);
}

/**
 * Sniff the dialect of a file from its first `sampleSize` bytes
 *
 * A preamble (text above the table ending in a blank line) and a UTF-8 BOM
 * are skipped before sniffing.
 *
 * @throws {FileError} if the file cannot be read
 */
export async function sniffFile(path: string, options: SniffFileOptions = {}): Promise<DialectGuess> {
  const { sampleSize = DEFAULT_SAMPLE_SIZE, ...snifferOptions } = options;
  validateFileOptions({ sampleSize });

  const sample = await readSample(path, sampleSize);
  return sniff(sample.subarray(lenPreamble(sample)), snifferOptions);
}

/**
 * Bytes to skip before scanning: the preamble as sniffing sees it, or just
 * the UTF-8 BOM
 */
async function leadingBytes(path: string, sampleSize: number, skipPreamble: boolean): Promise<number> {
  if (skipPreamble) {
    return lenPreamble(await readSample(path, sampleSize));
  }
  return lenBOM(await readSample(path, 3));
}

/**
 * Stream the fields of a file
 *
 * With `autoDetect` the dialect comes from {@link sniffFile}; when nothing
 * can be guessed the explicit options are used and a warning is reported.
 * A UTF-8 BOM is never scanned. With `skipPreamble` (the default under
 * `autoDetect`) scanning starts after the preamble found in the sample, and
 * field offsets count from there.
 *
 * @throws {FileError} if the file cannot be opened
 * @throws {SourceReadError} if reading fails part-way
 */
export async function* scanFile(path: string, options: ScanFileOptions = {}): AsyncGenerator<Field, void, undefined> {
  const {
    autoDetect = false,
    skipPreamble = autoDetect,
    sampleSize = DEFAULT_SAMPLE_SIZE,
    bufferSize = DEFAULT_READ_BUFFER_SIZE,
    sniffer,
    onWarning = defaultWarning,
    ...scannerOptions
  } = options;
  validateFileOptions({ autoDetect, skipPreamble, sampleSize, bufferSize });

  let effective: ScannerOptions = scannerOptions;
  if (autoDetect) {
    const { parameters } = await sniffFile(path, { ...sniffer, sampleSize, onWarning });
    if (parameters === null) {
      onWarning(`could not detect the dialect of ${path}, using the given options`);
    } else {
      effective = { ...scannerOptions, ...parameters, quoteMode: "fuzzy" };
    }
  }

  resolveScannerOptions(effective);
  const skip = await leadingBytes(path, sampleSize, skipPreamble);
  const stream = await createStream(path, bufferSize, skip);
  yield* scanStream(stream, effective);
}

/**
 * Serialize rows and write them to a file, replacing it
 *
 * @throws {ConfigurationError} for invalid writer options
 * @throws {FileError} if the file cannot be written
 */
export async function writeFile(
  path: string,
  rows: Iterable<readonly FieldValue[]>,
  options: WriterOptions = {}
): Promise<void> {
  await writeBytes(path, formatRows(rows, options));
}
