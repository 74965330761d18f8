/**
 * @module scanner/validation
 * @description Option schema for the scanner and resolution of defaults
 */

import { type } from "arktype";
import { type DialectParameters, type ResolvedDialect, resolveDialect } from "../dialect";
import { ConfigurationError } from "../errors";
import {
  DEFAULT_COMMENT,
  DEFAULT_MAX_PIECE_SIZE,
  DEFAULT_QUOTE,
  DEFAULT_QUOTE_MODE,
  DEFAULT_SEPARATOR,
} from "./constants";
import type { QuoteMode, ScannerOptions } from "./types";

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

export const ScannerOptionsSchema = type({
  "separator?": "string",
  "quote?": "string",
  "escape?": "string",
  "comment?": "string",
  "quoteMode?": '"strict"|"fuzzy"',
  "maxPieceSize?": "number.integer>0",
});

// =============================================================================
// RESOLUTION
// =============================================================================

export interface ResolvedScannerOptions {
  readonly parameters: Readonly<DialectParameters>;
  readonly dialect: ResolvedDialect;
  readonly quoteMode: QuoteMode;
  readonly maxPieceSize: number;
}

/**
 * Validate options and fill in defaults
 *
 * @throws {ConfigurationError} for unknown shapes or a conflicting dialect
 */
export function resolveScannerOptions(options: ScannerOptions): ResolvedScannerOptions {
  const validation = ScannerOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid scanner options: ${validation.summary}`, "scanner");
  }

  const quote = options.quote ?? DEFAULT_QUOTE;
  const parameters: DialectParameters = Object.freeze({
    separator: options.separator ?? DEFAULT_SEPARATOR,
    quote,
    escape: options.escape ?? quote,
    comment: options.comment ?? DEFAULT_COMMENT,
  });

  return {
    parameters,
    dialect: resolveDialect(parameters, "scanner"),
    quoteMode: options.quoteMode ?? DEFAULT_QUOTE_MODE,
    maxPieceSize: options.maxPieceSize ?? DEFAULT_MAX_PIECE_SIZE,
  };
}
