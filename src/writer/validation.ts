/**
 * @module writer/validation
 * @description Option schema for the writer and resolution of defaults
 */

import { type } from "arktype";
import { type ResolvedDialect, resolveDialect } from "../dialect";
import { ConfigurationError } from "../errors";
import type { EnquotePolicy, LineEnding, WriterOptions } from "./types";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_WRITER_SEPARATOR = ",";

export const DEFAULT_WRITER_QUOTE = '"';

export const DEFAULT_WRITER_COMMENT = "# ";

export const DEFAULT_BUFFER_SIZE = 4096;

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

export const WriterOptionsSchema = type({
  "separator?": "string",
  "quote?": "string",
  "escape?": "string",
  "comment?": "string",
  "enquote?": '"always"|"minimal"',
  "lineEnding?": type.enumerated("\n", "\r\n"),
  "bufferSize?": "number.integer>0",
}).narrow((options, ctx) => {
  const separator = options.separator ?? DEFAULT_WRITER_SEPARATOR;
  const quote = options.quote ?? DEFAULT_WRITER_QUOTE;
  const escape = options.escape ?? quote;

  if (separator === "" || separator === "\n") {
    return ctx.reject({
      path: ["separator"],
      expected: "a separator character other than line feed",
      actual: JSON.stringify(separator),
    });
  }

  if (quote === "" && options.enquote === "always") {
    return ctx.reject({
      path: ["enquote", "quote"],
      expected: "a quote character when every field is quoted",
      actual: "quoting disabled",
    });
  }

  if (quote !== "" && escape === "") {
    return ctx.reject({
      path: ["escape"],
      expected: "an escape character for embedded quotes",
      actual: '""',
    });
  }

  if (quote !== "" && options.comment?.includes(quote) === true) {
    return ctx.reject({
      path: ["comment", "quote"],
      expected: "a comment prefix without the quote character",
      actual: JSON.stringify(options.comment),
    });
  }

  return true;
});

// =============================================================================
// RESOLUTION
// =============================================================================

export interface ResolvedWriterOptions {
  readonly dialect: ResolvedDialect;
  readonly enquote: EnquotePolicy;
  readonly lineEnding: LineEnding;
  readonly bufferSize: number;
}

/**
 * @throws {ConfigurationError} for invalid or conflicting options
 */
export function resolveWriterOptions(options: WriterOptions): ResolvedWriterOptions {
  const validation = WriterOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid writer options: ${validation.summary}`, "writer");
  }

  const quote = options.quote ?? DEFAULT_WRITER_QUOTE;
  const dialect = resolveDialect(
    {
      separator: options.separator ?? DEFAULT_WRITER_SEPARATOR,
      quote,
      escape: options.escape ?? quote,
      comment: options.comment ?? DEFAULT_WRITER_COMMENT,
    },
    "writer"
  );

  return {
    dialect,
    enquote: options.enquote ?? "minimal",
    lineEnding: options.lineEnding ?? "\n",
    bufferSize: options.bufferSize ?? DEFAULT_BUFFER_SIZE,
  };
}
