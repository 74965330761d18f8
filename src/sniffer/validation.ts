/**
 * @module sniffer/validation
 * @description Option schema for the sniffer
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import { ESCAPE_SAME_AS_QUOTE } from "./constants";
import type { SnifferOptions } from "./types";

function isCandidateChar(value: string): boolean {
  const code = value.charCodeAt(0);
  return value.length === 1 && code > 0 && code < 0x80 && value !== "\n" && value !== "\r";
}

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

export const SnifferOptionsSchema = type({
  "separators?": "string[]",
  "quotes?": "string[]",
  "escapes?": "string[]",
  "comments?": "string[]",
  "strict?": "boolean",
}).narrow((options, ctx) => {
  for (const key of ["separators", "quotes"] as const) {
    const invalid = options[key]?.find((candidate) => !isCandidateChar(candidate));
    if (invalid !== undefined) {
      return ctx.reject({
        path: [key],
        expected: "single ASCII characters other than line breaks",
        actual: JSON.stringify(invalid),
      });
    }
  }

  const escape = options.escapes?.find(
    (candidate) => candidate !== ESCAPE_SAME_AS_QUOTE && !isCandidateChar(candidate)
  );
  if (escape !== undefined) {
    return ctx.reject({
      path: ["escapes"],
      expected: "single ASCII characters or ESCAPE_SAME_AS_QUOTE",
      actual: JSON.stringify(escape),
    });
  }

  const comment = options.comments?.find(
    (candidate) => candidate === "" || candidate.includes("\n") || candidate.includes("\r")
  );
  if (comment !== undefined) {
    return ctx.reject({
      path: ["comments"],
      expected: "non-empty prefixes without line breaks",
      actual: JSON.stringify(comment),
    });
  }

  return true;
});

/**
 * @throws {ConfigurationError} when the options do not match the schema
 */
export function validateSnifferOptions(options: SnifferOptions): void {
  const validation = SnifferOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid sniffer options: ${validation.summary}`, "sniffer");
  }
}
