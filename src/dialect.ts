/**
 * Dialect parameters shared by the scanner, sniffer and writer
 *
 * A dialect is four strings. Separator, quote and escape are single ASCII
 * characters or `""` (disabled); the comment is a prefix of any length.
 * Internally everything runs on bytes, so a validated dialect is resolved
 * once into byte values and kept immutable.
 */

import { type } from "arktype";
import { charByte, encode } from "./bytes";
import { ConfigurationError } from "./errors";

// =============================================================================
// TYPES
// =============================================================================

export interface DialectParameters {
  separator: string;
  quote: string;
  escape: string;
  comment: string;
}

/**
 * Byte form of a validated dialect; 0 marks a disabled character
 */
export interface ResolvedDialect {
  readonly separator: number;
  readonly quote: number;
  readonly escape: number;
  readonly comment: Uint8Array;
}

export type DialectComponent = ConfigurationError["component"];

// =============================================================================
// VALIDATION
// =============================================================================

function isDialectChar(value: string): boolean {
  if (value.length === 0) {
    return true;
  }
  const code = value.charCodeAt(0);
  return value.length === 1 && code > 0 && code < 0x80;
}

function isLineBreak(value: string): boolean {
  return value === "\n" || value === "\r";
}

/**
 * Cross-field rules every component enforces
 */
export const DialectSchema = type({
  separator: "string",
  quote: "string",
  escape: "string",
  comment: "string",
}).narrow((dialect, ctx) => {
  for (const key of ["separator", "quote", "escape"] as const) {
    if (!isDialectChar(dialect[key])) {
      return ctx.reject({
        path: [key],
        expected: "a single ASCII character or an empty string",
        actual: JSON.stringify(dialect[key]),
      });
    }
  }

  if (dialect.separator === "\r") {
    return ctx.reject({
      path: ["separator"],
      expected: "a separator other than carriage return",
      actual: '"\\r"',
    });
  }

  for (const key of ["quote", "escape"] as const) {
    const value = dialect[key];
    if (value !== "" && (isLineBreak(value) || value === dialect.separator)) {
      return ctx.reject({
        path: [key, "separator"],
        expected: `${key} different from the separator and line breaks`,
        actual: JSON.stringify(value),
      });
    }
  }

  const { comment, separator } = dialect;
  if (comment.includes("\n") || comment.includes("\r") || (separator !== "" && comment.includes(separator))) {
    return ctx.reject({
      path: ["comment"],
      expected: "a comment prefix without the separator or line breaks",
      actual: JSON.stringify(comment),
    });
  }

  return true;
});

/**
 * Validate a dialect and convert it to bytes
 *
 * @throws {ConfigurationError} naming the component the dialect was given to
 */
export function resolveDialect(parameters: DialectParameters, component: DialectComponent): ResolvedDialect {
  const validation = DialectSchema(parameters);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid ${component} dialect: ${validation.summary}`, component);
  }

  return Object.freeze({
    separator: charByte(parameters.separator),
    quote: charByte(parameters.quote),
    escape: charByte(parameters.escape),
    comment: encode(parameters.comment),
  });
}
