/**
 * Sniffer type definitions
 */

import type { DialectParameters } from "../dialect";

/**
 * Candidate sets and behavior of a sniffer
 *
 * Separators and quotes are single ASCII characters. Escapes are single
 * characters or `ESCAPE_SAME_AS_QUOTE`. In strict mode anything that cannot
 * be established from the sample is reported as `""` (or `null` parameters)
 * instead of falling back to the first candidate.
 */
export interface SnifferOptions {
  separators?: readonly string[];
  quotes?: readonly string[];
  escapes?: readonly string[];
  comments?: readonly string[];
  strict?: boolean;
  onWarning?: (warning: string) => void;
}

export interface SepQuoteScore {
  separator: string;
  quote: string;
  score: number;
}

/**
 * Result of `guessParameters`: `verified` is true only when the parameters
 * produced a consistent column count over the sample
 */
export interface DialectGuess {
  parameters: DialectParameters | null;
  verified: boolean;
}
