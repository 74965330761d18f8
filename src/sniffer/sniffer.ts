/**
 * @module sniffer/sniffer
 * @description Dialect detection from a sample of delimited text
 *
 * The sniffer ranks (separator, quote) candidates from byte statistics,
 * picks a comment prefix and an escape character by simple counts, then
 * confirms a candidate by scanning the sample and checking that rows have
 * a consistent column count.
 *
 * @example
 * ```typescript
 * const { parameters, verified } = sniff("a;b;c\n1;2;3\n");
 * // parameters: { separator: ";", quote: '"', escape: '"', comment: "#" }, verified: true
 * ```
 */

import { byteChar, charByte, concatBytes, countOccurrences, encode, LF, SPACE, startsWith, toBytes } from "../bytes";
import type { DialectParameters } from "../dialect";
import { ConfigurationError } from "../errors";
import { BufferSource } from "../scanner/sources";
import { createScanner, type Scanner } from "../scanner/scanner";
import {
  COMMENT_BONUS,
  COMMENT_SPACE_BONUS,
  COMMENT_START_BONUS,
  DEFAULT_COMMENTS,
  DEFAULT_ESCAPES,
  DEFAULT_QUOTES,
  DEFAULT_SEPARATORS,
  ESCAPE_SAME_AS_QUOTE,
} from "./constants";
import { collectStats, pairKey } from "./stats";
import type { DialectGuess, SepQuoteScore, SnifferOptions } from "./types";
import { validateSnifferOptions } from "./validation";

/**
 * Replace the sentinel by the quote it stands for
 */
function normalizeEscape(escape: string, quote: string): string {
  return escape === ESCAPE_SAME_AS_QUOTE ? quote : escape;
}

function formatDialect(parameters: DialectParameters): string {
  return Object.entries(parameters)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(" ");
}

// =============================================================================
// SNIFFER
// =============================================================================

export class Sniffer {
  private readonly data: Uint8Array;
  private readonly separators: readonly number[];
  private readonly quotes: readonly number[];
  private readonly escapes: readonly string[];
  private readonly comments: readonly string[];
  private readonly strict: boolean;
  private readonly onWarning: (warning: string) => void;

  /**
   * @throws {ConfigurationError} for malformed candidate sets
   */
  constructor(sample: Uint8Array | string, options: SnifferOptions = {}) {
    validateSnifferOptions(options);

    this.data = toBytes(sample);
    this.separators = (options.separators ?? DEFAULT_SEPARATORS).map(charByte);
    this.quotes = (options.quotes ?? DEFAULT_QUOTES).map(charByte);
    this.escapes = [...(options.escapes ?? DEFAULT_ESCAPES)];
    this.comments = [...(options.comments ?? DEFAULT_COMMENTS)];
    this.strict = options.strict ?? false;
    this.onWarning = options.onWarning ?? ((warning: string): void => console.warn(`Sniffer Warning: ${warning}`));
  }

  /**
   * Most probable full dialect
   *
   * Ranked candidates are first tried with verification. In strict mode an
   * unverifiable sample yields `parameters: null`; otherwise the top-ranked
   * candidate is returned with `verified: false`.
   */
  guessParameters(): DialectGuess {
    const comment = this.guessComment();
    const candidates = this.guessSepQuoteScore().map(({ separator, quote }) => ({
      separator,
      quote,
      escape: this.guessEscape(quote),
      comment,
    }));

    const verified = candidates.find((parameters) => verifyParameters(this.data, parameters));
    if (verified !== undefined) {
      return { parameters: verified, verified: true };
    }

    const fallback = candidates[0];
    if (this.strict || fallback === undefined) {
      return { parameters: null, verified: false };
    }

    this.onWarning(`could not verify dialect, using most probable: ${formatDialect(fallback)}`);
    return { parameters: fallback, verified: false };
  }

  /**
   * Every (separator, quote) combination ranked by score, highest first
   *
   * Never empty: a candidate set with no scoring member contributes its
   * first candidate (lenient) or `""` (strict) with a score of 0. Equal
   * scores keep enumeration order, quotes outermost.
   */
  guessSepQuoteScore(): SepQuoteScore[] {
    const stats = collectStats(this.data, this.separators, this.quotes);

    if (stats.separators.size === 0) {
      stats.separators.set(this.fallback(this.separators), 0);
    }
    if (stats.quotes.size === 0) {
      stats.quotes.set(this.fallback(this.quotes), 0);
    }

    const scores: SepQuoteScore[] = [];
    for (const [quote, quoteScore] of stats.quotes) {
      for (const [separator, separatorScore] of stats.separators) {
        scores.push({
          separator: byteChar(separator),
          quote: byteChar(quote),
          score: quoteScore + separatorScore + (stats.pairs.get(pairKey(separator, quote)) ?? 0),
        });
      }
    }

    return scores.sort((a, b) => b.score - a.score);
  }

  bestSepQuote(): { separator: string; quote: string } {
    const [best] = this.guessSepQuoteScore();
    if (best !== undefined) {
      return { separator: best.separator, quote: best.quote };
    }
    return {
      separator: byteChar(this.fallback(this.separators)),
      quote: byteChar(this.fallback(this.quotes)),
    };
  }

  /**
   * Most probable comment prefix: starting the sample scores 10, every
   * line starting with it 1 more, and 2 more when a space follows
   */
  guessComment(): string {
    const [first] = this.comments;
    if (first === undefined) {
      return "";
    }

    let max = 0;
    let best = first;
    for (const comment of this.comments) {
      const prefix = encode(comment);
      const atLineStart = concatBytes([Uint8Array.of(LF), prefix]);
      const withSpace = concatBytes([atLineStart, Uint8Array.of(SPACE)]);

      let score = startsWith(this.data, prefix) ? COMMENT_START_BONUS : 0;
      score += countOccurrences(this.data, atLineStart) * COMMENT_BONUS;
      score += countOccurrences(this.data, withSpace) * COMMENT_SPACE_BONUS;

      if (score > max) {
        max = score;
        best = comment;
      }
    }

    if (max === 0) {
      return this.strict ? "" : first;
    }
    return best;
  }

  /**
   * Most probable escape for `quote`, by counting which candidate precedes
   * quote occurrences in the sample
   */
  guessEscape(quote: string): string {
    const [first] = this.escapes;
    if (first === undefined) {
      return "";
    }
    if (this.escapes.length === 1 && !this.strict) {
      return normalizeEscape(first, quote);
    }

    const scores = new Map<string, number>();
    for (const escape of this.escapes) {
      scores.set(normalizeEscape(escape, quote), 0);
    }

    const quoteByte = charByte(quote);
    for (let i = 1; quoteByte !== 0 && i < this.data.length; i++) {
      if (this.data[i] !== quoteByte) {
        continue;
      }
      const before = byteChar(this.data[i - 1] ?? 0);
      const score = scores.get(before);
      if (score !== undefined) {
        scores.set(before, score + 1);
      }
    }

    let max = 0;
    let best = normalizeEscape(first, quote);
    for (const [escape, score] of scores) {
      if (score > max) {
        max = score;
        best = escape;
      }
    }

    if (max === 0 && this.strict) {
      return "";
    }
    return best;
  }

  private fallback(candidates: readonly number[]): number {
    const [first] = candidates;
    return first !== undefined && !this.strict ? first : 0;
  }
}

// =============================================================================
// VERIFICATION
// =============================================================================

/**
 * True when scanning `sample` with `parameters` gives a consistent column
 * count over more than one column
 *
 * Comments and empty lines are ignored. A row is checked against the first
 * when the row after it starts, so with three or more rows the last one is
 * never checked (it may be cut off by sampling); with exactly two rows the
 * second must match. One row, one column, a read failure or a dialect the
 * scanner rejects never verify.
 */
export function verifyParameters(sample: Uint8Array | string, parameters: DialectParameters): boolean {
  let scanner: Scanner;
  try {
    scanner = createScanner(new BufferSource(sample), parameters);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return false;
    }
    throw error;
  }

  let numCols = 0;
  let numRows = 0;
  let colsInThisRow = 0;

  while (scanner.scan()) {
    if (scanner.isComment || scanner.isEmptyLine) {
      continue;
    }
    if (scanner.atRowStart) {
      if (numRows > 1 && colsInThisRow !== numCols) {
        return false;
      }
      numRows++;
      colsInThisRow = 0;
    }
    if (numRows === 1) {
      numCols++;
    } else {
      colsInThisRow++;
    }
  }

  if (scanner.error !== undefined) {
    return false;
  }
  if (numRows > 2 && numCols > 1) {
    return true;
  }
  return numRows === 2 && numCols > 1 && colsInThisRow === numCols;
}

/**
 * Sniff a sample with one call
 */
export function sniff(sample: Uint8Array | string, options: SnifferOptions = {}): DialectGuess {
  return new Sniffer(sample, options).guessParameters();
}
