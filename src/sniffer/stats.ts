/**
 * Separator and quote statistics
 *
 * One pass over the sample scores every candidate separator and quote, and
 * every (separator, quote) pair seen together. Quotes that open a field
 * (right after a separator or line start, possibly through spaces) and
 * separators that close a quoted field earn bonuses; a bare separator
 * earns one point per occurrence. Line feed behaves as a separator for
 * adjacency but is never scored itself.
 */

import { LF, SPACE } from "../bytes";
import { BESIDE_BONUS, FIRST_QUOTE_BONUS, SPACE_BONUS, VERY_FIRST_QUOTE_BONUS } from "./constants";

export interface TempStats {
  /** separator byte → score, in candidate order */
  readonly separators: Map<number, number>;
  /** quote byte → score, in candidate order */
  readonly quotes: Map<number, number>;
  /** {@link pairKey} → score */
  readonly pairs: Map<number, number>;
}

export function pairKey(separator: number, quote: number): number {
  return separator * 256 + quote;
}

function bump(map: Map<number, number>, key: number, amount: number): void {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function dropZeroScores(map: Map<number, number>): void {
  for (const [key, score] of map) {
    if (score === 0) {
      map.delete(key);
    }
  }
}

/**
 * Score candidates over `data`; candidates that never scored are removed,
 * so either map may come back empty
 */
export function collectStats(
  data: Uint8Array,
  separators: readonly number[],
  quotes: readonly number[]
): TempStats {
  const stats: TempStats = {
    separators: new Map(separators.map((sep) => [sep, 0])),
    quotes: new Map(quotes.map((quote) => [quote, 0])),
    pairs: new Map(),
  };

  if (data.length > 0) {
    scoreBytes(data, stats);
  }

  dropZeroScores(stats.quotes);
  dropZeroScores(stats.separators);
  dropZeroScores(stats.pairs);
  return stats;
}

function scoreBytes(data: Uint8Array, stats: TempStats): void {
  const { separators, quotes, pairs } = stats;

  let isFirstSep = true;
  let isFirstQuote = true;

  // line start counts as "after a separator"
  let prevChar = LF;
  let prevCharIsSep = true;
  let prevCharIsQuote = false;

  let prevNonSpace = LF;
  let prevNonSpaceIsSep = true;
  let prevNonSpaceIsQuote = false;

  const first = data[0] ?? 0;
  if (quotes.has(first)) {
    bump(quotes, first, VERY_FIRST_QUOTE_BONUS);
  }

  for (const c of data) {
    if (quotes.has(c)) {
      if (isFirstQuote && (prevCharIsSep || prevNonSpaceIsSep)) {
        bump(quotes, c, FIRST_QUOTE_BONUS);
        isFirstQuote = false;
      }
      if (prevCharIsSep) {
        bump(quotes, c, BESIDE_BONUS);
        if (prevChar !== LF) {
          bump(pairs, pairKey(prevChar, c), BESIDE_BONUS);
        }
      }
      if (prevNonSpaceIsSep) {
        bump(quotes, c, SPACE_BONUS);
        if (prevNonSpace !== LF) {
          bump(pairs, pairKey(prevNonSpace, c), SPACE_BONUS);
        }
      }
      prevChar = c;
      prevCharIsSep = false;
      prevCharIsQuote = true;
      prevNonSpace = c;
      prevNonSpaceIsSep = false;
      prevNonSpaceIsQuote = true;
      continue;
    }

    if (separators.has(c)) {
      bump(separators, c, 1);
      if (isFirstSep) {
        bump(separators, c, FIRST_QUOTE_BONUS);
        isFirstSep = false;
      }
      if (prevCharIsQuote) {
        bump(separators, c, BESIDE_BONUS);
        bump(pairs, pairKey(c, prevChar), BESIDE_BONUS);
      }
      if (prevNonSpaceIsQuote) {
        bump(separators, c, SPACE_BONUS);
        bump(pairs, pairKey(c, prevNonSpace), SPACE_BONUS);
      }
      prevChar = c;
      prevCharIsSep = true;
      prevCharIsQuote = false;
      prevNonSpace = c;
      prevNonSpaceIsSep = true;
      prevNonSpaceIsQuote = false;
      continue;
    }

    prevChar = c;
    prevCharIsSep = c === LF;
    prevCharIsQuote = false;
    if (c !== SPACE) {
      prevNonSpace = c;
      prevNonSpaceIsSep = c === LF;
      prevNonSpaceIsQuote = false;
    }
  }
}
