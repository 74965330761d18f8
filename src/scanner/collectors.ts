/**
 * Field collectors
 *
 * A collector recognizes a field that may span several pieces: a comment
 * line (which can contain separators) or a quoted value (which can contain
 * separators and line breaks). `start` checks whether a piece opens such a
 * field and strips the opening marker; `end` checks whether a piece closes
 * it and strips the closing marker and terminator. Collectors hold no state
 * between calls.
 */

import { CR, LF, SPACE, startsWith, TAB } from "../bytes";

export type CollectorKind = "comment" | "strict-quote" | "fuzzy-quote";

export type StartResult = readonly [rest: Uint8Array, matched: boolean];

export type EndResult = readonly [rest: Uint8Array, done: boolean];

export interface Collector {
  readonly kind: CollectorKind;
  start(piece: Uint8Array): StartResult;
  end(piece: Uint8Array): EndResult;
}

// =============================================================================
// PIECE HELPERS
// =============================================================================

/**
 * Drop the terminating byte of a piece, and a carriage return before a
 * line feed
 */
export function removeSeparator(piece: Uint8Array): Uint8Array {
  const n = piece.length;
  if (n === 0) {
    return piece;
  }
  if (n >= 2 && piece[n - 1] === LF && piece[n - 2] === CR) {
    return piece.subarray(0, n - 2);
  }
  return piece.subarray(0, n - 1);
}

function isBlank(byte: number | undefined): boolean {
  return byte === SPACE || byte === TAB;
}

function trimRightBlanks(value: Uint8Array): Uint8Array {
  let end = value.length;
  while (end > 0 && isBlank(value[end - 1])) {
    end--;
  }
  return value.subarray(0, end);
}

/**
 * Closing-quote test: the value must end with a quote that is not escaped,
 * i.e. preceded by an even run of escape bytes
 */
function closeQuote(value: Uint8Array, quote: number, escape: number): EndResult {
  const n = value.length;
  if (n === 0 || value[n - 1] !== quote) {
    return [value, false];
  }
  let escaped = false;
  for (let i = n - 2; escape !== 0 && i >= 0 && value[i] === escape; i--) {
    escaped = !escaped;
  }
  if (escaped) {
    return [value, false];
  }
  return [value.subarray(0, n - 1), true];
}

// =============================================================================
// COLLECTORS
// =============================================================================

export function commentCollector(prefix: Uint8Array): Collector {
  return {
    kind: "comment",
    start: (piece) => (startsWith(piece, prefix) ? [piece.subarray(prefix.length), true] : [piece, false]),
    end: (piece) => (piece[piece.length - 1] === LF ? [removeSeparator(piece), true] : [piece, false]),
  };
}

/**
 * Quote must be the first byte and the closing quote must sit right
 * before the terminator
 */
export function strictQuoteCollector(quote: number, escape: number): Collector {
  return {
    kind: "strict-quote",
    start: (piece) => (piece[0] === quote ? [piece.subarray(1), true] : [piece, false]),
    end: (piece) => {
      const [rest, done] = closeQuote(removeSeparator(piece), quote, escape);
      return done ? [rest, true] : [piece, false];
    },
  };
}

/**
 * Like the strict collector, but spaces and tabs outside the quotes are
 * allowed and discarded
 */
export function fuzzyQuoteCollector(quote: number, escape: number): Collector {
  return {
    kind: "fuzzy-quote",
    start: (piece) => {
      let i = 0;
      while (isBlank(piece[i])) {
        i++;
      }
      return piece[i] === quote ? [piece.subarray(i + 1), true] : [piece, false];
    },
    end: (piece) => {
      const [rest, done] = closeQuote(trimRightBlanks(removeSeparator(piece)), quote, escape);
      return done ? [rest, true] : [piece, false];
    },
  };
}
