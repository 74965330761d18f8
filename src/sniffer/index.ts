/**
 * Sniffer module exports
 */

export {
  BESIDE_BONUS,
  COMMENT_BONUS,
  COMMENT_SPACE_BONUS,
  COMMENT_START_BONUS,
  DEFAULT_COMMENTS,
  DEFAULT_ESCAPES,
  DEFAULT_QUOTES,
  DEFAULT_SEPARATORS,
  ESCAPE_SAME_AS_QUOTE,
  FIRST_QUOTE_BONUS,
  SPACE_BONUS,
  VERY_FIRST_QUOTE_BONUS,
} from "./constants";
export { lenBOM, lenPreamble } from "./preamble";
export { Sniffer, sniff, verifyParameters } from "./sniffer";
export { collectStats, pairKey, type TempStats } from "./stats";
export type { DialectGuess, SepQuoteScore, SnifferOptions } from "./types";
export { SnifferOptionsSchema, validateSnifferOptions } from "./validation";
