/**
 * Sniffer Constants
 *
 * Candidate sets and scoring bonuses for dialect detection.
 */

// =============================================================================
// CANDIDATES
// =============================================================================

/**
 * Escape candidate standing for "the escape is the quote character itself"
 * (quotes doubled inside quoted fields)
 */
export const ESCAPE_SAME_AS_QUOTE = "same-as-quote";

export const DEFAULT_SEPARATORS: readonly string[] = Object.freeze([",", ";", "\t", "|", "&"]);

export const DEFAULT_QUOTES: readonly string[] = Object.freeze(['"', "'", "`"]);

export const DEFAULT_ESCAPES: readonly string[] = Object.freeze([ESCAPE_SAME_AS_QUOTE, "\\"]);

export const DEFAULT_COMMENTS: readonly string[] = Object.freeze(["#", "//"]);

// =============================================================================
// SEPARATOR / QUOTE BONUSES
// =============================================================================

/** Sample starts with a quote character */
export const VERY_FIRST_QUOTE_BONUS = 8;

/** First quote after a separator, and the first separator in the sample */
export const FIRST_QUOTE_BONUS = 4;

/** Separator and quote directly next to each other */
export const BESIDE_BONUS = 2;

/** Separator and quote with only spaces between them */
export const SPACE_BONUS = 1;

// =============================================================================
// COMMENT BONUSES
// =============================================================================

/** Sample starts with the comment prefix */
export const COMMENT_START_BONUS = 10;

/** A line starts with the prefix */
export const COMMENT_BONUS = 1;

/** A line starts with the prefix followed by a space */
export const COMMENT_SPACE_BONUS = 2;
