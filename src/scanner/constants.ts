/**
 * Scanner Constants
 *
 * Default dialect and limits for the streaming tokenizer.
 */

// =============================================================================
// DEFAULT DIALECT
// =============================================================================

export const DEFAULT_SEPARATOR = ",";

export const DEFAULT_QUOTE = '"';

export const DEFAULT_COMMENT = "#";

export const DEFAULT_QUOTE_MODE = "fuzzy";

// =============================================================================
// LIMITS
// =============================================================================

/**
 * Longest piece (bytes up to and including the next separator or line
 * break) the splitter will buffer: 1 MiB
 */
export const DEFAULT_MAX_PIECE_SIZE = 1_048_576;

/**
 * Consecutive empty reads after which a source is treated as stuck
 */
export const MAX_EMPTY_READS = 100;
