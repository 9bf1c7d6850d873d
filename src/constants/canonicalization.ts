/**
 * Canonicalization patterns
 */

/**
 * Anything that is not a letter, number, combining mark or whitespace
 */
export const NON_WORD_CHARACTER_PATTERN = /[^\p{L}\p{M}\p{N}\s]/gu;

export const WHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * First 4-digit run, read as the release year
 */
export const YEAR_PATTERN = /\d{4}/;

/**
 * Year already in canonical suffix form: "... (1999)" at the end
 */
export const CANONICAL_YEAR_SUFFIX_PATTERN = /\((\d{4})\)\s*$/;

/**
 * Trailing file extension (".mkv", ".mp4") on an attachment file name
 */
export const FILE_EXTENSION_PATTERN = /\.[\p{L}\p{N}]{1,5}$/u;
