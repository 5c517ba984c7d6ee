/**
 * Text normalization constants
 */

/**
 * Splits normalized (lowercase, diacritic-free) text into tokens.
 *
 * Everything that is not an ASCII letter or digit separates tokens, so
 * "contador/a" and "contador (a)" tokenize the same way.
 */
export const TOKEN_SEPARATOR_PATTERN = /[^a-z0-9]+/;
