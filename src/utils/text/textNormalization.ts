/**
 * Text normalization and tokenization utilities
 *
 * Deterministic tokenization for lexical title matching. No stopword
 * removal, stemming or language detection.
 */

import { TOKEN_SEPARATOR_PATTERN } from "@/constants";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

/**
 * Normalizes text and splits it into tokens.
 *
 * Steps: lowercase, remove diacritics, split on anything that is not a
 * letter or digit, drop empty tokens.
 *
 * @example
 * normalizeToTokens("Asistente Administrativo/a (II)")
 * // ["asistente", "administrativo", "a", "ii"]
 *
 * normalizeToTokens("Técnico en Informática")
 * // ["tecnico", "en", "informatica"]
 */
export function normalizeToTokens(text: string): string[] {
  return removeDiacritics(text.toLowerCase())
    .split(TOKEN_SEPARATOR_PATTERN)
    .filter((token) => token.length > 0);
}
