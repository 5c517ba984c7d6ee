/**
 * Strip combining marks after canonical decomposition
 *
 * "Técnico" becomes "Tecnico" and "Año" becomes "Ano". Characters with no
 * decomposition (ß, ø) pass through unchanged.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;

export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(COMBINING_MARKS, "");
}
