/**
 * Lexical similarity: token-set ratio on a 0-100 scale
 *
 * Word order and repeated words do not matter: both strings are reduced to
 * sorted token sets, and the score is the best indel similarity among the
 * shared tokens and each side's shared-plus-own tokens.
 */

import { normalizeToTokens } from "@/utils";

/**
 * Length of the longest common subsequence of two strings
 */
function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Normalized indel similarity: 100 * 2 * LCS / (|a| + |b|), unrounded
 *
 * 0 when either string is empty.
 */
export function indelRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  return (200 * longestCommonSubsequence(a, b)) / (a.length + b.length);
}

function sortedTokenSet(text: string): string[] {
  return [...new Set(normalizeToTokens(text))].sort();
}

/**
 * Token-set similarity of two strings, 0-100 (integer)
 *
 * @example
 * tokenSetRatio("Asistente Administrativo", "ADMINISTRATIVO ASISTENTE") // 100
 * tokenSetRatio("", "contador") // 0
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = sortedTokenSet(a);
  const tokensB = sortedTokenSet(b);
  if (tokensA.length === 0 || tokensB.length === 0) {
    return 0;
  }

  const setB = new Set(tokensB);
  const setA = new Set(tokensA);
  const intersection = tokensA.filter((token) => setB.has(token));
  const onlyA = tokensA.filter((token) => !setB.has(token));
  const onlyB = tokensB.filter((token) => !setA.has(token));

  // One side's tokens all appear in the other
  if (intersection.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 100;
  }

  const shared = intersection.join(" ");
  const combinedA = [shared, onlyA.join(" ")].filter((part) => part.length > 0).join(" ");
  const combinedB = [shared, onlyB.join(" ")].filter((part) => part.length > 0).join(" ");

  const best = Math.max(
    indelRatio(shared, combinedA),
    indelRatio(shared, combinedB),
    indelRatio(combinedA, combinedB),
  );
  return Math.round(best);
}
