/**
 * Knuth-Morris-Pratt search
 *
 * The failure table lets the pattern cursor fall back without moving the
 * text cursor backwards. One comparison is counted per text/pattern probe.
 */

import type { PatternMatchResult } from "@/types";
import { isWordBoundary } from "./wordBoundary";
import { isDegenerate, noMatch } from "./matchResult";

/**
 * Builds the failure function (LPS table).
 *
 * lps[i] is the length of the longest proper prefix of pattern[0..i]
 * that is also a suffix of it.
 *
 * @example
 * buildLps("aabaa") // [0, 1, 0, 1, 2]
 */
export function buildLps(pattern: string): number[] {
  const m = pattern.length;
  const lps = new Array<number>(m).fill(0);
  let length = 0;
  let i = 1;

  while (i < m) {
    if (pattern.charCodeAt(i) === pattern.charCodeAt(length)) {
      length++;
      lps[i] = length;
      i++;
    } else if (length !== 0) {
      length = lps[length - 1];
    } else {
      lps[i] = 0;
      i++;
    }
  }

  return lps;
}

/**
 * After a full match the cursor falls back through the table whether or
 * not the boundary accepted it, so overlapping and adjacent occurrences
 * are still found.
 */
export function kmpSearch(text: string, pattern: string): PatternMatchResult {
  if (isDegenerate(text, pattern)) {
    return noMatch();
  }

  const n = text.length;
  const m = pattern.length;
  const lps = buildLps(pattern);

  let comparisons = 0;
  let occurrences = 0;
  let fullMatches = 0;
  let i = 0;
  let j = 0;

  while (i < n) {
    comparisons++;
    if (text.charCodeAt(i) === pattern.charCodeAt(j)) {
      i++;
      j++;
      if (j === m) {
        fullMatches++;
        if (isWordBoundary(text, i - m, i)) {
          occurrences++;
        }
        j = lps[j - 1];
      }
    } else if (j !== 0) {
      j = lps[j - 1];
    } else {
      i++;
    }
  }

  return { occurrences, comparisons, fullMatches };
}
