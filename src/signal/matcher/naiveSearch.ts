/**
 * Brute-force search
 *
 * Tries every start offset and compares left to right, stopping at the
 * first mismatch. Every character equality test counts as one comparison,
 * the failing one included. O(n·m) worst case.
 */

import type { PatternMatchResult } from "@/types";
import { isWordBoundary } from "./wordBoundary";
import { isDegenerate, noMatch } from "./matchResult";

export function naiveSearch(text: string, pattern: string): PatternMatchResult {
  if (isDegenerate(text, pattern)) {
    return noMatch();
  }

  const n = text.length;
  const m = pattern.length;
  let comparisons = 0;
  let occurrences = 0;
  let fullMatches = 0;

  for (let i = 0; i <= n - m; i++) {
    let j = 0;
    while (j < m) {
      comparisons++;
      if (text.charCodeAt(i + j) !== pattern.charCodeAt(j)) {
        break;
      }
      j++;
    }

    if (j === m) {
      fullMatches++;
      if (isWordBoundary(text, i, i + m)) {
        occurrences++;
      }
    }
  }

  return { occurrences, comparisons, fullMatches };
}
