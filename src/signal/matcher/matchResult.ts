import type { PatternMatchResult } from "@/types";

/**
 * Result for the degenerate inputs (empty pattern, pattern longer than
 * text). An empty pattern never "matches everywhere".
 */
export function noMatch(): PatternMatchResult {
  return { occurrences: 0, comparisons: 0, fullMatches: 0 };
}

export function isDegenerate(text: string, pattern: string): boolean {
  return pattern.length === 0 || pattern.length > text.length;
}
