/**
 * Algorithm dispatch
 *
 * Maps the closed SearchAlgorithm union to its matcher. Adding an
 * algorithm to the union without a case here fails the type-check.
 */

import type {
  PatternMatcher,
  PatternMatchResult,
  RabinKarpOptions,
  SearchAlgorithm,
} from "@/types";
import { naiveSearch } from "./naiveSearch";
import { rabinKarpSearch } from "./rabinKarpSearch";
import { kmpSearch } from "./kmpSearch";

export type MatcherOptions = {
  rabinKarp?: RabinKarpOptions;
};

/**
 * Returns the matcher for an algorithm, with any tuning bound in.
 */
export function getMatcher(
  algorithm: SearchAlgorithm,
  options: MatcherOptions = {},
): PatternMatcher {
  switch (algorithm) {
    case "naive":
      return naiveSearch;
    case "rabin_karp": {
      const rabinKarp = options.rabinKarp;
      return (text, pattern) => rabinKarpSearch(text, pattern, rabinKarp);
    }
    case "kmp":
      return kmpSearch;
    default: {
      const unknown: never = algorithm;
      throw new Error(`Unknown search algorithm: ${String(unknown)}`);
    }
  }
}

/**
 * Counts whole-word occurrences of a pattern with one algorithm.
 */
export function countOccurrences(
  algorithm: SearchAlgorithm,
  text: string,
  pattern: string,
  options?: MatcherOptions,
): PatternMatchResult {
  return getMatcher(algorithm, options)(text, pattern);
}

/**
 * Presence check: at least one whole-word occurrence.
 */
export function contains(
  algorithm: SearchAlgorithm,
  text: string,
  pattern: string,
  options?: MatcherOptions,
): boolean {
  return countOccurrences(algorithm, text, pattern, options).occurrences > 0;
}
