/**
 * Matching type definitions
 *
 * Types for the exact-match search algorithms and the runner that
 * executes them side by side over one document.
 */

/**
 * Search algorithms available to the runner.
 *
 * Closed set: the dispatch table in the registry is keyed by this union.
 */
export type SearchAlgorithm = "naive" | "rabin_karp" | "kmp";

/**
 * Outcome of searching one pattern in one text with one algorithm.
 */
export type PatternMatchResult = {
  /** Whole-word occurrences (character match + boundary approval) */
  occurrences: number;
  /** Primitive comparisons performed by the algorithm */
  comparisons: number;
  /** Character-exact spans found, before the boundary filter */
  fullMatches: number;
};

/**
 * A matcher: pure function over (text, pattern).
 */
export type PatternMatcher = (
  text: string,
  pattern: string,
) => PatternMatchResult;

/**
 * Rabin-Karp tuning.
 *
 * The modulus only changes how often verification runs, never the
 * occurrence count.
 */
export type RabinKarpOptions = {
  base?: bigint;
  modulus?: bigint;
};

/**
 * Per-pattern row in an algorithm run.
 */
export type PatternOutcome = {
  /** Pattern as searched (already case-folded) */
  pattern: string;
  occurrences: number;
  comparisons: number;
};

/**
 * One algorithm's full pass over a pattern list.
 */
export type AlgorithmRunResult = {
  algorithm: SearchAlgorithm;
  /** Display name (e.g. "Brute Force") */
  label: string;
  /** Wall-clock time for the whole pattern list, in milliseconds */
  timeMs: number;
  /** Sum of comparisons over all patterns */
  totalComparisons: number;
  /** Per-pattern results, in input order */
  patterns: PatternOutcome[];
};

/**
 * Monotonic millisecond clock. Injected by tests for deterministic timings.
 */
export type Clock = () => number;

export type RunAlgorithmsOptions = {
  clock?: Clock;
  rabinKarp?: RabinKarpOptions;
};

/**
 * A pattern whose occurrence counts differ between algorithms.
 */
export type OccurrenceDisagreement = {
  pattern: string;
  occurrences: Partial<Record<SearchAlgorithm, number>>;
};
