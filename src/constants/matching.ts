/**
 * Matching constants
 *
 * Algorithm set, display labels and hashing parameters.
 */

import type { SearchAlgorithm } from "@/types";

/**
 * Every algorithm the runner executes, in execution and report order.
 */
export const SEARCH_ALGORITHMS: readonly SearchAlgorithm[] = [
  "naive",
  "rabin_karp",
  "kmp",
] as const;

/**
 * Human-readable names used in logs and reports.
 */
export const ALGORITHM_LABELS: Readonly<Record<SearchAlgorithm, string>> = {
  naive: "Brute Force",
  rabin_karp: "Rabin-Karp",
  kmp: "Knuth-Morris-Pratt (KMP)",
};

/**
 * Algorithm whose occurrence counts drive scoring.
 *
 * KMP never backtracks on the text, so it stays linear on large batches.
 */
export const SCORING_ALGORITHM: SearchAlgorithm = "kmp";

/**
 * Rabin-Karp polynomial base (one byte per step).
 */
export const RABIN_KARP_BASE = 256n;

/**
 * Rabin-Karp modulus: the Mersenne prime 2^61 - 1.
 *
 * Spurious hash hits are rare enough that verification cost tracks real
 * matches. Patterns of up to 7 single-byte characters hash without any
 * reduction, so they cannot collide at all.
 */
export const RABIN_KARP_MODULUS = 2305843009213693951n;
