/**
 * Algorithm runner
 *
 * Runs every search algorithm over the same text and pattern list and
 * returns one uniform result table. Each algorithm's pass over the whole
 * pattern list is timed as a unit.
 */

import type {
  AlgorithmRunResult,
  Clock,
  OccurrenceDisagreement,
  PatternOutcome,
  RunAlgorithmsOptions,
  SearchAlgorithm,
} from "@/types";
import { ALGORITHM_LABELS, SEARCH_ALGORITHMS } from "@/constants";
import { getMatcher } from "@/signal/matcher";

/**
 * High-resolution wall clock in milliseconds.
 */
export const defaultClock: Clock = () => performance.now();

/**
 * Runs one algorithm over all patterns.
 *
 * Empty patterns produce (0, 0) and never count as matched.
 */
export function runAlgorithm(
  algorithm: SearchAlgorithm,
  text: string,
  patterns: readonly string[],
  options: RunAlgorithmsOptions = {},
): AlgorithmRunResult {
  const clock = options.clock ?? defaultClock;
  const matcher = getMatcher(algorithm, { rabinKarp: options.rabinKarp });

  const outcomes: PatternOutcome[] = [];
  let totalComparisons = 0;

  const start = clock();
  for (const pattern of patterns) {
    const { occurrences, comparisons } = matcher(text, pattern);
    outcomes.push({ pattern, occurrences, comparisons });
    totalComparisons += comparisons;
  }
  const elapsed = clock() - start;

  return {
    algorithm,
    label: ALGORITHM_LABELS[algorithm],
    timeMs: Math.max(0, elapsed),
    totalComparisons,
    patterns: outcomes,
  };
}

/**
 * Runs all algorithms, in SEARCH_ALGORITHMS order.
 */
export function runAlgorithms(
  text: string,
  patterns: readonly string[],
  options: RunAlgorithmsOptions = {},
): AlgorithmRunResult[] {
  return SEARCH_ALGORITHMS.map((algorithm) =>
    runAlgorithm(algorithm, text, patterns, options),
  );
}

/**
 * Picks one algorithm's run out of a result table.
 *
 * @throws {Error} If the table has no run for the algorithm
 */
export function findRun(
  runs: readonly AlgorithmRunResult[],
  algorithm: SearchAlgorithm,
): AlgorithmRunResult {
  const run = runs.find((r) => r.algorithm === algorithm);
  if (!run) {
    throw new Error(`No run recorded for algorithm "${algorithm}"`);
  }
  return run;
}

/**
 * Lists patterns whose occurrence counts differ between algorithms.
 *
 * Boundary semantics are shared, so this is empty for any correct run;
 * callers log a non-empty result as an internal fault.
 */
export function findOccurrenceDisagreements(
  runs: readonly AlgorithmRunResult[],
): OccurrenceDisagreement[] {
  if (runs.length === 0) {
    return [];
  }

  const disagreements: OccurrenceDisagreement[] = [];
  const patternCount = runs[0].patterns.length;

  for (let index = 0; index < patternCount; index++) {
    const occurrences: Partial<Record<SearchAlgorithm, number>> = {};
    const distinct = new Set<number>();

    for (const run of runs) {
      const outcome = run.patterns[index];
      if (outcome) {
        occurrences[run.algorithm] = outcome.occurrences;
        distinct.add(outcome.occurrences);
      }
    }

    if (distinct.size > 1) {
      disagreements.push({
        pattern: runs[0].patterns[index].pattern,
        occurrences,
      });
    }
  }

  return disagreements;
}
