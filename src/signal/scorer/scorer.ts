/**
 * Document scorer
 *
 * Converts keyword presence into a weighted relevance score (0-100).
 *
 * Scoring rules:
 * - mandatory ratio = matched mandatory / |mandatory| × 100 (100 when empty)
 * - preferred ratio = matched preferred / |preferred| × 100 (100 when empty)
 * - weighted = mandatory ratio × mandatoryWeight + preferred ratio × preferredWeight
 * - any mandatory keyword missing → weighted × (1 - penaltyPercent / 100)
 *
 * Keywords in the "other" set are searched for reporting but never scored.
 */

import type {
  DocumentScore,
  KeywordClassification,
  KeywordPresence,
  PatternOutcome,
  ScoringConfig,
} from "@/types";
import { EMPTY_SET_RATIO, MAX_SCORE, SCORE_DECIMALS } from "@/constants/scoring";

function roundScore(value: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Matched share of a keyword set, in percent.
 *
 * An empty set is vacuously satisfied: EMPTY_SET_RATIO, not a guard
 * against division by zero.
 */
function matchRatio(matched: number, total: number): number {
  if (total === 0) {
    return EMPTY_SET_RATIO;
  }
  return (matched / total) * MAX_SCORE;
}

function splitByPresence(
  keywords: ReadonlySet<string>,
  presence: KeywordPresence,
): { matched: string[]; missing: string[] } {
  const matched: string[] = [];
  const missing: string[] = [];
  for (const keyword of [...keywords].sort()) {
    if (presence.get(keyword) === true) {
      matched.push(keyword);
    } else {
      missing.push(keyword);
    }
  }
  return { matched, missing };
}

/**
 * Builds keyword presence from one algorithm's per-pattern outcomes.
 *
 * `keywords[k]` is the profile spelling of the pattern searched as
 * `outcomes[k]`; the two lists must line up.
 *
 * @throws {Error} If the lists differ in length
 */
export function presenceFromOutcomes(
  keywords: readonly string[],
  outcomes: readonly PatternOutcome[],
): Map<string, boolean> {
  if (keywords.length !== outcomes.length) {
    throw new Error(
      `Keyword/outcome length mismatch: ${keywords.length} keywords, ${outcomes.length} outcomes`,
    );
  }

  const presence = new Map<string, boolean>();
  keywords.forEach((keyword, index) => {
    presence.set(keyword, outcomes[index].occurrences > 0);
  });
  return presence;
}

/**
 * Computes the weighted score for one document.
 *
 * Pure function: presence in, score out. Keyword lists in the result are
 * sorted for stable reports.
 *
 * @example
 * // mandatory {Python, SQL}, preferred {Go}, weights 0.7/0.3, penalty 20%
 * // matched Python and Go → ratios 50 / 100, weighted 65, penalized 52
 */
export function scoreDocument(
  presence: KeywordPresence,
  classification: KeywordClassification,
  config: ScoringConfig,
): DocumentScore {
  const mandatory = splitByPresence(classification.mandatory, presence);
  const preferred = splitByPresence(classification.preferred, presence);

  const mandatoryRatio = matchRatio(
    mandatory.matched.length,
    classification.mandatory.size,
  );
  const preferredRatio = matchRatio(
    preferred.matched.length,
    classification.preferred.size,
  );

  let weightedScore =
    mandatoryRatio * config.mandatoryWeight +
    preferredRatio * config.preferredWeight;

  const penaltyApplied = mandatory.missing.length > 0;
  if (penaltyApplied) {
    weightedScore *= 1 - config.penaltyPercent / 100;
  }

  return {
    mandatoryRatio: roundScore(mandatoryRatio),
    preferredRatio: roundScore(preferredRatio),
    weightedScore: roundScore(weightedScore),
    penaltyApplied,
    matchedMandatory: mandatory.matched,
    missingMandatory: mandatory.missing,
    matchedPreferred: preferred.matched,
    missingPreferred: preferred.missing,
  };
}
