/**
 * Scoring type definitions
 *
 * Types for keyword classification and the weighted document score.
 */

/**
 * Keyword classification derived from a job profile.
 *
 * Sets hold keywords as written in the profile. Mandatory wins over
 * preferred: `preferred` never contains a mandatory keyword, and
 * `other` holds keywords that are in neither scoring set.
 */
export type KeywordClassification = {
  mandatory: ReadonlySet<string>;
  preferred: ReadonlySet<string>;
  other: ReadonlySet<string>;
  /** Union of all three sets, de-duplicated and sorted */
  patterns: readonly string[];
};

/**
 * Scoring parameters.
 *
 * Invariant: mandatoryWeight + preferredWeight === 1.0
 */
export type ScoringConfig = {
  /** Weight of the mandatory ratio (default 0.70) */
  mandatoryWeight: number;
  /** Weight of the preferred ratio (default 0.30) */
  preferredWeight: number;
  /** Multiplicative penalty in percent when any mandatory keyword is missing */
  penaltyPercent: number;
  /** When false, text and patterns are lower-cased before matching */
  caseSensitive: boolean;
};

/**
 * Keyword presence for one document: keyword → matched.
 *
 * Keys are keywords as written in the profile.
 */
export type KeywordPresence = ReadonlyMap<string, boolean>;

/**
 * Weighted score for one document.
 */
export type DocumentScore = {
  /** Matched mandatory share, 0-100 */
  mandatoryRatio: number;
  /** Matched preferred share, 0-100 */
  preferredRatio: number;
  /** Final score after the penalty (if any) */
  weightedScore: number;
  /** True when at least one mandatory keyword is missing */
  penaltyApplied: boolean;
  matchedMandatory: string[];
  missingMandatory: string[];
  matchedPreferred: string[];
  missingPreferred: string[];
};
