/**
 * Scoring configuration constants
 *
 * Defaults for the weighted score. Overridable through the environment
 * (see src/config/scoringConfig.ts).
 */

/** Weight of the mandatory keyword ratio */
export const DEFAULT_MANDATORY_WEIGHT = 0.7;

/** Weight of the preferred keyword ratio */
export const DEFAULT_PREFERRED_WEIGHT = 0.3;

/**
 * Penalty (percent) applied when any mandatory keyword is missing.
 *
 * A 20% penalty multiplies the weighted score by 0.80.
 */
export const DEFAULT_PENALTY_PERCENT = 20.0;

export const DEFAULT_CASE_SENSITIVE = false;

/**
 * Ratio reported for an empty keyword set (vacuously satisfied).
 */
export const EMPTY_SET_RATIO = 100;

/** Upper bound of every ratio and of the unpenalized score */
export const MAX_SCORE = 100;

/** Decimal places kept on ratios and scores */
export const SCORE_DECIMALS = 4;

/** Allowed drift when checking that the two weights sum to 1.0 */
export const WEIGHT_SUM_TOLERANCE = 1e-9;

/** Environment variable names */
export const SCORING_MANDATORY_WEIGHT_ENV = "SCORING_MANDATORY_WEIGHT";
export const SCORING_PREFERRED_WEIGHT_ENV = "SCORING_PREFERRED_WEIGHT";
export const SCORING_PENALTY_PERCENT_ENV = "SCORING_PENALTY_PERCENT";
export const MATCH_CASE_SENSITIVE_ENV = "MATCH_CASE_SENSITIVE";
