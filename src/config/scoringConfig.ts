/**
 * Scoring configuration
 *
 * Builds and validates the ScoringConfig from defaults and environment
 * variables. Invalid values are rejected before any document is read.
 */

import type { ScoringConfig } from "@/types";
import {
  DEFAULT_CASE_SENSITIVE,
  DEFAULT_MANDATORY_WEIGHT,
  DEFAULT_PENALTY_PERCENT,
  DEFAULT_PREFERRED_WEIGHT,
  MATCH_CASE_SENSITIVE_ENV,
  SCORING_MANDATORY_WEIGHT_ENV,
  SCORING_PENALTY_PERCENT_ENV,
  SCORING_PREFERRED_WEIGHT_ENV,
  WEIGHT_SUM_TOLERANCE,
} from "@/constants/scoring";

/**
 * Error thrown when scoring parameters are out of range.
 */
export class ScoringConfigError extends Error {
  constructor(message: string) {
    super(`Invalid scoring configuration: ${message}`);
    this.name = "ScoringConfigError";
  }
}

export const DEFAULT_SCORING_CONFIG: Readonly<ScoringConfig> = Object.freeze({
  mandatoryWeight: DEFAULT_MANDATORY_WEIGHT,
  preferredWeight: DEFAULT_PREFERRED_WEIGHT,
  penaltyPercent: DEFAULT_PENALTY_PERCENT,
  caseSensitive: DEFAULT_CASE_SENSITIVE,
});

function assertInRange(
  value: number,
  min: number,
  max: number,
  field: string,
): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ScoringConfigError(
      `${field} must be between ${min} and ${max}, got ${value}`,
    );
  }
}

/**
 * Checks weight ranges, the weight sum and the penalty range.
 *
 * @throws {ScoringConfigError} On the first violated rule
 */
export function validateScoringConfig(config: ScoringConfig): ScoringConfig {
  assertInRange(config.mandatoryWeight, 0, 1, "mandatoryWeight");
  assertInRange(config.preferredWeight, 0, 1, "preferredWeight");
  assertInRange(config.penaltyPercent, 0, 100, "penaltyPercent");

  const sum = config.mandatoryWeight + config.preferredWeight;
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ScoringConfigError(
      `mandatoryWeight + preferredWeight must equal 1.0, got ${sum}`,
    );
  }

  return config;
}

/**
 * Builds a validated config from defaults plus overrides.
 */
export function createScoringConfig(
  overrides: Partial<ScoringConfig> = {},
): ScoringConfig {
  return validateScoringConfig({ ...DEFAULT_SCORING_CONFIG, ...overrides });
}

function parseNumber(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ScoringConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseBoolean(
  raw: string | undefined,
  name: string,
): boolean | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  throw new ScoringConfigError(`${name} must be true or false, got "${raw}"`);
}

/**
 * Reads scoring parameters from the environment.
 *
 * When only one weight is set, the other becomes its complement so the
 * pair still sums to 1.0.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ScoringConfigError} If a value does not parse or is out of range
 */
export function loadScoringConfig(
  env: NodeJS.ProcessEnv = process.env,
): ScoringConfig {
  let mandatoryWeight = parseNumber(
    env[SCORING_MANDATORY_WEIGHT_ENV],
    SCORING_MANDATORY_WEIGHT_ENV,
  );
  let preferredWeight = parseNumber(
    env[SCORING_PREFERRED_WEIGHT_ENV],
    SCORING_PREFERRED_WEIGHT_ENV,
  );

  if (mandatoryWeight !== undefined && preferredWeight === undefined) {
    preferredWeight = 1 - mandatoryWeight;
  } else if (preferredWeight !== undefined && mandatoryWeight === undefined) {
    mandatoryWeight = 1 - preferredWeight;
  }

  const overrides: Partial<ScoringConfig> = {};
  if (mandatoryWeight !== undefined) overrides.mandatoryWeight = mandatoryWeight;
  if (preferredWeight !== undefined) overrides.preferredWeight = preferredWeight;

  const penaltyPercent = parseNumber(
    env[SCORING_PENALTY_PERCENT_ENV],
    SCORING_PENALTY_PERCENT_ENV,
  );
  if (penaltyPercent !== undefined) overrides.penaltyPercent = penaltyPercent;

  const caseSensitive = parseBoolean(
    env[MATCH_CASE_SENSITIVE_ENV],
    MATCH_CASE_SENSITIVE_ENV,
  );
  if (caseSensitive !== undefined) overrides.caseSensitive = caseSensitive;

  return createScoringConfig(overrides);
}
