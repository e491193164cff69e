/**
 * Unit tests for scoring configuration
 *
 * Environment is passed explicitly, process.env is never touched.
 */

import { describe, it, expect } from "vitest";
import {
  createScoringConfig,
  DEFAULT_SCORING_CONFIG,
  loadScoringConfig,
  ScoringConfigError,
  validateScoringConfig,
} from "@/config";

describe("createScoringConfig", () => {
  it("should return the defaults", () => {
    expect(createScoringConfig()).toEqual({
      mandatoryWeight: 0.7,
      preferredWeight: 0.3,
      penaltyPercent: 20,
      caseSensitive: false,
    });
  });

  it("should apply overrides", () => {
    const config = createScoringConfig({
      mandatoryWeight: 0.5,
      preferredWeight: 0.5,
      caseSensitive: true,
    });
    expect(config.mandatoryWeight).toBe(0.5);
    expect(config.caseSensitive).toBe(true);
    expect(config.penaltyPercent).toBe(20);
  });

  it("should not mutate the defaults", () => {
    createScoringConfig({ penaltyPercent: 50 });
    expect(DEFAULT_SCORING_CONFIG.penaltyPercent).toBe(20);
  });
});

describe("validateScoringConfig", () => {
  it("should reject weights that do not sum to one", () => {
    const config = { ...DEFAULT_SCORING_CONFIG, preferredWeight: 0.5 };
    expect(() => validateScoringConfig(config)).toThrow(ScoringConfigError);
    expect(() => validateScoringConfig(config)).toThrow(
      "mandatoryWeight + preferredWeight must equal 1.0",
    );
  });

  it("should accept a sum within floating-point tolerance", () => {
    const config = { ...DEFAULT_SCORING_CONFIG, preferredWeight: 0.1 + 0.2 };
    expect(validateScoringConfig(config)).toBe(config);
  });

  it("should reject a weight outside [0, 1]", () => {
    expect(() => createScoringConfig({ mandatoryWeight: 1.5, preferredWeight: -0.5 })).toThrow(
      "Invalid scoring configuration: mandatoryWeight must be between 0 and 1, got 1.5",
    );
  });

  it("should reject a penalty outside [0, 100]", () => {
    expect(() => createScoringConfig({ penaltyPercent: 101 })).toThrow(
      "penaltyPercent must be between 0 and 100, got 101",
    );
    expect(() => createScoringConfig({ penaltyPercent: -1 })).toThrow(ScoringConfigError);
  });

  it("should reject non-finite values", () => {
    expect(() => createScoringConfig({ penaltyPercent: Number.NaN })).toThrow(
      ScoringConfigError,
    );
  });
});

describe("loadScoringConfig", () => {
  it("should return the defaults for an empty environment", () => {
    expect(loadScoringConfig({})).toEqual(createScoringConfig());
  });

  it("should derive the missing weight as the complement", () => {
    const config = loadScoringConfig({ SCORING_MANDATORY_WEIGHT: "0.6" });
    expect(config.mandatoryWeight).toBe(0.6);
    expect(config.preferredWeight).toBeCloseTo(0.4, 10);

    const fromPreferred = loadScoringConfig({ SCORING_PREFERRED_WEIGHT: "0.25" });
    expect(fromPreferred.mandatoryWeight).toBe(0.75);
  });

  it("should read the penalty and case sensitivity", () => {
    const config = loadScoringConfig({
      SCORING_PENALTY_PERCENT: "35",
      MATCH_CASE_SENSITIVE: "yes",
    });
    expect(config.penaltyPercent).toBe(35);
    expect(config.caseSensitive).toBe(true);
  });

  it("should treat blank values as unset", () => {
    expect(loadScoringConfig({ SCORING_PENALTY_PERCENT: "  " }).penaltyPercent).toBe(20);
  });

  it("should reject a value that is not a number", () => {
    expect(() => loadScoringConfig({ SCORING_PENALTY_PERCENT: "abc" })).toThrow(
      'SCORING_PENALTY_PERCENT must be a number, got "abc"',
    );
  });

  it("should reject an unknown boolean", () => {
    expect(() => loadScoringConfig({ MATCH_CASE_SENSITIVE: "maybe" })).toThrow(
      'MATCH_CASE_SENSITIVE must be true or false, got "maybe"',
    );
  });

  it("should reject a pair of weights that does not sum to one", () => {
    expect(() =>
      loadScoringConfig({
        SCORING_MANDATORY_WEIGHT: "0.5",
        SCORING_PREFERRED_WEIGHT: "0.6",
      }),
    ).toThrow(ScoringConfigError);
  });
});
