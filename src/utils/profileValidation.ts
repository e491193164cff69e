/**
 * Job profile validation module
 *
 * Validates job profile JSON and enforces invariants:
 * - Skill lists are arrays of non-empty strings when present
 * - Title, when present, is a non-empty string
 *
 * Validation is fail-fast: throws on the first error.
 */

import type { JobProfile } from "@/types";

/**
 * Error thrown when job profile validation fails.
 */
export class JobProfileValidationError extends Error {
  constructor(message: string) {
    super(`Job profile validation failed: ${message}`);
    this.name = "JobProfileValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates an optional skill list and returns its trimmed, de-duplicated
 * entries in first-seen order.
 *
 * @param value - Raw field value
 * @param fieldPath - Field name for error messages (e.g. "required_skills")
 */
function validateSkillList(value: unknown, fieldPath: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new JobProfileValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }

  const skills: string[] = [];
  value.forEach((entry: unknown, index: number) => {
    if (typeof entry !== "string") {
      throw new JobProfileValidationError(
        `${fieldPath}[${index}] must be a string, got ${typeof entry}`,
      );
    }
    const skill = entry.trim();
    if (skill.length === 0) {
      throw new JobProfileValidationError(
        `${fieldPath}[${index}] cannot be empty or whitespace-only`,
      );
    }
    if (!skills.includes(skill)) {
      skills.push(skill);
    }
  });

  return skills;
}

/**
 * Validates raw job profile data from JSON.
 *
 * @param raw - Parsed JSON
 * @param fallbackTitle - Title used when the profile has none
 * @returns The validated profile
 * @throws {JobProfileValidationError} On the first invalid field
 *
 * @example
 * validateJobProfile({ required_skills: ["Python"] }, "data_scientist")
 * // { title: "data_scientist", requiredSkills: ["Python"], preferredSkills: [], toolsAndFrameworks: [] }
 */
export function validateJobProfile(
  raw: unknown,
  fallbackTitle = "untitled",
): JobProfile {
  if (!isRecord(raw)) {
    throw new JobProfileValidationError("Job profile must be an object");
  }

  let title = fallbackTitle;
  if (raw.title !== undefined) {
    if (typeof raw.title !== "string" || raw.title.trim().length === 0) {
      throw new JobProfileValidationError("title must be a non-empty string");
    }
    title = raw.title.trim();
  }

  return {
    title,
    requiredSkills: validateSkillList(raw.required_skills, "required_skills"),
    preferredSkills: validateSkillList(raw.preferred_skills, "preferred_skills"),
    toolsAndFrameworks: validateSkillList(
      raw.tools_and_frameworks,
      "tools_and_frameworks",
    ),
  };
}
