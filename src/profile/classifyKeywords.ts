/**
 * Keyword classification
 *
 * Turns a job profile into the mandatory / preferred / other sets used by
 * scoring, plus the de-duplicated pattern list handed to the matchers.
 */

import type { JobProfile, KeywordClassification } from "@/types";

/**
 * Error thrown when a profile yields no keywords at all.
 *
 * Ratios are undefined without keywords, so analysis is refused before
 * any matching starts.
 */
export class NoKeywordsConfiguredError extends Error {
  constructor(profileTitle?: string) {
    super(
      profileTitle
        ? `No keywords configured for job profile "${profileTitle}"`
        : "No keywords configured",
    );
    this.name = "NoKeywordsConfiguredError";
  }
}

/**
 * Builds the keyword classification for a profile.
 *
 * Priority: mandatory > preferred > other. A keyword listed as both
 * required and preferred is mandatory only.
 *
 * @throws {NoKeywordsConfiguredError} If all three lists are empty
 */
export function classifyKeywords(profile: JobProfile): KeywordClassification {
  const mandatory = new Set(profile.requiredSkills);
  const preferred = new Set(
    profile.preferredSkills.filter((keyword) => !mandatory.has(keyword)),
  );
  const other = new Set(
    profile.toolsAndFrameworks.filter(
      (keyword) => !mandatory.has(keyword) && !preferred.has(keyword),
    ),
  );

  const patterns = [...mandatory, ...preferred, ...other].sort();
  if (patterns.length === 0) {
    throw new NoKeywordsConfiguredError(profile.title);
  }

  return { mandatory, preferred, other, patterns };
}

/**
 * Asserts that a classification has something to search for.
 *
 * @throws {NoKeywordsConfiguredError} If the pattern list is empty
 */
export function assertHasKeywords(classification: KeywordClassification): void {
  if (classification.patterns.length === 0) {
    throw new NoKeywordsConfiguredError();
  }
}
