/**
 * Job profile type definitions
 *
 * A job profile is the keyword source for one analysis: three skill
 * lists, as stored in data/job_descriptions/*.json.
 */

/**
 * Raw profile shape as deserialized from JSON.
 */
export type JobProfileRaw = {
  title?: string;
  required_skills?: string[];
  preferred_skills?: string[];
  tools_and_frameworks?: string[];
};

/**
 * Validated profile. Missing lists are normalized to empty arrays.
 */
export type JobProfile = {
  /** Display title (falls back to the file name when loaded from disk) */
  title: string;
  requiredSkills: string[];
  preferredSkills: string[];
  toolsAndFrameworks: string[];
};
