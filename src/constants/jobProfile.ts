/**
 * Job profile constants
 */

/** Directory holding job profile JSON files */
export const JOB_PROFILES_DIR = "data/job_descriptions";

/** Extension of job profile files */
export const JOB_PROFILE_EXTENSION = ".json";
