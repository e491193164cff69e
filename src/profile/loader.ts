/**
 * Job profile loading
 *
 * Reads a job profile JSON file and validates it. Fail-fast: read, parse
 * and validation errors all throw.
 */

import * as fs from "fs";
import * as path from "path";
import type { JobProfile } from "@/types";
import { validateJobProfile } from "@/utils/profileValidation";
import { JOB_PROFILE_EXTENSION, JOB_PROFILES_DIR } from "@/constants/jobProfile";

/**
 * Loads one job profile.
 *
 * The file name (without extension) is the title when the JSON has none.
 *
 * @param profilePath - Path to the JSON file, relative to the working directory or absolute
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {JobProfileValidationError} If validation fails
 */
export function loadJobProfile(profilePath: string): JobProfile {
  const resolved = path.resolve(process.cwd(), profilePath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);

  return validateJobProfile(raw, path.basename(resolved, JOB_PROFILE_EXTENSION));
}

/**
 * Lists profile files in a directory, sorted by file name.
 *
 * A missing directory yields an empty list.
 */
export function listJobProfiles(dir: string = JOB_PROFILES_DIR): string[] {
  const resolved = path.resolve(process.cwd(), dir);

  if (!fs.existsSync(resolved)) {
    return [];
  }

  const entries = fs.readdirSync(resolved);

  return entries
    .filter((name) => name.toLowerCase().endsWith(JOB_PROFILE_EXTENSION))
    .sort()
    .map((name) => path.join(resolved, name));
}
