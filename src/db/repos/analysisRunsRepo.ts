/**
 * Analysis runs repository
 *
 * Data access layer for analysis_runs table.
 */

import type { AnalysisRun, AnalysisRunUpdate } from "@/types";
import { getDb } from "../connection";

/**
 * Create a new run in "running" state
 * Returns the run id
 */
export function createRun(profileTitle: string): number {
  const db = getDb();

  const result = db
    .prepare("INSERT INTO analysis_runs (profile_title) VALUES (?)")
    .run(profileTitle);

  return Number(result.lastInsertRowid);
}

const UPDATABLE_COLUMNS = [
  "finished_at",
  "status",
  "documents_total",
  "documents_processed",
  "documents_skipped",
  "total_time_ms",
  "notes",
] as const satisfies readonly (keyof AnalysisRunUpdate)[];

/**
 * Update/finish a run. Only fields present in `update` are written.
 */
export function finishRun(runId: number, update: AnalysisRunUpdate): void {
  const db = getDb();

  const fields: string[] = [];
  const values: (string | number | null)[] = [];

  for (const column of UPDATABLE_COLUMNS) {
    const value = update[column];
    if (value !== undefined) {
      fields.push(`${column} = ?`);
      values.push(value);
    }
  }

  if (fields.length === 0) {
    return; // Nothing to update
  }

  values.push(runId);
  db.prepare(`UPDATE analysis_runs SET ${fields.join(", ")} WHERE id = ?`).run(
    ...values,
  );
}

/**
 * Get run by id
 */
export function getRunById(id: number): AnalysisRun | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM analysis_runs WHERE id = ?").get(id) as
    | AnalysisRun
    | undefined;
}

/**
 * Most recent runs first
 */
export function listRecentRuns(limit = 20): AnalysisRun[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM analysis_runs ORDER BY id DESC LIMIT ?")
    .all(limit) as AnalysisRun[];
}
