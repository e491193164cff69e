/**
 * Algorithm stats repository
 *
 * Data access layer for algorithm_stats table.
 */

import type { AlgorithmStatsRow } from "@/types";
import { getDb } from "../connection";

/**
 * Insert the per-algorithm totals of a run
 */
export function insertAlgorithmStats(rows: readonly AlgorithmStatsRow[]): void {
  const db = getDb();

  const insert = db.prepare(
    "INSERT INTO algorithm_stats (run_id, algorithm, comparisons, time_ms) VALUES (?, ?, ?, ?)",
  );

  const insertAll = db.transaction((batch: readonly AlgorithmStatsRow[]) => {
    for (const row of batch) {
      insert.run(row.run_id, row.algorithm, row.comparisons, row.time_ms);
    }
  });

  insertAll(rows);
}

export function listAlgorithmStats(runId: number): AlgorithmStatsRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM algorithm_stats WHERE run_id = ? ORDER BY rowid ASC")
    .all(runId) as AlgorithmStatsRow[];
}
