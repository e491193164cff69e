/**
 * Document scores repository
 *
 * Data access layer for document_scores table.
 */

import type { DocumentScoreInput, DocumentScoreRow } from "@/types";
import { getDb } from "../connection";

/**
 * Insert all document scores of a run in one transaction
 */
export function insertDocumentScores(rows: readonly DocumentScoreInput[]): void {
  const db = getDb();

  const insert = db.prepare(`
    INSERT INTO document_scores
      (run_id, document_id, rank, score, mandatory_ratio, preferred_ratio, penalty_applied)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const insertAll = db.transaction((batch: readonly DocumentScoreInput[]) => {
    for (const row of batch) {
      insert.run(
        row.run_id,
        row.document_id,
        row.rank,
        row.score,
        row.mandatory_ratio,
        row.preferred_ratio,
        row.penalty_applied ? 1 : 0,
      );
    }
  });

  insertAll(rows);
}

/**
 * Scores of a run, best rank first
 */
export function listDocumentScores(runId: number): DocumentScoreRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM document_scores WHERE run_id = ? ORDER BY rank ASC")
    .all(runId) as DocumentScoreRow[];
}
