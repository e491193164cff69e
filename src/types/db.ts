/**
 * Database type definitions
 *
 * Types for run history rows. Aligned with migrations/0001_init.sql.
 */

import type { SearchAlgorithm } from "./matching";

export type RunStatus = "running" | "success" | "failure";

/**
 * One batch analysis run (analysis_runs table)
 */
export type AnalysisRun = {
  id: number;
  profile_title: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  documents_total: number | null;
  documents_processed: number | null;
  documents_skipped: number | null;
  total_time_ms: number | null;
  notes: string | null;
};

export type AnalysisRunUpdate = {
  finished_at?: string;
  status?: RunStatus;
  documents_total?: number;
  documents_processed?: number;
  documents_skipped?: number;
  total_time_ms?: number;
  notes?: string | null;
};

/**
 * Per-document score row (document_scores table)
 */
export type DocumentScoreRow = {
  run_id: number;
  document_id: string;
  rank: number;
  score: number;
  mandatory_ratio: number;
  preferred_ratio: number;
  penalty_applied: number; // SQLite boolean (0/1)
};

export type DocumentScoreInput = Omit<DocumentScoreRow, "penalty_applied"> & {
  penalty_applied: boolean;
};

/**
 * Aggregate algorithm cost for a run (algorithm_stats table)
 */
export type AlgorithmStatsRow = {
  run_id: number;
  algorithm: SearchAlgorithm;
  comparisons: number;
  time_ms: number;
};

/**
 * Mutable counters filled in while a run executes
 */
export type RunAccumulator = {
  counters: {
    documents_total: number;
    documents_processed: number;
    documents_skipped: number;
    total_time_ms: number;
  };
};
