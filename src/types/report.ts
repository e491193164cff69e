/**
 * Report type definitions
 *
 * JSON shapes handed to the report sink. Field names are snake_case
 * because the files are read by tools outside this codebase.
 */

export type AlgorithmReportEntry = {
  algorithm: string;
  time_ms: number;
  comparisons: number;
};

export type DocumentReportEntry = {
  document_id: string;
  score: number;
  penalty_applied: boolean;
  results: AlgorithmReportEntry[];
};

export type BatchReportSummary = {
  documents_processed: number;
  documents_skipped: number;
  total_time_ms: number;
  algorithms: Record<string, { comparisons: number; time_ms: number }>;
};

export type BatchReport = {
  documents: DocumentReportEntry[];
  summary: BatchReportSummary;
};
