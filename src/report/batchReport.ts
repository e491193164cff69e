/**
 * Batch report
 *
 * Shapes a BatchResult for the JSON report sink and writes it to disk.
 */

import * as fs from "fs";
import * as path from "path";
import type { BatchReport, BatchResult } from "@/types";
import { ALGORITHM_LABELS } from "@/constants";
import { performanceEntries } from "@/signal/aggregation";

/**
 * Builds the report: documents in ranking order, then the batch summary.
 * Algorithms are keyed by display label.
 */
export function buildBatchReport(result: BatchResult): BatchReport {
  const algorithms: BatchReport["summary"]["algorithms"] = {};
  for (const [algorithm, totals] of performanceEntries(result.performance)) {
    algorithms[ALGORITHM_LABELS[algorithm]] = {
      comparisons: totals.comparisons,
      time_ms: totals.timeMs,
    };
  }

  return {
    documents: result.documents.map((evaluation) => ({
      document_id: evaluation.documentId,
      score: evaluation.score.weightedScore,
      penalty_applied: evaluation.score.penaltyApplied,
      results: evaluation.performance.map((entry) => ({
        algorithm: entry.label,
        time_ms: entry.timeMs,
        comparisons: entry.comparisons,
      })),
    })),
    summary: {
      documents_processed: result.documentsProcessed,
      documents_skipped: result.documentsSkipped,
      total_time_ms: result.totalTimeMs,
      algorithms,
    },
  };
}

/**
 * Writes the report as indented JSON, creating parent directories.
 *
 * @returns Absolute path of the written file
 */
export function writeBatchReport(reportPath: string, report: BatchReport): string {
  const resolved = path.resolve(process.cwd(), reportPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, JSON.stringify(report, null, 4) + "\n", "utf-8");
  return resolved;
}
