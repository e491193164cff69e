/**
 * Run-wrapped document batch: glue for run lifecycle + batch aggregator
 *
 * Combines:
 * - Run lifecycle management (withRun)
 * - Batch scoring and matching (aggregateBatch)
 * - Persistence of ranked scores and algorithm totals
 * - Optional JSON report
 *
 * Per-document extraction failures do not throw; configuration errors and
 * DB errors do, and mark the run as failed.
 */

import type {
  AlgorithmStatsRow,
  AnalysisOptions,
  BatchResult,
  DocumentInput,
  DocumentScoreInput,
  JobProfile,
  ScoringConfig,
} from "@/types";
import { aggregateBatch, performanceEntries } from "@/signal/aggregation";
import { classifyKeywords } from "@/profile/classifyKeywords";
import { validateScoringConfig } from "@/config/scoringConfig";
import { insertAlgorithmStats, insertDocumentScores } from "@/db";
import { buildBatchReport, writeBatchReport } from "@/report";
import * as logger from "@/logger";
import { withRun } from "./runLifecycle";

export type RunDocumentBatchInput = {
  profile: JobProfile;
  documents: readonly DocumentInput[];
  config: ScoringConfig;
  /** When set, the JSON report is written here */
  reportPath?: string;
  options?: AnalysisOptions;
};

export type RunDocumentBatchResult = {
  runId: number;
  result: BatchResult;
  reportPath: string | null;
};

function toScoreRows(runId: number, result: BatchResult): DocumentScoreInput[] {
  return result.documents.map((evaluation, index) => ({
    run_id: runId,
    document_id: evaluation.documentId,
    rank: index + 1,
    score: evaluation.score.weightedScore,
    mandatory_ratio: evaluation.score.mandatoryRatio,
    preferred_ratio: evaluation.score.preferredRatio,
    penalty_applied: evaluation.score.penaltyApplied,
  }));
}

function toStatsRows(runId: number, result: BatchResult): AlgorithmStatsRow[] {
  return performanceEntries(result.performance).map(([algorithm, totals]) => ({
    run_id: runId,
    algorithm,
    comparisons: totals.comparisons,
    time_ms: totals.timeMs,
  }));
}

/**
 * Run a document batch with full lifecycle tracking
 *
 * The database must be open and migrated.
 *
 * @throws {NoKeywordsConfiguredError} If the profile has no keywords
 * @throws {ScoringConfigError} If the config is out of range
 */
export async function runDocumentBatch(
  input: RunDocumentBatchInput,
): Promise<RunDocumentBatchResult> {
  const { profile, documents, config, reportPath, options } = input;
  const log = logger.withContext({ profile: profile.title });

  // Preconditions are checked before a run row exists
  const classification = classifyKeywords(profile);
  validateScoringConfig(config);

  let capturedRunId = 0;

  const result = await withRun(profile.title, async (runId, acc) => {
    capturedRunId = runId;
    acc.counters.documents_total = documents.length;

    log.debug("Batch started", {
      runId,
      documents: documents.length,
      keywords: classification.patterns.length,
    });

    const batch = aggregateBatch(documents, classification, config, options);

    insertDocumentScores(toScoreRows(runId, batch));
    insertAlgorithmStats(toStatsRows(runId, batch));

    acc.counters.documents_processed = batch.documentsProcessed;
    acc.counters.documents_skipped = batch.documentsSkipped;
    acc.counters.total_time_ms = batch.totalTimeMs;

    if (batch.documentsSkipped > 0) {
      log.warn("Documents skipped: no extracted text", {
        runId,
        skipped: batch.skippedDocumentIds,
      });
    }

    return batch;
  });

  let writtenReportPath: string | null = null;
  if (reportPath) {
    writtenReportPath = writeBatchReport(reportPath, buildBatchReport(result));
  }

  // Final run summary: exactly one info log per run
  log.info("Run completed", {
    runId: capturedRunId,
    documentsProcessed: result.documentsProcessed,
    documentsSkipped: result.documentsSkipped,
    totalTimeMs: result.totalTimeMs,
    topDocument: result.ranking[0]?.documentId ?? null,
    reportPath: writtenReportPath,
  });

  return { runId: capturedRunId, result, reportPath: writtenReportPath };
}
