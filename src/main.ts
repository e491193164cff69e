/**
 * Runner entrypoint: scores documents against a job profile
 *
 * Two modes:
 * - analyze: one document, text report with matched/missing keywords
 * - batch: every text document in a directory, ranked and persisted
 *
 * Usage:
 *   RUN_MODE=analyze DOCUMENT_PATH=data/documents/ada_lovelace.txt npm start
 *   RUN_MODE=batch DOCUMENTS_DIR=data/documents npm start
 *
 * Environment variables:
 *   - RUN_MODE: analyze|batch (defaults to batch)
 *   - JOB_PROFILE_PATH: job profile JSON (required)
 *   - DOCUMENT_PATH: document for analyze mode
 *   - DOCUMENTS_DIR: directory for batch mode (defaults to data/documents)
 *   - REPORT_PATH: report output (batch defaults to data/batch_report.json;
 *     analyze prints to stdout when unset)
 *   - SCORING_MANDATORY_WEIGHT, SCORING_PREFERRED_WEIGHT,
 *     SCORING_PENALTY_PERCENT, MATCH_CASE_SENSITIVE: scoring overrides
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - DB_PATH: SQLite run history (optional, defaults to data/app.db)
 */

import "dotenv/config";
import {
  DEFAULT_DOCUMENTS_DIR,
  DEFAULT_REPORT_PATH,
  DOCUMENT_PATH_ENV,
  DOCUMENTS_DIR_ENV,
  JOB_PROFILE_PATH_ENV,
  REPORT_PATH_ENV,
  RUN_MODE_ENV,
  RUN_MODES,
} from "./constants/runner";
import { loadScoringConfig } from "./config";
import { classifyKeywords, loadJobProfile } from "./profile";
import { readTextDocument, readTextDocuments } from "./documents";
import { analyzeDocument } from "./signal/analysis";
import { formatAnalysisReport, writeAnalysisReport } from "./report";
import { runDocumentBatch } from "./batch";
import { closeDb, migrateDb, openDb } from "./db";
import * as logger from "./logger";

type RunMode = (typeof RUN_MODES)[number];

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable ${name}`);
  }
  return value;
}

function runAnalyze(): void {
  const profile = loadJobProfile(requireEnv(JOB_PROFILE_PATH_ENV));
  const config = loadScoringConfig();
  const document = readTextDocument(requireEnv(DOCUMENT_PATH_ENV));

  const analysis = analyzeDocument(
    document.text,
    classifyKeywords(profile),
    config,
  );
  const report = formatAnalysisReport(analysis, profile.title);

  const reportPath = process.env[REPORT_PATH_ENV];
  if (reportPath) {
    const written = writeAnalysisReport(reportPath, report);
    logger.info("Analysis report written", {
      documentId: document.documentId,
      score: analysis.score.weightedScore,
      reportPath: written,
    });
  } else {
    process.stdout.write(report);
  }
}

async function runBatch(): Promise<void> {
  const profile = loadJobProfile(requireEnv(JOB_PROFILE_PATH_ENV));
  const config = loadScoringConfig();
  const documents = readTextDocuments(
    process.env[DOCUMENTS_DIR_ENV] || DEFAULT_DOCUMENTS_DIR,
  );

  migrateDb(openDb());
  try {
    const { result } = await runDocumentBatch({
      profile,
      documents,
      config,
      reportPath: process.env[REPORT_PATH_ENV] || DEFAULT_REPORT_PATH,
    });

    result.ranking.forEach((entry, index) => {
      logger.info(`#${index + 1} ${entry.documentId}`, { score: entry.score });
    });
  } finally {
    closeDb();
  }
}

async function main(): Promise<void> {
  const runMode = (process.env[RUN_MODE_ENV] || "batch").toLowerCase();

  if (!isRunMode(runMode)) {
    logger.error("Invalid RUN_MODE", { runMode, validModes: RUN_MODES });
    process.exit(1);
  }

  try {
    if (runMode === "analyze") {
      runAnalyze();
    } else {
      await runBatch();
    }
  } catch (error) {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

void main();
