/**
 * Batch aggregation
 *
 * Scores and matches every document of a corpus, then folds the results
 * into a ranking and per-algorithm totals.
 *
 * Two phases keep the output independent of evaluation order:
 * 1. Evaluate each document on its own (no shared mutable state)
 * 2. Merge: rank, then accumulate totals in ranking order
 *
 * A document only contributes once its evaluation has completed, so a
 * caller that stops iterating early leaves the totals consistent.
 */

import type {
  AggregatePerformance,
  AnalysisOptions,
  BatchResult,
  DocumentEvaluation,
  DocumentInput,
  KeywordClassification,
  ScoringConfig,
  SearchAlgorithm,
} from "@/types";
import { SEARCH_ALGORITHMS } from "@/constants";
import { defaultClock } from "@/signal/runner";
import { evaluateText } from "@/signal/analysis/analyzeDocument";
import { assertHasKeywords } from "@/profile/classifyKeywords";
import { validateScoringConfig } from "@/config/scoringConfig";
import { hasText } from "@/utils/text/textNormalization";
import * as logger from "@/logger";
import { rankDocuments } from "./rankDocuments";

/**
 * Zeroed per-algorithm accumulators.
 */
export function createPerformanceTotals(): Record<
  SearchAlgorithm,
  AggregatePerformance
> {
  return {
    naive: { comparisons: 0, timeMs: 0 },
    rabin_karp: { comparisons: 0, timeMs: 0 },
    kmp: { comparisons: 0, timeMs: 0 },
  };
}

/**
 * Merges independent document evaluations into a batch result.
 *
 * Pure and deterministic for a given set of evaluations, whatever order
 * they arrive in.
 */
export function mergeEvaluations(
  evaluations: readonly DocumentEvaluation[],
  skippedDocumentIds: readonly string[],
  totalTimeMs: number,
): BatchResult {
  const ranked = rankDocuments(
    evaluations.map((evaluation) => ({
      documentId: evaluation.documentId,
      score: evaluation.score.weightedScore,
      evaluation,
    })),
  );

  const performance = createPerformanceTotals();
  for (const { evaluation } of ranked) {
    for (const entry of evaluation.performance) {
      performance[entry.algorithm].comparisons += entry.comparisons;
      performance[entry.algorithm].timeMs += entry.timeMs;
    }
  }

  return {
    ranking: ranked.map(({ documentId, score }) => ({ documentId, score })),
    documents: ranked.map(({ evaluation }) => evaluation),
    performance,
    documentsProcessed: evaluations.length,
    documentsSkipped: skippedDocumentIds.length,
    skippedDocumentIds: [...skippedDocumentIds].sort(),
    totalTimeMs,
  };
}

/**
 * Runs scoring and all three matchers over a corpus.
 *
 * Documents with null or blank text are extraction failures: they are
 * skipped and counted, never fatal. A repeated document id is skipped the
 * same way; the first document with that id is the one evaluated.
 *
 * @param documents - (documentId, text) pairs from the document source
 * @param classification - Keyword sets shared by every document
 * @param config - Scoring parameters shared by every document
 * @param options - Clock / Rabin-Karp overrides
 * @throws {NoKeywordsConfiguredError} If there is nothing to search for
 * @throws {ScoringConfigError} If the config is out of range
 */
export function aggregateBatch(
  documents: Iterable<DocumentInput>,
  classification: KeywordClassification,
  config: ScoringConfig,
  options: AnalysisOptions = {},
): BatchResult {
  assertHasKeywords(classification);
  validateScoringConfig(config);

  const clock = options.clock ?? defaultClock;
  const batchStart = clock();

  const evaluations: DocumentEvaluation[] = [];
  const skippedDocumentIds: string[] = [];
  const seenDocumentIds = new Set<string>();

  for (const document of documents) {
    if (seenDocumentIds.has(document.documentId)) {
      skippedDocumentIds.push(document.documentId);
      logger.warn("Duplicate document id, keeping first document", {
        documentId: document.documentId,
      });
      continue;
    }
    seenDocumentIds.add(document.documentId);

    if (!hasText(document.text)) {
      skippedDocumentIds.push(document.documentId);
      logger.debug("Document skipped: no extracted text", {
        documentId: document.documentId,
      });
      continue;
    }

    const { score, performance } = evaluateText(
      document.text,
      classification,
      config,
      options,
    );
    evaluations.push({ documentId: document.documentId, score, performance });
  }

  const totalTimeMs = Math.max(0, clock() - batchStart);

  return mergeEvaluations(evaluations, skippedDocumentIds, totalTimeMs);
}

/**
 * Totals as [algorithm, totals] pairs, in report order.
 */
export function performanceEntries(
  performance: Record<SearchAlgorithm, AggregatePerformance>,
): [SearchAlgorithm, AggregatePerformance][] {
  return SEARCH_ALGORITHMS.map((algorithm) => [
    algorithm,
    performance[algorithm],
  ]);
}
