/**
 * Document analysis
 *
 * Runs all three matchers over one document, scores it from the KMP
 * occurrence counts, and reports matched/missing keywords together with
 * each algorithm's cost.
 */

import type {
  AlgorithmPerformance,
  AlgorithmRunResult,
  AnalysisOptions,
  DocumentAnalysis,
  DocumentScore,
  KeywordClassification,
  ScoringConfig,
} from "@/types";
import { SCORING_ALGORITHM } from "@/constants";
import {
  findOccurrenceDisagreements,
  findRun,
  runAlgorithms,
} from "@/signal/runner";
import { presenceFromOutcomes, scoreDocument } from "@/signal/scorer";
import { assertHasKeywords } from "@/profile/classifyKeywords";
import { validateScoringConfig } from "@/config/scoringConfig";
import {
  hasText,
  prepareForSearch,
  preparePatterns,
} from "@/utils/text/textNormalization";
import * as logger from "@/logger";

/**
 * Error thrown when a single-document analysis gets no usable text.
 */
export class EmptyDocumentError extends Error {
  constructor(documentId?: string) {
    super(
      documentId
        ? `Document "${documentId}" has no text to analyze`
        : "Document has no text to analyze",
    );
    this.name = "EmptyDocumentError";
  }
}

/**
 * Result of evaluating one text: score plus raw runner output.
 */
export type TextEvaluation = {
  score: DocumentScore;
  runs: AlgorithmRunResult[];
  performance: AlgorithmPerformance[];
};

export function toPerformance(
  runs: readonly AlgorithmRunResult[],
): AlgorithmPerformance[] {
  return runs.map((run) => ({
    algorithm: run.algorithm,
    label: run.label,
    timeMs: run.timeMs,
    comparisons: run.totalComparisons,
  }));
}

/**
 * Matches and scores one text. No validation: callers check the
 * configuration and keywords once, before their first document.
 */
export function evaluateText(
  text: string,
  classification: KeywordClassification,
  config: ScoringConfig,
  options: AnalysisOptions = {},
): TextEvaluation {
  const searchText = prepareForSearch(text, config.caseSensitive);
  const patterns = preparePatterns(classification.patterns, config.caseSensitive);

  const runs = runAlgorithms(searchText, patterns, options);

  const disagreements = findOccurrenceDisagreements(runs);
  if (disagreements.length > 0) {
    logger.error("Search algorithms disagree on occurrence counts", {
      disagreements,
    });
  }

  const scoringRun = findRun(runs, SCORING_ALGORITHM);
  const presence = presenceFromOutcomes(
    classification.patterns,
    scoringRun.patterns,
  );
  const score = scoreDocument(presence, classification, config);

  return { score, runs, performance: toPerformance(runs) };
}

/**
 * Analyzes a single document.
 *
 * @param text - Extracted document text
 * @param classification - Keyword sets for the job profile
 * @param config - Scoring parameters
 * @param options - Clock / Rabin-Karp overrides
 * @throws {NoKeywordsConfiguredError} If there is nothing to search for
 * @throws {ScoringConfigError} If the config is out of range
 * @throws {EmptyDocumentError} If the text is blank
 */
export function analyzeDocument(
  text: string | null,
  classification: KeywordClassification,
  config: ScoringConfig,
  options: AnalysisOptions = {},
): DocumentAnalysis {
  assertHasKeywords(classification);
  validateScoringConfig(config);
  if (!hasText(text)) {
    throw new EmptyDocumentError();
  }

  const { score, runs, performance } = evaluateText(
    text,
    classification,
    config,
    options,
  );

  const scoringRun = findRun(runs, SCORING_ALGORITHM);
  const matchedKeywords: string[] = [];
  const missingKeywords: string[] = [];
  classification.patterns.forEach((keyword, index) => {
    if (scoringRun.patterns[index].occurrences > 0) {
      matchedKeywords.push(keyword);
    } else {
      missingKeywords.push(keyword);
    }
  });

  logger.debug("Document analyzed", {
    score: score.weightedScore,
    matched: matchedKeywords.length,
    missing: missingKeywords.length,
  });

  return {
    score,
    scoringAlgorithm: SCORING_ALGORITHM,
    matchedKeywords,
    missingKeywords,
    performance,
    runs,
  };
}
