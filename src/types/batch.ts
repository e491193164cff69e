/**
 * Batch and analysis type definitions
 *
 * Results of scoring one document, and of folding many documents into a
 * ranked list with aggregate algorithm performance.
 */

import type {
  AlgorithmRunResult,
  RunAlgorithmsOptions,
  SearchAlgorithm,
} from "./matching";
import type { DocumentScore } from "./scoring";

/**
 * Per-algorithm cost for one document.
 */
export type AlgorithmPerformance = {
  algorithm: SearchAlgorithm;
  label: string;
  timeMs: number;
  comparisons: number;
};

/**
 * Single-document analysis.
 */
export type DocumentAnalysis = {
  score: DocumentScore;
  /** Algorithm whose occurrence counts drove the score */
  scoringAlgorithm: SearchAlgorithm;
  /** Keywords found (profile spelling, pattern order) */
  matchedKeywords: string[];
  /** Keywords not found (profile spelling, pattern order) */
  missingKeywords: string[];
  performance: AlgorithmPerformance[];
  /** Full runner output, kept for reporting */
  runs: AlgorithmRunResult[];
};

/**
 * Evaluation of one document inside a batch.
 */
export type DocumentEvaluation = {
  documentId: string;
  score: DocumentScore;
  performance: AlgorithmPerformance[];
};

/**
 * Ranking entry: sorted by score desc, then documentId asc.
 */
export type RankedDocument = {
  documentId: string;
  score: number;
};

/**
 * Cumulative cost of one algorithm across a batch.
 */
export type AggregatePerformance = {
  comparisons: number;
  timeMs: number;
};

export type BatchResult = {
  ranking: RankedDocument[];
  /** Evaluations in ranking order */
  documents: DocumentEvaluation[];
  performance: Record<SearchAlgorithm, AggregatePerformance>;
  documentsProcessed: number;
  documentsSkipped: number;
  /** Ids of documents skipped for missing or blank text */
  skippedDocumentIds: string[];
  totalTimeMs: number;
};

export type AnalysisOptions = RunAlgorithmsOptions;
