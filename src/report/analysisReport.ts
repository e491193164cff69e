/**
 * Single-document text report
 */

import * as fs from "fs";
import * as path from "path";
import type { DocumentAnalysis } from "@/types";
import { ALGORITHM_LABELS } from "@/constants";

const THOUSANDS_PATTERN = /\B(?=(\d{3})+(?!\d))/g;

function formatCount(value: number): string {
  return String(value).replace(THOUSANDS_PATTERN, ",");
}

function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

function formatList(items: readonly string[]): string[] {
  return items.length === 0 ? ["- (none)"] : items.map((item) => `- ${item}`);
}

/**
 * Renders an analysis as plain text.
 *
 * @example
 * // Relevance Score: 52.00%
 * // Mandatory: 50.00% | Preferred: 100.00% | Penalty applied: yes
 * // Scoring algorithm: Knuth-Morris-Pratt (KMP)
 * // ...
 */
export function formatAnalysisReport(
  analysis: DocumentAnalysis,
  title?: string,
): string {
  const { score } = analysis;
  const lines: string[] = [];

  if (title) {
    lines.push(`Job profile: ${title}`);
  }
  lines.push(`Relevance Score: ${formatPercent(score.weightedScore)}`);
  lines.push(
    `Mandatory: ${formatPercent(score.mandatoryRatio)} | Preferred: ${formatPercent(score.preferredRatio)} | Penalty applied: ${score.penaltyApplied ? "yes" : "no"}`,
  );
  lines.push(`Scoring algorithm: ${ALGORITHM_LABELS[analysis.scoringAlgorithm]}`);
  lines.push("");

  lines.push("Performance:");
  for (const entry of analysis.performance) {
    lines.push(
      `- ${entry.label}: ${entry.timeMs.toFixed(4)} ms, ${formatCount(entry.comparisons)} comparisons`,
    );
  }
  lines.push("");

  lines.push("Matched Keywords:");
  lines.push(...formatList(analysis.matchedKeywords));
  lines.push("");

  lines.push("Missing Keywords:");
  lines.push(...formatList(analysis.missingKeywords));

  return lines.join("\n") + "\n";
}

/**
 * Writes a text report, creating parent directories.
 *
 * @returns Absolute path of the written file
 */
export function writeAnalysisReport(reportPath: string, content: string): string {
  const resolved = path.resolve(process.cwd(), reportPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, content, "utf-8");
  return resolved;
}
