/**
 * Unit tests for report rendering and writing
 *
 * Writes only to a temp directory.
 */

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  buildBatchReport,
  formatAnalysisReport,
  writeAnalysisReport,
  writeBatchReport,
} from "@/report";
import { aggregateBatch } from "@/signal/aggregation";
import { classifyKeywords } from "@/profile";
import { createScoringConfig } from "@/config";
import type { DocumentAnalysis } from "@/types";
import { createCounterClock } from "../helpers/clock";

function sampleAnalysis(overrides: Partial<DocumentAnalysis> = {}): DocumentAnalysis {
  return {
    score: {
      mandatoryRatio: 50,
      preferredRatio: 100,
      weightedScore: 52,
      penaltyApplied: true,
      matchedMandatory: ["Python"],
      missingMandatory: ["SQL"],
      matchedPreferred: ["Go"],
      missingPreferred: [],
    },
    scoringAlgorithm: "kmp",
    matchedKeywords: ["Go", "Python"],
    missingKeywords: ["SQL"],
    performance: [
      { algorithm: "naive", label: "Brute Force", timeMs: 1.5, comparisons: 1234 },
      { algorithm: "rabin_karp", label: "Rabin-Karp", timeMs: 0.25, comparisons: 987 },
      {
        algorithm: "kmp",
        label: "Knuth-Morris-Pratt (KMP)",
        timeMs: 2,
        comparisons: 1000000,
      },
    ],
    runs: [],
    ...overrides,
  };
}

describe("formatAnalysisReport", () => {
  it("should render the full report", () => {
    expect(formatAnalysisReport(sampleAnalysis(), "Data Scientist")).toBe(
      [
        "Job profile: Data Scientist",
        "Relevance Score: 52.00%",
        "Mandatory: 50.00% | Preferred: 100.00% | Penalty applied: yes",
        "Scoring algorithm: Knuth-Morris-Pratt (KMP)",
        "",
        "Performance:",
        "- Brute Force: 1.5000 ms, 1,234 comparisons",
        "- Rabin-Karp: 0.2500 ms, 987 comparisons",
        "- Knuth-Morris-Pratt (KMP): 2.0000 ms, 1,000,000 comparisons",
        "",
        "Matched Keywords:",
        "- Go",
        "- Python",
        "",
        "Missing Keywords:",
        "- SQL",
        "",
      ].join("\n"),
    );
  });

  it("should omit the title line and mark empty lists", () => {
    const report = formatAnalysisReport(sampleAnalysis({ missingKeywords: [] }));
    const lines = report.split("\n");

    expect(lines[0]).toBe("Relevance Score: 52.00%");
    expect(lines.slice(-3)).toEqual(["Missing Keywords:", "- (none)", ""]);
  });
});

describe("buildBatchReport", () => {
  const classification = classifyKeywords({
    title: "Test Profile",
    requiredSkills: ["Python", "SQL"],
    preferredSkills: ["Go"],
    toolsAndFrameworks: [],
  });

  it("should list documents in ranking order with a summary", () => {
    const result = aggregateBatch(
      [
        { documentId: "b", text: "python and go" },
        { documentId: "a", text: "python sql" },
        { documentId: "c", text: null },
      ],
      classification,
      createScoringConfig(),
      { clock: createCounterClock() },
    );

    const report = buildBatchReport(result);

    expect(report.documents.map((doc) => [doc.document_id, doc.score, doc.penalty_applied])).toEqual([
      ["a", 70, false],
      ["b", 52, true],
    ]);
    expect(report.documents[0].results.map((entry) => entry.algorithm)).toEqual([
      "Brute Force",
      "Rabin-Karp",
      "Knuth-Morris-Pratt (KMP)",
    ]);
    expect(report.summary.documents_processed).toBe(2);
    expect(report.summary.documents_skipped).toBe(1);
    expect(report.summary.total_time_ms).toBe(13);
    expect(Object.keys(report.summary.algorithms)).toEqual([
      "Brute Force",
      "Rabin-Karp",
      "Knuth-Morris-Pratt (KMP)",
    ]);
    expect(report.summary.algorithms["Rabin-Karp"]).toEqual({
      comparisons: result.performance.rabin_karp.comparisons,
      time_ms: 2,
    });
  });
});

describe("report writers", () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("should write the batch report as indented JSON", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "keyword-report-"));
    const report = {
      documents: [],
      summary: {
        documents_processed: 0,
        documents_skipped: 0,
        total_time_ms: 0,
        algorithms: {},
      },
    };

    const written = writeBatchReport(path.join(tempDir, "nested", "report.json"), report);

    const content = fs.readFileSync(written, "utf-8");
    expect(JSON.parse(content)).toEqual(report);
    expect(content.startsWith('{\n    "documents": []')).toBe(true);
    expect(content.endsWith("}\n")).toBe(true);
  });

  it("should write the text report verbatim", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "keyword-report-"));
    const written = writeAnalysisReport(path.join(tempDir, "report.txt"), "Relevance Score: 1.00%\n");
    expect(fs.readFileSync(written, "utf-8")).toBe("Relevance Score: 1.00%\n");
  });
});
