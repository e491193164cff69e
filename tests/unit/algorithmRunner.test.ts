/**
 * Unit tests for the algorithm runner
 *
 * Uses a counter clock so timings are exact.
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  findOccurrenceDisagreements,
  findRun,
  runAlgorithm,
  runAlgorithms,
} from "@/signal/runner";
import { kmpSearch, naiveSearch } from "@/signal/matcher";
import type { AlgorithmRunResult } from "@/types";
import { createCounterClock } from "../helpers/clock";

const TEXT = "python and sql";
const PATTERNS = ["python", "go", ""];

describe("runAlgorithms", () => {
  it("should return one run per algorithm in fixed order", () => {
    const runs = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });

    expect(runs.map((run) => run.algorithm)).toEqual(["naive", "rabin_karp", "kmp"]);
    expect(runs.map((run) => run.label)).toEqual([
      "Brute Force",
      "Rabin-Karp",
      "Knuth-Morris-Pratt (KMP)",
    ]);
  });

  it("should time each algorithm as one start/stop pair", () => {
    const runs = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });
    expect(runs.map((run) => run.timeMs)).toEqual([1, 1, 1]);
  });

  it("should report patterns in input order with agreeing occurrences", () => {
    const runs = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });

    for (const run of runs) {
      expect(run.patterns.map((outcome) => outcome.pattern)).toEqual(PATTERNS);
      expect(run.patterns.map((outcome) => outcome.occurrences)).toEqual([1, 0, 0]);
    }
  });

  it("should give empty patterns zero comparisons", () => {
    const runs = runAlgorithms(TEXT, [""], { clock: createCounterClock() });
    for (const run of runs) {
      expect(run.patterns).toEqual([{ pattern: "", occurrences: 0, comparisons: 0 }]);
      expect(run.totalComparisons).toBe(0);
    }
  });

  it("should total the per-pattern comparisons", () => {
    const runs = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });
    const kmp = findRun(runs, "kmp");

    const expected =
      kmpSearch(TEXT, "python").comparisons + kmpSearch(TEXT, "go").comparisons;
    expect(kmp.totalComparisons).toBe(expected);
  });

  it("should produce identical counts on repeated runs", () => {
    const first = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });
    const second = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });
    expect(second).toEqual(first);
  });

  it("should pass Rabin-Karp options through", () => {
    const run = runAlgorithm("rabin_karp", "abc abc", ["abc"], {
      clock: createCounterClock(),
      rabinKarp: { modulus: 1n },
    });
    expect(run.totalComparisons).toBe(14);
  });

  it("should clamp a backwards clock to zero", () => {
    let now = 10;
    const run = runAlgorithm("naive", TEXT, ["sql"], { clock: () => now-- });
    expect(run.timeMs).toBe(0);
    expect(run.totalComparisons).toBe(naiveSearch(TEXT, "sql").comparisons);
  });
});

describe("findRun", () => {
  it("should throw when the algorithm has no run", () => {
    expect(() => findRun([], "kmp")).toThrow('No run recorded for algorithm "kmp"');
  });
});

describe("findOccurrenceDisagreements", () => {
  function fakeRun(
    algorithm: AlgorithmRunResult["algorithm"],
    occurrences: number,
  ): AlgorithmRunResult {
    return {
      algorithm,
      label: algorithm,
      timeMs: 0,
      totalComparisons: 0,
      patterns: [
        { pattern: "go", occurrences: 1, comparisons: 0 },
        { pattern: "sql", occurrences, comparisons: 0 },
      ],
    };
  }

  it("should return nothing for agreeing runs", () => {
    const runs = runAlgorithms(TEXT, PATTERNS, { clock: createCounterClock() });
    expect(findOccurrenceDisagreements(runs)).toEqual([]);
  });

  it("should return nothing for an empty table", () => {
    expect(findOccurrenceDisagreements([])).toEqual([]);
  });

  it("should list patterns whose counts differ", () => {
    const runs = [fakeRun("naive", 2), fakeRun("rabin_karp", 2), fakeRun("kmp", 1)];
    expect(findOccurrenceDisagreements(runs)).toEqual([
      { pattern: "sql", occurrences: { naive: 2, rabin_karp: 2, kmp: 1 } },
    ]);
  });
});
