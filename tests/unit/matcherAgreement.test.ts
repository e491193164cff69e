/**
 * Cross-algorithm properties
 *
 * All three matchers share the boundary rule, so they must agree on
 * occurrence counts for any input. Inputs come from a seeded generator
 * so failures are reproducible.
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  countOccurrences,
  contains,
  getMatcher,
  kmpSearch,
  naiveSearch,
  rabinKarpSearch,
} from "@/signal/matcher";
import { SEARCH_ALGORITHMS } from "@/constants";

/**
 * Linear congruential generator (deterministic per seed)
 */
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

function randomText(random: () => number, alphabet: string, maxLength: number): string {
  const length = Math.floor(random() * (maxLength + 1));
  let text = "";
  for (let k = 0; k < length; k++) {
    text += alphabet[Math.floor(random() * alphabet.length)];
  }
  return text;
}

const PATTERNS = ["a", "b", "ab", "aba", "a b", "bb", "abab", "b-a", ""];

describe("matcher agreement", () => {
  it("should agree on occurrences and full matches for random texts", () => {
    const random = createRandom(42);

    for (let round = 0; round < 200; round++) {
      const text = randomText(random, "ab -", 40);

      for (const pattern of PATTERNS) {
        const naive = naiveSearch(text, pattern);
        const rabinKarp = rabinKarpSearch(text, pattern);
        const colliding = rabinKarpSearch(text, pattern, { modulus: 3n });
        const kmp = kmpSearch(text, pattern);

        expect(rabinKarp.occurrences).toBe(naive.occurrences);
        expect(colliding.occurrences).toBe(naive.occurrences);
        expect(kmp.occurrences).toBe(naive.occurrences);

        expect(rabinKarp.fullMatches).toBe(naive.fullMatches);
        expect(kmp.fullMatches).toBe(naive.fullMatches);
      }
    }
  });

  it("should never count more comparisons on a prefix of the text", () => {
    const text = "abab abab ab aab";
    const pattern = "ab";

    for (const algorithm of SEARCH_ALGORITHMS) {
      const matcher = getMatcher(algorithm);
      let previous = 0;
      for (let end = 0; end <= text.length; end++) {
        const { comparisons } = matcher(text.slice(0, end), pattern);
        expect(comparisons).toBeGreaterThanOrEqual(previous);
        previous = comparisons;
      }
    }
  });

  it("should count zero occurrences when the pattern only appears inside words", () => {
    for (const algorithm of SEARCH_ALGORITHMS) {
      expect(countOccurrences(algorithm, "pythonic pythonista", "python").occurrences).toBe(0);
    }
  });
});

describe("getMatcher", () => {
  it("should bind Rabin-Karp options into the matcher", () => {
    const matcher = getMatcher("rabin_karp", { rabinKarp: { modulus: 1n } });
    expect(matcher("abc abc", "abc").comparisons).toBe(14);
  });
});

describe("contains", () => {
  it("should report presence of a whole-word occurrence", () => {
    expect(contains("kmp", "i like go.", "go")).toBe(true);
    expect(contains("naive", "i like golang", "go")).toBe(false);
  });
});
