/**
 * Document ranking
 *
 * Pure ordering helpers: score descending, then document id ascending so
 * equal scores always come out in the same order.
 */

import type { RankedDocument } from "@/types";

/**
 * Comparator for ranking entries.
 *
 * Ids compare by code unit, independent of the process locale.
 */
export function compareRanked(a: RankedDocument, b: RankedDocument): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.documentId < b.documentId) return -1;
  if (a.documentId > b.documentId) return 1;
  return 0;
}

/**
 * Returns a ranked copy of the entries.
 *
 * @example
 * rankDocuments([
 *   { documentId: "b", score: 52 },
 *   { documentId: "a", score: 80 },
 *   { documentId: "c", score: 80 },
 * ])
 * // [{ a, 80 }, { c, 80 }, { b, 52 }]
 */
export function rankDocuments<T extends RankedDocument>(
  entries: readonly T[],
): T[] {
  return [...entries].sort(compareRanked);
}
