/**
 * Text preparation for search
 *
 * Text and patterns go through the same function so case folding can
 * never make one side unmatchable. No stemming, no diacritic stripping:
 * matching is exact on the folded strings.
 */

/**
 * Folds case unless the search is case-sensitive.
 *
 * @example
 * prepareForSearch("PyTorch", false) // "pytorch"
 * prepareForSearch("PyTorch", true) // "PyTorch"
 */
export function prepareForSearch(text: string, caseSensitive: boolean): string {
  return caseSensitive ? text : text.toLowerCase();
}

/**
 * Folds a list of patterns, keeping order and positions.
 */
export function preparePatterns(
  patterns: readonly string[],
  caseSensitive: boolean,
): string[] {
  return patterns.map((pattern) => prepareForSearch(pattern, caseSensitive));
}

/**
 * True when a value carries at least one non-whitespace character.
 */
export function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}
