/**
 * Whole-word boundary check shared by every search algorithm.
 *
 * A span is a whole word when neither neighbour is a letter or a number.
 * Text edges count as non-alphanumeric. Neighbours are read as full code
 * points, so an astral letter next to the span still blocks the match.
 */

const ALPHANUMERIC_PATTERN = /^[\p{L}\p{N}]$/u;

function isAlphanumeric(codePoint: number | undefined): boolean {
  if (codePoint === undefined) {
    return false;
  }
  return ALPHANUMERIC_PATTERN.test(String.fromCodePoint(codePoint));
}

function isHighSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdbff;
}

function isLowSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xdc00 && codeUnit <= 0xdfff;
}

/**
 * Code point ending right before `index`, or undefined at the start.
 */
function codePointBefore(text: string, index: number): number | undefined {
  if (index <= 0) {
    return undefined;
  }
  const last = text.charCodeAt(index - 1);
  if (
    isLowSurrogate(last) &&
    index >= 2 &&
    isHighSurrogate(text.charCodeAt(index - 2))
  ) {
    return text.codePointAt(index - 2);
  }
  return last;
}

/**
 * Returns true iff the half-open span [start, end) is not fused with an
 * adjacent letter or number.
 *
 * @example
 * isWordBoundary("use java daily", 4, 8) // true
 * isWordBoundary("javascript", 0, 4) // false ("s" follows)
 */
export function isWordBoundary(
  text: string,
  start: number,
  end: number,
): boolean {
  const before = codePointBefore(text, start);
  const after = end < text.length ? text.codePointAt(end) : undefined;
  return !isAlphanumeric(before) && !isAlphanumeric(after);
}
