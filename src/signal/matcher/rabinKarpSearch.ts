/**
 * Rabin-Karp search
 *
 * Rolling polynomial hash over a window of pattern length. Each window
 * costs one comparison for the hash check; when hashes are equal the
 * window is verified character by character (one comparison each) so a
 * spurious hash hit is never reported as a match.
 *
 * Hashes are bigint: with the default 2^61 - 1 modulus a number product
 * would lose precision.
 */

import type { PatternMatchResult, RabinKarpOptions } from "@/types";
import { RABIN_KARP_BASE, RABIN_KARP_MODULUS } from "@/constants";
import { isWordBoundary } from "./wordBoundary";
import { isDegenerate, noMatch } from "./matchResult";

/**
 * Reduces any bigint into [0, modulus).
 */
function mod(value: bigint, modulus: bigint): bigint {
  const remainder = value % modulus;
  return remainder < 0n ? remainder + modulus : remainder;
}

/**
 * base^exponent mod modulus by square-and-multiply.
 */
export function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = mod(1n, modulus);
  let factor = mod(base, modulus);
  let remaining = exponent;

  while (remaining > 0n) {
    if ((remaining & 1n) === 1n) {
      result = (result * factor) % modulus;
    }
    factor = (factor * factor) % modulus;
    remaining >>= 1n;
  }

  return result;
}

/**
 * Hash of the first `length` code units of `value`.
 */
export function polynomialHash(
  value: string,
  length: number,
  base: bigint,
  modulus: bigint,
): bigint {
  let hash = 0n;
  for (let k = 0; k < length; k++) {
    hash = (hash * base + BigInt(value.charCodeAt(k))) % modulus;
  }
  return hash;
}

/**
 * Slides the window one position: drops `outgoing`, appends `incoming`.
 */
function rollHash(
  hash: bigint,
  outgoing: number,
  incoming: number,
  leadingPower: bigint,
  base: bigint,
  modulus: bigint,
): bigint {
  // hash and the subtracted term are both in [0, modulus), so adding the
  // modulus keeps the difference non-negative
  const withoutLead =
    (hash - ((BigInt(outgoing) * leadingPower) % modulus) + modulus) % modulus;
  return (withoutLead * base + BigInt(incoming)) % modulus;
}

/**
 * @throws {RangeError} If the modulus is not positive
 */
export function rabinKarpSearch(
  text: string,
  pattern: string,
  options: RabinKarpOptions = {},
): PatternMatchResult {
  const modulus = options.modulus ?? RABIN_KARP_MODULUS;
  if (modulus <= 0n) {
    throw new RangeError(
      `Rabin-Karp modulus must be positive, got ${modulus.toString()}`,
    );
  }

  if (isDegenerate(text, pattern)) {
    return noMatch();
  }

  const base = mod(options.base ?? RABIN_KARP_BASE, modulus);
  const n = text.length;
  const m = pattern.length;
  const leadingPower = modPow(base, BigInt(m - 1), modulus);

  const patternHash = polynomialHash(pattern, m, base, modulus);
  let windowHash = polynomialHash(text, m, base, modulus);

  let comparisons = 0;
  let occurrences = 0;
  let fullMatches = 0;

  for (let i = 0; i <= n - m; i++) {
    comparisons++; // hash check

    if (windowHash === patternHash) {
      let j = 0;
      while (j < m) {
        comparisons++;
        if (text.charCodeAt(i + j) !== pattern.charCodeAt(j)) {
          break;
        }
        j++;
      }

      if (j === m) {
        fullMatches++;
        if (isWordBoundary(text, i, i + m)) {
          occurrences++;
        }
      }
    }

    if (i < n - m) {
      windowHash = rollHash(
        windowHash,
        text.charCodeAt(i),
        text.charCodeAt(i + m),
        leadingPower,
        base,
        modulus,
      );
    }
  }

  return { occurrences, comparisons, fullMatches };
}
