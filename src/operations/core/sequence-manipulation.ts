/**
 * Core sequence manipulation operations
 *
 * Complement, reverse and reverse-complement with IUPAC ambiguity code
 * support, plus 1-based inclusive slicing.
 *
 * @module sequence-manipulation
 */

import { ValidationError } from "../../errors";

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * DNA complement mapping including IUPAC ambiguity codes
 */
const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
  U: "A",
  R: "Y",
  Y: "R", // Purines <-> Pyrimidines
  S: "S",
  W: "W", // Self-complementary
  K: "M",
  M: "K", // Keto <-> Amino
  B: "V",
  V: "B", // Not A <-> Not T
  D: "H",
  H: "D", // Not C <-> Not G
  N: "N",
  "-": "-",
  ".": ".",
  "*": "*",
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement a DNA sequence, preserving case
 *
 * Characters outside the IUPAC alphabet are kept as they are.
 *
 * @example
 * ```typescript
 * complement("ATcgN"); // "TAgcN"
 * ```
 */
export function complement(sequence: string): string {
  let result = "";
  for (const base of sequence) {
    const comp = DNA_COMPLEMENT_MAP[base.toUpperCase()];
    if (comp === undefined) {
      result += base;
    } else {
      result += base === base.toLowerCase() ? comp.toLowerCase() : comp;
    }
  }
  return result;
}

/**
 * Reverse a sequence
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Reverse complement a DNA sequence, preserving case
 *
 * @example
 * ```typescript
 * reverseComplement("AAcG"); // "CgTT"
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}

/**
 * Slice a sequence by 1-based inclusive coordinates
 *
 * @throws {ValidationError} If the interval is not within the sequence
 *
 * @example
 * ```typescript
 * extractRegion("ACGTACGT", 2, 4); // "CGT"
 * ```
 */
export function extractRegion(sequence: string, start: number, end: number): string {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
    throw new ValidationError(`Invalid interval ${start}-${end}`);
  }
  if (end > sequence.length) {
    throw new ValidationError(
      `Interval ${start}-${end} extends past sequence end (${sequence.length} bp)`
    );
  }
  return sequence.slice(start - 1, end);
}
