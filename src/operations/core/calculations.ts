/**
 * Alignment coverage calculations
 *
 * @module calculations
 */

import { ValidationError } from "../../errors";

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Round to a fixed number of decimal places, halves away from zero
 *
 * The scaled value is first cut to 15 significant digits so that binary
 * representation error (1.005 * 100 = 100.49999...) does not decide the
 * direction of a tie.
 *
 * @example
 * ```typescript
 * roundHalfAwayFromZero(12.25);  // 12.3
 * roundHalfAwayFromZero(-12.25); // -12.3
 * roundHalfAwayFromZero(1.005, 2); // 1.01
 * ```
 */
export function roundHalfAwayFromZero(value: number, decimals = 1): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Cannot round non-finite value ${value}`);
  }
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new ValidationError(`decimals must be a non-negative integer, got ${decimals}`);
  }

  const factor = 10 ** decimals;
  const scaled = Number((Math.abs(value) * factor).toPrecision(15));
  const rounded = Math.floor(scaled + 0.5) / factor;
  return value < 0 ? -rounded : rounded;
}

/**
 * Percentage of a sequence spanned by an alignment, to one decimal place
 *
 * @param alignmentLength Aligned length
 * @param sequenceLength Total length of the query or subject sequence
 * @throws {ValidationError} If the sequence length is not positive
 *
 * @example
 * ```typescript
 * coveragePercent(150, 400); // 37.5
 * coveragePercent(1, 3);     // 33.3
 * ```
 */
export function coveragePercent(alignmentLength: number, sequenceLength: number): number {
  if (!(sequenceLength > 0)) {
    throw new ValidationError(`Sequence length must be positive, got ${sequenceLength}`);
  }
  return roundHalfAwayFromZero((100 * alignmentLength) / sequenceLength, 1);
}

/**
 * Mean of accumulated values; 0 when nothing was accumulated
 */
export function mean(sum: number, count: number): number {
  return count === 0 ? 0 : sum / count;
}
