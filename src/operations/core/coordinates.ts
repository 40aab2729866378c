/**
 * Genomic interval utilities
 *
 * All intervals here are 1-based and inclusive, as in GFF3 and BLAST.
 *
 * @module coordinates
 */

// =============================================================================
// TYPES
// =============================================================================

/**
 * 1-based inclusive interval
 */
export interface Interval {
  readonly start: number;
  readonly end: number;
}

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Order two coordinates so that start <= end
 *
 * @example
 * ```typescript
 * normalizeInterval(900, 500); // { start: 500, end: 900 }
 * ```
 */
export function normalizeInterval(a: number, b: number): Interval {
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}

/**
 * Clamp a projected window to the bounds of its sequence
 *
 * A start at or below zero moves to 1. An end at or past the sequence
 * length moves to the sequence length; otherwise an end below 1 moves to 1.
 *
 * @example
 * ```typescript
 * clampToSequence({ start: -1001, end: 999 }, 10_000); // { start: 1, end: 999 }
 * ```
 */
export function clampToSequence(interval: Interval, sequenceLength: number): Interval {
  const start = interval.start <= 0 ? 1 : interval.start;
  let end = interval.end;
  if (end >= sequenceLength) {
    end = sequenceLength;
  } else if (end < 1) {
    end = 1;
  }
  return { start, end };
}

/**
 * Distance between the two ends of an interval (end - start)
 */
export function intervalSpan(interval: Interval): number {
  return interval.end - interval.start;
}

/**
 * Format an interval as `contig:start-end`
 */
export function formatRegion(contig: string, interval: Interval): string {
  return `${contig}:${interval.start}-${interval.end}`;
}
