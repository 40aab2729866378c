/**
 * RegionProjector - map a feature onto its flanking window
 *
 * Modes are strand-relative. On the `+` strand `D` takes the bases before
 * the feature start and `U` the bases after its end; on the `-` strand the
 * two swap. `B` spans both flanks and the feature on either strand.
 * Windows are clamped to the contig and rejected when end - start <= 4.
 */

import { ValidationError } from "../errors";
import type { OrientedStrand } from "../types";
import type { Interval } from "./core/coordinates";
import { clampToSequence, intervalSpan } from "./core/coordinates";
import type { RegionMode, WindowProjection } from "./types";
import { REGION_MODES } from "./types";

/** Windows whose end - start is at or below this are not extracted */
export const MIN_WINDOW_SPAN = 4;

/**
 * Feature coordinates needed for projection
 */
export interface ProjectableFeature {
  readonly start: number;
  readonly end: number;
  readonly strand: OrientedStrand;
}

/**
 * Validate a region mode flag value
 *
 * @throws {ValidationError} For anything but D, U or B
 */
export function parseRegionMode(value: string): RegionMode {
  const mode = REGION_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new ValidationError(
      `Unknown region mode '${value}'; expected one of ${REGION_MODES.join(", ")}`
    );
  }
  return mode;
}

/**
 * Raw (unclamped) window for a feature
 *
 * @example
 * ```typescript
 * rawWindow({ start: 1000, end: 1200, strand: "+" }, "D", 2000);
 * // { start: -1001, end: 999 }
 * ```
 */
export function rawWindow(feature: ProjectableFeature, mode: RegionMode, length: number): Interval {
  const before: Interval = { start: feature.start - length - 1, end: feature.start - 1 };
  const after: Interval = { start: feature.end + 1, end: feature.end + 1 + length };

  switch (mode) {
    case "B":
      return { start: before.start, end: after.end };
    case "D":
      return feature.strand === "+" ? before : after;
    case "U":
      return feature.strand === "+" ? after : before;
  }
}

/**
 * Project a feature onto its clamped flanking window
 *
 * A pure function of its arguments.
 *
 * @param feature Feature interval (start <= end) and strand
 * @param mode Flank selection
 * @param length Requested window length
 * @param sequenceLength Length of the contig the feature lies on
 * @throws {ValidationError} On a non-positive length or sequence length, or start > end
 *
 * @example
 * ```typescript
 * projectWindow({ start: 5, end: 5, strand: "+" }, "D", 2000, 10_000);
 * // { accepted: false, window: { start: 1, end: 4, strand: "+", length: 3 }, reason: ... }
 * ```
 */
export function projectWindow(
  feature: ProjectableFeature,
  mode: RegionMode,
  length: number,
  sequenceLength: number
): WindowProjection {
  if (!Number.isInteger(length) || length <= 0) {
    throw new ValidationError(`Window length must be a positive integer, got ${length}`);
  }
  if (!Number.isInteger(sequenceLength) || sequenceLength <= 0) {
    throw new ValidationError(`Sequence length must be a positive integer, got ${sequenceLength}`);
  }
  if (feature.start > feature.end) {
    throw new ValidationError(`Feature start ${feature.start} is after end ${feature.end}`);
  }

  const clamped = clampToSequence(rawWindow(feature, mode, length), sequenceLength);
  const window = { ...clamped, strand: feature.strand, length: intervalSpan(clamped) };

  if (window.length <= MIN_WINDOW_SPAN) {
    return {
      accepted: false,
      window,
      reason: `window ${window.start}-${window.end} spans ${window.length} (minimum ${MIN_WINDOW_SPAN + 1})`,
    };
  }
  return { accepted: true, window };
}

export const RegionProjector = {
  parseRegionMode,
  rawWindow,
  projectWindow,
} as const;
