/**
 * Shared types for the promoter extraction operations
 *
 * Hits flow through four stages: BlastHitFilter selects and resolves them,
 * AnnotationLocator ties them to annotated features, RegionProjector turns
 * each feature into a flanking window and SequenceEmitter cuts the window
 * out of the assembly.
 */

import type { FastaSequence, Logger, OrientedStrand } from "../types";

/**
 * Which flank(s) of a feature to extract, relative to its orientation
 *
 * - `D`: the flank before the feature start on its own strand
 * - `U`: the flank after the feature end on its own strand
 * - `B`: both flanks plus the feature itself
 */
export type RegionMode = "D" | "U" | "B";

export const REGION_MODES: readonly RegionMode[] = ["D", "U", "B"] as const;

/**
 * Identifier resolution settings. The hit filter and the locator must agree
 * on `usePrefix` for their identifiers to meet; `altSuffix` only affects
 * the locator.
 */
export interface IdentifierOptions {
  /** Qualify feature ids with their genome (`taxon_featureId`) */
  usePrefix?: boolean;
  /** Also try `${Name}.p` when matching annotation features */
  altSuffix?: boolean;
}

/**
 * Options for selecting BLAST hits
 *
 * All thresholds are inclusive percentages.
 */
export interface BlastFilterOptions extends Pick<IdentifierOptions, "usePrefix"> {
  /** Minimum query coverage (default: 10) */
  minQueryCoverage?: number;
  /** Minimum subject coverage (default: 10) */
  minSubjectCoverage?: number;
  /** Minimum percent identity (default: 10) */
  minIdentity?: number;
  logger?: Logger;
}

/**
 * A hit that passed every threshold, keyed by its resolved identifier
 */
export interface SelectedHit {
  readonly resolvedId: string;
  /** Subject identifier as written in the BLAST table */
  readonly subjectId: string;
  readonly strand: OrientedStrand;
  /** Subject interval, start <= end */
  readonly start: number;
  readonly end: number;
  readonly queryCoverage: number;
  readonly subjectCoverage: number;
  readonly percentIdentity: number;
  readonly lineNumber?: number;
}

/**
 * Aggregate figures for one pass over a BLAST table
 */
export interface FilterStatistics {
  readonly totalHits: number;
  readonly uniqueSubjects: number;
  readonly meanQueryCoverage: number;
  readonly meanSubjectCoverage: number;
  readonly meanIdentity: number;
  readonly passingQueryCoverage: number;
  readonly passingSubjectCoverage: number;
  readonly passingIdentity: number;
  /** Hits passing all three thresholds */
  readonly passingAll: number;
  /** Distinct resolved ids left after last-wins replacement */
  readonly selectedIds: number;
}

/**
 * Options for matching annotation features against selected hits
 */
export interface AnnotationLocatorOptions extends IdentifierOptions {
  logger?: Logger;
}

/**
 * Which spelling of a feature's identifiers matched a selected hit
 */
export type CandidateSource = "Name" | "ID" | "Name.p";

/**
 * An annotated feature matched to a selected hit
 */
export interface FeatureRecord {
  readonly taxonId: string;
  /** Contig the feature lies on */
  readonly seqId: string;
  readonly start: number;
  readonly end: number;
  readonly strand: OrientedStrand;
  readonly resolvedId: string;
  /** Original BLAST subject identifier */
  readonly subjectId: string;
  readonly matchedBy: CandidateSource;
  readonly lineNumber?: number;
}

/**
 * Flanking window cut from a contig, 1-based inclusive
 */
export interface PromoterWindow {
  readonly start: number;
  readonly end: number;
  readonly strand: OrientedStrand;
  /** end - start */
  readonly length: number;
}

/**
 * Outcome of projecting a feature onto its flanking window
 */
export type WindowProjection =
  | { readonly accepted: true; readonly window: PromoterWindow }
  | { readonly accepted: false; readonly window: PromoterWindow; readonly reason: string };

/**
 * A feature whose window was too short to extract
 */
export interface RejectedWindow {
  readonly taxonId: string;
  readonly seqId: string;
  readonly resolvedId: string;
  readonly window: PromoterWindow;
}

/**
 * A feature whose contig is absent from the assembly
 */
export interface MissingContig {
  readonly taxonId: string;
  readonly seqId: string;
  readonly resolvedId: string;
}

/**
 * Options for cutting promoter sequences
 */
export interface SequenceEmitterOptions {
  /** Flank selection (default: "D") */
  mode?: RegionMode;
  /** Window length (default: 2000) */
  length?: number;
  logger?: Logger;
}

/**
 * What one taxon contributed to the output
 */
export interface EmitResult {
  readonly records: FastaSequence[];
  readonly rejected: RejectedWindow[];
  readonly missing: MissingContig[];
}
