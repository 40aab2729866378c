/**
 * Promoter extraction operations
 *
 * BlastHitFilter → AnnotationLocator → RegionProjector → SequenceEmitter,
 * wired together by `extractPromoters`.
 */

export type { FeatureCandidate } from "./annotation-locator";
export { AnnotationLocator, featureCandidates, GenomeIndex } from "./annotation-locator";
export type { BlastFilterResult, HitEvaluation } from "./blast-filter";
export { BlastHitFilter, SelectedHitTable } from "./blast-filter";
export type { PromoterRunOptions, PromoterRunSummary, TaxonSummary } from "./promoters";
export { checkTaxonConsistency, extractPromoters } from "./promoters";
export type { ProjectableFeature } from "./region-projector";
export {
  MIN_WINDOW_SPAN,
  parseRegionMode,
  projectWindow,
  RegionProjector,
  rawWindow,
} from "./region-projector";
export { buildPromoterRecord, loadAssembly, SequenceEmitter } from "./sequence-emitter";
export { resolveSubjectId, SynonymTable } from "./synonyms";
export type {
  AnnotationLocatorOptions,
  BlastFilterOptions,
  CandidateSource,
  EmitResult,
  FeatureRecord,
  FilterStatistics,
  IdentifierOptions,
  MissingContig,
  PromoterWindow,
  RegionMode,
  RejectedWindow,
  SelectedHit,
  SequenceEmitterOptions,
  WindowProjection,
} from "./types";
export { REGION_MODES } from "./types";
