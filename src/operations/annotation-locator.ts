/**
 * AnnotationLocator - find the annotated features behind selected hits
 *
 * Scans one genome's GFF3 features, builds the identifier spellings each
 * feature can be known by and records those that name a selected hit.
 */

import { ValidationError } from "../errors";
import { GffParser } from "../formats/gff";
import type { GffFeature } from "../formats/gff";
import type { FileReaderOptions, Logger } from "../types";
import type { SelectedHitTable } from "./blast-filter";
import type { AnnotationLocatorOptions, CandidateSource, FeatureRecord } from "./types";

/**
 * One identifier spelling tried against the selected hits
 */
export interface FeatureCandidate {
  readonly id: string;
  readonly source: CandidateSource;
}

/**
 * Matched features of one genome
 *
 * Records are keyed by (taxon, resolved id); a re-match replaces the record
 * but keeps the id's position in the order of first appearance.
 */
export class GenomeIndex {
  private readonly records = new Map<string, FeatureRecord>();

  constructor(readonly taxonId: string) {}

  /**
   * Store a record
   *
   * @returns true when the resolved id was not yet present
   */
  set(record: FeatureRecord): boolean {
    if (record.taxonId !== this.taxonId) {
      throw new ValidationError(
        `Record for taxon '${record.taxonId}' stored in index of '${this.taxonId}'`
      );
    }
    const isNew = !this.records.has(record.resolvedId);
    this.records.set(record.resolvedId, record);
    return isNew;
  }

  get(resolvedId: string): FeatureRecord | undefined {
    return this.records.get(resolvedId);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Resolved ids in order of first match
   */
  resolvedIds(): string[] {
    return [...this.records.keys()];
  }

  /**
   * Names of the contigs holding matched features
   */
  contigs(): Set<string> {
    return new Set([...this.records.values()].map((record) => record.seqId));
  }

  /**
   * Records grouped by contig; contigs and records both in order of first match
   */
  byContig(): Map<string, FeatureRecord[]> {
    const groups = new Map<string, FeatureRecord[]>();
    for (const record of this.records.values()) {
      const group = groups.get(record.seqId);
      if (group === undefined) {
        groups.set(record.seqId, [record]);
      } else {
        group.push(record);
      }
    }
    return groups;
  }
}

/**
 * Identifier spellings for a feature, in matching priority order
 *
 * `Name`, then `ID`, then (alternate-suffix mode) `${Name}.p`; each with a
 * `${taxonId}_` prefix in prefix mode. Features without an `ID` attribute
 * have no candidates.
 *
 * @example
 * ```typescript
 * featureCandidates({ ID: "g1", Name: "Abc" }, "Tx1", { usePrefix: true, altSuffix: true });
 * // [{ id: "Tx1_Abc", source: "Name" }, { id: "Tx1_g1", source: "ID" },
 * //  { id: "Tx1_Abc.p", source: "Name.p" }]
 * ```
 */
export function featureCandidates(
  attributes: Readonly<Record<string, string>>,
  taxonId: string,
  options: AnnotationLocatorOptions = {}
): FeatureCandidate[] {
  const id = attributes.ID;
  if (id === undefined || id === "") {
    return [];
  }

  const name = attributes.Name;
  const candidates: FeatureCandidate[] = [];
  if (name !== undefined && name !== "") {
    candidates.push({ id: name, source: "Name" });
  }
  candidates.push({ id, source: "ID" });
  if (options.altSuffix === true && name !== undefined && name !== "") {
    candidates.push({ id: `${name}.p`, source: "Name.p" });
  }

  return options.usePrefix === true
    ? candidates.map((candidate) => ({ ...candidate, id: `${taxonId}_${candidate.id}` }))
    : candidates;
}

/**
 * Feature matcher for selected hits
 *
 * @example
 * ```typescript
 * const locator = new AnnotationLocator(table, { usePrefix: true });
 * const index = await locator.locateFile("Tx1", "Tx1.gff3");
 * for (const [contig, features] of index.byContig()) {
 *   console.log(contig, features.map((f) => f.resolvedId));
 * }
 * ```
 */
export class AnnotationLocator {
  private readonly logger: Logger;

  constructor(
    private readonly selected: SelectedHitTable,
    private readonly options: AnnotationLocatorOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  /**
   * Match one feature; the first candidate naming a selected hit wins
   */
  match(feature: GffFeature, taxonId: string): FeatureRecord | undefined {
    for (const candidate of featureCandidates(feature.attributes, taxonId, this.options)) {
      const hit = this.selected.get(candidate.id);
      if (hit === undefined) continue;

      return {
        taxonId,
        seqId: feature.seqId,
        start: feature.start,
        end: feature.end,
        strand: feature.strand === "." ? hit.strand : feature.strand,
        resolvedId: candidate.id,
        subjectId: hit.subjectId,
        matchedBy: candidate.source,
        ...(feature.lineNumber !== undefined && { lineNumber: feature.lineNumber }),
      };
    }
    return undefined;
  }

  /**
   * Match every feature of one genome
   */
  async locate(
    taxonId: string,
    features: Iterable<GffFeature> | AsyncIterable<GffFeature>
  ): Promise<GenomeIndex> {
    const index = new GenomeIndex(taxonId);
    let scanned = 0;
    let withoutId = 0;
    let rematched = 0;

    for await (const feature of features) {
      scanned++;
      if (feature.attributes.ID === undefined) {
        withoutId++;
        continue;
      }

      const record = this.match(feature, taxonId);
      if (record !== undefined && !index.set(record)) {
        rematched++;
      }
    }

    this.logger.info(
      `[AnnotationLocator] ${taxonId}: ${index.size} of ${this.selected.size} selected ids located ` +
        `in ${scanned} features (${withoutId} without ID, ${rematched} re-matched)`
    );
    return index;
  }

  /**
   * Parse and match a GFF3 file
   *
   * Lines the parser cannot read (too few columns, unusable coordinates) are
   * logged and skipped.
   *
   * @throws {FileError} When the file cannot be read
   */
  async locateFile(taxonId: string, path: string, options?: FileReaderOptions): Promise<GenomeIndex> {
    const parser = new GffParser({
      onError: (error, lineNumber) => {
        this.logger.warn(`[AnnotationLocator] ${path}:${lineNumber ?? "?"}: ${error}; line skipped`);
      },
      onWarning: (warning, lineNumber) => {
        this.logger.warn(`[AnnotationLocator] ${path}:${lineNumber ?? "?"}: ${warning}`);
      },
    });
    return this.locate(taxonId, parser.parseFile(path, options));
  }
}
