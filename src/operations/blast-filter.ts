/**
 * BlastHitFilter - select BLAST hits by coverage and identity
 *
 * Each hit gets query and subject coverage computed from its lengths, is
 * tested against three inclusive thresholds, and when it passes is stored
 * under its resolved identifier. A later hit for the same resolved id
 * replaces the earlier one.
 */

import { ValidationError } from "../errors";
import { BlastTabularParser } from "../formats/blast";
import type { AlignmentHit } from "../formats/blast";
import type { FileReaderOptions, Logger, OrientedStrand } from "../types";
import { coveragePercent, mean } from "./core/calculations";
import { normalizeInterval } from "./core/coordinates";
import type { SynonymTable } from "./synonyms";
import { resolveSubjectId } from "./synonyms";
import type { BlastFilterOptions, FilterStatistics, SelectedHit } from "./types";

const DEFAULT_THRESHOLD = 10;

/**
 * Per-hit derived values
 */
export interface HitEvaluation {
  readonly queryCoverage: number;
  readonly subjectCoverage: number;
  readonly strand: OrientedStrand;
  readonly passesQueryCoverage: boolean;
  readonly passesSubjectCoverage: boolean;
  readonly passesIdentity: boolean;
  readonly selected: boolean;
}

/**
 * Selected hits keyed by resolved identifier, last write wins
 */
export class SelectedHitTable {
  private readonly hits = new Map<string, SelectedHit>();

  /**
   * Store a hit, replacing any earlier hit with the same resolved id
   *
   * @returns The hit that was replaced, if any
   */
  set(hit: SelectedHit): SelectedHit | undefined {
    const previous = this.hits.get(hit.resolvedId);
    this.hits.set(hit.resolvedId, hit);
    return previous;
  }

  get(resolvedId: string): SelectedHit | undefined {
    return this.hits.get(resolvedId);
  }

  has(resolvedId: string): boolean {
    return this.hits.has(resolvedId);
  }

  get size(): number {
    return this.hits.size;
  }

  values(): IterableIterator<SelectedHit> {
    return this.hits.values();
  }

  [Symbol.iterator](): IterableIterator<[string, SelectedHit]> {
    return this.hits.entries();
  }
}

/**
 * Result of one filtering pass
 */
export interface BlastFilterResult {
  readonly table: SelectedHitTable;
  readonly statistics: FilterStatistics;
}

/**
 * Coverage/identity filter with synonym resolution
 *
 * @example
 * ```typescript
 * const filter = new BlastHitFilter({ minQueryCoverage: 50, minIdentity: 80 });
 * const { table, statistics } = await filter.filterFile("hits.tsv");
 * console.log(`${table.size} genes selected from ${statistics.totalHits} hits`);
 * ```
 */
export class BlastHitFilter {
  private readonly minQueryCoverage: number;
  private readonly minSubjectCoverage: number;
  private readonly minIdentity: number;
  private readonly usePrefix: boolean;
  private readonly logger: Logger;

  constructor(
    options: BlastFilterOptions = {},
    private readonly synonyms?: SynonymTable
  ) {
    this.minQueryCoverage = checkPercent("minQueryCoverage", options.minQueryCoverage);
    this.minSubjectCoverage = checkPercent("minSubjectCoverage", options.minSubjectCoverage);
    this.minIdentity = checkPercent("minIdentity", options.minIdentity);
    this.usePrefix = options.usePrefix ?? false;
    this.logger = options.logger ?? console;
  }

  /**
   * Compute coverages and strand for a hit and test it against the thresholds
   *
   * @throws {ValidationError} If the query or subject length is not positive
   */
  evaluate(hit: AlignmentHit): HitEvaluation {
    const queryCoverage = coveragePercent(hit.alignmentLength, hit.queryLength);
    const subjectCoverage = coveragePercent(hit.alignmentLength, hit.subjectLength);
    const passesQueryCoverage = queryCoverage >= this.minQueryCoverage;
    const passesSubjectCoverage = subjectCoverage >= this.minSubjectCoverage;
    const passesIdentity = hit.percentIdentity >= this.minIdentity;

    return {
      queryCoverage,
      subjectCoverage,
      strand: hit.subjectEnd > hit.subjectStart ? "+" : "-",
      passesQueryCoverage,
      passesSubjectCoverage,
      passesIdentity,
      selected: passesQueryCoverage && passesSubjectCoverage && passesIdentity,
    };
  }

  /**
   * Identifier a subject id is stored under
   */
  resolve(subjectId: string): string {
    return resolveSubjectId(subjectId, this.synonyms, { usePrefix: this.usePrefix });
  }

  /**
   * Select hits from a stream of parsed records
   */
  async filter(hits: Iterable<AlignmentHit> | AsyncIterable<AlignmentHit>): Promise<BlastFilterResult> {
    const table = new SelectedHitTable();
    const subjects = new Set<string>();
    let totalHits = 0;
    let querySum = 0;
    let subjectSum = 0;
    let identitySum = 0;
    let passingQueryCoverage = 0;
    let passingSubjectCoverage = 0;
    let passingIdentity = 0;
    let passingAll = 0;

    for await (const hit of hits) {
      const evaluation = this.evaluate(hit);

      totalHits++;
      subjects.add(hit.subjectId);
      querySum += evaluation.queryCoverage;
      subjectSum += evaluation.subjectCoverage;
      identitySum += hit.percentIdentity;
      if (evaluation.passesQueryCoverage) passingQueryCoverage++;
      if (evaluation.passesSubjectCoverage) passingSubjectCoverage++;
      if (evaluation.passesIdentity) passingIdentity++;
      if (!evaluation.selected) continue;
      passingAll++;

      const { start, end } = normalizeInterval(hit.subjectStart, hit.subjectEnd);
      table.set({
        resolvedId: this.resolve(hit.subjectId),
        subjectId: hit.subjectId,
        strand: evaluation.strand,
        start,
        end,
        queryCoverage: evaluation.queryCoverage,
        subjectCoverage: evaluation.subjectCoverage,
        percentIdentity: hit.percentIdentity,
        ...(hit.lineNumber !== undefined && { lineNumber: hit.lineNumber }),
      });
    }

    const statistics: FilterStatistics = {
      totalHits,
      uniqueSubjects: subjects.size,
      meanQueryCoverage: mean(querySum, totalHits),
      meanSubjectCoverage: mean(subjectSum, totalHits),
      meanIdentity: mean(identitySum, totalHits),
      passingQueryCoverage,
      passingSubjectCoverage,
      passingIdentity,
      passingAll,
      selectedIds: table.size,
    };

    this.report(statistics);
    return { table, statistics };
  }

  /**
   * Parse and select hits from a BLAST table on disk
   *
   * @throws {TabularParseError} On malformed rows
   * @throws {FileError} When the file cannot be read
   */
  async filterFile(path: string, options?: FileReaderOptions): Promise<BlastFilterResult> {
    const parser = new BlastTabularParser();
    return this.filter(parser.parseFile(path, options));
  }

  private report(statistics: FilterStatistics): void {
    const { totalHits } = statistics;
    this.logger.info(
      `[BlastHitFilter] ${totalHits} hits on ${statistics.uniqueSubjects} subjects; ` +
        `mean query coverage ${statistics.meanQueryCoverage.toFixed(1)}%, ` +
        `mean subject coverage ${statistics.meanSubjectCoverage.toFixed(1)}%, ` +
        `mean identity ${statistics.meanIdentity.toFixed(1)}%`
    );
    this.logger.info(
      `[BlastHitFilter] query coverage >= ${this.minQueryCoverage}: ${statistics.passingQueryCoverage}/${totalHits}; ` +
        `subject coverage >= ${this.minSubjectCoverage}: ${statistics.passingSubjectCoverage}/${totalHits}; ` +
        `identity >= ${this.minIdentity}: ${statistics.passingIdentity}/${totalHits}; ` +
        `all: ${statistics.passingAll}/${totalHits} (${statistics.selectedIds} distinct ids)`
    );
  }
}

function checkPercent(name: string, value: number | undefined): number {
  const threshold = value ?? DEFAULT_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
    throw new ValidationError(`${name} must be a percentage in [0, 100], got ${threshold}`);
  }
  return threshold;
}
