/**
 * Promoter extraction run
 *
 * Reads the BLAST table once, then handles each genome of the annotation
 * list in order: locate the selected genes in its annotation, load the
 * contigs they sit on and cut the flanking windows. All records are
 * written to one FASTA file at the end.
 *
 * Any input contract violation aborts the run. Per-feature problems
 * (short windows, contigs missing from an assembly, selected ids absent
 * from every annotation) are logged, counted in the summary and skipped.
 */

import type { PromoterConfig, PromoterConfigInput } from "../config";
import { outputPath, parseConfig } from "../config";
import { ConsistencyError } from "../errors";
import { FastaWriter } from "../formats/fasta";
import type { TaxonFileEntry } from "../formats/tabular";
import { readTaxonFileList } from "../formats/tabular";
import { openForWriting } from "../io/file-writer";
import type { FastaSequence, Logger } from "../types";
import { AnnotationLocator } from "./annotation-locator";
import { BlastHitFilter } from "./blast-filter";
import { loadAssembly, SequenceEmitter } from "./sequence-emitter";
import { SynonymTable } from "./synonyms";
import type { FilterStatistics, MissingContig, RejectedWindow } from "./types";

/**
 * Per-genome figures of a run
 */
export interface TaxonSummary {
  readonly taxonId: string;
  /** Selected ids found in the annotation */
  readonly located: number;
  /** Records cut from the assembly */
  readonly extracted: number;
}

/**
 * Outcome of a completed run
 */
export interface PromoterRunSummary {
  readonly outputPath: string;
  readonly statistics: FilterStatistics;
  readonly taxa: readonly TaxonSummary[];
  readonly recordsWritten: number;
  readonly rejected: readonly RejectedWindow[];
  readonly missing: readonly MissingContig[];
  /** Selected ids that no annotation contained */
  readonly unlocated: readonly string[];
}

export interface PromoterRunOptions {
  logger?: Logger;
}

/**
 * Check that both file lists name the same genomes
 *
 * @throws {ConsistencyError} Listing the taxa found in only one list
 */
export function checkTaxonConsistency(
  annotations: readonly TaxonFileEntry[],
  sequences: readonly TaxonFileEntry[]
): void {
  const annotationTaxa = new Set(annotations.map((entry) => entry.taxonId));
  const sequenceTaxa = new Set(sequences.map((entry) => entry.taxonId));

  const onlyInAnnotations = [...annotationTaxa].filter((taxon) => !sequenceTaxa.has(taxon));
  const onlyInSequences = [...sequenceTaxa].filter((taxon) => !annotationTaxa.has(taxon));

  if (onlyInAnnotations.length > 0 || onlyInSequences.length > 0) {
    throw new ConsistencyError(
      "Annotation and sequence lists name different taxa",
      onlyInAnnotations,
      onlyInSequences
    );
  }
}

/**
 * Run a full promoter extraction
 *
 * @throws {ValidationError} On invalid configuration
 * @throws {TabularParseError} On malformed BLAST tables, file lists or synonym tables
 * @throws {ConsistencyError} When the two file lists disagree on taxa
 * @throws {FileError} When an input cannot be read or the output cannot be written
 *
 * @example
 * ```typescript
 * const summary = await extractPromoters({
 *   blastFile: "genes_vs_genomes.tsv",
 *   annotationList: "gff.list",
 *   sequenceList: "fasta.list",
 *   region: "D",
 *   length: 1500,
 * });
 * console.log(`${summary.recordsWritten} promoters in ${summary.outputPath}`);
 * ```
 */
export async function extractPromoters(
  input: PromoterConfigInput,
  options: PromoterRunOptions = {}
): Promise<PromoterRunSummary> {
  const config = parseConfig(input);
  return new PromoterPipeline(config, options.logger ?? console).run();
}

class PromoterPipeline {
  constructor(
    private readonly config: PromoterConfig,
    private readonly logger: Logger
  ) {}

  async run(): Promise<PromoterRunSummary> {
    const { config, logger } = this;

    const annotations = await readTaxonFileList(config.annotationList, "annotation list");
    const sequences = await readTaxonFileList(config.sequenceList, "sequence list");
    checkTaxonConsistency(annotations, sequences);
    const sequencePaths = new Map(sequences.map((entry) => [entry.taxonId, entry.path]));

    const synonyms =
      config.synonymFile === undefined ? undefined : await SynonymTable.load(config.synonymFile);
    if (synonyms !== undefined) {
      logger.info(`[PromoterPipeline] ${synonyms.size} synonym(s) loaded`);
    }

    const filter = new BlastHitFilter(
      {
        usePrefix: config.usePrefix,
        minQueryCoverage: config.minQueryCoverage,
        minSubjectCoverage: config.minSubjectCoverage,
        minIdentity: config.minIdentity,
        logger,
      },
      synonyms
    );
    const { table, statistics } = await filter.filterFile(config.blastFile);

    const locator = new AnnotationLocator(table, {
      usePrefix: config.usePrefix,
      altSuffix: config.altSuffix,
      logger,
    });
    const emitter = new SequenceEmitter({ mode: config.region, length: config.length, logger });

    const records: FastaSequence[] = [];
    const rejected: RejectedWindow[] = [];
    const missing: MissingContig[] = [];
    const taxa: TaxonSummary[] = [];
    const located = new Set<string>();

    for (const { taxonId, path } of annotations) {
      const index = await locator.locateFile(taxonId, path);
      const sequencePath = sequencePaths.get(taxonId);
      for (const resolvedId of index.resolvedIds()) {
        located.add(resolvedId);
      }

      if (index.size === 0 || sequencePath === undefined) {
        taxa.push({ taxonId, located: index.size, extracted: 0 });
        continue;
      }

      const assembly = await loadAssembly(sequencePath, index.contigs(), logger);
      const result = emitter.emit(index, assembly);

      records.push(...result.records);
      rejected.push(...result.rejected);
      missing.push(...result.missing);
      taxa.push({ taxonId, located: index.size, extracted: result.records.length });
    }

    const unlocated = [...table.values()]
      .map((hit) => hit.resolvedId)
      .filter((resolvedId) => !located.has(resolvedId));
    if (unlocated.length > 0) {
      logger.warn(
        `[PromoterPipeline] ${unlocated.length} selected id(s) not found in any annotation: ${unlocated.join(", ")}`
      );
    }

    const destination = outputPath(config);
    await this.write(destination, records);
    logger.info(`[PromoterPipeline] ${records.length} sequence(s) written to ${destination}`);

    return {
      outputPath: destination,
      statistics,
      taxa,
      recordsWritten: records.length,
      rejected,
      missing,
      unlocated,
    };
  }

  private async write(destination: string, records: readonly FastaSequence[]): Promise<void> {
    const writer = new FastaWriter({ lineWidth: this.config.lineWidth });
    await openForWriting(destination, async (handle) => {
      for (const record of records) {
        await handle.writeString(writer.formatSequences([record]));
      }
    });
  }
}
