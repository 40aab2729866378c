/**
 * SequenceEmitter - cut promoter windows out of a genome assembly
 */

import { ValidationError } from "../errors";
import { FastaParser } from "../formats/fasta";
import type { FastaSequence, FileReaderOptions, Logger } from "../types";
import { formatRegion } from "./core/coordinates";
import { extractRegion, reverseComplement } from "./core/sequence-manipulation";
import type { GenomeIndex } from "./annotation-locator";
import { projectWindow } from "./region-projector";
import type {
  EmitResult,
  FeatureRecord,
  MissingContig,
  PromoterWindow,
  RegionMode,
  RejectedWindow,
  SequenceEmitterOptions,
} from "./types";

const DEFAULT_WINDOW_LENGTH = 2000;

/**
 * Load the contigs of an assembly into memory
 *
 * @param path FASTA file, optionally gzip-compressed
 * @param wanted When given, only these contigs are kept
 * @param logger Receives a warning for each repeated contig name
 */
export async function loadAssembly(
  path: string,
  wanted?: ReadonlySet<string>,
  logger: Logger = console,
  options?: FileReaderOptions
): Promise<Map<string, string>> {
  const parser = new FastaParser({
    onWarning: (warning, lineNumber) => {
      logger.warn(`[SequenceEmitter] ${path}:${lineNumber ?? "?"}: ${warning}`);
    },
  });
  const contigs = new Map<string, string>();

  for await (const record of parser.parseFile(path, options)) {
    if (wanted !== undefined && !wanted.has(record.id)) continue;
    if (contigs.has(record.id)) {
      logger.warn(`[SequenceEmitter] ${path}: contig '${record.id}' appears more than once; keeping the last`);
    }
    contigs.set(record.id, record.sequence);
  }

  return contigs;
}

/**
 * Build the output record for one window
 *
 * The description carries the forward-strand coordinates even when the
 * sequence itself is reverse-complemented.
 */
export function buildPromoterRecord(
  feature: FeatureRecord,
  window: PromoterWindow,
  contigSequence: string,
  mode: RegionMode,
  length: number
): FastaSequence {
  const forward = extractRegion(contigSequence, window.start, window.end);
  const sequence = window.strand === "-" ? reverseComplement(forward) : forward;

  return {
    format: "fasta",
    id: `${feature.resolvedId}_${mode}${length}`,
    description: `${formatRegion(feature.seqId, window)} AltID=${feature.subjectId}`,
    sequence,
    length: sequence.length,
  };
}

/**
 * Window projection and extraction for located features
 *
 * @example
 * ```typescript
 * const emitter = new SequenceEmitter({ mode: "U", length: 1500 });
 * const assembly = await loadAssembly("Tx1.fa.gz", index.contigs());
 * const { records, rejected } = emitter.emit(index, assembly);
 * ```
 */
export class SequenceEmitter {
  readonly mode: RegionMode;
  readonly length: number;
  private readonly logger: Logger;

  constructor(options: SequenceEmitterOptions = {}) {
    this.mode = options.mode ?? "D";
    this.length = options.length ?? DEFAULT_WINDOW_LENGTH;
    this.logger = options.logger ?? console;

    if (!Number.isInteger(this.length) || this.length <= 0) {
      throw new ValidationError(`Window length must be a positive integer, got ${this.length}`);
    }
  }

  /**
   * Emit one record per accepted window, contig by contig
   *
   * Features on contigs absent from the assembly and windows too short to
   * extract are reported and skipped.
   */
  emit(index: GenomeIndex, assembly: ReadonlyMap<string, string>): EmitResult {
    const records: FastaSequence[] = [];
    const rejected: RejectedWindow[] = [];
    const missing: MissingContig[] = [];

    for (const [seqId, features] of index.byContig()) {
      const contigSequence = assembly.get(seqId);

      if (contigSequence === undefined) {
        this.logger.warn(
          `[SequenceEmitter] ${index.taxonId}: contig '${seqId}' not in assembly; ` +
            `skipping ${features.length} feature(s)`
        );
        for (const feature of features) {
          missing.push({ taxonId: index.taxonId, seqId, resolvedId: feature.resolvedId });
        }
        continue;
      }

      for (const feature of features) {
        const projection = projectWindow(feature, this.mode, this.length, contigSequence.length);

        if (!projection.accepted) {
          this.logger.warn(
            `[SequenceEmitter] ${index.taxonId}: ${feature.resolvedId} on ${seqId}: ${projection.reason}; skipped`
          );
          rejected.push({
            taxonId: index.taxonId,
            seqId,
            resolvedId: feature.resolvedId,
            window: projection.window,
          });
          continue;
        }

        records.push(
          buildPromoterRecord(feature, projection.window, contigSequence, this.mode, this.length)
        );
      }
    }

    this.logger.info(
      `[SequenceEmitter] ${index.taxonId}: ${records.length} sequence(s) extracted, ` +
        `${rejected.length} window(s) rejected, ${missing.length} feature(s) on missing contigs`
    );
    return { records, rejected, missing };
  }
}
