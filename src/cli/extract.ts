import { Command, InvalidArgumentError, Option } from "commander";
import type { PromoterConfigInput } from "../config";
import { createLogger } from "../logger";
import { extractPromoters } from "../operations/promoters";
import { REGION_MODES } from "../operations/types";
import type { RegionMode } from "../operations/types";

/**
 * Options as commander hands them to the action
 */
export interface ExtractCliOptions {
  blast: string;
  gffList: string;
  fastaList: string;
  synonyms?: string;
  region: RegionMode;
  length: number;
  coverage: number;
  queryCoverage?: number;
  subjectCoverage?: number;
  identity: number;
  prefix: boolean;
  altSuffix: boolean;
  outbase: string;
  extension: string;
  lineWidth: number;
  quiet: boolean;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not a number.`);
  }
  return parsed;
}

export function parseIntegerOption(value: string): number {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not an integer.`);
  }
  return parsed;
}

/**
 * Translate command line options into a run configuration
 *
 * `--coverage` sets both coverage thresholds; `--query-coverage` and
 * `--subject-coverage` override it individually.
 */
export function toConfigInput(options: ExtractCliOptions): PromoterConfigInput {
  return {
    blastFile: options.blast,
    annotationList: options.gffList,
    sequenceList: options.fastaList,
    ...(options.synonyms !== undefined && { synonymFile: options.synonyms }),
    region: options.region,
    length: options.length,
    minQueryCoverage: options.queryCoverage ?? options.coverage,
    minSubjectCoverage: options.subjectCoverage ?? options.coverage,
    minIdentity: options.identity,
    usePrefix: options.prefix,
    altSuffix: options.altSuffix,
    outbase: options.outbase,
    extension: options.extension,
    lineWidth: options.lineWidth,
  };
}

export function createExtractCommand(): Command {
  return new Command("extract")
    .description("Extract promoter sequences for genes hit by a BLAST search")
    .requiredOption("-b, --blast <file>", "BLAST tabular output with qlen and slen columns")
    .requiredOption("-g, --gff-list <file>", "two-column list of taxon id and GFF3 path")
    .requiredOption("-f, --fasta-list <file>", "two-column list of taxon id and FASTA path")
    .option("-s, --synonyms <file>", "synonym table: external id, feature id, optional prefix")
    .addOption(
      new Option("-r, --region <mode>", "flank to extract: D, U or B")
        .choices(REGION_MODES)
        .default("D")
    )
    .option("-l, --length <n>", "window length", parseIntegerOption, 2000)
    .option("-c, --coverage <pct>", "minimum query and subject coverage", parseNumberOption, 10)
    .option("--query-coverage <pct>", "minimum query coverage", parseNumberOption)
    .option("--subject-coverage <pct>", "minimum subject coverage", parseNumberOption)
    .option("-i, --identity <pct>", "minimum percent identity", parseNumberOption, 10)
    .option("-p, --prefix", "qualify feature ids with their taxon id", false)
    .option("-a, --alt-suffix", "also match Name.p spellings", false)
    .option("-o, --outbase <name>", "output file base name", "promoter_seqs")
    .option("-e, --extension <ext>", "output file extension", "fasta")
    .option("-w, --line-width <n>", "FASTA line width, 0 for unwrapped", parseIntegerOption, 60)
    .option("-q, --quiet", "suppress progress messages", false)
    .action(async (options: ExtractCliOptions) => {
      const logger = createLogger({ quiet: options.quiet });
      const summary = await extractPromoters(toConfigInput(options), { logger });

      logger.info(
        `Wrote ${summary.recordsWritten} promoter sequence(s) to ${summary.outputPath} ` +
          `(${summary.rejected.length} window(s) too short, ` +
          `${summary.missing.length} feature(s) on missing contigs)`
      );
    });
}
