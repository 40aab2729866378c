/**
 * Run configuration
 *
 * One arktype schema validates and defaults everything a promoter
 * extraction run needs, whether it comes from the command line or from a
 * library caller.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

/**
 * Schema for a promoter extraction run
 */
export const PromoterConfigSchema = type({
  /** 14-column BLAST table */
  blastFile: "string > 0",
  /** Two-column list: taxon id, GFF3 path */
  annotationList: "string > 0",
  /** Two-column list: taxon id, FASTA path */
  sequenceList: "string > 0",
  "synonymFile?": "string > 0",
  region: ['"D" | "U" | "B"', "=", "D"],
  length: ["number > 0", "=", 2000],
  minQueryCoverage: ["0 <= number <= 100", "=", 10],
  minSubjectCoverage: ["0 <= number <= 100", "=", 10],
  minIdentity: ["0 <= number <= 100", "=", 10],
  usePrefix: ["boolean", "=", false],
  altSuffix: ["boolean", "=", false],
  outbase: ["string > 0", "=", "promoter_seqs"],
  extension: ["string > 0", "=", "fasta"],
  lineWidth: ["number >= 0", "=", 60],
}).narrow((config, ctx) => {
  if (!Number.isInteger(config.length)) {
    return ctx.reject({
      expected: "an integer window length",
      actual: String(config.length),
      path: ["length"],
    });
  }
  if (!Number.isInteger(config.lineWidth)) {
    return ctx.reject({
      expected: "an integer line width",
      actual: String(config.lineWidth),
      path: ["lineWidth"],
    });
  }
  if (config.extension.startsWith(".") || config.extension.includes("/")) {
    return ctx.reject({
      expected: "a bare file extension such as fasta",
      actual: config.extension,
      path: ["extension"],
    });
  }
  return true;
});

/** Validated configuration with defaults applied */
export type PromoterConfig = typeof PromoterConfigSchema.infer;

/** Configuration as accepted from callers; defaulted keys may be omitted */
export type PromoterConfigInput = typeof PromoterConfigSchema.inferIn;

/**
 * Validate a configuration object and fill in defaults
 *
 * @throws {ValidationError} With the schema's summary of every problem
 *
 * @example
 * ```typescript
 * const config = parseConfig({
 *   blastFile: "hits.tsv",
 *   annotationList: "gff.list",
 *   sequenceList: "fasta.list",
 *   region: "U",
 * });
 * config.length; // 2000
 * ```
 */
export function parseConfig(input: unknown): PromoterConfig {
  const result = PromoterConfigSchema(input);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid configuration: ${result.summary}`);
  }
  return result;
}

/**
 * Name of the output file for a run
 */
export function outputPath(config: Pick<PromoterConfig, "outbase" | "extension">): string {
  return `${config.outbase}_promotors.${config.extension}`;
}
