/**
 * GFF3 feature type definitions
 *
 * @module gff/types
 */

import type { ParserOptions, Strand } from "../../types";

/**
 * One feature line of a GFF3 annotation
 *
 * @public
 */
export interface GffFeature {
  /** Landmark (contig or chromosome) the feature sits on */
  readonly seqId: string;
  readonly source: string;
  /** Feature type (gene, mRNA, CDS, ...) */
  readonly type: string;
  /** Start coordinate (1-based inclusive) */
  readonly start: number;
  /** End coordinate (1-based inclusive) */
  readonly end: number;
  readonly score: number | null;
  readonly strand: Strand;
  /** CDS phase (0, 1, 2) or null */
  readonly phase: number | null;
  /**
   * Column 9 `key=value` pairs, percent-decoded. Empty when the column is
   * missing or holds no pairs.
   */
  readonly attributes: Readonly<Record<string, string>>;
  readonly lineNumber?: number;
}

/**
 * GFF parser configuration options
 *
 * @public
 */
export interface GffParserOptions extends ParserOptions {
  /** Accept features with malformed or inverted coordinates */
  skipValidation?: boolean;
}

/**
 * Directive that ends the annotation section of a GFF3 file
 *
 * @public
 */
export const GFF_FASTA_DIRECTIVE = "##FASTA";

/** Columns required before the attribute column is considered */
export const GFF_MIN_COLUMNS = 8;
