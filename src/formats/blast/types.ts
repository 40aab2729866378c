/**
 * BLAST tabular format type definitions
 *
 * The input is `-outfmt 6` output with two appended length columns
 * (`qlen slen`), giving 14 tab-separated fields per record.
 *
 * @module blast/types
 */

import type { ParserOptions } from "../../types";

/**
 * One alignment record from a 14-column BLAST table
 *
 * Subject start/end keep the order BLAST wrote them in: the strand of the
 * hit is defined by their relative order, not by a separate field.
 *
 * @public
 */
export interface AlignmentHit {
  readonly queryId: string;
  readonly subjectId: string;
  /** Percent identity (0-100) */
  readonly percentIdentity: number;
  readonly alignmentLength: number;
  readonly mismatches: number;
  readonly gapOpens: number;
  readonly queryStart: number;
  readonly queryEnd: number;
  readonly subjectStart: number;
  readonly subjectEnd: number;
  readonly evalue: number;
  readonly bitScore: number;
  /** Total length of the query sequence */
  readonly queryLength: number;
  /** Total length of the subject sequence */
  readonly subjectLength: number;
  /** Source line number for debugging */
  readonly lineNumber?: number;
}

/**
 * BLAST parser configuration options
 *
 * @public
 */
export type BlastParserOptions = ParserOptions;

/**
 * Column names in file order
 *
 * @public
 */
export const BLAST_TABULAR_COLUMNS = [
  "qseqid",
  "sseqid",
  "pident",
  "length",
  "mismatch",
  "gapopen",
  "qstart",
  "qend",
  "sstart",
  "send",
  "evalue",
  "bitscore",
  "qlen",
  "slen",
] as const;

export const BLAST_COLUMN_COUNT = BLAST_TABULAR_COLUMNS.length;
