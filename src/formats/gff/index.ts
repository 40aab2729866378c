/**
 * GFF3 module exports
 *
 * @module gff
 */

export { GffParser, parseGffAttributes, parseGffStrand } from "./parser";

export type { GffFeature, GffParserOptions } from "./types";

export { GFF_FASTA_DIRECTIVE, GFF_MIN_COLUMNS } from "./types";
