/**
 * Input and output formats
 */

export { AbstractParser } from "./abstract-parser";
export * from "./blast";
export type { FastaParserOptions, FastaWriterOptions } from "./fasta";
export { FastaParser, FastaWriter, parseFastaHeader, validateFastaSequence } from "./fasta";
export * from "./gff";
export type { SynonymEntry, TaxonFileEntry } from "./tabular";
export {
  parseSynonymRows,
  parseTaxonFileList,
  readSynonymFile,
  readTaxonFileList,
} from "./tabular";
