/**
 * BLAST tabular module exports
 *
 * @example
 * ```typescript
 * import { BlastTabularParser } from "./formats/blast";
 *
 * const parser = new BlastTabularParser();
 * for await (const hit of parser.parseFile("genes_vs_assembly.tsv")) {
 *   console.log(`${hit.queryId} hit ${hit.subjectId} at ${hit.subjectStart}`);
 * }
 * ```
 *
 * @module blast
 */

export { BlastTabularParser, parseBlastLine, parseBlastNumber } from "./parser";

export type { AlignmentHit, BlastParserOptions } from "./types";

export { BLAST_COLUMN_COUNT, BLAST_TABULAR_COLUMNS } from "./types";
