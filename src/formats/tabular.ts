/**
 * Small tab-separated control files
 *
 * Two kinds of list drive a run: taxon file lists (taxon id, path) naming the
 * annotation and assembly of each genome, and the synonym table (external id,
 * feature id, optional prefix id). Both are input contracts: a wrong column
 * count or a repeated key aborts the run.
 */

import { TabularParseError } from "../errors";
import { readLines } from "../io/file-reader";

/**
 * One row of a taxon file list
 */
interface TaxonFileEntry {
  readonly taxonId: string;
  readonly path: string;
  readonly lineNumber: number;
}

/**
 * One row of the synonym table
 */
interface SynonymEntry {
  /** Identifier as it appears in the BLAST subject column */
  readonly externalId: string;
  /** Identifier as it appears in the annotation */
  readonly featureId: string;
  readonly prefixId?: string;
}

/**
 * Parse the rows of a taxon file list
 *
 * @param lines Raw lines of the list
 * @param format Name used in error messages
 * @throws {TabularParseError} On a row without exactly two fields or a repeated taxon id
 */
async function parseTaxonFileList(
  lines: Iterable<string> | AsyncIterable<string>,
  format = "taxon list"
): Promise<TaxonFileEntry[]> {
  const entries: TaxonFileEntry[] = [];
  const seen = new Map<string, number>();

  for await (const { fields, lineNumber } of tabularRows(lines)) {
    if (fields.length !== 2) {
      throw new TabularParseError(
        `Expected 2 tab-separated fields (taxon id, path), got ${fields.length}`,
        format,
        lineNumber
      );
    }

    const [taxonId = "", path = ""] = fields;
    requireField(taxonId, format, lineNumber, 1, "taxon id");
    requireField(path, format, lineNumber, 2, "path");

    const firstLine = seen.get(taxonId);
    if (firstLine !== undefined) {
      throw new TabularParseError(
        `Duplicate taxon id '${taxonId}' (first seen on line ${firstLine})`,
        format,
        lineNumber,
        1,
        "taxon id"
      );
    }
    seen.set(taxonId, lineNumber);
    entries.push({ taxonId, path, lineNumber });
  }

  return entries;
}

/**
 * Parse the rows of a synonym table
 *
 * @throws {TabularParseError} On a row with fewer than two or more than three fields, or a repeated external id
 */
async function parseSynonymRows(
  lines: Iterable<string> | AsyncIterable<string>
): Promise<SynonymEntry[]> {
  const format = "synonym table";
  const entries: SynonymEntry[] = [];
  const seen = new Map<string, number>();

  for await (const { fields, lineNumber } of tabularRows(lines)) {
    if (fields.length < 2 || fields.length > 3) {
      throw new TabularParseError(
        `Expected 2 or 3 tab-separated fields (external id, feature id, prefix id), got ${fields.length}`,
        format,
        lineNumber
      );
    }

    const [externalId = "", featureId = "", prefixId = ""] = fields;
    requireField(externalId, format, lineNumber, 1, "external id");
    requireField(featureId, format, lineNumber, 2, "feature id");

    const firstLine = seen.get(externalId);
    if (firstLine !== undefined) {
      throw new TabularParseError(
        `Duplicate external id '${externalId}' (first seen on line ${firstLine})`,
        format,
        lineNumber,
        1,
        "external id"
      );
    }
    seen.set(externalId, lineNumber);

    entries.push(prefixId === "" ? { externalId, featureId } : { externalId, featureId, prefixId });
  }

  return entries;
}

/**
 * Read a taxon file list from disk
 */
async function readTaxonFileList(path: string, format?: string): Promise<TaxonFileEntry[]> {
  return parseTaxonFileList(readLines(path), format);
}

/**
 * Read a synonym table from disk
 */
async function readSynonymFile(path: string): Promise<SynonymEntry[]> {
  return parseSynonymRows(readLines(path));
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function* tabularRows(
  lines: Iterable<string> | AsyncIterable<string>
): AsyncIterable<{ fields: string[]; lineNumber: number }> {
  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === "" || line.startsWith("#")) continue;
    yield { fields: line.split("\t").map((field) => field.trim()), lineNumber };
  }
}

function requireField(
  value: string,
  format: string,
  lineNumber: number,
  column: number,
  field: string
): void {
  if (value === "") {
    throw new TabularParseError(`Empty ${field}`, format, lineNumber, column, field);
  }
}

export type { SynonymEntry, TaxonFileEntry };
export {
  parseSynonymRows,
  parseTaxonFileList,
  readSynonymFile,
  readTaxonFileList,
};
