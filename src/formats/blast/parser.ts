/**
 * Streaming parser for 14-column BLAST tabular output
 *
 * Every non-comment line must carry exactly 14 fields; anything else is an
 * input contract violation and aborts the parse.
 *
 * @module blast/parser
 */

import { TabularParseError } from "../../errors";
import { readLines } from "../../io/file-reader";
import { splitLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { AlignmentHit, BlastParserOptions } from "./types";
import { BLAST_COLUMN_COUNT, BLAST_TABULAR_COLUMNS } from "./types";

const FORMAT = "BLAST";

type BlastColumn = (typeof BLAST_TABULAR_COLUMNS)[number];

/**
 * Parse a numeric BLAST field, reporting the offending column on failure
 *
 * @param value Raw field text
 * @param column Zero-based column index
 * @param lineNumber Line number for error reporting
 * @param integer Require an integer value
 *
 * @public
 */
export function parseBlastNumber(
  value: string,
  column: number,
  lineNumber: number,
  integer = false
): number {
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);
  const name: BlastColumn | undefined = BLAST_TABULAR_COLUMNS[column];

  if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new TabularParseError(
      `Expected ${integer ? "an integer" : "a number"} for ${name ?? "column"}, got '${value}'`,
      FORMAT,
      lineNumber,
      column + 1,
      name
    );
  }
  return parsed;
}

/**
 * Split and type a single BLAST tabular line
 *
 * @param line Raw line without terminator
 * @param lineNumber Line number for error reporting
 * @throws {TabularParseError} On wrong column count or non-numeric fields
 *
 * @public
 */
export function parseBlastLine(line: string, lineNumber: number): AlignmentHit {
  const fields = line.split("\t");

  if (fields.length !== BLAST_COLUMN_COUNT) {
    throw new TabularParseError(
      `BLAST table requires exactly ${BLAST_COLUMN_COUNT} tab-separated fields, got ${fields.length}. ` +
        `Expected columns: ${BLAST_TABULAR_COLUMNS.join(" ")}`,
      FORMAT,
      lineNumber
    );
  }

  const [queryId = "", subjectId = ""] = fields;
  if (queryId === "" || subjectId === "") {
    throw new TabularParseError(
      "Query and subject identifiers must not be empty",
      FORMAT,
      lineNumber,
      queryId === "" ? 1 : 2
    );
  }

  const num = (column: number, integer = false): number =>
    parseBlastNumber(fields[column] ?? "", column, lineNumber, integer);

  const hit: AlignmentHit = {
    queryId,
    subjectId,
    percentIdentity: num(2),
    alignmentLength: num(3, true),
    mismatches: num(4, true),
    gapOpens: num(5, true),
    queryStart: num(6, true),
    queryEnd: num(7, true),
    subjectStart: num(8, true),
    subjectEnd: num(9, true),
    evalue: num(10),
    bitScore: num(11),
    queryLength: num(12, true),
    subjectLength: num(13, true),
    lineNumber,
  };

  if (hit.queryLength <= 0 || hit.subjectLength <= 0) {
    throw new TabularParseError(
      "Query and subject lengths must be positive",
      FORMAT,
      lineNumber,
      hit.queryLength <= 0 ? 13 : 14
    );
  }

  return hit;
}

/**
 * Streaming BLAST tabular parser
 *
 * @example
 * ```typescript
 * const parser = new BlastTabularParser();
 * for await (const hit of parser.parseFile("hits.tsv")) {
 *   console.log(`${hit.queryId} -> ${hit.subjectId}: ${hit.percentIdentity}%`);
 * }
 * ```
 *
 * @public
 */
export class BlastTabularParser extends AbstractParser<AlignmentHit, BlastParserOptions> {
  constructor(options: BlastParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): Partial<BlastParserOptions> {
    return {};
  }

  protected getFormatName(): string {
    return FORMAT;
  }

  override async *parseString(data: string): AsyncIterable<AlignmentHit> {
    yield* this.parseLines(splitLines(data));
  }

  override async *parseFile(
    filePath: string,
    options?: FileReaderOptions
  ): AsyncIterable<AlignmentHit> {
    yield* this.parseLines(readLines(filePath, options));
  }

  private async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>
  ): AsyncIterable<AlignmentHit> {
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      this.checkAborted();

      // BLAST -outfmt 7 interleaves comment lines
      if (rawLine.trim() === "" || rawLine.startsWith("#")) {
        continue;
      }

      if (rawLine.length > this.options.maxLineLength) {
        this.options.onError(
          `Line too long (${rawLine.length} > ${this.options.maxLineLength})`,
          lineNumber
        );
        continue;
      }

      const hit = parseBlastLine(rawLine, lineNumber);
      if (this.options.trackLineNumbers) {
        yield hit;
      } else {
        const { lineNumber: _omitted, ...untracked } = hit;
        yield untracked;
      }
    }
  }
}
