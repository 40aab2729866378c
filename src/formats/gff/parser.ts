/**
 * GFF3 feature parser
 *
 * Reads the nine-column annotation section of a GFF3 file and stops at the
 * `##FASTA` directive. The attribute column is parsed leniently: a line
 * without one, or with one that holds no `key=value` pairs, yields an empty
 * attribute set instead of an error. Lines with fewer than eight columns or
 * unusable coordinates go to `onError`, which throws unless replaced.
 *
 * @module gff/parser
 */

import { readLines } from "../../io/file-reader";
import { splitLines } from "../../io/stream-utils";
import type { FileReaderOptions, Strand } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { GffFeature, GffParserOptions } from "./types";
import { GFF_FASTA_DIRECTIVE, GFF_MIN_COLUMNS } from "./types";

const FORMAT = "GFF3";

/**
 * Parse a GFF3 attribute column into key/value pairs
 *
 * Pairs are separated by `;` and split at the first `=`. Pairs without `=`
 * or with an empty key are ignored; `%XX` escapes in values are decoded.
 * A repeated key keeps its last value.
 *
 * @example
 * ```typescript
 * parseGffAttributes("ID=gene1;Name=Abc%3B1");
 * // { ID: "gene1", Name: "Abc;1" }
 * ```
 *
 * @public
 */
export function parseGffAttributes(attributeString: string | undefined): Record<string, string> {
  const attributes: Record<string, string> = {};

  if (attributeString === undefined) {
    return attributes;
  }
  const column = attributeString.trim();
  if (column === "" || column === ".") {
    return attributes;
  }

  for (const part of column.split(";")) {
    const separator = part.indexOf("=");
    if (separator <= 0) continue;

    const key = part.slice(0, separator).trim();
    if (key === "") continue;

    attributes[key] = decodeGffValue(part.slice(separator + 1).trim());
  }

  return attributes;
}

/**
 * Validate a GFF3 strand field
 *
 * @returns The strand, or "." for `?` and anything unrecognized
 *
 * @public
 */
export function parseGffStrand(strand: string): Strand {
  return strand === "+" || strand === "-" ? strand : ".";
}

/**
 * Streaming GFF3 parser
 *
 * @example
 * ```typescript
 * const parser = new GffParser({ onError: (error) => console.warn(error) });
 * for await (const feature of parser.parseFile("genome.gff3")) {
 *   console.log(feature.attributes.ID, feature.seqId, feature.start);
 * }
 * ```
 *
 * @public
 */
export class GffParser extends AbstractParser<GffFeature, GffParserOptions> {
  constructor(options: GffParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): Partial<GffParserOptions> {
    return {};
  }

  protected getFormatName(): string {
    return FORMAT;
  }

  override async *parseString(data: string): AsyncIterable<GffFeature> {
    yield* this.parseLines(splitLines(data));
  }

  override async *parseFile(
    filePath: string,
    options?: FileReaderOptions
  ): AsyncIterable<GffFeature> {
    yield* this.parseLines(readLines(filePath, options));
  }

  private async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>
  ): AsyncIterable<GffFeature> {
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      this.checkAborted();

      if (rawLine.startsWith(GFF_FASTA_DIRECTIVE)) {
        break;
      }
      if (rawLine.trim() === "" || rawLine.startsWith("#")) {
        continue;
      }

      const feature = this.parseSingleLine(rawLine, lineNumber);
      if (feature !== null) {
        yield feature;
      }
    }
  }

  private parseSingleLine(line: string, lineNumber: number): GffFeature | null {
    if (line.length > this.options.maxLineLength) {
      this.options.onError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        lineNumber
      );
      return null;
    }

    const fields = line.split("\t");
    if (fields.length < GFF_MIN_COLUMNS) {
      this.options.onError(
        `GFF3 line has ${fields.length} columns, expected at least ${GFF_MIN_COLUMNS}`,
        lineNumber
      );
      return null;
    }

    const [seqId = "", source = "", type = "", startField = "", endField = ""] = fields;
    const [scoreField = ".", strandField = ".", phaseField = ".", attributeField] =
      fields.slice(5);

    const start = Number.parseInt(startField, 10);
    const end = Number.parseInt(endField, 10);

    if (this.options.skipValidation !== true) {
      if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < 1) {
        this.options.onError(
          `Invalid coordinates '${startField}'-'${endField}' on ${seqId}`,
          lineNumber
        );
        return null;
      }
      if (start > end) {
        this.options.onError(`Start ${start} is greater than end ${end} on ${seqId}`, lineNumber);
        return null;
      }
    }

    if (fields.length > GFF_MIN_COLUMNS + 1) {
      this.options.onWarning(
        `Line has ${fields.length} columns; extra columns ignored`,
        lineNumber
      );
    }

    return {
      seqId,
      source,
      type,
      start,
      end,
      score: parseOptionalNumber(scoreField),
      strand: parseGffStrand(strandField),
      phase: parseOptionalNumber(phaseField),
      attributes: parseGffAttributes(attributeField),
      ...(this.options.trackLineNumbers && { lineNumber }),
    };
  }
}

function parseOptionalNumber(field: string): number | null {
  if (field === "." || field === "") return null;
  const value = Number(field);
  return Number.isFinite(value) ? value : null;
}

function decodeGffValue(value: string): string {
  return value.replace(/%([0-9A-Fa-f]{2})/g, (_match, hex: string) =>
    String.fromCharCode(Number.parseInt(hex, 16))
  );
}
