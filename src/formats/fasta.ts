/**
 * FASTA format parser and writer
 *
 * Handles the messiness of real-world assembly files:
 * - Wrapped and unwrapped sequences
 * - Mixed case sequences and IUPAC ambiguity codes
 * - `;` comments and blank lines
 */

import { type } from "arktype";
import { ParseError, SequenceError, ValidationError } from "../errors";
import { readLines } from "../io/file-reader";
import { splitLines } from "../io/stream-utils";
import type { FastaSequence, FileReaderOptions, ParserOptions } from "../types";
import { SequenceSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

interface FastaParserOptions extends ParserOptions {
  /** Skip IUPAC character validation of sequence lines */
  skipValidation?: boolean;
}

interface FastaWriterOptions {
  /** Residues per sequence line; 0 disables wrapping (default: 60) */
  lineWidth?: number;
  includeDescription?: boolean;
  lineEnding?: string;
}

/**
 * Discriminated union for processed FASTA lines
 */
type ProcessedFastaLine =
  | { isHeader: true; id: string; description?: string }
  | { isHeader: false; sequenceData: string }
  | null;

const FastaParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
}).narrow((options, ctx) => {
  // Plant chromosomes run to gigabases on a single unwrapped line
  if (options.maxLineLength !== undefined && options.maxLineLength > 500_000_000) {
    return ctx.reject({
      expected: "maxLineLength <= 500MB",
      actual: `${options.maxLineLength} bytes`,
      path: ["maxLineLength"],
    });
  }
  return true;
});

/**
 * Streaming FASTA parser
 *
 * Processes records one at a time; only the record currently being
 * assembled is held in memory.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const sequence of parser.parseFile("assembly.fa.gz")) {
 *   console.log(`${sequence.id}: ${sequence.length} bp`);
 * }
 * ```
 */
class FastaParser extends AbstractParser<FastaSequence, FastaParserOptions> {
  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return {
      // Unwrapped assemblies put a whole contig on one line
      maxLineLength: 500_000_000,
    };
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA sequences from a string
   *
   * @throws {ParseError} When FASTA format is invalid
   * @throws {SequenceError} When sequence data is malformed
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse FASTA sequences from a file, decompressing gzip input
   *
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When FASTA format is invalid
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<FastaSequence> {
    yield* this.parseLines(readLines(filePath, options));
  }

  private async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>
  ): AsyncIterable<FastaSequence> {
    let current: { id: string; description?: string; lineNumber: number } | null = null;
    let sequenceBuffer: string[] = [];
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      const processed = this.processLine(line, lineNumber);
      if (processed === null) continue;

      if (processed.isHeader) {
        if (current !== null) {
          yield this.finalizeSequence(current, sequenceBuffer);
        }
        current = { ...processed, lineNumber };
        sequenceBuffer = [];
      } else if (current === null) {
        this.options.onError("Sequence data found before header", lineNumber);
      } else {
        sequenceBuffer.push(processed.sequenceData);
      }
    }

    if (current !== null) {
      yield this.finalizeSequence(current, sequenceBuffer);
    }
  }

  private processLine(line: string, lineNumber: number): ProcessedFastaLine {
    if (line.length > this.options.maxLineLength) {
      this.options.onError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        lineNumber
      );
      return null;
    }

    const trimmedLine = line.trim();
    if (trimmedLine === "" || trimmedLine.startsWith(";")) {
      return null;
    }

    if (trimmedLine.startsWith(">")) {
      return { isHeader: true, ...parseFastaHeader(trimmedLine, lineNumber) };
    }

    const sequenceData = validateFastaSequence(trimmedLine, lineNumber, {
      skipValidation: this.options.skipValidation,
    });
    return sequenceData === "" ? null : { isHeader: false, sequenceData };
  }

  private finalizeSequence(
    header: { id: string; description?: string; lineNumber: number },
    sequenceBuffer: string[]
  ): FastaSequence {
    const sequence = sequenceBuffer.join("");

    if (sequence.length === 0) {
      this.options.onWarning(`Sequence '${header.id}' is empty`, header.lineNumber);
    }

    return {
      format: "fasta",
      id: header.id,
      ...(header.description !== undefined && { description: header.description }),
      sequence,
      length: sequence.length,
      ...(this.options.trackLineNumbers && { lineNumber: header.lineNumber }),
    };
  }
}

/**
 * FASTA writer for outputting sequences
 */
class FastaWriter {
  private readonly lineWidth: number;
  private readonly includeDescription: boolean;
  private readonly lineEnding: string;

  constructor(options: FastaWriterOptions = {}) {
    this.lineWidth = options.lineWidth ?? 60;
    this.includeDescription = options.includeDescription ?? true;
    this.lineEnding = options.lineEnding ?? "\n";

    if (!Number.isInteger(this.lineWidth) || this.lineWidth < 0) {
      throw new ValidationError(`lineWidth must be a non-negative integer, got ${this.lineWidth}`);
    }
  }

  /**
   * Format a single FASTA record, without a trailing line ending
   */
  formatSequence(sequence: Pick<FastaSequence, "id" | "description" | "sequence">): string {
    let header = `>${sequence.id}`;

    if (this.includeDescription && sequence.description !== undefined && sequence.description !== "") {
      header += ` ${sequence.description}`;
    }

    return `${header}${this.lineEnding}${this.wrapText(sequence.sequence)}`;
  }

  /**
   * Format records as a complete file body, each record terminated
   */
  formatSequences(sequences: readonly Pick<FastaSequence, "id" | "description" | "sequence">[]): string {
    return sequences.map((seq) => `${this.formatSequence(seq)}${this.lineEnding}`).join("");
  }

  private wrapText(text: string): string {
    if (this.lineWidth === 0) return text;

    const lines: string[] = [];
    for (let i = 0; i < text.length; i += this.lineWidth) {
      lines.push(text.slice(i, i + this.lineWidth));
    }
    return lines.join(this.lineEnding);
  }
}

/**
 * Parse a FASTA header line into identifier and description
 *
 * @throws {ParseError} When the header carries no identifier
 */
function parseFastaHeader(
  headerLine: string,
  lineNumber: number
): { id: string; description?: string } {
  const header = headerLine.slice(1).trim();
  if (header === "") {
    throw new ParseError(
      'Empty FASTA header: header must contain an identifier after ">"',
      "FASTA",
      lineNumber,
      headerLine
    );
  }

  const firstSpace = header.search(/\s/);
  if (firstSpace === -1) {
    return { id: header };
  }
  return { id: header.slice(0, firstSpace), description: header.slice(firstSpace + 1).trim() };
}

/**
 * Strip whitespace from a sequence line and check its characters
 *
 * @throws {SequenceError} When the line holds non-IUPAC characters
 */
function validateFastaSequence(
  sequenceLine: string,
  lineNumber: number,
  options: { skipValidation?: boolean } = {}
): string {
  if (options.skipValidation === true) {
    return sequenceLine.replace(/\s/g, "");
  }

  const validation = SequenceSchema(sequenceLine);
  if (validation instanceof type.errors) {
    throw new SequenceError(
      `Invalid sequence characters: ${validation.summary}`,
      "unknown",
      lineNumber,
      sequenceLine.slice(0, 80)
    );
  }
  return validation;
}

// Exports - grouped at end per project style guide
export type { FastaParserOptions, FastaWriterOptions };
export { FastaParser, FastaWriter, parseFastaHeader, validateFastaSequence };
