/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives the BLAST, GFF and FASTA parsers the same AbortSignal support and
 * error/warning callbacks without imposing a parsing implementation. Each
 * format keeps its own line handling.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces (AlignmentHit, GffFeature, ...)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: Required<ParserOptions> & TOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: Required<ParserOptions> = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      signal: new AbortController().signal,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing should stop; call inside parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.throwIfAborted(this.getFormatName());
  }

  /**
   * Parse records from string data
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file using streaming I/O
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Format identifier used in errors and warnings (e.g. "BLAST", "GFF3")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration shared by all parsers
 */
class InterruptHandler {
  constructor(private readonly signal: AbortSignal) {}

  /**
   * @throws {ParseError} If the signal has been aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal.aborted) {
      throw new ParseError(`Operation aborted during ${context} parsing`, "ABORTED");
    }
  }
}
