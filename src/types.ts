/**
 * Core type definitions shared across formats and operations
 *
 * Format-specific records live beside their parsers (formats/blast,
 * formats/gff); the types here are the ones every layer touches.
 */

import { type } from "arktype";

/**
 * Common shape of any parsed sequence record
 */
export interface AbstractSequence {
  /** Sequence identifier (may be empty string in malformed data) */
  readonly id: string;
  /** Optional description/comment line */
  readonly description?: string;
  /** The actual sequence data */
  readonly sequence: string;
  /** Cached sequence length */
  readonly length: number;
  /** Original line number where this sequence started (for error reporting) */
  readonly lineNumber?: number;
}

/**
 * FASTA sequence representation
 * Format: >id description\nsequence
 */
export interface FastaSequence extends AbstractSequence {
  readonly format: "fasta";
}

/**
 * Strand orientation as written in annotation files
 */
export type Strand = "+" | "-" | ".";

/**
 * Strand of something that has a definite orientation (an alignment or a
 * projected window)
 */
export type OrientedStrand = Exclude<Strand, ".">;

/**
 * Minimal logging sink. `console` satisfies it.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to preserve original line numbers */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats recognised on input files
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Branded file path type for validated paths
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * File reader configuration
 */
export interface FileReaderOptions {
  /** Read chunk size in bytes */
  bufferSize?: number;
  /** Text encoding of the file */
  encoding?: "utf8" | "binary";
  /** Refuse files larger than this many bytes */
  maxFileSize?: number;
  /** Decompress based on extension or magic bytes */
  autoDecompress?: boolean;
}

/**
 * File metadata information
 */
export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

/**
 * DNA/RNA sequence schema: strips whitespace, validates IUPAC characters
 */
export const SequenceSchema = type("string").pipe((seq: string, ctx) => {
  const cleaned = seq.replace(/\s+/g, "");
  const invalidChars = cleaned.match(/[^ACGTURYSWKMBDHVNacgturyswkmbdhvn\-.*]/g);

  if (invalidChars !== null) {
    return ctx.error(`IUPAC nucleotide codes (found ${[...new Set(invalidChars)].join(", ")})`);
  }

  return cleaned;
});

/**
 * File path validation schema
 */
export const FilePathSchema = type("string>0").pipe((path: string, ctx) => {
  if (path.includes("\0")) {
    return ctx.error("a path without null characters");
  }
  if (path.trim() !== path) {
    return ctx.error("a path without leading or trailing whitespace");
  }
  return path as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": '"utf8"|"binary"',
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && options.bufferSize > 16_777_216) {
    return ctx.reject({
      expected: "bufferSize <= 16MB",
      actual: `${options.bufferSize} bytes`,
      path: ["bufferSize"],
    });
  }
  return true;
});
