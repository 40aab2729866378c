/**
 * promoterkit - promoter sequence extraction for BLAST-selected genes
 *
 * Cross-references a BLAST table, per-genome GFF3 annotations and
 * per-genome assemblies to cut the flanking region of every selected gene.
 */

// Compression
export { CompressionDetector, GzipDecompressor } from "./compression";
// Configuration
export type { PromoterConfig, PromoterConfigInput } from "./config";
export { outputPath, parseConfig, PromoterConfigSchema } from "./config";
// Error types
export {
  BufferError,
  CompressionError,
  ConsistencyError,
  FileError,
  formatError,
  ParseError,
  PromoterKitError,
  SequenceError,
  StreamError,
  TabularParseError,
  ValidationError,
} from "./errors";
// Formats
export * from "./formats";
// File I/O
export { FileReader } from "./io/file-reader";
export type { FileWriteHandle } from "./io/file-writer";
export { FileWriter } from "./io/file-writer";
export { StreamUtils } from "./io/stream-utils";
// Logging
export { createLogger, silentLogger } from "./logger";
// Operations
export {
  complement,
  extractRegion,
  reverse,
  reverseComplement,
} from "./operations/core/sequence-manipulation";
export { coveragePercent, roundHalfAwayFromZero } from "./operations/core/calculations";
export type { Interval } from "./operations/core/coordinates";
export * from "./operations";
// Core types
export type {
  AbstractSequence,
  CompressionFormat,
  FastaSequence,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  Logger,
  OrientedStrand,
  ParserOptions,
  Strand,
} from "./types";
