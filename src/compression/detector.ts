/**
 * Compression format detection for input files
 *
 * Genome assemblies and annotation files are routinely distributed
 * gzip-compressed; detection uses the file extension first and the gzip
 * magic bytes as a fallback for files renamed without one.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Detect compression format from file extension
 *
 * @param filePath File path to analyze
 * @returns "gzip" for .gz/.gzip paths, otherwise "none"
 * @throws {CompressionError} If the path is empty
 *
 * @example
 * ```typescript
 * fromExtension("/data/genome.fasta.gz"); // "gzip"
 * ```
 */
export function fromExtension(filePath: string): CompressionFormat {
  if (filePath.length === 0) {
    throw new CompressionError("File path must not be empty", "none", "detect");
  }

  const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
  return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
}

/**
 * Detect compression format from the first bytes of a file
 */
export function fromMagicBytes(bytes: Uint8Array): CompressionFormat {
  return bytes.length >= 2 &&
    bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
    bytes[1] === GZIP_MAGIC_SECOND_BYTE
    ? "gzip"
    : "none";
}

/**
 * Combine both detectors; the extension wins when it names a format
 */
export function detect(filePath: string, header: Uint8Array): CompressionFormat {
  const byExtension = fromExtension(filePath);
  return byExtension !== "none" ? byExtension : fromMagicBytes(header);
}

export const CompressionDetector = {
  fromExtension,
  fromMagicBytes,
  detect,
} as const;
