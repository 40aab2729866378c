/**
 * Streaming gzip decompression
 *
 * Wraps a compressed byte stream in the platform's DecompressionStream so
 * parsers can keep consuming lines without knowing the input was compressed.
 */

import { DecompressionStream } from "node:stream/web";
import { CompressionError } from "../errors";

/**
 * Wrap compressed readable stream with gzip decompression
 *
 * @param input Compressed data stream
 * @returns Decompressed data stream
 * @throws {CompressionError} If the decompressor cannot be attached
 *
 * @example
 * ```typescript
 * const compressed = await createStream("genome.fasta.gz", { autoDecompress: false });
 * for await (const line of readLines(wrapStream(compressed))) {
 *   // ...
 * }
 * ```
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  try {
    return input.pipeThrough<Uint8Array>(new DecompressionStream("gzip"));
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "stream", err);
  }
}

export const GzipDecompressor = {
  wrapStream,
} as const;
