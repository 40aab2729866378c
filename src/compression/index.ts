/**
 * Compression support for input files
 *
 * @example
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from "./compression";
 *
 * if (CompressionDetector.fromExtension(path) === "gzip") {
 *   stream = GzipDecompressor.wrapStream(stream);
 * }
 * ```
 */

export { CompressionDetector, detect, fromExtension, fromMagicBytes } from "./detector";
export { GzipDecompressor, wrapStream } from "./gzip";
export type { CompressionFormat } from "../types";
