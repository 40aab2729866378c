/**
 * File reading utilities built on Effect Platform
 *
 * All Effect machinery stays inside this module: callers get plain
 * Promise-returning functions and ReadableStreams, and every failure is
 * converted into a FileError that names the path and operation.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Chunk, Effect, Option, Stream } from "effect";
import { CompressionDetector, GzipDecompressor } from "../compression";
import { FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform } from "./runtime";
import { StreamUtils } from "./stream-utils";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65_536,
  encoding: "utf8",
  maxFileSize: 50_000_000_000, // assemblies of large plant genomes run to tens of GB
  autoDecompress: true,
};

/**
 * Check if a file exists and is a regular file
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path names an existing file
 * @throws {FileError} If path validation fails or the file system errors
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file metadata
 *
 * @param path File path to analyze
 * @throws {FileError} If the file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const lastDot = validatedPath.lastIndexOf(".");

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      extension: lastDot === -1 ? "" : validatedPath.substring(lastDot),
    };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file, decompressing gzip input
 *
 * @param path File path to read
 * @param options Reading options
 * @returns Promise resolving to a ReadableStream of (decompressed) file data
 * @throws {FileError} If the file is missing, too large or cannot be opened
 *
 * @example
 * ```typescript
 * const stream = await createStream("genome.fasta.gz");
 * for await (const line of StreamUtils.readLines(stream)) {
 *   // ...
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      `File not found: ${validatedPath}. Please check the file path and try again.`,
      validatedPath,
      "read"
    );
  }

  const metadata = await getMetadata(validatedPath);
  if (metadata.size > mergedOptions.maxFileSize) {
    throw new FileError(
      `File size ${metadata.size} exceeds maximum ${mergedOptions.maxFileSize}`,
      validatedPath,
      "read"
    );
  }

  try {
    const compressed =
      mergedOptions.autoDecompress &&
      CompressionDetector.detect(validatedPath, await readHeader(validatedPath)) === "gzip";
    const stream = await createBaseStream(validatedPath, mergedOptions);
    return compressed
      ? GzipDecompressor.wrapStream(stream)
      : stream;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw FileError.fromSystemError("open", validatedPath, error);
  }
}

/**
 * Read a text file line by line
 *
 * @param path File path to read
 * @param options Reading options
 * @yields Lines without terminators
 */
export async function* readLines(
  path: string,
  options: FileReaderOptions = {}
): AsyncIterable<string> {
  const stream = await createStream(path, options);
  yield* StreamUtils.readLines(stream, options.encoding ?? DEFAULT_OPTIONS.encoding);
}

/**
 * Read entire file to string
 *
 * @param path File path to read
 * @param options Reading options
 * @throws {FileError} If the file cannot be read
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const lines: string[] = [];
  for await (const line of readLines(path, options)) {
    lines.push(line);
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

export const FileReader = {
  exists,
  getMetadata,
  createStream,
  readLines,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function createBaseStream(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}

async function readHeader(validatedPath: FilePath): Promise<Uint8Array> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const chunks = yield* Stream.runCollect(fs.stream(validatedPath, { bytesToRead: 2 }));
    const header = new Uint8Array(2);
    let offset = 0;
    for (const chunk of Chunk.toReadonlyArray(chunks)) {
      const take = chunk.subarray(0, header.length - offset);
      header.set(take, offset);
      offset += take.length;
    }
    return header.subarray(0, offset);
  });

  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }
  return { ...DEFAULT_OPTIONS, ...validationResult };
}
