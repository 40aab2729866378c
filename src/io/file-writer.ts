/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers over the platform FileSystem service. The output
 * of a run is a single FASTA file written through `openForWriting`.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Cause, Effect, Exit } from "effect";
import { FileError, PromoterKitError } from "../errors";
import { getPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @throws {FileError} When write operation fails
 *
 * @example
 * ```typescript
 * await writeString("taxa.tsv", "Tx1\tTx1.gff3\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is opened with 644 permissions, truncated, and closed by Effect's
 * scope when the callback settles. Anything already written stays on disk if
 * the callback throws.
 *
 * @param path - File path to open
 * @param callback - Function that receives the write handle
 * @returns Promise resolving to the callback's return value
 * @throws {FileError} When the file cannot be opened or written
 * @throws {PromoterKitError} Rethrown unchanged when raised by the callback
 *
 * @example
 * ```typescript
 * await openForWriting("promoter_seqs_promotors.fasta", async (handle) => {
 *   for (const record of records) {
 *     await handle.writeString(writer.formatSequence(record) + "\n");
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs.open(path, { flag: "w", mode: 0o644 });

    const handle: FileWriteHandle = {
      writeString: (content: string): Promise<void> =>
        Effect.runPromise(file.writeAll(encoder.encode(content))),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  const exit = await Effect.runPromiseExit(
    program.pipe(Effect.scoped, Effect.provide(getPlatform()))
  );
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }

  // Errors raised by the callback itself keep their type
  const error = Cause.squash(exit.cause);
  if (error instanceof PromoterKitError) {
    throw error;
  }
  throw FileError.fromSystemError("write", path, error);
}

export const FileWriter = {
  writeString,
  openForWriting,
} as const;
