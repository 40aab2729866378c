/**
 * Stream processing utilities for line-oriented text
 *
 * Every input this tool reads (BLAST tables, annotation files, assemblies,
 * file lists) is consumed line by line from a byte stream.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 100_000_000;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering so complete lines are yielded even when chunks
 * don't align with line boundaries.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @yields Complete lines of text, without terminators
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "binary" = "utf8"
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "binary" ? "latin1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        settled = true;
        buffer += decoder.decode();
        if (buffer.length > 0) {
          yield* processBuffer(`${buffer}\n`).lines;
        }
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }
  } catch (error) {
    settled = true;
    if (error instanceof BufferError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    // Consumer stopped early (e.g. at ##FASTA): close the source
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles \n, \r\n and bare \r endings and keeps the incomplete tail for
 * the next chunk. A \r at the very end of the buffer stays in the remainder
 * since the next chunk may start with \n.
 *
 * @param buffer Text buffer to process
 * @returns Complete lines and remainder
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLineLength(buffer.slice(lineStart, lineEnd)));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLineLength(buffer.slice(lineStart, position)));
      lineStart = position + 1;
    }
  }

  return {
    lines,
    remainder: checkLineLength(buffer.slice(lineStart)),
  };
}

function checkLineLength(line: string): string {
  if (line.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      line.length,
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

/**
 * Split an in-memory string into lines with the same rules as readLines
 */
export function splitLines(data: string): string[] {
  if (data.length === 0) {
    return [];
  }
  const terminated = data.endsWith("\n") ? data : `${data}\n`;
  return processBuffer(terminated).lines;
}

export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
} as const;
