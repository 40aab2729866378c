/**
 * Shared helpers for tests that touch the file system or collect streams
 */

import { gzipSync } from "fflate";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { Logger } from "../../src/types";

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export interface FixtureDir {
  readonly dir: string;
  /** Write a text file (gzip-compressed when the name ends in .gz) and return its path */
  write(name: string, content: string): string;
  path(name: string): string;
  cleanup(): void;
}

export function createFixtureDir(prefix = "promoterkit-"): FixtureDir {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    dir,
    write(name: string, content: string): string {
      const target = join(dir, name);
      writeFileSync(
        target,
        name.endsWith(".gz") ? gzipSync(new TextEncoder().encode(content)) : content
      );
      return target;
    },
    path(name: string): string {
      return join(dir, name);
    },
    cleanup(): void {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export interface RecordingLogger extends Logger {
  readonly infos: string[];
  readonly warnings: string[];
}

/**
 * Logger that keeps every message for assertions
 */
export function createRecordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message: string) => {
      infos.push(message);
    },
    warn: (message: string) => {
      warnings.push(message);
    },
  };
}

/**
 * Build one 14-column BLAST line
 */
export function blastLine(fields: {
  query?: string;
  subject: string;
  identity?: number;
  alignmentLength?: number;
  subjectStart?: number;
  subjectEnd?: number;
  queryLength?: number;
  subjectLength?: number;
}): string {
  const alignmentLength = fields.alignmentLength ?? 100;
  return [
    fields.query ?? "query1",
    fields.subject,
    fields.identity ?? 95,
    alignmentLength,
    2,
    0,
    1,
    alignmentLength,
    fields.subjectStart ?? 1,
    fields.subjectEnd ?? alignmentLength,
    "1e-50",
    200,
    fields.queryLength ?? 100,
    fields.subjectLength ?? 100,
  ].join("\t");
}
