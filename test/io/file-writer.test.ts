/**
 * Tests for file writing on top of the platform FileSystem
 */

import { readFileSync } from "fs";
import { afterAll, describe, expect, test } from "vitest";
import { FileError, ValidationError } from "../../src/errors";
import { openForWriting, writeString } from "../../src/io/file-writer";
import { createFixtureDir } from "../utils/fixtures";

describe("FileWriter", () => {
  const fixtures = createFixtureDir();
  afterAll(() => fixtures.cleanup());

  test("writeString should create and overwrite files", async () => {
    const target = fixtures.path("out.txt");
    await writeString(target, "first\n");
    await writeString(target, "second\n");
    expect(readFileSync(target, "utf8")).toBe("second\n");
  });

  test("openForWriting should append each write and return the callback value", async () => {
    const target = fixtures.path("records.fasta");
    const count = await openForWriting(target, async (handle) => {
      await handle.writeString(">a\nAC\n");
      await handle.writeString(">b\nGT\n");
      return 2;
    });

    expect(count).toBe(2);
    expect(readFileSync(target, "utf8")).toBe(">a\nAC\n>b\nGT\n");
  });

  test("openForWriting should truncate an existing file", async () => {
    const target = fixtures.write("stale.fasta", ">old\nNNNN\n");
    await openForWriting(target, async () => undefined);
    expect(readFileSync(target, "utf8")).toBe("");
  });

  test("openForWriting should rethrow domain errors unchanged", async () => {
    const failure = new ValidationError("bad record");
    await expect(
      openForWriting(fixtures.path("partial.fasta"), async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });

  test("should report unwritable destinations as FileError", async () => {
    const target = fixtures.path("no/such/dir/out.fasta");
    await expect(writeString(target, "x")).rejects.toThrow(FileError);
    await expect(openForWriting(target, async () => undefined)).rejects.toMatchObject({
      filePath: target,
      operation: "write",
    });
  });
});
