/**
 * Tests for taxon file lists and synonym tables
 */

import { afterAll, describe, expect, test } from "vitest";
import { TabularParseError } from "../../src/errors";
import {
  parseSynonymRows,
  parseTaxonFileList,
  readSynonymFile,
  readTaxonFileList,
} from "../../src/formats/tabular";
import { createFixtureDir } from "../utils/fixtures";

describe("parseTaxonFileList", () => {
  test("reads taxon id and path pairs", async () => {
    const entries = await parseTaxonFileList([
      "# taxon\tpath",
      "Tx1\t/data/tx1.gff3",
      "",
      " Tx2 \t/data/tx2.gff3 ",
    ]);

    expect(entries).toEqual([
      { taxonId: "Tx1", path: "/data/tx1.gff3", lineNumber: 2 },
      { taxonId: "Tx2", path: "/data/tx2.gff3", lineNumber: 4 },
    ]);
  });

  test("requires exactly two columns", async () => {
    await expect(parseTaxonFileList(["Tx1\ta.gff3\textra"], "annotation list")).rejects.toThrow(
      "Expected 2 tab-separated fields (taxon id, path), got 3 (line 1)"
    );
    await expect(parseTaxonFileList(["Tx1"])).rejects.toThrow(TabularParseError);
  });

  test("rejects repeated taxa", async () => {
    await expect(parseTaxonFileList(["Tx1\ta.gff3", "Tx1\tb.gff3"])).rejects.toThrow(
      `Duplicate taxon id 'Tx1' (first seen on line 1) (line 2, column 1, field "taxon id")`
    );
  });

  test("rejects empty fields", async () => {
    await expect(parseTaxonFileList(["Tx1\t"])).rejects.toThrow(/Empty path/);
  });

  test("names the list in the error", async () => {
    await expect(parseTaxonFileList(["only-one"], "sequence list")).rejects.toMatchObject({
      format: "sequence list",
    });
  });
});

describe("parseSynonymRows", () => {
  test("accepts two and three column rows", async () => {
    const entries = await parseSynonymRows(["Gene1v2\tGene1\tTx1", "Abc.1\tAbc"]);

    expect(entries).toEqual([
      { externalId: "Gene1v2", featureId: "Gene1", prefixId: "Tx1" },
      { externalId: "Abc.1", featureId: "Abc" },
    ]);
  });

  test("rejects one and four column rows", async () => {
    await expect(parseSynonymRows(["lonely"])).rejects.toThrow(/got 1/);
    await expect(parseSynonymRows(["a\tb\tc\td"])).rejects.toThrow(/got 4/);
  });

  test("rejects repeated external ids", async () => {
    await expect(parseSynonymRows(["a\tb", "a\tc"])).rejects.toThrow(
      /Duplicate external id 'a'/
    );
  });
});

describe("reading from disk", () => {
  const fixtures = createFixtureDir();
  afterAll(() => fixtures.cleanup());

  test("reads both list kinds", async () => {
    const list = fixtures.write("gff.list", "Tx1\ttx1.gff3\nTx2\ttx2.gff3\n");
    const synonyms = fixtures.write("syn.tsv.gz", "Gene1v2\tGene1\tTx1\n");

    expect((await readTaxonFileList(list)).map((entry) => entry.taxonId)).toEqual(["Tx1", "Tx2"]);
    expect(await readSynonymFile(synonyms)).toEqual([
      { externalId: "Gene1v2", featureId: "Gene1", prefixId: "Tx1" },
    ]);
  });
});
