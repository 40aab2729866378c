/**
 * Tests for the GFF3 parser
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { GffParser, parseGffAttributes, parseGffStrand } from "../../src/formats/gff";
import { collect } from "../utils/fixtures";

describe("parseGffAttributes", () => {
  test("splits key=value pairs", () => {
    expect(parseGffAttributes("ID=gene1;Name=Abc1;Note=putative kinase")).toEqual({
      ID: "gene1",
      Name: "Abc1",
      Note: "putative kinase",
    });
  });

  test("ignores pairs without '=' and trailing separators", () => {
    expect(parseGffAttributes("ID=gene1;orphan;;Name=x;")).toEqual({ ID: "gene1", Name: "x" });
  });

  test("splits at the first '=' only", () => {
    expect(parseGffAttributes("Dbxref=expr=1")).toEqual({ Dbxref: "expr=1" });
  });

  test("decodes percent escapes", () => {
    expect(parseGffAttributes("ID=g%3B1;Name=a%2Cb")).toEqual({ ID: "g;1", Name: "a,b" });
  });

  test("returns an empty set for missing or placeholder columns", () => {
    expect(parseGffAttributes(undefined)).toEqual({});
    expect(parseGffAttributes(".")).toEqual({});
    expect(parseGffAttributes("   ")).toEqual({});
    expect(parseGffAttributes("gene_id \"g1\"")).toEqual({});
  });
});

describe("parseGffStrand", () => {
  test("maps unknown strands to '.'", () => {
    expect(parseGffStrand("+")).toBe("+");
    expect(parseGffStrand("-")).toBe("-");
    expect(parseGffStrand("?")).toBe(".");
    expect(parseGffStrand(".")).toBe(".");
  });
});

describe("GffParser", () => {
  const parser = new GffParser();

  test("parses a feature line", async () => {
    const features = await collect(
      parser.parseString("##gff-version 3\nctg1\tmaker\tgene\t100\t900\t.\t-\t.\tID=g1;Name=Abc\n")
    );

    expect(features).toEqual([
      {
        seqId: "ctg1",
        source: "maker",
        type: "gene",
        start: 100,
        end: 900,
        score: null,
        strand: "-",
        phase: null,
        attributes: { ID: "g1", Name: "Abc" },
        lineNumber: 2,
      },
    ]);
  });

  test("tolerates a missing attribute column", async () => {
    const features = await collect(parser.parseString("ctg1\tsrc\tCDS\t1\t90\t12.5\t+\t0\n"));

    expect(features).toHaveLength(1);
    expect(features[0]?.attributes).toEqual({});
    expect(features[0]?.score).toBe(12.5);
    expect(features[0]?.phase).toBe(0);
  });

  test("reports short lines through onError", async () => {
    const data = "ctg1\tsrc\tgene\t1\t90\t.\t+\n";
    await expect(collect(parser.parseString(data))).rejects.toThrow(ParseError);
    await expect(collect(parser.parseString(data))).rejects.toThrow(
      "GFF3 line has 7 columns, expected at least 8"
    );
  });

  test("skips short lines when onError does not throw", async () => {
    const errors: Array<[string, number | undefined]> = [];
    const lenient = new GffParser({
      onError: (message, lineNumber) => {
        errors.push([message, lineNumber]);
      },
    });

    const features = await collect(
      lenient.parseString("ctg1\tsrc\tregion\t1\t100\nctg1\tsrc\tgene\t1\t90\t.\t+\t.\tID=g1\n")
    );

    expect(features.map((feature) => feature.attributes.ID)).toEqual(["g1"]);
    expect(errors).toEqual([["GFF3 line has 5 columns, expected at least 8", 1]]);
  });

  test("stops at the ##FASTA directive", async () => {
    const data = [
      "ctg1\tsrc\tgene\t1\t90\t.\t+\t.\tID=g1",
      "##FASTA",
      ">ctg1",
      "ACGT",
    ].join("\n");

    const features = await collect(parser.parseString(data));
    expect(features.map((feature) => feature.attributes.ID)).toEqual(["g1"]);
  });

  test("reports invalid coordinates through onError", async () => {
    const errors: Array<[string, number | undefined]> = [];
    const lenient = new GffParser({
      onError: (message, lineNumber) => {
        errors.push([message, lineNumber]);
      },
    });

    const features = await collect(
      lenient.parseString(
        "ctg1\tsrc\tgene\t900\t100\t.\t+\t.\tID=g1\nctg1\tsrc\tgene\tx\t100\t.\t+\t.\tID=g2\n"
      )
    );

    expect(features).toEqual([]);
    expect(errors).toEqual([
      ["Start 900 is greater than end 100 on ctg1", 1],
      ["Invalid coordinates 'x'-'100' on ctg1", 2],
    ]);
  });

  test("warns about columns past the ninth", async () => {
    const warnings: string[] = [];
    const noisy = new GffParser({
      onWarning: (warning) => {
        warnings.push(warning);
      },
    });

    await collect(noisy.parseString("ctg1\tsrc\tgene\t1\t90\t.\t+\t.\tID=g1\textra\n"));
    expect(warnings).toEqual(["Line has 10 columns; extra columns ignored"]);
  });
});
