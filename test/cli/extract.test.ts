import { readFileSync } from "fs";
import { CommanderError } from "commander";
import { afterAll, describe, expect, test } from "vitest";
import type { ExtractCliOptions } from "../../src/cli/extract";
import {
  createExtractCommand,
  parseIntegerOption,
  parseNumberOption,
  toConfigInput,
} from "../../src/cli/extract";
import { createProgram, VERSION } from "../../src/cli/program";
import { blastLine, createFixtureDir } from "../utils/fixtures";

function quietCommand() {
  return createExtractCommand()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

const baseOptions: ExtractCliOptions = {
  blast: "hits.tsv",
  gffList: "gff.list",
  fastaList: "fasta.list",
  region: "D",
  length: 2000,
  coverage: 10,
  identity: 10,
  prefix: false,
  altSuffix: false,
  outbase: "promoter_seqs",
  extension: "fasta",
  lineWidth: 60,
  quiet: false,
};

describe("option parsers", () => {
  test("parseNumberOption accepts decimals", () => {
    expect(parseNumberOption("12.5")).toBe(12.5);
    expect(() => parseNumberOption("ten")).toThrow("'ten' is not a number.");
    expect(() => parseNumberOption(" ")).toThrow(CommanderError);
  });

  test("parseIntegerOption refuses fractions", () => {
    expect(parseIntegerOption("1500")).toBe(1500);
    expect(() => parseIntegerOption("1.5")).toThrow("'1.5' is not an integer.");
  });
});

describe("toConfigInput", () => {
  test("applies --coverage to both thresholds", () => {
    expect(toConfigInput({ ...baseOptions, coverage: 40 })).toEqual({
      blastFile: "hits.tsv",
      annotationList: "gff.list",
      sequenceList: "fasta.list",
      region: "D",
      length: 2000,
      minQueryCoverage: 40,
      minSubjectCoverage: 40,
      minIdentity: 10,
      usePrefix: false,
      altSuffix: false,
      outbase: "promoter_seqs",
      extension: "fasta",
      lineWidth: 60,
    });
  });

  test("lets the specific thresholds override --coverage", () => {
    const input = toConfigInput({ ...baseOptions, coverage: 40, subjectCoverage: 75, synonyms: "syn.tsv" });
    expect(input.minQueryCoverage).toBe(40);
    expect(input.minSubjectCoverage).toBe(75);
    expect(input.synonymFile).toBe("syn.tsv");
  });
});

describe("extract command", () => {
  const fixtures = createFixtureDir();
  afterAll(() => fixtures.cleanup());

  test("rejects a missing required option", async () => {
    await expect(
      quietCommand().parseAsync(["-b", "hits.tsv", "-g", "gff.list"], { from: "user" })
    ).rejects.toMatchObject({ code: "commander.missingMandatoryOptionValue" });
  });

  test("rejects an unknown region mode", async () => {
    await expect(
      quietCommand().parseAsync(["-b", "h", "-g", "g", "-f", "f", "-r", "X"], { from: "user" })
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });

  test("rejects a non-integer length", async () => {
    await expect(
      quietCommand().parseAsync(["-b", "h", "-g", "g", "-f", "f", "-l", "2.5"], { from: "user" })
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });

  test("runs an extraction end to end", async () => {
    const contig = "GATTACA".repeat(10);
    const blast = fixtures.write("hits.tsv", blastLine({ subject: "geneA", subjectStart: 50, subjectEnd: 1 }) + "\n");
    const gff = fixtures.write(
      "Tx1.gff3",
      ["ctg1", "test", "gene", 21, 30, ".", "-", ".", "ID=geneA"].join("\t") + "\n"
    );
    const fasta = fixtures.write("Tx1.fa", `>ctg1\n${contig}\n`);
    const gffList = fixtures.write("gff.list", `Tx1\t${gff}\n`);
    const fastaList = fixtures.write("fasta.list", `Tx1\t${fasta}\n`);

    await quietCommand().parseAsync(
      [
        "-b", blast,
        "-g", gffList,
        "-f", fastaList,
        "-r", "B",
        "-l", "3",
        "-w", "0",
        "-o", fixtures.path("cli"),
        "-e", "fa",
        "-q",
      ],
      { from: "user" }
    );

    // B: [21 - 3 - 1, 30 + 1 + 3] = [17, 34], reverse-complemented
    expect(readFileSync(fixtures.path("cli_promotors.fa"), "utf8")).toBe(
      ">geneA_B3 ctg1:17-34 AltID=geneA\nGTAATCTGTAATCTGTAA\n"
    );
  });
});

describe("createProgram", () => {
  test("registers the extract command", () => {
    const program = createProgram();
    expect(program.name()).toBe("promoterkit");
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(["extract"]);
  });
});
