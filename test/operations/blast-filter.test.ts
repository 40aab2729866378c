import { afterAll, describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import type { AlignmentHit } from "../../src/formats/blast";
import { BlastHitFilter, SelectedHitTable } from "../../src/operations/blast-filter";
import { SynonymTable } from "../../src/operations/synonyms";
import { blastLine, createFixtureDir, createRecordingLogger } from "../utils/fixtures";

function hit(overrides: Partial<AlignmentHit> = {}): AlignmentHit {
  return {
    queryId: "q1",
    subjectId: "Gene1",
    percentIdentity: 90,
    alignmentLength: 100,
    mismatches: 0,
    gapOpens: 0,
    queryStart: 1,
    queryEnd: 100,
    subjectStart: 1000,
    subjectEnd: 1099,
    evalue: 1e-40,
    bitScore: 180,
    queryLength: 200,
    subjectLength: 400,
    ...overrides,
  };
}

describe("BlastHitFilter.evaluate", () => {
  const filter = new BlastHitFilter({}, undefined);

  test("computes coverages and strand", () => {
    expect(filter.evaluate(hit())).toEqual({
      queryCoverage: 50,
      subjectCoverage: 25,
      strand: "+",
      passesQueryCoverage: true,
      passesSubjectCoverage: true,
      passesIdentity: true,
      selected: true,
    });
    expect(filter.evaluate(hit({ subjectStart: 1099, subjectEnd: 1000 })).strand).toBe("-");
  });

  test("treats thresholds as inclusive", () => {
    const strict = new BlastHitFilter({
      minQueryCoverage: 50,
      minSubjectCoverage: 25,
      minIdentity: 90,
    });
    expect(strict.evaluate(hit()).selected).toBe(true);
    expect(strict.evaluate(hit({ percentIdentity: 89.99 })).selected).toBe(false);
  });

  test("rounds before comparing", () => {
    // 100 * 1 / 16 = 6.25 -> 6.3
    const filterAt63 = new BlastHitFilter({
      minQueryCoverage: 6.3,
      minSubjectCoverage: 0,
      minIdentity: 0,
    });
    expect(filterAt63.evaluate(hit({ alignmentLength: 1, queryLength: 16 })).selected).toBe(true);
  });

  test("fails on a zero length", () => {
    expect(() => filter.evaluate(hit({ subjectLength: 0 }))).toThrow(ValidationError);
  });

  test("validates thresholds", () => {
    expect(() => new BlastHitFilter({ minIdentity: 101 })).toThrow(
      "minIdentity must be a percentage in [0, 100], got 101"
    );
  });
});

describe("BlastHitFilter.filter", () => {
  test("normalizes coordinates of minus-strand hits", async () => {
    const filter = new BlastHitFilter({ logger: createRecordingLogger() });
    const { table } = await filter.filter([hit({ subjectStart: 5000, subjectEnd: 4701 })]);

    expect(table.get("Gene1")).toEqual({
      resolvedId: "Gene1",
      subjectId: "Gene1",
      strand: "-",
      start: 4701,
      end: 5000,
      queryCoverage: 50,
      subjectCoverage: 25,
      percentIdentity: 90,
    });
  });

  test("a later hit for the same resolved id replaces the earlier one", async () => {
    const filter = new BlastHitFilter({ logger: createRecordingLogger() });
    const { table } = await filter.filter([
      hit({ subjectStart: 100, subjectEnd: 199 }),
      hit({ subjectStart: 700, subjectEnd: 799, percentIdentity: 80 }),
    ]);

    expect(table.size).toBe(1);
    expect(table.get("Gene1")?.start).toBe(700);
    expect(table.get("Gene1")?.end).toBe(799);
    expect(table.get("Gene1")?.percentIdentity).toBe(80);
  });

  test("resolves subjects through synonyms", async () => {
    const synonyms = SynonymTable.fromEntries([
      { externalId: "Gene1v2", featureId: "Gene1", prefixId: "Tx1" },
    ]);
    const filter = new BlastHitFilter({ usePrefix: true, logger: createRecordingLogger() }, synonyms);
    const { table } = await filter.filter([hit({ subjectId: "Gene1v2" }), hit({ subjectId: "other" })]);

    expect([...table].map(([id, selected]) => [id, selected.subjectId])).toEqual([
      ["Tx1_Gene1", "Gene1v2"],
      ["other", "other"],
    ]);
  });

  test("aggregates statistics and reports them", async () => {
    const logger = createRecordingLogger();
    const filter = new BlastHitFilter({ minQueryCoverage: 40, minIdentity: 85, logger });
    const { statistics } = await filter.filter([
      hit(), // qcov 50, scov 25, id 90: selected
      hit({ subjectId: "Gene2", queryLength: 400 }), // qcov 25: fails query coverage
      hit({ subjectId: "Gene3", percentIdentity: 80 }), // fails identity
      hit({ subjectId: "Gene1", subjectLength: 2000 }), // scov 5: fails subject coverage
    ]);

    expect(statistics).toEqual({
      totalHits: 4,
      uniqueSubjects: 3,
      meanQueryCoverage: 43.75,
      meanSubjectCoverage: 20,
      meanIdentity: 87.5,
      passingQueryCoverage: 3,
      passingSubjectCoverage: 3,
      passingIdentity: 3,
      passingAll: 1,
      selectedIds: 1,
    });
    expect(logger.infos).toEqual([
      "[BlastHitFilter] 4 hits on 3 subjects; mean query coverage 43.8%, mean subject coverage 20.0%, mean identity 87.5%",
      "[BlastHitFilter] query coverage >= 40: 3/4; subject coverage >= 10: 3/4; identity >= 85: 3/4; all: 1/4 (1 distinct ids)",
    ]);
  });

  test("reports zeros for an empty table", async () => {
    const filter = new BlastHitFilter({ logger: createRecordingLogger() });
    const { table, statistics } = await filter.filter([]);
    expect(table.size).toBe(0);
    expect(statistics.meanQueryCoverage).toBe(0);
  });
});

describe("BlastHitFilter.filterFile", () => {
  const fixtures = createFixtureDir();
  afterAll(() => fixtures.cleanup());

  test("parses and selects from disk", async () => {
    const path = fixtures.write(
      "hits.tsv",
      [
        blastLine({ subject: "keep", alignmentLength: 90 }),
        blastLine({ subject: "drop", alignmentLength: 5 }),
      ].join("\n")
    );
    const filter = new BlastHitFilter({ logger: createRecordingLogger() });
    const { table } = await filter.filterFile(path);

    expect([...table.values()].map((selected) => selected.resolvedId)).toEqual(["keep"]);
  });
});

describe("SelectedHitTable", () => {
  test("returns the replaced hit", () => {
    const table = new SelectedHitTable();
    const base = {
      resolvedId: "g",
      subjectId: "g",
      strand: "+" as const,
      start: 1,
      end: 10,
      queryCoverage: 100,
      subjectCoverage: 100,
      percentIdentity: 100,
    };
    expect(table.set(base)).toBeUndefined();
    expect(table.set({ ...base, start: 5 })).toEqual(base);
    expect(table.has("g")).toBe(true);
  });
});
