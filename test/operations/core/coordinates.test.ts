import { describe, expect, test } from "vitest";
import {
  clampToSequence,
  formatRegion,
  intervalSpan,
  normalizeInterval,
} from "../../../src/operations/core/coordinates";

describe("normalizeInterval", () => {
  test("orders coordinates", () => {
    expect(normalizeInterval(900, 500)).toEqual({ start: 500, end: 900 });
    expect(normalizeInterval(500, 900)).toEqual({ start: 500, end: 900 });
  });
});

describe("clampToSequence", () => {
  test("moves non-positive starts to 1", () => {
    expect(clampToSequence({ start: -1001, end: 999 }, 10_000)).toEqual({ start: 1, end: 999 });
    expect(clampToSequence({ start: 0, end: 50 }, 10_000)).toEqual({ start: 1, end: 50 });
  });

  test("caps ends at the sequence length", () => {
    expect(clampToSequence({ start: 9000, end: 12_000 }, 10_000)).toEqual({
      start: 9000,
      end: 10_000,
    });
    expect(clampToSequence({ start: 9000, end: 10_000 }, 10_000)).toEqual({
      start: 9000,
      end: 10_000,
    });
  });

  test("raises ends below 1", () => {
    expect(clampToSequence({ start: -2000, end: -5 }, 10_000)).toEqual({ start: 1, end: 1 });
  });
});

describe("intervalSpan and formatRegion", () => {
  test("measure and label an interval", () => {
    expect(intervalSpan({ start: 1, end: 999 })).toBe(998);
    expect(formatRegion("ctg1", { start: 1, end: 999 })).toBe("ctg1:1-999");
  });
});
