import { describe, expect, test } from "vitest";
import {
  aggregateQuarterly,
  formatQuarter,
  parseAttentionDate,
  quarterOf,
} from "./quarterly";
import { createEmptyRow } from "./row";
import type { Row } from "./types";

function visit(identifier: string, attentionDate: string): Row {
  return { ...createEmptyRow(), identifier, attentionDate };
}

describe("parseAttentionDate", () => {
  test("ISO dates", () => {
    expect(parseAttentionDate("2024-01-15")).toEqual({
      year: 2024,
      month: 1,
      day: 15,
    });
    expect(parseAttentionDate("2024-11-03T10:30:00")).toEqual({
      year: 2024,
      month: 11,
      day: 3,
    });
  });

  test("day/month/year dates", () => {
    expect(parseAttentionDate("15/01/2024")).toEqual({
      year: 2024,
      month: 1,
      day: 15,
    });
    expect(parseAttentionDate("5/7/2023")).toEqual({
      year: 2023,
      month: 7,
      day: 5,
    });
  });

  test("rejects garbage and impossible dates", () => {
    expect(parseAttentionDate("not-a-date")).toBeNull();
    expect(parseAttentionDate("31/02/2024")).toBeNull();
    expect(parseAttentionDate("2023-02-29")).toBeNull();
    expect(parseAttentionDate("15.01.2024")).toBeNull();
    expect(parseAttentionDate("01/15/2024")).toBeNull();
    expect(parseAttentionDate("")).toBeNull();
  });

  test("leap day", () => {
    expect(parseAttentionDate("29/02/2024")).toEqual({
      year: 2024,
      month: 2,
      day: 29,
    });
  });
});

describe("quarters", () => {
  test("months map to quarters 1-4", () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12].map(quarterOf)).toEqual([
      1, 1, 1, 2, 2, 2, 3, 3, 3, 4, 4, 4,
    ]);
  });

  test("months outside 1-12 clamp to the nearest quarter", () => {
    expect(quarterOf(0)).toBe(1);
    expect(quarterOf(13)).toBe(4);
  });

  test("labels", () => {
    expect(formatQuarter(3)).toBe("Q3");
  });
});

describe("aggregateQuarterly", () => {
  test("both date formats count together", () => {
    const summary = aggregateQuarterly([
      visit("100", "2024-01-15"),
      visit("100", "15/01/2024"),
    ]);
    expect(summary).toEqual({
      status: "ok",
      entries: [{ identifier: "100", year: 2024, quarter: 1, count: 2 }],
    });
  });

  test("groups by identifier, year and quarter in order", () => {
    const summary = aggregateQuarterly([
      visit("200", "01/04/2024"),
      visit("100", "2024-12-31"),
      visit("100", "2023-02-01"),
      visit("200", "30/06/2024"),
      visit("100", "10/10/2024"),
      visit("100", "2024-01-02"),
    ]);
    expect(summary.entries).toEqual([
      { identifier: "100", year: 2023, quarter: 1, count: 1 },
      { identifier: "100", year: 2024, quarter: 1, count: 1 },
      { identifier: "100", year: 2024, quarter: 4, count: 2 },
      { identifier: "200", year: 2024, quarter: 2, count: 2 },
    ]);
  });

  test("identifiers sort by code unit, not locale", () => {
    const summary = aggregateQuarterly([
      visit("a1", "2024-01-10"),
      visit("B1", "2024-01-11"),
      visit("10", "2024-01-12"),
    ]);
    expect(summary.entries.map((e) => e.identifier)).toEqual(["10", "B1", "a1"]);
  });

  test("rows without identifier or with bad dates do not count", () => {
    const summary = aggregateQuarterly([
      visit("", "2024-01-15"),
      visit("100", "not-a-date"),
      visit("100", ""),
      visit("100", "2024-05-20"),
    ]);
    expect(summary).toEqual({
      status: "ok",
      entries: [{ identifier: "100", year: 2024, quarter: 2, count: 1 }],
    });
  });

  test("no committed rows is no-data", () => {
    expect(aggregateQuarterly([])).toEqual({ status: "no-data", entries: [] });
    expect(aggregateQuarterly([visit("", "2024-01-15")])).toEqual({
      status: "no-data",
      entries: [],
    });
  });

  test("committed rows without valid dates is no-valid-dates", () => {
    expect(aggregateQuarterly([visit("100", "not-a-date")])).toEqual({
      status: "no-valid-dates",
      entries: [],
    });
  });
});
