import { describe, expect, test } from "vitest";
import type { CalloutRecord, DatedCallout, DeviationCallout, MetricCallout } from "./callouts.js";
import { bufferedWindow, filterWindow, getCallouts, lastWeekWindow } from "./filter.js";

function deviation(date: string, stdDevsAway: number, key = "A"): DeviationCallout {
  return {
    kind: "deviation",
    key,
    date,
    check: "Spike in amount",
    condition: "> 2 standard deviation from trailing average amount",
    moreInfo: "",
    value: "0",
    stdDevsAway,
  };
}

function dated(date: string, key = "A"): DatedCallout {
  return {
    kind: "dated",
    key,
    date,
    check: "amount > 100",
    condition: "amount > 100",
    moreInfo: "",
    value: "0",
  };
}

function metric(name: string, key = "A"): MetricCallout {
  return {
    kind: "metric",
    key,
    metric: name,
    check: `Total ${name} > 1`,
    condition: `total ${name} > 1`,
    moreInfo: "",
    value: "0",
  };
}

describe("getCallouts", () => {
  test("sorts by date descending, then mildest deviation first", () => {
    const sorted = getCallouts([
      deviation("2024-01-02", 3.0),
      deviation("2024-01-02", 1.0),
      deviation("2024-01-01", 5.0),
    ]);

    const pairs = sorted.map((c) =>
      c.kind === "deviation" ? [c.date, c.stdDevsAway] : [],
    );
    expect(pairs).toEqual([
      ["2024-01-02", 1.0],
      ["2024-01-02", 3.0],
      ["2024-01-01", 5.0],
    ]);
  });

  test("sorts dated-only callouts by date descending and keeps ties stable", () => {
    const sorted = getCallouts([
      dated("2024-01-01", "first"),
      dated("2024-01-03", "second"),
      dated("2024-01-01", "third"),
    ]);
    expect(sorted.map((c) => c.key)).toEqual(["second", "first", "third"]);
  });

  test("sorts metric callouts by metric ascending", () => {
    const sorted = getCallouts([metric("spend"), metric("hours"), metric("amount")]);
    expect(sorted.map((c) => (c.kind === "metric" ? c.metric : ""))).toEqual([
      "amount",
      "hours",
      "spend",
    ]);
  });

  test("orders a mixed feed by variant within each date", () => {
    const feed: CalloutRecord[] = [
      metric("hours", "total"),
      dated("2024-01-02", "flat"),
      deviation("2024-01-01", -2.5, "older"),
      deviation("2024-01-02", 2.1, "spike"),
    ];
    expect(getCallouts(feed).map((c) => c.key)).toEqual(["spike", "flat", "older", "total"]);
  });

  test("does not reorder its input", () => {
    const feed = [deviation("2024-01-01", 1), deviation("2024-01-02", 1)];
    getCallouts(feed);
    expect(feed.map((c) => c.date)).toEqual(["2024-01-01", "2024-01-02"]);
  });
});

describe("filterWindow", () => {
  test("last week excludes today and the eighth day back", () => {
    const { start, end } = lastWeekWindow("2024-06-15");
    expect({ start, end }).toEqual({ start: "2024-06-08", end: "2024-06-14" });

    const kept = filterWindow(
      [
        dated("2024-06-07"),
        dated("2024-06-08"),
        dated("2024-06-11"),
        dated("2024-06-14"),
        dated("2024-06-15"),
      ],
      start,
      end,
    );
    expect(kept.map((c) => (c.kind !== "metric" ? c.date : ""))).toEqual([
      "2024-06-08",
      "2024-06-11",
      "2024-06-14",
    ]);
  });

  test("keeps metric callouts, which carry no date", () => {
    const kept = filterWindow([metric("hours"), dated("2020-01-01")], "2024-01-01", "2024-01-31");
    expect(kept).toEqual([metric("hours")]);
  });

  test("an empty feed stays empty", () => {
    expect(filterWindow([], "2024-01-01", "2024-01-31")).toEqual([]);
  });
});

describe("bufferedWindow", () => {
  test("ends buffer days before today", () => {
    expect(bufferedWindow("2024-06-15")).toEqual({ start: "2024-06-05", end: "2024-06-12" });
    expect(bufferedWindow("2024-03-02", 1)).toEqual({ start: "2024-02-23", end: "2024-03-01" });
  });
});
