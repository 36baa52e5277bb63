import { describe, expect, test } from "vitest";
import { InvalidArgumentError } from "./errors.js";
import { resolvePeriod, runCalloutReport } from "./report.js";
import { SeriesStore, type SeriesRecord } from "./series.js";

const food: SeriesRecord[] = [10, 10, 10, 10, 10, 10, 100].map((amount, i) => ({
  key: "Food",
  date: `2024-06-${String(6 + i).padStart(2, "0")}`,
  amount,
}));
const store = SeriesStore.fromRecords([
  ...food,
  { key: "Rent", date: "2024-06-01", amount: 2000 },
]);

describe("runCalloutReport", () => {
  test("runs every check and keeps the last week", () => {
    const report = runCalloutReport(store, {
      metric: "amount",
      checks: [
        { type: "spike" },
        { type: "condition", operator: ">", threshold: 1000 },
        { type: "total", operator: ">", threshold: 100 },
      ],
      period: { type: "last_week" },
      today: "2024-06-15",
    });

    expect(report.period).toEqual({ start: "2024-06-08", end: "2024-06-14" });
    expect(report.window).toBe(7);
    expect(report.total).toBe(2);
    expect(report.callouts[0]).toMatchObject({
      kind: "deviation",
      key: "Food",
      date: "2024-06-12",
      stdDevsAway: 2.27,
    });
    expect(report.callouts[1]).toMatchObject({
      kind: "metric",
      key: "Food",
      moreInfo: "Total: 140 over 5 days",
    });
  });

  test("covers the whole series without a period", () => {
    const report = runCalloutReport(store, {
      metric: "amount",
      checks: [
        { type: "spike" },
        { type: "condition", operator: ">", threshold: 1000 },
        { type: "total", operator: ">", threshold: 100 },
      ],
    });

    expect(report.period).toBeNull();
    expect(report.callouts.map((c) => `${c.kind}:${c.key}`)).toEqual([
      "deviation:Food",
      "dated:Rent",
      "metric:Food",
      "metric:Rent",
    ]);
  });

  test("flat checks do not need baselines", () => {
    const report = runCalloutReport(store, {
      metric: "amount",
      checks: [{ type: "condition", operator: "<", threshold: 20 }],
      period: { type: "range", start: "2024-06-06", end: "2024-06-07" },
    });
    expect(report.total).toBe(2);
  });

  test("an empty series reports nothing", () => {
    const report = runCalloutReport(SeriesStore.fromRecords([]), {
      metric: "amount",
      checks: [{ type: "spike" }, { type: "drop" }],
      period: { type: "last_week" },
      today: "2024-06-15",
    });
    expect(report.callouts).toEqual([]);
  });
});

describe("resolvePeriod", () => {
  test("resolves relative periods against today", () => {
    expect(resolvePeriod({ type: "all" }, "2024-06-15")).toBeNull();
    expect(resolvePeriod({ type: "buffered", bufferDays: 2 }, "2024-06-15")).toEqual({
      start: "2024-06-06",
      end: "2024-06-13",
    });
  });

  test("rejects an inverted range", () => {
    expect(() =>
      resolvePeriod({ type: "range", start: "2024-06-10", end: "2024-06-01" }, "2024-06-15"),
    ).toThrow(InvalidArgumentError);
  });
});
