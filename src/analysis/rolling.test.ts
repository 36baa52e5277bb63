import { describe, expect, test } from "vitest";
import { InvalidArgumentError } from "./errors.js";
import { computeRollingStats } from "./rolling.js";
import { SeriesStore, type SeriesRecord } from "./series.js";

function days(key: string, values: number[], start = 1): SeriesRecord[] {
  return values.map((value, i) => ({
    key,
    date: `2024-01-${String(start + i).padStart(2, "0")}`,
    metric_value: value,
  }));
}

function column(store: SeriesStore, name: string, key?: string): number[] {
  return store.rows
    .filter((row) => key === undefined || row.key === key)
    .map((row) => store.value(row, name));
}

describe("computeRollingStats", () => {
  test("uses however many rows exist at the start of a series", () => {
    const store = computeRollingStats(
      SeriesStore.fromRecords(days("A", [10, 20, 30, 40])),
      "metric_value",
    );

    expect(column(store, "metric_value_rolling_mean")).toEqual([10, 15, 20, 25]);

    const std = column(store, "metric_value_rolling_std");
    expect(std[0]).toBeNaN();
    expect(std[1]).toBeCloseTo(7.0711, 4);
    expect(std[2]).toBeCloseTo(10, 10);
    expect(std[3]).toBeCloseTo(12.9099, 4);
  });

  test("only the trailing window contributes", () => {
    const store = computeRollingStats(
      SeriesStore.fromRecords(days("A", [10, 20, 30, 40])),
      "metric_value",
      2,
    );
    expect(column(store, "metric_value_rolling_mean")).toEqual([10, 15, 25, 35]);
  });

  test("orders rows by date within a key but keeps input row order", () => {
    const records: SeriesRecord[] = [
      { key: "A", date: "2024-01-03", metric_value: 30 },
      { key: "A", date: "2024-01-01", metric_value: 10 },
      { key: "A", date: "2024-01-02", metric_value: 20 },
    ];
    const store = computeRollingStats(SeriesStore.fromRecords(records), "metric_value");

    expect(store.rows.map((row) => row.date)).toEqual([
      "2024-01-03",
      "2024-01-01",
      "2024-01-02",
    ]);
    expect(column(store, "metric_value_rolling_mean")).toEqual([20, 10, 15]);
  });

  test("does not leak values across keys", () => {
    const a = days("A", [10, 10, 10]);
    const b = days("B", [1000, 1000, 1000]);
    const interleaved = a.flatMap((row, i) => [row, b[i] ?? row]);

    const store = computeRollingStats(SeriesStore.fromRecords(interleaved), "metric_value");

    expect(column(store, "metric_value_rolling_mean", "A")).toEqual([10, 10, 10]);
    expect(column(store, "metric_value_rolling_mean", "B")).toEqual([1000, 1000, 1000]);
    expect(column(store, "metric_value_rolling_std", "A").slice(1)).toEqual([0, 0]);
  });

  test("recomputing yields identical baselines", () => {
    const raw = SeriesStore.fromRecords(days("A", [4, 8, 15, 16, 23, 42]));

    const first = computeRollingStats(raw, "metric_value");
    const second = computeRollingStats(raw, "metric_value");
    const again = computeRollingStats(first, "metric_value");

    for (const name of ["metric_value_rolling_mean", "metric_value_rolling_std"]) {
      expect(column(second, name)).toEqual(column(first, name));
      expect(column(again, name)).toEqual(column(first, name));
    }
  });

  test("leaves the input store and other columns untouched", () => {
    const raw = SeriesStore.fromRecords([
      { key: "A", date: "2024-01-01", metric_value: 5, other: 99, note: "x" },
    ]);
    const augmented = computeRollingStats(raw, "metric_value");

    expect(raw.hasMetric("metric_value_rolling_mean")).toBe(false);
    expect(augmented.rows[0]?.metrics.other).toBe(99);
    expect(augmented.rows[0]?.labels.note).toBe("x");
    expect(augmented.rows[0]?.metrics.metric_value).toBe(5);
  });

  test("skips rows missing the metric when averaging", () => {
    const store = computeRollingStats(
      SeriesStore.fromRecords([
        { key: "A", date: "2024-01-01", metric_value: 10 },
        { key: "A", date: "2024-01-02", other: 1 },
        { key: "A", date: "2024-01-03", metric_value: 30 },
      ]),
      "metric_value",
    );
    expect(column(store, "metric_value_rolling_mean")).toEqual([10, 10, 20]);
  });

  test("an empty store gains the baseline columns", () => {
    const store = computeRollingStats(SeriesStore.fromRecords([]), "metric_value");
    expect(store.size).toBe(0);
    expect(store.hasMetric("metric_value_rolling_mean")).toBe(true);
  });

  test("rejects a non-positive window", () => {
    const store = SeriesStore.fromRecords(days("A", [1, 2]));
    expect(() => computeRollingStats(store, "metric_value", 0)).toThrow(
      InvalidArgumentError,
    );
  });

  test("rejects an unknown metric", () => {
    const store = SeriesStore.fromRecords(days("A", [1, 2]));
    expect(() => computeRollingStats(store, "missing")).toThrow(
      'Unknown metric column "missing"',
    );
  });
});
