import { describe, expect, test } from "vitest";
import { dailyTotals } from "./aggregate.js";

interface Item {
  cat: string;
  day: string;
  n: number;
}

const accessors = {
  key: (item: Item) => item.cat,
  date: (item: Item) => item.day,
  value: (item: Item) => item.n,
};

const items: Item[] = [
  { cat: "Food", day: "2024-06-03", n: 0.1 },
  { cat: "Food", day: "2024-06-03", n: 0.2 },
  { cat: "Bills", day: "2024-06-05", n: 50 },
  { cat: "Food", day: "2024-06-01", n: 12 },
];

describe("dailyTotals", () => {
  test("sums per key and day, ordered by key then date", () => {
    expect(dailyTotals(items, accessors, { metric: "amount" })).toEqual([
      { key: "Bills", date: "2024-06-05", amount: 50 },
      { key: "Food", date: "2024-06-01", amount: 12 },
      { key: "Food", date: "2024-06-03", amount: 0.3 },
    ]);
  });

  test("fills quiet days with zero up to the last date seen", () => {
    const rows = dailyTotals(items, accessors, { fillMissingDays: true });
    expect(rows.filter((row) => row.key === "Food")).toEqual([
      { key: "Food", date: "2024-06-01", value: 12 },
      { key: "Food", date: "2024-06-02", value: 0 },
      { key: "Food", date: "2024-06-03", value: 0.3 },
      { key: "Food", date: "2024-06-04", value: 0 },
      { key: "Food", date: "2024-06-05", value: 0 },
    ]);
    expect(rows.filter((row) => row.key === "Bills")).toHaveLength(1);
  });

  test("returns no rows for no items", () => {
    expect(dailyTotals([], accessors)).toEqual([]);
  });
});
