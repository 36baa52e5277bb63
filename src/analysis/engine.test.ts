import { describe, expect, test } from "vitest";
import { CalloutSystem } from "./engine.js";
import { StatsNotComputedError } from "./errors.js";
import { SeriesStore } from "./series.js";

function week(): SeriesStore {
  const values = [10, 10, 10, 10, 10, 10, 100];
  return SeriesStore.fromRecords(
    values.map((amount, i) => ({ key: "A", date: `2024-06-${String(8 + i).padStart(2, "0")}`, amount })),
  );
}

describe("CalloutSystem", () => {
  test("accumulates every check into one feed", () => {
    const callouts = new CalloutSystem(week())
      .calculateRollingStats("amount")
      .checkSpikeInColumn("amount")
      .checkDropInColumn("amount")
      .checkConditionInColumn("amount", ">", 50)
      .getCallouts();

    expect(callouts.map((c) => [c.kind, c.check])).toEqual([
      ["deviation", "Spike in amount"],
      ["dated", "amount > 50"],
    ]);
  });

  test("filters to the week before today", () => {
    const system = new CalloutSystem(week())
      .calculateRollingStats("amount")
      .checkSpikeInColumn("amount");

    expect(system.filterLastWeek("2024-06-15").getCallouts()).toHaveLength(1);
    expect(system.filterLastWeek("2024-06-14").getCallouts()).toEqual([]);
  });

  test("checks after a filter add to the filtered feed", () => {
    const callouts = new CalloutSystem(week())
      .calculateRollingStats("amount")
      .checkSpikeInColumn("amount")
      .filterLastWeek("2024-06-20")
      .checkConditionInColumn("amount", "<", 11)
      .getCallouts();

    expect(callouts.map((c) => (c.kind === "metric" ? "" : c.date))).toEqual([
      "2024-06-14",
      "2024-06-13",
      "2024-06-12",
      "2024-06-11",
      "2024-06-10",
      "2024-06-09",
      "2024-06-08",
    ]);
  });

  test("keeps the buffered week only", () => {
    const callouts = new CalloutSystem(week())
      .checkConditionInColumn("amount", ">", 0)
      .addBufferDays(3, "2024-06-20")
      .getCallouts();

    // 2024-06-10 .. 2024-06-17
    expect(callouts).toHaveLength(5);
  });

  test("refuses deviation checks before baselines exist", () => {
    const system = new CalloutSystem(week());
    expect(() => system.checkSpikeInColumn("amount")).toThrow(StatsNotComputedError);
    expect(system.getCallouts()).toEqual([]);
  });

  test("exposes the augmented series", () => {
    const system = new CalloutSystem(week()).calculateRollingStats("amount", 3);
    expect(system.series.hasMetric("amount_rolling_std")).toBe(true);
  });
});
