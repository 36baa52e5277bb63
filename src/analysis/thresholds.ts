// ── Threshold Checks ────────────────────────────────────────────────
// Each check filters the store and returns one callout per flagged row.
// Spike and drop compare against the rolling baseline; condition and
// window-total checks compare against a flat threshold.

import type { DatedCallout, DeviationCallout, MetricCallout } from "./callouts.js";
import { InvalidArgumentError, StatsNotComputedError } from "./errors.js";
import { formatNumber, humanizeColumn, roundTo } from "./format.js";
import { rollingMeanColumn, rollingStdColumn } from "./rolling.js";
import type { SeriesStore } from "./series.js";

export type ComparisonOperator = ">" | "<";

export const DEFAULT_THRESHOLD = 2;

export interface DeviationCheckOptions {
  /** Multiplier on the rolling standard deviation (default: 2) */
  threshold?: number;
  /** Column reported as the callout key (default: "key") */
  keyColumn?: string;
}

export interface ConditionCheckOptions {
  keyColumn?: string;
}

/** Rows above `mean + threshold * std` of their trailing window. */
export function checkSpike(
  store: SeriesStore,
  metric: string,
  options: DeviationCheckOptions = {},
): DeviationCallout[] {
  return checkDeviation(store, metric, "spike", options);
}

/** Rows below `mean - threshold * std` of their trailing window. */
export function checkDrop(
  store: SeriesStore,
  metric: string,
  options: DeviationCheckOptions = {},
): DeviationCallout[] {
  return checkDeviation(store, metric, "drop", options);
}

/**
 * Rows whose raw value is strictly above (`>`) or below (`<`) a fixed
 * threshold. Rolling stats are not needed.
 */
export function checkCondition(
  store: SeriesStore,
  metric: string,
  operator: string,
  threshold: number,
  options: ConditionCheckOptions = {},
): DatedCallout[] {
  const op = parseOperator(operator);
  store.requireMetric(metric);
  const keyOf = store.keyResolver(options.keyColumn ?? "key");

  const label = `${humanizeColumn(metric)} ${op} ${formatNumber(threshold)}`;
  const callouts: DatedCallout[] = [];

  for (const row of store.rows) {
    const value = store.value(row, metric);
    if (!compare(value, op, threshold)) continue;

    callouts.push({
      kind: "dated",
      key: keyOf(row),
      date: row.date,
      check: label,
      condition: label,
      moreInfo: `Current value: ${formatNumber(value)}`,
      value: String(value),
    });
  }

  return callouts;
}

/**
 * Sum `metric` per key over the whole store and flag keys whose total
 * crosses the threshold. Useful after the store has been cut down to a
 * single period, e.g. "more than 40 hours of work last week".
 */
export function checkWindowTotal(
  store: SeriesStore,
  metric: string,
  operator: string,
  threshold: number,
): MetricCallout[] {
  const op = parseOperator(operator);
  store.requireMetric(metric);

  const totals = new Map<string, { total: number; days: number }>();
  for (const row of store.rows) {
    const value = store.value(row, metric);
    if (!Number.isFinite(value)) continue;
    const entry = totals.get(row.key) ?? { total: 0, days: 0 };
    entry.total += value;
    entry.days += 1;
    totals.set(row.key, entry);
  }

  const words = humanizeColumn(metric);
  const condition = `total ${words} ${op} ${formatNumber(threshold)}`;
  const callouts: MetricCallout[] = [];

  for (const [key, { total, days }] of totals) {
    if (!compare(total, op, threshold)) continue;
    callouts.push({
      kind: "metric",
      key,
      metric,
      check: `Total ${words} ${op} ${formatNumber(threshold)}`,
      condition,
      moreInfo: `Total: ${formatNumber(total)} over ${days} day${days === 1 ? "" : "s"}`,
      value: String(total),
    });
  }

  return callouts;
}

// ── Internal helpers ────────────────────────────────────────────────

type Direction = "spike" | "drop";

function checkDeviation(
  store: SeriesStore,
  metric: string,
  direction: Direction,
  options: DeviationCheckOptions,
): DeviationCallout[] {
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const meanColumn = rollingMeanColumn(metric);
  const stdColumn = rollingStdColumn(metric);

  if (!store.hasMetric(meanColumn) || !store.hasMetric(stdColumn)) {
    throw new StatsNotComputedError(metric);
  }
  store.requireMetric(metric);
  const keyOf = store.keyResolver(options.keyColumn ?? "key");

  const words = humanizeColumn(metric);
  const sign = direction === "spike" ? ">" : "<";
  const callouts: DeviationCallout[] = [];

  for (const row of store.rows) {
    const value = store.value(row, metric);
    const mean = store.value(row, meanColumn);
    const std = store.value(row, stdColumn);

    // No spread means no baseline to deviate from
    if (!(std > 0) || !Number.isFinite(std) || !Number.isFinite(mean)) continue;

    const bound =
      direction === "spike" ? mean + threshold * std : mean - threshold * std;
    if (!compare(value, sign, bound)) continue;

    callouts.push({
      kind: "deviation",
      key: keyOf(row),
      date: row.date,
      check: `${direction === "spike" ? "Spike" : "Drop"} in ${words}`,
      condition: `${sign} ${threshold} standard deviation from trailing average ${words}`,
      moreInfo: describeDeviation(value, sign, bound, mean, std),
      value: String(value),
      stdDevsAway: roundTo((value - mean) / std, 2),
    });
  }

  return callouts;
}

function describeDeviation(
  value: number,
  sign: ComparisonOperator,
  bound: number,
  mean: number,
  std: number,
): string {
  return (
    `${formatNumber(value)} ${sign} ${formatNumber(bound)} ` +
    `(trailing avg: ${formatNumber(mean)}, trailing std dev: ${formatNumber(std)})`
  );
}

function parseOperator(operator: string): ComparisonOperator {
  if (operator === ">" || operator === "<") return operator;
  throw new InvalidArgumentError(
    `Condition must be either '>' or '<', got '${operator}'`,
  );
}

function compare(value: number, op: ComparisonOperator, threshold: number): boolean {
  return op === ">" ? value > threshold : value < threshold;
}
