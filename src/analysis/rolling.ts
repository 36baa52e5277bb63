// ── Rolling Statistics ──────────────────────────────────────────────
// Trailing mean / sample standard deviation per key, used as the local
// baseline that spike and drop checks compare against.

import { InvalidArgumentError } from "./errors.js";
import type { SeriesStore } from "./series.js";

export const DEFAULT_WINDOW = 7;

export function rollingMeanColumn(metric: string): string {
  return `${metric}_rolling_mean`;
}

export function rollingStdColumn(metric: string): string {
  return `${metric}_rolling_std`;
}

/**
 * Add `{metric}_rolling_mean` and `{metric}_rolling_std` to every row.
 *
 * Rows are partitioned by key and ordered by date (stable, so input order
 * breaks ties). Each row's baseline covers the trailing `window` rows of its
 * partition up to and including itself, with a minimum of one row. A
 * one-row window has an undefined (`NaN`) standard deviation.
 *
 * Recomputing overwrites the derived columns and leaves raw metrics alone.
 */
export function computeRollingStats(
  store: SeriesStore,
  metric: string,
  window: number = DEFAULT_WINDOW,
): SeriesStore {
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidArgumentError(`Window must be a positive integer, got ${window}`);
  }
  store.requireMetric(metric);

  const rows = store.rows;
  const means = new Array<number>(rows.length).fill(Number.NaN);
  const stds = new Array<number>(rows.length).fill(Number.NaN);

  // ── Partition rows by key ─────────────────────────────────────────
  const partitions = new Map<string, PartitionEntry[]>();
  rows.forEach((row, index) => {
    let entries = partitions.get(row.key);
    if (!entries) {
      entries = [];
      partitions.set(row.key, entries);
    }
    entries.push({ index, date: row.date, value: store.value(row, metric) });
  });

  // ── Walk each partition in date order ─────────────────────────────
  for (const entries of partitions.values()) {
    const ordered = [...entries].sort((a, b) => a.date.localeCompare(b.date));
    const values = ordered.map((entry) => entry.value);

    ordered.forEach((entry, position) => {
      const trailing = values.slice(Math.max(0, position - window + 1), position + 1);
      const stats = windowStats(trailing);
      means[entry.index] = stats.mean;
      stds[entry.index] = stats.std;
    });
  }

  return store.withMetrics({
    [rollingMeanColumn(metric)]: means,
    [rollingStdColumn(metric)]: stds,
  });
}

interface PartitionEntry {
  index: number;
  date: string;
  value: number;
}

interface WindowStats {
  mean: number;
  std: number;
}

/**
 * Mean and sample standard deviation of the finite values in a window.
 * Missing cells are skipped, so a window with one usable value has a mean
 * but no standard deviation.
 */
function windowStats(values: readonly number[]): WindowStats {
  const usable = values.filter((v) => Number.isFinite(v));
  const n = usable.length;
  if (n === 0) return { mean: Number.NaN, std: Number.NaN };

  const mean = usable.reduce((s, v) => s + v, 0) / n;
  if (n === 1) return { mean, std: Number.NaN };

  let variance = 0;
  for (const v of usable) {
    variance += (v - mean) ** 2;
  }
  variance /= n - 1;

  return { mean, std: Math.sqrt(variance) };
}
