// ── Daily Aggregation ───────────────────────────────────────────────
// Collapses itemized records (postings, time blocks) into one row per
// key per day, the shape the callout engine consumes.

import { addDays } from "../analysis/dates.js";
import type { SeriesRecord } from "../analysis/series.js";

export interface DailyAccessors<T> {
  key: (item: T) => string;
  date: (item: T) => string;
  value: (item: T) => number;
}

export interface DailyTotalsOptions {
  /** Name of the summed metric column (default: "value") */
  metric?: string;
  /**
   * Emit a zero row for every day between a key's first entry and the
   * last date seen for any key (default: false). Without it, quiet days
   * are simply absent and the rolling window spans more calendar time.
   */
  fillMissingDays?: boolean;
}

/** Sum `value` per (key, date). Rows come back ordered by key, then date. */
export function dailyTotals<T>(
  items: readonly T[],
  accessors: DailyAccessors<T>,
  options: DailyTotalsOptions = {},
): SeriesRecord[] {
  const metric = options.metric ?? "value";
  const byKey = new Map<string, Map<string, number>>();
  let lastDate = "";

  for (const item of items) {
    const key = accessors.key(item);
    const date = accessors.date(item);

    let days = byKey.get(key);
    if (!days) {
      days = new Map<string, number>();
      byKey.set(key, days);
    }
    days.set(date, (days.get(date) ?? 0) + accessors.value(item));
    if (date > lastDate) lastDate = date;
  }

  const rows: SeriesRecord[] = [];
  const keys = [...byKey.keys()].sort((a, b) => a.localeCompare(b));

  for (const key of keys) {
    const days = byKey.get(key) ?? new Map<string, number>();
    const dates = [...days.keys()].sort();

    if (options.fillMissingDays && dates.length > 0) {
      for (let date = dates[0] ?? lastDate; date <= lastDate; date = addDays(date, 1)) {
        rows.push({ key, date, [metric]: roundCents(days.get(date) ?? 0) });
      }
    } else {
      for (const date of dates) {
        rows.push({ key, date, [metric]: roundCents(days.get(date) ?? 0) });
      }
    }
  }

  return rows;
}

// Sums of decimal amounts pick up float noise (0.1 + 0.2); money and hours
// never need more than cents.
function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}
