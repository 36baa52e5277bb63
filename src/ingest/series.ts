// ── Series Builders ─────────────────────────────────────────────────
// Turn parsed ledger postings and time blocks into daily series stores.

import { SeriesStore } from "../analysis/series.js";
import { classifyActivity, type ActivityTable } from "./activities.js";
import { dailyTotals } from "./aggregate.js";
import type { LedgerEntry } from "./ledger.js";
import type { TimeBlock } from "./timeblocks.js";

export const EXPENSE_METRIC = "amount";
export const TIME_METRIC = "hours";

export interface ExpenseSeriesOptions {
  /** Top-level account to keep (default: "Expenses"); empty keeps everything */
  accountPrefix?: string;
  /** Account level used as the series key, 1-3 (default: 2) */
  level?: 1 | 2 | 3;
  fillMissingDays?: boolean;
}

/** Daily spend per account at the chosen level, e.g. per "Expenses:Food". */
export function buildExpenseSeries(
  entries: readonly LedgerEntry[],
  options: ExpenseSeriesOptions = {},
): SeriesStore {
  const prefix = options.accountPrefix ?? "Expenses";
  const level = options.level ?? 2;

  const kept = prefix ? entries.filter((entry) => entry.levels[0] === prefix) : entries;

  return SeriesStore.fromRecords(
    dailyTotals(
      kept,
      {
        key: (entry) => entry.levels[level - 1] || "Uncategorized",
        date: (entry) => entry.date,
        value: (entry) => entry.amount,
      },
      { metric: EXPENSE_METRIC, fillMissingDays: options.fillMissingDays },
    ),
  );
}

export interface TimeSeriesOptions {
  /** Restrict to these categories; all when omitted */
  categories?: readonly string[];
  fillMissingDays?: boolean;
}

/** Daily hours per activity category. */
export function buildTimeSeries(
  blocks: readonly TimeBlock[],
  table: ActivityTable,
  options: TimeSeriesOptions = {},
): SeriesStore {
  const classified = blocks.map((block) => ({
    ...block,
    category: classifyActivity(table, block.activity),
  }));

  const wanted = options.categories ? new Set(options.categories) : null;
  const kept = wanted
    ? classified.filter((block) => wanted.has(block.category))
    : classified;

  return SeriesStore.fromRecords(
    dailyTotals(
      kept,
      {
        key: (block) => block.category,
        date: (block) => block.date,
        value: (block) => block.durationHours,
      },
      { metric: TIME_METRIC, fillMissingDays: options.fillMissingDays },
    ),
  );
}
