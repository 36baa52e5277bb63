// ── Callout Report ──────────────────────────────────────────────────
// Declarative form of the CalloutSystem sequence: one metric, a list of
// checks, an optional reporting period.

import type { CalloutRecord } from "./callouts.js";
import { isIsoDate, localDate } from "./dates.js";
import { CalloutSystem } from "./engine.js";
import { InvalidArgumentError } from "./errors.js";
import { bufferedWindow, lastWeekWindow, type DateWindow } from "./filter.js";
import { DEFAULT_WINDOW } from "./rolling.js";
import type { SeriesStore } from "./series.js";
import type { ComparisonOperator } from "./thresholds.js";

export type CheckRequest =
  | { type: "spike" | "drop"; threshold?: number; keyColumn?: string }
  | {
      type: "condition";
      operator: ComparisonOperator;
      threshold: number;
      keyColumn?: string;
    }
  | { type: "total"; operator: ComparisonOperator; threshold: number };

export type PeriodRequest =
  | { type: "all" }
  | { type: "last_week" }
  | { type: "buffered"; bufferDays?: number }
  | { type: "range"; start: string; end: string };

export interface ReportRequest {
  metric: string;
  /** Rolling window size in rows (default: 7) */
  window?: number;
  checks: CheckRequest[];
  period?: PeriodRequest;
  /** Reference date for relative periods (default: local today) */
  today?: string;
}

export interface CalloutReport {
  metric: string;
  window: number;
  period: DateWindow | null;
  total: number;
  callouts: CalloutRecord[];
}

/**
 * Run every requested check against `store` and return the filtered,
 * sorted feed.
 *
 * Baselines are computed over the full store so the first days of the
 * period still have history behind them. Window totals only sum rows
 * inside the period, since a total is a statement about the period.
 */
export function runCalloutReport(
  store: SeriesStore,
  request: ReportRequest,
): CalloutReport {
  const window = request.window ?? DEFAULT_WINDOW;
  const period = resolvePeriod(request.period ?? { type: "all" }, request.today ?? localDate());

  const system = new CalloutSystem(store);
  const needsBaseline = request.checks.some(
    (check) => check.type === "spike" || check.type === "drop",
  );
  if (needsBaseline) system.calculateRollingStats(request.metric, window);

  for (const check of request.checks) {
    switch (check.type) {
      case "spike":
        system.checkSpikeInColumn(request.metric, check);
        break;
      case "drop":
        system.checkDropInColumn(request.metric, check);
        break;
      case "condition":
        system.checkConditionInColumn(request.metric, check.operator, check.threshold, {
          keyColumn: check.keyColumn,
        });
        break;
      case "total":
        system.checkTotalInColumn(
          request.metric,
          check.operator,
          check.threshold,
          period ?? undefined,
        );
        break;
    }
  }

  if (period) system.filterWindow(period.start, period.end);
  const callouts = system.getCallouts();

  return {
    metric: request.metric,
    window,
    period,
    total: callouts.length,
    callouts,
  };
}

export function resolvePeriod(period: PeriodRequest, today: string): DateWindow | null {
  switch (period.type) {
    case "all":
      return null;
    case "last_week":
      return lastWeekWindow(today);
    case "buffered":
      return bufferedWindow(today, period.bufferDays);
    case "range":
      if (!isIsoDate(period.start) || !isIsoDate(period.end)) {
        throw new InvalidArgumentError("Period start and end must be YYYY-MM-DD dates");
      }
      if (period.start > period.end) {
        throw new InvalidArgumentError(
          `Period start ${period.start} is after end ${period.end}`,
        );
      }
      return { start: period.start, end: period.end };
  }
}
