// ── Callout Filtering & Ordering ────────────────────────────────────

import { isDated, type CalloutRecord } from "./callouts.js";
import { addDays } from "./dates.js";

export interface DateWindow {
  start: string;
  end: string;
}

export const DEFAULT_BUFFER_DAYS = 3;

/**
 * Keep dated callouts inside `[start, end]` (inclusive). Metric callouts
 * summarize a whole period rather than a day, so they pass through.
 */
export function filterWindow(
  callouts: readonly CalloutRecord[],
  start: string,
  end: string,
): CalloutRecord[] {
  return callouts.filter(
    (callout) => !isDated(callout) || (callout.date >= start && callout.date <= end),
  );
}

/** The seven days before `today`, excluding today. */
export function lastWeekWindow(today: string): DateWindow {
  return { start: addDays(today, -7), end: addDays(today, -1) };
}

/**
 * The week ending `bufferDays` ago. Re-reviewing a period after a grace
 * period lets late entries settle before they are judged.
 */
export function bufferedWindow(
  today: string,
  bufferDays: number = DEFAULT_BUFFER_DAYS,
): DateWindow {
  return {
    start: addDays(today, -(bufferDays + 7)),
    end: addDays(today, -bufferDays),
  };
}

/**
 * Order callouts for display:
 *  - dated callouts first, most recent date first;
 *  - within a date, deviation callouts by `stdDevsAway` ascending, then
 *    flat-threshold callouts;
 *  - metric callouts last, by metric name.
 *
 * The sort is stable, so ties keep their append order.
 */
export function getCallouts(callouts: readonly CalloutRecord[]): CalloutRecord[] {
  return [...callouts].sort(compareCallouts);
}

const KIND_RANK: Record<CalloutRecord["kind"], number> = {
  deviation: 0,
  dated: 1,
  metric: 2,
};

function compareCallouts(a: CalloutRecord, b: CalloutRecord): number {
  if (isDated(a) && isDated(b)) {
    const byDate = b.date.localeCompare(a.date);
    if (byDate !== 0) return byDate;
    if (a.kind === "deviation" && b.kind === "deviation") {
      return a.stdDevsAway - b.stdDevsAway;
    }
    return KIND_RANK[a.kind] - KIND_RANK[b.kind];
  }

  if (a.kind === "metric" && b.kind === "metric") {
    return a.metric.localeCompare(b.metric);
  }

  return KIND_RANK[a.kind] - KIND_RANK[b.kind];
}
