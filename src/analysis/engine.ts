// ── Callout System ──────────────────────────────────────────────────
// Stateful wrapper for the usual report sequence:
//
//   const system = new CalloutSystem(store);
//   system.calculateRollingStats("amount");
//   system.checkDropInColumn("amount", { threshold: 1.5 });
//   system.checkSpikeInColumn("amount");
//   system.filterLastWeek();
//   const feed = system.getCallouts();

import { CalloutCollector, type CalloutRecord } from "./callouts.js";
import { localDate } from "./dates.js";
import {
  bufferedWindow,
  DEFAULT_BUFFER_DAYS,
  type DateWindow,
  filterWindow,
  getCallouts,
  lastWeekWindow,
} from "./filter.js";
import { computeRollingStats, DEFAULT_WINDOW } from "./rolling.js";
import type { SeriesStore } from "./series.js";
import {
  checkCondition,
  checkDrop,
  checkSpike,
  checkWindowTotal,
  type ConditionCheckOptions,
  type DeviationCheckOptions,
} from "./thresholds.js";

export class CalloutSystem {
  private store: SeriesStore;
  private collector = new CalloutCollector();
  /** Set once a window filter has pruned the collected feed */
  private filtered: CalloutRecord[] | null = null;

  constructor(store: SeriesStore) {
    this.store = store;
  }

  get series(): SeriesStore {
    return this.store;
  }

  calculateRollingStats(metric: string, window: number = DEFAULT_WINDOW): this {
    this.store = computeRollingStats(this.store, metric, window);
    return this;
  }

  checkSpikeInColumn(metric: string, options?: DeviationCheckOptions): this {
    return this.collect(checkSpike(this.store, metric, options));
  }

  checkDropInColumn(metric: string, options?: DeviationCheckOptions): this {
    return this.collect(checkDrop(this.store, metric, options));
  }

  checkConditionInColumn(
    metric: string,
    operator: string,
    threshold: number,
    options?: ConditionCheckOptions,
  ): this {
    return this.collect(checkCondition(this.store, metric, operator, threshold, options));
  }

  /** Per-key totals, optionally summed over `period` only. */
  checkTotalInColumn(
    metric: string,
    operator: string,
    threshold: number,
    period?: DateWindow,
  ): this {
    const scoped = period ? this.store.between(period.start, period.end) : this.store;
    return this.collect(checkWindowTotal(scoped, metric, operator, threshold));
  }

  filterWindow(start: string, end: string): this {
    this.filtered = filterWindow(this.current(), start, end);
    return this;
  }

  filterLastWeek(today: string = localDate()): this {
    const { start, end } = lastWeekWindow(today);
    return this.filterWindow(start, end);
  }

  addBufferDays(bufferDays: number = DEFAULT_BUFFER_DAYS, today: string = localDate()): this {
    const { start, end } = bufferedWindow(today, bufferDays);
    return this.filterWindow(start, end);
  }

  getCallouts(): CalloutRecord[] {
    return getCallouts(this.current());
  }

  private collect(batch: readonly CalloutRecord[]): this {
    if (this.filtered) {
      // A filter already ran; fold its result back in so later checks append to it
      const next = new CalloutCollector();
      next.append(this.filtered);
      this.collector = next;
      this.filtered = null;
    }
    this.collector.append(batch);
    return this;
  }

  private current(): CalloutRecord[] {
    return this.filtered ?? this.collector.toArray();
  }
}
