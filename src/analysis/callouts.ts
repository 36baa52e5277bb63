// ── Callouts ────────────────────────────────────────────────────────
// A callout is one flagged row (or one flagged key total) with enough
// text to be shown to a user as-is.

interface CalloutBase {
  key: string;
  /** Short label, e.g. "Spike in amount" */
  check: string;
  /** The rule that fired, e.g. "> 2 standard deviation from trailing average amount" */
  condition: string;
  moreInfo: string;
  /** Raw metric value as text, never magnitude-formatted */
  value: string;
}

/** A dated row measured against its rolling baseline (spike / drop). */
export interface DeviationCallout extends CalloutBase {
  kind: "deviation";
  date: string;
  stdDevsAway: number;
}

/** A dated row that crossed a flat threshold. */
export interface DatedCallout extends CalloutBase {
  kind: "dated";
  date: string;
}

/** A per-key aggregate with no single date (window totals). */
export interface MetricCallout extends CalloutBase {
  kind: "metric";
  metric: string;
}

export type CalloutRecord = DeviationCallout | DatedCallout | MetricCallout;

export type CalloutKind = CalloutRecord["kind"];

export function isDated(
  callout: CalloutRecord,
): callout is DeviationCallout | DatedCallout {
  return callout.kind !== "metric";
}

/**
 * Append-only working set for one report. Each check contributes a batch;
 * nothing is deduplicated, so a row may appear once per check that flagged it.
 */
export class CalloutCollector {
  private readonly batches: CalloutRecord[][] = [];
  private count = 0;

  append(batch: readonly CalloutRecord[]): void {
    if (batch.length === 0) return;
    this.batches.push([...batch]);
    this.count += batch.length;
  }

  get size(): number {
    return this.count;
  }

  /** Materialize every appended callout in append order. */
  toArray(): CalloutRecord[] {
    return this.batches.flat();
  }
}
