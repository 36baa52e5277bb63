// ── Series Store ────────────────────────────────────────────────────
// The grouped time-series table every check reads from: one row per
// (key, date) with any number of numeric metric columns and free-text
// label columns. Stores are immutable; derived columns produce a new store.

import { isIsoDate } from "./dates.js";
import { InvalidArgumentError } from "./errors.js";

export interface SeriesRow {
  /** Partition key: one independent series per key */
  readonly key: string;
  /** Calendar date, `YYYY-MM-DD` */
  readonly date: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly metrics: Readonly<Record<string, number>>;
}

export type SeriesRecord = Record<string, unknown>;

export interface SeriesStoreOptions {
  /** Field holding the partition key (default: "key") */
  keyColumn?: string;
  /** Field holding the calendar date (default: "date") */
  dateColumn?: string;
}

export class SeriesStore {
  private constructor(
    private readonly _rows: readonly SeriesRow[],
    private readonly metricNames: ReadonlySet<string>,
    private readonly labelNames: ReadonlySet<string>,
    readonly keyColumn: string,
  ) {}

  /**
   * Build a store from loose tabular records (query results, tool input).
   *
   * Numbers become metric columns, strings become label columns, and
   * null/undefined cells are left out. The key must be a string or number
   * and the date a `YYYY-MM-DD` string or a `Date`.
   */
  static fromRecords(
    records: readonly SeriesRecord[],
    options: SeriesStoreOptions = {},
  ): SeriesStore {
    const keyColumn = options.keyColumn ?? "key";
    const dateColumn = options.dateColumn ?? "date";

    const rows = records.map((record, index) => {
      const labels: Record<string, string> = {};
      const metrics: Record<string, number> = {};

      for (const [column, cell] of Object.entries(record)) {
        if (column === keyColumn || column === dateColumn) continue;
        if (typeof cell === "number") metrics[column] = cell;
        else if (typeof cell === "string") labels[column] = cell;
      }

      return {
        key: readKey(record[keyColumn], keyColumn, index),
        date: readDate(record[dateColumn], dateColumn, index),
        labels,
        metrics,
      };
    });

    return SeriesStore.fromRows(rows, keyColumn);
  }

  static fromRows(rows: readonly SeriesRow[], keyColumn = "key"): SeriesStore {
    const metricNames = new Set<string>();
    const labelNames = new Set<string>();
    for (const row of rows) {
      for (const name of Object.keys(row.metrics)) metricNames.add(name);
      for (const name of Object.keys(row.labels)) labelNames.add(name);
    }
    return new SeriesStore([...rows], metricNames, labelNames, keyColumn);
  }

  get rows(): readonly SeriesRow[] {
    return this._rows;
  }

  get size(): number {
    return this._rows.length;
  }

  get metricColumns(): string[] {
    return [...this.metricNames];
  }

  hasMetric(column: string): boolean {
    return this.metricNames.has(column);
  }

  /** Metric value of a row; `NaN` when the row has no such cell. */
  value(row: SeriesRow, column: string): number {
    if (!Object.hasOwn(row.metrics, column)) return Number.NaN;
    return row.metrics[column] ?? Number.NaN;
  }

  /**
   * Resolve the column a callout reports as its key. `"key"` and the
   * store's own key column map to the partition key; anything else must
   * be a label column.
   */
  keyResolver(keyColumn: string): (row: SeriesRow) => string {
    if (keyColumn === "key" || keyColumn === this.keyColumn) {
      return (row) => row.key;
    }
    if (!this.labelNames.has(keyColumn)) {
      throw new InvalidArgumentError(`Unknown key column "${keyColumn}"`);
    }
    return (row) => row.labels[keyColumn] ?? row.key;
  }

  /** Throw unless `column` is a metric. An empty store has no columns to check. */
  requireMetric(column: string): void {
    if (this._rows.length > 0 && !this.metricNames.has(column)) {
      throw new InvalidArgumentError(`Unknown metric column "${column}"`);
    }
  }

  /** Rows dated within `[start, end]`, inclusive. */
  between(start: string, end: string): SeriesStore {
    const rows = this._rows.filter((row) => row.date >= start && row.date <= end);
    return new SeriesStore(rows, this.metricNames, this.labelNames, this.keyColumn);
  }

  /**
   * Return a new store with `columns` written onto every row. Each value
   * array is aligned with `rows`. Existing columns of the same name are
   * overwritten; all other cells are carried over untouched.
   */
  withMetrics(columns: Readonly<Record<string, readonly number[]>>): SeriesStore {
    const entries = Object.entries(columns);
    for (const [name, values] of entries) {
      if (values.length !== this._rows.length) {
        throw new InvalidArgumentError(
          `Column "${name}" has ${values.length} values for ${this._rows.length} rows`,
        );
      }
    }

    const rows = this._rows.map((row, i) => {
      const metrics: Record<string, number> = { ...row.metrics };
      for (const [name, values] of entries) {
        metrics[name] = values[i] ?? Number.NaN;
      }
      return { ...row, metrics };
    });

    const metricNames = new Set(this.metricNames);
    for (const [name] of entries) metricNames.add(name);

    return new SeriesStore(rows, metricNames, this.labelNames, this.keyColumn);
  }
}

function readKey(cell: unknown, column: string, index: number): string {
  if (typeof cell === "string" && cell.length > 0) return cell;
  if (typeof cell === "number" && Number.isFinite(cell)) return String(cell);
  throw new InvalidArgumentError(`Row ${index}: missing key column "${column}"`);
}

function readDate(cell: unknown, column: string, index: number): string {
  if (cell instanceof Date && !Number.isNaN(cell.getTime())) {
    return cell.toISOString().slice(0, 10);
  }
  if (typeof cell === "string" && isIsoDate(cell)) return cell;
  throw new InvalidArgumentError(
    `Row ${index}: "${column}" must be a YYYY-MM-DD date`,
  );
}
