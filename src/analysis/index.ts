// ── Analysis Engine ──────────────────────────────────────────────────
// Barrel export for the callout engine.
// Pure functions only: no MCP, file or network dependencies.

export {
  SeriesStore,
  type SeriesRow,
  type SeriesRecord,
  type SeriesStoreOptions,
} from "./series.js";

export {
  computeRollingStats,
  rollingMeanColumn,
  rollingStdColumn,
  DEFAULT_WINDOW,
} from "./rolling.js";

export {
  checkSpike,
  checkDrop,
  checkCondition,
  checkWindowTotal,
  DEFAULT_THRESHOLD,
  type ComparisonOperator,
  type DeviationCheckOptions,
  type ConditionCheckOptions,
} from "./thresholds.js";

export {
  CalloutCollector,
  isDated,
  type CalloutRecord,
  type CalloutKind,
  type DeviationCallout,
  type DatedCallout,
  type MetricCallout,
} from "./callouts.js";

export {
  filterWindow,
  lastWeekWindow,
  bufferedWindow,
  getCallouts,
  DEFAULT_BUFFER_DAYS,
  type DateWindow,
} from "./filter.js";

export { CalloutSystem } from "./engine.js";

export {
  runCalloutReport,
  resolvePeriod,
  type CalloutReport,
  type CheckRequest,
  type PeriodRequest,
  type ReportRequest,
} from "./report.js";

export { formatNumber, humanizeColumn } from "./format.js";
export { addDays, isIsoDate, localDate } from "./dates.js";
export { CalloutError, InvalidArgumentError, StatsNotComputedError } from "./errors.js";
