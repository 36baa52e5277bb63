import { z } from "zod";
import type { CheckRequest, PeriodRequest, ReportRequest } from "../analysis/index.js";

const dateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date");

const operator = z
  .enum([">", "<"])
  .describe("Comparison operator: '>' flags values above the threshold, '<' below it.");

const keyColumn = z
  .string()
  .optional()
  .describe(
    "Column reported as each callout's key. Defaults to the series key; any text column of the rows may be named.",
  );

const deviationThreshold = z
  .number()
  .positive()
  .optional()
  .describe("Standard-deviation multiplier. Defaults to the server's configured threshold (usually 2).");

export const checkSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("spike"), threshold: deviationThreshold, key_column: keyColumn }),
  z.object({ type: z.literal("drop"), threshold: deviationThreshold, key_column: keyColumn }),
  z.object({
    type: z.literal("condition"),
    operator,
    threshold: z.number().describe("Flat threshold the raw value is compared against."),
    key_column: keyColumn,
  }),
  z.object({
    type: z.literal("total"),
    operator,
    threshold: z.number().describe("Threshold for each key's total over the period."),
  }),
]);

export const periodSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("all") }),
  z.object({ type: z.literal("last_week") }),
  z.object({
    type: z.literal("buffered"),
    buffer_days: z.number().int().min(0).optional(),
  }),
  z.object({ type: z.literal("range"), start: dateString, end: dateString }),
]);

/** Report options shared by every callout tool. */
export const reportShape = {
  checks: z
    .array(checkSchema)
    .min(1)
    .optional()
    .describe(
      "Checks to run, in order. 'spike'/'drop' compare each day to its trailing average; 'condition' compares raw daily values to a flat threshold; 'total' compares each key's sum over the period. Defaults to a spike and a drop check.",
    ),
  window: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Trailing window size in days for the rolling average. Defaults to 7."),
  period: periodSchema
    .optional()
    .describe(
      "Which callouts to keep: 'last_week' (the 7 days before today), 'buffered' (the week ending buffer_days ago), 'range' (start..end inclusive) or 'all'.",
    ),
};

type CheckInput = z.infer<typeof checkSchema>;
type PeriodInput = z.infer<typeof periodSchema>;

const DEFAULT_CHECKS: CheckInput[] = [{ type: "spike" }, { type: "drop" }];

export interface ReportInput {
  checks?: CheckInput[];
  window?: number;
  period?: PeriodInput;
}

export interface ReportDefaults {
  window: number;
  threshold: number;
  bufferDays: number;
  period: PeriodRequest;
}

/** Map snake_case tool input onto the engine's report request. */
export function toReportRequest(
  metric: string,
  input: ReportInput,
  defaults: ReportDefaults,
  today: string,
): ReportRequest {
  const checks: CheckRequest[] = (input.checks ?? DEFAULT_CHECKS).map(
    (check): CheckRequest => {
      switch (check.type) {
        case "spike":
        case "drop":
          return {
            type: check.type,
            threshold: check.threshold ?? defaults.threshold,
            keyColumn: check.key_column,
          };
        case "condition":
          return {
            type: "condition",
            operator: check.operator,
            threshold: check.threshold,
            keyColumn: check.key_column,
          };
        case "total":
          return { type: "total", operator: check.operator, threshold: check.threshold };
      }
    },
  );

  return {
    metric,
    window: input.window ?? defaults.window,
    checks,
    period: toPeriod(input.period, defaults),
    today,
  };
}

function toPeriod(period: PeriodInput | undefined, defaults: ReportDefaults): PeriodRequest {
  if (!period) return defaults.period;
  switch (period.type) {
    case "buffered":
      return { type: "buffered", bufferDays: period.buffer_days ?? defaults.bufferDays };
    default:
      return period;
  }
}
