import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  localDate,
  runCalloutReport,
  SeriesStore,
  type PeriodRequest,
} from "../analysis/index.js";
import {
  buildExpenseSeries,
  buildTimeSeries,
  EXPENSE_METRIC,
  TIME_METRIC,
} from "../ingest/series.js";
import { readDailyNotes, readLedgerFile } from "../ingest/sources.js";
import { errorResult, jsonResult, type ToolContext } from "./context.js";
import { reportShape, toReportRequest } from "./schemas.js";

const rowSchema = z.record(z.union([z.string(), z.number(), z.null()]));

export const expenseSourceShape = {
  account_prefix: z
    .string()
    .optional()
    .describe(
      "Top-level ledger account to analyze. Defaults to 'Expenses'. Pass an empty string to include every account.",
    ),
  level: z
    .union([z.literal(1), z.literal(2), z.literal(3)])
    .optional()
    .describe(
      "Account level that forms one series: 1 = 'Expenses', 2 = 'Expenses:Food', 3 = 'Expenses:Food:Groceries'. Defaults to 2.",
    ),
};

export const timeSourceShape = {
  categories: z
    .array(z.string())
    .optional()
    .describe("Activity categories to include, e.g. ['Work', 'Sleep']. All categories when omitted."),
};

export function registerCalloutTools(server: McpServer, context: ToolContext) {
  const { config, logger } = context;
  const today = () => (context.today ? context.today() : localDate());

  const defaults = (period: PeriodRequest) => ({
    window: config.callouts.window,
    threshold: config.callouts.threshold,
    bufferDays: config.callouts.bufferDays,
    period,
  });

  server.registerTool(
    "detect_callouts",
    {
      description:
        "Flag spikes, drops and threshold breaches in any daily time series supplied inline. Each row needs a key (one series per key, e.g. a category), a YYYY-MM-DD date and the numeric metric; other numeric or text fields are carried along. Spike and drop checks compare each day to the trailing average of the same key. Use this when the user pastes or already has tabular data to audit. Returns callouts sorted most recent first.",
      inputSchema: {
        rows: z
          .array(rowSchema)
          .describe("Series rows, e.g. [{\"key\": \"Food\", \"date\": \"2024-06-03\", \"amount\": 42.5}]."),
        metric: z.string().min(1).describe("Numeric field to analyze, e.g. 'amount'."),
        key_field: z
          .string()
          .optional()
          .describe("Field holding the series key. Defaults to 'key'."),
        date_field: z
          .string()
          .optional()
          .describe("Field holding the YYYY-MM-DD date. Defaults to 'date'."),
        ...reportShape,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ rows, metric, key_field, date_field, ...report }) => {
      try {
        const store = SeriesStore.fromRecords(rows, {
          keyColumn: key_field,
          dateColumn: date_field,
        });
        const result = runCalloutReport(
          store,
          toReportRequest(metric, report, defaults({ type: "all" }), today()),
        );
        logger.debug("callouts computed", { tool: "detect_callouts", total: result.total });
        return jsonResult(result);
      } catch (error) {
        return errorResult("detect_callouts", error, logger);
      }
    },
  );

  server.registerTool(
    "get_expense_callouts",
    {
      description:
        "Scan the ledger for unusual daily spending per account: days far above or below the trailing average, days over a flat amount, or accounts whose total for the period crosses a limit. Use this when the user asks what stood out in their spending last week, or whether any category spiked. Defaults to the 7 days before today.",
      inputSchema: { ...expenseSourceShape, ...reportShape },
      annotations: { readOnlyHint: true },
    },
    async ({ account_prefix, level, ...report }) => {
      try {
        const entries = await readLedgerFile(requirePath(config.sources.ledgerPath, "LEDGER_PATH"));
        const store = buildExpenseSeries(entries, {
          accountPrefix: account_prefix,
          level,
          fillMissingDays: true,
        });
        const result = runCalloutReport(
          store,
          toReportRequest(EXPENSE_METRIC, report, defaults({ type: "last_week" }), today()),
        );
        logger.debug("callouts computed", { tool: "get_expense_callouts", total: result.total });
        return jsonResult(result);
      } catch (error) {
        return errorResult("get_expense_callouts", error, logger);
      }
    },
  );

  server.registerTool(
    "get_time_callouts",
    {
      description:
        "Scan time blocks logged in daily notes for unusual days per activity category (Work, Sleep, Workout, ...): hours far above or below the trailing average, days over or under a flat number of hours, or categories whose weekly total crosses a target. Use this when the user asks how their time was spent, whether they slept less than usual, or which habits slipped. Defaults to the 7 days before today.",
      inputSchema: { ...timeSourceShape, ...reportShape },
      annotations: { readOnlyHint: true },
    },
    async ({ categories, ...report }) => {
      try {
        const blocks = await readDailyNotes(
          requirePath(config.sources.dailyNotesPath, "DAILY_NOTES_PATH"),
          { since: config.sources.notesSince },
        );
        const store = buildTimeSeries(blocks, context.activities, {
          categories,
          fillMissingDays: true,
        });
        const result = runCalloutReport(
          store,
          toReportRequest(TIME_METRIC, report, defaults({ type: "last_week" }), today()),
        );
        logger.debug("callouts computed", { tool: "get_time_callouts", total: result.total });
        return jsonResult(result);
      } catch (error) {
        return errorResult("get_time_callouts", error, logger);
      }
    },
  );
}

export function requirePath(value: string | undefined, variable: string): string {
  if (!value) {
    throw new Error(`${variable} is not configured`);
  }
  return value;
}
