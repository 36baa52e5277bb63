import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { SeriesStore } from "../analysis/index.js";
import {
  buildExpenseSeries,
  buildTimeSeries,
  EXPENSE_METRIC,
  TIME_METRIC,
} from "../ingest/series.js";
import { readDailyNotes, readLedgerFile } from "../ingest/sources.js";
import { expenseSourceShape, requirePath, timeSourceShape } from "./callouts.js";
import { errorResult, jsonResult, type ToolContext } from "./context.js";

const rangeShape = {
  start_date: z
    .string()
    .optional()
    .describe("First day to return in YYYY-MM-DD format. Defaults to the earliest available day."),
  end_date: z
    .string()
    .optional()
    .describe("Last day to return in YYYY-MM-DD format. Defaults to the latest available day."),
};

export function registerSeriesTools(server: McpServer, context: ToolContext) {
  const { config, logger } = context;

  server.registerTool(
    "get_expense_series",
    {
      description:
        "Get daily spending totals per ledger account, the same series the expense callouts are computed from. Days without spending are included as zero. Use this to chart spending, compare categories, or explain a callout in context.",
      inputSchema: { ...expenseSourceShape, ...rangeShape },
      annotations: { readOnlyHint: true },
    },
    async ({ account_prefix, level, start_date, end_date }) => {
      try {
        const entries = await readLedgerFile(requirePath(config.sources.ledgerPath, "LEDGER_PATH"));
        const store = buildExpenseSeries(entries, {
          accountPrefix: account_prefix,
          level,
          fillMissingDays: true,
        });
        return jsonResult(toRows(store, EXPENSE_METRIC, start_date, end_date));
      } catch (error) {
        return errorResult("get_expense_series", error, logger);
      }
    },
  );

  server.registerTool(
    "get_time_series",
    {
      description:
        "Get daily hours per activity category from the time blocks in daily notes, the same series the time callouts are computed from. Use this to see how much time went to work, sleep or hobbies on each day.",
      inputSchema: { ...timeSourceShape, ...rangeShape },
      annotations: { readOnlyHint: true },
    },
    async ({ categories, start_date, end_date }) => {
      try {
        const blocks = await readDailyNotes(
          requirePath(config.sources.dailyNotesPath, "DAILY_NOTES_PATH"),
          { since: start_date ?? config.sources.notesSince, until: end_date },
        );
        const store = buildTimeSeries(blocks, context.activities, {
          categories,
          fillMissingDays: true,
        });
        return jsonResult(toRows(store, TIME_METRIC, start_date, end_date));
      } catch (error) {
        return errorResult("get_time_series", error, logger);
      }
    },
  );
}

interface SeriesPoint {
  key: string;
  date: string;
  value: number;
}

function toRows(
  store: SeriesStore,
  metric: string,
  start?: string,
  end?: string,
): { metric: string; rows: SeriesPoint[] } {
  const scoped = store.between(start ?? "0000-01-01", end ?? "9999-12-31");
  return {
    metric,
    rows: scoped.rows.map((row) => ({
      key: row.key,
      date: row.date,
      value: scoped.value(row, metric),
    })),
  };
}
