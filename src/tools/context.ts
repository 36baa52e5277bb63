import type { ActivityTable } from "../ingest/activities.js";
import type { Config } from "../config.js";
import type { Logger } from "../logger.js";
import { errorMessage } from "../logger.js";

/** Everything a tool handler needs, built once at startup. */
export interface ToolContext {
  config: Config;
  activities: ActivityTable;
  logger: Logger;
  /** Reference date for relative periods; local today when omitted */
  today?: () => string;
}

export function jsonResult(data: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

export function errorResult(tool: string, error: unknown, logger: Logger) {
  const message = errorMessage(error);
  logger.warn("tool failed", { tool, error: message });
  return {
    content: [{ type: "text" as const, text: `Error: ${message}` }],
    isError: true,
  };
}
