#!/usr/bin/env node
/**
 * Life Callouts MCP Server
 *
 * Flags unusual days in personal spending and time tracking: spikes, drops
 * and threshold breaches over a plain-text ledger and daily-note time blocks.
 * Supports dual transport: stdio (desktop clients) and HTTP (remote connectors).
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local
 *   node dist/index.js --transport http    # Remote (HTTP server on port 3200)
 */

import "dotenv/config";
import { loadConfig, type Config } from "./config.js";
import { loadActivityTable } from "./ingest/activities.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import type { ToolContext } from "./tools/context.js";

let logger = createLogger();

try {
  const config = loadConfig();
  logger = createLogger(config.logLevel);
  const activities = await loadActivityTable(config.sources.activitiesPath);
  const context: ToolContext = { config, activities, logger };

  if (config.server.transport === "stdio") {
    await startStdio(context);
  } else {
    await startHttp(context, config, logger);
  }
} catch (error) {
  logger.error("startup failed", { error: errorMessage(error) });
  process.exit(1);
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio(context: ToolContext) {
  const { StdioServerTransport } = await import("@modelcontextprotocol/sdk/server/stdio.js");
  const { createMcpServer } = await import("./mcp/server.js");

  const server = createMcpServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  context.logger.info("listening on stdio");

  process.on("SIGINT", () => {
    server
      .close()
      .catch((error: unknown) => context.logger.error("shutdown failed", { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp(context: ToolContext, config: Config, logger: Logger) {
  const { serve } = await import("@hono/node-server");
  const { createHttpApp } = await import("./mcp/http.js");

  const { app, close } = createHttpApp(context);
  const port = config.server.port;

  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info("listening", {
      url: `http://localhost:${info.port}`,
      mcp: "POST /mcp",
      health: "GET /health",
    });
  });

  process.on("SIGINT", () => {
    close()
      .catch((error: unknown) => logger.error("shutdown failed", { error: errorMessage(error) }))
      .finally(() => server.close(() => process.exit(0)));
  });
}
