import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerCalloutTools } from "../tools/callouts.js";
import type { ToolContext } from "../tools/context.js";
import { registerPrompts } from "../tools/prompts.js";
import { registerResources } from "../tools/resources.js";
import { registerSeriesTools } from "../tools/series.js";

export const SERVER_NAME = "life-callouts";
export const SERVER_VERSION = "0.1.0";

/**
 * Create and configure a fully-loaded MCP server instance
 * with all tools, resources, and prompts registered.
 */
export function createMcpServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Callout tools: anomaly feeds over ledger, notes or inline rows
  registerCalloutTools(server, context);

  // Series tools: the daily tables behind the callouts
  registerSeriesTools(server, context);

  // Resources: read-only configuration surfaces
  registerResources(server, context);

  // Prompts: canned review templates
  registerPrompts(server);

  return server;
}
