import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolContext } from "./context.js";

export function registerResources(server: McpServer, context: ToolContext) {
  server.registerResource(
    "activities",
    "life://activities",
    {
      description: "Activity categories and the keywords that classify time blocks into them",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(context.activities, null, 2),
        },
      ],
    }),
  );

  server.registerResource(
    "callout-settings",
    "life://callouts/settings",
    {
      description: "Default rolling window, deviation threshold and buffer used by the callout tools",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(
            {
              ...context.config.callouts,
              ledgerConfigured: Boolean(context.config.sources.ledgerPath),
              dailyNotesConfigured: Boolean(context.config.sources.dailyNotesPath),
            },
            null,
            2,
          ),
        },
      ],
    }),
  );
}
