import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "weekly-review",
    {
      description:
        "Review last week's spending and time use, surfacing every day that deviated from the usual pattern",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please review my last week. Use these tools in order:\n\n1. **get_expense_callouts** - Spikes and drops in daily spending per category for the last week\n2. **get_time_callouts** - Spikes and drops in daily hours per activity category for the last week\n3. **get_expense_series** and **get_time_series** - Pull the surrounding days for any callout that needs context\n\nFormat the review with these sections:\n- **Spending**: Each callout with the day, category, amount and how far it sits from the trailing average\n- **Time**: Each callout with the day, activity and hours\n- **Patterns**: Callouts that line up across spending and time (e.g. a travel day with high spend and little sleep)\n- **Next week**: 2-3 concrete adjustments",
          },
        },
      ],
    }),
  );

  server.registerPrompt(
    "time-audit",
    {
      description:
        "Check weekly hours per activity against targets and flag days that fell short or ran over",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please audit how I spent my time. Use these tools:\n\n1. **get_time_callouts** with checks `[{\"type\": \"total\", \"operator\": \"<\", \"threshold\": 5}, {\"type\": \"condition\", \"operator\": \"<\", \"threshold\": 6}]` and categories `[\"Sleep\", \"Workout\", \"Learning\"]` - Categories under 5 hours for the week and days under 6 hours\n2. **get_time_callouts** with the default checks - Days that deviated from the trailing average\n3. **get_time_series** - Daily hours for the same period\n\nReport:\n- **Targets missed**: Each total or daily callout, with the shortfall\n- **Unusual days**: Spikes and drops, mildest first within a day\n- **Trend**: Whether each category is drifting up or down over the period",
          },
        },
      ],
    }),
  );
}
