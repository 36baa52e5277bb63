import { randomUUID } from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import { errorMessage } from "../logger.js";
import { auditLog } from "../middleware/audit.js";
import { bearerAuth } from "../middleware/auth.js";
import { rateLimit } from "../middleware/rate-limit.js";
import type { ToolContext } from "../tools/context.js";
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { HttpTransport } from "./transport.js";

const SESSION_TTL_MS = 30 * 60_000;
const SWEEP_INTERVAL_MS = 5 * 60_000;

interface McpSession {
  server: McpServer;
  transport: HttpTransport;
  lastAccess: number;
}

export interface HttpApp {
  app: Hono;
  /** Number of live MCP sessions */
  sessionCount(): number;
  close(): Promise<void>;
}

export function createHttpApp(context: ToolContext): HttpApp {
  const { config, logger } = context;
  const app = new Hono();
  const sessions = new Map<string, McpSession>();

  // ── Middleware ──
  app.use(requestLogger((line) => logger.debug(line)));
  app.use(auditLog(logger));
  app.use(
    cors({
      origin: config.server.corsOrigins,
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "Mcp-Session-Id"],
      exposeHeaders: ["Mcp-Session-Id", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    }),
  );

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({ status: "ok", server: SERVER_NAME, version: SERVER_VERSION }),
  );

  if (config.auth.apiToken) {
    app.use("/mcp", bearerAuth(config.auth.apiToken));
  } else {
    logger.warn("API_TOKEN is not set; the MCP endpoint accepts unauthenticated requests");
  }

  const closeSession = async (id: string, session: McpSession) => {
    sessions.delete(id);
    try {
      await session.server.close();
    } catch (error) {
      logger.warn("session close failed", { sessionId: id, error: errorMessage(error) });
    }
  };

  // Drop idle sessions
  const sweep = setInterval(() => {
    const cutoff = Date.now() - SESSION_TTL_MS;
    for (const [id, session] of sessions) {
      if (session.lastAccess < cutoff) {
        closeSession(id, session).catch((error: unknown) =>
          logger.error("session sweep failed", { error: errorMessage(error) }),
        );
      }
    }
  }, SWEEP_INTERVAL_MS);
  sweep.unref();

  // ── MCP endpoint ──
  app.post("/mcp", rateLimit({ rpm: config.rateLimit.rpm }), async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } },
        400,
      );
    }

    const parsed = JSONRPCMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } },
        400,
      );
    }

    const sessionId = c.req.header("mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    let transport: HttpTransport;
    let newSessionId: string | undefined;

    if (existing) {
      transport = existing.transport;
      existing.lastAccess = Date.now();
    } else {
      newSessionId = randomUUID();
      const server = createMcpServer(context);
      transport = new HttpTransport();
      await server.connect(transport);
      sessions.set(newSessionId, { server, transport, lastAccess: Date.now() });
      logger.debug("session opened", { sessionId: newSessionId });
    }

    const response = await transport.handleJsonRpc(parsed.data);

    if (newSessionId) {
      c.header("mcp-session-id", newSessionId);
    }
    if (response === null) {
      return c.body(null, 202);
    }
    return c.json(response);
  });

  app.delete("/mcp", async (c) => {
    const sessionId = c.req.header("mcp-session-id");
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (!sessionId || !session) {
      return c.json({ error: "not_found", error_description: "Unknown session." }, 404);
    }
    await closeSession(sessionId, session);
    return c.body(null, 204);
  });

  return {
    app,
    sessionCount: () => sessions.size,
    async close() {
      clearInterval(sweep);
      await Promise.all(
        [...sessions].map(([id, session]) => closeSession(id, session)),
      );
    },
  };
}
